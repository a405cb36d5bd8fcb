/**
 * Local Store
 *
 * In-process tables with an optional JSON file behind them. Used when no
 * Supabase credentials are configured, and as the store in tests.
 *
 * Every mutation completes synchronously before the first await, so a
 * check-and-insert such as reserveSeat cannot interleave with another request
 * on the same event loop. The file write that follows is queued; if it fails
 * the change is undone in memory before the StoreError reaches the caller.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type {
  CityCode,
  EventFlag,
  EventPatch,
  EventRecord,
  MediaRef,
  NewEvent,
  PlatformProfile,
  RegistrationRecord,
  Role,
  UserRecord,
} from "../core/types.js";
import { ROLES } from "../core/types.js";
import { StoreError } from "../core/errors.js";
import { log, extractError } from "../utils/logger.js";
import type { EventFilter, EventStore, ReserveSeatResult } from "./types.js";

interface Tables {
  users: UserRecord[];
  events: EventRecord[];
  registrations: RegistrationRecord[];
  seq: { users: number; events: number; registrations: number };
}

function emptyTables(): Tables {
  return { users: [], events: [], registrations: [], seq: { users: 0, events: 0, registrations: 0 } };
}

const byDate = (a: EventRecord, b: EventRecord) => a.dateTime.getTime() - b.dateTime.getTime();

export class LocalStore implements EventStore {
  private tables: Tables;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly dataFile?: string,
    tables?: Tables,
  ) {
    this.tables = tables ?? emptyTables();
  }

  /** Open a file-backed store, loading the existing snapshot if any */
  static async open(dataFile: string): Promise<LocalStore> {
    let text: string | null = null;
    try {
      text = await readFile(dataFile, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) throw new StoreError("open", extractError(err));
    }
    if (text === null) {
      log.info("[store]", "Starting empty local store", { dataFile });
      return new LocalStore(dataFile);
    }
    const tables = reviveTables(JSON.parse(text));
    log.info("[store]", "Loaded local store", {
      dataFile,
      users: tables.users.length,
      events: tables.events.length,
    });
    return new LocalStore(dataFile, tables);
  }

  /** Resolves once every queued file write has landed */
  flush(): Promise<void> {
    return this.writeChain;
  }

  // --------------------------------------------------------------------------
  // Users
  // --------------------------------------------------------------------------

  async findUserByTelegramId(telegramId: number): Promise<UserRecord | null> {
    return copy(this.tables.users.find((u) => u.telegramId === telegramId));
  }

  async findUserById(id: number): Promise<UserRecord | null> {
    return copy(this.tables.users.find((u) => u.id === id));
  }

  async upsertUser(profile: PlatformProfile, roleOnCreate: Role): Promise<UserRecord> {
    const existing = this.tables.users.find((u) => u.telegramId === profile.telegramId);
    if (existing) {
      const before = { ...existing };
      existing.username = profile.username ?? existing.username;
      existing.firstName = profile.firstName ?? existing.firstName;
      existing.lastName = profile.lastName ?? existing.lastName;
      existing.isActive = true;
      await this.persist(() => replaceRow(this.tables.users, existing, before));
      return { ...existing };
    }
    const user: UserRecord = {
      id: ++this.tables.seq.users,
      telegramId: profile.telegramId,
      username: profile.username,
      firstName: profile.firstName,
      lastName: profile.lastName,
      role: roleOnCreate,
      createdAt: new Date(),
      isActive: true,
    };
    this.tables.users.push(user);
    await this.persist(() => removeRow(this.tables.users, user));
    return { ...user };
  }

  async setUserCity(userId: number, city: CityCode): Promise<void> {
    const user = this.tables.users.find((u) => u.id === userId);
    if (!user) return;
    const before = { ...user };
    user.city = city;
    await this.persist(() => replaceRow(this.tables.users, user, before));
  }

  async setUserRole(userId: number, role: Role): Promise<UserRecord | null> {
    const user = this.tables.users.find((u) => u.id === userId);
    if (!user) return null;
    const before = { ...user };
    user.role = role;
    await this.persist(() => replaceRow(this.tables.users, user, before));
    return { ...user };
  }

  async setUserActive(userId: number, active: boolean): Promise<void> {
    const user = this.tables.users.find((u) => u.id === userId);
    if (!user || user.isActive === active) return;
    const before = { ...user };
    user.isActive = active;
    await this.persist(() => replaceRow(this.tables.users, user, before));
  }

  async listUsersByRole(role: Role): Promise<UserRecord[]> {
    return this.tables.users.filter((u) => u.role === role).map((u) => ({ ...u }));
  }

  async listActiveUsers(city?: CityCode): Promise<UserRecord[]> {
    return this.tables.users
      .filter((u) => u.isActive && (city === undefined || u.city === city))
      .map((u) => ({ ...u }));
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  async createEvent(input: NewEvent, now: Date): Promise<EventRecord> {
    const event: EventRecord = {
      ...input,
      id: ++this.tables.seq.events,
      registrationOpen: true,
      isVisible: true,
      reminderHours: 24,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.events.push(event);
    await this.persist(() => removeRow(this.tables.events, event));
    return { ...event };
  }

  async findEvent(id: number): Promise<EventRecord | null> {
    return copy(this.tables.events.find((e) => e.id === id));
  }

  async listEvents(filter: EventFilter): Promise<EventRecord[]> {
    return this.tables.events
      .filter((e) =>
        (!filter.visibleOnly || e.isVisible)
        && (!filter.after || e.dateTime.getTime() > filter.after.getTime())
        && (filter.city === undefined || e.city === filter.city)
        && (filter.creatorId === undefined || e.creatorId === filter.creatorId))
      .sort(byDate)
      .map((e) => ({ ...e }));
  }

  async updateEvent(id: number, patch: EventPatch, now: Date): Promise<EventRecord | null> {
    const event = this.tables.events.find((e) => e.id === id);
    if (!event) return null;
    const before = { ...event };
    Object.assign(event, patch, { updatedAt: now });
    await this.persist(() => replaceRow(this.tables.events, event, before));
    return { ...event };
  }

  async toggleEventFlag(id: number, flag: EventFlag, now: Date): Promise<EventRecord | null> {
    const event = this.tables.events.find((e) => e.id === id);
    if (!event) return null;
    const before = { ...event };
    event[flag] = !event[flag];
    event.updatedAt = now;
    await this.persist(() => replaceRow(this.tables.events, event, before));
    return { ...event };
  }

  async deleteEvent(id: number): Promise<{ registrationsRemoved: number } | null> {
    const index = this.tables.events.findIndex((e) => e.id === id);
    if (index < 0) return null;
    const [event] = this.tables.events.splice(index, 1);
    const removed = this.tables.registrations.filter((r) => r.eventId === id);
    this.tables.registrations = this.tables.registrations.filter((r) => r.eventId !== id);
    await this.persist(() => {
      this.tables.events.push(event);
      this.tables.registrations.push(...removed);
    });
    return { registrationsRemoved: removed.length };
  }

  // --------------------------------------------------------------------------
  // Registrations
  // --------------------------------------------------------------------------

  async reserveSeat(userId: number, eventId: number, now: Date): Promise<ReserveSeatResult> {
    const event = this.tables.events.find((e) => e.id === eventId);
    if (!event) return { status: "missing" };
    if (!event.registrationOpen) return { status: "closed" };
    if (event.dateTime.getTime() <= now.getTime()) return { status: "past" };

    const taken = this.tables.registrations.filter((r) => r.eventId === eventId);
    if (taken.some((r) => r.userId === userId)) return { status: "duplicate" };
    if (event.maxParticipants !== undefined && taken.length >= event.maxParticipants) {
      return { status: "full" };
    }

    const registration: RegistrationRecord = {
      id: ++this.tables.seq.registrations,
      userId,
      eventId,
      registeredAt: now,
    };
    this.tables.registrations.push(registration);
    await this.persist(() => removeRow(this.tables.registrations, registration));
    return { status: "reserved", registration: { ...registration } };
  }

  async findRegistration(userId: number, eventId: number): Promise<RegistrationRecord | null> {
    return copy(this.tables.registrations.find((r) => r.userId === userId && r.eventId === eventId));
  }

  async deleteRegistration(userId: number, eventId: number): Promise<boolean> {
    const index = this.tables.registrations.findIndex((r) => r.userId === userId && r.eventId === eventId);
    if (index < 0) return false;
    const [registration] = this.tables.registrations.splice(index, 1);
    await this.persist(() => this.tables.registrations.push(registration));
    return true;
  }

  async countRegistrations(eventId: number): Promise<number> {
    return this.tables.registrations.filter((r) => r.eventId === eventId).length;
  }

  async countRegistrationsByUser(userId: number): Promise<number> {
    return this.tables.registrations.filter((r) => r.userId === userId).length;
  }

  async listEventsRegisteredBy(userId: number, after?: Date): Promise<EventRecord[]> {
    const ids = new Set(this.tables.registrations.filter((r) => r.userId === userId).map((r) => r.eventId));
    return this.tables.events
      .filter((e) => ids.has(e.id) && (!after || e.dateTime.getTime() > after.getTime()))
      .sort(byDate)
      .map((e) => ({ ...e }));
  }

  async listParticipants(eventId: number): Promise<UserRecord[]> {
    const users: UserRecord[] = [];
    const ordered = this.tables.registrations
      .filter((r) => r.eventId === eventId)
      .sort((a, b) => a.registeredAt.getTime() - b.registeredAt.getTime() || a.id - b.id);
    for (const reg of ordered) {
      const user = this.tables.users.find((u) => u.id === reg.userId);
      if (user) users.push({ ...user });
    }
    return users;
  }

  // --------------------------------------------------------------------------
  // File persistence
  // --------------------------------------------------------------------------

  /** Queue a snapshot write; `undo` reverts the in-memory change if it fails */
  private persist(undo: () => void): Promise<void> {
    const file = this.dataFile;
    if (!file) return Promise.resolve();
    const body = JSON.stringify(this.tables);
    const next = this.writeChain.then(async () => {
      await mkdir(dirname(file), { recursive: true });
      const tmp = `${file}.tmp`;
      await writeFile(tmp, body, "utf8");
      await rename(tmp, file);
    });
    this.writeChain = next.catch((err) => {
      log.error("[store]", "Local store write failed", { file, error: extractError(err) });
    });
    return next.catch((err) => {
      undo();
      throw new StoreError("persist", extractError(err));
    });
  }
}

function removeRow<T>(table: T[], row: T): void {
  const index = table.indexOf(row);
  if (index >= 0) table.splice(index, 1);
}

function replaceRow<T>(table: T[], row: T, previous: T): void {
  const index = table.indexOf(row);
  if (index >= 0) table[index] = previous;
}

function copy<T extends object>(row: T | undefined): T | null {
  return row ? { ...row } : null;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ----------------------------------------------------------------------------
// Snapshot revival (dates come back as ISO strings)
// ----------------------------------------------------------------------------

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rows(value: unknown, table: string): Row[] {
  if (!Array.isArray(value)) throw new StoreError("open", `snapshot table ${table} is missing`);
  return value.filter(isRow);
}

const optStr = (v: unknown): string | undefined => (typeof v === "string" ? v : undefined);
const num = (v: unknown): number => (typeof v === "number" ? v : Number.NaN);
const optNum = (v: unknown): number | undefined => (typeof v === "number" ? v : undefined);
const date = (v: unknown): Date => new Date(typeof v === "string" || typeof v === "number" ? v : Number.NaN);

function role(v: unknown): Role {
  return ROLES.find((r) => r === v) ?? "user";
}

function city(v: unknown): CityCode | undefined {
  return v === "moscow" || v === "kazan" ? v : undefined;
}

function media(v: unknown): MediaRef | undefined {
  if (!isRow(v) || typeof v.fileId !== "string") return undefined;
  if (v.kind !== "photo" && v.kind !== "video") return undefined;
  return { kind: v.kind, fileId: v.fileId };
}

function reviveTables(raw: unknown): Tables {
  if (!isRow(raw)) throw new StoreError("open", "snapshot is not an object");

  const users = rows(raw.users, "users").map((r): UserRecord => ({
    id: num(r.id),
    telegramId: num(r.telegramId),
    username: optStr(r.username),
    firstName: optStr(r.firstName),
    lastName: optStr(r.lastName),
    role: role(r.role),
    city: city(r.city),
    createdAt: date(r.createdAt),
    isActive: r.isActive !== false,
  }));

  const events = rows(raw.events, "events").map((r): EventRecord => ({
    id: num(r.id),
    title: optStr(r.title) ?? "",
    description: optStr(r.description),
    location: optStr(r.location),
    city: city(r.city) ?? "moscow",
    dateTime: date(r.dateTime),
    creatorId: num(r.creatorId),
    maxParticipants: optNum(r.maxParticipants),
    registrationRequired: r.registrationRequired !== false,
    registrationOpen: r.registrationOpen !== false,
    isVisible: r.isVisible !== false,
    media: media(r.media),
    reminderHours: optNum(r.reminderHours) ?? 24,
    createdAt: date(r.createdAt),
    updatedAt: date(r.updatedAt),
  }));

  const registrations = rows(raw.registrations, "registrations").map((r): RegistrationRecord => ({
    id: num(r.id),
    userId: num(r.userId),
    eventId: num(r.eventId),
    registeredAt: date(r.registeredAt),
  }));

  const seq = isRow(raw.seq) ? raw.seq : {};
  const maxId = (list: { id: number }[]) => list.reduce((m, x) => Math.max(m, x.id), 0);
  return {
    users,
    events,
    registrations,
    seq: {
      users: Math.max(optNum(seq.users) ?? 0, maxId(users)),
      events: Math.max(optNum(seq.events) ?? 0, maxId(events)),
      registrations: Math.max(optNum(seq.registrations) ?? 0, maxId(registrations)),
    },
  };
}
