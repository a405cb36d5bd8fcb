/**
 * Supabase Store
 *
 * EventStore over PostgREST via supabase-js. Operations that must be atomic
 * per event (seat reservation, flag toggles, cascading delete) are Postgres
 * functions defined in supabase/migrations and called through rpc().
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
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
import type { EventFilter, EventStore, ReserveSeatResult } from "./types.js";

type Row = Record<string, unknown>;

const USERS = "users";
const EVENTS = "events";
const REGISTRATIONS = "event_registrations";

const FLAG_COLUMNS: Record<EventFlag, string> = {
  isVisible: "is_visible",
  registrationOpen: "registration_open",
};

const SEAT_STATUSES = ["missing", "closed", "past", "duplicate", "full"] as const;

export class SupabaseStore implements EventStore {
  private readonly db: SupabaseClient;

  constructor(cfg: { supabaseUrl: string; supabaseKey: string }, client?: SupabaseClient) {
    this.db = client ?? createClient(cfg.supabaseUrl, cfg.supabaseKey, {
      auth: { persistSession: false },
    });
  }

  // --------------------------------------------------------------------------
  // Users
  // --------------------------------------------------------------------------

  async findUserByTelegramId(telegramId: number): Promise<UserRecord | null> {
    const { data, error } = await this.db.from(USERS).select("*").eq("telegram_id", telegramId).maybeSingle();
    if (error) throw new StoreError("findUserByTelegramId", error.message);
    return data ? toUser(data) : null;
  }

  async findUserById(id: number): Promise<UserRecord | null> {
    const { data, error } = await this.db.from(USERS).select("*").eq("id", id).maybeSingle();
    if (error) throw new StoreError("findUserById", error.message);
    return data ? toUser(data) : null;
  }

  async upsertUser(profile: PlatformProfile, roleOnCreate: Role): Promise<UserRecord> {
    const fields: Row = { is_active: true };
    if (profile.username !== undefined) fields.username = profile.username;
    if (profile.firstName !== undefined) fields.first_name = profile.firstName;
    if (profile.lastName !== undefined) fields.last_name = profile.lastName;

    const existing = await this.findUserByTelegramId(profile.telegramId);
    if (existing) {
      const { data, error } = await this.db.from(USERS).update(fields).eq("id", existing.id).select("*").single();
      if (error) throw new StoreError("upsertUser", error.message);
      return toUser(data);
    }

    // ignoreDuplicates keeps the role of a row created by a concurrent first contact
    const { error } = await this.db
      .from(USERS)
      .upsert({ ...fields, telegram_id: profile.telegramId, role: roleOnCreate }, {
        onConflict: "telegram_id",
        ignoreDuplicates: true,
      });
    if (error) throw new StoreError("upsertUser", error.message);

    const created = await this.findUserByTelegramId(profile.telegramId);
    if (!created) throw new StoreError("upsertUser", "row missing after insert");
    return created;
  }

  async setUserCity(userId: number, city: CityCode): Promise<void> {
    const { error } = await this.db.from(USERS).update({ city }).eq("id", userId);
    if (error) throw new StoreError("setUserCity", error.message);
  }

  async setUserRole(userId: number, role: Role): Promise<UserRecord | null> {
    const { data, error } = await this.db.from(USERS).update({ role }).eq("id", userId).select("*").maybeSingle();
    if (error) throw new StoreError("setUserRole", error.message);
    return data ? toUser(data) : null;
  }

  async setUserActive(userId: number, active: boolean): Promise<void> {
    const { error } = await this.db.from(USERS).update({ is_active: active }).eq("id", userId);
    if (error) throw new StoreError("setUserActive", error.message);
  }

  async listUsersByRole(role: Role): Promise<UserRecord[]> {
    const { data, error } = await this.db.from(USERS).select("*").eq("role", role).order("id");
    if (error) throw new StoreError("listUsersByRole", error.message);
    return (data ?? []).map(toUser);
  }

  async listActiveUsers(city?: CityCode): Promise<UserRecord[]> {
    let query = this.db.from(USERS).select("*").eq("is_active", true);
    if (city) query = query.eq("city", city);
    const { data, error } = await query.order("id");
    if (error) throw new StoreError("listActiveUsers", error.message);
    return (data ?? []).map(toUser);
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  async createEvent(input: NewEvent, now: Date): Promise<EventRecord> {
    const { data, error } = await this.db
      .from(EVENTS)
      .insert({
        title: input.title,
        description: input.description ?? null,
        location: input.location ?? null,
        city: input.city,
        date_time: input.dateTime.toISOString(),
        creator_id: input.creatorId,
        max_participants: input.maxParticipants ?? null,
        registration_required: input.registrationRequired,
        photo_file_id: input.media?.kind === "photo" ? input.media.fileId : null,
        video_file_id: input.media?.kind === "video" ? input.media.fileId : null,
        media_type: input.media?.kind ?? null,
        created_at: now.toISOString(),
        updated_at: now.toISOString(),
      })
      .select("*")
      .single();
    if (error) throw new StoreError("createEvent", error.message);
    return toEvent(data);
  }

  async findEvent(id: number): Promise<EventRecord | null> {
    const { data, error } = await this.db.from(EVENTS).select("*").eq("id", id).maybeSingle();
    if (error) throw new StoreError("findEvent", error.message);
    return data ? toEvent(data) : null;
  }

  async listEvents(filter: EventFilter): Promise<EventRecord[]> {
    let query = this.db.from(EVENTS).select("*");
    if (filter.visibleOnly) query = query.eq("is_visible", true);
    if (filter.after) query = query.gt("date_time", filter.after.toISOString());
    if (filter.city) query = query.eq("city", filter.city);
    if (filter.creatorId !== undefined) query = query.eq("creator_id", filter.creatorId);
    const { data, error } = await query.order("date_time", { ascending: true });
    if (error) throw new StoreError("listEvents", error.message);
    return (data ?? []).map(toEvent);
  }

  async updateEvent(id: number, patch: EventPatch, now: Date): Promise<EventRecord | null> {
    const fields: Row = { updated_at: now.toISOString() };
    if ("title" in patch) fields.title = patch.title;
    if ("description" in patch) fields.description = patch.description ?? null;
    if ("location" in patch) fields.location = patch.location ?? null;
    if ("city" in patch) fields.city = patch.city;
    if (patch.dateTime) fields.date_time = patch.dateTime.toISOString();
    if ("maxParticipants" in patch) fields.max_participants = patch.maxParticipants ?? null;

    const { data, error } = await this.db.from(EVENTS).update(fields).eq("id", id).select("*").maybeSingle();
    if (error) throw new StoreError("updateEvent", error.message);
    return data ? toEvent(data) : null;
  }

  async toggleEventFlag(id: number, flag: EventFlag, now: Date): Promise<EventRecord | null> {
    const { data, error } = await this.db.rpc("toggle_event_flag", {
      p_event_id: id,
      p_column: FLAG_COLUMNS[flag],
      p_now: now.toISOString(),
    });
    if (error) throw new StoreError("toggleEventFlag", error.message);
    const row = firstRow(data);
    return row ? toEvent(row) : null;
  }

  async deleteEvent(id: number): Promise<{ registrationsRemoved: number } | null> {
    const { data, error } = await this.db.rpc("delete_event_cascade", { p_event_id: id });
    if (error) throw new StoreError("deleteEvent", error.message);
    // The function returns -1 when the event did not exist
    const removed = typeof data === "number" ? data : Number(data);
    return removed < 0 ? null : { registrationsRemoved: removed };
  }

  // --------------------------------------------------------------------------
  // Registrations
  // --------------------------------------------------------------------------

  async reserveSeat(userId: number, eventId: number, now: Date): Promise<ReserveSeatResult> {
    const { data, error } = await this.db.rpc("reserve_event_seat", {
      p_user_id: userId,
      p_event_id: eventId,
      p_now: now.toISOString(),
    });
    if (error) throw new StoreError("reserveSeat", error.message);

    const row = firstRow(data);
    if (!row) throw new StoreError("reserveSeat", "empty result");
    const status = row.status;
    if (status === "reserved") {
      return {
        status: "reserved",
        registration: {
          id: num(row.registration_id),
          userId,
          eventId,
          registeredAt: date(row.registered_at),
        },
      };
    }
    const known = SEAT_STATUSES.find((s) => s === status);
    if (!known) throw new StoreError("reserveSeat", `unexpected status ${String(status)}`);
    return { status: known };
  }

  async findRegistration(userId: number, eventId: number): Promise<RegistrationRecord | null> {
    const { data, error } = await this.db
      .from(REGISTRATIONS)
      .select("*")
      .eq("user_id", userId)
      .eq("event_id", eventId)
      .maybeSingle();
    if (error) throw new StoreError("findRegistration", error.message);
    return data ? toRegistration(data) : null;
  }

  async deleteRegistration(userId: number, eventId: number): Promise<boolean> {
    const { count, error } = await this.db
      .from(REGISTRATIONS)
      .delete({ count: "exact" })
      .eq("user_id", userId)
      .eq("event_id", eventId);
    if (error) throw new StoreError("deleteRegistration", error.message);
    return (count ?? 0) > 0;
  }

  async countRegistrations(eventId: number): Promise<number> {
    const { count, error } = await this.db
      .from(REGISTRATIONS)
      .select("id", { count: "exact", head: true })
      .eq("event_id", eventId);
    if (error) throw new StoreError("countRegistrations", error.message);
    return count ?? 0;
  }

  async countRegistrationsByUser(userId: number): Promise<number> {
    const { count, error } = await this.db
      .from(REGISTRATIONS)
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId);
    if (error) throw new StoreError("countRegistrationsByUser", error.message);
    return count ?? 0;
  }

  async listEventsRegisteredBy(userId: number, after?: Date): Promise<EventRecord[]> {
    let query = this.db
      .from(EVENTS)
      .select(`*, ${REGISTRATIONS}!inner(user_id)`)
      .eq(`${REGISTRATIONS}.user_id`, userId);
    if (after) query = query.gt("date_time", after.toISOString());
    const { data, error } = await query.order("date_time", { ascending: true });
    if (error) throw new StoreError("listEventsRegisteredBy", error.message);
    return (data ?? []).map(toEvent);
  }

  async listParticipants(eventId: number): Promise<UserRecord[]> {
    const { data, error } = await this.db
      .from(REGISTRATIONS)
      .select(`registered_at, ${USERS}(*)`)
      .eq("event_id", eventId)
      .order("registered_at", { ascending: true });
    if (error) throw new StoreError("listParticipants", error.message);

    const users: UserRecord[] = [];
    for (const row of data ?? []) {
      const user: unknown = isRow(row) ? row[USERS] : undefined;
      if (isRow(user)) users.push(toUser(user));
    }
    return users;
  }
}

// ----------------------------------------------------------------------------
// Row mapping (snake_case columns -> records)
// ----------------------------------------------------------------------------

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstRow(data: unknown): Row | null {
  const row: unknown = Array.isArray(data) ? data[0] : data;
  return isRow(row) ? row : null;
}

const optStr = (v: unknown): string | undefined => (typeof v === "string" && v !== "" ? v : undefined);
const num = (v: unknown): number => (typeof v === "number" ? v : Number(v));
const date = (v: unknown): Date => new Date(typeof v === "string" || typeof v === "number" ? v : Number.NaN);

function toCity(v: unknown): CityCode | undefined {
  return v === "moscow" || v === "kazan" ? v : undefined;
}

function toUser(row: Row): UserRecord {
  return {
    id: num(row.id),
    telegramId: num(row.telegram_id),
    username: optStr(row.username),
    firstName: optStr(row.first_name),
    lastName: optStr(row.last_name),
    role: ROLES.find((r) => r === row.role) ?? "user",
    city: toCity(row.city),
    createdAt: date(row.created_at),
    isActive: row.is_active !== false,
  };
}

function toMedia(row: Row): MediaRef | undefined {
  const photo = optStr(row.photo_file_id);
  if (photo) return { kind: "photo", fileId: photo };
  const video = optStr(row.video_file_id);
  if (video) return { kind: "video", fileId: video };
  return undefined;
}

function toEvent(row: Row): EventRecord {
  return {
    id: num(row.id),
    title: optStr(row.title) ?? "",
    description: optStr(row.description),
    location: optStr(row.location),
    city: toCity(row.city) ?? "moscow",
    dateTime: date(row.date_time),
    creatorId: num(row.creator_id),
    maxParticipants: row.max_participants == null ? undefined : num(row.max_participants),
    registrationRequired: row.registration_required !== false,
    registrationOpen: row.registration_open !== false,
    isVisible: row.is_visible !== false,
    media: toMedia(row),
    reminderHours: row.reminder_hours == null ? 24 : num(row.reminder_hours),
    createdAt: date(row.created_at),
    updatedAt: date(row.updated_at),
  };
}

function toRegistration(row: Row): RegistrationRecord {
  return {
    id: num(row.id),
    userId: num(row.user_id),
    eventId: num(row.event_id),
    registeredAt: date(row.registered_at),
  };
}
