/**
 * Wizard sessions
 *
 * One in-flight wizard per user, keyed by Telegram id. The store is async so
 * a shared backend can replace the in-memory one without touching the engine.
 */

import type { BroadcastTarget, CityCode, EditableField, MediaRef, RoleAction } from "../core/types.js";
import type { BroadcastMessage } from "../services/broadcast.js";

export type CreateStep =
  | "title"
  | "description"
  | "location"
  | "city"
  | "date_time"
  | "max_participants"
  | "registration_required"
  | "media";

export interface EventDraft {
  title?: string;
  description?: string;
  location?: string;
  city?: CityCode;
  dateTime?: Date;
  maxParticipants?: number;
  registrationRequired?: boolean;
  media?: MediaRef;
}

export type WizardState =
  | { wizard: "create_event"; step: CreateStep; draft: EventDraft }
  | { wizard: "edit_event"; step: "field"; eventId: number }
  | { wizard: "edit_event"; step: "value"; eventId: number; field: EditableField }
  | { wizard: "role_change"; step: "target"; action: RoleAction }
  | { wizard: "role_change"; step: "confirm"; action: RoleAction; targetTelegramId: number }
  | { wizard: "broadcast"; step: "message"; target: BroadcastTarget }
  | { wizard: "broadcast"; step: "confirm"; target: BroadcastTarget; message: BroadcastMessage };

export interface SessionStore {
  get(userKey: number): Promise<WizardState | null>;
  /** Read and remove in one call, so one input claims the session */
  take(userKey: number): Promise<WizardState | null>;
  set(userKey: number, state: WizardState): Promise<void>;
  clear(userKey: number): Promise<void>;
}

interface Entry {
  state: WizardState;
  lastActive: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, Entry>();
  private readonly idleMs: number;

  /** `idleMinutes` of 0 keeps sessions until they finish or are cancelled */
  constructor(
    idleMinutes: number,
    private readonly now: () => number = Date.now,
  ) {
    this.idleMs = idleMinutes * 60 * 1000;
  }

  async get(userKey: number): Promise<WizardState | null> {
    const entry = this.sessions.get(userKey);
    if (!entry) return null;
    if (this.expired(entry, this.now())) {
      this.sessions.delete(userKey);
      return null;
    }
    return entry.state;
  }

  async take(userKey: number): Promise<WizardState | null> {
    const entry = this.sessions.get(userKey);
    this.sessions.delete(userKey);
    if (!entry || this.expired(entry, this.now())) return null;
    return entry.state;
  }

  async set(userKey: number, state: WizardState): Promise<void> {
    this.sessions.set(userKey, { state, lastActive: this.now() });
  }

  async clear(userKey: number): Promise<void> {
    this.sessions.delete(userKey);
  }

  /** Drop idle sessions; returns how many were removed */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.sessions) {
      if (this.expired(entry, now)) {
        this.sessions.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private expired(entry: Entry, now: number): boolean {
    return this.idleMs > 0 && now - entry.lastActive > this.idleMs;
  }
}
