import type {
  CityCode,
  EventFlag,
  EventPatch,
  EventRecord,
  NewEvent,
  PlatformProfile,
  RegistrationRecord,
  Role,
  UserRecord,
} from "../core/types.js";

/** Result of the atomic capacity-checked insert */
export type ReserveSeatResult =
  | { status: "reserved"; registration: RegistrationRecord }
  | { status: "missing" | "closed" | "past" | "duplicate" | "full" };

export interface EventFilter {
  visibleOnly?: boolean;
  /** Only events strictly after this instant */
  after?: Date;
  city?: CityCode;
  creatorId?: number;
}

/**
 * Persistence gateway. Every method may throw StoreError when the backing
 * database is unreachable; callers decide whether to degrade or surface it.
 */
export interface EventStore {
  findUserByTelegramId(telegramId: number): Promise<UserRecord | null>;
  findUserById(id: number): Promise<UserRecord | null>;
  /** Insert on first contact, otherwise refresh profile fields and reactivate */
  upsertUser(profile: PlatformProfile, roleOnCreate: Role): Promise<UserRecord>;
  setUserCity(userId: number, city: CityCode): Promise<void>;
  setUserRole(userId: number, role: Role): Promise<UserRecord | null>;
  setUserActive(userId: number, active: boolean): Promise<void>;
  listUsersByRole(role: Role): Promise<UserRecord[]>;
  /** Active users, optionally restricted to one city */
  listActiveUsers(city?: CityCode): Promise<UserRecord[]>;

  createEvent(input: NewEvent, now: Date): Promise<EventRecord>;
  findEvent(id: number): Promise<EventRecord | null>;
  /** Ascending by date_time */
  listEvents(filter: EventFilter): Promise<EventRecord[]>;
  updateEvent(id: number, patch: EventPatch, now: Date): Promise<EventRecord | null>;
  /** Flips one boolean column in a single write and bumps updated_at */
  toggleEventFlag(id: number, flag: EventFlag, now: Date): Promise<EventRecord | null>;
  /** Removes the event and its registrations; null when the event did not exist */
  deleteEvent(id: number): Promise<{ registrationsRemoved: number } | null>;

  /**
   * Insert a registration only if the event is open, upcoming, not already
   * joined by the user and below capacity, as one atomic unit per event.
   */
  reserveSeat(userId: number, eventId: number, now: Date): Promise<ReserveSeatResult>;
  findRegistration(userId: number, eventId: number): Promise<RegistrationRecord | null>;
  deleteRegistration(userId: number, eventId: number): Promise<boolean>;
  countRegistrations(eventId: number): Promise<number>;
  countRegistrationsByUser(userId: number): Promise<number>;
  /** Events the user is registered for, optionally upcoming only, ascending */
  listEventsRegisteredBy(userId: number, after?: Date): Promise<EventRecord[]>;
  /** Participants in registration order */
  listParticipants(eventId: number): Promise<UserRecord[]>;
}
