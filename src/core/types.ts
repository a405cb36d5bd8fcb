// ============================================================================
// EventDesk Core Types
// ============================================================================

export const ROLES = ["user", "moderator", "admin"] as const;
export type Role = (typeof ROLES)[number];

export type CityCode = "moscow" | "kazan";

export interface City {
  code: CityCode;
  name: string;
  emoji: string;
}

export interface EventDeskConfig {
  botToken?: string;
  /** Telegram id promoted to admin on first contact */
  bootstrapAdminId?: number;
  store: StoreConfig;
  port: number;
  /** Idle minutes before an unfinished wizard is dropped; 0 keeps it forever */
  wizardIdleMinutes: number;
  broadcast: BroadcastConfig;
}

export type StoreConfig =
  | { kind: "supabase"; supabaseUrl: string; supabaseKey: string }
  | { kind: "local"; dataFile: string };

export interface BroadcastConfig {
  batchSize: number;
  pauseMs: number;
}

// ============================================================================
// Records
// ============================================================================

export interface UserRecord {
  id: number;
  telegramId: number;
  username?: string;
  firstName?: string;
  lastName?: string;
  role: Role;
  city?: CityCode;
  createdAt: Date;
  isActive: boolean;
}

export type MediaKind = "photo" | "video";

export interface MediaRef {
  kind: MediaKind;
  fileId: string;
}

export interface EventRecord {
  id: number;
  title: string;
  description?: string;
  location?: string;
  city: CityCode;
  dateTime: Date;
  creatorId: number;
  /** Unset means unlimited */
  maxParticipants?: number;
  registrationRequired: boolean;
  registrationOpen: boolean;
  isVisible: boolean;
  media?: MediaRef;
  reminderHours: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RegistrationRecord {
  id: number;
  userId: number;
  eventId: number;
  registeredAt: Date;
}

/** Profile fields delivered by the messaging platform on every update */
export interface PlatformProfile {
  telegramId: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface NewEvent {
  title: string;
  description?: string;
  location?: string;
  city: CityCode;
  dateTime: Date;
  creatorId: number;
  maxParticipants?: number;
  registrationRequired: boolean;
  media?: MediaRef;
}

export type EditableField = "title" | "description" | "location" | "city" | "date_time" | "max_participants";

export type EventPatch = Partial<Pick<EventRecord,
  "title" | "description" | "location" | "city" | "dateTime" | "maxParticipants">>;

export type EventFlag = "isVisible" | "registrationOpen";

export type BroadcastTarget = { kind: "all" } | { kind: "city"; city: CityCode };

export type RoleAction = "add_admin" | "add_moderator" | "remove_moderator";

export interface EventDetails {
  event: EventRecord;
  participantCount: number;
  isRegistered: boolean;
  canManage: boolean;
}

export interface ProfileStats {
  created: number;
  registrations: number;
  upcoming: number;
}

/** Clock seam so date rules can be pinned in tests */
export type Clock = () => Date;
