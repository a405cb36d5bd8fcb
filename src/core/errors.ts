// ============================================================================
// Failure taxonomy shared by core operations
// ============================================================================

export type ConflictReason =
  | "registration_closed"
  | "event_past"
  | "already_registered"
  | "event_full"
  | "not_registered"
  | "capacity_below_registrations"
  | "role_unchanged"
  | "self_demotion";

export type Failure =
  | { kind: "forbidden" }
  | { kind: "not_found"; entity: "user" | "event" }
  | { kind: "conflict"; reason: ConflictReason }
  | { kind: "validation"; message: string };

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(failure: Failure): Outcome<T> {
  return { ok: false, failure };
}

export const forbidden = <T = never>(): Outcome<T> => fail({ kind: "forbidden" });
export const notFound = <T = never>(entity: "user" | "event"): Outcome<T> =>
  fail({ kind: "not_found", entity });
export const conflict = <T = never>(reason: ConflictReason): Outcome<T> =>
  fail({ kind: "conflict", reason });

/** Thrown by store implementations when the backing database call fails */
export class StoreError extends Error {
  constructor(
    readonly operation: string,
    readonly detail?: string,
  ) {
    super(detail ? `${operation} failed: ${detail}` : `${operation} failed`);
    this.name = "StoreError";
  }
}

const CONFLICT_NOTICES: Record<ConflictReason, string> = {
  registration_closed: "Registration for this event is closed",
  event_past: "This event has already taken place",
  already_registered: "You are already registered for this event",
  event_full: "The participant limit has been reached",
  not_registered: "You are not registered for this event",
  capacity_below_registrations: "More people are already registered than the new limit allows",
  role_unchanged: "The user already has this role",
  self_demotion: "You cannot change your own role",
};

/** Short, non-technical text shown to the user for a failure */
export function failureNotice(failure: Failure): string {
  switch (failure.kind) {
    case "forbidden":
      return "You do not have access to this action";
    case "not_found":
      return failure.entity === "event" ? "Event not found" : "User not found";
    case "conflict":
      return CONFLICT_NOTICES[failure.reason];
    case "validation":
      return failure.message;
  }
}
