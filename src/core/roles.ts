/**
 * Role Policy
 *
 * Single place that decides what a user may do. Handlers never compare role
 * strings themselves.
 */

import { ROLES, type EventRecord, type Role, type RoleAction, type UserRecord } from "./types.js";
import { conflict, forbidden, ok, type Outcome } from "./errors.js";

export function resolveRole(user: Pick<UserRecord, "role"> | undefined | null): Role {
  if (!user) return "user";
  return ROLES.find((r) => r === user.role) ?? "user";
}

export function hasAdminAccess(user: Pick<UserRecord, "role"> | undefined | null): boolean {
  return resolveRole(user) === "admin";
}

/** Admin or moderator */
export function hasStaffAccess(user: Pick<UserRecord, "role"> | undefined | null): boolean {
  const role = resolveRole(user);
  return role === "admin" || role === "moderator";
}

export function canManageEvent(user: UserRecord | undefined | null, event: EventRecord): boolean {
  if (!user) return false;
  return hasStaffAccess(user) || user.id === event.creatorId;
}

/** Role assigned when an account is first created */
export function initialRole(telegramId: number, bootstrapAdminId: number | undefined): Role {
  return bootstrapAdminId !== undefined && telegramId === bootstrapAdminId ? "admin" : "user";
}

const ROLE_ACTION_TARGET: Record<RoleAction, Role> = {
  add_admin: "admin",
  add_moderator: "moderator",
  remove_moderator: "user",
};

/**
 * Work out the role a target ends up with. Only admins change roles, and each
 * action has one valid starting role set.
 */
export function planRoleChange(actor: UserRecord, target: UserRecord, action: RoleAction): Outcome<Role> {
  if (!hasAdminAccess(actor)) return forbidden();
  if (actor.id === target.id) return conflict("self_demotion");

  const current = resolveRole(target);
  switch (action) {
    case "add_admin":
      if (current === "admin") return conflict("role_unchanged");
      break;
    case "add_moderator":
      if (current === "admin" || current === "moderator") return conflict("role_unchanged");
      break;
    case "remove_moderator":
      if (current !== "moderator") return conflict("role_unchanged");
      break;
  }
  return ok(ROLE_ACTION_TARGET[action]);
}

export const ROLE_LABELS: Record<Role, string> = {
  user: "User",
  moderator: "Moderator",
  admin: "Administrator",
};
