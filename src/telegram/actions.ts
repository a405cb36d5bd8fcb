/**
 * Callback action tokens
 *
 * Inline buttons carry `{action}`, `{action}_{id}` or `{action}_{sub}_{id}`.
 * Tokens are parsed once here into a tagged union; handlers never split
 * strings. `encodeAction` is the only producer of tokens, so every button the
 * bot draws parses back to the action it was built from.
 */

import type { BroadcastTarget, CityCode, RoleAction } from "../core/types.js";
import { isCityCode } from "../config.js";

export type EventOp =
  | "show"
  | "register"
  | "unregister"
  | "manage"
  | "edit"
  | "participants"
  | "toggle_visibility"
  | "toggle_registration"
  | "delete"
  | "confirm_delete"
  | "cancel_delete";

export type BotAction =
  | { kind: "menu" }
  | { kind: "events_menu" }
  | { kind: "all_events" }
  | { kind: "city_events"; city: CityCode }
  | { kind: "my_events" }
  | { kind: "choose_city" }
  | { kind: "set_city"; city: CityCode }
  | { kind: "profile" }
  | { kind: "donate" }
  | { kind: "questions" }
  | { kind: "admin_panel" }
  | { kind: "create_event" }
  | { kind: "manage_events" }
  | { kind: "my_created_events" }
  | { kind: "all_events_manage" }
  | { kind: "broadcast_menu" }
  | { kind: "broadcast_target"; target: BroadcastTarget }
  | { kind: "manage_roles" }
  | { kind: "role_action"; action: RoleAction }
  | { kind: "cancel" }
  | { kind: "wizard"; value: string }
  | { kind: "event"; op: EventOp; eventId: number };

export type ParsedAction =
  | { ok: true; action: BotAction }
  | { ok: false; reason: "unknown" | "malformed_id"; token: string };

const FIXED = new Map<string, BotAction>(Object.entries({
  back_to_menu: { kind: "menu" },
  back_to_events: { kind: "events_menu" },
  all_events: { kind: "all_events" },
  my_events: { kind: "my_events" },
  select_city: { kind: "choose_city" },
  profile: { kind: "profile" },
  donate: { kind: "donate" },
  user_questions: { kind: "questions" },
  admin_panel: { kind: "admin_panel" },
  create_event: { kind: "create_event" },
  manage_events: { kind: "manage_events" },
  my_created_events: { kind: "my_created_events" },
  all_events_manage: { kind: "all_events_manage" },
  broadcast: { kind: "broadcast_menu" },
  manage_roles: { kind: "manage_roles" },
  cancel: { kind: "cancel" },
} satisfies Record<string, BotAction>));

const ROLE_ACTIONS: readonly RoleAction[] = ["add_admin", "add_moderator", "remove_moderator"];

// Longest prefix first so "event_participants_5" is not read as "event_" + "participants_5"
const EVENT_PREFIXES: readonly [EventOp, string][] = [
  ["confirm_delete", "confirm_delete_event"],
  ["cancel_delete", "cancel_delete_event"],
  ["toggle_registration", "toggle_registration"],
  ["participants", "event_participants"],
  ["toggle_visibility", "toggle_visibility"],
  ["manage", "manage_event"],
  ["delete", "delete_event"],
  ["unregister", "unregister"],
  ["edit", "edit_event"],
  ["register", "register"],
  ["show", "event"],
];

const CITY_PREFIXES: readonly [string, (city: CityCode) => BotAction][] = [
  ["events_city", (city) => ({ kind: "city_events", city })],
  ["broadcast_city", (city) => ({ kind: "broadcast_target", target: { kind: "city", city } })],
  ["city", (city) => ({ kind: "set_city", city })],
];

const WIZARD_PREFIX = "wz_";

export function encodeAction(action: BotAction): string {
  switch (action.kind) {
    case "city_events":
      return `events_city_${action.city}`;
    case "set_city":
      return `city_${action.city}`;
    case "broadcast_target":
      return action.target.kind === "all" ? "broadcast_all" : `broadcast_city_${action.target.city}`;
    case "role_action":
      return action.action;
    case "wizard":
      return `${WIZARD_PREFIX}${action.value}`;
    case "event":
      return `${eventPrefix(action.op)}_${action.eventId}`;
    default: {
      for (const [token, fixed] of FIXED) {
        if (fixed.kind === action.kind) return token;
      }
      return action.kind;
    }
  }
}

export function parseAction(token: string): ParsedAction {
  const done = (action: BotAction): ParsedAction => ({ ok: true, action });
  const unknown: ParsedAction = { ok: false, reason: "unknown", token };

  const fixed = FIXED.get(token);
  if (fixed) return done(fixed);

  const role = ROLE_ACTIONS.find((a) => a === token);
  if (role) return done({ kind: "role_action", action: role });

  if (token === "broadcast_all") return done({ kind: "broadcast_target", target: { kind: "all" } });

  if (token.startsWith(WIZARD_PREFIX)) {
    const value = token.slice(WIZARD_PREFIX.length);
    return value ? done({ kind: "wizard", value }) : unknown;
  }

  for (const [prefix, build] of CITY_PREFIXES) {
    if (token.startsWith(`${prefix}_`)) {
      const code = token.slice(prefix.length + 1);
      return isCityCode(code) ? done(build(code)) : unknown;
    }
  }

  for (const [op, prefix] of EVENT_PREFIXES) {
    if (token.startsWith(`${prefix}_`)) {
      const raw = token.slice(prefix.length + 1);
      if (!/^\d{1,15}$/.test(raw)) return { ok: false, reason: "malformed_id", token };
      return done({ kind: "event", op, eventId: parseInt(raw, 10) });
    }
  }

  return unknown;
}

function eventPrefix(op: EventOp): string {
  return EVENT_PREFIXES.find(([candidate]) => candidate === op)?.[1] ?? "event";
}
