/**
 * Telegram HTML card formatters + keyboard builders for EventDesk
 */

import { InlineKeyboard, Keyboard } from "grammy";
import type {
  BroadcastTarget,
  CityCode,
  EventDetails,
  EventRecord,
  MediaRef,
  ProfileStats,
  Role,
  UserRecord,
} from "../core/types.js";
import { CITIES, cityName, findCity } from "../config.js";
import { ROLE_LABELS, hasAdminAccess, hasStaffAccess } from "../core/roles.js";
import { encodeAction, type BotAction } from "./actions.js";

/** What the bot sends back: HTML text, optional media, optional buttons */
export interface Reply {
  text: string;
  keyboard?: InlineKeyboard | Keyboard;
  media?: MediaRef;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

const pad = (n: number) => String(n).padStart(2, "0");

/** 25.12.2024 */
export function formatDate(d: Date): string {
  return `${pad(d.getDate())}.${pad(d.getMonth() + 1)}.${d.getFullYear()}`;
}

/** 25.12.2024 at 18:30 */
export function formatDateTime(d: Date): string {
  return `${formatDate(d)} at ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

export function displayName(user: Pick<UserRecord, "firstName" | "lastName" | "username">): string {
  let name = user.firstName || "Unknown";
  if (user.lastName) name += ` ${user.lastName}`;
  if (user.username) name += ` (@${user.username})`;
  return escapeHtml(name);
}

const btn = (kb: InlineKeyboard, label: string, action: BotAction) => kb.text(label, encodeAction(action));

// ==========================================================================
// Main menu (reply keyboard)
// ==========================================================================

export const MENU = {
  events: "📅 Events",
  profile: "👤 Profile",
  city: "🏙️ Select city",
  panel: "⚙️ Control panel",
  donate: "💰 Donate",
  question: "❓ Ask a question",
} as const;

export function buildMainMenu(user: Pick<UserRecord, "role">): Keyboard {
  const kb = new Keyboard()
    .text(MENU.events).row()
    .text(MENU.profile).text(MENU.city).row();
  if (hasStaffAccess(user)) {
    kb.text(MENU.panel).row();
  }
  return kb.text(MENU.donate).text(MENU.question).resized();
}

export function formatWelcomeHtml(user: UserRecord): string {
  const lines = [`Welcome, <b>${escapeHtml(user.firstName || "friend")}</b>! 🎉`, ""];
  if (user.role === "admin") lines.push("You are an administrator of this bot.");
  else if (user.role === "moderator") lines.push("You are a moderator of this bot.");
  lines.push("Choose an action from the menu below.");
  return lines.join("\n");
}

// ==========================================================================
// Next event (greeting card)
// ==========================================================================

export function formatNextEventHtml(event: EventRecord | null, userCity?: CityCode): string {
  if (!event) {
    return "There are no upcoming events yet 😔\nCheck back soon!";
  }
  const elsewhere = userCity && event.city !== userCity
    ? `\n<i>Nothing planned in ${cityName(userCity)} yet, here is the nearest event elsewhere.</i>`
    : "";
  return [
    `🔜 <b>Next event</b>${elsewhere}`,
    "",
    `📅 <b>${escapeHtml(event.title)}</b>`,
    `🏙️ ${cityName(event.city)}`,
    `🕐 ${formatDateTime(event.dateTime)}`,
  ].join("\n");
}

export function buildNextEventKeyboard(eventId?: number): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (eventId !== undefined) btn(kb, "📝 Details", { kind: "event", op: "show", eventId }).row();
  btn(kb, "📅 All events", { kind: "all_events" }).row();
  btn(kb, "👤 Profile", { kind: "profile" }).row();
  btn(kb, "🏙️ Select city", { kind: "choose_city" });
  return kb;
}

// ==========================================================================
// City selection
// ==========================================================================

export function buildCitiesKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const city of CITIES) {
    btn(kb, `${city.emoji} ${city.name}`, { kind: "set_city", city: city.code }).row();
  }
  return btn(kb, "🔙 Back", { kind: "menu" });
}

// ==========================================================================
// Event browsing
// ==========================================================================

export function buildEventsMenuKeyboard(userCity?: CityCode): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (userCity) {
    btn(kb, `📍 Events in ${cityName(userCity)}`, { kind: "city_events", city: userCity }).row();
  }
  btn(kb, "📋 My events", { kind: "my_events" }).row();
  btn(kb, "🆕 All events", { kind: "all_events" }).row();
  return btn(kb, "🔙 Back", { kind: "menu" });
}

export type EventListMode = "browse" | "manage";

export function buildEventListKeyboard(events: EventRecord[], mode: EventListMode = "browse"): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const event of events) {
    const hidden = mode === "manage" && !event.isVisible ? " 🙈" : "";
    btn(kb, `📅 ${event.title} - ${formatDate(event.dateTime)}${hidden}`, {
      kind: "event",
      op: mode === "manage" ? "manage" : "show",
      eventId: event.id,
    }).row();
  }
  return btn(kb, "🔙 Back", mode === "manage" ? { kind: "manage_events" } : { kind: "events_menu" });
}

function participantsLine(count: number, max?: number): string {
  return max !== undefined ? `${count}/${max}` : String(count);
}

function eventBodyLines(event: EventRecord): string[] {
  return [
    `📅 <b>${escapeHtml(event.title)}</b>`,
    "",
    `📝 <b>Description:</b> ${event.description ? escapeHtml(event.description) : "Not specified"}`,
    `📍 <b>Location:</b> ${event.location ? escapeHtml(event.location) : "Not specified"}`,
    `🏙️ <b>City:</b> ${cityName(event.city)}`,
    `🕐 <b>Date and time:</b> ${formatDateTime(event.dateTime)}`,
  ];
}

export function formatEventCardHtml(details: EventDetails): string {
  const { event, participantCount } = details;
  const lines = eventBodyLines(event);
  lines.push(`👥 <b>Participants:</b> ${participantsLine(participantCount, event.maxParticipants)}`);
  if (!event.registrationRequired) {
    lines.push("🆓 <b>No registration needed</b>");
  } else if (event.registrationOpen) {
    lines.push("✅ <b>Registration is open</b>");
  } else {
    lines.push("❌ <b>Registration is closed</b>");
  }
  if (details.isRegistered) lines.push("", "🎟 You are registered");
  return lines.join("\n");
}

export function buildEventActionsKeyboard(details: EventDetails): InlineKeyboard {
  const { event } = details;
  const kb = new InlineKeyboard();
  if (details.isRegistered) {
    btn(kb, "❌ Unregister", { kind: "event", op: "unregister", eventId: event.id }).row();
  } else if (event.registrationRequired && event.registrationOpen) {
    btn(kb, "✅ Register", { kind: "event", op: "register", eventId: event.id }).row();
  }
  if (details.canManage) {
    btn(kb, "⚙️ Manage", { kind: "event", op: "manage", eventId: event.id }).row();
  }
  return btn(kb, "🔙 Back", { kind: "events_menu" });
}

// ==========================================================================
// Profile
// ==========================================================================

export function formatProfileHtml(user: UserRecord, stats: ProfileStats): string {
  const name = [user.firstName || "Not specified", user.lastName].filter(Boolean).join(" ");
  const lines = [
    "👤 <b>Your profile</b>",
    "",
    `🔹 <b>Name:</b> ${escapeHtml(name)}`,
  ];
  if (user.username) lines.push(`🔹 <b>Username:</b> @${escapeHtml(user.username)}`);
  lines.push(
    `🔹 <b>Role:</b> ${ROLE_LABELS[user.role]}`,
    `🔹 <b>City:</b> ${user.city ? cityName(user.city) : "Not selected"}`,
    `🔹 <b>Joined:</b> ${formatDate(user.createdAt)}`,
    "",
    "📊 <b>Statistics:</b>",
  );
  if (hasStaffAccess(user)) lines.push(`• Events created: ${stats.created}`);
  lines.push(
    `• Event registrations: ${stats.registrations}`,
    `• Upcoming events: ${stats.upcoming}`,
  );
  return lines.join("\n");
}

export function buildProfileKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "🏙️ Change city", { kind: "choose_city" }).row();
  btn(kb, "📋 My events", { kind: "my_events" }).row();
  return btn(kb, "🔙 Back", { kind: "menu" });
}

// ==========================================================================
// Control panel
// ==========================================================================

export function formatAdminPanelHtml(role: Role): string {
  return `⚙️ <b>Control panel</b> (${ROLE_LABELS[role]})`;
}

export function buildAdminPanelKeyboard(user: Pick<UserRecord, "role">): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "➕ Create event", { kind: "create_event" }).row();
  btn(kb, "📝 Manage events", { kind: "manage_events" }).row();
  btn(kb, "📢 Broadcast", { kind: "broadcast_menu" }).row();
  btn(kb, "❓ User questions", { kind: "questions" }).row();
  if (hasAdminAccess(user)) {
    btn(kb, "👥 Manage roles", { kind: "manage_roles" }).row();
  }
  return btn(kb, "🔙 Back", { kind: "menu" });
}

export function buildEventManagementKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "📋 My events", { kind: "my_created_events" }).row();
  btn(kb, "📊 All events", { kind: "all_events_manage" }).row();
  return btn(kb, "🔙 Back", { kind: "admin_panel" });
}

export function formatManageEventHtml(details: EventDetails): string {
  const { event, participantCount } = details;
  const lines = eventBodyLines(event);
  lines.push(
    `👥 <b>Participants:</b> ${participantsLine(participantCount, event.maxParticipants)}`,
    `✅ <b>Registration:</b> ${event.registrationRequired ? "Required" : "Not required"}`,
    `👁 <b>Visibility:</b> ${event.isVisible ? "Visible" : "Hidden"}`,
    `🔓 <b>Sign-ups:</b> ${event.registrationOpen ? "Open" : "Closed"}`,
    `📸 <b>Media:</b> ${event.media ? (event.media.kind === "photo" ? "Photo" : "Video") : "None"}`,
  );
  return lines.join("\n");
}

export function buildManageEventKeyboard(event: EventRecord): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "✏️ Edit", { kind: "event", op: "edit", eventId: event.id }).row();
  btn(kb, "👥 Participants", { kind: "event", op: "participants", eventId: event.id }).row();
  btn(kb, event.isVisible ? "🙈 Hide" : "👁 Show", { kind: "event", op: "toggle_visibility", eventId: event.id });
  btn(kb, event.registrationOpen ? "🔒 Close sign-ups" : "🔓 Open sign-ups", {
    kind: "event",
    op: "toggle_registration",
    eventId: event.id,
  }).row();
  btn(kb, "🗑️ Delete", { kind: "event", op: "delete", eventId: event.id }).row();
  return btn(kb, "🔙 Back", { kind: "my_created_events" });
}

export function formatDeleteConfirmHtml(event: EventRecord): string {
  return [
    "⚠️ Are you sure you want to delete this event?",
    "",
    `📅 <b>${escapeHtml(event.title)}</b>`,
    `🕐 ${formatDateTime(event.dateTime)}`,
    "",
    "❗️ This cannot be undone!",
  ].join("\n");
}

export function buildDeleteConfirmKeyboard(eventId: number): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "✅ Yes", { kind: "event", op: "confirm_delete", eventId });
  return btn(kb, "❌ No", { kind: "event", op: "cancel_delete", eventId });
}

export function formatParticipantsHtml(event: EventRecord, participants: UserRecord[]): string {
  const lines = [`👥 Participants of <b>${escapeHtml(event.title)}</b>`, ""];
  if (!participants.length) {
    lines.push("Nobody has registered yet 😔");
    return lines.join("\n");
  }
  participants.forEach((p, i) => lines.push(`${i + 1}. ${displayName(p)}`));
  lines.push("", `📊 Total: ${participantsLine(participants.length, event.maxParticipants)}`);
  return lines.join("\n");
}

export function formatStaffHtml(admins: UserRecord[], moderators: UserRecord[]): string {
  const lines = ["👥 <b>Role management</b>", "", `👑 <b>Administrators (${admins.length}):</b>`];
  for (const admin of admins) lines.push(`• ${displayName(admin)}`);
  lines.push("", `🛡 <b>Moderators (${moderators.length}):</b>`);
  if (moderators.length) {
    for (const mod of moderators) lines.push(`• ${displayName(mod)}`);
  } else {
    lines.push("No moderators");
  }
  return lines.join("\n");
}

export function buildRolesKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "➕ Add administrator", { kind: "role_action", action: "add_admin" }).row();
  btn(kb, "➕ Add moderator", { kind: "role_action", action: "add_moderator" }).row();
  btn(kb, "➖ Remove moderator", { kind: "role_action", action: "remove_moderator" }).row();
  return btn(kb, "🔙 Back", { kind: "admin_panel" });
}

export function describeTarget(target: BroadcastTarget): string {
  return target.kind === "all" ? "all users" : `users in ${cityName(target.city)}`;
}

export function buildBroadcastKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "👥 All users", { kind: "broadcast_target", target: { kind: "all" } }).row();
  for (const city of CITIES) {
    btn(kb, `${city.emoji} ${city.name}`, { kind: "broadcast_target", target: { kind: "city", city: city.code } }).row();
  }
  return btn(kb, "🔙 Back", { kind: "admin_panel" });
}

export function buildBackKeyboard(action: BotAction = { kind: "menu" }): InlineKeyboard {
  return btn(new InlineKeyboard(), "🔙 Back", action);
}

// ==========================================================================
// Wizard keyboards
// ==========================================================================

export function buildCancelKeyboard(): InlineKeyboard {
  return btn(new InlineKeyboard(), "❌ Cancel", { kind: "cancel" });
}

export function buildSkipKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "⏭ Skip", { kind: "wizard", value: "skip" });
  return btn(kb, "❌ Cancel", { kind: "cancel" });
}

export function buildCityChoiceKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const city of CITIES) {
    btn(kb, `${city.emoji} ${city.name}`, { kind: "wizard", value: `city_${city.code}` });
  }
  kb.row();
  return btn(kb, "❌ Cancel", { kind: "cancel" });
}

export function buildYesNoKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "✅ Yes", { kind: "wizard", value: "yes" });
  btn(kb, "🚫 No", { kind: "wizard", value: "no" }).row();
  return btn(kb, "❌ Cancel", { kind: "cancel" });
}

export function buildConfirmKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  btn(kb, "✅ Confirm", { kind: "wizard", value: "confirm" });
  return btn(kb, "❌ Cancel", { kind: "cancel" });
}

export function cityLabel(code: CityCode): string {
  const city = findCity(code);
  return city ? `${city.emoji} ${city.name}` : code;
}
