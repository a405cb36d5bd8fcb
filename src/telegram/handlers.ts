/**
 * Update handlers
 *
 * Everything the bot does for a command, a button or a message, expressed as
 * replies plus an optional popup notice. No grammY context in here; bot.ts
 * turns a HandlerResult into API calls.
 */

import type { EventRecord, UserRecord } from "../core/types.js";
import type { EventDeskCore } from "../core/eventdesk.js";
import { failureNotice, type Failure } from "../core/errors.js";
import { hasAdminAccess, hasStaffAccess } from "../core/roles.js";
import type { WizardEngine } from "../wizard/engine.js";
import type { WizardInput } from "../wizard/types.js";
import type { BotAction, EventOp, ParsedAction } from "./actions.js";
import {
  MENU,
  buildAdminPanelKeyboard,
  buildBackKeyboard,
  buildBroadcastKeyboard,
  buildCitiesKeyboard,
  buildDeleteConfirmKeyboard,
  buildEventActionsKeyboard,
  buildEventListKeyboard,
  buildEventManagementKeyboard,
  buildEventsMenuKeyboard,
  buildMainMenu,
  buildManageEventKeyboard,
  buildNextEventKeyboard,
  buildProfileKeyboard,
  buildRolesKeyboard,
  cityLabel,
  escapeHtml,
  formatAdminPanelHtml,
  formatDeleteConfirmHtml,
  formatEventCardHtml,
  formatManageEventHtml,
  formatNextEventHtml,
  formatParticipantsHtml,
  formatProfileHtml,
  formatStaffHtml,
  formatWelcomeHtml,
  type EventListMode,
  type Reply,
} from "./cards.js";
import { log } from "../utils/logger.js";

export interface HandlerResult {
  replies: Reply[];
  /** Popup text for a button press */
  notice?: string;
  /** Show the notice as a modal alert instead of a toast */
  alert?: boolean;
}

export type BotCommand = "start" | "menu" | "events" | "profile" | "admin" | "cancel";

const COMING_SOON = "🚧 This feature is coming soon!";

const reply = (...replies: Reply[]): HandlerResult => ({ replies });
const alert = (text: string): HandlerResult => ({ replies: [], notice: text, alert: true });
const failed = (failure: Failure): HandlerResult => alert(failureNotice(failure));

const MENU_ACTIONS = new Map<string, BotAction>([
  [MENU.events, { kind: "events_menu" }],
  [MENU.profile, { kind: "profile" }],
  [MENU.city, { kind: "choose_city" }],
  [MENU.panel, { kind: "admin_panel" }],
  [MENU.donate, { kind: "donate" }],
  [MENU.question, { kind: "questions" }],
]);

export class BotHandlers {
  constructor(
    private readonly core: EventDeskCore,
    private readonly engine: WizardEngine,
  ) {}

  // ==========================================================================
  // Commands
  // ==========================================================================

  async onCommand(user: UserRecord, command: BotCommand): Promise<HandlerResult> {
    switch (command) {
      case "start":
        return this.greet(user);
      case "menu":
        return this.onAction(user, { kind: "menu" });
      case "events":
        return this.onAction(user, { kind: "events_menu" });
      case "profile":
        return this.onAction(user, { kind: "profile" });
      case "admin":
        return this.onAction(user, { kind: "admin_panel" });
      case "cancel":
        return reply(await this.engine.cancel(user));
    }
  }

  private async greet(user: UserRecord): Promise<HandlerResult> {
    await this.engine.cancel(user);
    const next = await this.core.catalog.nextUpcomingForUser(user);
    return reply(
      { text: formatWelcomeHtml(user), keyboard: buildMainMenu(user) },
      {
        text: formatNextEventHtml(next, user.city),
        keyboard: buildNextEventKeyboard(next?.id),
        media: next?.media,
      },
    );
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  /** A main-menu button leaves any active wizard; other input goes to the wizard or gets a hint */
  async onInput(user: UserRecord, input: WizardInput): Promise<HandlerResult> {
    const action = input.kind === "text" ? MENU_ACTIONS.get(input.text.trim()) : undefined;
    if (action) {
      await this.engine.cancel(user);
      return this.onAction(user, action);
    }

    const stepped = await this.engine.handle(user, input);
    if (stepped) return reply(stepped);
    return reply({ text: "Please use the menu below 👇", keyboard: buildMainMenu(user) });
  }

  // ==========================================================================
  // Buttons
  // ==========================================================================

  async onCallback(user: UserRecord, parsed: ParsedAction): Promise<HandlerResult> {
    if (!parsed.ok) {
      if (parsed.reason === "malformed_id") return failed({ kind: "not_found", entity: "event" });
      log.warn("[bot]", "Unknown callback token", { token: parsed.token, userId: user.id });
      return alert("This button is no longer available");
    }
    return this.onAction(user, parsed.action);
  }

  async onAction(user: UserRecord, action: BotAction): Promise<HandlerResult> {
    switch (action.kind) {
      case "menu":
        return reply({ text: "🏠 Main menu", keyboard: buildMainMenu(user) });
      case "events_menu":
        return reply({ text: "📅 <b>Events</b>\n\nWhat would you like to see?", keyboard: buildEventsMenuKeyboard(user.city) });
      case "all_events":
        return this.eventList(await this.core.catalog.listVisibleUpcoming(), "📅 Upcoming events:", "browse");
      case "city_events":
        return this.eventList(
          await this.core.catalog.listVisibleUpcoming(action.city),
          `📅 Upcoming events in ${cityLabel(action.city)}:`,
          "browse",
        );
      case "my_events":
        return this.eventList(await this.core.catalog.listRegisteredBy(user), "📋 Events you are registered for:", "browse");
      case "choose_city":
        return reply({ text: "🏙️ Choose your city:", keyboard: buildCitiesKeyboard() });
      case "set_city": {
        const updated = await this.core.setCity(user, action.city);
        return {
          replies: [{ text: `✅ City set to ${cityLabel(action.city)}`, keyboard: buildEventsMenuKeyboard(updated.city) }],
          notice: "City updated",
        };
      }
      case "profile": {
        const stats = await this.core.catalog.profileStats(user);
        return reply({ text: formatProfileHtml(user, stats), keyboard: buildProfileKeyboard() });
      }
      case "donate":
      case "questions":
        return reply({ text: COMING_SOON, keyboard: buildBackKeyboard() });
      case "admin_panel":
        if (!hasStaffAccess(user)) return failed({ kind: "forbidden" });
        return reply({ text: formatAdminPanelHtml(user.role), keyboard: buildAdminPanelKeyboard(user) });
      case "manage_events":
        if (!hasStaffAccess(user)) return failed({ kind: "forbidden" });
        return reply({ text: "📝 <b>Event management</b>", keyboard: buildEventManagementKeyboard() });
      case "my_created_events":
        return this.eventList(await this.core.catalog.listCreatedBy(user), "📋 Events you created:", "manage");
      case "all_events_manage":
        if (!hasStaffAccess(user)) return failed({ kind: "forbidden" });
        return this.eventList(await this.core.catalog.listAllForStaff(user), "📊 All events:", "manage");
      case "broadcast_menu":
        if (!hasStaffAccess(user)) return failed({ kind: "forbidden" });
        return reply({ text: "📢 <b>Broadcast</b>\n\nWho should receive the message?", keyboard: buildBroadcastKeyboard() });
      case "manage_roles": {
        if (!hasAdminAccess(user)) return failed({ kind: "forbidden" });
        const { admins, moderators } = await this.core.listStaff();
        return reply({ text: formatStaffHtml(admins, moderators), keyboard: buildRolesKeyboard() });
      }
      case "create_event":
        return reply(await this.engine.start(user, { wizard: "create_event" }));
      case "broadcast_target":
        return reply(await this.engine.start(user, { wizard: "broadcast", target: action.target }));
      case "role_action":
        return reply(await this.engine.start(user, { wizard: "role_change", action: action.action }));
      case "cancel":
        return reply(await this.engine.cancel(user));
      case "wizard": {
        const stepped = await this.engine.handle(user, { kind: "choice", value: action.value });
        return stepped ? reply(stepped) : alert("This step has expired. Please start again.");
      }
      case "event":
        return this.onEvent(user, action.op, action.eventId);
    }
  }

  private eventList(events: EventRecord[], title: string, mode: EventListMode): HandlerResult {
    if (!events.length) {
      const back = mode === "manage" ? buildEventManagementKeyboard() : buildEventsMenuKeyboard();
      return reply({ text: "No events found 😔", keyboard: back });
    }
    return reply({ text: title, keyboard: buildEventListKeyboard(events, mode) });
  }

  // ==========================================================================
  // Event buttons
  // ==========================================================================

  private async onEvent(user: UserRecord, op: EventOp, eventId: number): Promise<HandlerResult> {
    switch (op) {
      case "show":
        return this.showEvent(user, eventId);
      case "register": {
        const result = await this.core.registrations.register(user, eventId);
        if (!result.ok) return failed(result.failure);
        return { ...(await this.showEvent(user, eventId)), notice: "✅ You are registered!" };
      }
      case "unregister": {
        const result = await this.core.registrations.unregister(user, eventId);
        if (!result.ok) return failed(result.failure);
        return { ...(await this.showEvent(user, eventId)), notice: "Registration cancelled" };
      }
      case "manage":
      case "cancel_delete":
        return this.manageView(user, eventId);
      case "edit":
        return reply(await this.engine.start(user, { wizard: "edit_event", eventId }));
      case "participants": {
        const found = await this.core.findManagedEvent(user, eventId);
        if (!found.ok) return failed(found.failure);
        const participants = await this.core.catalog.listParticipants(eventId);
        return reply({
          text: formatParticipantsHtml(found.value, participants),
          keyboard: buildBackKeyboard({ kind: "event", op: "manage", eventId }),
        });
      }
      case "toggle_visibility": {
        const result = await this.core.registrations.toggleVisible(user, eventId);
        if (!result.ok) return failed(result.failure);
        return { ...(await this.manageView(user, eventId)), notice: result.value.isVisible ? "Event is visible" : "Event is hidden" };
      }
      case "toggle_registration": {
        const result = await this.core.registrations.toggleRegistrationOpen(user, eventId);
        if (!result.ok) return failed(result.failure);
        return {
          ...(await this.manageView(user, eventId)),
          notice: result.value.registrationOpen ? "Registration opened" : "Registration closed",
        };
      }
      case "delete": {
        const found = await this.core.findManagedEvent(user, eventId);
        if (!found.ok) return failed(found.failure);
        return reply({ text: formatDeleteConfirmHtml(found.value), keyboard: buildDeleteConfirmKeyboard(eventId) });
      }
      case "confirm_delete": {
        const result = await this.core.registrations.deleteEvent(user, eventId);
        if (!result.ok) return failed(result.failure);
        const { event, registrationsRemoved } = result.value;
        return {
          replies: [{
            text: `🗑️ Event <b>${escapeHtml(event.title)}</b> deleted. Registrations removed: ${registrationsRemoved}`,
            keyboard: buildEventManagementKeyboard(),
          }],
          notice: "Event deleted",
        };
      }
    }
  }

  /** Hidden events are only shown to the people who may manage them */
  private async showEvent(user: UserRecord, eventId: number): Promise<HandlerResult> {
    const details = await this.core.catalog.getEventDetails(eventId, user);
    if (!details || (!details.event.isVisible && !details.canManage)) {
      return failed({ kind: "not_found", entity: "event" });
    }
    return reply({
      text: formatEventCardHtml(details),
      keyboard: buildEventActionsKeyboard(details),
      media: details.event.media,
    });
  }

  private async manageView(user: UserRecord, eventId: number): Promise<HandlerResult> {
    const found = await this.core.findManagedEvent(user, eventId);
    if (!found.ok) return failed(found.failure);
    const details = await this.core.catalog.getEventDetails(eventId, user);
    if (!details) return failed({ kind: "not_found", entity: "event" });
    return reply({ text: formatManageEventHtml(details), keyboard: buildManageEventKeyboard(details.event) });
  }
}
