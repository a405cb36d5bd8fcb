/**
 * Wizard Engine
 *
 * Routes input to the active wizard for a user and persists the next state.
 * Privileges are checked again on every step, so a role revoked mid-wizard
 * ends the wizard on the next message.
 */

import type { BroadcastTarget, RoleAction, UserRecord } from "../core/types.js";
import type { EventDeskCore } from "../core/eventdesk.js";
import { failureNotice, forbidden, ok, type Outcome } from "../core/errors.js";
import { hasAdminAccess, hasStaffAccess } from "../core/roles.js";
import type { BroadcastDispatcher, SendFn } from "../services/broadcast.js";
import { buildMainMenu, type Reply } from "../telegram/cards.js";
import type { SessionStore, WizardState } from "./session-store.js";
import type { StepContext, StepResult, WizardInput } from "./types.js";
import { startCreateEvent, stepCreateEvent } from "./create-event.js";
import { startEditEvent, stepEditEvent } from "./edit-event.js";
import { startRoleChange, stepRoleChange } from "./role-change.js";
import { startBroadcast, stepBroadcast } from "./broadcast.js";
import { log, extractError } from "../utils/logger.js";

export type WizardStart =
  | { wizard: "create_event" }
  | { wizard: "edit_event"; eventId: number }
  | { wizard: "role_change"; action: RoleAction }
  | { wizard: "broadcast"; target: BroadcastTarget };

export const GENERIC_FAILURE = "Something went wrong. Please try again.";

export interface WizardEngineDeps {
  core: EventDeskCore;
  sessions: SessionStore;
  dispatcher: BroadcastDispatcher;
  send: SendFn;
}

export class WizardEngine {
  constructor(private readonly deps: WizardEngineDeps) {}

  async isActive(user: UserRecord): Promise<boolean> {
    return (await this.deps.sessions.get(user.telegramId)) !== null;
  }

  /** Begin a wizard, replacing any unfinished one */
  async start(user: UserRecord, start: WizardStart): Promise<Reply> {
    const result = await this.open(user, start);
    if (!result.ok) {
      await this.deps.sessions.clear(user.telegramId);
      return { text: `❌ ${failureNotice(result.failure)}` };
    }
    return this.persist(user, result.value);
  }

  /**
   * Feed input to the active wizard; null when the user has none. The session
   * is taken out of the store while the step runs and written back only if
   * the wizard continues.
   */
  async handle(user: UserRecord, input: WizardInput): Promise<Reply | null> {
    const state = await this.deps.sessions.take(user.telegramId);
    if (!state) return null;

    const allowed = await this.authorize(user, state);
    if (!allowed.ok) {
      log.info("[wizard]", "Wizard ended, access lost", { userId: user.id, wizard: state.wizard });
      return { text: `❌ ${failureNotice(allowed.failure)}` };
    }

    let result: StepResult;
    try {
      result = await this.step(this.context(user), state, input);
    } catch (err) {
      log.error("[wizard]", "Step failed", {
        userId: user.id,
        wizard: state.wizard,
        step: state.step,
        error: extractError(err),
      });
      return { text: GENERIC_FAILURE };
    }
    return this.persist(user, result);
  }

  /** Drop the active wizard, if any, and go back to the main menu */
  async cancel(user: UserRecord): Promise<Reply> {
    await this.deps.sessions.clear(user.telegramId);
    return { text: "❌ Action cancelled", keyboard: buildMainMenu(user) };
  }

  private context(user: UserRecord): StepContext {
    return { user, core: this.deps.core, dispatcher: this.deps.dispatcher, send: this.deps.send };
  }

  private async persist(user: UserRecord, result: StepResult): Promise<Reply> {
    if (result.next) {
      await this.deps.sessions.set(user.telegramId, result.next);
    } else {
      await this.deps.sessions.clear(user.telegramId);
    }
    return result.reply;
  }

  private async open(user: UserRecord, start: WizardStart): Promise<Outcome<StepResult>> {
    switch (start.wizard) {
      case "create_event":
        return hasStaffAccess(user) ? ok(startCreateEvent()) : forbidden();
      case "broadcast":
        return hasStaffAccess(user) ? ok(startBroadcast(start.target)) : forbidden();
      case "role_change":
        return hasAdminAccess(user) ? ok(startRoleChange(start.action)) : forbidden();
      case "edit_event": {
        const event = await this.deps.core.findManagedEvent(user, start.eventId);
        return event.ok ? ok(startEditEvent(event.value)) : event;
      }
    }
  }

  private async authorize(user: UserRecord, state: WizardState): Promise<Outcome<true>> {
    switch (state.wizard) {
      case "create_event":
      case "broadcast":
        return hasStaffAccess(user) ? ok(true) : forbidden();
      case "role_change":
        return hasAdminAccess(user) ? ok(true) : forbidden();
      case "edit_event": {
        const event = await this.deps.core.findManagedEvent(user, state.eventId);
        return event.ok ? ok(true) : event;
      }
    }
  }

  private step(ctx: StepContext, state: WizardState, input: WizardInput): Promise<StepResult> {
    switch (state.wizard) {
      case "create_event":
        return stepCreateEvent(ctx, state, input);
      case "edit_event":
        return stepEditEvent(ctx, state, input);
      case "role_change":
        return stepRoleChange(ctx, state, input);
      case "broadcast":
        return stepBroadcast(ctx, state, input);
    }
  }
}
