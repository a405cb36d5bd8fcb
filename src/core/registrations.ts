/**
 * Registration Manager
 *
 * All writes that touch event capacity or event flags go through here.
 * Preconditions are checked in a fixed order and the first violation wins;
 * the store's reserveSeat repeats the duplicate and capacity checks atomically
 * with the insert.
 */

import type { Clock, EventFlag, EventRecord, RegistrationRecord, UserRecord } from "./types.js";
import type { EventStore } from "../store/types.js";
import { canManageEvent } from "./roles.js";
import { conflict, forbidden, notFound, ok, type Outcome } from "./errors.js";
import { log } from "../utils/logger.js";

export class RegistrationManager {
  constructor(
    private readonly store: EventStore,
    private readonly clock: Clock,
  ) {}

  async register(user: UserRecord, eventId: number): Promise<Outcome<RegistrationRecord>> {
    const now = this.clock();
    const event = await this.store.findEvent(eventId);
    if (!event) return notFound("event");
    if (!event.registrationOpen) return conflict("registration_closed");
    if (event.dateTime.getTime() <= now.getTime()) return conflict("event_past");
    if (await this.store.findRegistration(user.id, eventId)) return conflict("already_registered");
    if (event.maxParticipants !== undefined) {
      const taken = await this.store.countRegistrations(eventId);
      if (taken >= event.maxParticipants) return conflict("event_full");
    }

    // The reads above may be stale by now; reserveSeat is authoritative
    const result = await this.store.reserveSeat(user.id, eventId, now);
    switch (result.status) {
      case "reserved":
        log.info("[registrations]", "Registered", { userId: user.id, eventId });
        return ok(result.registration);
      case "missing":
        return notFound("event");
      case "closed":
        return conflict("registration_closed");
      case "past":
        return conflict("event_past");
      case "duplicate":
        return conflict("already_registered");
      case "full":
        return conflict("event_full");
    }
  }

  async unregister(user: UserRecord, eventId: number): Promise<Outcome<true>> {
    const removed = await this.store.deleteRegistration(user.id, eventId);
    if (!removed) return conflict("not_registered");
    log.info("[registrations]", "Unregistered", { userId: user.id, eventId });
    return ok(true);
  }

  /** Flip is_visible; owner or staff only */
  async toggleVisible(actor: UserRecord, eventId: number): Promise<Outcome<EventRecord>> {
    return this.toggle(actor, eventId, "isVisible");
  }

  /** Flip registration_open; owner or staff only */
  async toggleRegistrationOpen(actor: UserRecord, eventId: number): Promise<Outcome<EventRecord>> {
    return this.toggle(actor, eventId, "registrationOpen");
  }

  /** Set a flag to a given value, flipping only when it differs */
  async setVisible(actor: UserRecord, eventId: number, value: boolean): Promise<Outcome<EventRecord>> {
    return this.setFlag(actor, eventId, "isVisible", value);
  }

  async setRegistrationOpen(actor: UserRecord, eventId: number, value: boolean): Promise<Outcome<EventRecord>> {
    return this.setFlag(actor, eventId, "registrationOpen", value);
  }

  /** Remove an event together with its registrations */
  async deleteEvent(actor: UserRecord, eventId: number): Promise<Outcome<{ event: EventRecord; registrationsRemoved: number }>> {
    const event = await this.store.findEvent(eventId);
    if (!event) return notFound("event");
    if (!canManageEvent(actor, event)) return forbidden();

    const removed = await this.store.deleteEvent(eventId);
    if (!removed) return notFound("event");
    log.info("[registrations]", "Event deleted", {
      eventId,
      actorId: actor.id,
      registrationsRemoved: removed.registrationsRemoved,
    });
    return ok({ event, registrationsRemoved: removed.registrationsRemoved });
  }

  private async toggle(actor: UserRecord, eventId: number, flag: EventFlag): Promise<Outcome<EventRecord>> {
    const event = await this.store.findEvent(eventId);
    if (!event) return notFound("event");
    if (!canManageEvent(actor, event)) return forbidden();

    const updated = await this.store.toggleEventFlag(eventId, flag, this.clock());
    if (!updated) return notFound("event");
    log.info("[registrations]", `Toggled ${flag}`, { eventId, value: updated[flag] });
    return ok(updated);
  }

  private async setFlag(actor: UserRecord, eventId: number, flag: EventFlag, value: boolean): Promise<Outcome<EventRecord>> {
    const event = await this.store.findEvent(eventId);
    if (!event) return notFound("event");
    if (!canManageEvent(actor, event)) return forbidden();
    if (event[flag] === value) return ok(event);
    return this.toggle(actor, eventId, flag);
  }
}
