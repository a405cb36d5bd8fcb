/**
 * Event Catalog
 *
 * Read-only queries over events. Nothing here writes; a failing store read
 * is logged and degrades to an empty result.
 */

import type { Clock, CityCode, EventDetails, EventRecord, ProfileStats, UserRecord } from "./types.js";
import type { EventStore } from "../store/types.js";
import { canManageEvent, hasStaffAccess } from "./roles.js";
import { log, extractError } from "../utils/logger.js";

export class EventCatalog {
  constructor(
    private readonly store: EventStore,
    private readonly clock: Clock,
  ) {}

  /** Visible events after now, earliest first */
  async listVisibleUpcoming(city?: CityCode): Promise<EventRecord[]> {
    return this.safely("listVisibleUpcoming", [], () =>
      this.store.listEvents({ visibleOnly: true, after: this.clock(), city }));
  }

  /**
   * Earliest visible upcoming event in the user's city, falling back to the
   * earliest one anywhere.
   */
  async nextUpcomingForUser(user: Pick<UserRecord, "city"> | null): Promise<EventRecord | null> {
    if (user?.city) {
      const local = await this.listVisibleUpcoming(user.city);
      if (local.length) return local[0];
    }
    const all = await this.listVisibleUpcoming();
    return all[0] ?? null;
  }

  async listCreatedBy(user: UserRecord): Promise<EventRecord[]> {
    return this.safely("listCreatedBy", [], () => this.store.listEvents({ creatorId: user.id }));
  }

  /** Upcoming events the user is registered for */
  async listRegisteredBy(user: UserRecord): Promise<EventRecord[]> {
    return this.safely("listRegisteredBy", [], () =>
      this.store.listEventsRegisteredBy(user.id, this.clock()));
  }

  /** Every event, hidden and past included; staff only */
  async listAllForStaff(user: UserRecord): Promise<EventRecord[]> {
    if (!hasStaffAccess(user)) return [];
    return this.safely("listAllForStaff", [], () => this.store.listEvents({}));
  }

  async getEventDetails(eventId: number, viewer: UserRecord | null): Promise<EventDetails | null> {
    const event = await this.store.findEvent(eventId);
    if (!event) return null;

    const [participantCount, registration] = await Promise.all([
      this.store.countRegistrations(eventId),
      viewer ? this.store.findRegistration(viewer.id, eventId) : Promise.resolve(null),
    ]);

    return {
      event,
      participantCount,
      isRegistered: registration !== null,
      canManage: canManageEvent(viewer, event),
    };
  }

  async listParticipants(eventId: number): Promise<UserRecord[]> {
    return this.safely("listParticipants", [], () => this.store.listParticipants(eventId));
  }

  async profileStats(user: UserRecord): Promise<ProfileStats> {
    const empty: ProfileStats = { created: 0, registrations: 0, upcoming: 0 };
    return this.safely("profileStats", empty, async () => {
      const [created, registrations, upcoming] = await Promise.all([
        this.store.listEvents({ creatorId: user.id }),
        this.store.countRegistrationsByUser(user.id),
        this.store.listEventsRegisteredBy(user.id, this.clock()),
      ]);
      return { created: created.length, registrations, upcoming: upcoming.length };
    });
  }

  private async safely<T>(op: string, fallback: T, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (err) {
      log.warn("[catalog]", `${op} failed, returning empty result`, { error: extractError(err) });
      return fallback;
    }
  }
}
