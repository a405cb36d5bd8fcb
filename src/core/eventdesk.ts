/**
 * EventDesk Core
 *
 * Transport-agnostic facade the bot, the wizards and the HTTP API talk to.
 * Owns the store and the clock and hands them to the catalog and the
 * registration manager.
 */

import type {
  Clock,
  CityCode,
  EventDeskConfig,
  EventPatch,
  EventRecord,
  NewEvent,
  PlatformProfile,
  Role,
  RoleAction,
  UserRecord,
} from "./types.js";
import type { EventStore } from "../store/types.js";
import { EventCatalog } from "./catalog.js";
import { RegistrationManager } from "./registrations.js";
import { canManageEvent, hasStaffAccess, initialRole, planRoleChange } from "./roles.js";
import { conflict, forbidden, notFound, ok, type Outcome } from "./errors.js";
import { log } from "../utils/logger.js";

export interface RoleChangeResult {
  user: UserRecord;
  previousRole: Role;
}

export class EventDeskCore {
  readonly catalog: EventCatalog;
  readonly registrations: RegistrationManager;

  constructor(
    readonly store: EventStore,
    private readonly config: Pick<EventDeskConfig, "bootstrapAdminId">,
    readonly clock: Clock = () => new Date(),
  ) {
    this.catalog = new EventCatalog(store, clock);
    this.registrations = new RegistrationManager(store, clock);
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  /**
   * Called on every inbound update. The bootstrap admin role only applies to
   * the insert; an existing row keeps whatever role it has.
   */
  async ensureUser(profile: PlatformProfile): Promise<UserRecord> {
    const role = initialRole(profile.telegramId, this.config.bootstrapAdminId);
    return this.store.upsertUser(profile, role);
  }

  async setCity(user: UserRecord, city: CityCode): Promise<UserRecord> {
    await this.store.setUserCity(user.id, city);
    return { ...user, city };
  }

  async listStaff(): Promise<{ admins: UserRecord[]; moderators: UserRecord[] }> {
    const [admins, moderators] = await Promise.all([
      this.store.listUsersByRole("admin"),
      this.store.listUsersByRole("moderator"),
    ]);
    return { admins, moderators };
  }

  /** Resolve the target and check the change is allowed, without writing */
  async previewRoleChange(actor: UserRecord, targetTelegramId: number, action: RoleAction): Promise<Outcome<{ target: UserRecord; role: Role }>> {
    const target = await this.store.findUserByTelegramId(targetTelegramId);
    if (!target) return notFound("user");
    const plan = planRoleChange(actor, target, action);
    if (!plan.ok) return plan;
    return ok({ target, role: plan.value });
  }

  async changeRole(actor: UserRecord, targetTelegramId: number, action: RoleAction): Promise<Outcome<RoleChangeResult>> {
    const preview = await this.previewRoleChange(actor, targetTelegramId, action);
    if (!preview.ok) return preview;

    const { target, role } = preview.value;
    const updated = await this.store.setUserRole(target.id, role);
    if (!updated) return notFound("user");
    log.info("[core]", "Role changed", { actorId: actor.id, targetId: target.id, from: target.role, to: role });
    return ok({ user: updated, previousRole: target.role });
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  async createEvent(actor: UserRecord, input: Omit<NewEvent, "creatorId">): Promise<Outcome<EventRecord>> {
    if (!hasStaffAccess(actor)) return forbidden();
    const event = await this.store.createEvent({ ...input, creatorId: actor.id }, this.clock());
    log.info("[core]", "Event created", { eventId: event.id, creatorId: actor.id, city: event.city });
    return ok(event);
  }

  /** Load an event the actor may manage */
  async findManagedEvent(actor: UserRecord, eventId: number): Promise<Outcome<EventRecord>> {
    const event = await this.store.findEvent(eventId);
    if (!event) return notFound("event");
    if (!canManageEvent(actor, event)) return forbidden();
    return ok(event);
  }

  async updateEventField(actor: UserRecord, eventId: number, patch: EventPatch): Promise<Outcome<EventRecord>> {
    const found = await this.findManagedEvent(actor, eventId);
    if (!found.ok) return found;

    if (patch.maxParticipants !== undefined) {
      const taken = await this.store.countRegistrations(eventId);
      if (taken > patch.maxParticipants) return conflict("capacity_below_registrations");
    }

    const updated = await this.store.updateEvent(eventId, patch, this.clock());
    if (!updated) return notFound("event");
    log.info("[core]", "Event updated", { eventId, fields: Object.keys(patch) });
    return ok(updated);
  }
}

