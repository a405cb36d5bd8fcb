/**
 * Shared test setup: an in-memory LocalStore behind a core with a pinned clock.
 */
import { LocalStore } from "../../src/store/local.js";
import { EventDeskCore } from "../../src/core/eventdesk.js";
import type { CityCode, EventRecord, NewEvent, Role, UserRecord } from "../../src/core/types.js";

/** 25.12.2024 17:30 local time */
export const NOW = new Date(2024, 11, 25, 17, 30);

export const BOOTSTRAP_ADMIN_ID = 1000;

export function hoursFrom(base: Date, hours: number): Date {
  return new Date(base.getTime() + hours * 60 * 60 * 1000);
}

export interface Harness {
  store: LocalStore;
  core: EventDeskCore;
  setNow(date: Date): void;
}

export function setup(store: LocalStore = new LocalStore(), now: Date = NOW): Harness {
  let current = now;
  const core = new EventDeskCore(store, { bootstrapAdminId: BOOTSTRAP_ADMIN_ID }, () => current);
  return {
    store,
    core,
    setNow(date: Date) {
      current = date;
    },
  };
}

export async function addUser(
  core: EventDeskCore,
  telegramId: number,
  role: Role = "user",
  city?: CityCode,
): Promise<UserRecord> {
  let user = await core.ensureUser({ telegramId, firstName: `User${telegramId}` });
  if (user.role !== role) {
    user = (await core.store.setUserRole(user.id, role)) ?? user;
  }
  if (city) user = await core.setCity(user, city);
  return user;
}

export async function addEvent(
  core: EventDeskCore,
  creator: UserRecord,
  overrides: Partial<NewEvent> = {},
): Promise<EventRecord> {
  return core.store.createEvent(
    {
      title: "Board games night",
      city: "moscow",
      dateTime: hoursFrom(NOW, 48),
      creatorId: creator.id,
      registrationRequired: true,
      ...overrides,
    },
    core.clock(),
  );
}
