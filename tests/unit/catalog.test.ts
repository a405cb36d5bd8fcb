import { describe, it, expect, beforeEach } from "vitest";
import { NOW, addEvent, addUser, hoursFrom, setup, type Harness } from "./fixtures.js";
import type { UserRecord } from "../../src/core/types.js";
import { LocalStore } from "../../src/store/local.js";
import { StoreError } from "../../src/core/errors.js";

describe("EventCatalog", () => {
  let h: Harness;
  let staff: UserRecord;

  beforeEach(async () => {
    h = setup();
    staff = await addUser(h.core, 1, "admin");
  });

  describe("listVisibleUpcoming", () => {
    it("returns visible future events, earliest first", async () => {
      const later = await addEvent(h.core, staff, { title: "Later", dateTime: hoursFrom(NOW, 72) });
      const sooner = await addEvent(h.core, staff, { title: "Sooner", dateTime: hoursFrom(NOW, 5) });
      await addEvent(h.core, staff, { title: "Past", dateTime: hoursFrom(NOW, -5) });
      const hidden = await addEvent(h.core, staff, { title: "Hidden" });
      await h.store.toggleEventFlag(hidden.id, "isVisible", NOW);

      const events = await h.core.catalog.listVisibleUpcoming();
      expect(events.map((e) => e.id)).toEqual([sooner.id, later.id]);
    });

    it("filters by city", async () => {
      await addEvent(h.core, staff, { city: "moscow" });
      const kazan = await addEvent(h.core, staff, { city: "kazan" });
      const events = await h.core.catalog.listVisibleUpcoming("kazan");
      expect(events.map((e) => e.id)).toEqual([kazan.id]);
    });
  });

  describe("nextUpcomingForUser", () => {
    it("returns the earlier of two events in the user's city", async () => {
      const user = await addUser(h.core, 2, "user", "kazan");
      await addEvent(h.core, staff, { city: "moscow", dateTime: hoursFrom(NOW, 2) });
      await addEvent(h.core, staff, { city: "kazan", dateTime: hoursFrom(NOW, 30) });
      const earliestLocal = await addEvent(h.core, staff, { city: "kazan", dateTime: hoursFrom(NOW, 10) });

      expect((await h.core.catalog.nextUpcomingForUser(user))?.id).toBe(earliestLocal.id);
    });

    it("falls back to another city when the user's city has nothing upcoming", async () => {
      const user = await addUser(h.core, 2, "user", "kazan");
      const moscow = await addEvent(h.core, staff, { city: "moscow" });

      expect((await h.core.catalog.nextUpcomingForUser(user))?.id).toBe(moscow.id);
    });

    it("returns nothing when no events qualify", async () => {
      const user = await addUser(h.core, 2, "user", "kazan");
      await addEvent(h.core, staff, { dateTime: hoursFrom(NOW, -1) });

      expect(await h.core.catalog.nextUpcomingForUser(user)).toBeNull();
    });
  });

  describe("per-user lists", () => {
    it("lists events a user created and upcoming events they joined", async () => {
      const guest = await addUser(h.core, 2);
      const mine = await addEvent(h.core, staff);
      const joined = await addEvent(h.core, guest, { title: "Guest event", dateTime: hoursFrom(NOW, 3) });
      await h.core.registrations.register(guest, mine.id);

      expect((await h.core.catalog.listCreatedBy(guest)).map((e) => e.id)).toEqual([joined.id]);
      expect((await h.core.catalog.listRegisteredBy(guest)).map((e) => e.id)).toEqual([mine.id]);
    });

    it("shows every event to staff and nothing to plain users", async () => {
      const guest = await addUser(h.core, 2);
      await addEvent(h.core, staff, { dateTime: hoursFrom(NOW, -10) });
      await addEvent(h.core, staff);

      expect(await h.core.catalog.listAllForStaff(staff)).toHaveLength(2);
      expect(await h.core.catalog.listAllForStaff(guest)).toEqual([]);
    });

    it("counts profile statistics", async () => {
      const guest = await addUser(h.core, 2);
      const upcoming = await addEvent(h.core, staff);
      await h.core.registrations.register(guest, upcoming.id);

      expect(await h.core.catalog.profileStats(guest)).toEqual({ created: 0, registrations: 1, upcoming: 1 });
      expect(await h.core.catalog.profileStats(staff)).toEqual({ created: 1, registrations: 0, upcoming: 0 });
    });
  });

  describe("getEventDetails", () => {
    it("reports participant count and the viewer's registration", async () => {
      const guest = await addUser(h.core, 2);
      const event = await addEvent(h.core, staff, { maxParticipants: 5 });
      await h.core.registrations.register(guest, event.id);

      expect(await h.core.catalog.getEventDetails(event.id, guest)).toEqual({
        event,
        participantCount: 1,
        isRegistered: true,
        canManage: false,
      });
    });

    it("returns null for a missing event", async () => {
      expect(await h.core.catalog.getEventDetails(404, staff)).toBeNull();
    });
  });

  it("degrades to an empty list when the store read fails", async () => {
    class FailingStore extends LocalStore {
      override async listEvents(): Promise<never> {
        throw new StoreError("listEvents", "connection refused");
      }
    }
    const broken = setup(new FailingStore());
    expect(await broken.core.catalog.listVisibleUpcoming()).toEqual([]);
  });
});
