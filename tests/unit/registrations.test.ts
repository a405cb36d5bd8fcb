import { describe, it, expect, beforeEach } from "vitest";
import { NOW, addEvent, addUser, hoursFrom, setup, type Harness } from "./fixtures.js";
import type { UserRecord } from "../../src/core/types.js";

describe("RegistrationManager", () => {
  let h: Harness;
  let staff: UserRecord;
  let guest: UserRecord;

  beforeEach(async () => {
    h = setup();
    staff = await addUser(h.core, 1, "moderator");
    guest = await addUser(h.core, 2);
  });

  describe("register", () => {
    it("stores a registration for an open upcoming event", async () => {
      const event = await addEvent(h.core, staff);
      const result = await h.core.registrations.register(guest, event.id);
      expect(result.ok).toBe(true);
      expect(await h.store.countRegistrations(event.id)).toBe(1);
    });

    it("rejects a second registration by the same user", async () => {
      const event = await addEvent(h.core, staff);
      await h.core.registrations.register(guest, event.id);
      const second = await h.core.registrations.register(guest, event.id);
      expect(second).toEqual({ ok: false, failure: { kind: "conflict", reason: "already_registered" } });
      expect(await h.store.countRegistrations(event.id)).toBe(1);
    });

    it("checks preconditions in order", async () => {
      expect(await h.core.registrations.register(guest, 999)).toEqual({
        ok: false,
        failure: { kind: "not_found", entity: "event" },
      });

      // Closed and past: closed wins
      const closedPast = await addEvent(h.core, staff, { dateTime: hoursFrom(NOW, -2) });
      await h.store.toggleEventFlag(closedPast.id, "registrationOpen", NOW);
      expect(await h.core.registrations.register(guest, closedPast.id)).toEqual({
        ok: false,
        failure: { kind: "conflict", reason: "registration_closed" },
      });

      const past = await addEvent(h.core, staff, { dateTime: hoursFrom(NOW, -2) });
      expect(await h.core.registrations.register(guest, past.id)).toEqual({
        ok: false,
        failure: { kind: "conflict", reason: "event_past" },
      });
    });

    it("rejects registrations once the event is full", async () => {
      const event = await addEvent(h.core, staff, { maxParticipants: 1 });
      const other = await addUser(h.core, 3);
      await h.core.registrations.register(other, event.id);
      expect(await h.core.registrations.register(guest, event.id)).toEqual({
        ok: false,
        failure: { kind: "conflict", reason: "event_full" },
      });
    });

    it("never stores more than max_participants under concurrent attempts", async () => {
      const event = await addEvent(h.core, staff, { maxParticipants: 3 });
      const users = await Promise.all(Array.from({ length: 10 }, (_, i) => addUser(h.core, 100 + i)));

      const results = await Promise.all(users.map((u) => h.core.registrations.register(u, event.id)));

      expect(results.filter((r) => r.ok)).toHaveLength(3);
      expect(await h.store.countRegistrations(event.id)).toBe(3);
      for (const rejected of results.filter((r) => !r.ok)) {
        expect(rejected).toEqual({ ok: false, failure: { kind: "conflict", reason: "event_full" } });
      }
    });
  });

  describe("unregister", () => {
    it("removes an existing registration", async () => {
      const event = await addEvent(h.core, staff);
      await h.core.registrations.register(guest, event.id);
      expect(await h.core.registrations.unregister(guest, event.id)).toEqual({ ok: true, value: true });
      expect(await h.store.countRegistrations(event.id)).toBe(0);
    });

    it("reports not_registered when there is nothing to remove", async () => {
      const event = await addEvent(h.core, staff);
      expect(await h.core.registrations.unregister(guest, event.id)).toEqual({
        ok: false,
        failure: { kind: "conflict", reason: "not_registered" },
      });
    });

    it("allows registering again afterwards", async () => {
      const event = await addEvent(h.core, staff);
      await h.core.registrations.register(guest, event.id);
      await h.core.registrations.unregister(guest, event.id);
      expect((await h.core.registrations.register(guest, event.id)).ok).toBe(true);
    });
  });

  describe("flag toggles", () => {
    it("returns a flag to its original value after two toggles and bumps updated_at each time", async () => {
      const event = await addEvent(h.core, staff);
      const t1 = hoursFrom(NOW, 1);
      const t2 = hoursFrom(NOW, 2);

      h.setNow(t1);
      const first = await h.core.registrations.toggleVisible(staff, event.id);
      h.setNow(t2);
      const second = await h.core.registrations.toggleVisible(staff, event.id);

      if (!first.ok || !second.ok) throw new Error("toggle failed");
      expect(first.value.isVisible).toBe(false);
      expect(first.value.updatedAt).toEqual(t1);
      expect(second.value.isVisible).toBe(true);
      expect(second.value.updatedAt).toEqual(t2);
    });

    it("toggles registration_open independently of visibility", async () => {
      const event = await addEvent(h.core, staff);
      const result = await h.core.registrations.toggleRegistrationOpen(staff, event.id);
      if (!result.ok) throw new Error("toggle failed");
      expect(result.value.registrationOpen).toBe(false);
      expect(result.value.isVisible).toBe(true);
    });

    it("only flips when the requested value differs", async () => {
      const event = await addEvent(h.core, staff);
      const unchanged = await h.core.registrations.setVisible(staff, event.id, true);
      if (!unchanged.ok) throw new Error("set failed");
      expect(unchanged.value.isVisible).toBe(true);
      expect(unchanged.value.updatedAt).toEqual(event.updatedAt);

      const hidden = await h.core.registrations.setRegistrationOpen(staff, event.id, false);
      if (!hidden.ok) throw new Error("set failed");
      expect(hidden.value.registrationOpen).toBe(false);
    });

    it("forbids users who neither created the event nor are staff", async () => {
      const event = await addEvent(h.core, staff);
      expect(await h.core.registrations.toggleVisible(guest, event.id)).toEqual({
        ok: false,
        failure: { kind: "forbidden" },
      });
    });
  });

  describe("deleteEvent", () => {
    it("removes the event and exactly its registrations", async () => {
      const doomed = await addEvent(h.core, staff, { title: "Doomed" });
      const kept = await addEvent(h.core, staff, { title: "Kept" });
      const others = await Promise.all([3, 4, 5].map((id) => addUser(h.core, id)));
      for (const u of others) await h.core.registrations.register(u, doomed.id);
      await h.core.registrations.register(guest, kept.id);

      const result = await h.core.registrations.deleteEvent(staff, doomed.id);

      if (!result.ok) throw new Error("delete failed");
      expect(result.value.registrationsRemoved).toBe(3);
      expect(await h.store.findEvent(doomed.id)).toBeNull();
      expect(await h.store.countRegistrations(doomed.id)).toBe(0);
      expect(await h.store.findEvent(kept.id)).not.toBeNull();
      expect(await h.store.countRegistrations(kept.id)).toBe(1);
    });

    it("is refused for plain users", async () => {
      const event = await addEvent(h.core, staff);
      expect(await h.core.registrations.deleteEvent(guest, event.id)).toEqual({
        ok: false,
        failure: { kind: "forbidden" },
      });
    });
  });
});
