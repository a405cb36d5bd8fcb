import { describe, it, expect, beforeEach } from "vitest";
import { NOW, addEvent, addUser, hoursFrom, setup, type Harness } from "./fixtures.js";
import { BroadcastDispatcher } from "../../src/services/broadcast.js";
import { MemorySessionStore } from "../../src/wizard/session-store.js";
import { WizardEngine } from "../../src/wizard/engine.js";
import { BotHandlers } from "../../src/telegram/handlers.js";
import { parseAction } from "../../src/telegram/actions.js";
import { MENU } from "../../src/telegram/cards.js";
import type { UserRecord } from "../../src/core/types.js";

describe("BotHandlers", () => {
  let h: Harness;
  let handlers: BotHandlers;
  let staff: UserRecord;
  let guest: UserRecord;

  beforeEach(async () => {
    h = setup();
    const engine = new WizardEngine({
      core: h.core,
      sessions: new MemorySessionStore(30),
      dispatcher: new BroadcastDispatcher(h.store, { batchSize: 30, pauseMs: 0 }, async () => {}),
      send: async () => {},
    });
    handlers = new BotHandlers(h.core, engine);
    staff = await addUser(h.core, 1, "moderator");
    guest = await addUser(h.core, 2, "user", "kazan");
  });

  it("greets on /start with the next event in the user's city", async () => {
    await addEvent(h.core, staff, { title: "Moscow talk", city: "moscow", dateTime: hoursFrom(NOW, 3) });
    await addEvent(h.core, staff, { title: "Kazan talk", city: "kazan" });

    const result = await handlers.onCommand(guest, "start");

    expect(result.replies).toHaveLength(2);
    expect(result.replies[0].text).toContain("Welcome, <b>User2</b>!");
    expect(result.replies[1].text).toContain("<b>Kazan talk</b>");
  });

  it("says so when there is no upcoming event", async () => {
    const result = await handlers.onCommand(guest, "start");
    expect(result.replies[1].text).toBe("There are no upcoming events yet 😔\nCheck back soon!");
  });

  it("registers from the event card button", async () => {
    const event = await addEvent(h.core, staff);

    const result = await handlers.onCallback(guest, parseAction(`register_${event.id}`));

    expect(result.notice).toBe("✅ You are registered!");
    expect(result.replies[0].text).toContain("🎟 You are registered");
    expect(await h.store.countRegistrations(event.id)).toBe(1);
  });

  it("shows a conflict as an alert", async () => {
    const event = await addEvent(h.core, staff);
    await handlers.onCallback(guest, parseAction(`register_${event.id}`));

    const second = await handlers.onCallback(guest, parseAction(`register_${event.id}`));

    expect(second).toEqual({ replies: [], notice: "You are already registered for this event", alert: true });
  });

  it("treats a malformed id as a missing event", async () => {
    const result = await handlers.onCallback(guest, parseAction("event_12abc"));
    expect(result).toEqual({ replies: [], notice: "Event not found", alert: true });
  });

  it("answers unknown buttons with a notice", async () => {
    const result = await handlers.onCallback(guest, parseAction("launch_rocket"));
    expect(result).toEqual({ replies: [], notice: "This button is no longer available", alert: true });
  });

  it("hides invisible events from plain users but not from staff", async () => {
    const event = await addEvent(h.core, staff);
    await h.store.toggleEventFlag(event.id, "isVisible", NOW);

    expect((await handlers.onAction(guest, { kind: "event", op: "show", eventId: event.id })).notice).toBe("Event not found");
    expect((await handlers.onAction(staff, { kind: "event", op: "show", eventId: event.id })).replies).toHaveLength(1);
  });

  it("keeps the control panel away from plain users", async () => {
    const denied = await handlers.onCommand(guest, "admin");
    expect(denied.notice).toBe("You do not have access to this action");

    const panel = await handlers.onCommand(staff, "admin");
    expect(panel.replies[0].text).toBe("⚙️ <b>Control panel</b> (Moderator)");
  });

  it("routes main-menu text when no wizard is active", async () => {
    const result = await handlers.onInput(guest, { kind: "text", text: MENU.city });
    expect(result.replies[0].text).toBe("🏙️ Choose your city:");
  });

  it("sends plain text to the active wizard", async () => {
    await handlers.onAction(staff, { kind: "create_event" });
    const result = await handlers.onInput(staff, { kind: "text", text: "Chess club" });
    expect(result.replies[0].text).toContain("Enter the event description");
  });

  it("leaves the active wizard when a main-menu button is pressed", async () => {
    await handlers.onAction(staff, { kind: "create_event" });

    const result = await handlers.onInput(staff, { kind: "text", text: MENU.city });

    expect(result.replies[0].text).toBe("🏙️ Choose your city:");
    const after = await handlers.onInput(staff, { kind: "text", text: "Chess club" });
    expect(after.replies[0].text).toBe("Please use the menu below 👇");
  });

  it("stores the chosen city", async () => {
    await handlers.onAction(staff, { kind: "set_city", city: "moscow" });
    expect((await h.store.findUserById(staff.id))?.city).toBe("moscow");
  });

  it("answers donations with a coming-soon stub", async () => {
    const result = await handlers.onInput(guest, { kind: "text", text: MENU.donate });
    expect(result.replies[0].text).toBe("🚧 This feature is coming soon!");
  });

  it("deletes an event after confirmation and reports removed registrations", async () => {
    const event = await addEvent(h.core, staff, { title: "Gone" });
    await h.core.registrations.register(guest, event.id);

    const confirm = await handlers.onAction(staff, { kind: "event", op: "delete", eventId: event.id });
    expect(confirm.replies[0].text).toContain("Are you sure");

    const done = await handlers.onAction(staff, { kind: "event", op: "confirm_delete", eventId: event.id });
    expect(done.replies[0].text).toBe("🗑️ Event <b>Gone</b> deleted. Registrations removed: 1");
  });
});
