import { describe, it, expect } from "vitest";
import { buildEventActionsKeyboard } from "../../src/telegram/cards.js";
import type { EventDetails, EventRecord } from "../../src/core/types.js";
import { NOW, hoursFrom } from "./fixtures.js";

const event: EventRecord = {
  id: 4,
  title: "Open mic",
  city: "moscow",
  dateTime: hoursFrom(NOW, 24),
  creatorId: 1,
  registrationRequired: true,
  registrationOpen: true,
  isVisible: true,
  reminderHours: 24,
  createdAt: NOW,
  updatedAt: NOW,
};

function labels(details: Partial<EventDetails> & { event: EventRecord }): string[] {
  const kb = buildEventActionsKeyboard({ participantCount: 0, isRegistered: false, canManage: false, ...details });
  return kb.inline_keyboard.flat().map((b) => b.text);
}

describe("buildEventActionsKeyboard", () => {
  it("offers registration on an open event", () => {
    expect(labels({ event })).toEqual(["✅ Register", "🔙 Back"]);
  });

  it("hides the register button once registration is closed", () => {
    expect(labels({ event: { ...event, registrationOpen: false } })).toEqual(["🔙 Back"]);
  });

  it("hides it on events without registration", () => {
    expect(labels({ event: { ...event, registrationRequired: false } })).toEqual(["🔙 Back"]);
  });

  it("still lets a registered user unregister from a closed event", () => {
    expect(labels({ event: { ...event, registrationOpen: false }, isRegistered: true, canManage: true }))
      .toEqual(["❌ Unregister", "⚙️ Manage", "🔙 Back"]);
  });
});
