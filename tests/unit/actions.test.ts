import { describe, it, expect } from "vitest";
import { encodeAction, parseAction, type BotAction } from "../../src/telegram/actions.js";

describe("callback action tokens", () => {
  describe("parseAction", () => {
    it("reads fixed tokens", () => {
      expect(parseAction("back_to_menu")).toEqual({ ok: true, action: { kind: "menu" } });
      expect(parseAction("broadcast")).toEqual({ ok: true, action: { kind: "broadcast_menu" } });
    });

    it("reads event tokens with the longest matching prefix", () => {
      expect(parseAction("event_12")).toEqual({ ok: true, action: { kind: "event", op: "show", eventId: 12 } });
      expect(parseAction("event_participants_7")).toEqual({
        ok: true,
        action: { kind: "event", op: "participants", eventId: 7 },
      });
      expect(parseAction("confirm_delete_event_3")).toEqual({
        ok: true,
        action: { kind: "event", op: "confirm_delete", eventId: 3 },
      });
      expect(parseAction("unregister_9")).toEqual({ ok: true, action: { kind: "event", op: "unregister", eventId: 9 } });
    });

    it("reads city and broadcast target tokens", () => {
      expect(parseAction("city_kazan")).toEqual({ ok: true, action: { kind: "set_city", city: "kazan" } });
      expect(parseAction("events_city_moscow")).toEqual({ ok: true, action: { kind: "city_events", city: "moscow" } });
      expect(parseAction("broadcast_all")).toEqual({
        ok: true,
        action: { kind: "broadcast_target", target: { kind: "all" } },
      });
      expect(parseAction("broadcast_city_kazan")).toEqual({
        ok: true,
        action: { kind: "broadcast_target", target: { kind: "city", city: "kazan" } },
      });
    });

    it("reads role actions and wizard choices", () => {
      expect(parseAction("add_moderator")).toEqual({ ok: true, action: { kind: "role_action", action: "add_moderator" } });
      expect(parseAction("wz_confirm")).toEqual({ ok: true, action: { kind: "wizard", value: "confirm" } });
    });

    it("flags a non-numeric id as malformed", () => {
      expect(parseAction("register_abc")).toEqual({ ok: false, reason: "malformed_id", token: "register_abc" });
      expect(parseAction("manage_event_")).toEqual({ ok: false, reason: "malformed_id", token: "manage_event_" });
    });

    it("flags unknown tokens", () => {
      expect(parseAction("toString")).toEqual({ ok: false, reason: "unknown", token: "toString" });
      expect(parseAction("city_paris")).toEqual({ ok: false, reason: "unknown", token: "city_paris" });
      expect(parseAction("wz_")).toEqual({ ok: false, reason: "unknown", token: "wz_" });
    });
  });

  describe("encodeAction", () => {
    it("produces the tokens the parser reads back", () => {
      const actions: BotAction[] = [
        { kind: "menu" },
        { kind: "my_created_events" },
        { kind: "event", op: "toggle_registration", eventId: 4 },
        { kind: "event", op: "cancel_delete", eventId: 8 },
        { kind: "set_city", city: "moscow" },
        { kind: "broadcast_target", target: { kind: "city", city: "moscow" } },
        { kind: "role_action", action: "remove_moderator" },
        { kind: "wizard", value: "city_kazan" },
      ];
      for (const action of actions) {
        expect(parseAction(encodeAction(action))).toEqual({ ok: true, action });
      }
    });

    it("keeps the historical token names", () => {
      expect(encodeAction({ kind: "menu" })).toBe("back_to_menu");
      expect(encodeAction({ kind: "event", op: "show", eventId: 5 })).toBe("event_5");
      expect(encodeAction({ kind: "event", op: "manage", eventId: 5 })).toBe("manage_event_5");
    });
  });
});
