import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { NOW, addEvent, addUser, hoursFrom, setup, type Harness } from "./fixtures.js";
import { buildApp } from "../../src/server/app.js";

describe("HTTP API", () => {
  let h: Harness;
  let app: ReturnType<typeof buildApp>;

  beforeEach(async () => {
    h = setup();
    app = buildApp(h.core, { logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers the health check", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", service: "eventdesk" });
  });

  it("lists visible upcoming events for a city", async () => {
    const staff = await addUser(h.core, 1, "admin");
    const kazan = await addEvent(h.core, staff, { title: "Kazan meetup", city: "kazan", maxParticipants: 20 });
    await addEvent(h.core, staff, { city: "moscow" });

    const res = await app.inject({ method: "GET", url: "/api/events?city=kazan" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      events: [{
        id: kazan.id,
        title: "Kazan meetup",
        description: null,
        location: null,
        city: "kazan",
        dateTime: hoursFrom(NOW, 48).toISOString(),
        maxParticipants: 20,
        registrationRequired: true,
        registrationOpen: true,
      }],
    });
  });

  it("rejects an unknown city", async () => {
    const res = await app.inject({ method: "GET", url: "/api/events?city=paris" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Unknown city: paris" });
  });

  it("returns the next event, falling back to other cities", async () => {
    const staff = await addUser(h.core, 1, "admin");
    const moscow = await addEvent(h.core, staff, { city: "moscow" });

    const res = await app.inject({ method: "GET", url: "/api/events/next?city=kazan" });

    expect(res.json()).toMatchObject({ event: { id: moscow.id, city: "moscow" } });
  });

  it("returns null when nothing is upcoming", async () => {
    const res = await app.inject({ method: "GET", url: "/api/events/next" });
    expect(res.json()).toEqual({ event: null });
  });
});
