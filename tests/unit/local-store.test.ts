import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LocalStore } from "../../src/store/local.js";
import { StoreError } from "../../src/core/errors.js";
import { NOW, hoursFrom } from "./fixtures.js";

describe("LocalStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "eventdesk-"));
    file = join(dir, "nested", "store.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = await LocalStore.open(file);
    expect(await store.listEvents({})).toEqual([]);
  });

  it("reloads users, events and registrations with their dates", async () => {
    const store = await LocalStore.open(file);
    const user = await store.upsertUser({ telegramId: 77, firstName: "Ada" }, "admin");
    await store.setUserCity(user.id, "kazan");
    const event = await store.createEvent(
      {
        title: "Hack night",
        city: "kazan",
        dateTime: hoursFrom(NOW, 24),
        creatorId: user.id,
        maxParticipants: 10,
        registrationRequired: true,
        media: { kind: "video", fileId: "clip" },
      },
      NOW,
    );
    await store.reserveSeat(user.id, event.id, NOW);
    await store.flush();

    const reopened = await LocalStore.open(file);
    const loaded = await reopened.findEvent(event.id);
    expect(loaded?.dateTime).toEqual(hoursFrom(NOW, 24));
    expect(loaded?.media).toEqual({ kind: "video", fileId: "clip" });
    expect(loaded?.maxParticipants).toBe(10);
    expect(await reopened.findUserByTelegramId(77)).toMatchObject({ role: "admin", city: "kazan", isActive: true });
    expect(await reopened.countRegistrations(event.id)).toBe(1);

    // Ids keep counting from where the snapshot left off
    const second = await reopened.createEvent({ title: "Next", city: "moscow", dateTime: NOW, creatorId: user.id, registrationRequired: false }, NOW);
    expect(second.id).toBe(event.id + 1);
  });

  it("writes a JSON snapshot", async () => {
    const store = await LocalStore.open(file);
    await store.upsertUser({ telegramId: 5 }, "user");
    await store.flush();

    const snapshot: unknown = JSON.parse(await readFile(file, "utf8"));
    expect(snapshot).toMatchObject({ users: [{ telegramId: 5, role: "user" }] });
  });

  it("refuses a snapshot without its tables", async () => {
    await writeFile(join(dir, "bad.json"), JSON.stringify({ users: [] }), "utf8");
    await expect(LocalStore.open(join(dir, "bad.json"))).rejects.toBeInstanceOf(StoreError);
  });

  it("undoes a change whose file write failed", async () => {
    const store = await LocalStore.open(file);
    const user = await store.upsertUser({ telegramId: 3 }, "user");
    const event = await store.createEvent(
      { title: "Quiz", city: "moscow", dateTime: hoursFrom(NOW, 5), creatorId: user.id, registrationRequired: true },
      NOW,
    );
    await store.flush();

    // A regular file where the data directory should be makes every write fail
    await rm(join(dir, "nested"), { recursive: true, force: true });
    await writeFile(join(dir, "nested"), "", "utf8");

    await expect(store.reserveSeat(user.id, event.id, NOW)).rejects.toBeInstanceOf(StoreError);
    expect(await store.countRegistrations(event.id)).toBe(0);

    await expect(store.updateEvent(event.id, { title: "Renamed" }, hoursFrom(NOW, 1))).rejects.toBeInstanceOf(StoreError);
    expect(await store.findEvent(event.id)).toMatchObject({ title: "Quiz", updatedAt: NOW });

    await expect(store.deleteEvent(event.id)).rejects.toBeInstanceOf(StoreError);
    expect((await store.findEvent(event.id))?.id).toBe(event.id);

    await rm(join(dir, "nested"), { force: true });
    const retry = await store.reserveSeat(user.id, event.id, NOW);
    expect(retry.status).toBe("reserved");
    expect(await store.countRegistrations(event.id)).toBe(1);
  });

  it("keeps the role of an existing user and reactivates them on contact", async () => {
    const store = new LocalStore();
    const first = await store.upsertUser({ telegramId: 9, username: "old" }, "admin");
    await store.setUserActive(first.id, false);

    const again = await store.upsertUser({ telegramId: 9, username: "new" }, "user");

    expect(again).toMatchObject({ id: first.id, role: "admin", username: "new", isActive: true });
  });

  it("lists participants in registration order", async () => {
    const store = new LocalStore();
    const a = await store.upsertUser({ telegramId: 1 }, "user");
    const b = await store.upsertUser({ telegramId: 2 }, "user");
    const event = await store.createEvent({ title: "T", city: "moscow", dateTime: hoursFrom(NOW, 5), creatorId: a.id, registrationRequired: true }, NOW);
    await store.reserveSeat(b.id, event.id, NOW);
    await store.reserveSeat(a.id, event.id, hoursFrom(NOW, 1));

    expect((await store.listParticipants(event.id)).map((u) => u.telegramId)).toEqual([2, 1]);
  });
});
