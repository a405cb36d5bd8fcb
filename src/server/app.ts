import Fastify from "fastify";
import cors from "@fastify/cors";
import type { EventDeskCore } from "../core/eventdesk.js";
import type { CityCode, EventRecord } from "../core/types.js";
import { isCityCode } from "../config.js";

export interface AppOptions {
  logger?: boolean;
}

/** Public shape of an event; creator and media ids stay internal */
export function toPublicEvent(event: EventRecord) {
  return {
    id: event.id,
    title: event.title,
    description: event.description ?? null,
    location: event.location ?? null,
    city: event.city,
    dateTime: event.dateTime.toISOString(),
    maxParticipants: event.maxParticipants ?? null,
    registrationRequired: event.registrationRequired,
    registrationOpen: event.registrationOpen,
  };
}

type CityQuery = { Querystring: { city?: string } };

export function buildApp(core: EventDeskCore, opts: AppOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true });

  app.register(cors);

  /** undefined = no filter, null = unknown city */
  const cityFilter = (raw: string | undefined): CityCode | undefined | null => {
    if (!raw) return undefined;
    return isCityCode(raw) ? raw : null;
  };

  app.get("/health", async () => {
    return {
      status: "ok",
      service: "eventdesk",
      uptime: process.uptime(),
    };
  });

  // Visible upcoming events, earliest first
  app.get<CityQuery>("/api/events", async (request, reply) => {
    const city = cityFilter(request.query.city);
    if (city === null) {
      return reply.status(400).send({ error: `Unknown city: ${request.query.city}` });
    }
    const events = await core.catalog.listVisibleUpcoming(city);
    return { events: events.map(toPublicEvent) };
  });

  // Next event, preferring the given city
  app.get<CityQuery>("/api/events/next", async (request, reply) => {
    const city = cityFilter(request.query.city);
    if (city === null) {
      return reply.status(400).send({ error: `Unknown city: ${request.query.city}` });
    }
    const next = await core.catalog.nextUpcomingForUser(city ? { city } : null);
    return { event: next ? toPublicEvent(next) : null };
  });

  return app;
}
