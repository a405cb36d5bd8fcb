import type { City, CityCode, EventDeskConfig, StoreConfig } from "./core/types.js";
import { log } from "./utils/logger.js";

export const CITIES: readonly City[] = [
  { code: "moscow", name: "Moscow", emoji: "🏢" },
  { code: "kazan", name: "Kazan", emoji: "🕌" },
];

export function findCity(code: string): City | undefined {
  return CITIES.find((c) => c.code === code);
}

export function isCityCode(value: string): value is CityCode {
  return CITIES.some((c) => c.code === value);
}

export function cityName(code: CityCode): string {
  return findCity(code)?.name ?? code;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EventDeskConfig {
  const bootstrapAdminId = parseOptionalInt(env.ADMIN_ID);
  if (bootstrapAdminId === undefined) {
    log.warn("[config]", "ADMIN_ID not set; the first user will get the plain user role");
  }

  return {
    botToken: env.BOT_TOKEN || undefined,
    bootstrapAdminId,
    store: buildStoreConfig(env),
    port: parseOptionalInt(env.PORT) ?? 8080,
    wizardIdleMinutes: Math.max(0, parseOptionalInt(env.WIZARD_IDLE_MINUTES) ?? 30),
    broadcast: {
      batchSize: Math.max(1, parseOptionalInt(env.BROADCAST_BATCH_SIZE) ?? 30),
      pauseMs: Math.max(0, parseOptionalInt(env.BROADCAST_PAUSE_MS) ?? 1000),
    },
  };
}

function buildStoreConfig(env: NodeJS.ProcessEnv): StoreConfig {
  if (env.SUPABASE_URL && env.SUPABASE_KEY) {
    return { kind: "supabase", supabaseUrl: env.SUPABASE_URL, supabaseKey: env.SUPABASE_KEY };
  }
  return { kind: "local", dataFile: env.DATA_FILE || "data/eventdesk.json" };
}

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (!raw || !/^-?\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw.trim(), 10);
}
