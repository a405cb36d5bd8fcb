import "dotenv/config";
import { loadConfig } from "./config.js";
import { EventDeskCore } from "./core/eventdesk.js";
import type { StoreConfig } from "./core/types.js";
import type { EventStore } from "./store/types.js";
import { LocalStore } from "./store/local.js";
import { SupabaseStore } from "./store/supabase.js";
import { buildApp } from "./server/app.js";
import { startTelegramBot, type TelegramBot } from "./telegram/bot.js";
import { log, extractError } from "./utils/logger.js";

async function openStore(cfg: StoreConfig): Promise<{ store: EventStore; close: () => Promise<void> }> {
  if (cfg.kind === "supabase") {
    log.info("[eventdesk]", "Using Supabase store");
    return { store: new SupabaseStore(cfg), close: async () => {} };
  }
  const store = await LocalStore.open(cfg.dataFile);
  return { store, close: () => store.flush() };
}

async function main() {
  const config = loadConfig();
  const { store, close } = await openStore(config.store);
  const core = new EventDeskCore(store, config);

  const app = buildApp(core);
  const address = await app.listen({ port: config.port, host: "0.0.0.0" });
  log.info("[eventdesk]", `Server listening on ${address}`);

  let telegram: TelegramBot | undefined;
  if (config.botToken) {
    telegram = startTelegramBot(config.botToken, core, config);
  } else {
    log.warn("[eventdesk]", "BOT_TOKEN not set; running the HTTP API only");
  }

  async function shutdown(signal: string) {
    log.info("[eventdesk]", `${signal} received, shutting down...`);
    try {
      await telegram?.stop();
      await app.close();
      await close();
      log.info("[eventdesk]", "Shutdown complete");
      process.exit(0);
    } catch (err) {
      log.error("[eventdesk]", "Shutdown failed", { error: extractError(err) });
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  log.error("[eventdesk]", "Fatal startup error", { error: extractError(err) });
  process.exit(1);
});
