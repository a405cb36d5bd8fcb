/**
 * EventDesk Telegram Bot (grammY)
 *
 * Runs alongside the Fastify server in the same process. Every update
 * upserts the sender, then goes to BotHandlers; this file only turns
 * HandlerResults into Bot API calls.
 */

import { Bot, GrammyError, type Context } from "grammy";
import type { User } from "grammy/types";
import type { EventDeskConfig, PlatformProfile, UserRecord } from "../core/types.js";
import type { EventDeskCore } from "../core/eventdesk.js";
import { BroadcastDispatcher, type SendFn } from "../services/broadcast.js";
import { MemorySessionStore } from "../wizard/session-store.js";
import { GENERIC_FAILURE, WizardEngine } from "../wizard/engine.js";
import type { WizardInput } from "../wizard/types.js";
import { parseAction } from "./actions.js";
import { BotHandlers, type BotCommand, type HandlerResult } from "./handlers.js";
import type { Reply } from "./cards.js";
import { log, extractError, fireAndForget } from "../utils/logger.js";

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;
/** Telegram caps media captions; longer cards go as a separate message */
const CAPTION_LIMIT = 1024;
const COMMANDS: readonly BotCommand[] = ["start", "menu", "events", "profile", "admin", "cancel"];

export interface TelegramBot {
  bot: Bot;
  stop(): Promise<void>;
}

export function profileOf(from: User): PlatformProfile {
  return {
    telegramId: from.id,
    username: from.username,
    firstName: from.first_name,
    lastName: from.last_name,
  };
}

/** Telegram answers 403 once the user has blocked the bot */
export function isBlockedError(err: unknown): boolean {
  return err instanceof GrammyError && err.error_code === 403;
}

async function sendReply(ctx: Context, reply: Reply): Promise<void> {
  const opts = { parse_mode: "HTML" as const, reply_markup: reply.keyboard };
  const media = reply.media;
  if (!media) {
    await ctx.reply(reply.text, opts);
    return;
  }

  const fitsCaption = reply.text.length <= CAPTION_LIMIT;
  const caption = fitsCaption ? reply.text : undefined;
  if (media.kind === "photo") {
    await ctx.replyWithPhoto(media.fileId, fitsCaption ? { caption, ...opts } : {});
  } else {
    await ctx.replyWithVideo(media.fileId, fitsCaption ? { caption, ...opts } : {});
  }
  if (!fitsCaption) await ctx.reply(reply.text, opts);
}

async function deliver(ctx: Context, result: HandlerResult): Promise<void> {
  if (ctx.callbackQuery) {
    await ctx.answerCallbackQuery({ text: result.notice, show_alert: result.alert ?? false });
  }
  for (const reply of result.replies) {
    await sendReply(ctx, reply);
  }
}

export function startTelegramBot(token: string, core: EventDeskCore, config: EventDeskConfig): TelegramBot {
  const bot = new Bot(token);
  const sessions = new MemorySessionStore(config.wizardIdleMinutes);
  const dispatcher = new BroadcastDispatcher(core.store, config.broadcast);

  const send: SendFn = async (recipient, message) => {
    const chatId = recipient.telegramId;
    const caption = message.text || undefined;
    try {
      if (message.media?.kind === "photo") {
        await bot.api.sendPhoto(chatId, message.media.fileId, { caption });
      } else if (message.media?.kind === "video") {
        await bot.api.sendVideo(chatId, message.media.fileId, { caption });
      } else {
        await bot.api.sendMessage(chatId, message.text);
      }
    } catch (err) {
      if (isBlockedError(err)) {
        fireAndForget(core.store.setUserActive(recipient.id, false), "[bot]", "Deactivate blocked user", {
          telegramId: recipient.telegramId,
        });
      }
      throw err;
    }
  };

  const engine = new WizardEngine({ core, sessions, dispatcher, send });
  const handlers = new BotHandlers(core, engine);

  /** Upsert the sender, run the handler, send what it returns */
  async function respond(ctx: Context, handle: (user: UserRecord) => Promise<HandlerResult>): Promise<void> {
    if (!ctx.from) return;
    const user = await core.ensureUser(profileOf(ctx.from));
    await deliver(ctx, await handle(user));
  }

  // ========================================================================
  // Commands
  // ========================================================================

  for (const command of COMMANDS) {
    bot.command(command, (ctx) => respond(ctx, (user) => handlers.onCommand(user, command)));
  }

  // ========================================================================
  // Buttons
  // ========================================================================

  bot.on("callback_query:data", (ctx) =>
    respond(ctx, (user) => handlers.onCallback(user, parseAction(ctx.callbackQuery.data))));

  // ========================================================================
  // Messages (wizard input, main-menu buttons)
  // ========================================================================

  bot.on("message:text", (ctx) =>
    respond(ctx, (user) => handlers.onInput(user, { kind: "text", text: ctx.message.text })));

  bot.on("message:photo", (ctx) => {
    const photo = ctx.message.photo;
    const largest = photo[photo.length - 1];
    const input: WizardInput = { kind: "photo", fileId: largest.file_id, caption: ctx.message.caption };
    return respond(ctx, (user) => handlers.onInput(user, input));
  });

  bot.on("message:video", (ctx) => {
    const video = ctx.message.video;
    const input: WizardInput = {
      kind: "video",
      fileId: video.file_id,
      fileSize: video.file_size,
      caption: ctx.message.caption,
    };
    return respond(ctx, (user) => handlers.onInput(user, input));
  });

  bot.on("message", (ctx) => respond(ctx, (user) => handlers.onInput(user, { kind: "other" })));

  // ========================================================================
  // Errors + polling
  // ========================================================================

  bot.catch((err) => {
    log.error("[bot]", "Unhandled update error", {
      updateId: err.ctx.update.update_id,
      error: extractError(err.error),
    });
    fireAndForget(err.ctx.reply(GENERIC_FAILURE), "[bot]", "Send failure notice", { updateId: err.ctx.update.update_id });
  });

  const sweeper = setInterval(() => {
    const removed = sessions.sweep();
    if (removed) log.debug("[bot]", "Dropped idle wizard sessions", { removed });
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();

  fireAndForget(
    bot.start({
      allowed_updates: ["message", "callback_query"],
      onStart: (me) => log.info("[bot]", "Bot started (long-polling)", { username: me.username }),
    }),
    "[bot]",
    "Polling stopped",
  );

  log.info("[bot]", "Bot initialized");

  return {
    bot,
    async stop() {
      clearInterval(sweeper);
      await bot.stop();
    },
  };
}
