/**
 * Broadcast Dispatcher
 *
 * Fan-out of one message to a filtered set of users:
 *   - recipients are active users, all or one city
 *   - one send per recipient, failures are counted and never stop the batch
 *   - a pause after every `batchSize` sends to stay under Telegram's limits
 *   - no retries within a batch
 */

import type { BroadcastConfig, BroadcastTarget, MediaRef, UserRecord } from "../core/types.js";
import type { EventStore } from "../store/types.js";
import { log, extractError } from "../utils/logger.js";

export interface BroadcastMessage {
  text: string;
  media?: MediaRef;
}

export interface BroadcastReport {
  recipients: number;
  sent: number;
  failed: number;
}

export type SendFn = (recipient: UserRecord, message: BroadcastMessage) => Promise<void>;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class BroadcastDispatcher {
  constructor(
    private readonly store: EventStore,
    private readonly config: BroadcastConfig,
    private readonly pause: (ms: number) => Promise<void> = sleep,
  ) {}

  async recipients(target: BroadcastTarget): Promise<UserRecord[]> {
    return this.store.listActiveUsers(target.kind === "city" ? target.city : undefined);
  }

  async broadcast(target: BroadcastTarget, message: BroadcastMessage, send: SendFn): Promise<BroadcastReport> {
    const users = await this.recipients(target);
    let sent = 0;
    let failed = 0;

    for (let i = 0; i < users.length; i++) {
      if (i > 0 && i % this.config.batchSize === 0) {
        await this.pause(this.config.pauseMs);
      }
      try {
        await send(users[i], message);
        sent++;
      } catch (err) {
        failed++;
        log.warn("[broadcast]", "Delivery failed", {
          telegramId: users[i].telegramId,
          error: extractError(err),
        });
      }
    }

    log.info("[broadcast]", "Broadcast finished", {
      target: target.kind === "city" ? target.city : "all",
      recipients: users.length,
      sent,
      failed,
    });
    return { recipients: users.length, sent, failed };
  }
}
