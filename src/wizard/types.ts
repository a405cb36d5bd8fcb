import type { UserRecord } from "../core/types.js";
import type { EventDeskCore } from "../core/eventdesk.js";
import type { BroadcastDispatcher, SendFn } from "../services/broadcast.js";
import type { Reply } from "../telegram/cards.js";
import type { WizardState } from "./session-store.js";

/** One inbound message or button press, reduced to what a step can use */
export type WizardInput =
  | { kind: "text"; text: string }
  | { kind: "photo"; fileId: string; caption?: string }
  | { kind: "video"; fileId: string; fileSize?: number; caption?: string }
  | { kind: "choice"; value: string }
  | { kind: "other" };

export interface StepContext {
  user: UserRecord;
  core: EventDeskCore;
  dispatcher: BroadcastDispatcher;
  send: SendFn;
}

/** `next: null` ends the wizard */
export interface StepResult {
  reply: Reply;
  next: WizardState | null;
}

export const stay = (state: WizardState, reply: Reply): StepResult => ({ reply, next: state });
export const finish = (reply: Reply): StepResult => ({ reply, next: null });

/** Text of a message, or the caption of a photo or video */
export function inputText(input: WizardInput): string | undefined {
  switch (input.kind) {
    case "text":
      return input.text;
    case "photo":
    case "video":
      return input.caption;
    default:
      return undefined;
  }
}
