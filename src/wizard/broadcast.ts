import type { BroadcastTarget } from "../core/types.js";
import { failureNotice } from "../core/errors.js";
import type { BroadcastMessage } from "../services/broadcast.js";
import {
  buildAdminPanelKeyboard,
  buildCancelKeyboard,
  buildConfirmKeyboard,
  describeTarget,
  escapeHtml,
} from "../telegram/cards.js";
import { parseMedia } from "./create-event.js";
import type { WizardState } from "./session-store.js";
import { finish, stay, type StepContext, type StepResult, type WizardInput } from "./types.js";

type BroadcastState = Extract<WizardState, { wizard: "broadcast" }>;

const MESSAGE_PROMPT = "Send the message text, or a photo or video with a caption:";

export function startBroadcast(target: BroadcastTarget): StepResult {
  return stay(
    { wizard: "broadcast", step: "message", target },
    { text: `📢 Broadcast to ${describeTarget(target)}\n\n${MESSAGE_PROMPT}`, keyboard: buildCancelKeyboard() },
  );
}

function readMessage(input: WizardInput): BroadcastMessage | string {
  if (input.kind === "text") {
    const text = input.text.trim();
    return text ? { text } : MESSAGE_PROMPT;
  }
  if (input.kind === "photo" || input.kind === "video") {
    const media = parseMedia(input);
    if (!media.ok) return failureNotice(media.failure);
    return { text: input.caption?.trim() ?? "", media: media.value };
  }
  return MESSAGE_PROMPT;
}

export async function stepBroadcast(ctx: StepContext, state: BroadcastState, input: WizardInput): Promise<StepResult> {
  if (state.step === "message") {
    const message = readMessage(input);
    if (typeof message === "string") {
      return stay(state, { text: `❌ ${escapeHtml(message)}`, keyboard: buildCancelKeyboard() });
    }
    const recipients = await ctx.dispatcher.recipients(state.target);
    return stay(
      { wizard: "broadcast", step: "confirm", target: state.target, message },
      {
        text: [
          `📢 Preview for ${describeTarget(state.target)} (${recipients.length} recipients):`,
          "",
          escapeHtml(message.text),
        ].join("\n"),
        media: message.media,
        keyboard: buildConfirmKeyboard(),
      },
    );
  }

  if (input.kind !== "choice" || input.value !== "confirm") {
    return stay(state, { text: "Press Confirm or Cancel:", keyboard: buildConfirmKeyboard() });
  }

  const report = await ctx.dispatcher.broadcast(state.target, state.message, ctx.send);
  return finish({
    text: [
      "📢 Broadcast finished",
      "",
      `✅ Sent: ${report.sent}`,
      `❌ Failed: ${report.failed}`,
    ].join("\n"),
    keyboard: buildAdminPanelKeyboard(ctx.user),
  });
}
