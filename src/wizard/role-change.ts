import type { RoleAction, UserRecord } from "../core/types.js";
import { failureNotice } from "../core/errors.js";
import { ROLE_LABELS } from "../core/roles.js";
import { buildCancelKeyboard, buildConfirmKeyboard, buildRolesKeyboard, displayName } from "../telegram/cards.js";
import { parseTelegramId } from "./validation.js";
import type { WizardState } from "./session-store.js";
import { finish, inputText, stay, type StepContext, type StepResult, type WizardInput } from "./types.js";

type RoleState = Extract<WizardState, { wizard: "role_change" }>;

const ACTION_TITLES: Record<RoleAction, string> = {
  add_admin: "➕ Add administrator",
  add_moderator: "➕ Add moderator",
  remove_moderator: "➖ Remove moderator",
};

const TARGET_PROMPT = "Enter the user's Telegram ID (the user must have started the bot):";

export function startRoleChange(action: RoleAction): StepResult {
  return stay(
    { wizard: "role_change", step: "target", action },
    { text: `<b>${ACTION_TITLES[action]}</b>\n\n${TARGET_PROMPT}`, keyboard: buildCancelKeyboard() },
  );
}

function confirmText(action: RoleAction, target: UserRecord): string {
  return [
    `<b>${ACTION_TITLES[action]}</b>`,
    "",
    `👤 ${displayName(target)}`,
    `Current role: ${ROLE_LABELS[target.role]}`,
    "",
    "Confirm the change?",
  ].join("\n");
}

export async function stepRoleChange(ctx: StepContext, state: RoleState, input: WizardInput): Promise<StepResult> {
  if (state.step === "target") {
    const telegramId = parseTelegramId(inputText(input));
    if (!telegramId.ok) {
      return stay(state, { text: `❌ ${failureNotice(telegramId.failure)}`, keyboard: buildCancelKeyboard() });
    }
    const preview = await ctx.core.previewRoleChange(ctx.user, telegramId.value, state.action);
    if (!preview.ok) {
      if (preview.failure.kind === "forbidden") return finish({ text: `❌ ${failureNotice(preview.failure)}` });
      return stay(state, {
        text: `❌ ${failureNotice(preview.failure)}\n\n${TARGET_PROMPT}`,
        keyboard: buildCancelKeyboard(),
      });
    }
    return stay(
      { wizard: "role_change", step: "confirm", action: state.action, targetTelegramId: telegramId.value },
      { text: confirmText(state.action, preview.value.target), keyboard: buildConfirmKeyboard() },
    );
  }

  if (input.kind !== "choice" || input.value !== "confirm") {
    return stay(state, { text: "Press Confirm or Cancel:", keyboard: buildConfirmKeyboard() });
  }

  const changed = await ctx.core.changeRole(ctx.user, state.targetTelegramId, state.action);
  if (!changed.ok) return finish({ text: `❌ ${failureNotice(changed.failure)}`, keyboard: buildRolesKeyboard() });

  const { user, previousRole } = changed.value;
  return finish({
    text: `✅ ${displayName(user)}: ${ROLE_LABELS[previousRole]} → ${ROLE_LABELS[user.role]}`,
    keyboard: buildRolesKeyboard(),
  });
}
