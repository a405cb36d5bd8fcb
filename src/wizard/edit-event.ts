/**
 * Edit-event wizard: pick a field, send the new value, done.
 * Values go through the same validators as the create wizard.
 */

import { InlineKeyboard } from "grammy";
import type { EditableField, EventPatch, EventRecord } from "../core/types.js";
import { failureNotice, ok, type Outcome } from "../core/errors.js";
import { encodeAction } from "../telegram/actions.js";
import {
  buildCancelKeyboard,
  buildCityChoiceKeyboard,
  buildManageEventKeyboard,
  buildSkipKeyboard,
  escapeHtml,
  formatManageEventHtml,
  type Reply,
} from "../telegram/cards.js";
import {
  DATE_FORMAT_HINT,
  SKIP_TOKEN,
  parseCity,
  parseEventDateTime,
  parseMaxParticipants,
  parseOptionalText,
  parseTitle,
} from "./validation.js";
import type { WizardState } from "./session-store.js";
import { finish, stay, type StepContext, type StepResult, type WizardInput } from "./types.js";

type EditState = Extract<WizardState, { wizard: "edit_event" }>;

export const EDITABLE_FIELDS: readonly { field: EditableField; label: string }[] = [
  { field: "title", label: "📝 Title" },
  { field: "description", label: "📄 Description" },
  { field: "location", label: "📍 Location" },
  { field: "city", label: "🏙️ City" },
  { field: "date_time", label: "🕐 Date and time" },
  { field: "max_participants", label: "👥 Participant limit" },
];

const FIELD_CHOICE = "field_";

function fieldsKeyboard(): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const { field, label } of EDITABLE_FIELDS) {
    kb.text(label, encodeAction({ kind: "wizard", value: `${FIELD_CHOICE}${field}` })).row();
  }
  return kb.text("❌ Cancel", encodeAction({ kind: "cancel" }));
}

function fieldPrompt(field: EditableField): Reply {
  switch (field) {
    case "title":
      return { text: "📝 Enter the new title:", keyboard: buildCancelKeyboard() };
    case "description":
      return { text: `📄 Enter the new description (or "${SKIP_TOKEN}" to clear it):`, keyboard: buildSkipKeyboard() };
    case "location":
      return { text: `📍 Enter the new location (or "${SKIP_TOKEN}" to clear it):`, keyboard: buildSkipKeyboard() };
    case "city":
      return { text: "🏙️ Choose the new city:", keyboard: buildCityChoiceKeyboard() };
    case "date_time":
      return { text: `🕐 Enter the new date and time as ${escapeHtml(DATE_FORMAT_HINT)}:`, keyboard: buildCancelKeyboard() };
    case "max_participants":
      return { text: `👥 Enter the new participant limit (or "${SKIP_TOKEN}" for no limit):`, keyboard: buildSkipKeyboard() };
  }
}

export function startEditEvent(event: EventRecord): StepResult {
  return stay(
    { wizard: "edit_event", step: "field", eventId: event.id },
    { text: `✏️ What do you want to change in <b>${escapeHtml(event.title)}</b>?`, keyboard: fieldsKeyboard() },
  );
}

function findField(value: string): EditableField | undefined {
  return EDITABLE_FIELDS.find(({ field }) => `${FIELD_CHOICE}${field}` === value)?.field;
}

function rawValue(input: WizardInput): string | undefined {
  if (input.kind === "choice") {
    if (input.value === "skip") return SKIP_TOKEN;
    if (input.value.startsWith("city_")) return input.value.slice("city_".length);
    return undefined;
  }
  return input.kind === "text" ? input.text : undefined;
}

/** Turn the raw value into a one-field patch */
export function parseFieldValue(field: EditableField, raw: string | undefined, now: Date): Outcome<EventPatch> {
  switch (field) {
    case "title": {
      const title = parseTitle(raw);
      return title.ok ? ok({ title: title.value }) : title;
    }
    case "description": {
      const description = parseOptionalText(raw);
      return description.ok ? ok({ description: description.value }) : description;
    }
    case "location": {
      const location = parseOptionalText(raw);
      return location.ok ? ok({ location: location.value }) : location;
    }
    case "city": {
      const city = parseCity(raw);
      return city.ok ? ok({ city: city.value }) : city;
    }
    case "date_time": {
      const dateTime = parseEventDateTime(raw, now);
      return dateTime.ok ? ok({ dateTime: dateTime.value }) : dateTime;
    }
    case "max_participants": {
      const max = parseMaxParticipants(raw);
      return max.ok ? ok({ maxParticipants: max.value }) : max;
    }
  }
}

export async function stepEditEvent(ctx: StepContext, state: EditState, input: WizardInput): Promise<StepResult> {
  if (state.step === "field") {
    const field = input.kind === "choice" ? findField(input.value) : undefined;
    if (!field) {
      return stay(state, { text: "Choose a field with the buttons below:", keyboard: fieldsKeyboard() });
    }
    return stay({ wizard: "edit_event", step: "value", eventId: state.eventId, field }, fieldPrompt(field));
  }

  const patch = parseFieldValue(state.field, rawValue(input), ctx.core.clock());
  if (!patch.ok) {
    return stay(state, { ...fieldPrompt(state.field), text: `❌ ${escapeHtml(failureNotice(patch.failure))}` });
  }

  const updated = await ctx.core.updateEventField(ctx.user, state.eventId, patch.value);
  if (!updated.ok) {
    if (updated.failure.kind === "conflict") {
      return stay(state, { ...fieldPrompt(state.field), text: `❌ ${failureNotice(updated.failure)}` });
    }
    return finish({ text: `❌ ${failureNotice(updated.failure)}` });
  }

  const event = updated.value;
  const participantCount = await ctx.core.store.countRegistrations(event.id);
  return finish({
    text: `✅ Event updated\n\n${formatManageEventHtml({ event, participantCount, isRegistered: false, canManage: true })}`,
    keyboard: buildManageEventKeyboard(event),
  });
}
