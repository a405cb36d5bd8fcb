/**
 * Create-event wizard
 *
 *   title → description → location → city → date_time → max_participants
 *     → registration_required → media → commit
 *
 * A step that cannot use the input re-prompts and keeps the draft as it was.
 */

import type { MediaRef } from "../core/types.js";
import { failureNotice, type Outcome } from "../core/errors.js";
import {
  buildCancelKeyboard,
  buildCityChoiceKeyboard,
  buildManageEventKeyboard,
  buildSkipKeyboard,
  buildYesNoKeyboard,
  cityLabel,
  escapeHtml,
  formatDateTime,
  type Reply,
} from "../telegram/cards.js";
import {
  DATE_FORMAT_HINT,
  MAX_VIDEO_BYTES,
  SKIP_TOKEN,
  checkEventLead,
  isSkip,
  parseCity,
  parseEventDateTime,
  parseMaxParticipants,
  parseOptionalText,
  parseTitle,
  parseYesNo,
} from "./validation.js";
import type { CreateStep, EventDraft, WizardState } from "./session-store.js";
import { finish, inputText, stay, type StepContext, type StepResult, type WizardInput } from "./types.js";
import { log } from "../utils/logger.js";

type CreateState = Extract<WizardState, { wizard: "create_event" }>;

export function startCreateEvent(): StepResult {
  return stay({ wizard: "create_event", step: "title", draft: {} }, promptFor("title"));
}

export function promptFor(step: CreateStep): Reply {
  switch (step) {
    case "title":
      return { text: "📝 Enter the event title:", keyboard: buildCancelKeyboard() };
    case "description":
      return { text: `📄 Enter the event description (or "${SKIP_TOKEN}" to skip):`, keyboard: buildSkipKeyboard() };
    case "location":
      return { text: `📍 Enter the event location (or "${SKIP_TOKEN}" to skip):`, keyboard: buildSkipKeyboard() };
    case "city":
      return { text: "🏙️ Choose the city:", keyboard: buildCityChoiceKeyboard() };
    case "date_time":
      return { text: `🕐 Enter the date and time as ${escapeHtml(DATE_FORMAT_HINT)}:`, keyboard: buildCancelKeyboard() };
    case "max_participants":
      return {
        text: `👥 Enter the participant limit (or "${SKIP_TOKEN}" for no limit):`,
        keyboard: buildSkipKeyboard(),
      };
    case "registration_required":
      return { text: "✅ Is registration required?\n1. Yes\n2. No", keyboard: buildYesNoKeyboard() };
    case "media":
      return {
        text: `📸 Send a photo or a video (up to 20 MB) for the event, or "${SKIP_TOKEN}" to skip:`,
        keyboard: buildSkipKeyboard(),
      };
  }
}

/** Stay on the same step and show the validation message above the prompt */
function retry(state: CreateState, message: string): StepResult {
  const prompt = promptFor(state.step);
  return stay(state, { ...prompt, text: `❌ ${escapeHtml(message)}` });
}

function advance(step: CreateStep, draft: EventDraft): StepResult {
  return stay({ wizard: "create_event", step, draft }, promptFor(step));
}

/** Choice "skip" and the typed skip token mean the same thing */
function textOrSkip(input: WizardInput): string | undefined {
  if (input.kind === "choice" && input.value === "skip") return SKIP_TOKEN;
  return input.kind === "text" ? input.text : undefined;
}

function choiceCity(input: WizardInput): string | undefined {
  if (input.kind === "choice" && input.value.startsWith("city_")) return input.value.slice("city_".length);
  return input.kind === "text" ? input.text : undefined;
}

function choiceYesNo(input: WizardInput): string | undefined {
  if (input.kind === "choice") return input.value;
  return input.kind === "text" ? input.text : undefined;
}

/** Media step: photo, video within the size limit, or the skip token */
export function parseMedia(input: WizardInput): Outcome<MediaRef | undefined> {
  if (input.kind === "photo") return { ok: true, value: { kind: "photo", fileId: input.fileId } };
  if (input.kind === "video") {
    if (input.fileSize !== undefined && input.fileSize > MAX_VIDEO_BYTES) {
      return { ok: false, failure: { kind: "validation", message: "The video is too large (maximum 20 MB). Send a smaller one:" } };
    }
    return { ok: true, value: { kind: "video", fileId: input.fileId } };
  }
  if (isSkip(textOrSkip(input))) return { ok: true, value: undefined };
  return {
    ok: false,
    failure: { kind: "validation", message: `Send a photo, a video or "${SKIP_TOKEN}" to skip:` },
  };
}

export async function stepCreateEvent(ctx: StepContext, state: CreateState, input: WizardInput): Promise<StepResult> {
  const { draft } = state;

  switch (state.step) {
    case "title": {
      const title = parseTitle(inputText(input));
      if (!title.ok) return retry(state, failureNotice(title.failure));
      return advance("description", { ...draft, title: title.value });
    }
    case "description": {
      const description = parseOptionalText(textOrSkip(input));
      if (!description.ok) return retry(state, failureNotice(description.failure));
      return advance("location", { ...draft, description: description.value });
    }
    case "location": {
      const location = parseOptionalText(textOrSkip(input));
      if (!location.ok) return retry(state, failureNotice(location.failure));
      return advance("city", { ...draft, location: location.value });
    }
    case "city": {
      const city = parseCity(choiceCity(input));
      if (!city.ok) return retry(state, failureNotice(city.failure));
      return advance("date_time", { ...draft, city: city.value });
    }
    case "date_time": {
      const dateTime = parseEventDateTime(inputText(input), ctx.core.clock());
      if (!dateTime.ok) return retry(state, failureNotice(dateTime.failure));
      return advance("max_participants", { ...draft, dateTime: dateTime.value });
    }
    case "max_participants": {
      const max = parseMaxParticipants(textOrSkip(input));
      if (!max.ok) return retry(state, failureNotice(max.failure));
      return advance("registration_required", { ...draft, maxParticipants: max.value });
    }
    case "registration_required": {
      const required = parseYesNo(choiceYesNo(input));
      if (!required.ok) return retry(state, failureNotice(required.failure));
      return advance("media", { ...draft, registrationRequired: required.value });
    }
    case "media": {
      const media = parseMedia(input);
      if (!media.ok) return retry(state, failureNotice(media.failure));
      return commit(ctx, { ...draft, media: media.value });
    }
  }
}

async function commit(ctx: StepContext, draft: EventDraft): Promise<StepResult> {
  const { title, city, dateTime, registrationRequired } = draft;
  if (title === undefined || city === undefined || dateTime === undefined || registrationRequired === undefined) {
    log.warn("[wizard]", "Incomplete event draft at commit", { userId: ctx.user.id });
    return finish({ text: "Something went wrong. Please start again." });
  }

  // The date was checked when entered; the later steps may have taken a while
  const lead = checkEventLead(dateTime, ctx.core.clock());
  if (!lead.ok) {
    const back: CreateState = { wizard: "create_event", step: "date_time", draft: { ...draft, dateTime: undefined } };
    return retry(back, failureNotice(lead.failure));
  }

  const created = await ctx.core.createEvent(ctx.user, {
    title,
    description: draft.description,
    location: draft.location,
    city,
    dateTime,
    maxParticipants: draft.maxParticipants,
    registrationRequired,
    media: draft.media,
  });
  if (!created.ok) return finish({ text: `❌ ${failureNotice(created.failure)}` });

  const event = created.value;
  return finish({
    text: [
      "✅ Event created!",
      "",
      `📅 <b>${escapeHtml(event.title)}</b>`,
      `🏙️ ${cityLabel(event.city)}`,
      `🕐 ${formatDateTime(event.dateTime)}`,
    ].join("\n"),
    keyboard: buildManageEventKeyboard(event),
  });
}
