/**
 * Field validators shared by the create-event and edit-event wizards.
 * Each returns the normalized value or a validation failure whose message is
 * shown to the user as the re-prompt.
 */

import type { CityCode } from "../core/types.js";
import { CITIES } from "../config.js";
import { fail, ok, type Outcome } from "../core/errors.js";

export const SKIP_TOKEN = "-";
export const MAX_TITLE_LENGTH = 255;
export const MAX_PARTICIPANTS_LIMIT = 10_000;
export const MIN_LEAD_MS = 60 * 60 * 1000;
export const MAX_LEAD_MS = 365 * 24 * 60 * 60 * 1000;
/** Largest video accepted as event media */
export const MAX_VIDEO_BYTES = 20 * 1024 * 1024;
export const DATE_FORMAT_HINT = "DD.MM.YYYY HH:MM, for example 25.12.2024 18:30";

const invalid = <T>(message: string): Outcome<T> => fail({ kind: "validation", message });

export function isSkip(text: string | undefined): boolean {
  return text?.trim() === SKIP_TOKEN;
}

export function parseTitle(text: string | undefined): Outcome<string> {
  const title = text?.trim() ?? "";
  if (!title) return invalid("The title cannot be empty. Enter the event title:");
  if (title.length > MAX_TITLE_LENGTH) {
    return invalid(`The title is too long (maximum ${MAX_TITLE_LENGTH} characters). Enter a shorter title:`);
  }
  return ok(title);
}

/** "-" clears the field; anything else is stored as sent */
export function parseOptionalText(text: string | undefined): Outcome<string | undefined> {
  if (text === undefined || text.trim() === "") {
    return invalid(`Send the text, or "${SKIP_TOKEN}" to skip:`);
  }
  return ok(isSkip(text) ? undefined : text);
}

/** Accepts a list position ("1"), a city code or a city name */
export function parseCity(text: string | undefined): Outcome<CityCode> {
  const needle = text?.trim().toLowerCase() ?? "";
  const index = /^\d+$/.test(needle) ? parseInt(needle, 10) - 1 : -1;
  const city = CITIES[index] ?? CITIES.find((c) => c.code === needle || c.name.toLowerCase() === needle);
  if (!city) {
    const options = CITIES.map((c, i) => `${i + 1} (${c.name})`).join(" or ");
    return invalid(`Please choose ${options}:`);
  }
  return ok(city.code);
}

/**
 * Parse "DD.MM.YYYY HH:MM" in server local time. The instant must be at least
 * one hour and at most 365 days after now.
 */
export function parseEventDateTime(text: string | undefined, now: Date): Outcome<Date> {
  const match = /^(\d{2})\.(\d{2})\.(\d{4}) (\d{2}):(\d{2})$/.exec(text?.trim() ?? "");
  if (!match) return invalid(`Invalid date format. Use ${DATE_FORMAT_HINT}:`);

  const [day, month, year, hour, minute] = match.slice(1).map((part) => parseInt(part, 10));
  const parsed = new Date(year, month - 1, day, hour, minute);
  const roundTrips = parsed.getFullYear() === year
    && parsed.getMonth() === month - 1
    && parsed.getDate() === day
    && parsed.getHours() === hour
    && parsed.getMinutes() === minute;
  if (!roundTrips) return invalid(`That date does not exist. Use ${DATE_FORMAT_HINT}:`);

  return checkEventLead(parsed, now);
}

/** At least one hour and at most 365 days after now */
export function checkEventLead(dateTime: Date, now: Date): Outcome<Date> {
  const lead = dateTime.getTime() - now.getTime();
  if (lead < MIN_LEAD_MS) {
    return invalid("The event must start at least 1 hour from now. Enter a later date and time:");
  }
  if (lead > MAX_LEAD_MS) {
    return invalid("The event cannot be more than 365 days ahead. Enter an earlier date:");
  }
  return ok(dateTime);
}

/** "-" means unlimited; otherwise a whole number from 1 to 10000 */
export function parseMaxParticipants(text: string | undefined): Outcome<number | undefined> {
  if (isSkip(text)) return ok(undefined);
  const raw = text?.trim() ?? "";
  if (!/^\d+$/.test(raw)) {
    return invalid(`Enter a number, or "${SKIP_TOKEN}" for no limit:`);
  }
  const value = parseInt(raw, 10);
  if (value <= 0 || value > MAX_PARTICIPANTS_LIMIT) {
    return invalid(`The participant limit must be between 1 and ${MAX_PARTICIPANTS_LIMIT}:`);
  }
  return ok(value);
}

/** Two-option choice: "1"/"yes" or "2"/"no" */
export function parseYesNo(text: string | undefined): Outcome<boolean> {
  const value = text?.trim().toLowerCase();
  if (value === "1" || value === "yes") return ok(true);
  if (value === "2" || value === "no") return ok(false);
  return invalid("Please choose 1 (Yes) or 2 (No):");
}

/** Telegram user ids are positive integers */
export function parseTelegramId(text: string | undefined): Outcome<number> {
  const raw = text?.trim() ?? "";
  if (!/^\d{1,15}$/.test(raw)) return invalid("Please enter a valid numeric Telegram ID:");
  return ok(parseInt(raw, 10));
}
