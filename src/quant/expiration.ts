/**
 * Default expiration picker.
 *
 * LEAPS-style analysis looks about a year out, so the default is the
 * listed expiration nearest to referenceDate + 365 days. Distances are
 * whole UTC calendar days; on a tie the earlier expiration wins.
 */

import { EmptyInputError, InvalidInputError } from "../utils/errors.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_OUT = 365;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function selectDefaultExpiration(
  dates: readonly string[],
  referenceDate: Date | string
): string {
  if (dates.length === 0) {
    throw new EmptyInputError("No expiration dates available");
  }

  const target = toDayNumber(referenceDate) + DAYS_OUT;

  let best = dates[0];
  let bestDay = parseIsoDate(best);
  let bestDistance = Math.abs(bestDay - target);

  for (const date of dates.slice(1)) {
    const day = parseIsoDate(date);
    const distance = Math.abs(day - target);
    if (distance < bestDistance || (distance === bestDistance && day < bestDay)) {
      best = date;
      bestDay = day;
      bestDistance = distance;
    }
  }

  return best;
}

/** Days since the Unix epoch for a YYYY-MM-DD string */
export function parseIsoDate(date: string): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new InvalidInputError(`Expected a YYYY-MM-DD date, got "${date}"`);
  }

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m) - 1;
  const day = Number(d);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const ms = new Date(0).setUTCFullYear(year, month, day);

  // 2025-02-30 rolls over into March
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month ||
    check.getUTCDate() !== day
  ) {
    throw new InvalidInputError(`Not a calendar date: "${date}"`);
  }

  return ms / MS_PER_DAY;
}

/** Format days since the Unix epoch as YYYY-MM-DD */
export function formatIsoDate(dayNumber: number): string {
  return new Date(dayNumber * MS_PER_DAY).toISOString().slice(0, 10);
}

function toDayNumber(reference: Date | string): number {
  if (typeof reference === "string") return parseIsoDate(reference);
  if (isNaN(reference.getTime())) {
    throw new InvalidInputError("Reference date is invalid");
  }
  return Math.floor(reference.getTime() / MS_PER_DAY);
}
