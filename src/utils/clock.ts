/**
 * Time source and date-window helpers.
 */

import type { DateWindow } from "../types/market.js";

const DAY_MS = 86_400_000;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Clock pinned to one instant */
export function fixedClock(instant: Date | string): Clock {
  const ms = new Date(instant).getTime();
  return { now: () => new Date(ms) };
}

/** Format as YYYY-MM-DD (UTC calendar) */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Window ending now and starting `days` calendar days earlier */
export function trailingWindow(now: Date, days: number): DateWindow {
  return {
    start: formatDate(new Date(now.getTime() - days * DAY_MS)),
    end: formatDate(now),
  };
}

/** Unix seconds at UTC midnight of a YYYY-MM-DD date */
export function toUnixSeconds(date: string): number {
  const ms = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid date: ${date}`);
  }
  return Math.floor(ms / 1000);
}
