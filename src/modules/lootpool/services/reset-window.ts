/**
 * Weekly reset window
 *
 * Loot pools roll over once a week at a fixed weekday/hour in a fixed UTC
 * offset (no daylight-saving switch). Weekdays follow getUTCDay: 0 = Sunday.
 */

import type { ResetWindow } from '../contracts/lootpool.types.js';
import { RESET_ANCHOR } from '../lootpool.config.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

export function weeklyWindow(
  now: Date | number,
  anchorWeekday: number,
  anchorHour: number,
  utcOffsetHours: number,
): ResetWindow {
  const offsetMs = Math.round(utcOffsetHours * HOUR_MS);
  // Wall-clock time at the anchor offset, read through the UTC getters
  const local = new Date(new Date(now).getTime() + offsetMs);

  let daysSinceAnchor = (((local.getUTCDay() - anchorWeekday) % 7) + 7) % 7;
  if (daysSinceAnchor === 0 && local.getUTCHours() < anchorHour) {
    daysSinceAnchor = 7;
  }

  const lastResetLocal = Date.UTC(
    local.getUTCFullYear(),
    local.getUTCMonth(),
    local.getUTCDate() - daysSinceAnchor,
    anchorHour,
  );
  const lastReset = lastResetLocal - offsetMs;

  return {
    lastReset: new Date(lastReset),
    nextReset: new Date(lastReset + WEEK_MS),
  };
}

/**
 * Window for the configured loot pool rollover (Friday 19:00 UTC+1).
 */
export function lootpoolResetWindow(now: Date | number): ResetWindow {
  return weeklyWindow(now, RESET_ANCHOR.weekday, RESET_ANCHOR.hour, RESET_ANCHOR.utcOffsetHours);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
