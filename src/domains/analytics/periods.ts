// ──────────────────────────────────────────
// Analytics: Period assignment
// ──────────────────────────────────────────
// All arithmetic is on UTC fields. A period is the half-open interval
// [start, nextPeriodStart(start)).

import { InvalidTimestampError } from '../../shared/errors';
import { PeriodKind, Weekday } from '../../shared/types';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const WEEK_MS = 7 * DAY_MS;

/** Sunday 2024-09-29, the first week of recorded activity. */
export const DEFAULT_WEEK_EPOCH = new Date(Date.UTC(2024, 8, 29));

export type WeekRegime =
  | { mode: 'epoch'; epoch: Date }
  | { mode: 'calendar'; anchor: Weekday };

export interface PeriodAssigner {
  kind: PeriodKind;
  regime: WeekRegime;
  assign(timestamp: Date): Date;
}

export function assignPeriod(timestamp: Date, kind: PeriodKind, regime?: WeekRegime): Date {
  const time = timestamp.getTime();
  if (isNaN(time)) {
    throw new InvalidTimestampError(String(timestamp), 'not a valid instant');
  }

  switch (kind) {
    case 'day':
      return startOfUtcDay(timestamp);
    case 'month':
      return new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), 1));
    case 'week': {
      const weeks = regime ?? { mode: 'epoch', epoch: DEFAULT_WEEK_EPOCH };
      if (weeks.mode === 'calendar') {
        const offset = (timestamp.getUTCDay() - weeks.anchor + 7) % 7;
        return new Date(startOfUtcDay(timestamp).getTime() - offset * DAY_MS);
      }
      const elapsed = time - weeks.epoch.getTime();
      if (elapsed < 0) {
        throw new InvalidTimestampError(timestamp.toISOString(), `precedes week epoch ${weeks.epoch.toISOString()}`);
      }
      return new Date(weeks.epoch.getTime() + Math.floor(elapsed / WEEK_MS) * WEEK_MS);
    }
  }
}

export function createAssigner(kind: PeriodKind, regime?: WeekRegime): PeriodAssigner {
  const resolved: WeekRegime = regime ?? { mode: 'epoch', epoch: DEFAULT_WEEK_EPOCH };
  return {
    kind,
    regime: resolved,
    assign: (timestamp) => assignPeriod(timestamp, kind, resolved),
  };
}

export function nextPeriodStart(start: Date, kind: PeriodKind): Date {
  switch (kind) {
    case 'day':
      return new Date(start.getTime() + DAY_MS);
    case 'week':
      return new Date(start.getTime() + WEEK_MS);
    case 'month':
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1));
  }
}

export function previousPeriodStart(start: Date, kind: PeriodKind): Date {
  switch (kind) {
    case 'day':
      return new Date(start.getTime() - DAY_MS);
    case 'week':
      return new Date(start.getTime() - WEEK_MS);
    case 'month':
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() - 1, 1));
  }
}

/** Period length in days: 1, 7, or the number of days in the month. */
export function periodLengthDays(start: Date, kind: PeriodKind): number {
  return Math.round((nextPeriodStart(start, kind).getTime() - start.getTime()) / DAY_MS);
}

/** Whole days since `start`, counting the current day, never less than 1. */
export function elapsedDays(start: Date, now: Date): number {
  return Math.max(1, Math.floor((now.getTime() - start.getTime()) / DAY_MS) + 1);
}

export function periodKey(start: Date): string {
  return start.toISOString().slice(0, 10);
}

function startOfUtcDay(timestamp: Date): Date {
  return new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), timestamp.getUTCDate()));
}
