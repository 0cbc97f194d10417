import { DateTime, type DurationLikeObject } from 'luxon';

import type { DurationTier } from '@core/interfaces/library.types.js';

export const DURATION_TIERS: readonly DurationTier[] = ['HOUR', 'DAY', 'WEEK', 'MONTH'];

const OFFSETS: Record<DurationTier, DurationLikeObject> = {
  HOUR: { hours: 1 },
  DAY: { days: 1 },
  WEEK: { days: 7 },
  MONTH: { days: 30 },
};

export function isDurationTier(value: unknown): value is DurationTier {
  return typeof value === 'string' && DURATION_TIERS.some((tier) => tier === value);
}

/**
 * End of a reservation started at `start`. Offsets are applied in UTC so that a
 * day is always 24 hours regardless of the office's DST rules.
 */
export function computeEnd(start: Date, tier: DurationTier): Date {
  if (!isDurationTier(tier)) {
    throw new Error(`Unknown duration tier: ${String(tier)}`);
  }
  return DateTime.fromJSDate(start, { zone: 'utc' }).plus(OFFSETS[tier]).toJSDate();
}
