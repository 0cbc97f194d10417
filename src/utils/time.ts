import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function zoneOf(tz?: string): string {
  return tz || config.TIMEZONE || 'Europe/Moscow';
}

export function toLocal(date: Date, tz?: string): DateTime {
  return DateTime.fromJSDate(date).setZone(zoneOf(tz));
}

export function formatLocal(date: Date, tz?: string): string {
  return toLocal(date, tz).toFormat('dd.LL.yyyy HH:mm');
}
