import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  retries?: number;
  base?: number;
  max?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 4, base = 250, max = 8000, shouldRetry = isTransient, onRetry } = options;
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      const delay = computeDelay(attempt, base, max);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
      attempt += 1;
    }
  }
}

export function computeDelay(attempt: number, base: number, max: number): number {
  const exponential = base * 2 ** attempt;
  const capped = Math.min(max, exponential);
  const jitter = capped / 2 + Math.random() * (capped / 2);
  return Math.max(base, Math.min(max, Math.round(jitter)));
}

/** 408, 429 and 5xx, read from `status`, `response.status` or `code`. */
export function isTransient(error: unknown): boolean {
  const status = extractStatus(error);
  if (status === null) return false;
  if (status === 408 || status === 429) return true;
  return status >= 500;
}

function extractStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') {
    return null;
  }

  const candidates: unknown[] = [];
  if ('status' in error) candidates.push(error.status);
  if ('response' in error && error.response && typeof error.response === 'object') {
    if ('status' in error.response) candidates.push(error.response.status);
  }
  if ('code' in error) candidates.push(error.code);

  for (const candidate of candidates) {
    const parsed = parseStatus(candidate);
    if (parsed !== null) {
      return parsed;
    }
  }
  return null;
}

function parseStatus(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d{3}$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}
