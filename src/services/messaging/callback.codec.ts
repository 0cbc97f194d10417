import { ValidationError } from '@core/errors/validation.error.js';

import { isDurationTier } from '@services/library/durations.js';

import type { Choice } from './message.types.js';

function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Encodes choices into button payloads of the form `prefix:value`. Books travel
 * by id and offices by their index in the configured list, so payloads stay
 * short and never carry titles.
 */
export class CallbackCodec {
  constructor(private readonly locations: readonly string[]) {}

  encode(choice: Choice): string {
    switch (choice.kind) {
      case 'START':
        return 'start';
      case 'LOCATION': {
        const index = this.locations.indexOf(choice.location);
        if (index < 0) throw new ValidationError(`Unknown location ${choice.location}`, 'location');
        return `loc:${index}`;
      }
      case 'ACTION':
        return `act:${choice.action.toLowerCase()}`;
      case 'CONFIRM':
        return `cfm:${choice.answer.toLowerCase()}`;
      case 'RETRY':
        return `rty:${choice.answer.toLowerCase()}`;
      case 'WAITLIST':
        return `wl:${choice.answer.toLowerCase()}`;
      case 'DURATION':
        return `dur:${choice.tier}`;
      case 'RETURN':
        return `ret:${choice.bookId}`;
      case 'CLAIM':
        return `clm:${choice.bookId}`;
      case 'LEAVE_WAITLIST':
        return `lv:${choice.bookId}`;
    }
  }

  /** Null for payloads this codec never produced. */
  decode(data: string): Choice | null {
    if (data === 'start') return { kind: 'START' };
    const sep = data.indexOf(':');
    if (sep < 0) return null;
    const prefix = data.slice(0, sep);
    const value = data.slice(sep + 1);

    switch (prefix) {
      case 'loc': {
        const index = parseId(value);
        const location = index === null ? undefined : this.locations[index];
        return location === undefined ? null : { kind: 'LOCATION', location };
      }
      case 'act':
        if (value === 'book') return { kind: 'ACTION', action: 'BOOK' };
        if (value === 'list') return { kind: 'ACTION', action: 'LIST' };
        return null;
      case 'cfm':
        if (value === 'yes') return { kind: 'CONFIRM', answer: 'YES' };
        if (value === 'no') return { kind: 'CONFIRM', answer: 'NO' };
        return null;
      case 'rty':
        if (value === 'another') return { kind: 'RETRY', answer: 'ANOTHER' };
        if (value === 'cancel') return { kind: 'RETRY', answer: 'CANCEL' };
        return null;
      case 'wl':
        if (value === 'join') return { kind: 'WAITLIST', answer: 'JOIN' };
        if (value === 'decline') return { kind: 'WAITLIST', answer: 'DECLINE' };
        return null;
      case 'dur':
        return isDurationTier(value) ? { kind: 'DURATION', tier: value } : null;
      case 'ret':
      case 'clm':
      case 'lv': {
        const bookId = parseId(value);
        if (bookId === null) return null;
        if (prefix === 'ret') return { kind: 'RETURN', bookId };
        if (prefix === 'clm') return { kind: 'CLAIM', bookId };
        return { kind: 'LEAVE_WAITLIST', bookId };
      }
      default:
        return null;
    }
  }
}
