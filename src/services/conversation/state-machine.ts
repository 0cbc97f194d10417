import type { ChoiceKind } from '@services/messaging/message.types.js';

import type { ConversationEvent, ConversationState, SessionState } from './state.types.js';

/** Choices honoured in every state, including idle. */
export const GLOBAL_CHOICES: readonly ChoiceKind[] = ['START', 'RETURN', 'CLAIM', 'LEAVE_WAITLIST'];

interface StateRule {
  accepts: 'text' | 'choice' | 'photo' | 'none';
  choices: readonly ChoiceKind[];
  next: readonly ConversationState[];
}

const BOOKING_ENTRY: readonly ConversationState[] = ['NEED_NAME', 'NEED_LOCATION', 'CHOOSING_ACTION'];

const STATES: Record<ConversationState, StateRule> = {
  IDLE: {
    accepts: 'none',
    choices: [],
    next: [...BOOKING_ENTRY, 'NEED_CONFIRMATION', 'NEED_WAITLIST_CHOICE', 'NEED_RETURN_PHOTO', 'IDLE'],
  },
  NEED_NAME: { accepts: 'text', choices: [], next: ['NEED_LOCATION'] },
  NEED_LOCATION: { accepts: 'choice', choices: ['LOCATION'], next: ['CHOOSING_ACTION'] },
  CHOOSING_ACTION: {
    accepts: 'text',
    choices: ['ACTION'],
    next: ['NEED_TITLE', 'NEED_CONFIRMATION', 'NEED_WAITLIST_CHOICE', 'NEED_RETRY_CHOICE', 'IDLE'],
  },
  NEED_TITLE: {
    accepts: 'text',
    choices: ['ACTION'],
    next: ['NEED_CONFIRMATION', 'NEED_WAITLIST_CHOICE', 'NEED_RETRY_CHOICE', 'IDLE'],
  },
  NEED_CONFIRMATION: {
    accepts: 'choice',
    choices: ['CONFIRM'],
    next: ['NEED_DURATION', 'NEED_RETRY_CHOICE'],
  },
  NEED_WAITLIST_CHOICE: {
    accepts: 'choice',
    choices: ['WAITLIST'],
    next: ['NEED_RETRY_CHOICE', 'IDLE'],
  },
  NEED_RETRY_CHOICE: { accepts: 'choice', choices: ['RETRY'], next: ['CHOOSING_ACTION', 'IDLE'] },
  NEED_DURATION: {
    accepts: 'choice',
    choices: ['DURATION', 'RETRY'],
    next: ['BOOKING_ACKNOWLEDGED', 'CHOOSING_ACTION', 'IDLE'],
  },
  NEED_RETURN_PHOTO: { accepts: 'photo', choices: [], next: ['RETURN_ACKNOWLEDGED', 'IDLE'] },
  BOOKING_ACKNOWLEDGED: { accepts: 'none', choices: [], next: ['IDLE'] },
  RETURN_ACKNOWLEDGED: { accepts: 'none', choices: [], next: ['IDLE'] },
};

/** The session is destroyed once one of these is reached. */
export const TERMINAL: ReadonlySet<ConversationState> = new Set([
  'BOOKING_ACKNOWLEDGED',
  'RETURN_ACKNOWLEDGED',
  'IDLE',
]);

export type RejectReason =
  | 'buttons_only'
  | 'text_expected'
  | 'photo_expected'
  | 'invalid_choice'
  | 'idle_hint';

export type Route =
  | { kind: 'start' }
  | { kind: 'global' }
  | { kind: 'text' }
  | { kind: 'choice' }
  | { kind: 'photo' }
  | { kind: 'reject'; reason: RejectReason };

function rejectFor(rule: StateRule, event: ConversationEvent): RejectReason {
  if (rule.accepts === 'photo') return 'photo_expected';
  if (rule.accepts === 'text' && (rule.choices.length === 0 || event.type === 'PHOTO')) {
    return 'text_expected';
  }
  return 'buttons_only';
}

/**
 * Transition table of the booking dialogue. Decides whether an event is
 * acceptable in a state; the service performs the side effects.
 */
export class ConversationStateMachine {
  route(state: ConversationState, event: ConversationEvent): Route {
    if (event.type === 'START') return { kind: 'start' };

    if (event.type === 'CHOICE' && event.choice.kind === 'START') return { kind: 'start' };
    if (event.type === 'CHOICE' && GLOBAL_CHOICES.includes(event.choice.kind)) {
      return { kind: 'global' };
    }

    const rule = STATES[state];
    if (state === 'IDLE') return { kind: 'reject', reason: 'idle_hint' };

    switch (event.type) {
      case 'TEXT':
        return rule.accepts === 'text' ? { kind: 'text' } : { kind: 'reject', reason: rejectFor(rule, event) };
      case 'PHOTO':
        return rule.accepts === 'photo' ? { kind: 'photo' } : { kind: 'reject', reason: rejectFor(rule, event) };
      case 'CHOICE':
        if (rule.choices.includes(event.choice.kind)) return { kind: 'choice' };
        return {
          kind: 'reject',
          reason: rule.accepts === 'choice' ? 'invalid_choice' : rejectFor(rule, event),
        };
    }
  }

  canTransition(from: ConversationState, to: ConversationState): boolean {
    return from === to || STATES[from].next.includes(to);
  }

  assertTransition(from: ConversationState, to: ConversationState): void {
    if (!this.canTransition(from, to)) {
      throw new Error(`Illegal conversation transition ${from} -> ${to}`);
    }
  }

  acceptedChoices(state: SessionState): readonly ChoiceKind[] {
    return STATES[state].choices;
  }
}
