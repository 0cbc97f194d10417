import type { DurationTier } from '@core/interfaces/library.types.js';

import type { Choice, OutboundMessage } from '@services/messaging/message.types.js';

export type SessionState =
  | 'NEED_NAME'
  | 'NEED_LOCATION'
  | 'CHOOSING_ACTION'
  | 'NEED_TITLE'
  | 'NEED_CONFIRMATION'
  | 'NEED_WAITLIST_CHOICE'
  | 'NEED_RETRY_CHOICE'
  | 'NEED_DURATION'
  | 'NEED_RETURN_PHOTO'
  | 'BOOKING_ACKNOWLEDGED'
  | 'RETURN_ACKNOWLEDGED';

/** `IDLE` means the user has no session at all. */
export type ConversationState = SessionState | 'IDLE';

export interface SessionData {
  firstName?: string;
  lastName?: string;
  location?: string;
  bookId?: number;
  bookTitle?: string;
  duration?: DurationTier;
}

export interface SessionV1 {
  machineVersion: 1;
  state: SessionState;
  data: SessionData;
  updatedAt: string;
}

export type Session = SessionV1;

export type ConversationEvent =
  | { type: 'TEXT'; text: string }
  | { type: 'CHOICE'; choice: Choice }
  | { type: 'PHOTO'; photoRef: string }
  | { type: 'START' };

export type EventType = ConversationEvent['type'];

export interface HandleResult {
  state: ConversationState;
  replies: OutboundMessage[];
}
