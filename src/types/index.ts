import type { ConversationEvent } from '@services/conversation/state.types.js';

export type UserId = number;

/** A chat update reduced to what the conversation needs, as queued for the worker. */
export interface InboundUpdate {
  updateId: number;
  userId: UserId;
  event: ConversationEvent;
  /** Set for button taps; the worker acknowledges it once handled. */
  callbackQueryId?: string;
}
