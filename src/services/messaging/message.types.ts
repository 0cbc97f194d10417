import type { DurationTier } from '@core/interfaces/library.types.js';

/** A discrete answer the user can give by tapping a button. */
export type Choice =
  | { kind: 'START' }
  | { kind: 'LOCATION'; location: string }
  | { kind: 'ACTION'; action: 'BOOK' | 'LIST' }
  | { kind: 'CONFIRM'; answer: 'YES' | 'NO' }
  | { kind: 'RETRY'; answer: 'ANOTHER' | 'CANCEL' }
  | { kind: 'WAITLIST'; answer: 'JOIN' | 'DECLINE' }
  | { kind: 'DURATION'; tier: DurationTier }
  | { kind: 'RETURN'; bookId: number }
  | { kind: 'CLAIM'; bookId: number }
  | { kind: 'LEAVE_WAITLIST'; bookId: number };

export type ChoiceKind = Choice['kind'];

export const MESSAGE_KEYS = [
  'welcome',
  'ask_name',
  'ask_name_again',
  'ask_location',
  'choose_action',
  'ask_title',
  'book_list',
  'title_not_found',
  'confirm_book',
  'book_taken',
  'booking_declined',
  'booking_cancelled',
  'no_suitable_book',
  'ask_duration',
  'booking_confirmed',
  'booking_conflict',
  'already_booked',
  'waitlist_joined',
  'waitlist_already',
  'waitlist_left',
  'waitlist_available',
  'ask_return_photo',
  'return_confirmed',
  'no_active_reservation',
  'reservation_mismatch',
  'buttons_only',
  'text_expected',
  'photo_expected',
  'invalid_choice',
  'idle_hint',
  'temporary_error',
  'group_booked',
  'group_returned',
  'reminder_due_soon',
  'reminder_checkpoint',
  'reminder_overdue',
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

export type MessageParam = string | number | Date | string[];

export type MessageParams = Record<string, MessageParam>;

/**
 * Wording-free outbound message. The core names what to say and which choices
 * to offer; a renderer owns the text.
 */
export interface OutboundMessage {
  key: MessageKey;
  params?: MessageParams;
  choices?: Choice[];
}

/**
 * Delivery port. Every method resolves once the transport accepted the message
 * and rejects with `DeliveryFailureError` otherwise (timeouts included).
 */
export interface Notifier {
  sendToUser(userId: number, message: OutboundMessage): Promise<void>;
  sendToGroup(message: OutboundMessage): Promise<void>;
  sendPhotoToGroup(photoRef: string, message: OutboundMessage): Promise<void>;
}

export function message(key: MessageKey, params?: MessageParams, choices?: Choice[]): OutboundMessage {
  const out: OutboundMessage = { key };
  if (params) out.params = params;
  if (choices && choices.length > 0) out.choices = choices;
  return out;
}
