import { ActiveReservationExistsError } from '@core/errors/active-reservation-exists.error.js';
import { BaseError } from '@core/errors/base-error.js';
import { NoActiveReservationError } from '@core/errors/no-active-reservation.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { ReservationMismatchError } from '@core/errors/reservation-mismatch.error.js';
import { ResourceUnavailableError } from '@core/errors/resource-unavailable.error.js';
import { StoreUnavailableError } from '@core/errors/store-unavailable.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type { Book, DurationTier, User } from '@core/interfaces/library.types.js';

import type { CatalogService } from '@services/library/catalog.service.js';
import { DURATION_TIERS } from '@services/library/durations.js';
import type { ReservationService } from '@services/library/reservation.service.js';
import {
  message,
  type Choice,
  type Notifier,
  type OutboundMessage,
} from '@services/messaging/message.types.js';
import type { WaitlistService } from '@services/waitlist/waitlist.service.js';

import { KeyedSerialQueue } from '@utils/keyed-queue.js';
import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import type { SessionStore } from './session.store.js';
import { ConversationStateMachine, TERMINAL, type RejectReason } from './state-machine.js';
import type {
  ConversationEvent,
  ConversationState,
  HandleResult,
  Session,
  SessionData,
  SessionState,
} from './state.types.js';

export interface ConversationDeps {
  catalog: CatalogService;
  reservations: ReservationService;
  waitlist: WaitlistService;
  sessions: SessionStore;
  notifier: Notifier;
  locations: readonly string[];
  clock?: Clock;
}

interface Step {
  next: ConversationState;
  data: SessionData;
  replies: OutboundMessage[];
}

const START: Choice = { kind: 'START' };
const DECLINE_WORDS = new Set(['нет', 'no']);

const ACTION_CHOICES: Choice[] = [
  { kind: 'ACTION', action: 'BOOK' },
  { kind: 'ACTION', action: 'LIST' },
];
const RETRY_CHOICES: Choice[] = [
  { kind: 'RETRY', answer: 'ANOTHER' },
  { kind: 'RETRY', answer: 'CANCEL' },
];
const DURATION_CHOICES: Choice[] = DURATION_TIERS.map((tier): Choice => ({ kind: 'DURATION', tier }));

/** "Анна  Петрова" -> first and last name; the last name keeps any extra tokens. */
export function parseFullName(text: string): { firstName: string; lastName: string } {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  const [firstName, ...rest] = tokens;
  if (!firstName || rest.length === 0) {
    throw new ValidationError('Full name needs a first and a last name', 'name');
  }
  return { firstName, lastName: rest.join(' ') };
}

function fullName(data: SessionData | User): string {
  return [data.firstName, data.lastName].filter(Boolean).join(' ');
}

function withoutCandidate(data: SessionData): SessionData {
  const { bookId: _bookId, bookTitle: _bookTitle, duration: _duration, ...rest } = data;
  return rest;
}

function bookParams(book: Book): Record<string, string> {
  const params: Record<string, string> = {
    title: book.title,
    author: book.author,
    location: book.location,
  };
  if (book.shelf) params.shelf = book.shelf;
  if (book.floor) params.floor = book.floor;
  return params;
}

/**
 * Per-user booking dialogue. Events of one user are handled strictly in arrival
 * order; user-facing failures become replies and keep the collected fields.
 */
export class ConversationService {
  private readonly sm = new ConversationStateMachine();
  private readonly queue = new KeyedSerialQueue();
  private readonly clock: Clock;

  constructor(private readonly deps: ConversationDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  handle(userId: number, event: ConversationEvent): Promise<HandleResult> {
    return this.queue.run(String(userId), () => this.process(userId, event));
  }

  private async process(userId: number, event: ConversationEvent): Promise<HandleResult> {
    let session: Session | null;
    try {
      session = await this.deps.sessions.get(userId);
    } catch (err) {
      logger.error({ userId, err }, '[conversation] session read failed');
      return { state: 'IDLE', replies: [message('temporary_error')] };
    }

    const current: ConversationState = session?.state ?? 'IDLE';
    const data: SessionData = { ...(session?.data ?? {}) };
    const route = this.sm.route(current, event);

    let step: Step;
    try {
      switch (route.kind) {
        case 'start':
          step = await this.startFlow(userId);
          break;
        case 'global':
          step = await this.onGlobalChoice(userId, current, data, event);
          break;
        case 'reject':
          step = { next: current, data, replies: [this.rejection(route.reason)] };
          break;
        default:
          step = await this.onStateEvent(userId, this.asSessionState(current), data, event);
      }
      const from = route.kind === 'start' || route.kind === 'global' ? 'IDLE' : current;
      if (step.next !== current) this.sm.assertTransition(from, step.next);
    } catch (err) {
      step = this.recover(userId, current, data, err);
    }

    await this.persist(userId, step);
    return { state: step.next, replies: step.replies };
  }

  private asSessionState(state: ConversationState): SessionState {
    if (state === 'IDLE') throw new Error('Idle conversations have no state handler');
    return state;
  }

  private async persist(userId: number, step: Step): Promise<void> {
    try {
      if (TERMINAL.has(step.next)) {
        await this.deps.sessions.clear(userId);
        return;
      }
      await this.deps.sessions.save(userId, {
        machineVersion: 1,
        state: this.asSessionState(step.next),
        data: step.data,
        updatedAt: this.clock.now().toISOString(),
      });
    } catch (err) {
      logger.error({ userId, next: step.next, err }, '[conversation] session write failed');
    }
  }

  private async onStateEvent(
    userId: number,
    state: SessionState,
    data: SessionData,
    event: ConversationEvent,
  ): Promise<Step> {
    if (event.type === 'TEXT') {
      if (state === 'NEED_NAME') return this.onName(userId, data, event.text);
      return this.onTitle(userId, data, event.text);
    }
    if (event.type === 'PHOTO') return this.onReturnPhoto(userId, data, event.photoRef);
    if (event.type !== 'CHOICE') throw new Error(`Unrouted ${event.type} event in ${state}`);

    const choice = event.choice;
    switch (choice.kind) {
      case 'LOCATION':
        return this.onLocation(userId, data, choice.location);
      case 'ACTION':
        return this.onAction(userId, data, choice.action);
      case 'CONFIRM':
        return this.onConfirm(data, choice.answer);
      case 'RETRY':
        return this.onRetry(data, choice.answer);
      case 'WAITLIST':
        return this.onWaitlistChoice(userId, data, choice.answer);
      case 'DURATION':
        return this.onDuration(userId, data, choice.tier);
      default:
        throw new Error(`Unrouted ${choice.kind} choice in ${state}`);
    }
  }

  private async onGlobalChoice(
    userId: number,
    current: ConversationState,
    data: SessionData,
    event: ConversationEvent,
  ): Promise<Step> {
    if (event.type !== 'CHOICE') throw new Error(`Unrouted global ${event.type} event`);
    const choice = event.choice;
    switch (choice.kind) {
      case 'RETURN':
        return this.onReturnRequested(userId, choice.bookId);
      case 'CLAIM':
        return this.onClaim(userId, choice.bookId);
      case 'LEAVE_WAITLIST':
        return this.onLeaveWaitlist(userId, current, data, choice.bookId);
      default:
        throw new Error(`Unrouted global ${choice.kind} choice`);
    }
  }

  private async startFlow(userId: number): Promise<Step> {
    const user = await this.deps.reservations.getUser(userId);
    if (!user) {
      return { next: 'NEED_NAME', data: {}, replies: [message('welcome'), message('ask_name')] };
    }

    const active = await this.deps.reservations.getActiveReservation(userId);
    if (active) return this.alreadyBooked(user.firstName, active.bookId);

    const data: SessionData = { firstName: user.firstName, lastName: user.lastName };
    if (!user.location) {
      return { next: 'NEED_LOCATION', data, replies: [this.askLocation(user.firstName)] };
    }
    return {
      next: 'CHOOSING_ACTION',
      data: { ...data, location: user.location },
      replies: [message('choose_action', { name: user.firstName }, ACTION_CHOICES)],
    };
  }

  private alreadyBooked(name: string, bookId: number): Step {
    return {
      next: 'IDLE',
      data: {},
      replies: [message('already_booked', { name }, [{ kind: 'RETURN', bookId }])],
    };
  }

  private askLocation(name: string): OutboundMessage {
    return message(
      'ask_location',
      { name },
      this.deps.locations.map((location): Choice => ({ kind: 'LOCATION', location })),
    );
  }

  private async onName(userId: number, data: SessionData, text: string): Promise<Step> {
    const { firstName, lastName } = parseFullName(text);
    await this.deps.reservations.registerUser({ id: userId, firstName, lastName });
    return {
      next: 'NEED_LOCATION',
      data: { ...data, firstName, lastName },
      replies: [this.askLocation(firstName)],
    };
  }

  private async onLocation(userId: number, data: SessionData, location: string): Promise<Step> {
    if (!this.deps.locations.includes(location)) {
      throw new ValidationError(`Unknown location ${location}`, 'location');
    }
    await this.deps.reservations.assignLocation(userId, location);
    return {
      next: 'CHOOSING_ACTION',
      data: { ...data, location },
      replies: [message('choose_action', { name: data.firstName ?? '' }, ACTION_CHOICES)],
    };
  }

  private async onAction(userId: number, data: SessionData, action: 'BOOK' | 'LIST'): Promise<Step> {
    if (action === 'BOOK') {
      return { next: 'NEED_TITLE', data, replies: [message('ask_title')] };
    }
    const location = await this.locationOf(userId, data);
    const books = await this.deps.catalog.listAvailable(location);
    return {
      next: 'NEED_TITLE',
      data,
      replies: [
        message('book_list', {
          location,
          books: books.map((b) => `${b.title} - ${b.author}`),
        }),
      ],
    };
  }

  private async locationOf(userId: number, data: SessionData): Promise<string> {
    if (data.location) return data.location;
    const user = await this.deps.reservations.getUser(userId);
    if (!user?.location) throw new NotFoundError('User has no location on file');
    return user.location;
  }

  private async onTitle(userId: number, data: SessionData, text: string): Promise<Step> {
    if (DECLINE_WORDS.has(text.trim().toLowerCase())) {
      return { next: 'IDLE', data: {}, replies: [message('no_suitable_book', {}, [START])] };
    }

    const location = await this.locationOf(userId, data);
    const book = await this.deps.catalog.findResource(text, location);
    if (!book) {
      return {
        next: 'NEED_RETRY_CHOICE',
        data: { ...data, location },
        replies: [message('title_not_found', { title: text.trim(), location }, RETRY_CHOICES)],
      };
    }

    const candidate: SessionData = { ...data, location, bookId: book.id, bookTitle: book.title };
    if (book.status === 'booked') {
      return {
        next: 'NEED_WAITLIST_CHOICE',
        data: candidate,
        replies: [
          message('book_taken', { title: book.title }, [
            { kind: 'WAITLIST', answer: 'JOIN' },
            { kind: 'WAITLIST', answer: 'DECLINE' },
          ]),
        ],
      };
    }
    return {
      next: 'NEED_CONFIRMATION',
      data: candidate,
      replies: [
        message('confirm_book', bookParams(book), [
          { kind: 'CONFIRM', answer: 'YES' },
          { kind: 'CONFIRM', answer: 'NO' },
        ]),
      ],
    };
  }

  private async onConfirm(data: SessionData, answer: 'YES' | 'NO'): Promise<Step> {
    if (answer === 'YES') {
      return {
        next: 'NEED_DURATION',
        data,
        replies: [message('ask_duration', { title: data.bookTitle ?? '' }, DURATION_CHOICES)],
      };
    }
    return this.declined(data);
  }

  private declined(data: SessionData): Step {
    return {
      next: 'NEED_RETRY_CHOICE',
      data: withoutCandidate(data),
      replies: [message('booking_declined', {}, RETRY_CHOICES)],
    };
  }

  private async onRetry(data: SessionData, answer: 'ANOTHER' | 'CANCEL'): Promise<Step> {
    if (answer === 'CANCEL') {
      return { next: 'IDLE', data: {}, replies: [message('booking_cancelled', {}, [START])] };
    }
    return {
      next: 'CHOOSING_ACTION',
      data: withoutCandidate(data),
      replies: [message('choose_action', { name: data.firstName ?? '' }, ACTION_CHOICES)],
    };
  }

  private async onWaitlistChoice(
    userId: number,
    data: SessionData,
    answer: 'JOIN' | 'DECLINE',
  ): Promise<Step> {
    if (answer === 'DECLINE') return this.declined(data);
    const bookId = this.requireBook(data);
    const queued = await this.deps.waitlist.enqueue(userId, bookId);
    return {
      next: 'IDLE',
      data: {},
      replies: [
        message(queued ? 'waitlist_joined' : 'waitlist_already', { title: data.bookTitle ?? '' }, [
          { kind: 'LEAVE_WAITLIST', bookId },
        ]),
      ],
    };
  }

  private requireBook(data: SessionData): number {
    if (data.bookId === undefined) throw new Error('Session lost its candidate book');
    return data.bookId;
  }

  private async onDuration(userId: number, data: SessionData, tier: DurationTier): Promise<Step> {
    const bookId = this.requireBook(data);
    // recorded before the attempt so a failure keeps it in the session
    data.duration = tier;

    const reservation = await this.deps.reservations.createReservation(userId, bookId, tier);
    const name = fullName(data);

    await this.broadcast(
      () =>
        this.deps.notifier.sendToGroup(
          message('group_booked', {
            name,
            title: reservation.bookTitle,
            location: reservation.location,
            duration: tier,
            endsAt: reservation.endAt,
          }),
        ),
      { userId, bookId },
    );

    return {
      next: 'BOOKING_ACKNOWLEDGED',
      data,
      replies: [
        message(
          'booking_confirmed',
          {
            name: data.firstName ?? '',
            title: reservation.bookTitle,
            duration: tier,
            endsAt: reservation.endAt,
          },
          [{ kind: 'RETURN', bookId }],
        ),
      ],
    };
  }

  private async onReturnRequested(userId: number, bookId: number): Promise<Step> {
    const active = await this.deps.reservations.assertHolds(userId, bookId);
    return {
      next: 'NEED_RETURN_PHOTO',
      data: { bookId, bookTitle: active.bookTitle },
      replies: [message('ask_return_photo', { title: active.bookTitle })],
    };
  }

  private async onReturnPhoto(userId: number, data: SessionData, photoRef: string): Promise<Step> {
    const bookId = this.requireBook(data);
    const completed = await this.deps.reservations.completeReservation(userId, bookId);
    const user = await this.deps.reservations.getUser(userId);

    await this.broadcast(
      () =>
        this.deps.notifier.sendPhotoToGroup(
          photoRef,
          message('group_returned', {
            name: user ? fullName(user) : '',
            title: completed.bookTitle,
            location: completed.location,
          }),
        ),
      { userId, bookId },
    );

    return {
      next: 'RETURN_ACKNOWLEDGED',
      data,
      replies: [message('return_confirmed', { title: completed.bookTitle }, [START])],
    };
  }

  private async onClaim(userId: number, bookId: number): Promise<Step> {
    const user = await this.deps.reservations.getUser(userId);
    if (!user || !user.location) return this.startFlow(userId);

    const active = await this.deps.reservations.getActiveReservation(userId);
    if (active) return this.alreadyBooked(user.firstName, active.bookId);

    const book = await this.deps.catalog.findResourceById(bookId);
    if (!book) throw new NotFoundError('Book not found');

    const data: SessionData = {
      firstName: user.firstName,
      lastName: user.lastName,
      location: book.location,
      bookId: book.id,
      bookTitle: book.title,
    };
    if (book.status === 'booked') {
      return {
        next: 'NEED_WAITLIST_CHOICE',
        data,
        replies: [
          message('book_taken', { title: book.title }, [
            { kind: 'WAITLIST', answer: 'JOIN' },
            { kind: 'WAITLIST', answer: 'DECLINE' },
          ]),
        ],
      };
    }
    return {
      next: 'NEED_CONFIRMATION',
      data,
      replies: [
        message('confirm_book', bookParams(book), [
          { kind: 'CONFIRM', answer: 'YES' },
          { kind: 'CONFIRM', answer: 'NO' },
        ]),
      ],
    };
  }

  private async onLeaveWaitlist(
    userId: number,
    current: ConversationState,
    data: SessionData,
    bookId: number,
  ): Promise<Step> {
    const book = await this.deps.catalog.findResourceById(bookId);
    await this.deps.waitlist.remove(userId, bookId);
    return {
      next: current,
      data,
      replies: [message('waitlist_left', { title: book?.title ?? '' })],
    };
  }

  /** Group broadcasts are attempted once; a failure never undoes the user's action. */
  private async broadcast(send: () => Promise<void>, context: Record<string, unknown>) {
    try {
      await send();
    } catch (err) {
      logger.warn({ ...context, err }, '[conversation] group broadcast failed');
    }
  }

  private rejection(reason: RejectReason): OutboundMessage {
    return reason === 'idle_hint' ? message(reason, {}, [START]) : message(reason);
  }

  private recover(
    userId: number,
    current: ConversationState,
    data: SessionData,
    err: unknown,
  ): Step {
    const stay = (reply: OutboundMessage): Step => ({ next: current, data, replies: [reply] });

    if (err instanceof ValidationError) {
      return stay(message(err.field === 'name' ? 'ask_name_again' : 'invalid_choice'));
    }
    if (err instanceof ResourceUnavailableError) {
      const retry: Choice[] = data.duration ? [{ kind: 'DURATION', tier: data.duration }] : [];
      return stay(
        message('booking_conflict', { title: data.bookTitle ?? '' }, [
          ...retry,
          { kind: 'RETRY', answer: 'ANOTHER' },
        ]),
      );
    }
    if (err instanceof ActiveReservationExistsError) {
      return this.alreadyBooked(data.firstName ?? '', err.bookId);
    }
    if (err instanceof NoActiveReservationError) {
      const next = current === 'NEED_RETURN_PHOTO' ? 'IDLE' : current;
      return { next, data, replies: [message('no_active_reservation', {}, [START])] };
    }
    if (err instanceof ReservationMismatchError) {
      return stay(message('reservation_mismatch'));
    }
    if (err instanceof NotFoundError) {
      return stay(message('invalid_choice'));
    }
    if (err instanceof StoreUnavailableError) {
      logger.warn({ userId, state: current, err: err.message }, '[conversation] store unavailable');
      const retry: Choice[] =
        current === 'NEED_DURATION' && data.duration
          ? [{ kind: 'DURATION', tier: data.duration }]
          : [];
      return stay(message('temporary_error', {}, retry));
    }

    const code = err instanceof BaseError ? err.code : 'UNEXPECTED';
    logger.error({ userId, state: current, code, err }, '[conversation] event handling failed');
    return stay(message('temporary_error'));
  }
}
