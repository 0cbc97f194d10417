import type { LibraryStore } from '@core/repositories/library.repo.js';

import { systemClock, type Clock } from '@utils/time.js';

import { ConversationService } from './conversation/conversation.service.js';
import type { SessionStore } from './conversation/session.store.js';
import { CatalogService } from './library/catalog.service.js';
import { ReservationService } from './library/reservation.service.js';
import type { Notifier } from './messaging/message.types.js';
import { ReminderService } from './reminders/reminder.service.js';
import { readReminderSchedule, type ScheduleSettings } from './reminders/reminder.schedule.js';
import { WaitlistService } from './waitlist/waitlist.service.js';

export interface ServiceSettings extends ScheduleSettings {
  LOCATIONS: readonly string[];
}

export interface ServiceDeps {
  store: LibraryStore;
  sessions: SessionStore;
  notifier: Notifier;
  settings: ServiceSettings;
  clock?: Clock;
}

export interface Services {
  catalog: CatalogService;
  waitlist: WaitlistService;
  reservations: ReservationService;
  reminders: ReminderService;
  conversation: ConversationService;
}

/** Wires the engine around one store, one session store and one notifier. */
export function buildServices({ store, sessions, notifier, settings, clock = systemClock }: ServiceDeps): Services {
  const catalog = new CatalogService(store);
  const waitlist = new WaitlistService(store, notifier, clock);
  const reservations = new ReservationService(store, waitlist, clock);
  const reminders = new ReminderService(store, notifier, readReminderSchedule(settings), clock);
  const conversation = new ConversationService({
    catalog,
    reservations,
    waitlist,
    sessions,
    notifier,
    locations: settings.LOCATIONS,
    clock,
  });
  return { catalog, waitlist, reservations, reminders, conversation };
}
