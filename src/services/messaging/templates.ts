import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { config } from '@config/env.config.js';

import { isDurationTier } from '@services/library/durations.js';

import { formatLocal } from '@utils/time.js';

import { MESSAGE_KEYS, type Choice, type MessageParam, type OutboundMessage } from './message.types.js';

const TemplatesSchema = z.object({
  messages: z.record(z.string()),
  buttons: z.record(z.string()),
  durations: z.object({
    HOUR: z.string(),
    DAY: z.string(),
    WEEK: z.string(),
    MONTH: z.string(),
  }),
  emptyList: z.string(),
});

export type Templates = z.infer<typeof TemplatesSchema>;

const DEFAULT_TEMPLATES = new URL('./messages.ru.json', import.meta.url);

export function loadTemplates(url: URL = DEFAULT_TEMPLATES): Templates {
  const parsed = TemplatesSchema.safeParse(JSON.parse(readFileSync(url, 'utf8')));
  if (!parsed.success) {
    throw new Error(`Invalid message templates ${url.pathname}: ${parsed.error.message}`);
  }
  const missing = MESSAGE_KEYS.filter((key) => !(key in parsed.data.messages));
  if (missing.length > 0) {
    throw new Error(`Message templates lack keys: ${missing.join(', ')}`);
  }
  return parsed.data;
}

const OPTIONAL = /\[\[(.*?)\]\]/gs;
const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Turns message keys into text. Placeholders are `{name}`; a `[[...]]` segment is
 * dropped unless every placeholder inside it has a value.
 */
export class MessageRenderer {
  constructor(
    private readonly templates: Templates = loadTemplates(),
    private readonly timezone: string = config.TIMEZONE,
  ) {}

  text(msg: OutboundMessage): string {
    const params = msg.params ?? {};
    const template = this.templates.messages[msg.key] ?? msg.key;
    const has = (name: string) => {
      const value = params[name];
      return value !== undefined && value !== '';
    };
    return template
      .replace(OPTIONAL, (_match, segment: string) => {
        const names = [...segment.matchAll(PLACEHOLDER)].map((m) => m[1] ?? '');
        return names.every(has) ? segment : '';
      })
      .replace(PLACEHOLDER, (_match, name: string) => {
        const value = params[name];
        return value === undefined ? '' : this.format(name, value);
      });
  }

  label(choice: Choice): string {
    const buttons = this.templates.buttons;
    switch (choice.kind) {
      case 'LOCATION':
        return choice.location;
      case 'DURATION':
        return this.templates.durations[choice.tier];
      case 'ACTION':
        return buttons[`ACTION.${choice.action}`] ?? choice.action;
      case 'CONFIRM':
      case 'RETRY':
      case 'WAITLIST':
        return buttons[`${choice.kind}.${choice.answer}`] ?? choice.answer;
      default:
        return buttons[choice.kind] ?? choice.kind;
    }
  }

  private format(name: string, value: MessageParam): string {
    if (value instanceof Date) return formatLocal(value, this.timezone);
    if (Array.isArray(value)) {
      if (value.length === 0) return this.templates.emptyList;
      return value.map((item, i) => `${i + 1}. ${item}`).join('\n');
    }
    if (name === 'duration' && isDurationTier(value)) return this.templates.durations[value];
    return String(value);
  }
}
