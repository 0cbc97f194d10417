import axios, { type AxiosInstance } from 'axios';

import { config } from '@config/env.config.js';

export interface InlineButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboard {
  inline_keyboard: InlineButton[][];
}

interface TelegramResponse {
  ok: boolean;
  description?: string;
  error_code?: number;
}

export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly status: number,
    description?: string,
  ) {
    super(`Telegram ${method} failed (${status}): ${description ?? 'no description'}`);
    this.name = 'TelegramApiError';
  }
}

let instance: AxiosInstance | null = null;

function createInstance(): AxiosInstance {
  const { TELEGRAM_BOT_TOKEN, TELEGRAM_API_URL, NOTIFY_TIMEOUT_MS } = config;
  if (!TELEGRAM_BOT_TOKEN) {
    throw new Error('TELEGRAM_BOT_TOKEN is not configured');
  }
  return axios.create({
    baseURL: `${TELEGRAM_API_URL}/bot${TELEGRAM_BOT_TOKEN}`,
    headers: { 'Content-Type': 'application/json' },
    timeout: NOTIFY_TIMEOUT_MS,
    validateStatus: (s) => s < 500,
  });
}

function getAxios(): AxiosInstance {
  if (!instance) {
    instance = createInstance();
  }
  return instance;
}

async function call(method: string, payload: object): Promise<void> {
  const res = await getAxios().post<TelegramResponse>(`/${method}`, payload);
  if (!res.data.ok) {
    throw new TelegramApiError(method, res.data.error_code ?? res.status, res.data.description);
  }
}

export interface TelegramApi {
  sendMessage(chatId: number | string, text: string, keyboard?: InlineKeyboard): Promise<void>;
  sendPhoto(chatId: number | string, photo: string, caption: string): Promise<void>;
  answerCallbackQuery(callbackQueryId: string): Promise<void>;
}

export const telegramApi: TelegramApi = {
  sendMessage: (chatId, text, keyboard) =>
    call('sendMessage', { chat_id: chatId, text, ...(keyboard ? { reply_markup: keyboard } : {}) }),
  sendPhoto: (chatId, photo, caption) => call('sendPhoto', { chat_id: chatId, photo, caption }),
  answerCallbackQuery: (callbackQueryId) =>
    call('answerCallbackQuery', { callback_query_id: callbackQueryId }),
};
