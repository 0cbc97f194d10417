import { describe, expect, it, vi } from 'vitest';

import { DeliveryFailureError } from '@core/errors/index.js';

import { TelegramApiError, type TelegramApi } from '@infra/telegram/telegram.client.js';

import { CallbackCodec } from '@services/messaging/callback.codec.js';
import { message } from '@services/messaging/message.types.js';
import { TelegramNotifier } from '@services/messaging/telegram.notifier.js';
import { loadTemplates, MessageRenderer } from '@services/messaging/templates.js';

function fakeApi() {
  return {
    sendMessage: vi.fn<TelegramApi['sendMessage']>().mockResolvedValue(undefined),
    sendPhoto: vi.fn<TelegramApi['sendPhoto']>().mockResolvedValue(undefined),
    answerCallbackQuery: vi.fn<TelegramApi['answerCallbackQuery']>().mockResolvedValue(undefined),
  };
}

function notifier(api: TelegramApi, overrides: { groupChatId?: string; retries?: number } = {}) {
  return new TelegramNotifier({
    api,
    renderer: new MessageRenderer(loadTemplates(), 'Europe/Moscow'),
    codec: new CallbackCodec(['Stone Towers', 'Manhatten']),
    groupChatId: '-100',
    retries: 0,
    ...overrides,
  });
}

describe('TelegramNotifier', () => {
  it('sends rendered text with one button per row', async () => {
    const api = fakeApi();

    await notifier(api).sendToUser(
      42,
      message('waitlist_available', { title: 'книга а', location: 'Stone Towers' }, [
        { kind: 'CLAIM', bookId: 1 },
        { kind: 'LEAVE_WAITLIST', bookId: 1 },
      ]),
    );

    expect(api.sendMessage).toHaveBeenCalledWith(42, 'Книга «книга а» (Stone Towers) освободилась! Забронировать её?', {
      inline_keyboard: [
        [{ text: 'Забронировать', callback_data: 'clm:1' }],
        [{ text: 'Выйти из очереди', callback_data: 'lv:1' }],
      ],
    });
  });

  it('omits the keyboard when there are no choices', async () => {
    const api = fakeApi();

    await notifier(api).sendToUser(42, message('ask_title'));

    expect(api.sendMessage).toHaveBeenCalledWith(42, 'Напиши, пожалуйста, название книги.', undefined);
  });

  it('posts group messages and photos to the group chat', async () => {
    const api = fakeApi();
    const n = notifier(api);
    const returned = message('group_returned', { name: 'Иван Сидоров', title: 'книга а', location: 'Stone Towers' });

    await n.sendToGroup(returned);
    await n.sendPhotoToGroup('photo-1', returned);

    const text = 'Пользователь Иван Сидоров вернул книгу «книга а» (Stone Towers).';
    expect(api.sendMessage).toHaveBeenCalledWith('-100', text);
    expect(api.sendPhoto).toHaveBeenCalledWith('-100', 'photo-1', text);
  });

  it('reports a missing group chat as a delivery failure', async () => {
    const api = fakeApi();

    await expect(notifier(api, { groupChatId: '' }).sendToGroup(message('group_booked'))).rejects.toBeInstanceOf(
      DeliveryFailureError,
    );
    expect(api.sendMessage).not.toHaveBeenCalled();
  });

  it('wraps transport errors with the target', async () => {
    const api = fakeApi();
    api.sendMessage.mockRejectedValueOnce(new TelegramApiError('sendMessage', 403, 'bot was blocked'));

    const failure = await notifier(api)
      .sendToUser(42, message('ask_title'))
      .then(
        () => null,
        (err: unknown) => err,
      );

    expect(failure).toBeInstanceOf(DeliveryFailureError);
    expect(failure).toMatchObject({ target: { kind: 'user', userId: 42 }, message: 'Delivery of ask_title failed' });
  });

  it('retries a transient error within its budget', async () => {
    const api = fakeApi();
    api.sendMessage.mockRejectedValueOnce(new TelegramApiError('sendMessage', 502, 'bad gateway'));

    await notifier(api, { retries: 1 }).sendToUser(42, message('ask_title'));

    expect(api.sendMessage).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    const api = fakeApi();
    api.sendMessage.mockRejectedValue(new TelegramApiError('sendMessage', 400, 'chat not found'));

    await expect(notifier(api, { retries: 3 }).sendToUser(42, message('ask_title'))).rejects.toBeInstanceOf(
      DeliveryFailureError,
    );
    expect(api.sendMessage).toHaveBeenCalledTimes(1);
  });
});
