/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { ILogger, IStartCommandEvent, ITelegramUpdate, ITextMessageEvent } from '@tagall/types';
import { BotRuntime } from '../bot-runtime.js';
import { ConfigurationError, TelegramApiError } from '../../../lib/errors.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { BOT_USER, FakeTelegramClient, user } from '../../../tests/vitest/mocks/telegram-client.js';

function textUpdate(id: number, text: string): ITelegramUpdate {
    return {
        update_id: id,
        message: {
            message_id: id * 10,
            from: user('alice', 1),
            chat: { id: -100, type: 'supergroup' },
            text
        }
    };
}

function commandUpdate(id: number, text: string): ITelegramUpdate {
    return {
        update_id: id,
        message: {
            message_id: id * 10,
            chat: { id: -100, type: 'supergroup' },
            text,
            entities: [{ type: 'bot_command', offset: 0, length: text.length }]
        }
    };
}

describe('BotRuntime', () => {
    let client: FakeTelegramClient;
    let logger: ILogger;
    let runtime: BotRuntime;
    let onText: Mock<(event: ITextMessageEvent) => Promise<void>>;
    let onStart: Mock<(event: IStartCommandEvent) => Promise<void>>;

    beforeEach(() => {
        client = new FakeTelegramClient();
        logger = createMockLogger();
        runtime = new BotRuntime(client, logger, { retryDelayMs: 1 });
        onText = vi.fn(async (_event: ITextMessageEvent) => undefined);
        onStart = vi.fn(async (_event: IStartCommandEvent) => undefined);
        runtime.on('text', onText).on('start', onStart);
    });

    afterEach(async () => {
        await runtime.stop();
    });

    // ============================================================================
    // Dispatch
    // ============================================================================

    describe('dispatch', () => {
        it('should route text messages to the text handler', async () => {
            await runtime.dispatch(textUpdate(1, 'hello'));

            expect(onText).toHaveBeenCalledTimes(1);
            expect(onText.mock.calls[0][0]).toMatchObject({ kind: 'text', text: 'hello', updateId: 1, messageId: 10 });
            expect(onStart).not.toHaveBeenCalled();
        });

        it('should route /start to the start handler', async () => {
            await runtime.dispatch(commandUpdate(2, '/start'));

            expect(onStart).toHaveBeenCalledTimes(1);
            expect(onStart.mock.calls[0][0]).toMatchObject({ kind: 'start', command: 'start' });
            expect(onText).not.toHaveBeenCalled();
        });

        it('should ignore commands it does not handle', async () => {
            await runtime.dispatch(commandUpdate(3, '/settings'));

            expect(onText).not.toHaveBeenCalled();
            expect(onStart).not.toHaveBeenCalled();
            expect(logger.trace).toHaveBeenCalledWith({ updateId: 3 }, 'Update ignored');
        });

        it('should log handler failures with the update context', async () => {
            const error = new Error('handler failed');
            onText.mockRejectedValueOnce(error);

            await expect(runtime.dispatch(textUpdate(4, 'hello'))).resolves.toBeUndefined();

            expect(logger.error).toHaveBeenCalledWith(
                { error, updateId: 4, eventKind: 'text', chatId: -100 },
                'Failed to process update'
            );
        });

        it('should pass failures to a custom error handler', async () => {
            const error = new Error('handler failed');
            const onError = vi.fn();
            onText.mockRejectedValueOnce(error);
            runtime.onError(onError);

            const update = textUpdate(5, 'hello');
            await runtime.dispatch(update);

            expect(onError).toHaveBeenCalledWith(error, update, expect.objectContaining({ kind: 'text', updateId: 5 }));
            expect(logger.error).not.toHaveBeenCalled();
        });

        it('should log a failing error handler', async () => {
            const error = new Error('handler failed');
            const handlerError = new Error('error handler failed');
            onText.mockRejectedValueOnce(error);
            runtime.onError(() => {
                throw handlerError;
            });

            await runtime.dispatch(textUpdate(6, 'hello'));

            expect(logger.error).toHaveBeenCalledWith({ error, handlerError, updateId: 6 }, 'Error handler failed');
        });
    });

    // ============================================================================
    // Bot identity
    // ============================================================================

    describe('getBotUsername', () => {
        it('should fetch the bot account once', async () => {
            const getMe = vi.spyOn(client, 'getMe');

            await runtime.dispatch(textUpdate(1, 'one'));
            await runtime.dispatch(textUpdate(2, 'two'));

            await expect(runtime.getBotUsername()).resolves.toBe('mybot');
            expect(getMe).toHaveBeenCalledTimes(1);
        });

        it('should retry after a failed lookup', async () => {
            const getMe = vi.spyOn(client, 'getMe')
                .mockRejectedValueOnce(new TelegramApiError('getMe', 'Unauthorized', 401));

            await expect(runtime.getBotUsername()).rejects.toThrow('Unauthorized');
            await expect(runtime.getBotUsername()).resolves.toBe('mybot');
            expect(getMe).toHaveBeenCalledTimes(2);
        });

        it('should reject an account without a username', async () => {
            client.me = { ...BOT_USER, username: undefined };

            await expect(runtime.getBotUsername()).rejects.toBeInstanceOf(ConfigurationError);
        });
    });

    // ============================================================================
    // Polling
    // ============================================================================

    describe('polling', () => {
        it('should advance the offset past every received update', async () => {
            client.queueUpdates(textUpdate(500, 'first'), textUpdate(501, 'second'));

            await expect(runtime.pollOnce()).resolves.toBe(2);
            await runtime.pollOnce();

            expect(client.pollRequests).toEqual([
                { offset: undefined, timeout: 30, allowedUpdates: ['message'] },
                { offset: 502, timeout: 30, allowedUpdates: ['message'] }
            ]);
            expect(onText.mock.calls.map(([event]) => event.text)).toEqual(['first', 'second']);
        });

        it('should keep polling after a handler failure', async () => {
            onText.mockRejectedValueOnce(new Error('handler failed'));
            client.queueUpdates(textUpdate(500, 'first'), textUpdate(501, 'second'));

            await runtime.pollOnce();

            expect(onText).toHaveBeenCalledTimes(2);
            expect(client.pollRequests).toHaveLength(1);
        });

        it('should dispatch queued updates once started and stop cleanly', async () => {
            client.queueUpdates(textUpdate(700, 'hello'));

            await runtime.start();
            expect(runtime.isRunning()).toBe(true);

            await vi.waitFor(() => expect(onText).toHaveBeenCalledTimes(1));
            await runtime.stop();

            expect(runtime.isRunning()).toBe(false);
            expect(logger.info).toHaveBeenCalledWith({ username: 'mybot', pollTimeoutSeconds: 30 }, 'Bot polling started');
            expect(logger.info).toHaveBeenCalledWith('Bot polling stopped');
        });

        it('should retry after a failed poll', async () => {
            const error = new TelegramApiError('getUpdates', 'Bad Gateway', 502);
            vi.spyOn(client, 'getUpdates').mockRejectedValueOnce(error);
            client.queueUpdates(textUpdate(800, 'after the outage'));

            await runtime.start();
            await vi.waitFor(() => expect(onText).toHaveBeenCalledTimes(1));

            expect(logger.error).toHaveBeenCalledWith({ error }, 'Failed to poll Telegram updates');
        });

        it('should not start when the bot account cannot be fetched', async () => {
            vi.spyOn(client, 'getMe').mockRejectedValueOnce(new TelegramApiError('getMe', 'Unauthorized', 401));

            await expect(runtime.start()).rejects.toBeInstanceOf(TelegramApiError);
            expect(runtime.isRunning()).toBe(false);
        });
    });
});
