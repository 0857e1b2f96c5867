/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { TelegramClient } from '../telegram-client.js';
import type { TelegramHttp } from '../telegram-client.js';
import { ConfigurationError, TelegramApiError } from '../../../lib/errors.js';

/**
 * Stub HTTP client answering every request with the given body.
 */
function createHttp(data: unknown) {
    const post = vi.fn().mockResolvedValue({ data });
    const http: TelegramHttp = { post };
    return { http, post };
}

describe('TelegramClient', () => {
    it('should refuse an empty token', () => {
        expect(() => new TelegramClient('')).toThrow(ConfigurationError);
    });

    describe('requests', () => {
        let post: ReturnType<typeof createHttp>['post'];
        let client: TelegramClient;

        beforeEach(() => {
            const stub = createHttp({ ok: true, result: { message_id: 1, chat: { id: -100, type: 'supergroup' } } });
            post = stub.post;
            client = new TelegramClient('test-token', stub.http);
        });

        it('should send replies as plain text', async () => {
            await client.sendMessage(-100, '@alice', { replyToMessageId: 77 });

            expect(post).toHaveBeenCalledWith(
                'sendMessage',
                { chat_id: -100, text: '@alice', reply_to_message_id: 77 },
                undefined
            );
        });

        it('should pass the forum topic', async () => {
            await client.sendMessage('-100', 'hi', { threadId: 9 });

            expect(post).toHaveBeenCalledWith(
                'sendMessage',
                { chat_id: '-100', text: 'hi', message_thread_id: 9 },
                undefined
            );
        });

        it('should request administrators by chat id', async () => {
            await client.getChatAdministrators(-100);

            expect(post).toHaveBeenCalledWith('getChatAdministrators', { chat_id: -100 }, undefined);
        });

        it('should long-poll with a request timeout beyond the poll timeout', async () => {
            await client.getUpdates({ offset: 501, timeout: 30, allowedUpdates: ['message'] });

            expect(post).toHaveBeenCalledWith(
                'getUpdates',
                { timeout: 30, offset: 501, allowed_updates: ['message'] },
                { timeout: 40_000 }
            );
        });

        it('should leave out an unset offset', async () => {
            await client.getUpdates();

            expect(post).toHaveBeenCalledWith('getUpdates', { timeout: 0 }, { timeout: 10_000 });
        });
    });

    it('should unwrap the result', async () => {
        const { http } = createHttp({ ok: true, result: { id: 1000, is_bot: true, first_name: 'Tag All', username: 'mybot' } });

        await expect(new TelegramClient('test-token', http).getMe()).resolves.toEqual({
            id: 1000,
            is_bot: true,
            first_name: 'Tag All',
            username: 'mybot'
        });
    });

    it('should raise the description of a response with ok: false', async () => {
        const { http } = createHttp({ ok: false, error_code: 400, description: 'Bad Request: chat not found' });

        const error = await new TelegramClient('test-token', http).getChatAdministrators(-100).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(TelegramApiError);
        expect(error).toMatchObject({
            method: 'getChatAdministrators',
            message: 'Bad Request: chat not found',
            status: 400,
            code: 'TELEGRAM_API_ERROR'
        });
    });

    it('should raise when a successful response has no result', async () => {
        const { http } = createHttp({ ok: true });

        await expect(new TelegramClient('test-token', http).getMe()).rejects.toThrow('Telegram getMe returned no result');
    });

    it('should keep the Telegram description of an HTTP error', async () => {
        const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
        const response: AxiosResponse = {
            data: { ok: false, error_code: 403, description: 'Forbidden: bot was kicked from the group chat' },
            status: 403,
            statusText: 'Forbidden',
            headers: {},
            config
        };
        const post = vi.fn().mockRejectedValue(new AxiosError('Request failed with status code 403', 'ERR_BAD_REQUEST', config, null, response));

        const error = await new TelegramClient('test-token', { post }).sendMessage(-100, 'hi').catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(TelegramApiError);
        expect(error).toMatchObject({
            method: 'sendMessage',
            message: 'Forbidden: bot was kicked from the group chat',
            status: 403,
            details: { code: 'ERR_BAD_REQUEST' }
        });
    });

    it('should wrap transport failures', async () => {
        const post = vi.fn().mockRejectedValue(new Error('socket hang up'));

        await expect(new TelegramClient('test-token', { post }).getMe()).rejects.toMatchObject({
            method: 'getMe',
            message: 'socket hang up',
            status: undefined
        });
    });
});
