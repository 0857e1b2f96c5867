import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type {
    ITelegramApiResponse,
    ITelegramChatMember,
    ITelegramClient,
    ITelegramGetUpdatesOptions,
    ITelegramMessage,
    ITelegramSendOptions,
    ITelegramUpdate,
    ITelegramUser
} from '@tagall/types';
import { ConfigurationError, TelegramApiError } from '../../lib/errors.js';

/**
 * HTTP surface the client needs. Satisfied by an axios instance; tests pass a stub.
 */
export type TelegramHttp = Pick<AxiosInstance, 'post'>;

/**
 * Extra time granted to a long-poll request beyond its Telegram-side timeout.
 */
const LONG_POLL_MARGIN_MS = 10_000;

/**
 * Timeout of every request that is not a long poll.
 */
const REQUEST_TIMEOUT_MS = 15_000;

/**
 * Telegram Bot API client.
 *
 * Wraps the JSON-over-HTTPS API with typed methods. Every failure is raised as a
 * {@link TelegramApiError} so callers can tell platform failures from their own.
 */
export class TelegramClient implements ITelegramClient {
    private readonly http: TelegramHttp;

    /**
     * Creates a Telegram client.
     *
     * @param token - Telegram bot token from BotFather
     * @param http - HTTP client override; defaults to an axios instance bound to the bot's API URL
     */
    constructor(token: string, http?: TelegramHttp) {
        if (!token) {
            throw new ConfigurationError('Telegram bot token not configured');
        }

        this.http = http ?? axios.create({
            baseURL: `https://api.telegram.org/bot${token}/`,
            timeout: REQUEST_TIMEOUT_MS
        });
    }

    async getMe(): Promise<ITelegramUser> {
        return this.call<ITelegramUser>('getMe');
    }

    /**
     * Long-polls for updates.
     *
     * @param options - Offset, timeout in seconds and update filter
     * @returns Updates in increasing `update_id` order, possibly none
     */
    async getUpdates(options: ITelegramGetUpdatesOptions = {}): Promise<ITelegramUpdate[]> {
        const { offset, timeout = 0, allowedUpdates } = options;
        const payload: Record<string, unknown> = { timeout };

        if (offset !== undefined) {
            payload.offset = offset;
        }

        if (allowedUpdates !== undefined) {
            payload.allowed_updates = allowedUpdates;
        }

        return this.call<ITelegramUpdate[]>('getUpdates', payload, timeout * 1000 + LONG_POLL_MARGIN_MS);
    }

    /**
     * Sends a message to a Telegram chat.
     *
     * @param chatId - Chat ID (user, group or channel)
     * @param text - Message text
     * @param options - Optional reply and thread options
     */
    async sendMessage(chatId: number | string, text: string, options: ITelegramSendOptions = {}): Promise<ITelegramMessage> {
        const { threadId, replyToMessageId } = options;
        const payload: Record<string, unknown> = {
            chat_id: chatId,
            text
        };

        if (threadId !== undefined) {
            payload.message_thread_id = threadId;
        }

        if (replyToMessageId !== undefined) {
            payload.reply_to_message_id = replyToMessageId;
        }

        return this.call<ITelegramMessage>('sendMessage', payload);
    }

    async getChatAdministrators(chatId: number | string): Promise<ITelegramChatMember[]> {
        return this.call<ITelegramChatMember[]>('getChatAdministrators', { chat_id: chatId });
    }

    /**
     * Calls a Bot API method and unwraps its `result`.
     *
     * @throws TelegramApiError on transport failure, HTTP error or `ok: false`
     */
    private async call<T>(method: string, payload: Record<string, unknown> = {}, timeoutMs?: number): Promise<T> {
        let body: ITelegramApiResponse<T>;

        try {
            const response = await this.http.post<ITelegramApiResponse<T>>(
                method,
                payload,
                timeoutMs === undefined ? undefined : { timeout: timeoutMs }
            );
            body = response.data;
        } catch (error) {
            throw toTelegramApiError(method, error);
        }

        if (!body.ok || body.result === undefined) {
            throw new TelegramApiError(
                method,
                body.description ?? `Telegram ${method} returned no result`,
                body.error_code
            );
        }

        return body.result;
    }
}

/**
 * Converts a rejected request into a TelegramApiError, keeping Telegram's description when present.
 *
 * The original axios error is not kept: its config carries the token-bearing URL.
 */
function toTelegramApiError(method: string, error: unknown): TelegramApiError {
    if (axios.isAxiosError<ITelegramApiResponse<unknown>>(error)) {
        const status = error.response?.status;
        const description = error.response?.data?.description;

        return new TelegramApiError(method, description ?? error.message, status, { code: error.code });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TelegramApiError(method, message);
}
