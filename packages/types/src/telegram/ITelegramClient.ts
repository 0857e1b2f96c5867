import type { ITelegramChatMember, ITelegramMessage, ITelegramUpdate, ITelegramUser } from './ITelegramUpdate.js';
import type { ITelegramGetUpdatesOptions, ITelegramSendOptions } from './ITelegramSendOptions.js';

/**
 * Telegram Bot API operations used by the bot.
 *
 * Every method rejects with a TelegramApiError when the request fails or
 * Telegram answers with `ok: false`.
 */
export interface ITelegramClient {
    /**
     * Fetch the bot's own account.
     */
    getMe(): Promise<ITelegramUser>;

    /**
     * Long-poll for new updates.
     */
    getUpdates(options?: ITelegramGetUpdatesOptions): Promise<ITelegramUpdate[]>;

    /**
     * Send a text message.
     *
     * @returns The message as stored by Telegram
     */
    sendMessage(chatId: number | string, text: string, options?: ITelegramSendOptions): Promise<ITelegramMessage>;

    /**
     * List the administrators of a group or supergroup.
     */
    getChatAdministrators(chatId: number | string): Promise<ITelegramChatMember[]>;
}
