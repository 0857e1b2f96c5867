import type { ILogger, IStartCommandEvent } from '@tagall/types';

export const GREETING_MESSAGE =
    "Hi! I'm a bot that tags all known group members when mentioned. " +
    'Send a message in the group to be included in the tag list!';

/**
 * Command handler response.
 */
export interface ICommandResponse {
    chatId: string;
    text: string;
    threadId?: number;
    replyToMessageId?: number;
}

/**
 * Builds replies to bot commands. Sending is left to the caller.
 */
export class CommandHandler {
    constructor(private readonly logger: ILogger) {}

    /**
     * Handles /start and /help with a static greeting.
     *
     * In groups the greeting quotes the command message; in private chats it does not.
     *
     * @returns Response posted in the chat, and topic, the command came from
     */
    handleStart(event: IStartCommandEvent): ICommandResponse {
        const chatId = String(event.chat.id);

        this.logger.debug({ chatId, command: event.command, userId: event.sender?.id }, 'Received start command');

        return {
            chatId,
            text: GREETING_MESSAGE,
            ...(event.chat.type !== 'private' ? { replyToMessageId: event.messageId } : {}),
            ...(event.threadId !== undefined ? { threadId: event.threadId } : {})
        };
    }
}
