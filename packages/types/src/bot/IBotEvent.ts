import type { ITelegramChat, ITelegramUpdate, ITelegramUser } from '../telegram/index.js';

/**
 * Fields shared by every event derived from an incoming message.
 */
interface IBotMessageEventBase {
    /**
     * Update the event was derived from.
     */
    updateId: number;

    /**
     * Chat the message was posted in.
     */
    chat: ITelegramChat;

    /**
     * Message author. Absent for channel posts and anonymous admins.
     */
    sender?: ITelegramUser;

    /**
     * Identifier of the originating message, used as the reply target.
     */
    messageId: number;

    /**
     * Forum topic of the originating message. Only set for topic messages.
     */
    threadId?: number;
}

/**
 * `/start` or `/help` command.
 */
export interface IStartCommandEvent extends IBotMessageEventBase {
    kind: 'start';
    command: 'start' | 'help';
}

/**
 * Text message that is not a command.
 */
export interface ITextMessageEvent extends IBotMessageEventBase {
    kind: 'text';
    text: string;
}

/**
 * Closed set of events the bot runtime dispatches.
 */
export type BotEvent = IStartCommandEvent | ITextMessageEvent;

export type BotEventKind = BotEvent['kind'];

/**
 * Handler for one event kind.
 */
export type BotEventHandler<K extends BotEventKind> = (event: Extract<BotEvent, { kind: K }>) => Promise<void>;

/**
 * Handler registration table, one optional handler per event kind.
 */
export type BotEventHandlerTable = { [K in BotEventKind]?: BotEventHandler<K> };

/**
 * Handler for failures raised while processing an update.
 *
 * @param error - Error thrown by an event handler
 * @param update - Update being processed when the error occurred
 * @param event - Event derived from the update, when parsing succeeded
 */
export type BotErrorHandler = (error: unknown, update: ITelegramUpdate, event?: BotEvent) => Promise<void> | void;
