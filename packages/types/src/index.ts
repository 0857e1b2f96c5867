/**
 * Shared interfaces of the tag-all bot.
 *
 * This package declares types only; it has no runtime code.
 */

export type { ILogger } from './logging/index.js';

export type { IModule, IModuleMetadata } from './module/index.js';

export type { IMemberStore, MemberRegistry } from './members/index.js';

export type {
    ITelegramUser,
    ITelegramChat,
    ITelegramMessage,
    ITelegramMessageEntity,
    ITelegramChatMember,
    ITelegramUpdate,
    ITelegramApiResponse,
    ITelegramSendOptions,
    ITelegramGetUpdatesOptions,
    ITelegramClient
} from './telegram/index.js';

export type {
    BotEvent,
    BotEventKind,
    BotEventHandler,
    BotEventHandlerTable,
    BotErrorHandler,
    IStartCommandEvent,
    ITextMessageEvent
} from './bot/index.js';
