export type {
    ITelegramUser,
    ITelegramChat,
    ITelegramMessage,
    ITelegramMessageEntity,
    ITelegramChatMember,
    ITelegramUpdate,
    ITelegramApiResponse
} from './ITelegramUpdate.js';

export type { ITelegramSendOptions, ITelegramGetUpdatesOptions } from './ITelegramSendOptions.js';

export type { ITelegramClient } from './ITelegramClient.js';
