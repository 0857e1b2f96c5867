/**
 * Telegram user or bot account.
 */
export interface ITelegramUser {
    /** Telegram user ID */
    id: number;
    /** Whether this account is a bot */
    is_bot: boolean;
    /** User's or bot's first name */
    first_name: string;
    /** User's last name */
    last_name?: string;
    /** Username (without @) */
    username?: string;
}

/**
 * Telegram chat object representing a private chat, group, supergroup or channel.
 */
export interface ITelegramChat {
    /**
     * Unique chat identifier.
     */
    id: number;

    /**
     * Type of chat.
     * @example 'private', 'group', 'supergroup', 'channel'
     */
    type: string;

    /**
     * Title of the chat (for groups and channels).
     */
    title?: string;

    /**
     * Username of the chat (for public channels and supergroups).
     */
    username?: string;
}

/**
 * Special entity inside a message text, such as a command or a mention.
 */
export interface ITelegramMessageEntity {
    /**
     * Entity type.
     * @example 'bot_command', 'mention', 'url'
     */
    type: string;
    /** Offset in UTF-16 code units */
    offset: number;
    /** Length in UTF-16 code units */
    length: number;
}

/**
 * Telegram message object from an update.
 */
export interface ITelegramMessage {
    /**
     * Unique message identifier inside the chat.
     */
    message_id: number;

    /**
     * Sender (absent in channel posts).
     */
    from?: ITelegramUser;

    /**
     * Chat the message belongs to.
     */
    chat: ITelegramChat;

    /**
     * Unix time the message was sent.
     */
    date?: number;

    /**
     * Message text content.
     */
    text?: string;

    /**
     * Entities found in the text (commands, mentions, links).
     */
    entities?: ITelegramMessageEntity[];

    /**
     * Forum topic the message belongs to, in supergroups with topics enabled.
     */
    message_thread_id?: number;

    /**
     * True when the message was sent to a forum topic.
     */
    is_topic_message?: boolean;
}

/**
 * Chat member entry, as returned by `getChatAdministrators`.
 */
export interface ITelegramChatMember {
    /**
     * Member's status in the chat.
     * @example 'member', 'administrator', 'creator', 'restricted', 'left', 'kicked'
     */
    status: string;

    /**
     * Information about the user.
     */
    user: ITelegramUser;
}

/**
 * Telegram update as delivered by `getUpdates`.
 *
 * Only the fields the bot reads are declared; Telegram sends many more update
 * kinds, which are received and skipped.
 */
export interface ITelegramUpdate {
    /**
     * Unique, increasing update identifier.
     */
    update_id: number;

    /**
     * New incoming message.
     */
    message?: ITelegramMessage;
}

/**
 * Envelope of every Telegram Bot API response.
 */
export interface ITelegramApiResponse<T> {
    ok: boolean;
    result?: T;
    description?: string;
    error_code?: number;
}
