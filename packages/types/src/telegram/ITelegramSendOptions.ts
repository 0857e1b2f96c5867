/**
 * Message sending options for the Telegram Bot API. Text is always sent as plain text.
 */
export interface ITelegramSendOptions {
    /**
     * Message thread ID for sending to a specific topic in a forum supergroup.
     */
    threadId?: number;

    /**
     * Message the new message replies to.
     */
    replyToMessageId?: number;
}

/**
 * Parameters of a `getUpdates` long-poll request.
 */
export interface ITelegramGetUpdatesOptions {
    /**
     * First update to return; every update below it is confirmed and dropped.
     */
    offset?: number;

    /**
     * Long-poll timeout in seconds.
     */
    timeout?: number;

    /**
     * Update kinds to receive. An empty list requests every kind.
     */
    allowedUpdates?: string[];
}
