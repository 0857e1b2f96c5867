import type { ILogger, IMemberStore, ITelegramChat, ITelegramUser } from '@tagall/types';
import { addMember } from './member-registry.js';

const GROUP_CHAT_TYPES = new Set(['group', 'supergroup']);

/**
 * True for the chat types the bot tracks and tags in.
 */
export function isGroupChat(chat: ITelegramChat): boolean {
    return GROUP_CHAT_TYPES.has(chat.type);
}

/**
 * Records the usernames of people who post in groups.
 */
export class MembershipTracker {
    constructor(
        private readonly store: IMemberStore,
        private readonly logger: ILogger
    ) {}

    /**
     * Records the sender of a group message.
     *
     * Does nothing, without touching the store, outside groups and supergroups, for
     * senders without a username, and for bot accounts. Otherwise the registry is
     * loaded, and saved only when the username was not yet recorded for the chat.
     *
     * @param chat - Chat the message was posted in
     * @param user - Message author, absent for channel posts
     * @returns True when the username was added
     * @throws PersistenceError when the registry cannot be read or written
     */
    async track(chat: ITelegramChat, user?: ITelegramUser): Promise<boolean> {
        if (!isGroupChat(chat) || !user || !user.username || user.is_bot) {
            return false;
        }

        const registry = await this.store.load();
        const chatId = String(chat.id);

        if (!addMember(registry, chatId, user.username)) {
            return false;
        }

        await this.store.save(registry);

        this.logger.info({ chatId, username: user.username }, `Added @${user.username} to members list for chat ${chatId}`);
        return true;
    }
}
