import type { ILogger, IMemberStore, ITelegramClient, ITextMessageEvent } from '@tagall/types';
import { TelegramApiError } from '../../lib/errors.js';
import { sleep } from '../../lib/sleep.js';
import { getMembers } from '../members/member-registry.js';
import { isGroupChat } from '../members/membership-tracker.js';
import type { MembershipTracker } from '../members/membership-tracker.js';
import { MAX_TAG_MESSAGE_LENGTH, buildAdminTags, buildMemberTags, chunkTags } from './tag-list.js';

export const NO_TAGS_MESSAGE = 'No members or admins with usernames found to tag! Users must send a message to be included.';

export const TAG_FAILED_MESSAGE = "Sorry, I couldn't tag everyone. Please ensure I'm an admin and try again.";

/**
 * Source of the bot's own handle. Implemented by BotRuntime, which fetches it once.
 */
export interface IBotIdentity {
    getBotUsername(): Promise<string>;
}

/**
 * Result of handling one text message.
 *
 * - `ignored`: not a group chat, or no text
 * - `tracked`: no mention; the sender was passed to the tracker (`added` tells whether it was new)
 * - `tagged`: tag messages were sent
 * - `empty`: nobody to tag; the notice was sent
 * - `failed`: a Telegram call failed; the failure notice was attempted
 */
export type MentionOutcome =
    | { status: 'ignored' }
    | { status: 'tracked'; added: boolean }
    | { status: 'tagged'; source: 'members' | 'administrators'; tagged: number; messages: number }
    | { status: 'empty' }
    | { status: 'failed'; error: TelegramApiError };

export interface IMentionResponderOptions {
    /**
     * Longest message sent; longer tag lists are split (default 4000).
     */
    maxMessageLength?: number;

    /**
     * Pause between consecutive tag messages, in milliseconds (default 1000).
     */
    chunkDelayMs?: number;
}

/**
 * Replies to mentions of the bot with a list tagging every known member.
 *
 * Messages that do not mention the bot are handed to the {@link MembershipTracker}.
 * When no member of the chat has been recorded yet, the chat's administrators are
 * tagged instead.
 */
export class MentionResponder {
    private readonly maxMessageLength: number;
    private readonly chunkDelayMs: number;

    constructor(
        private readonly client: ITelegramClient,
        private readonly store: IMemberStore,
        private readonly tracker: MembershipTracker,
        private readonly identity: IBotIdentity,
        private readonly logger: ILogger,
        options: IMentionResponderOptions = {}
    ) {
        this.maxMessageLength = options.maxMessageLength ?? MAX_TAG_MESSAGE_LENGTH;
        this.chunkDelayMs = options.chunkDelayMs ?? 1000;
    }

    /**
     * Handles a non-command text message.
     *
     * The bot counts as mentioned when the text contains its handle, ignoring case.
     * Telegram failures while tagging are answered with {@link TAG_FAILED_MESSAGE} and
     * returned as a `failed` outcome.
     *
     * @throws PersistenceError when the member registry cannot be read or written
     */
    async handleMessage(event: ITextMessageEvent): Promise<MentionOutcome> {
        if (!isGroupChat(event.chat) || !event.text) {
            return { status: 'ignored' };
        }

        const botUsername = await this.identity.getBotUsername();

        if (!event.text.toLowerCase().includes(botUsername.toLowerCase())) {
            const added = await this.tracker.track(event.chat, event.sender);
            return { status: 'tracked', added };
        }

        return this.tagAll(event, botUsername);
    }

    private async tagAll(event: ITextMessageEvent, botUsername: string): Promise<MentionOutcome> {
        const chatId = String(event.chat.id);
        const registry = await this.store.load();

        let tags = buildMemberTags(getMembers(registry, chatId), botUsername);
        let source: 'members' | 'administrators' = 'members';

        try {
            if (tags.length === 0) {
                const admins = await this.client.getChatAdministrators(event.chat.id);
                tags = buildAdminTags(admins, botUsername);
                source = 'administrators';

                if (tags.length === 0) {
                    await this.reply(event, NO_TAGS_MESSAGE);
                    this.logger.info({ chatId }, 'No members or admins to tag');
                    return { status: 'empty' };
                }
            }

            const chunks = chunkTags(tags, this.maxMessageLength);

            for (const [index, chunk] of chunks.entries()) {
                if (index > 0) {
                    await sleep(this.chunkDelayMs);
                }
                await this.reply(event, chunk);
            }

            this.logger.info(
                { chatId, tagged: tags.length, messages: chunks.length, source },
                `Tagged ${tags.length} members in chat ${chatId}`
            );
            return { status: 'tagged', source, tagged: tags.length, messages: chunks.length };
        } catch (error) {
            if (!(error instanceof TelegramApiError)) {
                throw error;
            }

            this.logger.error({ error, chatId, method: error.method }, 'Error tagging members');

            try {
                await this.reply(event, TAG_FAILED_MESSAGE);
            } catch (notifyError) {
                this.logger.error({ notifyError, chatId }, 'Failed to send tagging failure notice');
            }

            return { status: 'failed', error };
        }
    }

    /**
     * Replies to the originating message, in its forum topic when it has one.
     */
    private async reply(event: ITextMessageEvent, text: string): Promise<void> {
        await this.client.sendMessage(event.chat.id, text, {
            replyToMessageId: event.messageId,
            threadId: event.threadId
        });
    }
}
