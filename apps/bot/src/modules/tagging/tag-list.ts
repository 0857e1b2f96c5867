import type { ITelegramChatMember } from '@tagall/types';

/**
 * Longest tag message the bot sends. Telegram rejects texts over 4096 characters.
 */
export const MAX_TAG_MESSAGE_LENGTH = 4000;

function isSameHandle(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

/**
 * Renders recorded usernames as mentions, leaving out the bot itself.
 *
 * @example
 * buildMemberTags(['alice', 'mybot', 'bob'], 'mybot'); // ['@alice', '@bob']
 */
export function buildMemberTags(usernames: readonly string[], botUsername: string): string[] {
    return usernames
        .filter(username => username && !isSameHandle(username, botUsername))
        .map(username => `@${username}`);
}

/**
 * Renders chat administrators as mentions.
 *
 * Bot accounts, administrators without a username and the bot itself are left out.
 */
export function buildAdminTags(admins: readonly ITelegramChatMember[], botUsername: string): string[] {
    const tags: string[] = [];

    for (const { user } of admins) {
        if (user.is_bot || !user.username || isSameHandle(user.username, botUsername)) {
            continue;
        }
        tags.push(`@${user.username}`);
    }

    return tags;
}

/**
 * Splits tags into newline-joined messages no longer than `maxLength`.
 *
 * When all tags fit in one message they are returned as a single message. Otherwise
 * tags are packed greedily: a tag joins the current message while the message, the
 * tag and its separator stay within `maxLength`, else it starts the next message.
 * Tags are never split, dropped or repeated.
 *
 * @example
 * chunkTags(['@alice', '@bob', '@carol'], 12); // ['@alice\n@bob', '@carol']
 */
export function chunkTags(tags: readonly string[], maxLength = MAX_TAG_MESSAGE_LENGTH): string[] {
    const joined = tags.join('\n');

    if (joined.length <= maxLength) {
        return joined ? [joined] : [];
    }

    const chunks: string[] = [];
    let current: string[] = [];
    // Length of the current chunk with a separator after every tag
    let currentLength = 0;

    for (const tag of tags) {
        if (currentLength + tag.length + 1 <= maxLength) {
            current.push(tag);
            currentLength += tag.length + 1;
            continue;
        }

        if (current.length > 0) {
            chunks.push(current.join('\n'));
        }
        current = [tag];
        currentLength = tag.length + 1;
    }

    if (current.length > 0) {
        chunks.push(current.join('\n'));
    }

    return chunks;
}
