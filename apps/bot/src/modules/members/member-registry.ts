import type { MemberRegistry } from '@tagall/types';

/**
 * Returns the usernames recorded for a chat, in the order they were first seen.
 */
export function getMembers(registry: MemberRegistry, chatId: string): string[] {
    return Object.hasOwn(registry, chatId) ? registry[chatId] : [];
}

/**
 * Records a username for a chat, creating the chat's entry when needed.
 *
 * @param registry - Registry to mutate in place
 * @param chatId - Chat id rendered as a string
 * @param username - Handle without the leading "@"
 * @returns True when the username was appended, false when it was already present
 */
export function addMember(registry: MemberRegistry, chatId: string, username: string): boolean {
    if (!Object.hasOwn(registry, chatId)) {
        registry[chatId] = [];
    }

    const members = registry[chatId];

    if (members.includes(username)) {
        return false;
    }

    members.push(username);
    return true;
}
