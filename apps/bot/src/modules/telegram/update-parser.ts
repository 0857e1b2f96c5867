import type { BotEvent, ITelegramMessage, ITelegramUpdate } from '@tagall/types';

/**
 * Command found at the start of a message, e.g. `/start@mybot` → `{ name: 'start', target: 'mybot' }`.
 */
interface IParsedCommand {
    name: string;
    target?: string;
}

/**
 * Reads the leading bot command of a message.
 *
 * A message is a command when its first entity is a `bot_command` at offset 0.
 *
 * @returns The lowercased command name and `@target`, or null when the message is not a command
 */
export function parseCommand(message: ITelegramMessage): IParsedCommand | null {
    const text = message.text;
    const first = message.entities?.[0];

    if (!text || !first || first.type !== 'bot_command' || first.offset !== 0) {
        return null;
    }

    const token = text.slice(1, first.length);
    const [name, target] = token.split('@', 2);

    return { name: name.toLowerCase(), ...(target ? { target } : {}) };
}

/**
 * Converts a raw update into the event the runtime dispatches.
 *
 * @param update - Update received from `getUpdates`
 * @param botUsername - The bot's own handle, used to skip commands addressed to other bots
 * @returns The event, or null for updates the bot does not handle (non-text messages,
 * other commands, other update kinds)
 */
export function toBotEvent(update: ITelegramUpdate, botUsername: string): BotEvent | null {
    const message = update.message;

    if (!message || !message.text) {
        return null;
    }

    const base = {
        updateId: update.update_id,
        chat: message.chat,
        messageId: message.message_id,
        ...(message.from ? { sender: message.from } : {}),
        ...(message.is_topic_message && message.message_thread_id !== undefined
            ? { threadId: message.message_thread_id }
            : {})
    };

    const command = parseCommand(message);

    if (!command) {
        return { ...base, kind: 'text', text: message.text };
    }

    if (command.target && command.target.toLowerCase() !== botUsername.toLowerCase()) {
        return null;
    }

    if (command.name === 'start' || command.name === 'help') {
        return { ...base, kind: 'start', command: command.name };
    }

    return null;
}
