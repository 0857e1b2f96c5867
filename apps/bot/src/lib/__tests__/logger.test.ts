/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { buildLoggerOptions, resolveLogLevel } from '../logger.js';
import { BotRuntime } from '../../modules/telegram/bot-runtime.js';
import { FakeTelegramClient } from '../../tests/vitest/mocks/telegram-client.js';

describe('resolveLogLevel', () => {
    it('should prefer the configured level', () => {
        expect(resolveLogLevel('production', 'trace')).toBe('trace');
        expect(resolveLogLevel('development', 'silent')).toBe('silent');
    });

    it('should log info and above in production', () => {
        expect(resolveLogLevel('production')).toBe('info');
    });

    it('should log debug elsewhere', () => {
        expect(resolveLogLevel('development')).toBe('debug');
        expect(resolveLogLevel('test')).toBe('debug');
    });
});

describe('buildLoggerOptions', () => {
    let lines: string[];
    let logger: pino.Logger;

    beforeEach(() => {
        lines = [];
        logger = pino(buildLoggerOptions('info'), {
            write(line: string) {
                lines.push(line);
            }
        });
    });

    function entries(): Record<string, unknown>[] {
        return lines.map(line => JSON.parse(line));
    }

    it('should tag every entry with the service name', () => {
        logger.info('ready');

        expect(entries()[0]).toMatchObject({ level: 30, service: 'tagall-bot', msg: 'ready' });
    });

    it('should write the message and stack of errors logged under error', () => {
        logger.error({ error: new TypeError('boom') }, 'Failed');

        expect(entries()[0].error).toMatchObject({ type: 'TypeError', message: 'boom' });
        expect(entries()[0].error).toHaveProperty('stack');
    });

    it('should serialize the other error keys', () => {
        logger.error({ notifyError: new Error('notice failed'), handlerError: new Error('handler failed') }, 'Failed');

        expect(entries()[0]).toMatchObject({
            notifyError: { message: 'notice failed' },
            handlerError: { message: 'handler failed' }
        });
    });

    it('should leave non-error values under error as they are', () => {
        logger.error({ error: 'timeout' }, 'Failed');

        expect(entries()[0].error).toBe('timeout');
    });

    it('should keep handler failures readable in the runtime error log', async () => {
        const runtime = new BotRuntime(new FakeTelegramClient(), logger);
        runtime.on('text', async () => {
            throw new TypeError("Cannot read properties of undefined (reading 'id')");
        });

        await runtime.dispatch({
            update_id: 7,
            message: { message_id: 70, chat: { id: -100, type: 'supergroup' }, text: 'hello' }
        });

        expect(lines).toHaveLength(1);
        expect(entries()[0]).toMatchObject({
            level: 50,
            msg: 'Failed to process update',
            updateId: 7,
            eventKind: 'text',
            chatId: -100,
            error: { type: 'TypeError', message: "Cannot read properties of undefined (reading 'id')" }
        });
    });
});
