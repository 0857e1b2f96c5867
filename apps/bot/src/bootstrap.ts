/**
 * Startup sequence of the bot with its two-phase module lifecycle.
 *
 * Validates configuration, builds the infrastructure (logger, Telegram client,
 * member store, runtime), then initializes and runs every module before polling
 * starts.
 *
 * @module bootstrap
 */

import type { ILogger } from '@tagall/types';
import { parseEnv } from './config/env.js';
import type { EnvConfig } from './config/env.js';
import { createLogger, resolveLogLevel } from './lib/logger.js';
import type { ILoggerOptions } from './lib/logger.js';
import { sleep } from './lib/sleep.js';
import { JsonFileMemberStore } from './modules/members/index.js';
import { BotRuntime, TelegramClient } from './modules/telegram/index.js';
import { TaggingModule } from './modules/tagging/index.js';

/**
 * Longest wait for the polling loop to finish on shutdown.
 */
const SHUTDOWN_GRACE_MS = 5_000;

/**
 * Builds the application logger. Tests pass a factory returning a mock.
 */
export type LoggerFactory = (options: ILoggerOptions) => ILogger;

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Starts the bot.
 *
 * Executes the startup sequence: configuration → infrastructure → modules →
 * polling. Registers SIGINT and SIGTERM handlers for graceful shutdown.
 *
 * Startup failures are logged as fatal and set `process.exitCode` to 1.
 *
 * @param source - Environment variables, usually `process.env`
 * @returns The running bot's context, or null when startup failed
 */
export async function bootstrap(
    source: Record<string, string | undefined>,
    loggerFactory: LoggerFactory = createLogger
): Promise<BootstrapContext | null> {
    let config: EnvConfig;

    try {
        config = parseEnv(source);
    } catch (error) {
        loggerFactory({ level: 'info' }).fatal({ error }, 'Invalid environment configuration');
        process.exitCode = 1;
        return null;
    }

    const logger = loggerFactory({
        level: resolveLogLevel(config.NODE_ENV, config.LOG_LEVEL),
        file: config.LOG_FILE
    });

    if (!config.TELEGRAM_BOT_TOKEN) {
        logger.fatal('TELEGRAM_BOT_TOKEN not set');
        process.exitCode = 1;
        return null;
    }

    try {
        const ctx = await bootstrapInit(config, config.TELEGRAM_BOT_TOKEN, logger);
        await bootstrapRun(ctx);
        registerShutdownHandlers(ctx);
        return ctx;
    } catch (error) {
        logger.fatal({ error }, 'Failed to bootstrap bot');
        process.exitCode = 1;
        return null;
    }
}

// ─────────────────────────────────────────────────────────────────────────────
// Two-Phase Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shared context passed from init phase to run phase.
 */
export interface BootstrapContext {
    logger: ILogger;
    runtime: BotRuntime;
    modules: {
        tagging: TaggingModule;
    };
}

/**
 * Init Phase: create infrastructure and initialize modules.
 *
 * Nothing talks to Telegram yet and no handler is registered.
 */
async function bootstrapInit(config: EnvConfig, token: string, logger: ILogger): Promise<BootstrapContext> {
    const client = new TelegramClient(token);
    const store = new JsonFileMemberStore(config.MEMBERS_FILE);
    const runtime = new BotRuntime(client, logger.child({ module: 'runtime' }), {
        pollTimeoutSeconds: config.TELEGRAM_POLL_TIMEOUT_SECONDS
    });

    logger.info({ membersFile: store.getFilePath(), env: config.NODE_ENV }, 'Starting tag-all bot');

    const taggingModule = new TaggingModule();
    await taggingModule.init({
        client,
        runtime,
        store,
        logger,
        chunkDelayMs: config.TAG_CHUNK_DELAY_MS
    });

    return {
        logger,
        runtime,
        modules: {
            tagging: taggingModule
        }
    };
}

/**
 * Run Phase: register handlers, then start polling.
 *
 * @throws TelegramApiError when the bot account cannot be fetched (invalid token)
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.modules.tagging.run();
    await ctx.runtime.start();
}

// ─────────────────────────────────────────────────────────────────────────────
// Supporting Functions
// ─────────────────────────────────────────────────────────────────────────────

function registerShutdownHandlers(ctx: BootstrapContext): void {
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        ctx.logger.info({ signal }, 'Received shutdown signal');
        await Promise.race([ctx.runtime.stop(), sleep(SHUTDOWN_GRACE_MS)]);
        process.exit(0);
    };

    process.once('SIGINT', signal => void shutdown(signal));
    process.once('SIGTERM', signal => void shutdown(signal));
}
