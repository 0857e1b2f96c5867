import { pino } from 'pino';

/**
 * Logger factory for the tag-all bot.
 *
 * Writes human-readable output to stdout through `pino-pretty`, and JSON lines
 * to a file when one is configured.
 *
 * ```typescript
 * const logger = createLogger({ level: 'info', file: '.run/bot.log' });
 * logger.info({ chatId }, 'Tagged members');
 * ```
 */

/**
 * Options accepted by {@link createLogger}.
 */
export interface ILoggerOptions {
    /**
     * Minimum level written to every target.
     */
    level: pino.LevelWithSilent;

    /**
     * Optional file receiving JSON log lines. Parent directories are created.
     */
    file?: string;
}

/**
 * Picks the log level: the configured one, else `info` in production and `debug` elsewhere.
 */
export function resolveLogLevel(nodeEnv: string, configured?: pino.LevelWithSilent): pino.LevelWithSilent {
    if (configured) {
        return configured;
    }

    return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Context keys holding caught errors, serialized like pino's own `err`.
 */
const ERROR_KEYS = ['error', 'notifyError', 'handlerError'] as const;

/**
 * Pino options shared by every bot logger, whatever its destination.
 */
export function buildLoggerOptions(level: pino.LevelWithSilent): pino.LoggerOptions {
    return {
        level,
        base: {
            service: 'tagall-bot'
        },
        serializers: Object.fromEntries(ERROR_KEYS.map(key => [key, pino.stdSerializers.err]))
    };
}

/**
 * Creates a Pino logger with the bot's transports.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(options: ILoggerOptions): pino.Logger {
    const targets: pino.TransportTargetOptions[] = [
        {
            level: options.level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    if (options.file) {
        targets.push({
            level: options.level,
            target: 'pino/file',
            options: { destination: options.file, mkdir: true }
        });
    }

    const transport = pino.transport({ targets });

    return pino(buildLoggerOptions(options.level), transport);
}
