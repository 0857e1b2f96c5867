import type {
    BotErrorHandler,
    BotEvent,
    BotEventHandler,
    BotEventHandlerTable,
    BotEventKind,
    ILogger,
    ITelegramClient,
    ITelegramUpdate,
    ITelegramUser
} from '@tagall/types';
import { ConfigurationError } from '../../lib/errors.js';
import { sleep } from '../../lib/sleep.js';
import { toBotEvent } from './update-parser.js';

/**
 * Polling and dispatch settings.
 */
export interface IBotRuntimeOptions {
    /**
     * Long-poll timeout passed to `getUpdates`, in seconds.
     */
    pollTimeoutSeconds?: number;

    /**
     * Pause after a failed poll before polling again, in milliseconds.
     */
    retryDelayMs?: number;

    /**
     * Update kinds requested from Telegram.
     */
    allowedUpdates?: string[];
}

/**
 * Receives Telegram updates by long polling and dispatches them to registered handlers.
 *
 * Each update is converted into a typed {@link BotEvent} and handed to the handler
 * registered for its kind. Updates are processed one at a time, in the order Telegram
 * delivered them. A handler failure is passed to the error handler and never stops
 * the loop.
 *
 * @example
 * ```typescript
 * const runtime = new BotRuntime(client, logger, { pollTimeoutSeconds: 30 });
 * runtime.on('start', event => commands.handleStart(event));
 * runtime.on('text', async event => { await responder.handleMessage(event); });
 * await runtime.start();
 * ```
 */
export class BotRuntime {
    private readonly handlers: BotEventHandlerTable = {};
    private errorHandler: BotErrorHandler;
    private readonly pollTimeoutSeconds: number;
    private readonly retryDelayMs: number;
    private readonly allowedUpdates: string[];

    private botUser: Promise<ITelegramUser> | null = null;
    private offset: number | undefined;
    private running = false;
    private loop: Promise<void> | null = null;

    constructor(
        private readonly client: ITelegramClient,
        private readonly logger: ILogger,
        options: IBotRuntimeOptions = {}
    ) {
        this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 30;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
        this.allowedUpdates = options.allowedUpdates ?? ['message'];
        this.errorHandler = (error, update, event) => {
            this.logger.error(
                { error, updateId: update.update_id, eventKind: event?.kind, chatId: event?.chat.id },
                'Failed to process update'
            );
        };
    }

    /**
     * Registers the handler for one event kind, replacing any previous one.
     */
    on<K extends BotEventKind>(kind: K, handler: BotEventHandler<K>): this {
        this.handlers[kind] = handler;
        return this;
    }

    /**
     * Replaces the default error handler, which logs the error with the update context.
     */
    onError(handler: BotErrorHandler): this {
        this.errorHandler = handler;
        return this;
    }

    /**
     * Returns the bot's own account. Fetched with `getMe` on first use, then cached.
     */
    async getBotUser(): Promise<ITelegramUser> {
        if (!this.botUser) {
            // A failed lookup is forgotten so the next call retries it
            this.botUser = this.client.getMe().catch((error: unknown) => {
                this.botUser = null;
                throw error;
            });
        }

        return this.botUser;
    }

    /**
     * Returns the bot's handle, without the leading "@".
     *
     * @throws ConfigurationError when the bot account has no username
     */
    async getBotUsername(): Promise<string> {
        const user = await this.getBotUser();

        if (!user.username) {
            throw new ConfigurationError('Bot account has no username', { botId: user.id });
        }

        return user.username;
    }

    isRunning(): boolean {
        return this.running;
    }

    /**
     * Resolves the bot account and starts the polling loop in the background.
     *
     * @throws TelegramApiError when the bot account cannot be fetched (invalid token)
     */
    async start(): Promise<void> {
        if (this.running) {
            return;
        }

        const username = await this.getBotUsername();
        this.running = true;
        this.loop = this.runLoop();

        this.logger.info({ username, pollTimeoutSeconds: this.pollTimeoutSeconds }, 'Bot polling started');
    }

    /**
     * Stops polling. Resolves once the in-flight poll and its updates are finished.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }

        this.running = false;
        await this.loop;
        this.loop = null;

        this.logger.info('Bot polling stopped');
    }

    /**
     * Fetches one batch of updates and dispatches them in order.
     *
     * @returns Number of updates received
     * @throws TelegramApiError when `getUpdates` fails
     */
    async pollOnce(): Promise<number> {
        const updates = await this.client.getUpdates({
            offset: this.offset,
            timeout: this.pollTimeoutSeconds,
            allowedUpdates: this.allowedUpdates
        });

        for (const update of updates) {
            this.offset = update.update_id + 1;
            await this.dispatch(update);
        }

        return updates.length;
    }

    /**
     * Routes one update to the handler registered for its event kind.
     *
     * Never rejects: handler failures go to the error handler, and a failing error
     * handler is logged.
     */
    async dispatch(update: ITelegramUpdate): Promise<void> {
        let event: BotEvent | null = null;

        try {
            event = toBotEvent(update, await this.getBotUsername());

            if (!event) {
                this.logger.trace({ updateId: update.update_id }, 'Update ignored');
                return;
            }

            this.logger.debug(
                { updateId: update.update_id, eventKind: event.kind, chatId: event.chat.id },
                'Dispatching update'
            );

            switch (event.kind) {
                case 'start':
                    await this.invoke(this.handlers.start, event);
                    break;
                case 'text':
                    await this.invoke(this.handlers.text, event);
                    break;
            }
        } catch (error) {
            await this.reportError(error, update, event ?? undefined);
        }
    }

    private async invoke<E extends BotEvent>(handler: ((event: E) => Promise<void>) | undefined, event: E): Promise<void> {
        if (!handler) {
            this.logger.trace({ eventKind: event.kind }, 'No handler registered');
            return;
        }

        await handler(event);
    }

    private async reportError(error: unknown, update: ITelegramUpdate, event?: BotEvent): Promise<void> {
        try {
            await this.errorHandler(error, update, event);
        } catch (handlerError) {
            this.logger.error({ error, handlerError, updateId: update.update_id }, 'Error handler failed');
        }
    }

    private async runLoop(): Promise<void> {
        while (this.running) {
            try {
                await this.pollOnce();
            } catch (error) {
                this.logger.error({ error }, 'Failed to poll Telegram updates');
                if (this.running) {
                    await sleep(this.retryDelayMs);
                }
            }
        }
    }
}
