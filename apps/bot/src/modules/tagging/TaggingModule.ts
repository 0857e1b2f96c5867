import type { ILogger, IMemberStore, IModule, IModuleMetadata, IStartCommandEvent, ITelegramClient } from '@tagall/types';
import type { BotRuntime } from '../telegram/bot-runtime.js';
import { MembershipTracker } from '../members/membership-tracker.js';
import { CommandHandler } from './command-handlers.js';
import { MentionResponder } from './mention-responder.js';

/**
 * Dependencies required by the tagging module.
 */
export interface ITaggingModuleDependencies {
    /**
     * Telegram client used to reply and to list administrators.
     */
    client: ITelegramClient;

    /**
     * Runtime the module registers its handlers on. Also supplies the bot's handle.
     */
    runtime: BotRuntime;

    /**
     * Store holding the known members of each chat.
     */
    store: IMemberStore;

    /**
     * Parent logger; the module logs through a `tagging` child.
     */
    logger: ILogger;

    /**
     * Pause between consecutive tag messages, in milliseconds.
     */
    chunkDelayMs?: number;
}

/**
 * Tagging module implementation.
 *
 * Records who posts in each group and answers mentions of the bot with a list
 * tagging every recorded member, falling back to the chat's administrators.
 * Also answers /start and /help with a greeting.
 */
export class TaggingModule implements IModule<ITaggingModuleDependencies> {
    /**
     * Module metadata for introspection and logging.
     */
    readonly metadata: IModuleMetadata = {
        id: 'tagging',
        name: 'Member Tagging',
        version: '1.0.0',
        description: 'Tracks group members and tags them all when the bot is mentioned'
    };

    /**
     * Stored dependencies from init() phase.
     */
    private client!: ITelegramClient;
    private runtime!: BotRuntime;
    private logger!: ILogger;

    /**
     * Services created during init() phase.
     */
    private tracker!: MembershipTracker;
    private responder!: MentionResponder;
    private commandHandler!: CommandHandler;

    /**
     * Create services from the injected dependencies. No handler is registered yet.
     */
    async init(dependencies: ITaggingModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: this.metadata.id });
        this.logger.info('Initializing tagging module...');

        this.client = dependencies.client;
        this.runtime = dependencies.runtime;

        this.tracker = new MembershipTracker(dependencies.store, this.logger);
        this.responder = new MentionResponder(
            dependencies.client,
            dependencies.store,
            this.tracker,
            dependencies.runtime,
            this.logger,
            { chunkDelayMs: dependencies.chunkDelayMs }
        );
        this.commandHandler = new CommandHandler(this.logger);

        this.logger.info('Tagging module initialized');
    }

    /**
     * Register the command and text handlers on the runtime.
     */
    async run(): Promise<void> {
        this.runtime.on('start', event => this.handleStart(event));

        this.runtime.on('text', async event => {
            const outcome = await this.responder.handleMessage(event);
            this.logger.debug({ updateId: event.updateId, chatId: event.chat.id, outcome: outcome.status }, 'Handled text message');
        });

        this.logger.info('Tagging module running');
    }

    private async handleStart(event: IStartCommandEvent): Promise<void> {
        const response = this.commandHandler.handleStart(event);

        await this.client.sendMessage(response.chatId, response.text, {
            threadId: response.threadId,
            replyToMessageId: response.replyToMessageId
        });
    }
}
