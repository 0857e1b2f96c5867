export type {
    BotEvent,
    BotEventKind,
    BotEventHandler,
    BotEventHandlerTable,
    BotErrorHandler,
    IStartCommandEvent,
    ITextMessageEvent
} from './IBotEvent.js';
