export { TelegramClient } from './telegram-client.js';
export type { TelegramHttp } from './telegram-client.js';
export { BotRuntime } from './bot-runtime.js';
export type { IBotRuntimeOptions } from './bot-runtime.js';
export { toBotEvent, parseCommand } from './update-parser.js';
