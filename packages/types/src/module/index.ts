/**
 * Module system type exports.
 *
 * Modules are the bot's long-lived components, started by the bootstrap in
 * two phases (init, then run).
 */

export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
