import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for the bot's components.
 *
 * Modules initialize during bootstrap and stay active for the lifetime of the
 * process. They follow a two-phase lifecycle:
 *
 * ### Phase 1: init(dependencies)
 * - Store injected dependencies and create service instances
 * - Must not register handlers or start background work
 * - Failures are fatal: the bootstrap logs them and exits
 *
 * ### Phase 2: run()
 * - Attach the module to the application (register update handlers)
 * - All modules have completed init() at this point
 *
 * ## Example Implementation
 *
 * ```typescript
 * interface IGreeterModuleDependencies {
 *     runtime: BotRuntime;
 *     logger: ILogger;
 * }
 *
 * class GreeterModule implements IModule<IGreeterModuleDependencies> {
 *     readonly metadata = { id: 'greeter', name: 'Greeter', version: '1.0.0' };
 *
 *     private runtime!: BotRuntime;
 *
 *     async init(deps: IGreeterModuleDependencies): Promise<void> {
 *         this.runtime = deps.runtime;
 *     }
 *
 *     async run(): Promise<void> {
 *         this.runtime.on('start', event => this.greet(event));
 *     }
 * }
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = object> {
    /**
     * Module metadata for introspection and logging.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * @param dependencies - Typed dependencies declared by the module
     * @throws Error if initialization fails; the bootstrap treats this as fatal
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Activate the module after every module has initialized.
     *
     * @throws Error if activation fails; the bootstrap treats this as fatal
     */
    run(): Promise<void>;
}
