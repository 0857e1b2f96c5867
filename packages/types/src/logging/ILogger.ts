/**
 * Structured logging contract shared across the bot's components.
 *
 * Components emit structured JSON logs through this surface without importing
 * the logging library directly. The bot wires a Pino instance behind it; tests
 * pass a `vi.fn()` backed object.
 *
 * Callers pass the structured context first and the message second, matching
 * Pino's calling convention:
 *
 * ```typescript
 * logger.info({ chatId, username }, 'Added member');
 * ```
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry for failures that stop the process.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry.
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Emit an info-level log entry.
     */
    info(...args: readonly unknown[]): void;

    /**
     * Emit a debug-level log entry. Suppressed in production.
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Emit a trace-level log entry.
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger.
     *
     * @param bindings - Key-value pairs merged into every entry of the child
     * @param options - Logger-specific options such as a level override
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
