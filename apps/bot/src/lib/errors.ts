export class TagAllError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'TagAllError';
  }
}

export class ConfigurationError extends TagAllError {
  constructor(message = 'Invalid configuration', details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends TagAllError {
  constructor(message = 'Persistence failed', details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', details);
    this.name = 'PersistenceError';
  }
}

/**
 * Failed Telegram Bot API call: transport failure, HTTP error, or a response with `ok: false`.
 */
export class TelegramApiError extends TagAllError {
  constructor(
    public readonly method: string,
    message: string,
    public readonly status?: number,
    details?: unknown
  ) {
    super(message, 'TELEGRAM_API_ERROR', details);
    this.name = 'TelegramApiError';
  }
}
