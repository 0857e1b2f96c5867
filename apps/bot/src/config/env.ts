import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // Checked by the bootstrap so a missing token is logged instead of thrown at import time
  TELEGRAM_BOT_TOKEN: z
    .string()
    .transform(value => value.trim())
    .optional()
    .transform(value => (value ? value : undefined)),
  MEMBERS_FILE: z.string().min(1).default('members.json'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_FILE: z.string().min(1).optional(),
  TELEGRAM_POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(30),
  TAG_CHUNK_DELAY_MS: z.coerce.number().int().min(0).default(1000)
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate an environment map against the bot's configuration schema.
 *
 * @param source - Variables to validate, usually `process.env`
 * @throws ConfigurationError listing the invalid fields
 */
export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigurationError('Failed to parse environment variables', parsed.error.flatten().fieldErrors);
  }

  return parsed.data;
}
