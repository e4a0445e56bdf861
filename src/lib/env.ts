/**
 * Environment variable validation using Zod.
 *
 * Validates required environment variables at startup and provides
 * a typed configuration object. Fails fast with clear error messages
 * if required variables are missing or invalid.
 */

import { z } from 'zod';
import { logger } from './logger.js';

/**
 * Numeric variable with a default. Values arrive as strings from process.env.
 */
function numberVar(name: string, defaultValue: string, options: { integer?: boolean; allowZero?: boolean } = {}) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => Number(val))
    .refine((val) => Number.isFinite(val), { message: `${name} must be a number` })
    .refine((val) => (options.allowZero ? val >= 0 : val > 0), {
      message: `${name} must be ${options.allowZero ? 'zero or greater' : 'greater than zero'}`,
    })
    .refine((val) => !options.integer || Number.isInteger(val), {
      message: `${name} must be an integer`,
    });
}

/**
 * Environment variable schema.
 *
 * Required:
 * - HELPDESK_CLIENT_ID: OAuth2 client id
 * - HELPDESK_CLIENT_SECRET: OAuth2 client secret
 *
 * Optional (with defaults):
 * - HELPDESK_BASE_URL: API root (default: https://api.helpdesk.example.com/v1)
 * - HELPDESK_MAX_RETRIES: total attempts per call (default: 3)
 * - HELPDESK_BASE_DELAY_SECONDS: backoff base (default: 1)
 * - HELPDESK_MAX_CONCURRENCY: in-flight HTTP calls (default: 3)
 * - HELPDESK_RATE_LIMIT_PER_MINUTE: sliding window limit (default: 600)
 * - HELPDESK_TOKEN_SAFETY_MARGIN_SECONDS: refresh ahead of expiry (default: 30)
 * - HELPDESK_TIMEOUT_MS: per-request timeout (default: 30000)
 * - PORT: Server port (default: 3000)
 * - NODE_ENV: Environment mode (default: development)
 * - LOG_LEVEL: debug | info | warn | error
 */
const envSchema = z.object({
  HELPDESK_CLIENT_ID: z
    .string({ required_error: 'HELPDESK_CLIENT_ID is required' })
    .min(1, 'HELPDESK_CLIENT_ID cannot be empty'),

  HELPDESK_CLIENT_SECRET: z
    .string({ required_error: 'HELPDESK_CLIENT_SECRET is required' })
    .min(1, 'HELPDESK_CLIENT_SECRET cannot be empty'),

  HELPDESK_BASE_URL: z
    .string()
    .url('HELPDESK_BASE_URL must be a valid URL')
    .default('https://api.helpdesk.example.com/v1'),

  HELPDESK_MAX_RETRIES: numberVar('HELPDESK_MAX_RETRIES', '3', { integer: true }),
  HELPDESK_BASE_DELAY_SECONDS: numberVar('HELPDESK_BASE_DELAY_SECONDS', '1', { allowZero: true }),
  HELPDESK_MAX_CONCURRENCY: numberVar('HELPDESK_MAX_CONCURRENCY', '3', { integer: true }),
  HELPDESK_RATE_LIMIT_PER_MINUTE: numberVar('HELPDESK_RATE_LIMIT_PER_MINUTE', '600', { integer: true }),
  HELPDESK_TOKEN_SAFETY_MARGIN_SECONDS: numberVar('HELPDESK_TOKEN_SAFETY_MARGIN_SECONDS', '30', {
    allowZero: true,
  }),
  HELPDESK_TIMEOUT_MS: numberVar('HELPDESK_TIMEOUT_MS', '30000', { integer: true }),

  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val > 0 && val < 65536, {
      message: 'PORT must be a valid port number (1-65535)',
    }),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables and returns typed config.
 *
 * @throws Error with detailed message if validation fails
 * @returns Validated and typed environment configuration
 */
export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');

    logger.error('Environment validation failed', {
      errors: result.error.errors.map((e) => ({
        path: e.path,
        message: e.message,
      })),
    });

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  logger.info('Environment validated successfully', {
    port: result.data.PORT,
    env: result.data.NODE_ENV,
    baseUrl: result.data.HELPDESK_BASE_URL,
  });

  return result.data;
}

let _env: Env | null = null;

/**
 * Gets the validated environment configuration, validating on first use.
 *
 * @throws Error if validation fails
 */
export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

/**
 * Clears the memoized configuration. Used by tests that rewrite process.env.
 */
export function resetEnv(): void {
  _env = null;
}
