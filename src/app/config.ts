/**
 * Environment configuration for the bot
 *
 * Everything is read once at startup into an immutable value that is passed
 * down to the components.
 */

import { z } from 'zod';
import { DEFAULT_COOLDOWN_KEY, DEFAULT_COUNTER_KEY } from '../entities/counter-state';
import { ABS_COUNTING_LIMIT } from '../entities/numeral';
import { DEFAULT_SERVICE, MAX_PAGE_SIZE, type BlueskyCredentials } from '../features/bluesky-poster';
import { parseCalendarDate } from '../features/counter-schedule';
import type { CounterConfig } from '../features/daily-counter';

/**
 * Raised when the environment does not describe a usable configuration
 */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const calendarDate = z.string().transform((value, ctx) => {
  try {
    return parseCalendarDate(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

const EnvSchema = z
  .object({
    // Bluesky credentials
    BLUESKY_IDENTIFIER: optionalText,
    BLUESKY_PASSWORD: optionalText,
    BLUESKY_SERVICE: z.string().url().default(DEFAULT_SERVICE),

    // Campaign schedule
    START_DATE: calendarDate.default('2025-03-18'),
    MIN_COUNTER: z.coerce.number().int().min(1).default(1),
    MAX_COUNTER: z.coerce.number().int().max(ABS_COUNTING_LIMIT).default(1000),

    // Posting behaviour
    // Capped so the wait fits in one Node timer (2^31-1 ms)
    COOLDOWN_MINUTES: z.coerce.number().positive().max(35_000).default(16),
    FETCH_PAGE_SIZE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(50),
    FINAL_TEXT: z.string().min(1).default('هزارتو'),
    POST_SUFFIX: z.string().default('تو'),

    // State files
    STATE_DIR: z.string().min(1).default('.'),
    COUNTER_FILE: z.string().min(1).default(DEFAULT_COUNTER_KEY),
    COOLDOWN_FILE: z.string().min(1).default(DEFAULT_COOLDOWN_KEY),

    // Sentry (optional)
    SENTRY_DSN: optionalText,
  })
  .refine((env) => env.MIN_COUNTER <= env.MAX_COUNTER, {
    message: 'MIN_COUNTER must not be greater than MAX_COUNTER',
    path: ['MAX_COUNTER'],
  });

export type Env = z.input<typeof EnvSchema>;

/**
 * Complete bot configuration
 */
export interface AppConfig {
  readonly counter: CounterConfig;

  /** Absent until both identifier and password are set */
  readonly credentials?: Readonly<BlueskyCredentials>;

  readonly service: string;

  readonly state: {
    readonly directory: string;
    readonly counterFile: string;
    readonly cooldownFile: string;
  };

  readonly sentryDsn?: string;
}

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const credentials =
    values.BLUESKY_IDENTIFIER && values.BLUESKY_PASSWORD
      ? Object.freeze({ identifier: values.BLUESKY_IDENTIFIER, password: values.BLUESKY_PASSWORD })
      : undefined;

  return Object.freeze({
    counter: Object.freeze({
      startDate: values.START_DATE,
      minCounter: values.MIN_COUNTER,
      maxCounter: values.MAX_COUNTER,
      cooldownMs: values.COOLDOWN_MINUTES * 60_000,
      pageSize: values.FETCH_PAGE_SIZE,
      finalText: values.FINAL_TEXT,
      suffix: values.POST_SUFFIX,
    }),
    credentials,
    service: values.BLUESKY_SERVICE,
    state: Object.freeze({
      directory: values.STATE_DIR,
      counterFile: values.COUNTER_FILE,
      cooldownFile: values.COOLDOWN_FILE,
    }),
    sentryDsn: values.SENTRY_DSN,
  });
}

/**
 * Credentials for commands that talk to Bluesky
 *
 * @throws ConfigError when either variable is missing
 */
export function requireCredentials(config: AppConfig): Readonly<BlueskyCredentials> {
  if (!config.credentials) {
    throw new ConfigError(['BLUESKY_IDENTIFIER and BLUESKY_PASSWORD must both be set']);
  }
  return config.credentials;
}
