/**
 * Bot Configuration
 *
 * Environment variables parsed once with zod. Invalid configuration throws
 * with every issue listed.
 */

import { z } from 'zod';

// =============================================================================
// Schema
// =============================================================================

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1, 'BOT_TOKEN is required'),
  WEBHOOK_URL: optionalString.pipe(z.string().url('WEBHOOK_URL must be a URL').optional()),
  WEBHOOK_SECRET: optionalString.pipe(
    z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, 'WEBHOOK_SECRET may only contain letters, digits, _ and -')
      .optional()
  ),
  PORT: z.coerce.number().int().positive().default(8080),
  STORE_DRIVER: z.enum(['sqlite', 'json']).default('sqlite'),
  DATA_PATH: optionalString,
  DEFAULT_SLOT_COUNT: z.coerce.number().int().nonnegative().max(100).default(4),
  REAP_INTERVAL_MINUTES: z.coerce.number().nonnegative().default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type StoreDriver = z.infer<typeof envSchema>['STORE_DRIVER'];

// =============================================================================
// Types
// =============================================================================

export interface WebhookConfig {
  /** Public base URL of this service */
  url: string;
  /** Route Telegram posts updates to */
  path: string;
  /** Full URL registered with Telegram */
  endpoint: string;
  port: number;
  secretToken?: string;
}

export interface BotConfig {
  botToken: string;
  /** Null means long polling */
  webhook: WebhookConfig | null;
  store: {
    driver: StoreDriver;
    path: string;
  };
  defaultSlotCount: number;
  reapIntervalMinutes: number;
  logLevel: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export const WEBHOOK_PATH = '/telegram/webhook';

const DEFAULT_DATA_PATHS: Record<StoreDriver, string> = {
  sqlite: 'data.sqlite',
  json: 'data.json',
};

// =============================================================================
// Loading
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    botToken: vars.BOT_TOKEN,
    webhook: vars.WEBHOOK_URL
      ? {
          url: vars.WEBHOOK_URL,
          path: WEBHOOK_PATH,
          endpoint: `${vars.WEBHOOK_URL.replace(/\/+$/, '')}${WEBHOOK_PATH}`,
          port: vars.PORT,
          secretToken: vars.WEBHOOK_SECRET,
        }
      : null,
    store: {
      driver: vars.STORE_DRIVER,
      path: vars.DATA_PATH ?? DEFAULT_DATA_PATHS[vars.STORE_DRIVER],
    },
    defaultSlotCount: vars.DEFAULT_SLOT_COUNT,
    reapIntervalMinutes: vars.REAP_INTERVAL_MINUTES,
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
  };
}

let cachedConfig: BotConfig | null = null;

/**
 * Process configuration, parsed on first use.
 */
export function getConfig(): BotConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Drop the cached configuration (tests) */
export function resetConfig(): void {
  cachedConfig = null;
}
