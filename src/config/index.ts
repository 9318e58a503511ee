/**
 * Configuration Module
 * Loads the JSON config file, environment and CLI overrides, validates them
 * with zod and builds the typed config the rest of the app consumes.
 *
 * Precedence (highest first): CLI flags, TICKET_SENTINEL_* environment
 * variables, the config file, schema defaults.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import dotenv from 'dotenv';
import type { AccountCredentials, MarketplaceConfig } from '../adapters/base/feed-client.interface.js';
import type { FilterConfig } from '../services/filtering/listing-filter.js';
import type { LogLevel } from '../utils/logger.js';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const ENV_PREFIX = 'TICKET_SENTINEL_';

const DEFAULT_BASE_URL = 'https://www.twickets.live';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Settings Schema
// ============================================================================

const emptyToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1'),
]);

const identifier = z
  .union([z.string().trim(), z.number().int().transform(String)])
  .pipe(z.string().min(1));

const settingsObject = z.object({
  // Required
  user: z.string().min(1),
  password: z.string().min(1),
  event_id: identifier,
  api_key: z.string().min(1),

  // Optional
  discord_webhook_url: z.preprocess(emptyToUndefined, z.string().url().optional()),
  time_delay: z.coerce.number().positive().default(2),
  headless: booleanish.default(true),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  min_seats: z.coerce.number().int().min(1).default(1),
  max_seats: z.coerce.number().int().min(1).default(4),
  max_price: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().nullable().optional()),
  skip_meetup_delivery: booleanish.default(true),

  // Tuning
  max_backoff: z.coerce.number().positive().default(60),
  escalate_after_failures: z.coerce.number().int().min(1).default(5),
  request_timeout: z.coerce.number().positive().default(10),
  base_url: z.string().url().default(DEFAULT_BASE_URL),
  log_level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  log_dir: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
});

const settingsSchema = settingsObject.refine(
  settings => settings.min_seats <= settings.max_seats,
  { message: 'min_seats must not exceed max_seats', path: ['max_seats'] },
);

export type SettingsInput = z.input<typeof settingsObject>;
export type SettingKey = keyof SettingsInput;
export type Settings = z.output<typeof settingsSchema>;

const SETTING_KEYS = Object.keys(settingsObject.shape).filter(
  (key): key is SettingKey => key in settingsObject.shape,
);

// ============================================================================
// Typed Configuration
// ============================================================================

export interface AppConfig {
  app: {
    logLevel: LogLevel;
    configPath: string | null;
    /** Directory for JSON log files; null = console only */
    logDir: string | null;
  };
  account: AccountCredentials;
  marketplace: MarketplaceConfig;
  monitoring: {
    eventId: string;
    cadenceMs: number;
    maxBackoffMs: number;
    escalateAfterFailures: number;
  };
  filter: FilterConfig;
  notifications: {
    discord: { webhookUrl: string; timeout: number } | null;
  };
  purchaseAssist: {
    headless: boolean;
  };
}

export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error */
  configPath?: string;
  /** Defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  /** CLI flags */
  overrides?: Partial<SettingsInput>;
  cwd?: string;
}

// ============================================================================
// Loading
// ============================================================================

function readConfigFile(filePath: string, explicit: boolean): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new ConfigError([`config file not found: ${filePath}`]);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${filePath}: not valid JSON (${reason})`]);
  }

  const record = z.record(z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ConfigError([`${filePath}: top level must be a JSON object`]);
  }
  return record.data;
}

/**
 * Pick TICKET_SENTINEL_<KEY> variables for every known setting
 */
export function readEnvSettings(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const settings: Record<string, unknown> = {};

  for (const key of SETTING_KEYS) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined && value !== '') {
      settings[key] = value;
    }
  }

  return settings;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function toAppConfig(settings: Settings, configPath: string | null, cwd: string = process.cwd()): AppConfig {
  const cadenceMs = Math.round(settings.time_delay * 1000);
  const timeout = Math.round(settings.request_timeout * 1000);

  return {
    app: {
      logLevel: settings.log_level,
      configPath,
      logDir: settings.log_dir ? path.resolve(cwd, settings.log_dir) : null,
    },
    account: {
      user: settings.user,
      password: settings.password,
    },
    marketplace: {
      name: 'twickets',
      baseUrl: settings.base_url,
      apiKey: settings.api_key,
      userAgent: settings.user_agent,
      timeout,
      retryAttempts: 2,
      retryDelay: 500,
      minRequestSpacing: cadenceMs,
    },
    monitoring: {
      eventId: settings.event_id,
      cadenceMs,
      maxBackoffMs: Math.round(settings.max_backoff * 1000),
      escalateAfterFailures: settings.escalate_after_failures,
    },
    filter: {
      minSeats: settings.min_seats,
      maxSeats: settings.max_seats,
      maxPrice: settings.max_price ?? null,
      skipMeetupDelivery: settings.skip_meetup_delivery,
    },
    notifications: {
      discord: settings.discord_webhook_url
        ? { webhookUrl: settings.discord_webhook_url, timeout }
        : null,
    },
    purchaseAssist: {
      headless: settings.headless,
    },
  };
}

/**
 * Load and validate configuration
 * @throws ConfigError listing every problem found
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();

  if (!options.env) {
    dotenv.config({ path: path.resolve(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_PATH);
  const fileSettings = readConfigFile(configPath, explicit);

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined),
  );

  const merged = {
    ...fileSettings,
    ...readEnvSettings(env),
    ...overrides,
  };

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  return toAppConfig(result.data, fs.existsSync(configPath) ? configPath : null, cwd);
}
