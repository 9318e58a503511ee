/**
 * Command-line flags
 */

import { ConfigError, type SettingsInput } from '../config/index.js';

export interface CliArgs {
  help: boolean;
  configFile?: string;
  /** Settings given on the command line; they override env and file */
  overrides: Partial<SettingsInput>;
}

export const USAGE = `Usage: ticket-sentinel [options]

Options:
  --config-file <path>   JSON config file (default: ./config.json)
  --log-level <level>    error | warn | info | debug
  --event-id <id>        Event to monitor
  --time-delay <sec>     Seconds between polls
  --headless             Log purchase links instead of opening a browser
  --no-headless          Open purchase links in the default browser
  -h, --help             Show this help`;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Parse argv (without the node and script entries)
 * @throws ConfigError on an unknown flag or a missing or malformed value
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, overrides: {} };
  const errors: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.indexOf('=');
    const flag = raw.startsWith('--') && eq > 0 ? raw.slice(0, eq) : raw;
    const inline = raw.startsWith('--') && eq > 0 ? raw.slice(eq + 1) : undefined;

    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        errors.push(`${flag} requires a value`);
        return undefined;
      }
      i++;
      return next;
    };

    if (flag === '--help' || flag === '-h') {
      args.help = true;
    } else if (flag === '--headless') {
      args.overrides.headless = true;
    } else if (flag === '--no-headless') {
      args.overrides.headless = false;
    } else if (flag === '--config-file') {
      const value = takeValue();
      if (value !== undefined) args.configFile = value;
    } else if (flag === '--event-id') {
      const value = takeValue();
      if (value !== undefined) args.overrides.event_id = value;
    } else if (flag === '--log-level') {
      const value = takeValue();
      if (value !== undefined) {
        if (isLogLevel(value)) {
          args.overrides.log_level = value;
        } else {
          errors.push(`--log-level must be one of ${LOG_LEVELS.join(', ')}`);
        }
      }
    } else if (flag === '--time-delay') {
      const value = takeValue();
      if (value !== undefined) {
        const seconds = Number(value);
        if (Number.isFinite(seconds) && seconds > 0) {
          args.overrides.time_delay = seconds;
        } else {
          errors.push('--time-delay must be a positive number of seconds');
        }
      }
    } else {
      errors.push(`unknown option: ${raw}`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return args;
}
