/**
 * Process exit codes
 */

import { ConfigError } from '../config/index.js';
import type { MonitorOutcome } from '../services/monitoring/monitor.service.js';

export const ExitCode = {
  OK: 0,
  UNEXPECTED: 1,
  CONFIG: 2,
  AUTH: 3,
  EVENT_NOT_FOUND: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(outcome: MonitorOutcome): ExitCode {
  if (outcome.status === 'stopped') return ExitCode.OK;

  switch (outcome.reason) {
    case 'auth':
      return ExitCode.AUTH;
    case 'invalid_event':
      return ExitCode.EVENT_NOT_FOUND;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof ConfigError ? ExitCode.CONFIG : ExitCode.UNEXPECTED;
}
