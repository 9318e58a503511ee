#!/usr/bin/env node
/**
 * Ticket Sentinel
 * Command-line entry point
 */

import { loadConfig } from './config/index.js';
import { TicketSentinelApp } from './app.js';
import { parseArgs, USAGE } from './cli/args.js';
import { ExitCode, exitCodeFor, exitCodeForError } from './cli/exit-codes.js';
import { addFileTransports, logger, setLogLevel } from './utils/logger.js';

async function main(argv: string[]): Promise<ExitCode> {
  const controller = new AbortController();

  // --- Unhandled rejection handler ---
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  // --- Graceful shutdown on SIGINT / SIGTERM ---
  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, exiting immediately`);
      process.exit(ExitCode.UNEXPECTED);
    }
    logger.info(`Received ${signal}, shutting down gracefully...`);
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const cli = parseArgs(argv);
    if (cli.help) {
      process.stdout.write(`${USAGE}\n`);
      return ExitCode.OK;
    }

    const config = loadConfig({ configPath: cli.configFile, overrides: cli.overrides });
    setLogLevel(config.app.logLevel);
    if (config.app.logDir) {
      addFileTransports(config.app.logDir);
    }

    const app = new TicketSentinelApp(config);
    const outcome = await app.run(controller.signal);

    const status = app.getStatus();
    logger.info('Ticket Sentinel finished', { outcome, ...status });

    if (outcome.status === 'fatal') {
      logger.error(outcome.message);
    }
    return exitCodeFor(outcome);
  } catch (error) {
    logger.error('Ticket Sentinel failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return exitCodeForError(error);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main(process.argv.slice(2)).then(
  code => process.exit(code),
  (error: unknown) => {
    logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
    process.exit(ExitCode.UNEXPECTED);
  },
);
