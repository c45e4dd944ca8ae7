#!/usr/bin/env node
/**
 * futures-trader
 *
 * CLI entry point. Loads .env, builds the configuration once,
 * runs a single command and exits with a status-specific code.
 */

import { config as loadEnv } from 'dotenv';
import { App } from './app.js';
import { loadConfig } from './config.js';
import { configureLogger, logger } from './logger.js';
import { ConfigurationError, ValidationError, toError } from './errors.js';
import { createProgram } from './cli/program.js';
import { formatSummary } from './cli/formatter.js';
import { EXIT_CODES, exitCodeForError, exitCodeForStatus } from './cli/exitCodes.js';
import type { CommandOptions } from './cli/program.js';
import type { OrderIntentInput } from './orders/types.js';

loadEnv();

let app: App | null = null;
let exitCode: number = EXIT_CODES.SUCCESS;
let interrupted = false;

async function runCommand(input: OrderIntentInput, options: CommandOptions): Promise<void> {
  const baseConfig = loadConfig();
  const config = options.failurePolicy
    ? { ...baseConfig, twap: { ...baseConfig.twap, failurePolicy: options.failurePolicy } }
    : baseConfig;

  configureLogger(config.logging);
  app = new App(config);

  try {
    const state = await app.execute(input, { waitSeconds: options.waitSeconds });
    console.log(formatSummary(state));
    exitCode = exitCodeForStatus(state.status);
  } finally {
    await app.close();
  }
}

function reportError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(`Invalid order [${error.kind}] ${error.field}: ${error.message}`);
    return;
  }
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
    return;
  }

  const normalizedError = toError(error);
  logger.error('Command failed', {
    error: normalizedError.message,
    stack: normalizedError.stack,
  });
  console.error(`Error: ${normalizedError.message}`);
}

// First signal cancels running TWAPs and lets the command report; a second one exits
function onSignal(signal: NodeJS.Signals): void {
  if (interrupted || !app) {
    logger.warn(`Received ${signal}, exiting without waiting`);
    process.exit(130);
  }

  interrupted = true;
  logger.info(`Received ${signal}, cancelling active orders...`);
  app.cancelActive().catch((error: unknown) => {
    logger.error('Cancel on shutdown failed', { error: toError(error).message });
  });
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

async function main(): Promise<void> {
  const program = createProgram(runCommand);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    reportError(error);
    exitCode = exitCodeForError(error);
  }

  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${toError(error).message}`);
  process.exit(EXIT_CODES.ORDER_FAILED);
});
