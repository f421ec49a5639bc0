#!/usr/bin/env node
/**
 * @fileoverview servectl CLI entry point
 *
 * Sets up global error handlers and invokes the CLI parser.
 *
 * @module index
 */

import { program } from './cli.js';

// The web command is long-lived: log and keep serving instead of exiting
const isWebMode = process.argv.includes('web');

let consecutiveErrors = 0;
const MAX_CONSECUTIVE_ERRORS = 5;
const ERROR_RESET_MS = 60000;
let errorResetTimer: ReturnType<typeof setTimeout> | null = null;

function trackError(): void {
  consecutiveErrors++;
  if (errorResetTimer) clearTimeout(errorResetTimer);
  errorResetTimer = setTimeout(() => { consecutiveErrors = 0; }, ERROR_RESET_MS);
  errorResetTimer.unref();

  if (consecutiveErrors >= MAX_CONSECUTIVE_ERRORS) {
    console.error(`[FATAL] ${MAX_CONSECUTIVE_ERRORS} consecutive unhandled errors, exiting`);
    process.exit(1);
  }
}

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err.message);
  if (isWebMode) {
    console.error('[RECOVERED] Server continuing after uncaught exception:', err.stack);
    trackError();
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  if (isWebMode) {
    console.error('[RECOVERED] Server continuing after unhandled rejection');
    trackError();
  } else {
    process.exit(1);
  }
});

program.parseAsync().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
