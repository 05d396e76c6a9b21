#!/usr/bin/env node

/**
 * sesame CLI entry point.
 *
 * This is the main entry point for the 'sesame' CLI command.
 */

import { runCli } from './runner.js';

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
