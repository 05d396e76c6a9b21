/**
 * Status command handler for the sesame CLI.
 *
 * Displays a document's ledger: how many candidates have been checked,
 * where the ledger files are and, once found, the password.
 */

import * as path from 'node:path';
import { documentIdentity, type LedgerStats } from '../../ledger/index.js';
import { CliUsageError } from '../errors.js';
import type { CliCommandResult, CliContext, DisplayOptions } from '../types.js';
import { formatCount, wrapInBox } from '../utils/displayUtils.js';
import { createLedgerStore, parseCommandArgs } from './common.js';

/**
 * Formats ledger statistics for display.
 *
 * @param stats - The ledger statistics.
 * @param options - Display options.
 * @returns Boxed status text.
 */
export function formatStatus(stats: LedgerStats, options: DisplayOptions): string {
  const bold = options.colors ? '\x1b[1m' : '';
  const green = options.colors ? '\x1b[32m' : '';
  const dim = options.colors ? '\x1b[2m' : '';
  const reset = options.colors ? '\x1b[0m' : '';

  const lines = [
    `${bold}Document:${reset} ${stats.identity}`,
    `${bold}Checked:${reset} ${formatCount(stats.checkedCount)} candidates`,
    stats.password !== undefined
      ? `${bold}Password:${reset} ${green}${stats.password}${reset}`
      : `${bold}Password:${reset} ${dim}not found yet${reset}`,
    `${bold}Ledger:${reset} ${stats.paths.checked}`,
    `${bold}Success record:${reset} ${stats.paths.success}`,
  ];

  return wrapInBox(lines.join('\n'), options);
}

/**
 * Handles the status command.
 *
 * The document need not exist; only its name selects the ledger.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export async function handleStatusCommand(context: CliContext): Promise<CliCommandResult> {
  const { positionals } = parseCommandArgs(context.args);
  const [document, ...extra] = positionals;
  if (document === undefined) {
    throw new CliUsageError('status requires a document. Usage: sesame status <document>');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const store = createLedgerStore(context, context.config);
  const stats = await store.stats(documentIdentity(path.resolve(context.cwd, document)));

  console.log(formatStatus(stats, context.display));
  return { exitCode: 0 };
}
