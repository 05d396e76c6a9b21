/**
 * Run command handler for the sesame CLI.
 *
 * Searches for the password of one document, resuming from its ledger.
 * SIGINT and SIGTERM cancel the run after the candidate in flight.
 */

import * as path from 'node:path';
import { assertConfigValid, mergeConfig, type Config } from '../../config/index.js';
import { documentIdentity } from '../../ledger/index.js';
import {
  FatalInputError,
  assertTargetFile,
  runRecovery,
  type RecoveryResult,
  type RunMetrics,
} from '../../recovery/index.js';
import { CommandVerifier, type DocumentVerifier } from '../../verifier/index.js';
import { CliUsageError } from '../errors.js';
import { NotificationHooksExecutor } from '../hooks.js';
import {
  EXIT_CANCELLED,
  EXIT_EXHAUSTED,
  EXIT_FOUND,
  type CliCommandResult,
  type CliContext,
  type DisplayOptions,
} from '../types.js';
import { formatCount, formatDuration, formatRate, wrapInBox } from '../utils/displayUtils.js';
import {
  buildGenerationSpec,
  createLedgerStore,
  createPathChecker,
  parseCommandArgs,
} from './common.js';

/**
 * Dependencies the run command can be given instead of building its own.
 */
export interface RunCommandOptions {
  /** Verifier to use. Default: a CommandVerifier built from `[verifier]`. */
  verifier?: DocumentVerifier;
  /** Cancels the run, in addition to SIGINT and SIGTERM. */
  signal?: AbortSignal;
  /** Hook runner. Default: one built from `[notifications.hooks]`. */
  hooks?: NotificationHooksExecutor;
}

/**
 * Builds the command verifier from the `[verifier]` section.
 */
export function createCommandVerifier(context: CliContext, config: Config): CommandVerifier {
  return new CommandVerifier({
    command: config.verifier.command,
    checkArgs: config.verifier.check_args,
    verifyArgs: config.verifier.verify_args,
    notEncryptedExitCodes: config.verifier.not_encrypted_exit_codes,
    wrongPasswordPattern: config.verifier.wrong_password_pattern,
    timeoutMs: config.verifier.timeout_ms,
    cwd: context.cwd,
    logger: context.logger.child('CommandVerifier'),
  });
}

/**
 * Formats one progress line.
 */
export function formatProgress(metrics: RunMetrics): string {
  return (
    `checked ${formatCount(metrics.attempted)} ` +
    `(skipped ${formatCount(metrics.skipped)}, anomalies ${formatCount(metrics.anomalies)}) ` +
    `in ${formatDuration(metrics.elapsedMs)}, ${formatRate(metrics.ratePerSecond)}`
  );
}

/**
 * Formats the end-of-run summary box.
 */
export function formatRunSummary(result: RecoveryResult, options: DisplayOptions): string {
  const bold = options.colors ? '\x1b[1m' : '';
  const green = options.colors ? '\x1b[32m' : '';
  const yellow = options.colors ? '\x1b[33m' : '';
  const reset = options.colors ? '\x1b[0m' : '';

  const lines: string[] = [`${bold}Document:${reset} ${result.identity}`];

  switch (result.state) {
    case 'Success':
      lines.push(`${bold}Result:${reset} ${green}password found${reset}`);
      lines.push(`${bold}Password:${reset} ${result.password}`);
      break;
    case 'Exhausted':
      if (result.reason === 'not_encrypted') {
        lines.push(`${bold}Result:${reset} document is not encrypted`);
      } else if (result.reason === 'encryption_undetermined') {
        lines.push(`${bold}Result:${reset} ${yellow}could not determine encryption${reset}`);
        if (result.detail !== undefined) {
          lines.push(`${bold}Detail:${reset} ${result.detail}`);
        }
      } else {
        lines.push(`${bold}Result:${reset} search space exhausted`);
      }
      break;
    case 'Cancelled':
      lines.push(`${bold}Result:${reset} ${yellow}cancelled${reset}`);
      break;
    default: {
      const exhaustiveCheck: never = result;
      return exhaustiveCheck;
    }
  }

  const { metrics } = result;
  lines.push(
    `${bold}Checked:${reset} ${formatCount(metrics.attempted)} ` +
      `(rejected ${formatCount(metrics.rejected)}, anomalies ${formatCount(metrics.anomalies)})`
  );
  lines.push(`${bold}Skipped:${reset} ${formatCount(metrics.skipped)} already in ledger`);
  lines.push(
    `${bold}Elapsed:${reset} ${formatDuration(metrics.elapsedMs)} (${formatRate(metrics.ratePerSecond)})`
  );
  if (result.lastAnomaly !== undefined) {
    lines.push(`${bold}Last anomaly:${reset} ${result.lastAnomaly}`);
  }

  return wrapInBox(lines.join('\n'), options);
}

/**
 * Maps a run outcome to the process exit code.
 */
export function exitCodeFor(result: RecoveryResult): number {
  switch (result.state) {
    case 'Success':
      return EXIT_FOUND;
    case 'Exhausted':
      return EXIT_EXHAUSTED;
    case 'Cancelled':
      return EXIT_CANCELLED;
    default: {
      const exhaustiveCheck: never = result;
      return exhaustiveCheck;
    }
  }
}

/**
 * Handles the run command.
 *
 * @param context - The CLI context.
 * @param options - Injected verifier, signal and hooks.
 * @returns The command result; the exit code reflects the run outcome.
 */
export async function handleRunCommand(
  context: CliContext,
  options: RunCommandOptions = {}
): Promise<CliCommandResult> {
  const parsed = parseCommandArgs(context.args, { search: true, force: true });
  const [document, ...extra] = parsed.positionals;
  if (document === undefined) {
    throw new FatalInputError(
      'No target document was provided. Usage: sesame run <document>',
      'TARGET_NOT_PROVIDED',
      ''
    );
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const config = mergeConfig(context.config, { search: parsed.search });
  assertConfigValid(config, { pathChecker: createPathChecker(context.cwd) });
  const spec = buildGenerationSpec(config.search);

  const documentPath = path.resolve(context.cwd, document);
  await assertTargetFile(documentPath);

  const identity = documentIdentity(documentPath);
  const store = createLedgerStore(context, config);

  const recorded = await store.readSuccess(identity);
  if (recorded !== undefined && !parsed.force) {
    console.log(`Password for ${identity} was already found: ${recorded}`);
    console.log('Use --force to search again.');
    return { exitCode: EXIT_FOUND };
  }

  const verifier = options.verifier ?? createCommandVerifier(context, config);
  const hooks =
    options.hooks ??
    new NotificationHooksExecutor(config.notifications.hooks ?? {}, {
      cwd: context.cwd,
      logger: context.logger.child('hooks'),
    });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    context.logger.info('signal_received', { signal });
    controller.abort();
  };
  const onExternalAbort = (): void => {
    controller.abort();
  };
  if (options.signal?.aborted === true) {
    controller.abort();
  }
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.error(`Searching ${identity} (${spec.mode} mode). Press Ctrl+C to stop.`);

  let result: RecoveryResult;
  try {
    result = await runRecovery({
      documentPath,
      spec,
      verifier,
      store,
      signal: controller.signal,
      logger: context.logger.child('VerificationLoop'),
      progressInterval: config.cli.progress_interval,
      onProgress: (metrics) => {
        console.error(formatProgress(metrics));
      },
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  console.log(formatRunSummary(result, context.display));

  if (result.state === 'Success') {
    await hooks.onFound(documentPath);
  } else if (result.state === 'Exhausted') {
    await hooks.onExhausted(documentPath);
  }

  return { exitCode: exitCodeFor(result) };
}
