/**
 * Estimate command handler for the sesame CLI.
 *
 * Shows how many candidates the configured search would generate,
 * before deduplication and before skipping ledger entries.
 */

import { assertConfigValid, mergeConfig } from '../../config/index.js';
import { estimateSearchSpace, type SearchSpaceEstimate } from '../../generation/index.js';
import { CliUsageError } from '../errors.js';
import type { CliCommandResult, CliContext, DisplayOptions } from '../types.js';
import { formatCount, wrapInBox } from '../utils/displayUtils.js';
import { buildGenerationSpec, parseCommandArgs } from './common.js';

/**
 * Formats a search-space estimate for display.
 */
export function formatEstimate(
  estimate: SearchSpaceEstimate,
  maxLength: number,
  options: DisplayOptions
): string {
  const bold = options.colors ? '\x1b[1m' : '';
  const reset = options.colors ? '\x1b[0m' : '';

  const lines = [`${bold}Mode:${reset} ${estimate.mode}`];
  if (estimate.mode === 'templated') {
    lines.push(`${bold}Base variants:${reset} ${formatCount(estimate.bodyChoices)}`);
  } else {
    lines.push(`${bold}Max length:${reset} ${String(maxLength)}`);
    lines.push(`${bold}Alphabet:${reset} ${formatCount(estimate.bodyChoices)} characters`);
  }
  lines.push(`${bold}Prefix variants:${reset} ${formatCount(estimate.prefixVariants)}`);
  lines.push(`${bold}Suffix variants:${reset} ${formatCount(estimate.suffixVariants)}`);
  lines.push(`${bold}Candidates:${reset} ${formatCount(estimate.candidates)}`);

  return wrapInBox(lines.join('\n'), options);
}

/**
 * Handles the estimate command.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export function handleEstimateCommand(context: CliContext): CliCommandResult {
  const parsed = parseCommandArgs(context.args, { search: true });
  if (parsed.positionals.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${parsed.positionals.join(' ')}`);
  }

  const config = mergeConfig(context.config, { search: parsed.search });
  assertConfigValid(config);
  const spec = buildGenerationSpec(config.search);

  console.log(formatEstimate(estimateSearchSpace(spec), spec.maxLength, context.display));
  return { exitCode: 0 };
}
