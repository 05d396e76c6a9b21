/**
 * Version command handler for the sesame CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * Both `src/cli/commands` and `dist/cli/commands` sit three levels below the package root.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '(unknown)';
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  const version = getVersionFromPackageJson();
  console.log(`sesame v${version}`);
  return { exitCode: 0 };
}
