/**
 * Default configuration values for sesame.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_MAX_LENGTH } from '../generation/spec.js';
import {
  DEFAULT_CHECK_ARGS,
  DEFAULT_NOT_ENCRYPTED_EXIT_CODES,
  DEFAULT_VERIFIER_COMMAND,
  DEFAULT_VERIFIER_TIMEOUT_MS,
  DEFAULT_VERIFY_ARGS,
  DEFAULT_WRONG_PASSWORD_PATTERN,
} from '../verifier/command.js';
import type {
  CliSettingsConfig,
  Config,
  LedgerConfig,
  NotificationConfig,
  PathConfig,
  SearchConfig,
  VerifierConfig,
} from './types.js';

/**
 * Default search: templated mode with no bases, so a base list must be configured.
 */
export const DEFAULT_SEARCH: SearchConfig = {
  mode: 'templated',
  bases: [],
  prefixes: [],
  suffixes: [],
  max_length: DEFAULT_MAX_LENGTH,
  charset: undefined,
  dedup: 'auto',
};

/**
 * Default path configuration relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  ledger: '.sesame/ledger',
};

/**
 * Default ledger settings.
 */
export const DEFAULT_LEDGER: LedgerConfig = {
  fsync: false,
};

/**
 * Default verifier, targeting msoffcrypto-tool.
 */
export const DEFAULT_VERIFIER: VerifierConfig = {
  command: DEFAULT_VERIFIER_COMMAND,
  check_args: [...DEFAULT_CHECK_ARGS],
  verify_args: [...DEFAULT_VERIFY_ARGS],
  not_encrypted_exit_codes: [...DEFAULT_NOT_ENCRYPTED_EXIT_CODES],
  wrong_password_pattern: DEFAULT_WRONG_PASSWORD_PATTERN,
  timeout_ms: DEFAULT_VERIFIER_TIMEOUT_MS,
};

/**
 * Default notification configuration (no hooks).
 */
export const DEFAULT_NOTIFICATIONS: NotificationConfig = {};

/**
 * Default CLI configuration.
 */
export const DEFAULT_CLI_CONFIG: CliSettingsConfig = {
  colors: true,
  progress_interval: 1000,
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  search: DEFAULT_SEARCH,
  paths: DEFAULT_PATHS,
  ledger: DEFAULT_LEDGER,
  verifier: DEFAULT_VERIFIER,
  cli: DEFAULT_CLI_CONFIG,
  notifications: DEFAULT_NOTIFICATIONS,
};
