/**
 * Configuration module for sesame.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type { CommandChecker, ParseConfigOptions } from './parser.js';
export type {
  CliSettingsConfig,
  Config,
  LedgerConfig,
  NotificationConfig,
  NotificationHook,
  NotificationHooks,
  PartialConfig,
  PathConfig,
  SearchConfig,
  VerifierConfig,
} from './types.js';
export {
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_LEDGER,
  DEFAULT_NOTIFICATIONS,
  DEFAULT_PATHS,
  DEFAULT_SEARCH,
  DEFAULT_VERIFIER,
} from './defaults.js';
export {
  ConfigValidationError,
  MAX_EXHAUSTIVE_LENGTH,
  validateConfig,
  assertConfigValid,
} from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord, EnvVarType } from './env.js';
