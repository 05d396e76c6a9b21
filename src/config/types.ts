/**
 * Configuration types for sesame.toml parsing.
 *
 * @packageDocumentation
 */

import type { DedupPolicy, GenerationMode } from '../generation/types.js';

/**
 * Candidate generation settings.
 */
export interface SearchConfig {
  /** Generation mode. */
  mode: GenerationMode;
  /** Base words for templated mode. */
  bases: string[];
  /** Tokens placed before the body. */
  prefixes: string[];
  /** Tokens placed after the body. */
  suffixes: string[];
  /** Longest body tried in exhaustive mode. */
  max_length: number;
  /** Exhaustive alphabet; undefined selects letters, digits and punctuation. */
  charset: string | undefined;
  /** Whether to always filter repeats or only when they can occur. */
  dedup: DedupPolicy;
}

/**
 * Path configuration.
 */
export interface PathConfig {
  /** Directory holding the checkpoint ledger. */
  ledger: string;
}

/**
 * Ledger durability settings.
 */
export interface LedgerConfig {
  /** Whether every append is followed by `datasync()`. */
  fsync: boolean;
}

/**
 * External decryption tool settings.
 */
export interface VerifierConfig {
  /** Executable that checks and opens documents. */
  command: string;
  /** Arguments for the encryption check. */
  check_args: string[];
  /** Arguments for one password attempt. */
  verify_args: string[];
  /** Check exit codes that mean the document is not encrypted. */
  not_encrypted_exit_codes: number[];
  /** Regular expression marking a rejected password in the tool's output. */
  wrong_password_pattern: string;
  /** Per-invocation timeout in milliseconds. */
  timeout_ms: number;
}

/**
 * CLI configuration for terminal behavior.
 */
export interface CliSettingsConfig {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  /** Attempts between progress lines. */
  progress_interval: number;
  /** Whether debug-level log entries are written. */
  debug: boolean;
}

/**
 * Notification hook configuration.
 * Hooks are shell commands executed when a run ends.
 */
export interface NotificationHook {
  /** Shell command to execute when hook triggers. */
  command: string;
  /** Whether the hook is enabled. */
  enabled: boolean;
}

/**
 * Notification hooks per run outcome.
 */
export interface NotificationHooks {
  /** Hook triggered when the password is found. */
  on_found?: NotificationHook;
  /** Hook triggered when the search space is exhausted. */
  on_exhausted?: NotificationHook;
}

/**
 * Notification configuration.
 */
export interface NotificationConfig {
  /** Shell command hooks for run outcomes. */
  readonly hooks?: NotificationHooks | undefined;
}

/**
 * Complete configuration object parsed from sesame.toml.
 */
export interface Config {
  /** Candidate generation settings. */
  search: SearchConfig;
  /** Path configuration. */
  paths: PathConfig;
  /** Ledger durability settings. */
  ledger: LedgerConfig;
  /** External tool settings. */
  verifier: VerifierConfig;
  /** CLI settings for terminal behavior. */
  cli: CliSettingsConfig;
  /** Hooks run when a search ends. */
  notifications: NotificationConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  search?: Partial<SearchConfig>;
  paths?: Partial<PathConfig>;
  ledger?: Partial<LedgerConfig>;
  verifier?: Partial<VerifierConfig>;
  cli?: Partial<CliSettingsConfig>;
  notifications?: NotificationConfig;
}
