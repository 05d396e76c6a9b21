/**
 * TOML configuration parser for sesame.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { execa } from 'execa';
import { DEDUP_POLICIES, GENERATION_MODES } from '../generation/types.js';
import type { DedupPolicy, GenerationMode } from '../generation/types.js';
import { Logger } from '../utils/logger.js';
import {
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_LEDGER,
  DEFAULT_NOTIFICATIONS,
  DEFAULT_PATHS,
  DEFAULT_SEARCH,
  DEFAULT_VERIFIER,
} from './defaults.js';
import type {
  CliSettingsConfig,
  Config,
  LedgerConfig,
  NotificationConfig,
  NotificationHook,
  NotificationHooks,
  PathConfig,
  SearchConfig,
  VerifierConfig,
} from './types.js';

const logger = new Logger({ component: 'config' });

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks whether a hook command can be found. Resolves to false if not.
 */
export type CommandChecker = (command: string) => Promise<boolean>;

/**
 * Options for {@link parseConfig}.
 */
export interface ParseConfigOptions {
  /** Lookup used to warn about hook commands missing from PATH. Default runs `which`. */
  commandChecker?: CommandChecker | undefined;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a table, if present.
 *
 * @throws ConfigParseError if value is present and not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected array, got ${typeof value}`);
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates that a value is an array of numbers.
 *
 * @throws ConfigParseError if value is not an array or holds a non-number.
 */
function validateNumberArray(value: unknown, fieldPath: string): number[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected array, got ${typeof value}`);
  }
  return value.map((item: unknown, index) => validateNumber(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates a value against a fixed list of choices.
 *
 * @throws ConfigParseError if value is not one of the choices.
 */
function validateChoice<T extends string>(
  value: unknown,
  choices: readonly T[],
  fieldPath: string
): T {
  const text = validateString(value, fieldPath);
  const match = choices.find((choice) => choice === text);
  if (match === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${choices.map((c) => `'${c}'`).join(', ')}, got '${text}'`
    );
  }
  return match;
}

/**
 * Parses search configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for search section.
 * @returns Validated search configuration merged with defaults.
 */
function parseSearch(raw: Record<string, unknown> | undefined): SearchConfig {
  const result: SearchConfig = { ...DEFAULT_SEARCH };
  if (raw === undefined) {
    return result;
  }

  if ('mode' in raw) {
    result.mode = validateChoice<GenerationMode>(raw.mode, GENERATION_MODES, 'search.mode');
  }
  if ('bases' in raw) {
    result.bases = validateStringArray(raw.bases, 'search.bases');
  }
  if ('prefixes' in raw) {
    result.prefixes = validateStringArray(raw.prefixes, 'search.prefixes');
  }
  if ('suffixes' in raw) {
    result.suffixes = validateStringArray(raw.suffixes, 'search.suffixes');
  }
  if ('max_length' in raw) {
    result.max_length = validateNumber(raw.max_length, 'search.max_length');
  }
  if ('charset' in raw) {
    result.charset = validateString(raw.charset, 'search.charset');
  }
  if ('dedup' in raw) {
    result.dedup = validateChoice<DedupPolicy>(raw.dedup, DEDUP_POLICIES, 'search.dedup');
  }

  return result;
}

/**
 * Parses path configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for paths section.
 * @returns Validated path configuration merged with defaults.
 */
function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  if (raw === undefined) {
    return { ...DEFAULT_PATHS };
  }

  const result: PathConfig = { ...DEFAULT_PATHS };

  if ('ledger' in raw) {
    result.ledger = validateString(raw.ledger, 'paths.ledger');
  }

  return result;
}

function parseLedger(raw: Record<string, unknown> | undefined): LedgerConfig {
  const result: LedgerConfig = { ...DEFAULT_LEDGER };
  if (raw !== undefined && 'fsync' in raw) {
    result.fsync = validateBoolean(raw.fsync, 'ledger.fsync');
  }
  return result;
}

/**
 * Parses verifier configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for verifier section.
 * @returns Validated verifier configuration merged with defaults.
 */
function parseVerifier(raw: Record<string, unknown> | undefined): VerifierConfig {
  const result: VerifierConfig = { ...DEFAULT_VERIFIER };
  if (raw === undefined) {
    return result;
  }

  if ('command' in raw) {
    result.command = validateString(raw.command, 'verifier.command');
  }
  if ('check_args' in raw) {
    result.check_args = validateStringArray(raw.check_args, 'verifier.check_args');
  }
  if ('verify_args' in raw) {
    result.verify_args = validateStringArray(raw.verify_args, 'verifier.verify_args');
  }
  if ('not_encrypted_exit_codes' in raw) {
    result.not_encrypted_exit_codes = validateNumberArray(
      raw.not_encrypted_exit_codes,
      'verifier.not_encrypted_exit_codes'
    );
  }
  if ('wrong_password_pattern' in raw) {
    result.wrong_password_pattern = validateString(
      raw.wrong_password_pattern,
      'verifier.wrong_password_pattern'
    );
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'verifier.timeout_ms');
  }

  return result;
}

/**
 * Parses a notification hook from raw TOML data.
 *
 * @param raw - Raw TOML object for a single hook.
 * @param hookName - Name of the hook for error messages.
 * @returns Validated notification hook, or undefined if incomplete.
 */
function parseNotificationHook(raw: unknown, hookName: string): NotificationHook | undefined {
  if (!isTable(raw)) {
    return undefined;
  }

  const hook: Partial<NotificationHook> = {};

  if ('command' in raw) {
    hook.command = validateString(raw.command, `notifications.hooks.${hookName}.command`);
  }

  if ('enabled' in raw) {
    hook.enabled = validateBoolean(raw.enabled, `notifications.hooks.${hookName}.enabled`);
  }

  if (hook.command === undefined || hook.enabled === undefined) {
    return undefined;
  }

  return {
    command: hook.command,
    enabled: hook.enabled,
  };
}

/**
 * Checks a command with `which`.
 */
async function whichCommand(command: string): Promise<boolean> {
  try {
    await execa('which', [command], {
      reject: true,
      timeout: 1000,
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Warns when the program named by an enabled hook is not on PATH.
 *
 * @param command - The shell command to validate.
 * @param hookName - Name of the hook for warning messages.
 * @param checker - Command lookup.
 */
async function warnIfCommandMissing(
  command: string,
  hookName: string,
  checker: CommandChecker
): Promise<void> {
  const commandName = command.trim().split(/\s+/)[0];
  if (commandName === undefined || commandName === '') {
    logger.warn('hook_command_invalid', { hook: hookName });
    return;
  }

  if (!(await checker(commandName))) {
    logger.warn('hook_command_not_found', {
      hook: hookName,
      command: commandName,
      hint: 'The hook will fail to run. Please ensure the command is available in PATH.',
    });
  }
}

const HOOK_NAMES = ['on_found', 'on_exhausted'] as const;

/**
 * Parses notification configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for notifications section.
 * @param checker - Command lookup for hook warnings.
 * @returns Validated notification configuration merged with defaults.
 */
async function parseNotifications(
  raw: Record<string, unknown> | undefined,
  checker: CommandChecker
): Promise<NotificationConfig> {
  const rawHooks = validateTable(raw?.hooks, 'notifications.hooks');
  if (rawHooks === undefined) {
    return { ...DEFAULT_NOTIFICATIONS };
  }

  const hooks: NotificationHooks = {};
  for (const name of HOOK_NAMES) {
    if (!(name in rawHooks)) {
      continue;
    }
    const hook = parseNotificationHook(rawHooks[name], name);
    if (hook !== undefined) {
      if (hook.enabled) {
        await warnIfCommandMissing(hook.command, name, checker);
      }
      hooks[name] = hook;
    }
  }

  return { hooks };
}

/**
 * Parses CLI configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for cli section.
 * @returns Validated CLI configuration merged with defaults.
 */
function parseCliSettings(raw: Record<string, unknown> | undefined): CliSettingsConfig {
  if (raw === undefined) {
    return { ...DEFAULT_CLI_CONFIG };
  }

  const result: CliSettingsConfig = { ...DEFAULT_CLI_CONFIG };

  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'cli.colors');
  }
  if ('progress_interval' in raw) {
    result.progress_interval = validateNumber(raw.progress_interval, 'cli.progress_interval');
  }
  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'cli.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a typed Config object.
 *
 * Ranges and cross-field rules are checked separately by `validateConfig`.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @param options - Parse options.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const toml = `
 * [search]
 * bases = ["summer", "winter"]
 * suffixes = ["2023", "2024", "!"]
 * `;
 *
 * const config = await parseConfig(toml);
 * console.log(config.search.bases); // ["summer", "winter"]
 * console.log(config.paths.ledger); // ".sesame/ledger"
 * ```
 */
export async function parseConfig(
  tomlContent: string,
  options: ParseConfigOptions = {}
): Promise<Config> {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    search: parseSearch(validateTable(parsed.search, 'search')),
    paths: parsePaths(validateTable(parsed.paths, 'paths')),
    ledger: parseLedger(validateTable(parsed.ledger, 'ledger')),
    verifier: parseVerifier(validateTable(parsed.verifier, 'verifier')),
    cli: parseCliSettings(validateTable(parsed.cli, 'cli')),
    notifications: await parseNotifications(
      validateTable(parsed.notifications, 'notifications'),
      options.commandChecker ?? whichCommand
    ),
  };
}

/**
 * Returns a copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.verifier.command); // "msoffcrypto-tool"
 * ```
 */
export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG };
}
