/**
 * Environment variable overrides for configuration.
 *
 * Provides support for SESAME_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { DEDUP_POLICIES, GENERATION_MODES } from '../generation/types.js';
import type { DedupPolicy, GenerationMode } from '../generation/types.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a comma-separated list. Entries are trimmed; empty entries are dropped.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function coerceToChoice<T extends string>(value: string, choices: readonly T[], envVar: string): T {
  const trimmed = value.trim();
  const match = choices.find((choice) => choice === trimmed);
  if (match === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      choices.join(' | '),
      `Cannot coerce '${envVar}' value '${value}'. Expected one of: ${choices.join(', ')}`
    );
  }
  return match;
}

/**
 * Kind of value an environment variable carries.
 */
export type EnvVarType = 'string' | 'number' | 'boolean' | 'list' | 'choice';

interface EnvVarMapping {
  readonly type: EnvVarType;
  readonly description: string;
  readonly apply: (overrides: PartialConfig, raw: string, envVar: string) => void;
}

function stringVar(description: string, set: (o: PartialConfig, v: string) => void): EnvVarMapping {
  return { type: 'string', description, apply: (o, raw) => set(o, raw) };
}

function numberVar(description: string, set: (o: PartialConfig, v: number) => void): EnvVarMapping {
  return { type: 'number', description, apply: (o, raw, envVar) => set(o, coerceToNumber(raw, envVar)) };
}

function booleanVar(description: string, set: (o: PartialConfig, v: boolean) => void): EnvVarMapping {
  return { type: 'boolean', description, apply: (o, raw, envVar) => set(o, coerceToBoolean(raw, envVar)) };
}

function listVar(description: string, set: (o: PartialConfig, v: string[]) => void): EnvVarMapping {
  return { type: 'list', description, apply: (o, raw) => set(o, coerceToList(raw)) };
}

const setMode = (o: PartialConfig, raw: string, envVar: string): void => {
  o.search = { ...o.search, mode: coerceToChoice<GenerationMode>(raw, GENERATION_MODES, envVar) };
};

const setMaxLength = (o: PartialConfig, v: number): void => {
  o.search = { ...o.search, max_length: v };
};

const setDebug = (o: PartialConfig, v: boolean): void => {
  o.cli = { ...o.cli, debug: v };
};

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: SESAME_<SECTION>_<FIELD> maps to config.<section>.<field>
 * For convenience, some shortcuts are provided (e.g., SESAME_MODE).
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvVarMapping> = new Map<string, EnvVarMapping>([
  // Shortcuts
  [
    'SESAME_MODE',
    {
      type: 'choice',
      description: 'Override the generation mode (shortcut for SESAME_SEARCH_MODE)',
      apply: setMode,
    },
  ],
  [
    'SESAME_MAX_LENGTH',
    numberVar('Override the exhaustive body length (shortcut for SESAME_SEARCH_MAX_LENGTH)', setMaxLength),
  ],
  ['SESAME_DEBUG', booleanVar('Enable debug logging (shortcut for SESAME_CLI_DEBUG)', setDebug)],

  // Search
  [
    'SESAME_SEARCH_MODE',
    { type: 'choice', description: 'Override the generation mode (templated, exhaustive)', apply: setMode },
  ],
  [
    'SESAME_SEARCH_BASES',
    listVar('Comma-separated base words', (o, v) => {
      o.search = { ...o.search, bases: v };
    }),
  ],
  [
    'SESAME_SEARCH_PREFIXES',
    listVar('Comma-separated prefixes', (o, v) => {
      o.search = { ...o.search, prefixes: v };
    }),
  ],
  [
    'SESAME_SEARCH_SUFFIXES',
    listVar('Comma-separated suffixes', (o, v) => {
      o.search = { ...o.search, suffixes: v };
    }),
  ],
  ['SESAME_SEARCH_MAX_LENGTH', numberVar('Override the exhaustive body length', setMaxLength)],
  [
    'SESAME_SEARCH_CHARSET',
    stringVar('Override the exhaustive charset', (o, v) => {
      o.search = { ...o.search, charset: v };
    }),
  ],
  [
    'SESAME_SEARCH_DEDUP',
    {
      type: 'choice',
      description: 'Override the dedup policy (auto, always)',
      apply: (o, raw, envVar) => {
        o.search = { ...o.search, dedup: coerceToChoice<DedupPolicy>(raw, DEDUP_POLICIES, envVar) };
      },
    },
  ],

  // Paths and ledger
  [
    'SESAME_PATHS_LEDGER',
    stringVar('Override ledger directory path', (o, v) => {
      o.paths = { ...o.paths, ledger: v };
    }),
  ],
  [
    'SESAME_LEDGER_FSYNC',
    booleanVar('Sync the ledger to disk after every append (true/false)', (o, v) => {
      o.ledger = { ...o.ledger, fsync: v };
    }),
  ],

  // Verifier
  [
    'SESAME_VERIFIER_COMMAND',
    stringVar('Override the decryption tool executable', (o, v) => {
      o.verifier = { ...o.verifier, command: v };
    }),
  ],
  [
    'SESAME_VERIFIER_TIMEOUT_MS',
    numberVar('Override the per-attempt timeout in milliseconds', (o, v) => {
      o.verifier = { ...o.verifier, timeout_ms: v };
    }),
  ],
  [
    'SESAME_VERIFIER_WRONG_PASSWORD_PATTERN',
    stringVar('Override the wrong-password output pattern', (o, v) => {
      o.verifier = { ...o.verifier, wrong_password_pattern: v };
    }),
  ],

  // CLI
  [
    'SESAME_CLI_COLORS',
    booleanVar('Enable or disable colored output (true/false)', (o, v) => {
      o.cli = { ...o.cli, colors: v };
    }),
  ],
  [
    'SESAME_CLI_PROGRESS_INTERVAL',
    numberVar('Override attempts between progress lines', (o, v) => {
      o.cli = { ...o.cli, progress_interval: v };
    }),
  ],
  ['SESAME_CLI_DEBUG', booleanVar('Enable debug logging (true/false)', setDebug)],
]);

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for SESAME_* environment variables and returns a partial
 * configuration object with the values to override.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ SESAME_MODE: 'exhaustive', SESAME_MAX_LENGTH: '3' });
 * result.overrides; // { search: { mode: 'exhaustive', max_length: 3 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * Used for both layers above the file: environment overrides and CLI flags.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    search: {
      ...base.search,
      ...partial.search,
    },
    paths: {
      ...base.paths,
      ...partial.paths,
    },
    ledger: {
      ...base.ledger,
      ...partial.ledger,
    },
    verifier: {
      ...base.verifier,
      ...partial.verifier,
    },
    cli: {
      ...base.cli,
      ...partial.cli,
    },
    notifications: {
      hooks: {
        ...base.notifications.hooks,
        ...partial.notifications?.hooks,
      },
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Override precedence: env > config
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const baseConfig = await parseConfig(tomlContent);
 * const configWithEnv = applyEnvOverrides(baseConfig);
 * // SESAME_PATHS_LEDGER=/tmp/ledger overrides paths.ledger
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: EnvVarType }> {
  const docs: Record<string, { description: string; type: EnvVarType }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
