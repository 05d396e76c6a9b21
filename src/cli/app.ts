/**
 * Application bootstrap for the sesame CLI.
 *
 * Resolves the configuration in precedence order (environment over file over
 * defaults; command flags are applied later by each command) and builds the
 * context every command handler receives.
 */

import * as path from 'node:path';
import {
  ConfigParseError,
  applyEnvOverrides,
  getDefaultConfig,
  parseConfig,
  type CommandChecker,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { CliUsageError } from './errors.js';
import type { CliContext } from './types.js';

/** Configuration file looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'sesame.toml';

/**
 * Options for {@link createCliApp}.
 */
export interface CreateCliAppOptions {
  /** Working directory. Default: process.cwd(). */
  cwd?: string;
  /** Environment to read overrides from. Default: process.env. */
  env?: EnvRecord;
  /** Hook command lookup, forwarded to the config parser. */
  commandChecker?: CommandChecker;
}

/**
 * Removes `--config <file>` (or `--config=<file>`) from the arguments.
 *
 * @param args - Command arguments.
 * @returns The remaining arguments and the config path, if given.
 * @throws CliUsageError if `--config` has no value.
 */
export function extractConfigFlag(args: readonly string[]): {
  rest: string[];
  configFile: string | undefined;
} {
  const rest: string[] = [];
  let configFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--config') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError('--config requires a file path');
      }
      configFile = value;
      i++;
    } else if (arg.startsWith('--config=')) {
      configFile = arg.slice('--config='.length);
      if (configFile === '') {
        throw new CliUsageError('--config requires a file path');
      }
    } else {
      rest.push(arg);
    }
  }

  return { rest, configFile };
}

/**
 * Loads the configuration file, if any.
 *
 * An explicit path must exist. The default `sesame.toml` is optional.
 */
async function loadConfigFile(
  cwd: string,
  configFile: string | undefined,
  commandChecker: CommandChecker | undefined
): Promise<{ config: Config; configPath: string | undefined }> {
  const configPath = path.resolve(cwd, configFile ?? DEFAULT_CONFIG_FILE);

  if (!(await safeExists(configPath))) {
    if (configFile !== undefined) {
      throw new ConfigParseError(`Config file not found: ${configPath}`);
    }
    return { config: getDefaultConfig(), configPath: undefined };
  }

  const content = await safeReadFile(configPath);
  const config = await parseConfig(
    content,
    commandChecker !== undefined ? { commandChecker } : {}
  );
  return { config, configPath };
}

/**
 * Creates and initializes the CLI application context.
 *
 * @param args - Command arguments (without the command name).
 * @param options - Working directory, environment and hook lookup.
 * @returns The CLI context.
 * @throws ConfigParseError if the configuration file is missing or malformed.
 * @throws EnvCoercionError if a SESAME_* variable cannot be coerced.
 */
export async function createCliApp(
  args: readonly string[],
  options: CreateCliAppOptions = {}
): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const { rest, configFile } = extractConfigFlag(args);

  const loaded = await loadConfigFile(cwd, configFile, options.commandChecker);
  const config = applyEnvOverrides(loaded.config, env);

  return {
    args: rest,
    config,
    configPath: loaded.configPath,
    cwd,
    display: {
      colors: config.cli.colors && env.NO_COLOR === undefined,
      unicode: env.TERM !== 'dumb',
    },
    logger: new Logger({ component: 'cli', debugMode: config.cli.debug }),
  };
}
