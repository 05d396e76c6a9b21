/**
 * Command dispatch for the sesame CLI.
 */

import { createCliApp, type CreateCliAppOptions } from './app.js';
import { handleEstimateCommand } from './commands/estimate.js';
import { handleRunCommand, type RunCommandOptions } from './commands/run.js';
import { handleStatusCommand } from './commands/status.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import { EXIT_ERROR, type CliCommandResult, type CliContext, type DisplayOptions } from './types.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

/**
 * Options for {@link runCli}.
 */
export interface RunCliOptions extends CreateCliAppOptions {
  /** Passed to the run command. */
  run?: RunCommandOptions;
}

const COMMAND_HELP: Readonly<Record<string, string>> = {
  run: `
USAGE: sesame run <document> [options]

Searches for the password of <document>. Candidates already recorded in the
ledger are skipped, so an interrupted run resumes where it stopped.

OPTIONS:
  --config <file>       Configuration file (default: ./sesame.toml)
  --mode <mode>         templated or exhaustive
  --max-length <n>      Longest candidate in exhaustive mode
  --force               Search again even if a password was already found

EXIT CODES:
  0    password found
  2    search space exhausted, or the document is not encrypted
  130  cancelled (Ctrl+C)
  1    error

EXAMPLES:
  sesame run report.xlsx
  sesame run report.xlsx --mode exhaustive --max-length 3
`,
  status: `
USAGE: sesame status <document> [--config <file>]

Shows how many candidates have been checked for <document>, where its
ledger lives and, once found, the password.

EXAMPLES:
  sesame status report.xlsx
`,
  estimate: `
USAGE: sesame estimate [options]

Shows how many candidates the configured search generates, before
deduplication and before skipping ledger entries.

OPTIONS:
  --config <file>       Configuration file (default: ./sesame.toml)
  --mode <mode>         templated or exhaustive
  --max-length <n>      Longest candidate in exhaustive mode

EXAMPLES:
  sesame estimate
  sesame estimate --mode exhaustive --max-length 4
`,
};

/**
 * Returns the general usage text.
 */
export function helpText(): string {
  return `
sesame v${getVersionFromPackageJson()}

USAGE:
  sesame <command> [options]

COMMANDS:
  run         Search for a document's password
  status      Show a document's ledger and found password
  estimate    Show the size of the configured search space
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  sesame run report.xlsx          Search using ./sesame.toml
  sesame status report.xlsx       Show progress for report.xlsx
  sesame estimate --mode exhaustive --max-length 3
`;
}

/**
 * Returns the help text for one command, if it has any.
 */
export function commandHelpText(commandName: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(COMMAND_HELP, commandName)
    ? COMMAND_HELP[commandName]
    : undefined;
}

function showHelpForCommand(commandName: string): number {
  const help = commandHelpText(commandName);
  if (help !== undefined) {
    console.log(help);
    return 0;
  }
  console.error(`Unknown command: ${commandName}`);
  console.error('\nRun "sesame help" to see all available commands.');
  return EXIT_ERROR;
}

function errorDisplay(options: RunCliOptions): DisplayOptions {
  const env = options.env ?? process.env;
  return { colors: env.NO_COLOR === undefined, unicode: env.TERM !== 'dumb' };
}

async function withContext(
  commandArgs: readonly string[],
  options: RunCliOptions,
  handler: (context: CliContext) => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  return runWithErrorHandling(async () => {
    const context = await createCliApp(commandArgs, options);
    return handler(context);
  }, errorDisplay(options));
}

/**
 * Runs one CLI invocation.
 *
 * @param args - Arguments after the executable name.
 * @param options - Working directory, environment and injected dependencies.
 * @returns The process exit code.
 */
export async function runCli(args: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const command = args[0];
  const commandArgs = args.slice(1);

  if (command === undefined || command === '') {
    console.log(helpText());
    return 0;
  }

  const wantsHelp = commandArgs.includes('--help') || commandArgs.includes('-h');

  switch (command) {
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic !== undefined) {
        return showHelpForCommand(topic);
      }
      console.log(helpText());
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return runWithErrorHandling(() => handleVersionCommand(), errorDisplay(options));

    case 'run':
      if (wantsHelp) {
        return showHelpForCommand('run');
      }
      return withContext(commandArgs, options, (context) =>
        handleRunCommand(context, options.run ?? {})
      );

    case 'status':
      if (wantsHelp) {
        return showHelpForCommand('status');
      }
      return withContext(commandArgs, options, handleStatusCommand);

    case 'estimate':
      if (wantsHelp) {
        return showHelpForCommand('estimate');
      }
      return withContext(commandArgs, options, handleEstimateCommand);

    default:
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "sesame help" for usage information.');
      return EXIT_ERROR;
  }
}
