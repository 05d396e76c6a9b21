/**
 * Verifier that delegates to an external decryption tool.
 *
 * The tool is run directly, never through a shell. Each argument template is
 * substituted on its own, so a candidate containing spaces, quotes or `$` stays
 * a single argv element.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import { Logger } from '../utils/logger.js';
import {
  SUCCESS,
  WRONG_PASSWORD,
  unexpectedFailure,
  type DocumentHandle,
  type DocumentVerifier,
  type EncryptionCheck,
  type VerificationOutcome,
} from './types.js';

/** Tool run by default. */
export const DEFAULT_VERIFIER_COMMAND = 'msoffcrypto-tool';

/** Default arguments for the encryption check. */
export const DEFAULT_CHECK_ARGS: readonly string[] = ['--test', '{document}'];

/** Default arguments for a password attempt. */
export const DEFAULT_VERIFY_ARGS: readonly string[] = [
  '-p',
  '{password}',
  '{document}',
  '/dev/null',
];

/** Exit codes of the check command that mean "not encrypted". */
export const DEFAULT_NOT_ENCRYPTED_EXIT_CODES: readonly number[] = [1];

/** Output that marks a rejected password. */
export const DEFAULT_WRONG_PASSWORD_PATTERN =
  'InvalidKeyError|DecryptionError|password is incorrect|incorrect password';

/** Per-invocation timeout. */
export const DEFAULT_VERIFIER_TIMEOUT_MS = 30_000;

/**
 * Options for {@link CommandVerifier}.
 */
export interface CommandVerifierOptions {
  /** Executable to run. */
  command?: string | undefined;
  /** Argument templates for the encryption check. `{document}` is substituted. */
  checkArgs?: readonly string[] | undefined;
  /** Argument templates for an attempt. `{document}` and `{password}` are substituted. */
  verifyArgs?: readonly string[] | undefined;
  notEncryptedExitCodes?: readonly number[] | undefined;
  /** Regular expression source matched against stdout and stderr of a failed attempt. */
  wrongPasswordPattern?: string | undefined;
  timeoutMs?: number | undefined;
  cwd?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * Values substituted into argument templates.
 */
export interface ArgumentVariables {
  document: string;
  password?: string | undefined;
}

/**
 * Substitutes `{document}` and `{password}` in every argument template.
 *
 * Replacement text is inserted literally.
 *
 * @example
 * ```typescript
 * substituteArgs(['-p', '{password}', '{document}'], { document: 'a.xlsx', password: '$1' });
 * // ['-p', '$1', 'a.xlsx']
 * ```
 */
export function substituteArgs(
  templates: readonly string[],
  variables: ArgumentVariables
): string[] {
  return templates.map((template) => {
    let result = template.replace(/\{document\}/g, () => variables.document);
    const { password } = variables;
    if (password !== undefined) {
      result = result.replace(/\{password\}/g, () => password);
    }
    return result;
  });
}

function lastLine(output: string): string {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
  return lines[lines.length - 1] ?? '';
}

interface ToolResult {
  exitCode: number | undefined;
  failed: boolean;
  timedOut: boolean;
  isCanceled: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Verifier backed by an external command-line tool.
 *
 * @example
 * ```typescript
 * const verifier = new CommandVerifier({ timeoutMs: 10_000 });
 * const check = await verifier.isEncrypted(handle);
 * const outcome = await verifier.verify(handle, 'Admin2021', controller.signal);
 * ```
 */
export class CommandVerifier implements DocumentVerifier {
  private readonly command: string;
  private readonly checkArgs: readonly string[];
  private readonly verifyArgs: readonly string[];
  private readonly notEncryptedExitCodes: ReadonlySet<number>;
  private readonly wrongPassword: RegExp;
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;
  private readonly logger: Logger;

  constructor(options: CommandVerifierOptions = {}) {
    this.command = options.command ?? DEFAULT_VERIFIER_COMMAND;
    this.checkArgs = options.checkArgs ?? DEFAULT_CHECK_ARGS;
    this.verifyArgs = options.verifyArgs ?? DEFAULT_VERIFY_ARGS;
    this.notEncryptedExitCodes = new Set(
      options.notEncryptedExitCodes ?? DEFAULT_NOT_ENCRYPTED_EXIT_CODES
    );
    this.wrongPassword = new RegExp(options.wrongPasswordPattern ?? DEFAULT_WRONG_PASSWORD_PATTERN);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VERIFIER_TIMEOUT_MS;
    this.cwd = options.cwd;
    this.logger = options.logger ?? new Logger({ component: 'CommandVerifier' });
  }

  async isEncrypted(doc: DocumentHandle): Promise<EncryptionCheck> {
    const args = substituteArgs(this.checkArgs, { document: doc.path });
    const result = await this.run(args, undefined);

    if (result.exitCode === 0) {
      return { kind: 'Encrypted' };
    }
    if (result.exitCode !== undefined && this.notEncryptedExitCodes.has(result.exitCode)) {
      return { kind: 'NotEncrypted' };
    }
    return { kind: 'Undetermined', detail: this.describeFailure(result) };
  }

  async verify(
    doc: DocumentHandle,
    candidate: string,
    signal?: AbortSignal
  ): Promise<VerificationOutcome> {
    const args = substituteArgs(this.verifyArgs, { document: doc.path, password: candidate });
    const result = await this.run(args, signal);

    if (result.exitCode === 0 && !result.failed) {
      return SUCCESS;
    }
    if (result.isCanceled) {
      return unexpectedFailure('cancelled');
    }
    if (result.timedOut) {
      return unexpectedFailure(`timed out after ${String(this.timeoutMs)} ms`);
    }
    if (result.exitCode !== undefined && this.wrongPassword.test(`${result.stdout}\n${result.stderr}`)) {
      return WRONG_PASSWORD;
    }
    return unexpectedFailure(this.describeFailure(result));
  }

  private async run(args: string[], signal: AbortSignal | undefined): Promise<ToolResult> {
    const result = await execa(this.command, args, {
      reject: false,
      timeout: this.timeoutMs,
      stdin: 'ignore',
      ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
      ...(signal !== undefined ? { cancelSignal: signal } : {}),
    });

    this.logger.debug('command_finished', {
      command: this.command,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });

    return {
      exitCode: result.exitCode,
      failed: result.failed,
      timedOut: result.timedOut,
      isCanceled: result.isCanceled,
      stdout: typeof result.stdout === 'string' ? result.stdout : '',
      stderr: typeof result.stderr === 'string' ? result.stderr : '',
    };
  }

  private describeFailure(result: ToolResult): string {
    if (result.timedOut) {
      return `timed out after ${String(this.timeoutMs)} ms`;
    }
    const message = lastLine(result.stderr) || lastLine(result.stdout);
    if (result.exitCode === undefined) {
      return message === '' ? `could not run '${this.command}'` : `could not run '${this.command}': ${message}`;
    }
    const code = `exit code ${String(result.exitCode)}`;
    return message === '' ? code : `${code}: ${message}`;
  }
}
