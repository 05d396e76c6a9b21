/**
 * Notification hook execution module.
 *
 * Executes shell commands configured as notification hooks when a run
 * finds the password or exhausts its search space. Hook commands see the
 * document, the event and a timestamp, both as quoted placeholders and as
 * `SESAME_*` environment variables. The password is never passed to them.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { NotificationHook, NotificationHooks } from '../config/types.js';
import { Logger } from '../utils/logger.js';

/** Hook commands are killed after this many milliseconds. */
export const HOOK_TIMEOUT_MS = 5000;

/**
 * Events that trigger hooks.
 */
export type HookEvent = 'found' | 'exhausted';

/**
 * Variables available for template substitution in hook commands.
 */
export interface HookVariables {
  /** Path of the target document. */
  document: string;
  /** Event name. */
  event: HookEvent;
  /** Timestamp of hook execution. */
  timestamp: string;
}

/**
 * Quotes a value as one POSIX shell word.
 *
 * @example
 * ```typescript
 * shellQuote("it's"); // 'it'\''s'
 * ```
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Substitutes template variables in a hook command.
 *
 * Each value is inserted as a single-quoted shell word, so placeholders must
 * not be quoted again in the configured command.
 *
 * @param command - Command with placeholders like {document}, {event}, {timestamp}.
 * @param variables - Variables to substitute.
 * @returns Command with variables replaced.
 */
export function substituteVariables(command: string, variables: HookVariables): string {
  return command
    .replace(/\{document\}/g, () => shellQuote(variables.document))
    .replace(/\{event\}/g, () => shellQuote(variables.event))
    .replace(/\{timestamp\}/g, () => shellQuote(variables.timestamp));
}

/**
 * Environment passed to hook commands: `SESAME_DOCUMENT`, `SESAME_EVENT`
 * and `SESAME_TIMESTAMP`.
 */
export function hookEnvironment(variables: HookVariables): Record<string, string> {
  return {
    SESAME_DOCUMENT: variables.document,
    SESAME_EVENT: variables.event,
    SESAME_TIMESTAMP: variables.timestamp,
  };
}

/**
 * Executes a single notification hook through `sh -c`.
 *
 * @param hook - The hook configuration.
 * @param variables - Variables for template substitution.
 * @param cwd - Working directory for command execution.
 * @param logger - Logger for hook failures.
 * @returns Whether the hook ran and exited successfully.
 */
export async function executeHook(
  hook: NotificationHook,
  variables: HookVariables,
  cwd: string,
  logger: Logger
): Promise<boolean> {
  if (!hook.enabled) {
    return false;
  }

  const command = substituteVariables(hook.command, variables);
  const result = await execa('sh', ['-c', command], {
    cwd,
    env: hookEnvironment(variables),
    reject: false,
    timeout: HOOK_TIMEOUT_MS,
    stdin: 'ignore',
  });

  if (result.failed) {
    logger.warn('hook_failed', {
      event: variables.event,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    });
    return false;
  }

  logger.debug('hook_executed', { event: variables.event });
  return true;
}

/**
 * Runs the configured hooks for run outcomes.
 */
export class NotificationHooksExecutor {
  private readonly hooks: NotificationHooks;
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /**
   * Creates a new NotificationHooksExecutor.
   *
   * @param hooks - Notification hooks configuration.
   * @param options - Working directory (default: process.cwd()), logger and clock.
   */
  constructor(
    hooks: NotificationHooks,
    options: { cwd?: string; logger?: Logger; now?: () => Date } = {}
  ) {
    this.hooks = hooks;
    this.cwd = options.cwd ?? process.cwd();
    this.logger = options.logger ?? new Logger({ component: 'hooks' });
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Executes on_found after the password has been recorded.
   *
   * @param document - Path of the recovered document.
   * @returns Whether the hook executed.
   */
  async onFound(document: string): Promise<boolean> {
    return this.run(this.hooks.on_found, document, 'found');
  }

  /**
   * Executes on_exhausted when a run ends without a password.
   *
   * @param document - Path of the document.
   * @returns Whether the hook executed.
   */
  async onExhausted(document: string): Promise<boolean> {
    return this.run(this.hooks.on_exhausted, document, 'exhausted');
  }

  private async run(
    hook: NotificationHook | undefined,
    document: string,
    event: HookEvent
  ): Promise<boolean> {
    if (hook === undefined) {
      return false;
    }
    return executeHook(
      hook,
      { document, event, timestamp: this.now().toISOString() },
      this.cwd,
      this.logger
    );
  }
}
