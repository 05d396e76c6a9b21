/**
 * Error suggestion system tests.
 *
 * Verifies that failures are classified and reported with suggestions.
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { GenerationSpecError } from '../generation/index.js';
import { LedgerError } from '../ledger/index.js';
import { FatalInputError } from '../recovery/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import {
  CliUsageError,
  classifyError,
  displayErrorWithSuggestions,
  errorContextFor,
  errorMessageFor,
  formatErrorWithSuggestions,
  inferErrorType,
  isErrorRecoverable,
  type ErrorType,
} from './errors.js';
import { stripAnsi } from './utils/displayUtils.js';

describe('Error suggestion system', () => {
  const displayOptions = { colors: true, unicode: true };
  const plainOptions = { colors: false, unicode: false };

  describe('inferErrorType', () => {
    it('should identify usage errors', () => {
      expect(inferErrorType('Unknown option: --fast')).toBe('usage_error');
      expect(inferErrorType('--mode requires a value')).toBe('usage_error');
    });

    it('should identify configuration errors', () => {
      expect(inferErrorType('Invalid TOML syntax: unexpected character')).toBe('config_error');
      expect(inferErrorType('Config file not found: /tmp/x.toml')).toBe('config_error');
    });

    it('should identify ledger errors', () => {
      expect(inferErrorType("Ledger for 'a.xlsx' is already open for writing")).toBe(
        'ledger_error'
      );
    });

    it('should identify target and verifier errors', () => {
      expect(inferErrorType('ENOENT: no such file or directory')).toBe('target_error');
      expect(inferErrorType('spawn msoffcrypto-tool ENOENT')).toBe('verifier_error');
      expect(inferErrorType('verifier exited early')).toBe('verifier_error');
    });

    it('should return unknown for unrecognized errors', () => {
      expect(inferErrorType('Generic error')).toBe('unknown');
    });
  });

  describe('classifyError', () => {
    it('classifies by error class before looking at the message', () => {
      expect(classifyError(new CliUsageError('bad'))).toBe('usage_error');
      expect(classifyError(new ConfigParseError('bad'))).toBe('config_error');
      expect(classifyError(new ConfigValidationError('bad', []))).toBe('config_error');
      expect(classifyError(new EnvCoercionError('SESAME_MAX_LENGTH', 'x', 'number'))).toBe(
        'config_error'
      );
      expect(classifyError(new GenerationSpecError('bases', 'bad'))).toBe('config_error');
      expect(classifyError(new FatalInputError('bad', 'TARGET_NOT_FOUND', 'a.xlsx'))).toBe(
        'target_error'
      );
      expect(classifyError(new PathValidationError('bad', ''))).toBe('target_error');
      expect(classifyError(new LedgerError('bad', 'io_error'))).toBe('ledger_error');
    });

    it('falls back to the message for other values', () => {
      expect(classifyError(new Error('Unknown command: go'))).toBe('usage_error');
      expect(classifyError('ledger vanished')).toBe('ledger_error');
    });
  });

  describe('errorContextFor', () => {
    it('lists the failing configuration fields', () => {
      const error = new ConfigValidationError('Configuration validation failed', [
        { field: 'search.bases', value: [], message: 'needs a base' },
        { field: 'cli.progress_interval', value: 0, message: 'must be positive' },
      ]);

      expect(errorContextFor(error)).toEqual({
        errorType: 'config_error',
        details: {
          fields: ['search.bases: needs a base', 'cli.progress_interval: must be positive'],
        },
      });
    });

    it('names the offending variable or path', () => {
      expect(errorContextFor(new EnvCoercionError('SESAME_CLI_DEBUG', 'maybe', 'boolean'))).toEqual({
        errorType: 'config_error',
        details: { envVar: 'SESAME_CLI_DEBUG' },
      });
      expect(
        errorContextFor(new FatalInputError('missing', 'TARGET_NOT_FOUND', '/data/a.xlsx'))
      ).toEqual({ errorType: 'target_error', details: { filePath: '/data/a.xlsx' } });
      expect(errorContextFor(new FatalInputError('none', 'TARGET_NOT_PROVIDED', ''))).toEqual({
        errorType: 'target_error',
      });
    });

    it('carries the details of a ledger error as a note', () => {
      const error = new LedgerError('disk full', 'io_error', { details: 'Password: test-secret' });

      expect(errorContextFor(error)).toEqual({
        errorType: 'ledger_error',
        details: { note: 'Password: test-secret' },
      });
      expect(
        formatErrorWithSuggestions('disk full', errorContextFor(error), plainOptions).split('\n')[1]
      ).toBe('  Note: Password: test-secret');
    });
  });

  describe('errorMessageFor', () => {
    it('keeps only the summary line of a validation error', () => {
      const error = new ConfigValidationError(
        'Configuration validation failed with 1 error(s):\n  - search.bases: needs a base',
        [{ field: 'search.bases', value: [], message: 'needs a base' }]
      );

      expect(errorMessageFor(error)).toBe('Configuration validation failed with 1 error(s)');
    });

    it('uses the message of other errors unchanged', () => {
      expect(errorMessageFor(new LedgerError('disk full', 'io_error'))).toBe('disk full');
      expect(errorMessageFor('plain text')).toBe('plain text');
    });
  });

  describe('formatErrorWithSuggestions', () => {
    it('formats usage errors without colors', () => {
      const result = formatErrorWithSuggestions(
        'Unknown option: --fast',
        { errorType: 'usage_error' },
        plainOptions
      );

      expect(result).toBe(
        'Error: Unknown option: --fast\n\nSuggestions:\n  1. Check the command syntax\n    sesame help'
      );
    });

    it('formats ledger errors with every suggestion numbered', () => {
      const result = formatErrorWithSuggestions(
        'disk full',
        { errorType: 'ledger_error' },
        plainOptions
      );

      expect(result.split('\n')).toEqual([
        'Error: disk full',
        '',
        'Suggestions:',
        '  1. Check the ledger directory is writable',
        '    ls -ld .sesame/ledger',
        '  2. Make sure no other sesame run uses the same document name',
        '  3. Inspect the checked file for stray bytes if it was edited by hand',
      ]);
    });

    it('shows path, variable and field details', () => {
      const result = stripAnsi(
        formatErrorWithSuggestions(
          'Configuration validation failed',
          {
            errorType: 'config_error',
            details: {
              filePath: 'sesame.toml',
              envVar: 'SESAME_MODE',
              fields: ['search.mode: bad'],
            },
          },
          displayOptions
        )
      );

      expect(result.split('\n').slice(0, 4)).toEqual([
        'Error: Configuration validation failed',
        '  Path: sesame.toml',
        '  Variable: SESAME_MODE',
        '  - search.mode: bad',
      ]);
    });

    it('infers the error type when none is given', () => {
      const result = formatErrorWithSuggestions('Invalid TOML syntax: x', {}, plainOptions);

      expect(result).toContain('  1. Check sesame.toml against the documented sections');
    });

    it('uses ANSI colors only when enabled', () => {
      const colored = formatErrorWithSuggestions('x', { errorType: 'unknown' }, displayOptions);
      const plain = formatErrorWithSuggestions('x', { errorType: 'unknown' }, plainOptions);

      expect(colored.startsWith('\x1b[31mError:\x1b[0m x')).toBe(true);
      expect(plain).not.toContain('\x1b[');
      expect(stripAnsi(colored)).toBe(plain);
    });
  });

  describe('displayErrorWithSuggestions', () => {
    it('writes the formatted error between blank lines on stderr', () => {
      const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      displayErrorWithSuggestions('disk full', { errorType: 'ledger_error' }, plainOptions);

      expect(consoleErrorSpy).toHaveBeenCalledTimes(3);
      expect(consoleErrorSpy.mock.calls[1]?.[0]).toBe(
        formatErrorWithSuggestions('disk full', { errorType: 'ledger_error' }, plainOptions)
      );

      consoleErrorSpy.mockRestore();
    });
  });

  describe('isErrorRecoverable', () => {
    it('treats user-fixable errors as recoverable', () => {
      const recoverable: ErrorType[] = [
        'usage_error',
        'config_error',
        'target_error',
        'verifier_error',
      ];
      for (const errorType of recoverable) {
        expect(isErrorRecoverable(errorType)).toBe(true);
      }
    });

    it('treats ledger and unknown errors as not recoverable', () => {
      expect(isErrorRecoverable('ledger_error')).toBe(false);
      expect(isErrorRecoverable('unknown')).toBe(false);
    });
  });
});
