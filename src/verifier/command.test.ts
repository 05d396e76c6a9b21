/**
 * Tests for the command-line verifier.
 *
 * execa is mocked; no process is spawned.
 */

import { describe, it, expect, vi, beforeEach, beforeAll, afterAll } from 'vitest';
import { open } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { CommandVerifier, substituteArgs } from './command.js';
import type { DocumentHandle } from './types.js';
import { Logger } from '../utils/logger.js';

const mockExeca = vi.mocked(execa);

function createMockExecaResult(options: {
  exitCode: number | undefined;
  stdout?: string;
  stderr?: string;
  failed?: boolean;
  timedOut?: boolean;
  isCanceled?: boolean;
}): Awaited<ReturnType<typeof execa>> {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    failed: options.failed ?? options.exitCode !== 0,
    timedOut: options.timedOut ?? false,
    isCanceled: options.isCanceled ?? false,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

function resolveWith(options: Parameters<typeof createMockExecaResult>[0]): void {
  mockExeca.mockResolvedValueOnce(createMockExecaResult(options));
}

let doc: DocumentHandle;

beforeAll(async () => {
  doc = {
    path: '/docs/report.xlsx',
    identity: 'report.xlsx',
    file: await open(fileURLToPath(import.meta.url), 'r'),
  };
});

afterAll(async () => {
  await doc.file.close();
});

const logger = new Logger({ component: 'CommandVerifier', debugMode: false });

describe('substituteArgs', () => {
  it('substitutes placeholders inside each element', () => {
    expect(
      substituteArgs(['--password={password}', '{document}'], {
        document: 'a b.docx',
        password: 'x y',
      })
    ).toEqual(['--password=x y', 'a b.docx']);
  });

  it('inserts replacement patterns literally', () => {
    expect(substituteArgs(['{password}'], { document: 'd', password: "$&$1'" })).toEqual([
      "$&$1'",
    ]);
  });

  it('leaves {password} alone when no password is given', () => {
    expect(substituteArgs(['{document}', '{password}'], { document: 'd' })).toEqual([
      'd',
      '{password}',
    ]);
  });
});

describe('CommandVerifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('isEncrypted', () => {
    it('runs the check command with the document path', async () => {
      resolveWith({ exitCode: 0 });
      const verifier = new CommandVerifier({ logger });

      await verifier.isEncrypted(doc);

      expect(mockExeca).toHaveBeenCalledWith(
        'msoffcrypto-tool',
        ['--test', '/docs/report.xlsx'],
        expect.objectContaining({ reject: false, timeout: 30_000 })
      );
    });

    it('maps exit 0 to Encrypted', async () => {
      resolveWith({ exitCode: 0 });

      expect(await new CommandVerifier({ logger }).isEncrypted(doc)).toEqual({
        kind: 'Encrypted',
      });
    });

    it('maps a configured exit code to NotEncrypted', async () => {
      resolveWith({ exitCode: 1, stderr: 'not encrypted' });

      expect(await new CommandVerifier({ logger }).isEncrypted(doc)).toEqual({
        kind: 'NotEncrypted',
      });
    });

    it('maps other exit codes to Undetermined with the last stderr line', async () => {
      resolveWith({ exitCode: 2, stderr: 'Traceback\nFileFormatError: Unsupported file\n' });

      expect(await new CommandVerifier({ logger }).isEncrypted(doc)).toEqual({
        kind: 'Undetermined',
        detail: 'exit code 2: FileFormatError: Unsupported file',
      });
    });

    it('maps a missing tool to Undetermined', async () => {
      resolveWith({ exitCode: undefined, failed: true });

      expect(await new CommandVerifier({ command: 'no-such-tool', logger }).isEncrypted(doc)).toEqual(
        { kind: 'Undetermined', detail: "could not run 'no-such-tool'" }
      );
    });
  });

  describe('verify', () => {
    it('passes the candidate as its own argument and forwards the signal', async () => {
      resolveWith({ exitCode: 0 });
      const controller = new AbortController();

      await new CommandVerifier({ logger }).verify(doc, 'pa ss', controller.signal);

      expect(mockExeca).toHaveBeenCalledWith(
        'msoffcrypto-tool',
        ['-p', 'pa ss', '/docs/report.xlsx', '/dev/null'],
        expect.objectContaining({ cancelSignal: controller.signal })
      );
    });

    it('maps exit 0 to Success', async () => {
      resolveWith({ exitCode: 0 });

      expect(await new CommandVerifier({ logger }).verify(doc, 'Abc1')).toEqual({
        kind: 'Success',
      });
    });

    it('maps matching output to WrongPassword', async () => {
      resolveWith({ exitCode: 1, stderr: 'msoffcrypto.exceptions.InvalidKeyError: Key verification failed' });

      expect(await new CommandVerifier({ logger }).verify(doc, 'abc')).toEqual({
        kind: 'WrongPassword',
      });
    });

    it('honors a custom wrong-password pattern', async () => {
      resolveWith({ exitCode: 3, stdout: 'BAD KEY' });
      const verifier = new CommandVerifier({ wrongPasswordPattern: 'BAD KEY', logger });

      expect(await verifier.verify(doc, 'abc')).toEqual({ kind: 'WrongPassword' });
    });

    it('maps unrecognized failures to UnexpectedFailure', async () => {
      resolveWith({ exitCode: 1, stderr: 'MemoryError\n' });

      expect(await new CommandVerifier({ logger }).verify(doc, 'abc')).toEqual({
        kind: 'UnexpectedFailure',
        detail: 'exit code 1: MemoryError',
      });
    });

    it('maps a timeout to UnexpectedFailure', async () => {
      resolveWith({ exitCode: undefined, failed: true, timedOut: true });
      const verifier = new CommandVerifier({ timeoutMs: 500, logger });

      expect(await verifier.verify(doc, 'abc')).toEqual({
        kind: 'UnexpectedFailure',
        detail: 'timed out after 500 ms',
      });
    });

    it('maps a cancelled run to UnexpectedFailure', async () => {
      resolveWith({ exitCode: undefined, failed: true, isCanceled: true });

      expect(await new CommandVerifier({ logger }).verify(doc, 'abc')).toEqual({
        kind: 'UnexpectedFailure',
        detail: 'cancelled',
      });
    });

    it('uses custom argument templates', async () => {
      resolveWith({ exitCode: 0 });
      const verifier = new CommandVerifier({
        command: 'qpdf',
        verifyArgs: ['--password={password}', '--check', '{document}'],
        logger,
      });

      await verifier.verify(doc, 'secret');

      expect(mockExeca).toHaveBeenCalledWith(
        'qpdf',
        ['--password=secret', '--check', '/docs/report.xlsx'],
        expect.any(Object)
      );
    });
  });
});
