import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import * as fc from 'fast-check';
import {
  PathValidationError,
  safeExists,
  safeMkdir,
  safeOpen,
  safeReadFile,
  safeRename,
  safeStat,
  safeStatSync,
  safeUnlink,
  safeWriteFile,
  validatePath,
} from './safe-fs.js';

describe('validatePath', () => {
  it('resolves a document path given relative to the working directory', () => {
    expect(validatePath('reports/q3.xlsx')).toBe(resolve('reports/q3.xlsx'));
  });

  it('rejects an empty path and a path with a null byte', () => {
    expect(() => validatePath('')).toThrow('Path cannot be empty');
    expect(() => validatePath('q3\0.xlsx')).toThrow(PathValidationError);
  });

  it('keeps the rejected path on the error', () => {
    try {
      validatePath('a\0b');
      expect.fail('expected a PathValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(PathValidationError);
      expect(error instanceof PathValidationError ? error.invalidPath : undefined).toBe('a\0b');
    }
  });

  it('rejects every path containing a null byte', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (before, after) => {
        expect(() => validatePath(`${before}\0${after}`)).toThrow(PathValidationError);
      })
    );
  });
});

describe('file wrappers', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sesame-safe-fs-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('safeOpen', () => {
    it('reads existing ledger lines and appends through an a+ handle', async () => {
      const checked = join(root, 'q3.xlsx.checked.txt');
      await writeFile(checked, 'abc\n');

      const handle = await safeOpen(checked, 'a+');
      try {
        expect((await handle.readFile()).toString('utf-8')).toBe('abc\n');
        await handle.appendFile('Abc\n', 'utf-8');
      } finally {
        await handle.close();
      }

      expect(await readFile(checked, 'utf-8')).toBe('abc\nAbc\n');
    });

    it('truncates a trailing fragment through the same handle', async () => {
      const checked = join(root, 'q3.xlsx.checked.txt');
      await writeFile(checked, 'abc\nAb');

      const handle = await safeOpen(checked, 'a+');
      try {
        const content = await handle.readFile();
        await handle.truncate(content.lastIndexOf(0x0a) + 1);
        await handle.appendFile('ABC\n', 'utf-8');
      } finally {
        await handle.close();
      }

      expect(await readFile(checked, 'utf-8')).toBe('abc\nABC\n');
    });

    it('opens a document read-only', async () => {
      const document = join(root, 'q3.xlsx');
      await writeFile(document, 'encrypted bytes');

      const handle = await safeOpen(document, 'r');
      try {
        expect((await handle.readFile()).toString('utf-8')).toBe('encrypted bytes');
        await expect(handle.appendFile('x')).rejects.toThrow();
      } finally {
        await handle.close();
      }
    });

    it('validates the path before opening', async () => {
      await expect(safeOpen('', 'r')).rejects.toBeInstanceOf(PathValidationError);
    });
  });

  describe('success record writes', () => {
    it('replaces the record atomically through a temp file and rename', async () => {
      const record = join(root, 'q3.xlsx.found.txt');
      const temp = join(root, '.q3.xlsx-1.tmp');
      await safeWriteFile(record, 'old\n');

      await safeWriteFile(temp, 'Sommer2024\n');
      await safeRename(temp, record);

      expect(await safeReadFile(record)).toBe('Sommer2024\n');
      expect(await readdir(root)).toEqual(['q3.xlsx.found.txt']);
    });

    it('round-trips non-ASCII passwords as UTF-8', async () => {
      const record = join(root, 'q3.xlsx.found.txt');

      await safeWriteFile(record, 'Ärger€\n');

      expect(await safeReadFile(record)).toBe('Ärger€\n');
    });

    it('removes a leftover temp file', async () => {
      const temp = join(root, '.q3.xlsx-2.tmp');
      await safeWriteFile(temp, 'x\n');

      await safeUnlink(temp);

      expect(await safeExists(temp)).toBe(false);
    });

    it('validates both rename paths', async () => {
      await expect(safeRename('', join(root, 'a'))).rejects.toBeInstanceOf(PathValidationError);
      await expect(safeRename(join(root, 'a'), 'b\0')).rejects.toBeInstanceOf(PathValidationError);
    });
  });

  describe('ledger directory', () => {
    it('creates nested directories and tolerates an existing one', async () => {
      const directory = join(root, '.sesame', 'ledger');

      await safeMkdir(directory, { recursive: true });
      await safeMkdir(directory, { recursive: true });

      expect((await safeStat(directory)).isDirectory()).toBe(true);
      expect(await safeExists(directory)).toBe(true);
    });
  });

  describe('safeStat and safeStatSync', () => {
    it('tell a regular file from a directory', async () => {
      const document = join(root, 'q3.xlsx');
      await writeFile(document, 'encrypted bytes');

      expect((await safeStat(document)).isFile()).toBe(true);
      expect((await safeStat(root)).isFile()).toBe(false);
      expect(safeStatSync(document).isDirectory()).toBe(false);
      expect(safeStatSync(root).isDirectory()).toBe(true);
    });

    it('fail with ENOENT for a missing document', async () => {
      const missing = join(root, 'missing.xlsx');

      await expect(safeStat(missing)).rejects.toMatchObject({ code: 'ENOENT' });
      expect(() => safeStatSync(missing)).toThrow(/ENOENT/);
    });

    it('validate the path first', async () => {
      await expect(safeStat('')).rejects.toBeInstanceOf(PathValidationError);
      expect(() => safeStatSync('a\0b')).toThrow(PathValidationError);
    });
  });
});
