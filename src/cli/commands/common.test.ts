import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getDefaultConfig, mergeConfig } from '../../config/index.js';
import { DEFAULT_CHARSET } from '../../generation/index.js';
import { Logger } from '../../utils/logger.js';
import { CliUsageError } from '../errors.js';
import {
  buildGenerationSpec,
  createLedgerStore,
  createPathChecker,
  parseCommandArgs,
} from './common.js';

describe('parseCommandArgs', () => {
  it('collects positionals and accepted flags in either value form', () => {
    expect(
      parseCommandArgs(['doc.xlsx', '--mode', 'exhaustive', '--max-length=3', '--force'], {
        search: true,
        force: true,
      })
    ).toEqual({
      positionals: ['doc.xlsx'],
      search: { mode: 'exhaustive', max_length: 3 },
      force: true,
    });
  });

  it('rejects flags the command does not accept', () => {
    expect(() => parseCommandArgs(['--force'])).toThrow(CliUsageError);
    expect(() => parseCommandArgs(['--mode', 'templated'], { force: true })).toThrow(
      'Unknown option: --mode'
    );
    expect(() => parseCommandArgs(['--verbose'], { search: true, force: true })).toThrow(
      'Unknown option: --verbose'
    );
  });

  it('rejects malformed values', () => {
    expect(() => parseCommandArgs(['--mode', 'bogus'], { search: true })).toThrow(
      "Invalid value for --mode: expected one of 'templated', 'exhaustive', got 'bogus'"
    );
    expect(() => parseCommandArgs(['--max-length', 'x'], { search: true })).toThrow(
      "Invalid value for --max-length: expected an integer, got 'x'"
    );
    expect(() => parseCommandArgs(['--max-length=-2'], { search: true })).toThrow(
      "Invalid value for --max-length: expected an integer, got '-2'"
    );
  });

  it('rejects a flag whose value is missing', () => {
    expect(() => parseCommandArgs(['--max-length'], { search: true })).toThrow(
      '--max-length requires a value'
    );
    expect(() => parseCommandArgs(['--mode', '--force'], { search: true, force: true })).toThrow(
      '--mode requires a value'
    );
  });
});

describe('buildGenerationSpec', () => {
  it('maps the search section onto a generation spec', () => {
    const spec = buildGenerationSpec({
      mode: 'templated',
      bases: ['ab'],
      prefixes: [],
      suffixes: ['1'],
      max_length: 4,
      charset: undefined,
      dedup: 'always',
    });

    expect(spec.mode).toBe('templated');
    expect(spec.bases).toEqual(['ab']);
    expect(spec.prefixes).toEqual(['']);
    expect(spec.suffixes).toEqual(['1']);
    expect(spec.maxLength).toBe(4);
    expect(spec.charset).toEqual(DEFAULT_CHARSET);
    expect(spec.dedup).toBe('always');
  });

  it('splits a configured charset into characters', () => {
    const spec = buildGenerationSpec({
      mode: 'exhaustive',
      bases: [],
      prefixes: [],
      suffixes: [],
      max_length: 2,
      charset: 'ab1',
      dedup: 'auto',
    });

    expect(spec.charset).toEqual(['a', 'b', '1']);
  });
});

describe('createLedgerStore', () => {
  it('resolves the ledger directory against the working directory', () => {
    const config = mergeConfig(getDefaultConfig(), { paths: { ledger: 'state/ledger' } });
    const store = createLedgerStore(
      {
        args: [],
        config,
        configPath: undefined,
        cwd: '/work',
        display: { colors: false, unicode: false },
        logger: new Logger({ component: 'cli' }),
      },
      config
    );

    expect(store.pathsFor('a.xlsx')).toEqual({
      checked: join('/work/state/ledger', 'a.xlsx.checked.txt'),
      success: join('/work/state/ledger', 'a.xlsx.found.txt'),
    });
  });
});

describe('createPathChecker', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sesame-paths-'));
    await mkdir(join(root, 'ledger'));
    await writeFile(join(root, 'notes.txt'), 'x');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('resolves relative paths against the working directory', () => {
    const check = createPathChecker(root);

    expect(check('ledger', true)).toEqual({ exists: true, isDirectory: true });
    expect(check('notes.txt', true)).toEqual({ exists: true, isDirectory: false });
    expect(check('missing', true)).toEqual({ exists: false });
  });
});
