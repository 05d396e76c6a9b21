/**
 * Tests for CLI config loading functionality.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigParseError } from '../config/index.js';
import { createCliApp, extractConfigFlag } from './app.js';
import { CliUsageError } from './errors.js';

describe('createCliApp', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sesame-app-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('uses default values when no config file exists', async () => {
    const context = await createCliApp(['doc.xlsx'], { cwd: root, env: {} });

    expect(context.args).toEqual(['doc.xlsx']);
    expect(context.configPath).toBeUndefined();
    expect(context.config.search.mode).toBe('templated');
    expect(context.config.paths.ledger).toBe('.sesame/ledger');
    expect(context.display).toEqual({ colors: true, unicode: true });
    expect(context.logger.isDebugEnabled).toBe(false);
  });

  it('loads sesame.toml from the working directory', async () => {
    await writeFile(
      join(root, 'sesame.toml'),
      `
[search]
bases = ["summer"]

[cli]
colors = false
`
    );

    const context = await createCliApp([], { cwd: root, env: {} });

    expect(context.configPath).toBe(join(root, 'sesame.toml'));
    expect(context.config.search.bases).toEqual(['summer']);
    expect(context.config.cli.colors).toBe(false);
    expect(context.display.colors).toBe(false);
  });

  it('reads an explicit --config file and removes the flag from the arguments', async () => {
    await writeFile(join(root, 'custom.toml'), '[search]\nmax_length = 7\n');

    const context = await createCliApp(['doc.xlsx', '--config', 'custom.toml', '--force'], {
      cwd: root,
      env: {},
    });

    expect(context.args).toEqual(['doc.xlsx', '--force']);
    expect(context.configPath).toBe(join(root, 'custom.toml'));
    expect(context.config.search.max_length).toBe(7);
  });

  it('fails when an explicit config file is missing', async () => {
    const promise = createCliApp(['--config=missing.toml'], { cwd: root, env: {} });

    await expect(promise).rejects.toThrow(ConfigParseError);
    await expect(promise).rejects.toThrow(
      `Config file not found: ${join(root, 'missing.toml')}`
    );
  });

  it('fails on malformed TOML instead of falling back to defaults', async () => {
    await writeFile(join(root, 'sesame.toml'), 'invalid [ toml');

    await expect(createCliApp([], { cwd: root, env: {} })).rejects.toThrow(
      /^Invalid TOML syntax: /
    );
  });

  it('applies environment overrides over the file', async () => {
    await writeFile(join(root, 'sesame.toml'), '[search]\nmode = "templated"\nmax_length = 2\n');

    const context = await createCliApp([], {
      cwd: root,
      env: { SESAME_SEARCH_MODE: 'exhaustive', SESAME_CLI_DEBUG: 'true' },
    });

    expect(context.config.search.mode).toBe('exhaustive');
    expect(context.config.search.max_length).toBe(2);
    expect(context.logger.isDebugEnabled).toBe(true);
  });

  it('honours NO_COLOR and dumb terminals', async () => {
    const context = await createCliApp([], { cwd: root, env: { NO_COLOR: '1', TERM: 'dumb' } });

    expect(context.display).toEqual({ colors: false, unicode: false });
  });

  it('checks hook commands through the injected checker', async () => {
    await writeFile(
      join(root, 'sesame.toml'),
      `
[notifications.hooks.on_found]
command = "notify-send found"
enabled = true
`
    );
    const checked: string[] = [];

    const context = await createCliApp([], {
      cwd: root,
      env: {},
      commandChecker: (command) => {
        checked.push(command);
        return Promise.resolve(true);
      },
    });

    expect(checked).toEqual(['notify-send']);
    expect(context.config.notifications.hooks?.on_found).toEqual({
      command: 'notify-send found',
      enabled: true,
    });
  });
});

describe('extractConfigFlag', () => {
  it('returns the arguments untouched when there is no flag', () => {
    expect(extractConfigFlag(['a', '--force'])).toEqual({
      rest: ['a', '--force'],
      configFile: undefined,
    });
  });

  it('rejects a flag without a value', () => {
    expect(() => extractConfigFlag(['--config'])).toThrow(CliUsageError);
    expect(() => extractConfigFlag(['--config', '--force'])).toThrow(
      '--config requires a file path'
    );
    expect(() => extractConfigFlag(['--config='])).toThrow(CliUsageError);
  });
});
