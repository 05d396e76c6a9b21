import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    describe('SESAME_* env vars override corresponding config values', () => {
      it('should read SESAME_MODE and map to search.mode', () => {
        const result = readEnvOverrides({ SESAME_MODE: 'exhaustive' });

        expect(result.overrides.search?.mode).toBe('exhaustive');
        expect(result.appliedVars).toEqual(['SESAME_MODE']);
      });

      it('should read search lists as comma-separated values', () => {
        const result = readEnvOverrides({
          SESAME_SEARCH_BASES: 'summer, winter,,autumn',
          SESAME_SEARCH_PREFIXES: 'x',
          SESAME_SEARCH_SUFFIXES: '2024,!',
        });

        expect(result.overrides.search).toEqual({
          bases: ['summer', 'winter', 'autumn'],
          prefixes: ['x'],
          suffixes: ['2024', '!'],
        });
      });

      it('should read number env vars with coercion', () => {
        const result = readEnvOverrides({
          SESAME_SEARCH_MAX_LENGTH: '3',
          SESAME_VERIFIER_TIMEOUT_MS: '2500',
          SESAME_CLI_PROGRESS_INTERVAL: ' 50 ',
        });

        expect(result.overrides.search?.max_length).toBe(3);
        expect(result.overrides.verifier?.timeout_ms).toBe(2500);
        expect(result.overrides.cli?.progress_interval).toBe(50);
      });

      it('should read boolean env vars with coercion', () => {
        const result = readEnvOverrides({
          SESAME_LEDGER_FSYNC: 'yes',
          SESAME_CLI_COLORS: 'off',
          SESAME_CLI_DEBUG: 'TRUE',
        });

        expect(result.overrides.ledger?.fsync).toBe(true);
        expect(result.overrides.cli).toEqual({ colors: false, debug: true });
      });

      it('should read string env vars verbatim', () => {
        const result = readEnvOverrides({
          SESAME_PATHS_LEDGER: '/custom/ledger',
          SESAME_VERIFIER_COMMAND: 'qpdf',
          SESAME_SEARCH_CHARSET: 'abc',
        });

        expect(result.overrides.paths?.ledger).toBe('/custom/ledger');
        expect(result.overrides.verifier?.command).toBe('qpdf');
        expect(result.overrides.search?.charset).toBe('abc');
      });

      it('should let the full name win over the shortcut', () => {
        const result = readEnvOverrides({ SESAME_MAX_LENGTH: '2', SESAME_SEARCH_MAX_LENGTH: '5' });

        expect(result.overrides.search?.max_length).toBe(5);
      });

      it('should skip empty values', () => {
        const result = readEnvOverrides({ SESAME_PATHS_LEDGER: '' });

        expect(result.overrides).toEqual({});
        expect(result.appliedVars).toEqual([]);
      });

      it('should ignore unrelated variables', () => {
        const result = readEnvOverrides({ HOME: '/home/test', SESAME_UNKNOWN: 'x' });

        expect(result.appliedVars).toEqual([]);
      });
    });

    describe('coercion errors', () => {
      it('should throw for a non-numeric number', () => {
        expect(() => readEnvOverrides({ SESAME_SEARCH_MAX_LENGTH: 'four' })).toThrow(EnvCoercionError);
      });

      it('should throw for a whitespace-only number', () => {
        expect(() => readEnvOverrides({ SESAME_VERIFIER_TIMEOUT_MS: '  ' })).toThrow(
          "Empty value for 'SESAME_VERIFIER_TIMEOUT_MS'"
        );
      });

      it('should throw for an unknown boolean word', () => {
        expect(() => readEnvOverrides({ SESAME_LEDGER_FSYNC: 'maybe' })).toThrow(
          "Cannot coerce 'SESAME_LEDGER_FSYNC' value 'maybe' to boolean"
        );
      });

      it('should throw for an unknown mode', () => {
        expect(() => readEnvOverrides({ SESAME_MODE: 'rules' })).toThrow(
          "Cannot coerce 'SESAME_MODE' value 'rules'. Expected one of: templated, exhaustive"
        );
      });

      it('should collect errors when asked', () => {
        const result = readEnvOverrides(
          { SESAME_SEARCH_MAX_LENGTH: 'four', SESAME_SEARCH_DEDUP: 'never', SESAME_PATHS_LEDGER: 'l' },
          { collectErrors: true }
        );

        expect(result.errors.map((e) => e.envVar)).toEqual(['SESAME_SEARCH_MAX_LENGTH', 'SESAME_SEARCH_DEDUP']);
        expect(result.overrides.paths?.ledger).toBe('l');
      });

      it('should record the raw value and expected type', () => {
        try {
          readEnvOverrides({ SESAME_CLI_PROGRESS_INTERVAL: 'abc' });
          expect.unreachable();
        } catch (error) {
          expect(error).toBeInstanceOf(EnvCoercionError);
          if (error instanceof EnvCoercionError) {
            expect(error.rawValue).toBe('abc');
            expect(error.expectedType).toBe('number');
          }
        }
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override config file values', async () => {
      const config = await parseConfig(`
[search]
bases = ["admin"]
max_length = 2
`);
      const merged = applyEnvOverrides(config, { SESAME_SEARCH_MAX_LENGTH: '6' });

      expect(merged.search.max_length).toBe(6);
      expect(merged.search.bases).toEqual(['admin']);
    });

    it('should return an equal config when no variables are set', () => {
      const merged = applyEnvOverrides(DEFAULT_CONFIG, {});

      expect(merged.search).toEqual(DEFAULT_CONFIG.search);
      expect(merged.verifier).toEqual(DEFAULT_CONFIG.verifier);
    });

    it('should not mutate the base config', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { SESAME_PATHS_LEDGER: '/elsewhere' });

      expect(DEFAULT_CONFIG.paths.ledger).toBe('.sesame/ledger');
    });
  });

  describe('mergeConfig', () => {
    it('should merge hooks per name', () => {
      const base = mergeConfig(DEFAULT_CONFIG, {
        notifications: { hooks: { on_found: { command: 'a', enabled: true } } },
      });
      const merged = mergeConfig(base, {
        notifications: { hooks: { on_exhausted: { command: 'b', enabled: true } } },
      });

      expect(merged.notifications.hooks).toEqual({
        on_found: { command: 'a', enabled: true },
        on_exhausted: { command: 'b', enabled: true },
      });
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toContain('SESAME_SEARCH_BASES');
      expect(docs.SESAME_SEARCH_BASES?.type).toBe('list');
      expect(docs.SESAME_LEDGER_FSYNC?.type).toBe('boolean');
    });
  });

  describe('property-based tests', () => {
    it('should coerce any integer string for number fields', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1_000_000 }), (n) => {
          const result = readEnvOverrides({ SESAME_VERIFIER_TIMEOUT_MS: String(n) });
          return result.overrides.verifier?.timeout_ms === n;
        })
      );
    });
  });
});
