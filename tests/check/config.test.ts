/**
 * Validator Configuration Tests
 * Defaults, merging and .blockflow-check.json loading.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
  loadConfig,
  resolveConfig,
  VALIDATION_RULES,
} from '../../src/index.js';

describe('Validator configuration', () => {
  describe('createDefaultConfig', () => {
    it('enables every rule', () => {
      const config = createDefaultConfig();
      expect(Object.keys(config.rules)).toHaveLength(VALIDATION_RULES.length);
      expect(Object.values(config.rules).every((state) => state === 'on')).toBe(true);
    });

    it('uses each rule default severity', () => {
      const config = createDefaultConfig();
      expect(config.severity['ALGEBRAIC_LOOP']).toBe('error');
      expect(config.severity['CONNECTION_UNIT_MISMATCH']).toBe('warning');
    });

    it('allows Integer into Real', () => {
      expect(createDefaultConfig().compatibleTypes).toEqual([['Integer', 'Real']]);
    });
  });

  describe('resolveConfig', () => {
    it('merges overrides over the defaults', () => {
      const config = resolveConfig({ rules: { CONNECTION_UNIT_MISMATCH: 'warn' } });
      expect(config.rules['CONNECTION_UNIT_MISMATCH']).toBe('warn');
      expect(config.rules['ALGEBRAIC_LOOP']).toBe('on');
    });

    it('replaces the compatible type list', () => {
      const config = resolveConfig({ compatibleTypes: [['Boolean', 'Integer']] });
      expect(config.compatibleTypes).toEqual([['Boolean', 'Integer']]);
    });

    it('throws BF-C001 for unknown rules', () => {
      try {
        resolveConfig({ severity: { MISSING_RULE: 'error' } });
        expect.fail('expected ConfigError');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.errorId).toBe('BF-C001');
          expect(err.message).toBe('Invalid configuration: unknown rule MISSING_RULE');
        }
      }
    });

    it('throws BF-C002 for mandatory rule overrides', () => {
      expect(() => resolveConfig({ rules: { INPUT_UNCONNECTED: 'warn' } })).toThrow(
        'Invalid configuration: rule INPUT_UNCONNECTED cannot be set to "warn"'
      );
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'blockflow-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const writeConfig = (content: string): void => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), content);
    };

    it('returns null without a configuration file', () => {
      expect(loadConfig(dir)).toBeNull();
    });

    it('loads and merges a configuration file', () => {
      writeConfig(
        JSON.stringify({
          rules: { CONNECTION_UNIT_MISMATCH: 'off' },
          severity: { CONNECTOR_START_OUT_OF_BOUNDS: 'info' },
          compatibleTypes: [],
        })
      );

      const config = loadConfig(dir);
      expect(config?.rules['CONNECTION_UNIT_MISMATCH']).toBe('off');
      expect(config?.rules['PARAMETER_UNBOUND']).toBe('on');
      expect(config?.severity['CONNECTOR_START_OUT_OF_BOUNDS']).toBe('info');
      expect(config?.compatibleTypes).toEqual([]);
    });

    it('rejects malformed JSON', () => {
      writeConfig('{ "rules": ');
      expect(() => loadConfig(dir)).toThrow(/^Invalid configuration: invalid JSON \(/);
    });

    it('rejects a non-object document', () => {
      writeConfig('[]');
      expect(() => loadConfig(dir)).toThrow('Invalid configuration: must be an object');
    });

    it('rejects invalid rule states', () => {
      writeConfig(JSON.stringify({ rules: { CONNECTION_UNIT_MISMATCH: 'maybe' } }));
      expect(() => loadConfig(dir)).toThrow(
        `Invalid configuration: rule CONNECTION_UNIT_MISMATCH has invalid state "maybe" (must be 'on', 'off', or 'warn')`
      );
    });

    it('rejects invalid severities', () => {
      writeConfig(JSON.stringify({ severity: { CONNECTION_UNIT_MISMATCH: 'fatal' } }));
      expect(() => loadConfig(dir)).toThrow(
        `Invalid configuration: rule CONNECTION_UNIT_MISMATCH has invalid severity "fatal" (must be 'error', 'warning', or 'info')`
      );
    });

    it('rejects unknown types in compatible pairs', () => {
      writeConfig(JSON.stringify({ compatibleTypes: [['Integer', 'Complex']] }));
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: compatibleTypes entry [Integer, Complex] names an unknown type'
      );
    });

    it('rejects pairs of the wrong length', () => {
      writeConfig(JSON.stringify({ compatibleTypes: [['Integer']] }));
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: compatibleTypes entries must be [from, to] pairs'
      );
    });

    it('rejects mandatory rule overrides from the file', () => {
      writeConfig(JSON.stringify({ rules: { ALGEBRAIC_LOOP: 'off' } }));
      expect(() => loadConfig(dir)).toThrow(ConfigError);
    });
  });
});
