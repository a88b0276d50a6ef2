/**
 * Validator Configuration
 * Defaults, merging and loading of .blockflow-check.json files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../error-classes.js';
import { isSignalTypeName } from '../types.js';
import { VALIDATION_RULES } from './rules/index.js';
import type {
  RuleState,
  Severity,
  TypeCompatibility,
  ValidationConfig,
} from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.blockflow-check.json';

/** Type pairs allowed by default: integer values are valid reals */
const DEFAULT_COMPATIBLE_TYPES: readonly TypeCompatibility[] = [['Integer', 'Real']];

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled at their default
 * severity and Integer -> Real connections allowed.
 */
export function createDefaultConfig(): ValidationConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity, compatibleTypes: DEFAULT_COMPATIBLE_TYPES };
}

/**
 * Merge a partial configuration over the defaults.
 *
 * @throws ConfigError (BF-C001) for unknown rule codes
 * @throws ConfigError (BF-C002) when a mandatory rule is disabled or downgraded
 */
export function resolveConfig(partial?: Partial<ValidationConfig>): ValidationConfig {
  const defaults = createDefaultConfig();
  const config: ValidationConfig = {
    rules: { ...defaults.rules, ...partial?.rules },
    severity: { ...defaults.severity, ...partial?.severity },
    compatibleTypes: partial?.compatibleTypes ?? defaults.compatibleTypes,
  };

  validateRuleCodes(config);
  return config;
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and check the raw contents of a configuration file.
 * @throws ConfigError (BF-C001) when the structure or a value is invalid
 */
function parseConfigData(data: unknown): Partial<ValidationConfig> {
  if (!isPlainObject(data)) {
    throw new ConfigError('BF-C001', { reason: 'must be an object' });
  }

  const parsed: {
    rules?: Record<string, RuleState>;
    severity?: Record<string, Severity>;
    compatibleTypes?: TypeCompatibility[];
  } = {};

  if ('rules' in data) {
    const rules = data['rules'];
    if (!isPlainObject(rules)) {
      throw new ConfigError('BF-C001', { reason: 'rules must be an object' });
    }
    parsed.rules = {};
    for (const [code, state] of Object.entries(rules)) {
      if (!isRuleState(state)) {
        throw new ConfigError('BF-C001', {
          reason: `rule ${code} has invalid state "${String(state)}" (must be 'on', 'off', or 'warn')`,
        });
      }
      parsed.rules[code] = state;
    }
  }

  if ('severity' in data) {
    const severity = data['severity'];
    if (!isPlainObject(severity)) {
      throw new ConfigError('BF-C001', { reason: 'severity must be an object' });
    }
    parsed.severity = {};
    for (const [code, sev] of Object.entries(severity)) {
      if (!isSeverity(sev)) {
        throw new ConfigError('BF-C001', {
          reason: `rule ${code} has invalid severity "${String(sev)}" (must be 'error', 'warning', or 'info')`,
        });
      }
      parsed.severity[code] = sev;
    }
  }

  if ('compatibleTypes' in data) {
    const pairs = data['compatibleTypes'];
    if (!Array.isArray(pairs)) {
      throw new ConfigError('BF-C001', { reason: 'compatibleTypes must be an array' });
    }
    parsed.compatibleTypes = pairs.map((pair: unknown): TypeCompatibility => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new ConfigError('BF-C001', {
          reason: 'compatibleTypes entries must be [from, to] pairs',
        });
      }
      const [from, to]: unknown[] = pair;
      if (!isSignalTypeName(from) || !isSignalTypeName(to)) {
        throw new ConfigError('BF-C001', {
          reason: `compatibleTypes entry [${String(from)}, ${String(to)}] names an unknown type`,
        });
      }
      return [from, to];
    });
  }

  return parsed;
}

/**
 * Check that every rule code is known and that mandatory rules stay
 * enabled at error severity.
 */
function validateRuleCodes(config: ValidationConfig): void {
  const known = new Map(VALIDATION_RULES.map((r) => [r.code, r]));

  for (const [code, state] of Object.entries(config.rules)) {
    const rule = known.get(code);
    if (!rule) {
      throw new ConfigError('BF-C001', { reason: `unknown rule ${code}` });
    }
    if (rule.mandatory && state !== 'on') {
      throw new ConfigError('BF-C002', { code, state });
    }
  }

  for (const [code, severity] of Object.entries(config.severity)) {
    const rule = known.get(code);
    if (!rule) {
      throw new ConfigError('BF-C001', { reason: `unknown rule ${code}` });
    }
    if (rule.mandatory && severity !== 'error') {
      throw new ConfigError('BF-C002', { code, state: severity });
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .blockflow-check.json in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns Merged configuration, or null if the file is not found
 * @throws ConfigError (BF-C001) for unreadable, malformed or unknown entries
 * @throws ConfigError (BF-C002) for overrides of mandatory rules
 */
export function loadConfig(cwd: string): ValidationConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError('BF-C001', {
      reason: `failed to read file (${err instanceof Error ? err.message : String(err)})`,
    });
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new ConfigError('BF-C001', {
      reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
    });
  }

  return resolveConfig(parseConfigData(parsedData));
}
