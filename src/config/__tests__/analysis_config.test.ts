/**
 * Tests for layered analysis configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '../../core/errors.js';
import {
  DEFAULT_ANALYSIS_CONFIG,
  envVariableName,
  findConfigFile,
  loadConfigFile,
  readEnvironmentConfig,
  resolveAnalysisConfig,
  resolveOutputPath,
  validateAnalysisConfig,
} from '../analysis_config.js';

function captureConfigError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('analysis config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveAnalysisConfig', () => {
    it('should fall back to the defaults', () => {
      expect(resolveAnalysisConfig({ env: {}, overrides: { repoPath: dir } })).toEqual({
        ...DEFAULT_ANALYSIS_CONFIG,
        repoPath: dir,
      });
    });

    it('should layer file, environment and flags in that order', () => {
      writeFileSync(path.join(dir, '.provenance-audit.yml'), 'aiThreshold: 0.5\nincludeTests: true\ncurrency: GBP\n');
      const env = { PROVENANCE_AUDIT_AI_THRESHOLD: '0.6', PROVENANCE_AUDIT_CURRENCY: 'EUR' };

      const fromFileAndEnv = resolveAnalysisConfig({ env, overrides: { repoPath: dir } });
      expect(fromFileAndEnv.includeTests).toBe(true);
      expect(fromFileAndEnv.aiThreshold).toBe(0.6);
      expect(fromFileAndEnv.currency).toBe('EUR');

      const withFlags = resolveAnalysisConfig({ env, overrides: { repoPath: dir, aiThreshold: 0.9, currency: undefined } });
      expect(withFlags.aiThreshold).toBe(0.9);
      expect(withFlags.currency).toBe('EUR');
    });

    it('should read an explicit JSON config file', () => {
      const configPath = path.join(dir, 'audit.json');
      writeFileSync(configPath, JSON.stringify({ format: 'json', timeWindowDays: 30 }));
      const config = resolveAnalysisConfig({ env: {}, configPath, overrides: { repoPath: dir } });
      expect(config.format).toBe('json');
      expect(config.timeWindowDays).toBe(30);
    });

    it('should take the config file from the environment', () => {
      const configPath = path.join(dir, 'audit.yaml');
      writeFileSync(configPath, 'gitEvidence: false\n');
      const config = resolveAnalysisConfig({ env: { PROVENANCE_AUDIT_CONFIG: configPath }, overrides: { repoPath: dir } });
      expect(config.gitEvidence).toBe(false);
    });

    it('should report every invalid value together', () => {
      const error = captureConfigError(() =>
        resolveAnalysisConfig({ env: {}, overrides: { repoPath: dir, dupMediumThreshold: 0.95, timeWindowDays: 0 } }),
      );
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^timeWindowDays: /);
      expect(error.issues).toContain('dupMediumThreshold: must not exceed dupThreshold (0.9)');
    });
  });

  describe('loadConfigFile', () => {
    it('should reject unknown keys', () => {
      const configPath = path.join(dir, 'audit.yml');
      writeFileSync(configPath, 'bogus: 1\n');
      const error = captureConfigError(() => loadConfigFile(configPath));
      expect(error.issues).toEqual(["(root): Unrecognized key(s) in object: 'bogus'"]);
    });

    it('should treat an empty file as no overrides', () => {
      const configPath = path.join(dir, 'audit.yml');
      writeFileSync(configPath, '');
      expect(loadConfigFile(configPath)).toEqual({});
    });

    it('should raise a configuration error for malformed YAML', () => {
      const configPath = path.join(dir, 'audit.yml');
      writeFileSync(configPath, 'aiThreshold: [\n');
      expect(() => loadConfigFile(configPath)).toThrow(`Config file ${configPath} could not be parsed`);
    });

    it('should raise a configuration error for a missing file', () => {
      expect(() => loadConfigFile(path.join(dir, 'missing.yml'))).toThrow(ConfigurationError);
    });
  });

  describe('findConfigFile', () => {
    it('should prefer the YAML file name', () => {
      writeFileSync(path.join(dir, '.provenance-audit.json'), '{}');
      writeFileSync(path.join(dir, '.provenance-audit.yml'), '');
      expect(findConfigFile(dir)).toBe(path.join(dir, '.provenance-audit.yml'));
    });

    it('should return null when there is no config file', () => {
      expect(findConfigFile(dir)).toBeNull();
    });
  });
});

describe('readEnvironmentConfig', () => {
  it('should coerce numbers and booleans and ignore blank values', () => {
    expect(
      readEnvironmentConfig({
        PROVENANCE_AUDIT_AI_THRESHOLD: '0.7',
        PROVENANCE_AUDIT_GIT_EVIDENCE: 'off',
        PROVENANCE_AUDIT_INCLUDE_TESTS: 'YES',
        PROVENANCE_AUDIT_CURRENCY: 'EUR',
        PROVENANCE_AUDIT_TIME_WINDOW_DAYS: '  ',
      }),
    ).toEqual({ aiThreshold: 0.7, gitEvidence: false, includeTests: true, currency: 'EUR' });
  });

  it('should reject values that do not coerce', () => {
    expect(() => readEnvironmentConfig({ PROVENANCE_AUDIT_INCLUDE_TESTS: 'maybe' })).toThrow(
      'Invalid environment configuration: PROVENANCE_AUDIT_INCLUDE_TESTS: expected a boolean, got "maybe"',
    );
    expect(() => readEnvironmentConfig({ PROVENANCE_AUDIT_COST_PER_INVOCATION: 'cheap' })).toThrow(ConfigurationError);
  });

  it('should validate the coerced values', () => {
    const error = captureConfigError(() => readEnvironmentConfig({ PROVENANCE_AUDIT_FORMAT: 'xml' }));
    expect(error.issues[0]).toMatch(/^format: /);
  });
});

describe('envVariableName', () => {
  it('should convert camelCase keys to the prefixed constant form', () => {
    expect(envVariableName('minDupBodyStatements')).toBe('PROVENANCE_AUDIT_MIN_DUP_BODY_STATEMENTS');
    expect(envVariableName('repoPath')).toBe('PROVENANCE_AUDIT_REPO_PATH');
  });
});

describe('validateAnalysisConfig', () => {
  it('should reject thresholds outside the unit interval', () => {
    const error = captureConfigError(() => validateAnalysisConfig({ ...DEFAULT_ANALYSIS_CONFIG, aiThreshold: 1.5 }));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^aiThreshold: /);
  });
});

describe('resolveOutputPath', () => {
  it('should follow the format unless a path is given', () => {
    expect(resolveOutputPath(DEFAULT_ANALYSIS_CONFIG)).toBe('reports/diagnostic.md');
    expect(resolveOutputPath({ ...DEFAULT_ANALYSIS_CONFIG, format: 'json' })).toBe('reports/diagnostic.json');
    expect(resolveOutputPath({ ...DEFAULT_ANALYSIS_CONFIG, outputPath: 'out/audit.md' })).toBe('out/audit.md');
  });
});
