/**
 * @fileoverview Layered analysis configuration
 *
 * Precedence, lowest first:
 * - built-in defaults
 * - config file (`--config`, `PROVENANCE_AUDIT_CONFIG`, or
 *   `.provenance-audit.yml` / `.yaml` / `.json` in the repository root)
 * - `PROVENANCE_AUDIT_*` environment variables
 * - CLI flags
 *
 * The merged result is validated once; every problem found is reported
 * together in a single ConfigurationError.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const ReportFormatSchema = z.enum(['markdown', 'json']);
export type ReportFormat = z.infer<typeof ReportFormatSchema>;

const unitInterval = z.number().finite().min(0).max(1);

const AnalysisConfigShape = z.object({
  repoPath: z.string().min(1),
  runtimePath: z.string().min(1).nullable(),
  timeWindowDays: z.number().int().positive(),
  costPerInvocation: z.number().finite().nonnegative(),
  aiThreshold: unitInterval,
  dupThreshold: unitInterval,
  dupMediumThreshold: unitInterval,
  includeMediumDuplicates: z.boolean(),
  minDupBodyStatements: z.number().int().nonnegative(),
  minDupSignatureChars: z.number().int().nonnegative(),
  includeTests: z.boolean(),
  gitEvidence: z.boolean(),
  currency: z.string().min(1),
  format: ReportFormatSchema,
  /** Null means `reports/diagnostic.md` or `.json`, following `format`. */
  outputPath: z.string().min(1).nullable(),
  historyDbPath: z.string().min(1).nullable(),
});

export const AnalysisConfigSchema = AnalysisConfigShape.superRefine((config, ctx) => {
  if (config.dupMediumThreshold > config.dupThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['dupMediumThreshold'],
      message: `must not exceed dupThreshold (${config.dupThreshold})`,
    });
  }
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigShape>;
export type AnalysisConfigOverrides = Partial<AnalysisConfig>;

const FileConfigSchema = AnalysisConfigShape.partial().strict();

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  repoPath: '.',
  runtimePath: null,
  timeWindowDays: 90,
  costPerInvocation: 0,
  aiThreshold: 0.65,
  dupThreshold: 0.9,
  dupMediumThreshold: 0.75,
  includeMediumDuplicates: false,
  minDupBodyStatements: 3,
  minDupSignatureChars: 0,
  includeTests: false,
  gitEvidence: true,
  currency: 'USD',
  format: 'markdown',
  outputPath: null,
  historyDbPath: null,
};

export const CONFIG_FILE_NAMES = ['.provenance-audit.yml', '.provenance-audit.yaml', '.provenance-audit.json'] as const;

export const ENV_PREFIX = 'PROVENANCE_AUDIT_';

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ============================================================================
// CONFIG FILE
// ============================================================================

export function findConfigFile(repoPath: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(repoPath, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Read a YAML or JSON config file. Keys use the same camelCase names as
 * {@link AnalysisConfig}; unknown keys are rejected.
 */
export function loadConfigFile(filePath: string): AnalysisConfigOverrides {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}`, [getErrorMessage(error)]);
  }

  let data: unknown;
  try {
    data = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} could not be parsed`, [getErrorMessage(error)]);
  }
  if (data === null || data === undefined) return {};

  const parsed = FileConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

type EnvKind = 'string' | 'number' | 'boolean';

const ENV_KEYS: Record<keyof AnalysisConfig, EnvKind> = {
  repoPath: 'string',
  runtimePath: 'string',
  timeWindowDays: 'number',
  costPerInvocation: 'number',
  aiThreshold: 'number',
  dupThreshold: 'number',
  dupMediumThreshold: 'number',
  includeMediumDuplicates: 'boolean',
  minDupBodyStatements: 'number',
  minDupSignatureChars: 'number',
  includeTests: 'boolean',
  gitEvidence: 'boolean',
  currency: 'string',
  format: 'string',
  outputPath: 'string',
  historyDbPath: 'string',
};

/** `minDupBodyStatements` -> `PROVENANCE_AUDIT_MIN_DUP_BODY_STATEMENTS`. */
export function envVariableName(key: string): string {
  return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function isConfigKey(key: string): key is keyof AnalysisConfig {
  return Object.hasOwn(ENV_KEYS, key);
}

/**
 * Overrides from `PROVENANCE_AUDIT_*` variables. Empty values are ignored.
 */
export function readEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfigOverrides {
  const raw: Record<string, unknown> = {};
  const issues: string[] = [];

  for (const key of Object.keys(ENV_KEYS)) {
    if (!isConfigKey(key)) continue;
    const name = envVariableName(key);
    const value = env[name]?.trim();
    if (!value) continue;

    switch (ENV_KEYS[key]) {
      case 'number': {
        const parsed = Number(value);
        if (Number.isNaN(parsed)) {
          issues.push(`${name}: expected a number, got "${value}"`);
        } else {
          raw[key] = parsed;
        }
        break;
      }
      case 'boolean': {
        const normalized = value.toLowerCase();
        if (TRUE_VALUES.has(normalized)) raw[key] = true;
        else if (FALSE_VALUES.has(normalized)) raw[key] = false;
        else issues.push(`${name}: expected a boolean, got "${value}"`);
        break;
      }
      default:
        raw[key] = value;
        break;
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid environment configuration', issues);
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// RESOLUTION
// ============================================================================

export interface ResolveConfigOptions {
  /** CLI flags; highest precedence. */
  overrides?: AnalysisConfigOverrides;
  /** Explicit config file; otherwise looked up in the repository root. */
  configPath?: string | null;
  env?: NodeJS.ProcessEnv;
}

function definedEntries(overrides: AnalysisConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Merge every layer and validate the result.
 */
export function resolveAnalysisConfig(options: ResolveConfigOptions = {}): AnalysisConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const fromEnv = readEnvironmentConfig(env);

  const repoPath = overrides.repoPath ?? fromEnv.repoPath ?? DEFAULT_ANALYSIS_CONFIG.repoPath;
  const configPath = options.configPath || env[`${ENV_PREFIX}CONFIG`]?.trim() || findConfigFile(repoPath);
  const fromFile = configPath ? loadConfigFile(configPath) : {};

  return validateAnalysisConfig({
    ...DEFAULT_ANALYSIS_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...definedEntries(overrides),
  });
}

export function validateAnalysisConfig(candidate: unknown): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid analysis configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveOutputPath(config: AnalysisConfig): string {
  if (config.outputPath) return config.outputPath;
  return config.format === 'json' ? 'reports/diagnostic.json' : 'reports/diagnostic.md';
}
