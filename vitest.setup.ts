/**
 * Centralized Vitest setup for provenance-audit.
 *
 * Configuration is layered over PROVENANCE_AUDIT_* environment variables, so
 * every test starts from an environment without them and with verbose
 * logging off.
 */

import { afterEach, beforeEach } from 'vitest';
import { setVerboseLogging } from './src/telemetry/logger.js';

const ENV_PREFIX = 'PROVENANCE_AUDIT_';
let savedEnv: Record<string, string> = {};

beforeEach(() => {
  savedEnv = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined) {
      savedEnv[key] = value;
      delete process.env[key];
    }
  }
  setVerboseLogging(false);
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(ENV_PREFIX)) delete process.env[key];
  }
  Object.assign(process.env, savedEnv);
});
