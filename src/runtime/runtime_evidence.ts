/**
 * @fileoverview Runtime invocation evidence
 *
 * Reads an invocation-count file exported from whatever telemetry the
 * caller has and maps it onto scanned entities. Accepted shapes:
 *
 * ```json
 * { "functions": { "src.orders.validate": { "invocations": 12, "last_invoked_at": "2026-01-02" } } }
 * { "src.orders.validate": 12 }
 * [{ "name": "validate", "count": 12 }]
 * ```
 *
 * Rows may name the function with `name`, `qualified_name` or `function`,
 * and carry the count as `invocations` or `count`.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CodeEntity, RuntimeEvidence } from '../types.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RuntimeRecord {
  invocations: number;
  lastInvokedAt: string | null;
}

/** Function name (qualified or simple) -> invocation record. */
export type RuntimeIndex = Map<string, RuntimeRecord>;

// ============================================================================
// SCHEMAS
// ============================================================================

const InvocationCountSchema = z
  .union([
    z.number().finite(),
    z
      .string()
      .regex(/^\s*[+-]?\d+\s*$/)
      .transform((value) => parseInt(value, 10)),
  ])
  .transform((value) => Math.trunc(value));

const RecordObjectSchema = z
  .object({
    invocations: z.unknown(),
    count: z.unknown(),
    last_invoked_at: z.unknown(),
  })
  .partial()
  .passthrough();

const FunctionsEnvelopeSchema = z.object({ functions: z.record(z.unknown()) }).passthrough();

const RowSchema = z
  .object({
    name: z.unknown(),
    qualified_name: z.unknown(),
    function: z.unknown(),
  })
  .partial()
  .passthrough();

const RuntimeFileSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

// ============================================================================
// PARSING
// ============================================================================

/**
 * A bare number, or an object with `invocations` (else `count`) and an
 * optional `last_invoked_at`. Anything without a usable count is dropped.
 */
export function coerceRuntimeRecord(value: unknown): RuntimeRecord | null {
  const direct = z.number().finite().safeParse(value);
  if (direct.success) {
    return { invocations: Math.trunc(direct.data), lastInvokedAt: null };
  }

  const object = RecordObjectSchema.safeParse(value);
  if (!object.success) return null;

  const raw = 'invocations' in object.data ? object.data.invocations : object.data.count;
  const count = InvocationCountSchema.safeParse(raw);
  if (!count.success) return null;

  const lastInvokedAt = object.data.last_invoked_at;
  return {
    invocations: count.data,
    lastInvokedAt: lastInvokedAt === undefined || lastInvokedAt === null ? null : String(lastInvokedAt),
  };
}

function rowName(row: z.infer<typeof RowSchema>): string | null {
  for (const candidate of [row.name, row.qualified_name, row.function]) {
    if (candidate !== undefined && candidate !== null && candidate !== '' && candidate !== false && candidate !== 0) {
      return String(candidate);
    }
  }
  return null;
}

export function parseRuntimeIndex(data: unknown): RuntimeIndex {
  const index: RuntimeIndex = new Map();
  const parsed = RuntimeFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError('Runtime evidence must be a JSON object or array');
  }

  if (Array.isArray(parsed.data)) {
    for (const entry of parsed.data) {
      const row = RowSchema.safeParse(entry);
      if (!row.success) continue;
      const name = rowName(row.data);
      if (!name) continue;
      const record = coerceRuntimeRecord(entry);
      if (record) index.set(name, record);
    }
    return index;
  }

  const envelope = FunctionsEnvelopeSchema.safeParse(parsed.data);
  const entries = envelope.success ? envelope.data.functions : parsed.data;
  for (const [name, value] of Object.entries(entries)) {
    const record = coerceRuntimeRecord(value);
    if (record) index.set(name, record);
  }
  return index;
}

/**
 * Load the runtime index from `runtimePath`. No path means no runtime
 * evidence; an unreadable or malformed file is a configuration error.
 */
export function loadRuntimeIndex(runtimePath: string | null | undefined): RuntimeIndex {
  if (!runtimePath) return new Map();

  let content: string;
  try {
    content = readFileSync(runtimePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read runtime evidence file ${runtimePath}`, [getErrorMessage(error)]);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Runtime evidence file ${runtimePath} is not valid JSON`, [getErrorMessage(error)]);
  }

  return parseRuntimeIndex(data);
}

// ============================================================================
// MAPPING
// ============================================================================

/**
 * Evidence for every entity: looked up by qualified name, then simple name.
 */
export function mapRuntimeEvidence(
  entities: readonly CodeEntity[],
  index: RuntimeIndex,
): Map<string, RuntimeEvidence> {
  const mapped = new Map<string, RuntimeEvidence>();
  const runtimeAvailable = index.size > 0;

  for (const entity of entities) {
    const record = index.get(entity.qualifiedName) ?? index.get(entity.functionName);
    if (record) {
      mapped.set(entity.entityId, {
        entityId: entity.entityId,
        invocationCount: record.invocations,
        lastInvokedAt: record.lastInvokedAt,
        source: 'runtime-file',
      });
      continue;
    }
    mapped.set(entity.entityId, {
      entityId: entity.entityId,
      invocationCount: null,
      lastInvokedAt: null,
      source: runtimeAvailable ? 'runtime-unmapped' : 'runtime-unavailable',
    });
  }

  return mapped;
}
