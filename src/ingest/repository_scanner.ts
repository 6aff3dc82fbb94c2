/**
 * @fileoverview Repository scanner: files in, ordered entities out
 *
 * TypeScript files go through the ts-morph extractor, JavaScript files
 * through the lexical extractor. A file that cannot be read, decoded or
 * parsed contributes no entities; the scan itself never fails on one file.
 */

import { createHash } from 'node:crypto';
import * as path from 'node:path';
import type { CodeEntity } from '../types.js';
import type { DefinitionSite, SourceExtractor } from './types.js';
import { compareCodeUnits, listSourceFiles, readSourceText } from './file_walker.js';
import { LexicalExtractor } from './lexical_extractor.js';
import { TsSourceParser, TypeScriptExtractor } from './ts_extractor.js';
import { logDebug } from '../telemetry/logger.js';

export interface ScanOptions {
  includeTests?: boolean;
  /** Reused across scans and by the duplication detector to share one ts-morph project. */
  parser?: TsSourceParser;
}

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * Stable identifier for an entity: a pure function of its location and name.
 */
export function computeEntityId(filePath: string, qualifiedName: string, startLine: number): string {
  return createHash('sha1').update(`${filePath}:${qualifiedName}:${startLine}`, 'utf8').digest('hex').slice(0, 12);
}

const SOURCE_EXTENSION_RE = /\.(?:[cm]?[jt]sx?)$/;

/**
 * Dotted module path for a repository-relative file:
 * `src/orders/service.ts` -> `src.orders.service`, `src/orders/index.ts` -> `src.orders`.
 */
export function moduleNameFromPath(relativePath: string): string {
  const withoutExtension = relativePath.replace(/\\/g, '/').replace(SOURCE_EXTENSION_RE, '');
  const parts = withoutExtension.split('/').filter((part) => part.length > 0);
  if (parts.length > 0 && parts[parts.length - 1] === 'index') {
    parts.pop();
  }
  return parts.join('.');
}

export function sliceLines(lines: readonly string[], startLine: number, endLine: number): string {
  return lines.slice(Math.max(startLine - 1, 0), Math.min(endLine, lines.length)).join('\n');
}

// ============================================================================
// SCANNER
// ============================================================================

function buildEntity(
  site: DefinitionSite,
  filePath: string,
  moduleName: string,
  lines: readonly string[],
  extractor: SourceExtractor,
): CodeEntity {
  const qualifiedName = [moduleName, ...site.enclosingTypes, site.name].filter((part) => part.length > 0).join('.');
  const endLine = Math.max(site.endLine, site.startLine);
  return {
    entityId: computeEntityId(filePath, qualifiedName, site.startLine),
    filePath,
    functionName: site.name,
    qualifiedName,
    startLine: site.startLine,
    endLine,
    source: sliceLines(lines, site.startLine, endLine),
    extraction: extractor.path,
  };
}

export function createExtractors(parser: TsSourceParser): SourceExtractor[] {
  return [new TypeScriptExtractor(parser), new LexicalExtractor()];
}

/**
 * Scan `root` and return every entity ordered by (filePath, startLine).
 */
export function scanRepository(root: string, options: ScanOptions = {}): CodeEntity[] {
  const resolvedRoot = path.resolve(root);
  const extractors = createExtractors(options.parser ?? new TsSourceParser());
  const byExtension = new Map<string, SourceExtractor>();
  for (const extractor of extractors) {
    for (const ext of extractor.extensions) byExtension.set(ext, extractor);
  }

  const files = listSourceFiles(resolvedRoot, {
    includeTests: options.includeTests ?? false,
    extensions: [...byExtension.keys()],
  });

  const entities: CodeEntity[] = [];
  for (const filePath of files) {
    const extractor = byExtension.get(path.posix.extname(filePath).toLowerCase());
    if (!extractor) continue;

    const content = readSourceText(path.join(resolvedRoot, filePath));
    if (content === null) continue;

    const sites = extractor.extract(filePath, content);
    if (sites === null) {
      logDebug('[scanner] Skipping file with syntax errors', { filePath });
      continue;
    }

    const lines = content.split(/\r?\n/);
    const moduleName = moduleNameFromPath(filePath);
    for (const site of sites) {
      entities.push(buildEntity(site, filePath, moduleName, lines, extractor));
    }
  }

  return entities.sort(
    (a, b) => compareCodeUnits(a.filePath, b.filePath) || a.startLine - b.startLine,
  );
}
