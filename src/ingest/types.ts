import type { ExtractionPath } from '../types.js';

/**
 * A function definition located in one file, before it becomes an entity.
 * Lines are 1-based and inclusive.
 */
export interface DefinitionSite {
  name: string;
  enclosingTypes: string[];
  startLine: number;
  endLine: number;
}

export interface SourceExtractor {
  readonly path: ExtractionPath;
  readonly extensions: readonly string[];
  /** Returns null when the file should contribute nothing (e.g. syntax error). */
  extract(filePath: string, content: string): DefinitionSite[] | null;
}
