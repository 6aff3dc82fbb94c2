/**
 * @fileoverview TypeScript function extraction on the ts-morph syntax tree
 */

import { Node, Project, SyntaxKind, type SourceFile } from 'ts-morph';
import type { DefinitionSite, SourceExtractor } from './types.js';

// ============================================================================
// PARSER
// ============================================================================

/**
 * Parses source text in an in-memory ts-morph project. Nothing is resolved
 * and no lib files are loaded; only syntactic diagnostics are consulted.
 */
export class TsSourceParser {
  private project: Project | null = null;
  private parseCount = 0;
  private static readonly CLEANUP_INTERVAL = 200;

  /**
   * Parse `content` as `fileName` and hand the tree to `visit`. Returns null
   * without calling `visit` when the text has any syntax error. The tree is
   * only valid inside the callback.
   */
  parse<T>(fileName: string, content: string, visit: (sourceFile: SourceFile) => T): T | null {
    const project = this.getProject();
    const sourceFile = project.createSourceFile(`/virtual/${fileName}`, content, { overwrite: true });
    try {
      const diagnostics = project.getProgram().getSyntacticDiagnostics(sourceFile);
      if (diagnostics.length > 0) return null;
      return visit(sourceFile);
    } finally {
      sourceFile.forget();
      this.parseCount++;
      if (this.parseCount >= TsSourceParser.CLEANUP_INTERVAL) {
        this.clearProject();
      }
    }
  }

  clearProject(): void {
    this.project = null;
    this.parseCount = 0;
  }

  private getProject(): Project {
    if (this.project) return this.project;
    this.project = new Project({
      useInMemoryFileSystem: true,
      skipAddingFilesFromTsConfig: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        noLib: true,
        noResolve: true,
        skipLibCheck: true,
        types: [],
      },
    });
    return this.project;
  }
}

// ============================================================================
// DEFINITION SITES
// ============================================================================

/**
 * Simple name of a member or binding; computed names have none.
 */
export function simpleNameOf(nameNode: Node): string | null {
  switch (nameNode.getKind()) {
    case SyntaxKind.Identifier:
    case SyntaxKind.PrivateIdentifier:
      return nameNode.getText();
    case SyntaxKind.StringLiteral:
    case SyntaxKind.NumericLiteral:
    case SyntaxKind.NoSubstitutionTemplateLiteral:
      return Node.isLiteralLike(nameNode) ? nameNode.getLiteralText() : null;
    default:
      return null;
  }
}

export function isFunctionValue(node: Node | undefined): boolean {
  return node !== undefined && (Node.isArrowFunction(node) || Node.isFunctionExpression(node));
}

interface SiteParts {
  name: string | null;
  end: Node;
}

/**
 * Name and extent of a definition recorded as an entity, or null for
 * anything else (including declarations without a body).
 */
function definitionParts(node: Node): SiteParts | null {
  switch (node.getKind()) {
    case SyntaxKind.FunctionDeclaration:
      if (!Node.isFunctionDeclaration(node) || !node.getBody()) return null;
      return { name: node.getName() ?? null, end: node };
    case SyntaxKind.MethodDeclaration:
      if (!Node.isMethodDeclaration(node) || !node.getBody()) return null;
      return { name: simpleNameOf(node.getNameNode()), end: node };
    case SyntaxKind.Constructor:
      if (!Node.isConstructorDeclaration(node) || !node.getBody()) return null;
      return { name: 'constructor', end: node };
    case SyntaxKind.GetAccessor:
    case SyntaxKind.SetAccessor:
      if (!(Node.isGetAccessorDeclaration(node) || Node.isSetAccessorDeclaration(node)) || !node.getBody()) {
        return null;
      }
      return { name: simpleNameOf(node.getNameNode()), end: node };
    case SyntaxKind.VariableDeclaration:
    case SyntaxKind.PropertyDeclaration:
    case SyntaxKind.PropertyAssignment: {
      if (!(Node.isVariableDeclaration(node) || Node.isPropertyDeclaration(node) || Node.isPropertyAssignment(node))) {
        return null;
      }
      const initializer = node.getInitializer();
      if (!initializer || !isFunctionValue(initializer)) return null;
      return { name: simpleNameOf(node.getNameNode()), end: initializer };
    }
    default:
      return null;
  }
}

/** Name a definition is recorded under, or null when it is not one. */
export function definitionName(node: Node): string | null {
  return definitionParts(node)?.name ?? null;
}

function collectSites(node: Node, typeStack: readonly string[], sites: DefinitionSite[]): void {
  if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
    const className = node.getName();
    const nested = className ? [...typeStack, className] : typeStack;
    node.forEachChild((child) => {
      collectSites(child, nested, sites);
    });
    return;
  }

  const parts = definitionParts(node);
  if (parts?.name) {
    sites.push({
      name: parts.name,
      enclosingTypes: [...typeStack],
      startLine: node.getStartLineNumber(),
      endLine: parts.end.getEndLineNumber(),
    });
  }

  node.forEachChild((child) => {
    collectSites(child, typeStack, sites);
  });
}

// ============================================================================
// EXTRACTOR
// ============================================================================

export class TypeScriptExtractor implements SourceExtractor {
  readonly path = 'ast';
  readonly extensions = ['.ts', '.tsx', '.mts', '.cts'] as const;

  constructor(private readonly parser: TsSourceParser = new TsSourceParser()) {}

  extract(filePath: string, content: string): DefinitionSite[] | null {
    return this.parser.parse(filePath, content, (sourceFile) => {
      const sites: DefinitionSite[] = [];
      collectSites(sourceFile, [], sites);
      return sites;
    });
  }
}
