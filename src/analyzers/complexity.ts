import { extname } from 'path';
import { Node, Project, SyntaxKind } from 'ts-morph';
import type { ComplexityMethod } from '../types.js';

export interface ComplexityResult {
  complexity: number;
  method: ComplexityMethod;
}

// Extensions parsed with the TypeScript parser (JavaScript is a subset).
export const STRUCTURAL_EXTENSIONS = new Set(['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs']);

// Branches, loops, exception handlers and `with` blocks.
const BRANCH_KINDS = new Set([
  SyntaxKind.IfStatement,
  SyntaxKind.ConditionalExpression,
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
  SyntaxKind.CatchClause,
  SyntaxKind.WithStatement,
]);

const DEFINITION_KINDS = new Set([
  SyntaxKind.FunctionDeclaration,
  SyntaxKind.FunctionExpression,
  SyntaxKind.ArrowFunction,
  SyntaxKind.MethodDeclaration,
  SyntaxKind.Constructor,
  SyntaxKind.GetAccessor,
  SyntaxKind.SetAccessor,
  SyntaxKind.ClassDeclaration,
  SyntaxKind.ClassExpression,
]);

// `a && b && c` parses as two nested binary nodes, so one point per operator
// gives (operands - 1) per chain.
const BOOLEAN_OPERATORS = new Set([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
]);

const MARKUP_TAGS = ['<div', '<section'];

const DEFAULT_KEYWORDS = ['function ', 'class ', 'if ('];

const KEYWORDS_BY_EXTENSION: Record<string, string[]> = {
  '.py': ['def ', 'class ', 'if '],
  '.rb': ['def ', 'class ', 'if '],
  '.go': ['func ', 'type ', 'if '],
};

/**
 * Measures structural complexity for one file.
 *
 * TypeScript/JavaScript sources are walked as a syntax tree. When they do not
 * parse, the text is scored as markup. Everything else gets a plain keyword
 * count, which is knowingly approximate: keywords inside strings and comments
 * count too.
 */
export class ComplexityAnalyzer {
  private readonly project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { allowJs: true, noLib: true },
  });

  measure(relPath: string, source: string): ComplexityResult {
    const ext = extname(relPath).toLowerCase();

    if (STRUCTURAL_EXTENSIONS.has(ext)) {
      const structural = this.structuralComplexity(relPath, source);
      if (structural !== null) return { complexity: structural, method: 'structural' };
      return { complexity: markupComplexity(source), method: 'markup' };
    }

    return {
      complexity: keywordComplexity(source, KEYWORDS_BY_EXTENSION[ext] ?? DEFAULT_KEYWORDS),
      method: 'keyword',
    };
  }

  /** Returns null when the file has syntax errors. */
  private structuralComplexity(relPath: string, source: string): number | null {
    const sourceFile = this.project.createSourceFile(`/${relPath}`, source, { overwrite: true });

    try {
      const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
      if (diagnostics.length > 0) return null;

      let complexity = 1;
      sourceFile.forEachDescendant(node => {
        const kind = node.getKind();
        if (BRANCH_KINDS.has(kind) || DEFINITION_KINDS.has(kind)) {
          complexity++;
        } else if (Node.isBinaryExpression(node) && BOOLEAN_OPERATORS.has(node.getOperatorToken().getKind())) {
          complexity++;
        }
      });
      return complexity;
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }
}

export function markupComplexity(source: string): number {
  return 1 + MARKUP_TAGS.reduce((sum, tag) => sum + countOccurrences(source, tag), 0);
}

export function keywordComplexity(source: string, keywords: string[] = DEFAULT_KEYWORDS): number {
  return 1 + keywords.reduce((sum, kw) => sum + countOccurrences(source, kw), 0);
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}
