// packages/triage/src/pattern.ts
import path from 'node:path';
import { parse, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';
import { errorMessage, noopLogger, type Logger, type UnifiedFinding } from '@vulntriage/core';

/** Whole-file source text by scan-root relative path. */
export type SourceReader = (filePath: string) => string | undefined;

const JS_PLUGINS: Record<string, ParserPlugin[]> = {
  '.js': ['jsx'],
  '.jsx': ['jsx'],
  '.mjs': [],
  '.cjs': [],
  '.ts': ['typescript'],
  '.mts': ['typescript'],
  '.cts': ['typescript'],
  '.tsx': ['typescript', 'jsx'],
};

const NOT_HELPERS = new Set([
  'if',
  'for',
  'while',
  'switch',
  'catch',
  'return',
  'function',
  'def',
  'class',
  'elif',
  'with',
  'typeof',
  'await',
  'new',
]);

function memberName(node: t.Node): string | undefined {
  if (t.isIdentifier(node)) return node.name;
  if (t.isThisExpression(node)) return 'this';
  if ((t.isMemberExpression(node) || t.isOptionalMemberExpression(node)) && !node.computed && t.isIdentifier(node.property)) {
    const object = memberName(node.object);
    return object ? `${object}.${node.property.name}` : node.property.name;
  }
  return undefined;
}

export function calleeName(call: t.CallExpression | t.OptionalCallExpression | t.NewExpression): string | undefined {
  return t.isV8IntrinsicIdentifier(call.callee) ? undefined : memberName(call.callee);
}

/** First dotted name followed by "(" on the line, skipping keywords. */
export function lexicalPattern(line: string): string | undefined {
  const re = /([A-Za-z_$][\w$]*(?:\s*\.\s*[A-Za-z_$][\w$]*)*)\s*\(/g;
  for (let m = re.exec(line); m; m = re.exec(line)) {
    const name = m[1].replace(/\s+/g, '');
    const head = name.split('.')[0];
    if (!NOT_HELPERS.has(head)) return name;
  }
  return undefined;
}

/**
 * Structural pattern of a finding: the helper called on its first line.
 * JS/TS files go through the Babel AST (outermost call starting on the
 * line); everything else, and unparsable sources, use the lexical fallback.
 * Parsed files are cached per instance.
 */
export class PatternDetector {
  private readonly asts = new Map<string, t.File | undefined>();

  constructor(
    private readonly readSource?: SourceReader,
    private readonly logger: Logger = noopLogger
  ) {}

  detect(finding: UnifiedFinding): string | undefined {
    const { filePath, startLine } = finding.location;
    const source = this.readSource?.(filePath);
    const plugins = JS_PLUGINS[path.extname(filePath).toLowerCase()];

    if (source !== undefined && plugins) {
      const ast = this.parse(filePath, source, plugins);
      if (ast) {
        const fromAst = outermostCallOnLine(ast, startLine);
        if (fromAst) return fromAst;
      }
    }

    const line = source !== undefined ? source.split(/\r?\n/)[startLine - 1] : finding.snippet?.split('\n')[0];
    return line ? lexicalPattern(line) : undefined;
  }

  private parse(filePath: string, source: string, plugins: ParserPlugin[]): t.File | undefined {
    if (this.asts.has(filePath)) return this.asts.get(filePath);
    let ast: t.File | undefined;
    try {
      ast = parse(source, { sourceType: 'unambiguous', errorRecovery: true, plugins });
    } catch (error) {
      this.logger.debug(`pattern parse failed for ${filePath}, using lexical fallback`, { error: errorMessage(error) });
      ast = undefined;
    }
    this.asts.set(filePath, ast);
    return ast;
  }
}

function outermostCallOnLine(ast: t.File, line: number): string | undefined {
  let found: string | undefined;
  // pre-order: the first call seen that starts on the line is the outermost
  t.traverseFast(ast, (node) => {
    if (found !== undefined) return;
    if (!t.isCallExpression(node) && !t.isOptionalCallExpression(node) && !t.isNewExpression(node)) return;
    if (node.loc?.start.line !== line) return;
    found = calleeName(node);
  });
  return found;
}
