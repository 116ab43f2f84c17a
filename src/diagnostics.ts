/**
 * Diagnostic construction helpers
 */

import {
  Diagnostic,
  DiagnosticCategory,
  DiagnosticKind,
  DiagnosticSeverity,
  SyntaxDiagnosticKind,
  Token
} from './types';

const SYNTAX_KINDS: ReadonlySet<DiagnosticKind> = new Set<SyntaxDiagnosticKind>([
  'MissingField',
  'UnexpectedToken',
  'UnknownAction',
  'InvalidServiceName',
  'InvalidArgumentSyntax',
  'MalformedParameter',
  'MissingIncludePath',
  'UnknownDirective'
]);

export function categoryOf(kind: DiagnosticKind): DiagnosticCategory {
  if (kind === 'RedundantRule') {
    return DiagnosticCategory.STRUCTURAL;
  }
  return SYNTAX_KINDS.has(kind) ? DiagnosticCategory.SYNTAX : DiagnosticCategory.SEMANTIC;
}

export interface Span {
  column: number;
  endColumn: number;
}

export function spanOf(token: Token): Span {
  return { column: token.column, endColumn: token.column + token.value.length };
}

/** Span covering every token from first to last */
export function spanOfTokens(tokens: Token[]): Span {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  return { column: first.column, endColumn: last.column + last.value.length };
}

export function createDiagnostic(
  kind: DiagnosticKind,
  line: number,
  span: Span,
  message: string
): Diagnostic {
  const category = categoryOf(kind);
  return {
    line,
    column: span.column,
    endColumn: span.endColumn,
    message,
    kind,
    category,
    severity: category === DiagnosticCategory.STRUCTURAL
      ? DiagnosticSeverity.WARNING
      : DiagnosticSeverity.ERROR
  };
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === DiagnosticSeverity.ERROR;
}
