/**
 * Core type definitions for the RPC policy editor
 */

// ============================================================================
// Specifier Types
// ============================================================================

export const SERVICE_WILDCARD = '*';

export type ServiceSpecifier =
  | { kind: 'wildcard' }
  | { kind: 'name'; name: string };

export enum ArgumentKind {
  EMPTY = 'Empty',
  ANY = 'Any',
  SPECIFIC = 'Specific'
}

export type ArgumentSpecifier =
  | { kind: ArgumentKind.EMPTY }
  | { kind: ArgumentKind.ANY }
  | { kind: ArgumentKind.SPECIFIC; text: string };  // stored without the leading '+'

export enum QubeSpecifierKind {
  LITERAL = 'Literal',
  ADMIN_VM = 'AdminVM',
  ANY_VM = 'AnyVM',
  DEFAULT = 'Default',
  DISPVM = 'DispVM',
  DISPVM_NAMED = 'DispVMNamed',
  DISPVM_BY_TAG = 'DispVMByTag',
  TAG = 'Tag',
  TYPE = 'Type'
}

export type QubeSpecifier =
  | { kind: QubeSpecifierKind.LITERAL; name: string }
  | { kind: QubeSpecifierKind.ADMIN_VM }
  | { kind: QubeSpecifierKind.ANY_VM }
  | { kind: QubeSpecifierKind.DEFAULT }
  | { kind: QubeSpecifierKind.DISPVM }
  | { kind: QubeSpecifierKind.DISPVM_NAMED; name: string }
  | { kind: QubeSpecifierKind.DISPVM_BY_TAG; tag: string }
  | { kind: QubeSpecifierKind.TAG; tag: string }
  | { kind: QubeSpecifierKind.TYPE; typeName: string };

/** Where a qube specifier appears on a rule line */
export enum SpecifierPosition {
  SOURCE = 'Source',
  DESTINATION = 'Destination',
  PARAMETER = 'Parameter'
}

// ============================================================================
// Action Types
// ============================================================================

export enum ActionType {
  ALLOW = 'allow',
  DENY = 'deny',
  ASK = 'ask'
}

/** Opaque KEY=VALUE parameter, kept in source order */
export interface ActionParameter {
  key: string;
  value: string;
}

export type Action =
  | { type: ActionType.DENY }
  | { type: ActionType.ALLOW; target?: QubeSpecifier; params: ActionParameter[] }
  | { type: ActionType.ASK; defaultTarget?: QubeSpecifier; params: ActionParameter[] };

// ============================================================================
// Rule and Line Types
// ============================================================================

export interface Rule {
  service: ServiceSpecifier;
  argument: ArgumentSpecifier;
  source: QubeSpecifier;
  destination: QubeSpecifier;
  action: Action;
  lineNumber: number;
}

export enum RuleField {
  SERVICE = 'service',
  ARGUMENT = 'argument',
  SOURCE = 'source',
  DESTINATION = 'destination',
  ACTION = 'action',
  PARAMETERS = 'parameters'
}

/** Positional fields in the order they appear on a rule line */
export const POSITIONAL_FIELDS = [
  RuleField.SERVICE,
  RuleField.ARGUMENT,
  RuleField.SOURCE,
  RuleField.DESTINATION,
  RuleField.ACTION
] as const;

export enum IncludeDirective {
  FILE = '!include',
  DIRECTORY = '!include-dir'
}

export enum LineKind {
  BLANK = 'Blank',
  COMMENT = 'Comment',
  INCLUDE = 'Include',
  PARSED = 'Parsed',
  MALFORMED = 'Malformed'
}

interface LineBase {
  /** Exact text of the line, without the newline */
  raw: string;
  /** 1-indexed */
  lineNumber: number;
}

export type Line =
  | (LineBase & { kind: LineKind.BLANK })
  | (LineBase & { kind: LineKind.COMMENT; text: string })
  | (LineBase & { kind: LineKind.INCLUDE; directive: IncludeDirective; path: string })
  | (LineBase & { kind: LineKind.PARSED; rule: Rule })
  | (LineBase & { kind: LineKind.MALFORMED; diagnostics: Diagnostic[] });

export interface Token {
  value: string;
  column: number;  // 1-indexed
}

// ============================================================================
// Diagnostic Types
// ============================================================================

export enum DiagnosticSeverity {
  ERROR = 'error',
  WARNING = 'warning'
}

export enum DiagnosticCategory {
  SYNTAX = 'syntax',
  SEMANTIC = 'semantic',
  STRUCTURAL = 'structural'
}

export type SyntaxDiagnosticKind =
  | 'MissingField'
  | 'UnexpectedToken'
  | 'UnknownAction'
  | 'InvalidServiceName'
  | 'InvalidArgumentSyntax'
  | 'MalformedParameter'
  | 'MissingIncludePath'
  | 'UnknownDirective';

/** e.g. 'DispVMIllegalAsSource', 'TagIllegalAsParameter' */
export type IllegalPositionKind = `${QubeSpecifierKind}IllegalAs${SpecifierPosition}`;

export type SemanticDiagnosticKind =
  | IllegalPositionKind
  | 'InvalidQubeName'
  | 'InvalidQubeSpecifier'
  | 'UnknownQubeKeyword'
  | 'UnexpectedParametersForDeny'
  | 'ParameterNotApplicable'
  | 'DuplicateParameter'
  | 'IncludeNotAllowed';

export type StructuralDiagnosticKind = 'RedundantRule';

export type DiagnosticKind = SyntaxDiagnosticKind | SemanticDiagnosticKind | StructuralDiagnosticKind;

export interface Diagnostic {
  line: number;
  column: number;     // 1-indexed, inclusive
  endColumn: number;  // 1-indexed, exclusive
  message: string;
  kind: DiagnosticKind;
  category: DiagnosticCategory;
  severity: DiagnosticSeverity;
}

/** Outcome of a single field validator: a value or the problems found */
export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; diagnostics: Diagnostic[] };

export interface ParseOptions {
  /** Whether !include lines are legal in this file */
  allowIncludes: boolean;
}

// ============================================================================
// Evaluation Types
// ============================================================================

/** Metadata about a concrete qube, supplied by the caller */
export interface QubeInfo {
  name: string;
  type?: string;
  tags?: string[];
}

export type RequestDestination =
  | { kind: 'qube'; qube: QubeInfo }
  | { kind: 'dispvm'; template?: QubeInfo }
  | { kind: 'default' };

export interface EvaluationRequest {
  service: string;
  /** Request argument without the leading '+'; '' when the call has none */
  argument: string;
  source: QubeInfo;
  destination: RequestDestination;
}

export interface RuleMatch {
  action: Action;
  rule: Rule;
  /** Name of the file the rule came from (an included file's name for included rules) */
  file: string;
}

// ============================================================================
// Storage Types
// ============================================================================

/** Token handed out with each loaded file, checked again on replace */
export type StoreToken = string;

export const TOKEN_NEW = 'new';
export const TOKEN_ANY = 'any';

export interface StoredPolicy {
  content: string;
  token: StoreToken;
}

// ============================================================================
// Audit Logging Types
// ============================================================================

export type SaveOutcome = 'saved' | 'rejected' | 'failed';

export interface LogEntry {
  timestamp: string;      // ISO 8601
  file: string;
  outcome: SaveOutcome;
  errors: number;
  warnings: number;
  reason?: string;
}

export interface LogReadOptions {
  limit?: number;         // Default: 50
  outcome?: SaveOutcome;
  since?: Date;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface PolicyEditorConfig {
  policy: {
    dir: string;
    includeDir: string;
  };
  audit: {
    enabled: boolean;
    path: string;
    maxSize: number;
  };
}
