/**
 * Rule Parser - Turns raw policy lines into Line variants
 */

import {
  ArgumentSpecifier,
  Diagnostic,
  FieldResult,
  IncludeDirective,
  Line,
  LineKind,
  ParseOptions,
  POSITIONAL_FIELDS,
  QubeSpecifier,
  Rule,
  ServiceSpecifier,
  SpecifierPosition,
  Token
} from './types';
import { LineTokenizer } from './line-tokenizer';
import { SpecifierParser, toActionType } from './specifier-parser';
import { createDiagnostic, Span, spanOf } from './diagnostics';

export const DEFAULT_PARSE_OPTIONS: ParseOptions = { allowIncludes: true };

/** Index of the action token when the line is well-formed */
const ACTION_INDEX = 4;

interface PositionalFields {
  service?: ServiceSpecifier;
  argument?: ArgumentSpecifier;
  source?: QubeSpecifier;
  destination?: QubeSpecifier;
}

export class RuleParser {
  private tokenizer: LineTokenizer;
  private specifiers: SpecifierParser;

  constructor() {
    this.tokenizer = new LineTokenizer();
    this.specifiers = new SpecifierParser();
  }

  /**
   * Parse every line of a file, numbering from 1
   */
  parseLines(rawLines: string[], options: ParseOptions = DEFAULT_PARSE_OPTIONS): Line[] {
    return rawLines.map((raw, i) => this.parseLine(raw, i + 1, options));
  }

  /**
   * Parse a single raw line into a Line
   */
  parseLine(raw: string, lineNumber: number, options: ParseOptions = DEFAULT_PARSE_OPTIONS): Line {
    const classified = this.tokenizer.classify(raw);

    switch (classified.kind) {
      case 'blank':
        return { kind: LineKind.BLANK, raw, lineNumber };
      case 'comment':
        return { kind: LineKind.COMMENT, raw, lineNumber, text: classified.text };
      case 'directive':
        return this.parseDirective(raw, classified.tokens, lineNumber, options);
      case 'rule': {
        const result = this.parseTokens(classified.tokens, lineNumber);
        if (result.ok) {
          return { kind: LineKind.PARSED, raw, lineNumber, rule: result.value };
        }
        return { kind: LineKind.MALFORMED, raw, lineNumber, diagnostics: result.diagnostics };
      }
      default: {
        const unreachable: never = classified;
        throw new Error(`Unhandled line classification: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Parse the tokens of a rule line. Keeps validating after the first
   * problem so every error on the line is reported at once.
   */
  parseTokens(tokens: Token[], lineNumber: number): FieldResult<Rule> {
    const diagnostics: Diagnostic[] = [];
    const actionIndex = this.findActionIndex(tokens);

    if (actionIndex === -1) {
      if (tokens.length <= ACTION_INDEX) {
        const missing = POSITIONAL_FIELDS.slice(tokens.length);
        diagnostics.push(createDiagnostic(
          'MissingField',
          lineNumber,
          this.endOfLine(tokens),
          `Missing ${missing.join(', ')}`
        ));
      } else {
        diagnostics.push(createDiagnostic(
          'UnknownAction',
          lineNumber,
          spanOf(tokens[ACTION_INDEX]),
          `Unknown action "${tokens[ACTION_INDEX].value}": expected allow, deny or ask`
        ));
      }
      this.parsePositional(tokens.slice(0, ACTION_INDEX), lineNumber, diagnostics);
      return { ok: false, diagnostics };
    }

    const actionToken = tokens[actionIndex];
    const positional = tokens.slice(0, actionIndex);

    if (positional.length < ACTION_INDEX) {
      const missing = POSITIONAL_FIELDS.slice(positional.length, ACTION_INDEX);
      diagnostics.push(createDiagnostic(
        'MissingField',
        lineNumber,
        spanOf(actionToken),
        `Missing ${missing.join(', ')} before the action`
      ));
    }

    for (const extra of positional.slice(ACTION_INDEX)) {
      diagnostics.push(createDiagnostic(
        'UnexpectedToken',
        lineNumber,
        spanOf(extra),
        `Unexpected "${extra.value}" before the action`
      ));
    }

    const fields = this.parsePositional(positional.slice(0, ACTION_INDEX), lineNumber, diagnostics);
    const action = this.specifiers.parseAction(actionToken, tokens.slice(actionIndex + 1), lineNumber);
    if (!action.ok) {
      diagnostics.push(...action.diagnostics);
    }

    if (diagnostics.length > 0 || !action.ok) {
      return { ok: false, diagnostics };
    }

    const { service, argument, source, destination } = fields;
    if (!service || !argument || !source || !destination) {
      // a missing field always produced a diagnostic above
      return { ok: false, diagnostics };
    }

    return {
      ok: true,
      value: { service, argument, source, destination, action: action.value, lineNumber }
    };
  }

  /**
   * The action normally sits in the fifth column; otherwise take the first
   * action keyword so missing or extra fields can be reported precisely
   */
  private findActionIndex(tokens: Token[]): number {
    if (tokens.length > ACTION_INDEX && toActionType(tokens[ACTION_INDEX].value) !== undefined) {
      return ACTION_INDEX;
    }
    return tokens.findIndex(token => toActionType(token.value) !== undefined);
  }

  private parsePositional(
    tokens: Token[],
    lineNumber: number,
    diagnostics: Diagnostic[]
  ): PositionalFields {
    const [serviceToken, argumentToken, sourceToken, destinationToken] = tokens;
    const fields: PositionalFields = {};

    if (serviceToken) {
      const result = this.specifiers.parseService(serviceToken, lineNumber);
      if (result.ok) fields.service = result.value;
      else diagnostics.push(...result.diagnostics);
    }

    if (argumentToken) {
      const result = this.specifiers.parseArgument(argumentToken, lineNumber);
      if (result.ok) fields.argument = result.value;
      else diagnostics.push(...result.diagnostics);
    }

    if (sourceToken) {
      const result = this.specifiers.parseQube(sourceToken, lineNumber, SpecifierPosition.SOURCE);
      if (result.ok) fields.source = result.value;
      else diagnostics.push(...result.diagnostics);
    }

    if (destinationToken) {
      const result = this.specifiers.parseQube(destinationToken, lineNumber, SpecifierPosition.DESTINATION);
      if (result.ok) fields.destination = result.value;
      else diagnostics.push(...result.diagnostics);
    }

    return fields;
  }

  private parseDirective(raw: string, tokens: Token[], lineNumber: number, options: ParseOptions): Line {
    const diagnostics: Diagnostic[] = [];
    const [keyword, pathToken, ...extra] = tokens;
    const directive = this.toDirective(keyword.value);

    if (directive === undefined) {
      diagnostics.push(createDiagnostic(
        'UnknownDirective',
        lineNumber,
        spanOf(keyword),
        `Unknown directive "${keyword.value}": expected !include or !include-dir`
      ));
    } else if (!options.allowIncludes) {
      diagnostics.push(createDiagnostic(
        'IncludeNotAllowed',
        lineNumber,
        spanOf(keyword),
        'Include directives are not allowed in this file'
      ));
    }

    if (!pathToken) {
      diagnostics.push(createDiagnostic(
        'MissingIncludePath',
        lineNumber,
        this.endOfLine(tokens),
        `Missing path after ${keyword.value}`
      ));
    }

    for (const token of extra) {
      diagnostics.push(createDiagnostic(
        'UnexpectedToken',
        lineNumber,
        spanOf(token),
        `Unexpected "${token.value}" after the include path`
      ));
    }

    if (diagnostics.length > 0 || directive === undefined || !pathToken) {
      return { kind: LineKind.MALFORMED, raw, lineNumber, diagnostics };
    }

    return { kind: LineKind.INCLUDE, raw, lineNumber, directive, path: pathToken.value };
  }

  private toDirective(keyword: string): IncludeDirective | undefined {
    switch (keyword) {
      case IncludeDirective.FILE:
        return IncludeDirective.FILE;
      case IncludeDirective.DIRECTORY:
        return IncludeDirective.DIRECTORY;
      default:
        return undefined;
    }
  }

  /** One-column span just past the last token */
  private endOfLine(tokens: Token[]): Span {
    const last = tokens[tokens.length - 1];
    const end = last ? last.column + last.value.length : 1;
    return { column: end, endColumn: end + 1 };
  }
}
