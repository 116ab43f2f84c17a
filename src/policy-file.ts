/**
 * Policy File - Ordered lines of one policy file with validation
 *
 * A PolicyFile never changes after construction: every mutation returns a
 * new instance whose lines are parsed again from their raw text, so line
 * numbers always follow position and no half-applied edit is observable.
 */

import {
  Diagnostic,
  Line,
  LineKind,
  ParseOptions,
  Rule
} from './types';
import { RuleParser, DEFAULT_PARSE_OPTIONS } from './rule-parser';
import { ruleKey } from './rule-formatter';
import { createDiagnostic, isError } from './diagnostics';
import { PolicyEditError } from './errors';

const parser = new RuleParser();

export class PolicyFile {
  readonly name: string;
  readonly options: ParseOptions;
  readonly lines: readonly Line[];
  /** Whether serialize() ends the text with a newline */
  readonly trailingNewline: boolean;

  private constructor(name: string, rawLines: string[], options: ParseOptions, trailingNewline: boolean) {
    this.name = name;
    this.options = options;
    this.trailingNewline = trailingNewline;
    this.lines = parser.parseLines(rawLines, options);
  }

  /**
   * Load a file from its text. Empty text gives a file with no lines that
   * will be written with a trailing newline once it has content.
   */
  static fromText(name: string, text: string, options: ParseOptions = DEFAULT_PARSE_OPTIONS): PolicyFile {
    if (text === '') {
      return new PolicyFile(name, [], options, true);
    }

    const trailingNewline = text.endsWith('\n');
    const body = trailingNewline ? text.slice(0, -1) : text;
    return new PolicyFile(name, body.split('\n'), options, trailingNewline);
  }

  static empty(name: string, options: ParseOptions = DEFAULT_PARSE_OPTIONS): PolicyFile {
    return PolicyFile.fromText(name, '', options);
  }

  get rawLines(): string[] {
    return this.lines.map(line => line.raw);
  }

  get rules(): Rule[] {
    const rules: Rule[] = [];
    for (const line of this.lines) {
      if (line.kind === LineKind.PARSED) {
        rules.push(line.rule);
      }
    }
    return rules;
  }

  /**
   * Recompute every diagnostic from the raw lines. Pure: the same content
   * always yields the same diagnostics.
   */
  validate(): Diagnostic[] {
    const lines = parser.parseLines(this.rawLines, this.options);
    const diagnostics: Diagnostic[] = [];
    const firstSeen = new Map<string, number>();

    for (const line of lines) {
      if (line.kind === LineKind.MALFORMED) {
        diagnostics.push(...line.diagnostics);
        continue;
      }

      if (line.kind !== LineKind.PARSED) {
        continue;
      }

      const key = ruleKey(line.rule);
      const earlier = firstSeen.get(key);
      if (earlier === undefined) {
        firstSeen.set(key, line.lineNumber);
        continue;
      }

      diagnostics.push(createDiagnostic(
        'RedundantRule',
        line.lineNumber,
        { column: 1, endColumn: line.raw.length + 1 },
        `Rule duplicates line ${earlier} and can never match`
      ));
    }

    return diagnostics;
  }

  errors(): Diagnostic[] {
    return this.validate().filter(isError);
  }

  /**
   * True iff no line is malformed; warnings never block saving
   */
  canSave(): boolean {
    return this.lines.every(line => line.kind !== LineKind.MALFORMED);
  }

  serialize(): string {
    if (this.lines.length === 0) {
      return '';
    }
    return this.rawLines.join('\n') + (this.trailingNewline ? '\n' : '');
  }

  // ==========================================================================
  // Mutations (each returns a new PolicyFile)
  // ==========================================================================

  withText(text: string): PolicyFile {
    return PolicyFile.fromText(this.name, text, this.options);
  }

  insertLine(index: number, raw: string): PolicyFile {
    this.checkIndex(index, this.lines.length);
    this.checkSingleLine(raw);
    const rawLines = this.rawLines;
    rawLines.splice(index, 0, raw);
    return this.withRawLines(rawLines);
  }

  replaceLine(index: number, raw: string): PolicyFile {
    this.checkIndex(index, this.lines.length - 1);
    this.checkSingleLine(raw);
    const rawLines = this.rawLines;
    rawLines[index] = raw;
    return this.withRawLines(rawLines);
  }

  deleteLine(index: number): PolicyFile {
    this.checkIndex(index, this.lines.length - 1);
    const rawLines = this.rawLines;
    rawLines.splice(index, 1);
    return this.withRawLines(rawLines);
  }

  /**
   * Move the line at `from` so that it ends up at index `to`
   */
  moveLine(from: number, to: number): PolicyFile {
    this.checkIndex(from, this.lines.length - 1);
    this.checkIndex(to, this.lines.length - 1);
    const rawLines = this.rawLines;
    const [moved] = rawLines.splice(from, 1);
    rawLines.splice(to, 0, moved);
    return this.withRawLines(rawLines);
  }

  private withRawLines(rawLines: string[]): PolicyFile {
    return new PolicyFile(this.name, rawLines, this.options, this.trailingNewline);
  }

  // serialize() joins lines with '\n', so a line holding one would be split on reload
  private checkSingleLine(raw: string): void {
    if (raw.includes('\n')) {
      throw new PolicyEditError('invalid-argument', `A line of ${this.name} cannot contain a line break`);
    }
  }

  private checkIndex(index: number, max: number): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw new PolicyEditError(
        'invalid-argument',
        `Line index ${index} is out of range for ${this.name} (0-${max})`
      );
    }
  }
}
