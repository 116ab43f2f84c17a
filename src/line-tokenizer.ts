/**
 * Line Tokenizer - Classifies raw policy lines and splits them into tokens
 */

import { Token } from './types';

export type ClassifiedLine =
  | { kind: 'blank' }
  | { kind: 'comment'; text: string }
  | { kind: 'directive'; tokens: Token[] }
  | { kind: 'rule'; tokens: Token[] };

export class LineTokenizer {
  /**
   * Classify one raw line. Never fails: malformed token counts are
   * reported later by the parser.
   */
  classify(raw: string): ClassifiedLine {
    const trimmed = raw.trim();

    if (trimmed === '') {
      return { kind: 'blank' };
    }

    if (trimmed.startsWith('#')) {
      return { kind: 'comment', text: trimmed.substring(1).trim() };
    }

    const tokens = this.tokenize(raw);

    // Directives start with '!' (e.g. !include include/admin-local-rwx)
    if (trimmed.startsWith('!')) {
      return { kind: 'directive', tokens };
    }

    return { kind: 'rule', tokens };
  }

  /**
   * Split on runs of whitespace, keeping each token's 1-indexed column
   */
  tokenize(raw: string): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let start = 0;

    for (let i = 0; i < raw.length; i++) {
      const char = raw[i];

      if (this.isWhitespace(char)) {
        if (current.length > 0) {
          tokens.push({ value: current, column: start + 1 });
          current = '';
        }
        continue;
      }

      if (current.length === 0) {
        start = i;
      }
      current += char;
    }

    if (current.length > 0) {
      tokens.push({ value: current, column: start + 1 });
    }

    return tokens;
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\r' || char === '\v' || char === '\f';
  }
}
