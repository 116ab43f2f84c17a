/**
 * Property-Based Tests for PolicyFile
 *
 * Round-trip, validation idempotence and save-gate soundness
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { PolicyFile } from '../../src/policy-file';
import { LineKind } from '../../src/types';
import { validRuleLine } from './generators';

const lineGenerator = fc.oneof(
  validRuleLine,
  fc.constantFrom('', '   ', '# comment', '#', '!include include/admin'),
  fc.constantFrom(
    'qubes.Foo * @dispvm work allow',
    'qubes.Bar * work vault deny param=1',
    'garbage',
    '!include',
    'qubes.Gpg * work vault allow target=@tag:x'
  )
);

const fileGenerator = fc.tuple(fc.array(lineGenerator, { maxLength: 20 }), fc.boolean())
  .map(([lines, trailingNewline]) => lines.join('\n') + (trailingNewline && lines.length > 0 ? '\n' : ''));

type Operation =
  | { op: 'insert'; index: number; raw: string }
  | { op: 'replace'; index: number; raw: string }
  | { op: 'delete'; index: number }
  | { op: 'move'; from: number; to: number };

const operationGenerator: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({ op: fc.constant('insert' as const), index: fc.nat(), raw: lineGenerator }),
  fc.record({ op: fc.constant('replace' as const), index: fc.nat(), raw: lineGenerator }),
  fc.record({ op: fc.constant('delete' as const), index: fc.nat() }),
  fc.record({ op: fc.constant('move' as const), from: fc.nat(), to: fc.nat() })
);

function apply(file: PolicyFile, operation: Operation): PolicyFile {
  const length = file.lines.length;
  switch (operation.op) {
    case 'insert':
      return file.insertLine(operation.index % (length + 1), operation.raw);
    case 'replace':
      return length === 0 ? file : file.replaceLine(operation.index % length, operation.raw);
    case 'delete':
      return length === 0 ? file : file.deleteLine(operation.index % length);
    case 'move':
      return length === 0 ? file : file.moveLine(operation.from % length, operation.to % length);
  }
}

describe('PolicyFile properties', () => {
  test('serializing a loaded file reproduces the text byte for byte', () => {
    fc.assert(
      fc.property(fc.oneof(fileGenerator, fc.string()), (text) => {
        expect(PolicyFile.fromText('30-user', text).serialize()).toBe(text);
      }),
      { numRuns: 200 }
    );
  });

  test('validation is a pure function of the content', () => {
    fc.assert(
      fc.property(fileGenerator, (text) => {
        const file = PolicyFile.fromText('30-user', text);
        const reloaded = PolicyFile.fromText('30-user', file.serialize());

        expect(file.validate()).toEqual(file.validate());
        expect(reloaded.validate()).toEqual(file.validate());
      }),
      { numRuns: 100 }
    );
  });

  test('canSave holds exactly when no line is malformed, after any edits', () => {
    fc.assert(
      fc.property(fileGenerator, fc.array(operationGenerator, { maxLength: 10 }), (text, operations) => {
        let file = PolicyFile.fromText('30-user', text);

        for (const operation of operations) {
          file = apply(file, operation);

          const noMalformed = file.lines.every(line => line.kind !== LineKind.MALFORMED);
          expect(file.canSave()).toBe(noMalformed);
          expect(file.errors().length === 0).toBe(noMalformed);
          expect(file.lines.map(line => line.lineNumber)).toEqual(file.lines.map((_, i) => i + 1));
        }
      }),
      { numRuns: 100 }
    );
  });

  test('files made only of valid rules always parse every rule', () => {
    fc.assert(
      fc.property(fc.array(validRuleLine, { minLength: 1, maxLength: 10 }), (lines) => {
        const file = PolicyFile.fromText('30-user', lines.join('\n') + '\n');
        expect(file.rules).toHaveLength(lines.length);
        expect(file.canSave()).toBe(true);
      }),
      { numRuns: 100 }
    );
  });
});
