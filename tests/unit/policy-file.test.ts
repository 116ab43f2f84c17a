/**
 * Unit tests for PolicyFile
 */

import { describe, it, expect } from 'vitest';
import { PolicyFile } from '../../src/policy-file';
import { PolicyEditError } from '../../src/errors';
import { LineKind } from '../../src/types';

const SAMPLE = [
  '# file copy rules',
  'qubes.Filecopy  *  work  @default  ask default_target=vault',
  '',
  'qubes.Filecopy  *  @anyvm  @anyvm  deny',
  ''
].join('\n');

describe('PolicyFile', () => {
  describe('fromText() / serialize()', () => {
    it('should serialize loaded text unchanged', () => {
      const file = PolicyFile.fromText('30-user', SAMPLE);
      expect(file.serialize()).toBe(SAMPLE);
      expect(file.lines).toHaveLength(4);
    });

    it('should keep a missing trailing newline', () => {
      const text = 'qubes.Gpg * work vault deny';
      const file = PolicyFile.fromText('30-user', text);
      expect(file.trailingNewline).toBe(false);
      expect(file.serialize()).toBe(text);
    });

    it('should keep malformed lines byte for byte', () => {
      const text = 'qubes.Foo   *  @dispvm   work allow  \n';
      const file = PolicyFile.fromText('30-user', text);
      expect(file.lines[0].kind).toBe(LineKind.MALFORMED);
      expect(file.serialize()).toBe(text);
    });

    it('should treat empty text as a file without lines', () => {
      const file = PolicyFile.empty('new');
      expect(file.lines).toEqual([]);
      expect(file.serialize()).toBe('');
      expect(file.insertLine(0, 'qubes.Gpg * work vault deny').serialize()).toBe('qubes.Gpg * work vault deny\n');
    });
  });

  describe('validate()', () => {
    it('should return no diagnostics for a valid file', () => {
      expect(PolicyFile.fromText('30-user', SAMPLE).validate()).toEqual([]);
    });

    it('should collect diagnostics from every malformed line', () => {
      const file = PolicyFile.fromText('30-user', [
        'qubes.Foo * @dispvm work allow',
        'qubes.Bar * work vault deny param=1'
      ].join('\n'));

      expect(file.validate().map(d => [d.line, d.kind])).toEqual([
        [1, 'DispVMIllegalAsSource'],
        [2, 'UnexpectedParametersForDeny']
      ]);
    });

    it('should warn about duplicate rules on the later line', () => {
      const file = PolicyFile.fromText('30-user', [
        'qubes.Gpg * work vault allow target=vault notify=no',
        'qubes.Gpg  *  work  vault  allow notify=no target=vault'
      ].join('\n'));

      expect(file.validate()).toEqual([{
        line: 2,
        column: 1,
        endColumn: 56,
        message: 'Rule duplicates line 1 and can never match',
        kind: 'RedundantRule',
        category: 'structural',
        severity: 'warning'
      }]);
      expect(file.errors()).toEqual([]);
      expect(file.canSave()).toBe(true);
    });

    it('should return the same diagnostics on every call', () => {
      const file = PolicyFile.fromText('30-user', 'qubes.Foo * @dispvm work allow\nbad\n');
      expect(file.validate()).toEqual(file.validate());
    });
  });

  describe('canSave()', () => {
    it('should refuse files with any malformed line', () => {
      expect(PolicyFile.fromText('30-user', SAMPLE).canSave()).toBe(true);
      expect(PolicyFile.fromText('30-user', SAMPLE + 'qubes.Foo * work\n').canSave()).toBe(false);
    });

    it('should refuse includes in files that do not allow them', () => {
      const file = PolicyFile.fromText('30-user', '!include include/admin\n', { allowIncludes: false });
      expect(file.canSave()).toBe(false);
      expect(file.errors().map(d => d.kind)).toEqual(['IncludeNotAllowed']);
    });
  });

  describe('mutations', () => {
    const base = PolicyFile.fromText('30-user', 'a.A * work vault deny\nb.B * work vault deny\nc.C * work vault deny\n');

    it('should insert a line and renumber the following lines', () => {
      const file = base.insertLine(1, '# inserted');
      expect(file.rawLines).toEqual(['a.A * work vault deny', '# inserted', 'b.B * work vault deny', 'c.C * work vault deny']);
      expect(file.rules.map(r => r.lineNumber)).toEqual([1, 3, 4]);
      expect(base.lines).toHaveLength(3);
    });

    it('should move a line', () => {
      expect(base.moveLine(2, 0).rawLines).toEqual(['c.C * work vault deny', 'a.A * work vault deny', 'b.B * work vault deny']);
      expect(base.moveLine(0, 2).rawLines).toEqual(['b.B * work vault deny', 'c.C * work vault deny', 'a.A * work vault deny']);
    });

    it('should replace and delete lines', () => {
      expect(base.replaceLine(1, 'b.B * work vault allow').rawLines[1]).toBe('b.B * work vault allow');
      expect(base.deleteLine(0).serialize()).toBe('b.B * work vault deny\nc.C * work vault deny\n');
    });

    it('should reject lines that contain a line break', () => {
      expect(() => base.insertLine(0, 'a.A * work vault allow x=1\nqubes.B=2'))
        .toThrow('A line of 30-user cannot contain a line break');
      expect(() => base.replaceLine(1, 'b.B * work vault allow note=a\ngarbage=1')).toThrow(PolicyEditError);
      expect(base.serialize()).toBe('a.A * work vault deny\nb.B * work vault deny\nc.C * work vault deny\n');
    });

    it('should reject out-of-range indices', () => {
      expect(() => base.deleteLine(3)).toThrow(PolicyEditError);
      expect(() => base.insertLine(-1, 'x')).toThrow('Line index -1 is out of range for 30-user (0-3)');
      expect(() => base.moveLine(0, 1.5)).toThrow(PolicyEditError);
    });
  });
});
