/**
 * Unit tests for EditorSession
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { EditorSession } from '../../src/editor-session';
import { FilesystemPolicyStore, PolicyStore } from '../../src/policy-store';
import { AuditLogger } from '../../src/audit-logger';
import { PolicyEditError, PolicyIOError, PolicyValidationError } from '../../src/errors';
import { loadConfig } from '../../src/config';
import { ActionType, EvaluationRequest, RuleField, StoredPolicy, StoreToken } from '../../src/types';

/**
 * Store whose writes always fail, for exercising the failed-save path
 */
class FailingStore implements PolicyStore {
  constructor(private content: string) {}

  list(): string[] {
    return ['30-user'];
  }

  exists(name: string): boolean {
    return name === '30-user';
  }

  get(): StoredPolicy {
    return { content: this.content, token: 'test-token' };
  }

  replace(name: string, _content: string, _token: StoreToken): StoreToken {
    throw new PolicyIOError('io-error', name, `Cannot write ${name}: disk full`);
  }

  nameForPath(): string | undefined {
    return undefined;
  }

  isIncludeDirectory(): boolean {
    return false;
  }
}

const gpgRequest: EvaluationRequest = {
  service: 'qubes.Gpg',
  argument: '',
  source: { name: 'work' },
  destination: { kind: 'qube', qube: { name: 'vault' } }
};

describe('EditorSession', () => {
  let tempDir: string;
  let policyPath: string;
  let logPath: string;
  let store: FilesystemPolicyStore;
  let logger: AuditLogger;
  let session: EditorSession;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpc-policy-session-test-'));
    policyPath = path.join(tempDir, '30-user.policy');
    logPath = path.join(tempDir, 'logs', 'audit.log');
    fs.writeFileSync(policyPath, '# user rules\nqubes.Gpg  +  work  vault  deny\n');
    store = new FilesystemPolicyStore({ dir: tempDir });
    logger = new AuditLogger(logPath);
    session = new EditorSession(store, { auditLogger: logger });
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('open() / create() / close()', () => {
    it('should load a stored file', () => {
      const file = session.open('30-user');
      expect(file.rawLines).toEqual(['# user rules', 'qubes.Gpg  +  work  vault  deny']);
      expect(session.files()).toEqual(['30-user']);
      expect(session.isModified('30-user')).toBe(false);
    });

    it('should create a new empty file', () => {
      expect(session.create('40-new').lines).toEqual([]);
      expect(() => session.create('30-user')).toThrow(PolicyIOError);
      expect(() => session.create('bad name')).toThrow(PolicyEditError);
    });

    it('should refuse to reopen a file with different include settings', () => {
      const file = session.open('30-user');

      expect(session.open('30-user', { allowIncludes: true })).toBe(file);
      expect(() => session.open('30-user', { allowIncludes: false }))
        .toThrow('Policy file 30-user is already open with allowIncludes=true');
    });

    it('should forget closed files', () => {
      session.open('30-user');
      session.close('30-user');
      expect(session.files()).toEqual([]);
      expect(() => session.file('30-user')).toThrow('Policy file 30-user is not open');
    });
  });

  describe('editing', () => {
    beforeEach(() => {
      session.open('30-user');
    });

    it('should insert rules and return the new diagnostics', () => {
      const diagnostics = session.insertRule('30-user', 1, ['qubes.Foo', '*', '@dispvm', 'work', 'allow']);

      expect(diagnostics.map(d => [d.line, d.kind])).toEqual([[2, 'DispVMIllegalAsSource']]);
      expect(session.canSave('30-user')).toBe(false);
      expect(session.file('30-user').rawLines[1]).toBe('qubes.Foo * @dispvm work allow');
    });

    it('should move and delete lines', () => {
      session.insertRule('30-user', 2, ['qubes.Gpg', '+', 'work', 'vault', 'allow']);
      session.moveRule('30-user', 2, 1);
      expect(session.preview(gpgRequest)?.action.type).toBe(ActionType.ALLOW);

      expect(session.deleteLine('30-user', 1)).toEqual([]);
      expect(session.preview(gpgRequest)?.action.type).toBe(ActionType.DENY);
    });

    it('should edit one field and keep the rest of the line', () => {
      session.editField('30-user', 1, RuleField.DESTINATION, '@dispvm:fedora-dvm');
      expect(session.file('30-user').rawLines[1]).toBe('qubes.Gpg  +  work  @dispvm:fedora-dvm  deny');

      session.editField('30-user', 1, RuleField.ACTION, 'allow');
      session.editField('30-user', 1, RuleField.PARAMETERS, 'target=vault');
      expect(session.file('30-user').rawLines[1]).toBe('qubes.Gpg  +  work  @dispvm:fedora-dvm  allow target=vault');

      session.editField('30-user', 1, RuleField.PARAMETERS, '');
      expect(session.file('30-user').rawLines[1]).toBe('qubes.Gpg  +  work  @dispvm:fedora-dvm  allow');
    });

    it('should report the diagnostics of an invalid field value', () => {
      const diagnostics = session.editField('30-user', 1, RuleField.SOURCE, '@dispvm');
      expect(diagnostics.map(d => d.kind)).toEqual(['DispVMIllegalAsSource']);
    });

    it('should refuse to edit fields of non-rule lines', () => {
      expect(() => session.editField('30-user', 0, RuleField.SERVICE, 'qubes.Gpg')).toThrow(PolicyEditError);
      expect(() => session.editField('30-user', 5, RuleField.SERVICE, 'qubes.Gpg')).toThrow(PolicyEditError);
      expect(() => session.editField('30-user', 1, RuleField.SERVICE, 'two tokens')).toThrow(PolicyEditError);
    });

    it('should refuse values that would split a rule over several lines', () => {
      expect(() => session.insertRule('30-user', 2, ['qubes.A', '*', 'work', 'vault', 'allow', 'x=1\nqubes.B=2']))
        .toThrow(PolicyEditError);
      expect(() => session.replaceLine('30-user', 1, 'qubes.Gpg + work vault allow note=a\ngarbage=1'))
        .toThrow(PolicyEditError);
      expect(() => session.editField('30-user', 1, RuleField.PARAMETERS, 'note=a\ngarbage=1'))
        .toThrow(PolicyEditError);
      expect(() => session.editField('30-user', 1, RuleField.DESTINATION, 'vault\nqubes.B'))
        .toThrow(PolicyEditError);

      expect(session.file('30-user').serialize()).toBe('# user rules\nqubes.Gpg  +  work  vault  deny\n');
      expect(session.isModified('30-user')).toBe(false);
    });

    it('should track modification and reset to the stored text', () => {
      session.setText('30-user', 'qubes.Gpg + work vault allow\n');
      expect(session.isModified('30-user')).toBe(true);

      expect(session.reset('30-user')).toEqual([]);
      expect(session.isModified('30-user')).toBe(false);
      expect(session.file('30-user').serialize()).toBe('# user rules\nqubes.Gpg  +  work  vault  deny\n');
    });
  });

  describe('save()', () => {
    it('should write the file and log the save', () => {
      session.open('30-user');
      session.insertRule('30-user', 2, ['qubes.Filecopy', '*', 'work', '@default', 'ask', 'default_target=vault']);
      session.save('30-user');

      expect(fs.readFileSync(policyPath, 'utf-8')).toBe(
        '# user rules\nqubes.Gpg  +  work  vault  deny\nqubes.Filecopy * work @default ask default_target=vault\n'
      );
      expect(session.isModified('30-user')).toBe(false);
      expect(logger.read()).toMatchObject([{ file: '30-user', outcome: 'saved', errors: 0, warnings: 0 }]);
    });

    it('should refuse to save a file with errors and leave the stored file alone', () => {
      session.open('30-user');
      session.insertRule('30-user', 0, ['qubes.Bar', '*', 'work', 'vault', 'deny', 'param=1']);

      expect(() => session.save('30-user')).toThrow(PolicyValidationError);
      try {
        session.save('30-user');
      } catch (error) {
        expect(error).toBeInstanceOf(PolicyValidationError);
        if (error instanceof PolicyValidationError) {
          expect(error.message).toBe('Cannot save 30-user: 1 error(s) found');
          expect(error.diagnostics.map(d => d.kind)).toEqual(['UnexpectedParametersForDeny']);
        }
      }

      expect(fs.readFileSync(policyPath, 'utf-8')).toBe('# user rules\nqubes.Gpg  +  work  vault  deny\n');
      expect(logger.read().map(e => e.outcome)).toEqual(['rejected', 'rejected']);
    });

    it('should save files that only have warnings', () => {
      session.open('30-user');
      session.insertRule('30-user', 2, ['qubes.Gpg', '+', 'work', 'vault', 'deny']);
      session.save('30-user');

      expect(logger.read()).toMatchObject([{ outcome: 'saved', errors: 0, warnings: 1 }]);
    });

    it('should refuse to overwrite a file changed by someone else', () => {
      session.open('30-user');
      session.setText('30-user', 'qubes.Gpg + work vault allow\n');
      fs.writeFileSync(policyPath, 'qubes.Gpg + work vault ask\n');

      expect(() => session.save('30-user')).toThrow(PolicyIOError);
      expect(fs.readFileSync(policyPath, 'utf-8')).toBe('qubes.Gpg + work vault ask\n');
      expect(session.isModified('30-user')).toBe(true);
      expect(logger.read()).toMatchObject([{
        outcome: 'failed',
        reason: 'Policy file 30-user was modified since it was loaded'
      }]);
    });

    it('should save new files and refuse if the file appeared meanwhile', () => {
      session.create('40-new');
      session.insertRule('40-new', 0, ['qubes.Gpg', '+', 'work', 'vault', 'allow']);
      session.save('40-new');
      expect(fs.readFileSync(path.join(tempDir, '40-new.policy'), 'utf-8')).toBe('qubes.Gpg + work vault allow\n');

      session.create('50-new');
      fs.writeFileSync(path.join(tempDir, '50-new.policy'), '');
      expect(() => session.save('50-new')).toThrow('Policy file 50-new already exists');
    });

    it('should log a failed save when the stored file cannot be read', () => {
      session.open('30-user');
      session.setText('30-user', 'qubes.Gpg + work vault allow\n');
      fs.rmSync(policyPath);
      fs.mkdirSync(policyPath);

      expect(() => session.save('30-user')).toThrow(PolicyIOError);
      expect(logger.read()).toMatchObject([{ file: '30-user', outcome: 'failed' }]);
      expect(logger.read()[0].reason).toMatch(/^Cannot read 30-user: /);
    });

    it('should keep the edits after a failed write so the save can be retried', () => {
      const failing = new EditorSession(new FailingStore('qubes.Gpg + work vault deny\n'));
      failing.open('30-user');
      failing.setText('30-user', 'qubes.Gpg + work vault allow\n');

      expect(() => failing.save('30-user')).toThrow('Cannot write 30-user: disk full');
      expect(failing.file('30-user').serialize()).toBe('qubes.Gpg + work vault allow\n');
      expect(failing.isModified('30-user')).toBe(true);
    });
  });

  describe('preview()', () => {
    it('should evaluate unsaved edits of open files and includes', () => {
      fs.mkdirSync(path.join(tempDir, 'include'));
      fs.writeFileSync(path.join(tempDir, 'include', 'gpg'), 'qubes.Gpg + work vault ask\n');

      session.open('30-user');
      session.setText('30-user', '!include include/gpg\nqubes.Gpg + work vault deny\n');
      expect(session.preview(gpgRequest)).toMatchObject({ file: 'include/gpg', action: { type: ActionType.ASK } });

      session.open('include/gpg');
      session.setText('include/gpg', 'qubes.Gpg + work vault allow\n');
      expect(session.preview(gpgRequest)).toMatchObject({ file: 'include/gpg', action: { type: ActionType.ALLOW } });
    });

    it('should return undefined when no rule matches', () => {
      session.open('30-user');
      expect(session.preview({ ...gpgRequest, service: 'qubes.Filecopy' })).toBeUndefined();
    });
  });

  describe('fromConfig()', () => {
    it('should build a session over the configured directory', () => {
      const config = loadConfig({
        RPC_POLICY_DIR: tempDir,
        RPC_POLICY_AUDIT_LOG: logPath
      });
      const configured = EditorSession.fromConfig(config);

      configured.open('30-user');
      configured.save('30-user');
      expect(logger.read().map(e => e.outcome)).toEqual(['saved']);
    });

    it('should not log when auditing is disabled', () => {
      const config = loadConfig({ RPC_POLICY_DIR: tempDir, RPC_POLICY_AUDIT_LOG: logPath, RPC_POLICY_AUDIT: '0' });
      const configured = EditorSession.fromConfig(config);

      configured.open('30-user');
      configured.save('30-user');
      expect(fs.existsSync(logPath)).toBe(false);
    });
  });
});
