/**
 * Editor Session - Owns the policy files open for editing
 *
 * Each open file is an immutable PolicyFile; every operation swaps in a new
 * one, so a failed operation leaves the previous state in place. Saving goes
 * through the store with the token handed out at load time.
 */

import {
  Diagnostic,
  EvaluationRequest,
  LineKind,
  ParseOptions,
  PolicyEditorConfig,
  RuleField,
  RuleMatch,
  StoreToken,
  TOKEN_NEW
} from './types';
import { PolicyFile } from './policy-file';
import { FilesystemPolicyStore, PolicyStore, StoreIncludeResolver, isIncludeName, isValidPolicyName } from './policy-store';
import { PolicyEvaluator } from './policy-evaluator';
import { LineTokenizer } from './line-tokenizer';
import { DEFAULT_PARSE_OPTIONS } from './rule-parser';
import { AuditLogger } from './audit-logger';
import { PolicyEditError, PolicyIOError, PolicyValidationError, describeError } from './errors';

interface OpenFile {
  file: PolicyFile;
  token: StoreToken;
  /** Text as last loaded or saved */
  savedText: string;
}

export interface EditorSessionOptions {
  auditLogger?: AuditLogger;
  parseOptions?: ParseOptions;
}

export interface OpenOptions {
  allowIncludes?: boolean;
}

const POSITIONAL_INDEX: Record<Exclude<RuleField, RuleField.PARAMETERS>, number> = {
  [RuleField.SERVICE]: 0,
  [RuleField.ARGUMENT]: 1,
  [RuleField.SOURCE]: 2,
  [RuleField.DESTINATION]: 3,
  [RuleField.ACTION]: 4
};

export class EditorSession {
  private store: PolicyStore;
  private auditLogger?: AuditLogger;
  private parseOptions: ParseOptions;
  private tokenizer: LineTokenizer;
  private evaluator: PolicyEvaluator;
  private openFiles: Map<string, OpenFile>;

  constructor(store: PolicyStore, options: EditorSessionOptions = {}) {
    this.store = store;
    this.auditLogger = options.auditLogger;
    this.parseOptions = options.parseOptions ?? DEFAULT_PARSE_OPTIONS;
    this.tokenizer = new LineTokenizer();
    this.evaluator = new PolicyEvaluator();
    this.openFiles = new Map();
  }

  /**
   * Session over the configured policy directories, auditing saves unless
   * the audit log is disabled
   */
  static fromConfig(config: PolicyEditorConfig): EditorSession {
    const store = new FilesystemPolicyStore({
      dir: config.policy.dir,
      includeDir: config.policy.includeDir
    });
    const auditLogger = config.audit.enabled
      ? new AuditLogger(config.audit.path, config.audit.maxSize)
      : undefined;
    return new EditorSession(store, { auditLogger });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Load a stored file into the session. Opening an already open file
   * returns it unchanged; asking for different options then is an error.
   */
  open(name: string, options: OpenOptions = {}): PolicyFile {
    const existing = this.openFiles.get(name);
    if (existing) {
      const { allowIncludes } = existing.file.options;
      if (options.allowIncludes !== undefined && options.allowIncludes !== allowIncludes) {
        throw new PolicyEditError(
          'invalid-argument',
          `Policy file ${name} is already open with allowIncludes=${allowIncludes}`
        );
      }
      return existing.file;
    }

    const stored = this.store.get(name);
    const file = PolicyFile.fromText(name, stored.content, this.resolveOptions(options));
    this.openFiles.set(name, { file, token: stored.token, savedText: stored.content });
    return file;
  }

  /**
   * Start a new, empty file. It is written with the `new` token, so saving
   * fails if the file appears in the store in the meantime.
   */
  create(name: string, options: OpenOptions = {}): PolicyFile {
    if (!isValidPolicyName(name)) {
      throw new PolicyEditError('invalid-argument', `Invalid policy file name: ${name}`);
    }
    if (this.openFiles.has(name) || this.store.exists(name)) {
      throw new PolicyIOError('already-exists', name, `Policy file ${name} already exists`);
    }

    const file = PolicyFile.empty(name, this.resolveOptions(options));
    this.openFiles.set(name, { file, token: TOKEN_NEW, savedText: '' });
    return file;
  }

  close(name: string): void {
    this.entry(name);
    this.openFiles.delete(name);
  }

  /**
   * Drop unsaved changes: reload from the store, or empty a file that was
   * never saved
   */
  reset(name: string): Diagnostic[] {
    const current = this.entry(name);
    if (current.token === TOKEN_NEW) {
      return this.update(name, PolicyFile.empty(name, current.file.options));
    }

    const stored = this.store.get(name);
    const file = PolicyFile.fromText(name, stored.content, current.file.options);
    this.openFiles.set(name, { file, token: stored.token, savedText: stored.content });
    return file.validate();
  }

  files(): string[] {
    return [...this.openFiles.keys()].sort();
  }

  file(name: string): PolicyFile {
    return this.entry(name).file;
  }

  isModified(name: string): boolean {
    const current = this.entry(name);
    return current.file.serialize() !== current.savedText;
  }

  // ==========================================================================
  // Editing (each operation returns the file's new diagnostics)
  // ==========================================================================

  setText(name: string, text: string): Diagnostic[] {
    return this.update(name, this.file(name).withText(text));
  }

  insertRule(name: string, index: number, tokens: string[]): Diagnostic[] {
    if (tokens.length === 0) {
      throw new PolicyEditError('invalid-argument', 'A rule needs at least one token');
    }
    return this.update(name, this.file(name).insertLine(index, tokens.join(' ')));
  }

  replaceLine(name: string, index: number, raw: string): Diagnostic[] {
    return this.update(name, this.file(name).replaceLine(index, raw));
  }

  moveRule(name: string, from: number, to: number): Diagnostic[] {
    return this.update(name, this.file(name).moveLine(from, to));
  }

  deleteLine(name: string, index: number): Diagnostic[] {
    return this.update(name, this.file(name).deleteLine(index));
  }

  /**
   * Replace one field of the rule on line `index`, leaving the rest of the
   * line's text untouched. PARAMETERS replaces everything after the action;
   * an empty value removes the parameters.
   */
  editField(name: string, index: number, field: RuleField, value: string): Diagnostic[] {
    const file = this.file(name);
    const line = file.lines[index];
    if (line === undefined) {
      throw new PolicyEditError(
        'invalid-argument',
        `Line index ${index} is out of range for ${name}`
      );
    }
    if (line.kind !== LineKind.PARSED) {
      throw new PolicyEditError('invalid-argument', `Line ${line.lineNumber} of ${name} is not a rule`);
    }

    const tokens = this.tokenizer.tokenize(line.raw);
    const action = tokens[POSITIONAL_INDEX[RuleField.ACTION]];
    let raw: string;

    if (field === RuleField.PARAMETERS) {
      const actionEnd = action.column - 1 + action.value.length;
      const params = value.trim();
      raw = line.raw.substring(0, actionEnd) + (params === '' ? '' : ' ' + params);
    } else {
      if (value === '' || this.tokenizer.tokenize(value).length !== 1 || value.trim() !== value) {
        throw new PolicyEditError('invalid-argument', `Invalid value for ${field}: "${value}"`);
      }
      const target = tokens[POSITIONAL_INDEX[field]];
      const start = target.column - 1;
      raw = line.raw.substring(0, start) + value + line.raw.substring(start + target.value.length);
    }

    return this.update(name, file.replaceLine(index, raw));
  }

  diagnostics(name: string): Diagnostic[] {
    return this.file(name).validate();
  }

  canSave(name: string): boolean {
    return this.file(name).canSave();
  }

  // ==========================================================================
  // Saving
  // ==========================================================================

  /**
   * Write the file through the store. Refused while it has errors; a
   * storage failure keeps the session state so the save can be retried.
   */
  save(name: string): void {
    const current = this.entry(name);
    const diagnostics = current.file.validate();

    if (!current.file.canSave()) {
      this.auditLogger?.record(name, 'rejected', diagnostics);
      throw new PolicyValidationError(name, diagnostics);
    }

    const content = current.file.serialize();
    let token: StoreToken;
    try {
      token = this.store.replace(name, content, current.token);
    } catch (error) {
      this.auditLogger?.record(name, 'failed', diagnostics, describeError(error));
      throw error;
    }

    this.openFiles.set(name, { file: current.file, token, savedText: content });
    this.auditLogger?.record(name, 'saved', diagnostics);
  }

  // ==========================================================================
  // Preview
  // ==========================================================================

  /**
   * Evaluate a request against the open main files in name order. Includes
   * resolve to open files first, then to the store, so unsaved edits are
   * part of the preview.
   */
  preview(request: EvaluationRequest): RuleMatch | undefined {
    const overlay = new Map<string, PolicyFile>();
    for (const [name, open] of this.openFiles) {
      overlay.set(name, open.file);
    }

    const mainFiles = this.files()
      .filter(name => !isIncludeName(name))
      .map(name => this.file(name));

    const resolver = new StoreIncludeResolver(this.store, overlay, this.parseOptions);
    return this.evaluator.explain(mainFiles, request, resolver);
  }

  private update(name: string, file: PolicyFile): Diagnostic[] {
    const current = this.entry(name);
    this.openFiles.set(name, { ...current, file });
    return file.validate();
  }

  private entry(name: string): OpenFile {
    const open = this.openFiles.get(name);
    if (!open) {
      throw new PolicyEditError('not-found', `Policy file ${name} is not open`);
    }
    return open;
  }

  private resolveOptions(options: OpenOptions): ParseOptions {
    return { allowIncludes: options.allowIncludes ?? this.parseOptions.allowIncludes };
  }
}
