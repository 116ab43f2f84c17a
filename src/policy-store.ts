/**
 * Policy Store - Reads and writes policy files in the policy directory
 *
 * Main policy files live in the policy directory as NAME.policy. Include
 * files live in the include directory and are addressed as include/NAME.
 * Every read hands out a token (a hash of the content) that must be
 * presented again on replace, so a file changed by someone else since it
 * was loaded is never silently overwritten.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { ParseOptions, StoredPolicy, StoreToken, TOKEN_ANY, TOKEN_NEW } from './types';
import { PolicyEditError, PolicyIOError, describeError } from './errors';
import { PolicyFile } from './policy-file';
import { IncludeResolver } from './policy-evaluator';
import { DEFAULT_PARSE_OPTIONS } from './rule-parser';
import { atomicWriteFile } from './atomic-write';

export const INCLUDE_PREFIX = 'include/';
export const POLICY_EXTENSION = '.policy';

const POLICY_NAME = /^[\w-]+$/;

export function isValidPolicyName(name: string): boolean {
  const base = name.startsWith(INCLUDE_PREFIX) ? name.substring(INCLUDE_PREFIX.length) : name;
  return POLICY_NAME.test(base);
}

export function isIncludeName(name: string): boolean {
  return name.startsWith(INCLUDE_PREFIX);
}

export function contentToken(content: string): StoreToken {
  return crypto.createHash('sha256').update(content, 'utf-8').digest('hex');
}

export interface PolicyStore {
  /** Main files in name order, then include files as include/NAME */
  list(): string[];
  exists(name: string): boolean;
  get(name: string): StoredPolicy;
  /**
   * Replace a file's content. `token` is the one handed out by get(),
   * TOKEN_NEW for a file that must not exist yet, or TOKEN_ANY to skip the
   * check. Returns the token of the new content.
   */
  replace(name: string, content: string, token: StoreToken): StoreToken;
  /** Policy name addressed by the path of an include line, if any */
  nameForPath(includePath: string): string | undefined;
  /** Whether an !include-dir path names the include directory */
  isIncludeDirectory(includePath: string): boolean;
}

export interface FilesystemPolicyStoreOptions {
  dir: string;
  includeDir?: string;
}

export class FilesystemPolicyStore implements PolicyStore {
  readonly dir: string;
  readonly includeDir: string;

  constructor(options: FilesystemPolicyStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.includeDir = path.resolve(options.includeDir ?? path.join(options.dir, 'include'));
  }

  list(): string[] {
    const main = this.listDirectory(this.dir)
      .filter(entry => entry.endsWith(POLICY_EXTENSION))
      .map(entry => entry.slice(0, -POLICY_EXTENSION.length))
      .filter(name => POLICY_NAME.test(name));

    const included = this.listDirectory(this.includeDir)
      .filter(entry => POLICY_NAME.test(entry))
      .map(entry => INCLUDE_PREFIX + entry);

    return [...main.sort(), ...included.sort()];
  }

  exists(name: string): boolean {
    return fs.existsSync(this.pathFor(name));
  }

  get(name: string): StoredPolicy {
    const filePath = this.pathFor(name);
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      return { content, token: contentToken(content) };
    } catch (error) {
      if (this.isNotFound(error)) {
        throw new PolicyIOError('not-found', name, `Policy file ${name} not found`);
      }
      throw new PolicyIOError('io-error', name, `Cannot read ${name}: ${describeError(error)}`, this.asError(error));
    }
  }

  replace(name: string, content: string, token: StoreToken): StoreToken {
    const filePath = this.pathFor(name);
    const exists = fs.existsSync(filePath);

    if (token === TOKEN_NEW && exists) {
      throw new PolicyIOError('already-exists', name, `Policy file ${name} already exists`);
    }

    if (token !== TOKEN_NEW && token !== TOKEN_ANY) {
      const current = exists ? this.get(name).token : undefined;
      if (current !== token) {
        throw new PolicyIOError('conflict', name, `Policy file ${name} was modified since it was loaded`);
      }
    }

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      atomicWriteFile(filePath, content);
    } catch (error) {
      throw new PolicyIOError('io-error', name, `Cannot write ${name}: ${describeError(error)}`, this.asError(error));
    }

    return contentToken(content);
  }

  /**
   * Map a path from an include line to a policy name, or undefined when
   * it points outside the policy directories
   */
  nameForPath(includePath: string): string | undefined {
    const absolute = path.resolve(this.dir, includePath);

    const inInclude = path.relative(this.includeDir, absolute);
    if (!inInclude.startsWith('..') && !path.isAbsolute(inInclude) && POLICY_NAME.test(inInclude)) {
      return INCLUDE_PREFIX + inInclude;
    }

    const inMain = path.relative(this.dir, absolute);
    if (inMain.endsWith(POLICY_EXTENSION)) {
      const name = inMain.slice(0, -POLICY_EXTENSION.length);
      if (POLICY_NAME.test(name)) {
        return name;
      }
    }

    return undefined;
  }

  isIncludeDirectory(includePath: string): boolean {
    return path.resolve(this.dir, includePath) === this.includeDir;
  }

  private pathFor(name: string): string {
    if (!isValidPolicyName(name)) {
      throw new PolicyEditError('invalid-argument', `Invalid policy file name: ${name}`);
    }
    if (isIncludeName(name)) {
      return path.join(this.includeDir, name.substring(INCLUDE_PREFIX.length));
    }
    return path.join(this.dir, name + POLICY_EXTENSION);
  }

  private listDirectory(dir: string): string[] {
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs.readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isFile())
      .map(entry => entry.name);
  }

  private isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
  }

  private asError(error: unknown): Error | undefined {
    return error instanceof Error ? error : undefined;
  }
}

/**
 * Resolves include lines against a policy store. Files in `overlay`
 * (e.g. ones open in an editor) win over their stored versions.
 */
export class StoreIncludeResolver implements IncludeResolver {
  constructor(
    private store: PolicyStore,
    private overlay: ReadonlyMap<string, PolicyFile> = new Map(),
    private options: ParseOptions = DEFAULT_PARSE_OPTIONS
  ) {}

  resolveFile(includePath: string): PolicyFile | undefined {
    const name = this.store.nameForPath(includePath);
    return name === undefined ? undefined : this.load(name);
  }

  resolveDirectory(includePath: string): PolicyFile[] {
    if (!this.store.isIncludeDirectory(includePath)) {
      return [];
    }

    const files: PolicyFile[] = [];
    for (const name of this.store.list().filter(isIncludeName)) {
      const file = this.load(name);
      if (file) {
        files.push(file);
      }
    }
    return files;
  }

  private load(name: string): PolicyFile | undefined {
    const open = this.overlay.get(name);
    if (open) {
      return open;
    }
    if (!this.store.exists(name)) {
      return undefined;
    }
    return PolicyFile.fromText(name, this.store.get(name).content, this.options);
  }
}
