/**
 * Error hierarchy for the policy editor
 *
 * Parse and validation problems are never thrown: they are returned as
 * Diagnostic values. These classes cover the operations that cannot
 * produce a result at all: refused saves, storage failures and misuse of
 * the editor API.
 */

import { Diagnostic } from './types';
import { isError } from './diagnostics';

export type PolicyErrorCode =
  | 'validation-failed'
  | 'io-error'
  | 'not-found'
  | 'conflict'
  | 'already-exists'
  | 'invalid-argument';

export class PolicyError extends Error {
  override name = 'PolicyError';

  constructor(public readonly code: PolicyErrorCode, message: string) {
    super(message);

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Save refused because the file still contains errors
 */
export class PolicyValidationError extends PolicyError {
  override name = 'PolicyValidationError';

  constructor(public readonly file: string, public readonly diagnostics: Diagnostic[]) {
    super('validation-failed', `Cannot save ${file}: ${diagnostics.filter(isError).length} error(s) found`);
  }
}

/**
 * Loading or writing a policy file failed. The file on disk is left as it
 * was before the failed write.
 */
export class PolicyIOError extends PolicyError {
  override name = 'PolicyIOError';

  constructor(
    code: Extract<PolicyErrorCode, 'io-error' | 'not-found' | 'conflict' | 'already-exists'>,
    public readonly file: string,
    message: string,
    public readonly underlying?: Error
  ) {
    super(code, message);
  }
}

/**
 * Invalid use of the editor API: unknown file, bad index, bad name
 */
export class PolicyEditError extends PolicyError {
  override name = 'PolicyEditError';

  constructor(
    code: Extract<PolicyErrorCode, 'invalid-argument' | 'not-found'>,
    message: string
  ) {
    super(code, message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
