/**
 * Policy Evaluator - First-match evaluation over an ordered set of files
 *
 * Files are scanned in the order given (policy loaders use lexicographic
 * file name order), lines top to bottom. Include lines are expanded in
 * place. The first matching rule decides; no match means implicit deny.
 */

import {
  Action,
  EvaluationRequest,
  IncludeDirective,
  LineKind,
  RuleMatch
} from './types';
import { PolicyFile } from './policy-file';
import { RuleMatcher } from './rule-matcher';

/**
 * Supplies the files named by include lines. Returning undefined (or an
 * empty list) makes the include contribute no rules.
 */
export interface IncludeResolver {
  resolveFile(path: string): PolicyFile | undefined;
  resolveDirectory(path: string): PolicyFile[];
}

export const NO_INCLUDES: IncludeResolver = {
  resolveFile: () => undefined,
  resolveDirectory: () => []
};

export class PolicyEvaluator {
  private matcher: RuleMatcher;

  constructor() {
    this.matcher = new RuleMatcher();
  }

  /**
   * Return the action of the first matching rule, or undefined when no
   * rule matches
   */
  evaluate(
    files: readonly PolicyFile[],
    request: EvaluationRequest,
    resolver: IncludeResolver = NO_INCLUDES
  ): Action | undefined {
    return this.explain(files, request, resolver)?.action;
  }

  /**
   * Like evaluate(), but also report which rule matched and where
   */
  explain(
    files: readonly PolicyFile[],
    request: EvaluationRequest,
    resolver: IncludeResolver = NO_INCLUDES
  ): RuleMatch | undefined {
    const active = new Set<string>();
    for (const file of files) {
      const match = this.scanFile(file, request, resolver, active);
      if (match) {
        return match;
      }
    }
    return undefined;
  }

  /**
   * `active` holds the files currently being expanded; an include that
   * points back into that chain is skipped instead of recursing forever
   */
  private scanFile(
    file: PolicyFile,
    request: EvaluationRequest,
    resolver: IncludeResolver,
    active: Set<string>
  ): RuleMatch | undefined {
    if (active.has(file.name)) {
      return undefined;
    }
    active.add(file.name);

    try {
      for (const line of file.lines) {
        switch (line.kind) {
          case LineKind.BLANK:
          case LineKind.COMMENT:
          case LineKind.MALFORMED:
            continue;

          case LineKind.PARSED:
            if (this.matcher.matches(line.rule, request)) {
              return { action: line.rule.action, rule: line.rule, file: file.name };
            }
            continue;

          case LineKind.INCLUDE: {
            const included = line.directive === IncludeDirective.DIRECTORY
              ? resolver.resolveDirectory(line.path)
              : this.optional(resolver.resolveFile(line.path));

            for (const includedFile of included) {
              const match = this.scanFile(includedFile, request, resolver, active);
              if (match) {
                return match;
              }
            }
            continue;
          }

          default: {
            const unreachable: never = line;
            throw new Error(`Unhandled line: ${JSON.stringify(unreachable)}`);
          }
        }
      }
      return undefined;
    } finally {
      active.delete(file.name);
    }
  }

  private optional(file: PolicyFile | undefined): PolicyFile[] {
    return file ? [file] : [];
  }
}
