#!/usr/bin/env node
/**
 * rpc-policy - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

export * from './types';
export * from './errors';
export { LineTokenizer } from './line-tokenizer';
export type { ClassifiedLine } from './line-tokenizer';
export { SpecifierParser, ILLEGAL_POSITIONS, isLegalIn } from './specifier-parser';
export { RuleParser, DEFAULT_PARSE_OPTIONS } from './rule-parser';
export { formatRule, formatAction, formatQubeSpecifier, formatArgument, formatService, ruleKey } from './rule-formatter';
export { createDiagnostic, isError } from './diagnostics';
export { PolicyFile } from './policy-file';
export { RuleMatcher, ADMIN_VM_NAME, ADMIN_VM_TYPE } from './rule-matcher';
export { PolicyEvaluator, NO_INCLUDES } from './policy-evaluator';
export type { IncludeResolver } from './policy-evaluator';
export { FilesystemPolicyStore, StoreIncludeResolver, contentToken } from './policy-store';
export type { PolicyStore } from './policy-store';
export { atomicWriteFile } from './atomic-write';
export { EditorSession } from './editor-session';
export type { EditorSessionOptions, OpenOptions } from './editor-session';
export { AuditLogger } from './audit-logger';
export { loadConfig } from './config';
export { OutputFormatter } from './output-formatter';
export { CLI, VERSION } from './cli';
