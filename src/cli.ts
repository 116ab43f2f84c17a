/**
 * CLI Interface - Main command-line interface
 */

import * as fs from 'fs';
import {
  EvaluationRequest,
  PolicyEditorConfig,
  QubeInfo,
  RequestDestination
} from './types';
import { Environment, loadConfig, withPolicyDir } from './config';
import { PolicyFile } from './policy-file';
import { FilesystemPolicyStore, StoreIncludeResolver, isIncludeName } from './policy-store';
import { PolicyEvaluator } from './policy-evaluator';
import { AuditLogger } from './audit-logger';
import { OutputFormatter } from './output-formatter';
import { isError } from './diagnostics';
import { describeError } from './errors';

export const VERSION = '1.0.0';

interface EvaluateOptions {
  policyDir?: string;
  tags: Map<string, string[]>;
  types: Map<string, string>;
  positional: string[];
}

export class CLI {
  private env: Environment;
  private formatter: OutputFormatter;

  constructor(env: Environment = process.env) {
    this.env = env;
    this.formatter = new OutputFormatter();
  }

  /**
   * Main entry point for CLI
   *
   * Routes to:
   * - check: Validate policy files
   * - evaluate: Show which rule decides a request
   * - list: List policy files in the policy directory
   * - log: View the save audit log
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`rpc-policy v${VERSION}`);
        return 0;
      }

      const [subcommand, ...rest] = args;

      switch (subcommand) {
        case 'check':
          return this.handleCheck(rest);
        case 'evaluate':
          return this.handleEvaluate(rest);
        case 'list':
          return this.handleList(rest);
        case 'log':
          return this.handleLog(rest);
        default:
          console.error(`Error: Unknown command: ${subcommand}`);
          console.error('Run rpc-policy --help for usage');
          return 1;
      }
    } catch (error) {
      console.error('Error:', describeError(error));
      return 1;
    }
  }

  private displayUsage(): void {
    console.log(`
rpc-policy - Validate and preview qrexec RPC policy files

Usage:
  rpc-policy check [--no-includes] <file...>     Validate policy files
  rpc-policy evaluate [flags] <service> <argument> <source> <destination>
                                                 Show the decision for a request
  rpc-policy list [--policy-dir <dir>]           List policy files
  rpc-policy log [--limit <n>]                   View the save audit log

Evaluate Flags:
  --policy-dir <dir>                             Policy directory (default: $RPC_POLICY_DIR or /etc/qubes/policy.d)
  --tag <qube>=<tag>                             Give a qube a tag (repeatable)
  --type <qube>=<type>                           Give a qube a type

Destinations:
  <name>                                         A named qube
  @default                                       No destination given by the caller
  @dispvm                                        A new disposable from the default template
  @dispvm:<template>                             A new disposable from <template>

Examples:
  rpc-policy check /etc/qubes/policy.d/30-user.policy
  rpc-policy evaluate qubes.Filecopy + work @default
  rpc-policy evaluate --tag work=trusted qubes.Gpg + work vault
    `.trim());
  }

  /**
   * Validate each file and print every diagnostic. Exit code 1 when any
   * file has an error or cannot be read.
   */
  private handleCheck(args: string[]): number {
    let allowIncludes = true;
    const files: string[] = [];

    for (const arg of args) {
      if (arg === '--no-includes') {
        allowIncludes = false;
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        files.push(arg);
      }
    }

    if (files.length === 0) {
      console.error('Error: check command requires at least one file');
      console.error('Usage: rpc-policy check [--no-includes] <file...>');
      return 1;
    }

    let failed = false;
    for (const file of files) {
      let text: string;
      try {
        text = fs.readFileSync(file, 'utf-8');
      } catch (error) {
        this.formatter.displayError(`Cannot read ${file}: ${describeError(error)}`);
        failed = true;
        continue;
      }

      const diagnostics = PolicyFile.fromText(file, text, { allowIncludes }).validate();
      this.formatter.displayDiagnostics(file, diagnostics);
      if (diagnostics.some(isError)) {
        failed = true;
      }
    }

    return failed ? 1 : 0;
  }

  private handleEvaluate(args: string[]): number {
    const options = this.parseEvaluateArgs(args);
    if (options.positional.length !== 4) {
      console.error('Error: evaluate command requires <service> <argument> <source> <destination>');
      return 1;
    }

    const [service, argument, source, destination] = options.positional;
    const request: EvaluationRequest = {
      service,
      argument: argument.startsWith('+') ? argument.substring(1) : argument,
      source: this.qubeInfo(this.parseSource(source), options),
      destination: this.parseDestination(destination, options)
    };

    const config = this.config(options.policyDir);
    const store = new FilesystemPolicyStore({ dir: config.policy.dir, includeDir: config.policy.includeDir });

    const files: PolicyFile[] = [];
    for (const name of store.list().filter(name => !isIncludeName(name))) {
      const file = PolicyFile.fromText(name, store.get(name).content);
      if (!file.canSave()) {
        this.formatter.displayWarning(`${name} has errors; its malformed lines are skipped`);
      }
      files.push(file);
    }

    const match = new PolicyEvaluator().explain(files, request, new StoreIncludeResolver(store));
    this.formatter.displayEvaluation(request, match);
    return 0;
  }

  private handleList(args: string[]): number {
    let policyDir: string | undefined;
    for (let i = 0; i < args.length; i++) {
      if (args[i] === '--policy-dir') {
        policyDir = this.requireValue(args, i++);
      } else {
        throw new Error(`Unknown argument: ${args[i]}`);
      }
    }

    const config = this.config(policyDir);
    const names = new FilesystemPolicyStore({ dir: config.policy.dir, includeDir: config.policy.includeDir }).list();

    if (names.length === 0) {
      this.formatter.displayInfo(`No policy files in ${config.policy.dir}`);
      return 0;
    }

    for (const name of names) {
      console.log(name);
    }
    return 0;
  }

  private handleLog(args: string[]): number {
    let limit: number | undefined;
    for (let i = 0; i < args.length; i++) {
      if (args[i] === '--limit') {
        limit = Number(this.requireValue(args, i++));
        if (!Number.isInteger(limit) || limit <= 0) {
          throw new Error('--limit requires a positive integer');
        }
      } else {
        throw new Error(`Unknown argument: ${args[i]}`);
      }
    }

    const config = loadConfig(this.env);
    const entries = new AuditLogger(config.audit.path, config.audit.maxSize).read({ limit });

    if (entries.length === 0) {
      this.formatter.displayInfo('No saves recorded');
      return 0;
    }

    for (const entry of entries) {
      console.log(this.formatter.formatLogEntry(entry));
    }
    return 0;
  }

  private parseEvaluateArgs(args: string[]): EvaluateOptions {
    const options: EvaluateOptions = {
      tags: new Map(),
      types: new Map(),
      positional: []
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--policy-dir') {
        options.policyDir = this.requireValue(args, i++);
      } else if (arg === '--tag') {
        const [qube, tag] = this.splitAssignment(arg, this.requireValue(args, i++));
        options.tags.set(qube, [...(options.tags.get(qube) ?? []), tag]);
      } else if (arg === '--type') {
        const [qube, type] = this.splitAssignment(arg, this.requireValue(args, i++));
        options.types.set(qube, type);
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        options.positional.push(arg);
      }
    }

    return options;
  }

  private parseSource(token: string): string {
    if (token.startsWith('@')) {
      throw new Error(`Source must be a qube name, got ${token}`);
    }
    return token;
  }

  private parseDestination(token: string, options: EvaluateOptions): RequestDestination {
    if (token === '@default') {
      return { kind: 'default' };
    }
    if (token === '@dispvm') {
      return { kind: 'dispvm' };
    }
    if (token.startsWith('@dispvm:')) {
      return { kind: 'dispvm', template: this.qubeInfo(token.substring('@dispvm:'.length), options) };
    }
    if (token.startsWith('@')) {
      throw new Error(`Unsupported destination: ${token}`);
    }
    return { kind: 'qube', qube: this.qubeInfo(token, options) };
  }

  private qubeInfo(name: string, options: EvaluateOptions): QubeInfo {
    const info: QubeInfo = { name };
    const type = options.types.get(name);
    const tags = options.tags.get(name);
    if (type !== undefined) {
      info.type = type;
    }
    if (tags !== undefined) {
      info.tags = tags;
    }
    return info;
  }

  private splitAssignment(flag: string, value: string): [string, string] {
    const index = value.indexOf('=');
    if (index <= 0 || index === value.length - 1) {
      throw new Error(`${flag} expects <qube>=<value>, got ${value}`);
    }
    return [value.substring(0, index), value.substring(index + 1)];
  }

  private requireValue(args: string[], index: number): string {
    const value = args[index + 1];
    if (value === undefined) {
      throw new Error(`${args[index]} requires a value`);
    }
    return value;
  }

  private config(policyDir: string | undefined): PolicyEditorConfig {
    const config = loadConfig(this.env);
    return policyDir === undefined ? config : withPolicyDir(config, policyDir, this.env);
  }
}
