/**
 * OutputFormatter - Console output for the rpc-policy CLI
 *
 * Diagnostics use the compiler-style `file:line:column: severity: message
 * [kind]` form so editors can jump to them.
 */

import {
  Action,
  ActionType,
  Diagnostic,
  EvaluationRequest,
  LogEntry,
  RequestDestination,
  RuleMatch
} from './types';
import { formatAction, formatRule } from './rule-formatter';
import { isError } from './diagnostics';

const DECISION_LABELS: Record<ActionType, string> = {
  [ActionType.ALLOW]: '✅ WOULD BE ALLOWED',
  [ActionType.DENY]: '🚫 WOULD BE DENIED',
  [ActionType.ASK]: '⚠️  WOULD ASK THE USER'
};

export class OutputFormatter {
  formatDiagnostic(file: string, diagnostic: Diagnostic): string {
    return `${file}:${diagnostic.line}:${diagnostic.column}: ${diagnostic.severity}: ${diagnostic.message} [${diagnostic.kind}]`;
  }

  formatSummary(file: string, diagnostics: Diagnostic[]): string {
    if (diagnostics.length === 0) {
      return `${file}: OK`;
    }
    const errors = diagnostics.filter(isError).length;
    const warnings = diagnostics.length - errors;
    return `${file}: ${errors} error(s), ${warnings} warning(s)`;
  }

  formatDestination(destination: RequestDestination): string {
    switch (destination.kind) {
      case 'qube':
        return destination.qube.name;
      case 'dispvm':
        return destination.template ? `@dispvm:${destination.template.name}` : '@dispvm';
      case 'default':
        return '@default';
      default: {
        const unreachable: never = destination;
        throw new Error(`Unhandled destination: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  formatRequest(request: EvaluationRequest): string {
    return `${request.service} +${request.argument} ${request.source.name} -> ${this.formatDestination(request.destination)}`;
  }

  /**
   * Lines describing the decision for a request; no match is an implicit
   * deny
   */
  formatEvaluation(request: EvaluationRequest, match: RuleMatch | undefined): string[] {
    const action: Action = match ? match.action : { type: ActionType.DENY };
    const lines = [
      DECISION_LABELS[action.type],
      `Request: ${this.formatRequest(request)}`,
      `Action: ${formatAction(action)}`
    ];

    if (match) {
      lines.push(`Matched Rule: ${match.file}:${match.rule.lineNumber}: ${formatRule(match.rule)}`);
    } else {
      lines.push('Matched Rule: (none - implicit deny)');
    }

    return lines;
  }

  formatLogEntry(entry: LogEntry): string {
    const reason = entry.reason ? ` (${entry.reason})` : '';
    return `${entry.timestamp} ${entry.outcome.toUpperCase()} ${entry.file}: ${entry.errors} error(s), ${entry.warnings} warning(s)${reason}`;
  }

  displayDiagnostics(file: string, diagnostics: Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      console.log(this.formatDiagnostic(file, diagnostic));
    }
    console.log(this.formatSummary(file, diagnostics));
  }

  displayEvaluation(request: EvaluationRequest, match: RuleMatch | undefined): void {
    console.log(this.formatEvaluation(request, match).join('\n'));
  }

  displayError(message: string): void {
    console.error(`❌ Error: ${message}`);
  }

  displayWarning(message: string): void {
    console.warn(`⚠️  Warning: ${message}`);
  }

  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }
}
