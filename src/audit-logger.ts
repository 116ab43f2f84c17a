/**
 * Audit Logger - Records every attempt to save a policy file
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Diagnostic, LogEntry, LogReadOptions, SaveOutcome } from './types';
import { isError } from './diagnostics';
import { describeError } from './errors';

export const DEFAULT_AUDIT_LOG = path.join(os.homedir(), '.rpc-policy', 'audit.log');
export const DEFAULT_AUDIT_MAX_SIZE = 10 * 1024 * 1024;

export class AuditLogger {
  private logPath: string;
  private maxSize: number;

  constructor(logPath: string = DEFAULT_AUDIT_LOG, maxSize: number = DEFAULT_AUDIT_MAX_SIZE) {
    this.logPath = logPath;
    this.maxSize = maxSize;
  }

  /**
   * Build and append an entry for one save attempt
   */
  record(file: string, outcome: SaveOutcome, diagnostics: Diagnostic[], reason?: string): void {
    const errors = diagnostics.filter(isError).length;
    this.log({
      timestamp: new Date().toISOString(),
      file,
      outcome,
      errors,
      warnings: diagnostics.length - errors,
      ...(reason !== undefined && { reason })
    });
  }

  /**
   * Append one entry as a single JSON line. A failed write is reported on
   * stderr; it never fails the save it describes.
   */
  log(entry: LogEntry): void {
    try {
      this.ensureLogDirectory();

      if (this.shouldRotate()) {
        this.rotate();
      }

      fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to write audit log: ${describeError(error)}`);
    }
  }

  /**
   * Move the current log aside with a timestamp suffix; the next write
   * starts a new file
   */
  rotate(): void {
    try {
      if (!fs.existsSync(this.logPath)) {
        return;
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.logPath, `${this.logPath}.${timestamp}`);
    } catch (error) {
      console.error(`Warning: Failed to rotate audit log: ${describeError(error)}`);
    }
  }

  /**
   * Read entries, most recent last
   */
  read(options?: LogReadOptions): LogEntry[] {
    if (!fs.existsSync(this.logPath)) {
      return [];
    }

    let content: string;
    try {
      content = fs.readFileSync(this.logPath, 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to read audit log: ${describeError(error)}`);
      return [];
    }

    const entries: LogEntry[] = [];
    for (const line of content.split('\n').filter(l => l.trim().length > 0)) {
      const entry = this.parseEntry(line);
      if (entry) {
        entries.push(entry);
      } else {
        console.error(`Warning: Invalid entry in audit log: ${line}`);
      }
    }

    let filtered = entries;

    const outcome = options?.outcome;
    if (outcome) {
      filtered = filtered.filter(e => e.outcome === outcome);
    }

    const since = options?.since;
    if (since) {
      filtered = filtered.filter(e => new Date(e.timestamp) >= since);
    }

    const limit = options?.limit ?? 50;
    if (filtered.length > limit) {
      filtered = filtered.slice(-limit);
    }

    return filtered;
  }

  private parseEntry(line: string): LogEntry | undefined {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return undefined;
    }

    if (typeof value !== 'object' || value === null) {
      return undefined;
    }

    const record: Record<string, unknown> = { ...value };
    const { timestamp, file, outcome, errors, warnings, reason } = record;
    if (
      typeof timestamp !== 'string' ||
      typeof file !== 'string' ||
      (outcome !== 'saved' && outcome !== 'rejected' && outcome !== 'failed') ||
      typeof errors !== 'number' ||
      typeof warnings !== 'number'
    ) {
      return undefined;
    }

    return {
      timestamp,
      file,
      outcome,
      errors,
      warnings,
      ...(typeof reason === 'string' && { reason })
    };
  }

  private ensureLogDirectory(): void {
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
  }

  private shouldRotate(): boolean {
    if (!fs.existsSync(this.logPath)) {
      return false;
    }
    return fs.statSync(this.logPath).size >= this.maxSize;
  }
}
