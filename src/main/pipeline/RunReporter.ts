/**
 * RunReporter.ts - Run-scoped failure log and terminal status
 *
 * One tab-separated line per failure is appended to the run log as it
 * happens, so a run that is interrupted still leaves its failures on disk.
 */

import { appendFile } from 'fs/promises';

import type {
  AbortReason,
  FailureKind,
  RunCounters,
  RunFailure,
  RunStatus,
  RunSummary,
} from '../../shared/types';

export interface SummaryInput {
  counters: RunCounters;
  exportDir: string;
  exportPaths: string[];
  durationSeconds: number;
}

type Clock = () => Date;

/**
 * Serialize one failure to a single log line.
 */
export function formatLogLine(failure: RunFailure): string {
  const message = failure.message.replace(/\s*\r?\n\s*/g, ' ');
  const detail = failure.diagnostics.length > 0 ? ` | ${failure.diagnostics.join(' | ')}` : '';
  return `${failure.at}\t${failure.kind}\t${failure.subject}\t${message}${detail}\n`;
}

export class RunReporter {
  private failures: RunFailure[] = [];
  private abortReason: AbortReason | null = null;
  private logWriteFailed = false;

  constructor(
    private readonly logPath: string,
    private readonly clock: Clock = () => new Date()
  ) {}

  async recordFailure(
    kind: FailureKind,
    subject: string,
    message: string,
    diagnostics: string[] = []
  ): Promise<RunFailure> {
    const failure: RunFailure = {
      at: this.clock().toISOString(),
      kind,
      subject,
      message,
      diagnostics: [...diagnostics],
    };
    this.failures.push(failure);
    await this.append(failure);
    return failure;
  }

  /**
   * Mark the run as aborted. Only the first reason is kept.
   */
  async abort(reason: AbortReason, message: string): Promise<void> {
    if (this.abortReason === null) {
      this.abortReason = reason;
    }
    const kind: FailureKind =
      reason === 'engine-missing' || reason === 'font-missing' ? 'EnvironmentMissing' : 'RunAborted';
    const failure: RunFailure = {
      at: this.clock().toISOString(),
      kind,
      subject: reason,
      message,
      diagnostics: [],
    };
    await this.append(failure);
  }

  get aborted(): AbortReason | null {
    return this.abortReason;
  }

  getFailures(): readonly RunFailure[] {
    return this.failures;
  }

  statusFor(exports: number): RunStatus {
    if (this.abortReason !== null) return 'aborted';
    if (exports === 0) return 'failed';
    return this.failures.length > 0 ? 'degraded' : 'completed';
  }

  summary(input: SummaryInput): RunSummary {
    const status = this.statusFor(input.counters.exports);
    return {
      status,
      ...(this.abortReason !== null ? { abortReason: this.abortReason } : {}),
      counters: { ...input.counters },
      failures: [...this.failures],
      exportDir: input.exportDir,
      exportPaths: [...input.exportPaths],
      logPath: this.logPath,
      durationSeconds: input.durationSeconds,
    };
  }

  private async append(failure: RunFailure): Promise<void> {
    try {
      await appendFile(this.logPath, formatLogLine(failure), 'utf-8');
    } catch (error) {
      // The run goes on without its log; say so once
      if (!this.logWriteFailed) {
        this.logWriteFailed = true;
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(`[clipbatch] could not write run log ${this.logPath}: ${message}\n`);
      }
    }
  }
}
