/**
 * ProcessRunner.ts - Tracked execution of ffmpeg / ffprobe
 *
 * Every external invocation goes through here as an argv array (no shell),
 * with a restricted child environment. Live children are tracked so an
 * interrupted run can terminate them before cleaning up.
 */

import { execFile as execFileCb, type ChildProcess } from 'child_process';

// ============================================================================
// Types
// ============================================================================

export interface CommandResult {
  /** Process exit code; -1 when the child was killed by a signal */
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs one command to completion. Resolves for any exit code, rejects only
 * when the process could not be started at all.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

// ============================================================================
// Constants
// ============================================================================

/** ffmpeg can be chatty even at -loglevel error on broken inputs */
const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024;

// ============================================================================
// ProcessRunner Class
// ============================================================================

export class ProcessRunner {
  private activeProcesses: Set<ChildProcess> = new Set();

  private static readonly SAFE_CHILD_ENV = {
    PATH: process.env.PATH,
    HOME: process.env.HOME || process.env.USERPROFILE,
    USERPROFILE: process.env.USERPROFILE,
    LANG: process.env.LANG,
    TMPDIR: process.env.TMPDIR || process.env.TEMP,
    TEMP: process.env.TEMP,
  };

  /**
   * Bound runner suitable for injection into pipeline components.
   */
  readonly run: CommandRunner = (command, args) => {
    return new Promise((resolve, reject) => {
      const child = execFileCb(
        command,
        [...args],
        { env: ProcessRunner.SAFE_CHILD_ENV, maxBuffer: MAX_OUTPUT_BUFFER },
        (error, stdout, stderr) => {
          this.activeProcesses.delete(child);
          const out = stdout?.toString() ?? '';
          const err = stderr?.toString() ?? '';

          if (!error) {
            resolve({ exitCode: 0, stdout: out, stderr: err });
            return;
          }

          const code: unknown = error.code;
          if (typeof code === 'number') {
            resolve({ exitCode: code, stdout: out, stderr: err });
          } else if (error.killed || error.signal) {
            resolve({ exitCode: -1, stdout: out, stderr: err });
          } else {
            reject(error);
          }
        }
      );
      this.activeProcesses.add(child);
    });
  };

  /**
   * Number of children currently running.
   */
  get activeCount(): number {
    return this.activeProcesses.size;
  }

  /**
   * Send SIGTERM to every tracked child.
   */
  killAll(): void {
    for (const proc of this.activeProcesses) {
      proc.kill('SIGTERM');
    }
    this.activeProcesses.clear();
  }
}

/**
 * Last `count` non-empty lines of diagnostic output.
 */
export function tailLines(text: string, count: number): string[] {
  if (count <= 0) return [];
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
  return lines.slice(-count);
}
