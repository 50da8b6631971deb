/**
 * ProbeAdapter.ts - Duration and frame rate via ffprobe
 *
 * The two queries are independent: either may fail without affecting the
 * other, and a failure only ever produces null for that field.
 */

import type { CommandRunner } from './ProcessRunner';
import type { ProbeResult } from '../../shared/types';

const PLAIN_VALUE_FORMAT = ['-of', 'default=noprint_wrappers=1:nokey=1'] as const;

/**
 * Round to 2 decimal places.
 */
export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parse ffprobe's r_frame_rate output ("60000/1001", "30/1" or "29.97").
 * Returns null for 0/0 and anything that is not a positive finite rate.
 */
export function parseFrameRate(raw: string): number | null {
  const value = raw.trim().split(/\r?\n/)[0]?.trim() ?? '';
  if (!value) return null;

  let rate: number;
  const slash = value.indexOf('/');
  if (slash >= 0) {
    const num = Number(value.slice(0, slash));
    const den = Number(value.slice(slash + 1));
    if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return null;
    rate = num / den;
  } else {
    rate = Number(value);
  }

  if (!Number.isFinite(rate) || rate <= 0) return null;
  return roundTo2(rate);
}

/**
 * Parse ffprobe's format=duration output. "N/A" and empty output yield null.
 */
export function parseDuration(raw: string): number | null {
  const value = raw.trim().split(/\r?\n/)[0]?.trim() ?? '';
  if (!value) return null;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return seconds;
}

export class ProbeAdapter {
  constructor(
    private readonly runner: CommandRunner,
    private readonly ffprobePath: string = 'ffprobe'
  ) {}

  async probe(path: string): Promise<ProbeResult> {
    const durationSeconds = await this.query(
      ['-v', 'error', '-show_entries', 'format=duration', ...PLAIN_VALUE_FORMAT, path],
      parseDuration
    );
    const frameRate = await this.query(
      [
        '-v', 'error',
        '-select_streams', 'v:0',
        '-show_entries', 'stream=r_frame_rate',
        ...PLAIN_VALUE_FORMAT,
        path,
      ],
      parseFrameRate
    );
    return { durationSeconds, frameRate };
  }

  private async query(
    args: string[],
    parse: (stdout: string) => number | null
  ): Promise<number | null> {
    try {
      const result = await this.runner(this.ffprobePath, args);
      if (result.exitCode !== 0) return null;
      return parse(result.stdout);
    } catch {
      // Spawn failure reads as "unknown" the same way a non-zero exit does
      return null;
    }
  }
}
