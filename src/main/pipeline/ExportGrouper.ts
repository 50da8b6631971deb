/**
 * ExportGrouper.ts - Fixed-size export groups and lossless concatenation
 *
 * Groups are consecutive runs of processed clips in inventory order. Each
 * group is joined with ffmpeg's concat demuxer and stream copy, through a
 * manifest file that is removed once the merge returns.
 */

import { randomUUID } from 'crypto';
import { rm, writeFile } from 'fs/promises';
import { join } from 'path';

import { CLIPS_PER_EXPORT, DIAGNOSTIC_TAIL_LINES } from '../../shared/config';
import { tailLines, type CommandRunner } from './ProcessRunner';
import type { ExportGroup } from '../../shared/types';

export type ConcatOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; outputPath: string; reason: string; diagnostics: string[] };

export interface ExportGrouperOptions {
  tempDir: string;
  exportDir: string;
  ffmpegPath: string;
}

type LogFn = (message: string) => void;

/**
 * Split into consecutive groups of `size`; only the last may be shorter.
 * No rebalancing: 4 artifacts give [3, 1].
 */
export function groupArtifacts(artifacts: readonly string[], size = CLIPS_PER_EXPORT): ExportGroup[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Group size must be a positive integer, got ${size}`);
  }

  const groups: ExportGroup[] = [];
  for (let i = 0; i < artifacts.length; i += size) {
    groups.push({ index: groups.length + 1, artifacts: artifacts.slice(i, i + size) });
  }
  return groups;
}

export function exportName(index: number): string {
  return `export_${String(index).padStart(3, '0')}.mp4`;
}

/**
 * Concat demuxer manifest. Single quotes in paths are closed, escaped and
 * reopened, as the demuxer's quoting rules require.
 */
export function buildConcatManifest(artifacts: readonly string[]): string {
  return artifacts
    .map((path) => `file '${path.replace(/'/g, "'\\''")}'`)
    .join('\n') + '\n';
}

export class ExportGrouper {
  constructor(
    private readonly options: ExportGrouperOptions,
    private readonly runner: CommandRunner,
    private readonly log: LogFn = () => {}
  ) {}

  async concatenate(group: ExportGroup): Promise<ConcatOutcome> {
    const outputPath = join(this.options.exportDir, exportName(group.index));
    const manifestPath = join(this.options.tempDir, `concat-${randomUUID()}.txt`);

    try {
      await writeFile(manifestPath, buildConcatManifest(group.artifacts), 'utf-8');

      const result = await this.runner(this.options.ffmpegPath, [
        '-hide_banner', '-loglevel', 'error', '-y',
        '-f', 'concat',
        '-safe', '0',
        '-i', manifestPath,
        '-c', 'copy',
        outputPath,
      ]);

      if (result.exitCode !== 0) {
        return {
          ok: false,
          outputPath,
          reason: `ffmpeg exited with code ${result.exitCode}`,
          diagnostics: tailLines(result.stderr, DIAGNOSTIC_TAIL_LINES),
        };
      }
      return { ok: true, outputPath };
    } catch (error) {
      return {
        ok: false,
        outputPath,
        reason: error instanceof Error ? error.message : String(error),
        diagnostics: [],
      };
    } finally {
      try {
        await rm(manifestPath, { force: true });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log(`  WARNING: could not remove ${manifestPath}: ${message}`);
      }
    }
  }
}
