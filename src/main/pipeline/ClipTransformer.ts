/**
 * ClipTransformer.ts - Trim, stabilize, caption and normalize one clip
 *
 * Per clip, sequentially:
 *   1. (unless NoStable) vidstabdetect over the trim window -> .trf file
 *   2. one encode: vidstabtransform (if any) + canvas + fps + caption, no audio
 *
 * The .trf file gets a UUID name so concurrent runs in one directory never
 * collide, and is removed after pass 2 whatever happened. A failed clip
 * leaves no partial output behind.
 */

import { randomUUID } from 'crypto';
import { statSync } from 'fs';
import { rm } from 'fs/promises';
import { join } from 'path';

import {
  DIAGNOSTIC_TAIL_LINES,
  ENCODER_ARGS,
  REFERENCE_FPS_RATIONAL,
  SEGMENT_LENGTH_SECONDS,
} from '../../shared/config';
import { buildDetectFilter, buildEncodeFilter, trimArgs } from './FilterGraph';
import { tailLines, type CommandResult, type CommandRunner } from './ProcessRunner';
import type { ProbedClip, TrimWindow } from '../../shared/types';

// ============================================================================
// Types
// ============================================================================

export type TransformStage = 'stabilize-detect' | 'stabilize-transform' | 'encode';

export interface TransformRequest {
  clip: ProbedClip;
  window: TrimWindow;
  captionText: string;
  skipStabilization: boolean;
  /** 1-based inventory position, used for the artifact name */
  index: number;
}

export type TransformOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; stage: TransformStage; reason: string; diagnostics: string[] };

export interface ClipTransformerOptions {
  tempDir: string;
  ffmpegPath: string;
  fontPath: string;
}

type LogFn = (message: string) => void;

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Centered 10 s window for long clips, the whole clip otherwise.
 */
export function trimWindow(durationSeconds: number): TrimWindow {
  if (durationSeconds > SEGMENT_LENGTH_SECONDS) {
    return {
      startOffsetSeconds: (durationSeconds - SEGMENT_LENGTH_SECONDS) / 2,
      outputLengthSeconds: SEGMENT_LENGTH_SECONDS,
    };
  }
  return { startOffsetSeconds: 0, outputLengthSeconds: durationSeconds };
}

/**
 * First candidate that exists as a regular file, or null.
 */
export function resolveFont(candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    try {
      if (statSync(candidate).isFile()) return candidate;
    } catch {
      // missing candidate, try the next one
    }
  }
  return null;
}

export function artifactName(index: number): string {
  return `clip_${String(index).padStart(3, '0')}.mp4`;
}

// ============================================================================
// ClipTransformer Class
// ============================================================================

export class ClipTransformer {
  private readonly options: ClipTransformerOptions;
  private readonly runner: CommandRunner;
  private readonly log: LogFn;

  constructor(options: ClipTransformerOptions, runner: CommandRunner, log: LogFn = () => {}) {
    this.options = options;
    this.runner = runner;
    this.log = log;
  }

  async transform(request: TransformRequest): Promise<TransformOutcome> {
    const outputPath = join(this.options.tempDir, artifactName(request.index));
    let stage: TransformStage = request.skipStabilization ? 'encode' : 'stabilize-detect';

    try {
      let result: TransformOutcome;
      if (request.skipStabilization) {
        this.log(`  Stabilization skipped for ${request.clip.displayName}`);
        const encoded = await this.encode(request, outputPath);
        result = this.toOutcome(encoded, 'encode', outputPath);
      } else {
        result = await this.transformStabilized(request, outputPath, (next) => {
          stage = next;
        });
      }

      if (!result.ok) {
        await this.discard(outputPath);
      }
      return result;
    } catch (error) {
      await this.discard(outputPath);
      return {
        ok: false,
        stage,
        reason: error instanceof Error ? error.message : String(error),
        diagnostics: [],
      };
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async transformStabilized(
    request: TransformRequest,
    outputPath: string,
    enterStage: (stage: TransformStage) => void
  ): Promise<TransformOutcome> {
    const transformPath = join(this.options.tempDir, `transforms-${randomUUID()}.trf`);

    try {
      enterStage('stabilize-detect');
      const detected = await this.runner(this.options.ffmpegPath, [
        '-hide_banner', '-loglevel', 'error', '-y',
        ...trimArgs(request.window),
        '-i', request.clip.path,
        '-vf', buildDetectFilter(transformPath),
        '-an',
        '-f', 'null', '-',
      ]);
      if (detected.exitCode !== 0) {
        return this.toOutcome(detected, 'stabilize-detect', outputPath);
      }

      enterStage('stabilize-transform');
      const encoded = await this.encode(request, outputPath, transformPath);
      return this.toOutcome(encoded, 'stabilize-transform', outputPath);
    } finally {
      await this.discard(transformPath);
    }
  }

  private encode(
    request: TransformRequest,
    outputPath: string,
    transformPath?: string
  ): Promise<CommandResult> {
    const filter = buildEncodeFilter({
      fontPath: this.options.fontPath,
      captionText: request.captionText,
      transformPath,
    });

    return this.runner(this.options.ffmpegPath, [
      '-hide_banner', '-loglevel', 'error', '-y',
      ...trimArgs(request.window),
      '-i', request.clip.path,
      '-vf', filter,
      '-r', REFERENCE_FPS_RATIONAL,
      '-an',
      ...ENCODER_ARGS,
      outputPath,
    ]);
  }

  private toOutcome(
    result: CommandResult,
    stage: TransformStage,
    outputPath: string
  ): TransformOutcome {
    if (result.exitCode === 0) {
      return { ok: true, outputPath };
    }
    return {
      ok: false,
      stage,
      reason: `ffmpeg exited with code ${result.exitCode}`,
      diagnostics: tailLines(result.stderr, DIAGNOSTIC_TAIL_LINES),
    };
  }

  /**
   * Remove a temp file if present. A removal error is logged, never thrown,
   * so it cannot mask the clip's real outcome.
   */
  private async discard(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(`  WARNING: could not remove ${path}: ${message}`);
    }
  }
}
