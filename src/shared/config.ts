/**
 * config.ts - Run configuration and media constants
 *
 * Every component receives the frozen RunConfig built here instead of
 * reading process-wide state. CLI options and environment overrides are
 * validated with zod before the config is assembled.
 */

import { join, resolve } from 'path';
import { z } from 'zod';

// ============================================================================
// Media constants
// ============================================================================

/** Clips shorter than this are deleted from the input directory */
export const MIN_DURATION_SECONDS = 5;

/** Output segment length; longer clips are trimmed around their centre */
export const SEGMENT_LENGTH_SECONDS = 10;

export const REFERENCE_FPS = 59.94;
export const REFERENCE_FPS_RATIONAL = '60000/1001';
export const FPS_TOLERANCE = 0.1;

export const TARGET_WIDTH = 1920;
export const TARGET_HEIGHT = 1080;

export const CLIPS_PER_EXPORT = 3;

export const INPUT_EXTENSION = '.mp4';

/** Lines of ffmpeg stderr kept with each failure */
export const DIAGNOSTIC_TAIL_LINES = 10;

export const STABILIZATION = {
  shakiness: 5,
  accuracy: 15,
  smoothing: 30,
} as const;

export const CAPTION_STYLE = {
  fontSize: 64,
  fontColor: 'white',
  borderWidth: 4,
  borderColor: 'black',
  /** Fraction of the frame kept clear on the right and bottom edges */
  margin: 0.05,
} as const;

export const ENCODER_ARGS = [
  '-c:v', 'libx264',
  '-preset', 'medium',
  '-crf', '18',
  '-pix_fmt', 'yuv420p',
  '-movflags', '+faststart',
] as const;

/** Tried in order; the first existing file is used for every caption */
export const DEFAULT_FONT_CANDIDATES = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/TTF/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
  '/System/Library/Fonts/Supplemental/Arial Bold.ttf',
  '/Library/Fonts/Arial Bold.ttf',
  '/System/Library/Fonts/Helvetica.ttc',
  'C:\\Windows\\Fonts\\arialbd.ttf',
  'C:\\Windows\\Fonts\\arial.ttf',
] as const;

// ============================================================================
// Schemas
// ============================================================================

export const RunOptionsSchema = z.object({
  directory: z.string().min(1, 'Target directory must not be empty').default('.'),
  yes: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;

export const EnvironmentSchema = z.object({
  CLIPBATCH_FFMPEG: z.string().min(1).optional(),
  CLIPBATCH_FFPROBE: z.string().min(1).optional(),
  CLIPBATCH_FONT: z.string().min(1).optional(),
});

export type EnvironmentOverrides = z.infer<typeof EnvironmentSchema>;

// ============================================================================
// RunConfig
// ============================================================================

export interface RunConfig {
  readonly targetDir: string;
  /** UTC start time, YYYYMMDD-HHMMSS */
  readonly stamp: string;
  readonly tempDir: string;
  readonly exportDir: string;
  readonly logPath: string;
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  readonly fontCandidates: readonly string[];
  readonly autoAccept: boolean;
  readonly verbose: boolean;
}

/**
 * Format a date as a filesystem-safe UTC stamp.
 */
export function formatRunStamp(now: Date): string {
  const dateStr = [
    now.getUTCFullYear(),
    String(now.getUTCMonth() + 1).padStart(2, '0'),
    String(now.getUTCDate()).padStart(2, '0'),
  ].join('');
  const timeStr = [
    String(now.getUTCHours()).padStart(2, '0'),
    String(now.getUTCMinutes()).padStart(2, '0'),
    String(now.getUTCSeconds()).padStart(2, '0'),
  ].join('');
  return `${dateStr}-${timeStr}`;
}

/**
 * Validate options and environment and build the frozen config for one run.
 * Throws a ZodError when either input is malformed.
 */
export function createRunConfig(
  options: RunOptions,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): RunConfig {
  const parsed = RunOptionsSchema.parse(options);
  const overrides = EnvironmentSchema.parse({
    CLIPBATCH_FFMPEG: env.CLIPBATCH_FFMPEG || undefined,
    CLIPBATCH_FFPROBE: env.CLIPBATCH_FFPROBE || undefined,
    CLIPBATCH_FONT: env.CLIPBATCH_FONT || undefined,
  });

  const targetDir = resolve(parsed.directory);
  const stamp = formatRunStamp(now);
  const fontCandidates = overrides.CLIPBATCH_FONT
    ? [overrides.CLIPBATCH_FONT, ...DEFAULT_FONT_CANDIDATES]
    : [...DEFAULT_FONT_CANDIDATES];

  return Object.freeze({
    targetDir,
    stamp,
    tempDir: join(targetDir, `.clipbatch-tmp-${stamp}`),
    exportDir: join(targetDir, `exports-${stamp}`),
    logPath: join(targetDir, `clipbatch-${stamp}.log`),
    ffmpegPath: overrides.CLIPBATCH_FFMPEG ?? 'ffmpeg',
    ffprobePath: overrides.CLIPBATCH_FFPROBE ?? 'ffprobe',
    fontCandidates: Object.freeze(fontCandidates),
    autoAccept: parsed.yes,
    verbose: parsed.verbose,
  });
}
