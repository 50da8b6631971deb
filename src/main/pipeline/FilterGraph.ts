/**
 * FilterGraph.ts - ffmpeg filter chains for the clip transform
 *
 * Pure string builders. The only content that needs escaping is a value
 * that ends up inside a filter option (caption text, font path, transform
 * file path); those go through escapeFilterValue() and are single-quoted.
 *
 * Escape table, applied in this order:
 *   \   ->  \\        backslash, so the next two stay unambiguous
 *   :   ->  \:        option separator
 *   '   ->  '\\\''    closes the quote, emits an escaped quote, reopens
 */

import {
  CAPTION_STYLE,
  REFERENCE_FPS_RATIONAL,
  STABILIZATION,
  TARGET_HEIGHT,
  TARGET_WIDTH,
} from '../../shared/config';
import type { TrimWindow } from '../../shared/types';

export function escapeFilterValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/:/g, '\\:')
    .replace(/'/g, "'\\\\\\''");
}

function quoted(value: string): string {
  return `'${escapeFilterValue(value)}'`;
}

/**
 * Seconds as ffmpeg expects them, without float noise or exponent notation.
 */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

/**
 * Input-side seek and length for the trim window (placed before -i).
 */
export function trimArgs(window: TrimWindow): string[] {
  return [
    '-ss', formatSeconds(window.startOffsetSeconds),
    '-t', formatSeconds(window.outputLengthSeconds),
  ];
}

export function buildCanvasFilter(width = TARGET_WIDTH, height = TARGET_HEIGHT): string {
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black`,
    'setsar=1',
  ].join(',');
}

export function buildFrameRateFilter(): string {
  return `fps=${REFERENCE_FPS_RATIONAL}`;
}

export function buildCaptionFilter(fontPath: string, captionText: string): string {
  const margin = CAPTION_STYLE.margin;
  return [
    `drawtext=fontfile=${quoted(fontPath)}`,
    `text=${quoted(captionText)}`,
    'expansion=none',
    `fontsize=${CAPTION_STYLE.fontSize}`,
    `fontcolor=${CAPTION_STYLE.fontColor}`,
    `borderw=${CAPTION_STYLE.borderWidth}`,
    `bordercolor=${CAPTION_STYLE.borderColor}`,
    `x=w-tw-w*${margin}`,
    `y=h-th-h*${margin}`,
  ].join(':');
}

export function buildDetectFilter(transformPath: string): string {
  return [
    `vidstabdetect=shakiness=${STABILIZATION.shakiness}`,
    `accuracy=${STABILIZATION.accuracy}`,
    `result=${quoted(transformPath)}`,
  ].join(':');
}

export function buildStabilizeFilter(transformPath: string): string {
  return [
    `vidstabtransform=input=${quoted(transformPath)}`,
    `smoothing=${STABILIZATION.smoothing}`,
    'zoom=0',
  ].join(':');
}

/**
 * The single encode chain: optional stabilization, then canvas, frame rate
 * and caption.
 */
export function buildEncodeFilter(options: {
  fontPath: string;
  captionText: string;
  transformPath?: string;
}): string {
  const chain = [
    buildCanvasFilter(),
    buildFrameRateFilter(),
    buildCaptionFilter(options.fontPath, options.captionText),
  ];
  if (options.transformPath) {
    chain.unshift(buildStabilizeFilter(options.transformPath));
  }
  return chain.join(',');
}
