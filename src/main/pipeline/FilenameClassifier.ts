/**
 * FilenameClassifier.ts - Caption text and stabilization flag from filenames
 *
 * Naming convention (users rely on it, treat changes as breaking):
 *   <Caption-Words>_<anything>.mp4      e.g. Northern-Canada_1NoStable.mp4
 *   <Caption-Words> (<anything>).mp4    e.g. Some-Place (4NoStable).mp4
 *   <Caption-Words>.mp4
 * Dashes in the caption become spaces. A "NoStable" marker anywhere in the
 * text after the first underscore or inside the first " (...)" turns
 * stabilization off for that clip.
 */

import { basename, extname } from 'path';
import type { CaptionInfo } from '../../shared/types';

// ============================================================================
// Rules
// ============================================================================

export const NO_STABLE_MARKER = 'nostable';

interface CaptionSplit {
  caption: string;
  /** Text after the caption that may carry the marker */
  suffix: string;
}

interface CaptionRule {
  name: string;
  matches: (stem: string) => boolean;
  extract: (stem: string) => CaptionSplit;
}

const PAREN_SEPARATOR = ' (';

/**
 * Evaluated in order; the first rule whose predicate matches wins.
 */
export const CAPTION_RULES: readonly CaptionRule[] = [
  {
    name: 'underscore',
    matches: (stem) => stem.includes('_'),
    extract: (stem) => {
      const at = stem.indexOf('_');
      return { caption: stem.slice(0, at), suffix: stem.slice(at + 1) };
    },
  },
  {
    name: 'parenthesized',
    matches: (stem) => stem.includes(PAREN_SEPARATOR),
    extract: (stem) => {
      const at = stem.indexOf(PAREN_SEPARATOR);
      const inner = stem.slice(at + PAREN_SEPARATOR.length);
      return {
        caption: stem.slice(0, at),
        suffix: inner.endsWith(')') ? inner.slice(0, -1) : inner,
      };
    },
  },
  {
    name: 'whole-name',
    matches: () => true,
    extract: (stem) => ({ caption: stem, suffix: '' }),
  },
];

// ============================================================================
// Public API
// ============================================================================

/**
 * Strip directories and the extension from a file path or name.
 */
export function fileStem(filename: string): string {
  const name = basename(filename);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/**
 * Independent of which caption rule fired.
 */
export function hasNoStableMarker(suffix: string): boolean {
  return suffix.toLowerCase().includes(NO_STABLE_MARKER);
}

export function classifyFilename(filename: string): CaptionInfo {
  const stem = fileStem(filename);
  const rule = CAPTION_RULES.find((candidate) => candidate.matches(stem)) ?? CAPTION_RULES[CAPTION_RULES.length - 1];
  const { caption } = rule.extract(stem);

  // The marker may sit in any matching rule's suffix, not only the winner's:
  // "Rocky-Ridge (NoStable)_1" captions by underscore, marks by parentheses
  const skipStabilization = CAPTION_RULES
    .filter((candidate) => candidate.matches(stem))
    .some((candidate) => hasNoStableMarker(candidate.extract(stem).suffix));

  return {
    captionText: caption.replace(/-/g, ' '),
    skipStabilization,
  };
}
