/**
 * ClipAnalyzer.ts - Duration and frame-rate policy over the probed inventory
 *
 * classify() is pure and partitions clips before any user interaction.
 * resolve() then asks the DecisionSource once, for all non-standard clips
 * together, and produces the final ClassificationResult.
 */

import {
  FPS_TOLERANCE,
  MIN_DURATION_SECONDS,
  REFERENCE_FPS,
} from '../../shared/config';
import { roundTo2 } from './ProbeAdapter';
import type { DecisionSource } from './DecisionSource';
import type { ClassificationResult, ProbedClip } from '../../shared/types';

export interface Classification {
  toDelete: ProbedClip[];
  nonStandardFrameRate: ProbedClip[];
  standard: ProbedClip[];
}

/**
 * True when a known rate is further than the tolerance from 59.94.
 * Compared at 2 decimals so 60.04 is accepted and 60.05 is not.
 */
export function isNonStandardFrameRate(frameRate: number | null): boolean {
  if (frameRate === null) return false;
  return roundTo2(Math.abs(frameRate - REFERENCE_FPS)) > FPS_TOLERANCE;
}

export function isUndersized(durationSeconds: number): boolean {
  return durationSeconds < MIN_DURATION_SECONDS;
}

export class ClipAnalyzer {
  classify(clips: readonly ProbedClip[]): Classification {
    const result: Classification = { toDelete: [], nonStandardFrameRate: [], standard: [] };

    for (const clip of clips) {
      if (isUndersized(clip.durationSeconds)) {
        result.toDelete.push(clip);
      } else if (isNonStandardFrameRate(clip.frameRate)) {
        result.nonStandardFrameRate.push(clip);
      } else {
        result.standard.push(clip);
      }
    }

    return result;
  }

  /**
   * Apply the batch decision. `order` is the inventory order that toProcess
   * must follow once accepted non-standard clips are merged back in.
   */
  async resolve(
    classification: Classification,
    decide: DecisionSource,
    order: readonly ProbedClip[]
  ): Promise<ClassificationResult> {
    const { toDelete, nonStandardFrameRate, standard } = classification;

    if (nonStandardFrameRate.length === 0) {
      return {
        toDelete,
        nonStandardFrameRate,
        toProcess: [...standard],
        excluded: [],
        decision: 'not-required',
      };
    }

    const rates = [...new Set(nonStandardFrameRate.map((clip) => clip.frameRate))].join(', ');
    const accepted = await decide.confirm(
      `${nonStandardFrameRate.length} clip(s) are not ${REFERENCE_FPS} fps (found: ${rates}). ` +
      `Convert them to ${REFERENCE_FPS} fps and include them?`
    );

    if (!accepted) {
      return {
        toDelete,
        nonStandardFrameRate,
        toProcess: [...standard],
        excluded: [...nonStandardFrameRate],
        decision: 'declined',
      };
    }

    const keep = new Set<ProbedClip>([...standard, ...nonStandardFrameRate]);
    return {
      toDelete,
      nonStandardFrameRate,
      toProcess: order.filter((clip) => keep.has(clip)),
      excluded: [],
      decision: 'accepted',
    };
  }
}
