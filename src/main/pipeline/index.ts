/**
 * Pipeline Module - Per-clip processing stages
 *
 * For each run:
 *   1. Probes duration and frame rate via ffprobe
 *   2. Derives caption and stabilization flag from the filename
 *   3. Applies duration / frame-rate policy (with one batch decision)
 *   4. Transforms each clip via ffmpeg (vidstab, canvas, fps, caption)
 *   5. Groups results and concatenates them losslessly
 */

// ============================================================================
// Classes & Functions
// ============================================================================

export { ProcessRunner, tailLines } from './ProcessRunner';
export { ProbeAdapter, parseDuration, parseFrameRate, roundTo2 } from './ProbeAdapter';
export { classifyFilename, hasNoStableMarker, fileStem, CAPTION_RULES } from './FilenameClassifier';
export { ClipAnalyzer, isNonStandardFrameRate, isUndersized } from './ClipAnalyzer';
export { autoAccept, promptDecision, isAffirmative, DecisionInterruptedError } from './DecisionSource';
export { ClipTransformer, trimWindow, resolveFont, artifactName } from './ClipTransformer';
export { ExportGrouper, groupArtifacts, buildConcatManifest, exportName } from './ExportGrouper';
export { RunReporter, formatLogLine } from './RunReporter';
export * as filterGraph from './FilterGraph';

// ============================================================================
// Types
// ============================================================================

export type { CommandResult, CommandRunner } from './ProcessRunner';
export type { Classification } from './ClipAnalyzer';
export type { DecisionSource } from './DecisionSource';
export type { TransformRequest, TransformOutcome, TransformStage } from './ClipTransformer';
export type { ConcatOutcome } from './ExportGrouper';
