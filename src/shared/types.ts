/**
 * Shared types for clipbatch
 */

/**
 * One inventoried input file. Created at inventory, enriched at
 * classification, read-only afterwards.
 */
export interface ClipRecord {
  readonly path: string;
  /** File name including extension, as shown in progress output */
  readonly displayName: string;
  /** Seconds, or null when ffprobe could not report it */
  readonly durationSeconds: number | null;
  /** Frames per second rounded to 2 decimals, or null when unknown */
  readonly frameRate: number | null;
  readonly captionText: string;
  readonly skipStabilization: boolean;
}

/**
 * A record whose duration is known. Only these take part in classification.
 */
export type ProbedClip = ClipRecord & { readonly durationSeconds: number };

export interface ProbeResult {
  durationSeconds: number | null;
  frameRate: number | null;
}

export interface CaptionInfo {
  captionText: string;
  skipStabilization: boolean;
}

export interface TrimWindow {
  startOffsetSeconds: number;
  outputLengthSeconds: number;
}

/**
 * Outcome of the non-standard frame-rate gate for the whole run.
 * 'not-required' means no clip was flagged.
 */
export type GateDecision = 'accepted' | 'declined' | 'not-required';

export interface ClassificationResult {
  toDelete: ProbedClip[];
  nonStandardFrameRate: ProbedClip[];
  toProcess: ProbedClip[];
  excluded: ProbedClip[];
  decision: GateDecision;
}

export interface ExportGroup {
  /** 1-based, determines the export file number */
  index: number;
  artifacts: string[];
}

// ============================================================================
// Failure reporting
// ============================================================================

export type FailureKind =
  | 'EnvironmentMissing'
  | 'ProbeUnreadable'
  | 'TransformFailure'
  | 'ConcatenationFailure'
  | 'FilesystemFailure'
  | 'RunAborted';

export type AbortReason =
  | 'engine-missing'
  | 'font-missing'
  | 'no-input'
  | 'nothing-to-process';

export interface RunFailure {
  /** ISO-8601 timestamp */
  at: string;
  kind: FailureKind;
  /** File or group the failure concerns */
  subject: string;
  message: string;
  diagnostics: string[];
}

export type RunStatus = 'completed' | 'degraded' | 'failed' | 'aborted';

export interface RunCounters {
  found: number;
  unreadable: number;
  deleted: number;
  excluded: number;
  processed: number;
  transformFailed: number;
  exports: number;
}

export interface RunSummary {
  status: RunStatus;
  abortReason?: AbortReason;
  counters: RunCounters;
  failures: RunFailure[];
  exportDir: string;
  exportPaths: string[];
  logPath: string;
  durationSeconds: number;
}
