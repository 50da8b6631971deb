/**
 * BatchPipeline.ts - Orchestrates one clipbatch run
 *
 * engine check -> font -> inventory -> probe -> classify -> frame-rate gate
 * -> delete undersized -> transform each clip -> group -> concat -> cleanup
 *
 * Everything the run needs is carried by the frozen RunConfig. Per-clip and
 * per-group failures are logged and skipped; only a missing engine or font,
 * an empty directory, or nothing left to process end the run early, and
 * those come back as an 'aborted' summary rather than an exception.
 */

import { mkdir, readdir, rm, rmdir, unlink } from 'fs/promises';
import { extname, join } from 'path';

import { INPUT_EXTENSION, type RunConfig } from '../shared/config';
import { installHint } from './doctor';
import {
  ClipAnalyzer,
  ClipTransformer,
  ExportGrouper,
  ProbeAdapter,
  ProcessRunner,
  RunReporter,
  autoAccept,
  classifyFilename,
  exportName,
  groupArtifacts,
  promptDecision,
  resolveFont,
  trimWindow,
  type CommandRunner,
  type DecisionSource,
} from '../main/pipeline';

import type { ClipRecord, ProbedClip, RunCounters, RunSummary } from '../shared/types';

// ============================================================================
// Types
// ============================================================================

export interface BatchPipelineDeps {
  /** Defaults to a tracked ProcessRunner */
  runner?: CommandRunner;
  /** Defaults to autoAccept() with --yes, otherwise a terminal prompt */
  decide?: DecisionSource;
}

export interface BatchPipelineCallbacks {
  /** Verbose detail */
  onLog?: (message: string) => void;
  /** Always-visible progress */
  onStep?: (message: string) => void;
  onSuccess?: (message: string) => void;
  onFailure?: (message: string) => void;
}

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_PARTIAL = 3;
export const EXIT_SIGINT = 130;

/**
 * Map a finished run to the process exit code.
 */
export function exitCodeFor(summary: RunSummary): number {
  switch (summary.status) {
    case 'completed':
      return EXIT_SUCCESS;
    case 'degraded':
      return EXIT_PARTIAL;
    case 'failed':
      return EXIT_SYSTEM_ERROR;
    case 'aborted':
      return summary.abortReason === 'engine-missing' || summary.abortReason === 'font-missing'
        ? EXIT_SYSTEM_ERROR
        : EXIT_USER_ERROR;
  }
}

function emptyCounters(): RunCounters {
  return {
    found: 0,
    unreadable: 0,
    deleted: 0,
    excluded: 0,
    processed: 0,
    transformFailed: 0,
    exports: 0,
  };
}

function isProbed(record: ClipRecord): record is ProbedClip {
  return record.durationSeconds !== null;
}

// ============================================================================
// BatchPipeline Class
// ============================================================================

export class BatchPipeline {
  private readonly config: RunConfig;
  private readonly runner: CommandRunner;
  private readonly processRunner: ProcessRunner | null;
  private readonly decide: DecisionSource;
  private readonly reporter: RunReporter;
  private readonly callbacks: Required<BatchPipelineCallbacks>;
  private tempDirCreated = false;

  constructor(config: RunConfig, deps: BatchPipelineDeps = {}, callbacks: BatchPipelineCallbacks = {}) {
    this.config = config;
    if (deps.runner) {
      this.runner = deps.runner;
      this.processRunner = null;
    } else {
      this.processRunner = new ProcessRunner();
      this.runner = this.processRunner.run;
    }
    this.decide = deps.decide ?? (config.autoAccept ? autoAccept() : promptDecision());
    this.reporter = new RunReporter(config.logPath);
    this.callbacks = {
      onLog: callbacks.onLog ?? (() => {}),
      onStep: callbacks.onStep ?? (() => {}),
      onSuccess: callbacks.onSuccess ?? (() => {}),
      onFailure: callbacks.onFailure ?? (() => {}),
    };
  }

  /**
   * Run the whole batch. The temp directory is removed on every exit path.
   */
  async run(): Promise<RunSummary> {
    const startTime = Date.now();
    const counters = emptyCounters();
    const exportPaths: string[] = [];

    try {
      await this.runPipeline(counters, exportPaths);
    } finally {
      await this.cleanup();
    }

    return this.reporter.summary({
      counters,
      exportDir: this.config.exportDir,
      exportPaths,
      durationSeconds: (Date.now() - startTime) / 1000,
    });
  }

  /**
   * Kill running ffmpeg children and remove the temp directory.
   */
  async abort(): Promise<void> {
    this.processRunner?.killAll();
    await this.cleanup();
  }

  /**
   * Best effort: a clip interrupted mid-encode may leave its artifact behind
   * until the directory itself goes.
   */
  async cleanup(): Promise<void> {
    if (!this.tempDirCreated) return;
    try {
      await rm(this.config.tempDir, { recursive: true, force: true });
      this.tempDirCreated = false;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.reporter.recordFailure('FilesystemFailure', this.config.tempDir, `Cleanup failed: ${message}`);
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async runPipeline(counters: RunCounters, exportPaths: string[]): Promise<void> {
    const { onStep, onLog, onFailure } = this.callbacks;

    // Step 1: ffmpeg and ffprobe must both be callable
    if (!(await this.checkEngine())) {
      const message =
        `ffmpeg and ffprobe are required but were not found.\n` +
        `  Install via: ${installHint()}\n` +
        `  Or point CLIPBATCH_FFMPEG / CLIPBATCH_FFPROBE at the binaries`;
      await this.reporter.abort('engine-missing', message);
      onFailure(message);
      return;
    }

    // Step 2: every clip is captioned, so no font means no valid output at all
    const fontPath = resolveFont(this.config.fontCandidates);
    if (!fontPath) {
      const message =
        `No caption font found. Tried:\n` +
        this.config.fontCandidates.map((candidate) => `    ${candidate}`).join('\n') +
        `\n  Set CLIPBATCH_FONT to a .ttf file`;
      await this.reporter.abort('font-missing', message);
      onFailure(message);
      return;
    }
    onLog(`  Caption font: ${fontPath}`);

    // Step 3: inventory
    const files = await this.inventory();
    counters.found = files.length;
    if (files.length === 0) {
      const message = `No ${INPUT_EXTENSION} files found in ${this.config.targetDir}`;
      await this.reporter.abort('no-input', message);
      onFailure(message);
      return;
    }
    onStep(`Found ${files.length} clip(s)`);

    // Step 4: probe
    onStep('Probing clips...');
    const records = await this.probeAll(files);
    const probed = records.filter(isProbed);
    counters.unreadable = records.length - probed.length;

    // Step 5: classify, then one decision for every non-standard clip
    const analyzer = new ClipAnalyzer();
    const classification = analyzer.classify(probed);
    if (classification.nonStandardFrameRate.length > 0) {
      for (const clip of classification.nonStandardFrameRate) {
        onStep(`Non-standard frame rate: ${clip.displayName} (${clip.frameRate} fps)`);
      }
    }
    // A rejected decision (Ctrl-C at the prompt) ends the run before any deletion
    const result = await analyzer.resolve(classification, this.decide, probed);
    counters.excluded = result.excluded.length;
    if (result.decision === 'declined') {
      onStep(`Skipping ${result.excluded.length} non-standard clip(s) this run (files kept)`);
    } else if (result.decision === 'accepted') {
      onStep(`Converting ${result.nonStandardFrameRate.length} clip(s) to the reference frame rate`);
    }

    // Step 6: undersized clips are removed from the input directory
    counters.deleted = await this.deleteUndersized(result.toDelete);

    if (result.toProcess.length === 0) {
      const message = 'No clips left to process after classification';
      await this.reporter.abort('nothing-to-process', message);
      onFailure(message);
      return;
    }

    // Step 7: run-scoped directories, only now that there is work to do
    await this.ensureDirectories();

    // Step 8: transform, strictly one clip at a time
    const transformer = new ClipTransformer(
      { tempDir: this.config.tempDir, ffmpegPath: this.config.ffmpegPath, fontPath },
      this.runner,
      onLog
    );
    const positions = new Map(files.map((file, i) => [file, i + 1]));
    const artifacts: string[] = [];

    for (const [i, clip] of result.toProcess.entries()) {
      onStep(`[${i + 1}/${result.toProcess.length}] ${clip.displayName}`);
      const outcome = await transformer.transform({
        clip,
        window: trimWindow(clip.durationSeconds),
        captionText: clip.captionText,
        skipStabilization: clip.skipStabilization,
        index: positions.get(clip.path) ?? i + 1,
      });

      if (outcome.ok) {
        artifacts.push(outcome.outputPath);
        counters.processed++;
        this.callbacks.onSuccess(`${clip.displayName} -> "${clip.captionText}"`);
      } else {
        counters.transformFailed++;
        await this.reporter.recordFailure(
          'TransformFailure',
          clip.displayName,
          `${outcome.stage}: ${outcome.reason}`,
          outcome.diagnostics
        );
        onFailure(`${clip.displayName} failed at ${outcome.stage}: ${outcome.reason}`);
      }
    }

    // Step 9: group and concatenate
    const groups = groupArtifacts(artifacts);
    const grouper = new ExportGrouper(
      { tempDir: this.config.tempDir, exportDir: this.config.exportDir, ffmpegPath: this.config.ffmpegPath },
      this.runner,
      onLog
    );

    if (groups.length > 0) {
      onStep(`Building ${groups.length} export(s)...`);
    }
    for (const group of groups) {
      const outcome = await grouper.concatenate(group);
      if (outcome.ok) {
        exportPaths.push(outcome.outputPath);
        counters.exports++;
        this.callbacks.onSuccess(`${exportName(group.index)} (${group.artifacts.length} clip(s))`);
      } else {
        await this.reporter.recordFailure(
          'ConcatenationFailure',
          exportName(group.index),
          outcome.reason,
          outcome.diagnostics
        );
        onFailure(`${exportName(group.index)} failed: ${outcome.reason}`);
      }
    }

    if (counters.exports === 0) {
      await this.removeEmptyExportDir();
    }
  }

  private async checkEngine(): Promise<boolean> {
    for (const binary of [this.config.ffmpegPath, this.config.ffprobePath]) {
      try {
        const result = await this.runner(binary, ['-version']);
        if (result.exitCode !== 0) return false;
      } catch {
        return false;
      }
    }
    return true;
  }

  /**
   * Regular, non-hidden .mp4 files in the target directory, sorted by name.
   */
  private async inventory(): Promise<string[]> {
    let entries;
    try {
      entries = await readdir(this.config.targetDir, { withFileTypes: true });
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      throw new BatchPipelineError(
        code === 'ENOENT'
          ? `Directory not found: ${this.config.targetDir}`
          : `Cannot read directory: ${this.config.targetDir} (${code})`,
        'user'
      );
    }

    return entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .filter((entry) => extname(entry.name).toLowerCase() === INPUT_EXTENSION)
      .map((entry) => entry.name)
      // Code-unit order, so grouping does not depend on the host locale
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((name) => join(this.config.targetDir, name));
  }

  private async probeAll(files: string[]): Promise<ClipRecord[]> {
    const probe = new ProbeAdapter(this.runner, this.config.ffprobePath);
    const records: ClipRecord[] = [];

    for (const path of files) {
      const displayName = path.slice(this.config.targetDir.length + 1);
      const { durationSeconds, frameRate } = await probe.probe(path);
      const caption = classifyFilename(displayName);

      if (durationSeconds === null) {
        await this.reporter.recordFailure('ProbeUnreadable', displayName, 'Could not read duration; clip skipped');
        this.callbacks.onFailure(`${displayName}: unreadable, skipped`);
      } else if (frameRate === null) {
        this.callbacks.onLog(`  ${displayName}: frame rate unknown, will be forced to the reference rate`);
      }

      records.push(Object.freeze({ path, displayName, durationSeconds, frameRate, ...caption }));
    }

    return records;
  }

  private async deleteUndersized(clips: ProbedClip[]): Promise<number> {
    let deleted = 0;
    for (const clip of clips) {
      try {
        await unlink(clip.path);
        deleted++;
        this.callbacks.onStep(`Deleted ${clip.displayName} (${clip.durationSeconds.toFixed(1)}s)`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        await this.reporter.recordFailure('FilesystemFailure', clip.displayName, `Delete failed: ${message}`);
        this.callbacks.onFailure(`Could not delete ${clip.displayName}`);
      }
    }
    return deleted;
  }

  private async ensureDirectories(): Promise<void> {
    for (const dir of [this.config.exportDir, this.config.tempDir]) {
      try {
        await mkdir(dir, { recursive: true });
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code === 'EACCES') {
          throw new BatchPipelineError(`Permission denied: cannot create directory: ${dir}`, 'user');
        }
        throw new BatchPipelineError(`Cannot create directory: ${dir} (${code})`, 'system');
      }
    }
    this.tempDirCreated = true;
  }

  private async removeEmptyExportDir(): Promise<void> {
    try {
      await rmdir(this.config.exportDir);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.callbacks.onLog(`  Export directory left in place: ${message}`);
    }
  }
}

// ============================================================================
// Error class with severity for exit code distinction
// ============================================================================

export class BatchPipelineError extends Error {
  public readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'BatchPipelineError';
    this.severity = severity;
  }
}
