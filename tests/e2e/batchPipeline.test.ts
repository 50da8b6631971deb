/**
 * BatchPipeline end-to-end tests
 *
 * A real temp directory of placeholder .mp4 files and a fake CommandRunner
 * standing in for ffmpeg / ffprobe. The fake answers probes from a table
 * keyed by file name and writes every output file ffmpeg would produce, so
 * deletions, exports and temp cleanup are all checked on disk.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';

import { BatchPipeline, exitCodeFor, EXIT_PARTIAL, EXIT_SYSTEM_ERROR, EXIT_USER_ERROR } from '../../src/cli/BatchPipeline';
import { createRunConfig, type RunConfig } from '../../src/shared/config';
import type { CommandResult, CommandRunner } from '../../src/main/pipeline/ProcessRunner';
import { DecisionInterruptedError, type DecisionSource } from '../../src/main/pipeline/DecisionSource';

// ============================================================================
// Fixtures
// ============================================================================

interface FakeClip {
  /** null makes the duration probe fail */
  duration: number | null;
  rate: string;
}

const NOW = new Date('2026-05-06T07:08:09.000Z');
const STAMP = '20260506-070809';

const OK: CommandResult = { exitCode: 0, stdout: '', stderr: '' };

let targetDir: string;
let fontDir: string;
let fontPath: string;

interface FakeEngine {
  runner: Mock<CommandRunner>;
  manifests: string[];
}

function fakeEngine(
  clips: Record<string, FakeClip>,
  options: { failEncodeFor?: string[]; missing?: boolean; failConcatFor?: string[]; vanishOnProbe?: string[] } = {}
): FakeEngine {
  const manifests: string[] = [];

  const runner = vi.fn<CommandRunner>(async (command, args) => {
    if (options.missing) {
      throw Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
    }
    if (args[0] === '-version') return OK;

    const last = args[args.length - 1];

    if (command === 'ffprobe') {
      const clip = clips[basename(last)];
      if (options.vanishOnProbe?.includes(basename(last))) {
        // Removed by something else between probe and delete
        await rm(last, { force: true });
      }
      if (args.includes('format=duration')) {
        return clip.duration === null
          ? { exitCode: 1, stdout: '', stderr: 'Invalid data found when processing input' }
          : { exitCode: 0, stdout: `${clip.duration}\n`, stderr: '' };
      }
      return { exitCode: 0, stdout: `${clip.rate}\n`, stderr: '' };
    }

    if (args.includes('concat')) {
      manifests.push(await readFile(args[args.indexOf('-i') + 1], 'utf-8'));
      if (options.failConcatFor?.includes(basename(last))) return { exitCode: 1, stdout: '', stderr: 'Non-monotonic DTS\n' };
      await writeFile(last, 'export');
      return OK;
    }

    // Stabilization detect pass writes to the null muxer
    if (last === '-') return OK;

    const input = basename(args[args.indexOf('-i') + 1]);
    if (options.failEncodeFor?.includes(input)) {
      await writeFile(last, 'partial');
      return { exitCode: 1, stdout: '', stderr: 'Error while filtering\n' };
    }
    await writeFile(last, `encoded ${input}`);
    return OK;
  });

  return { runner, manifests };
}

function decision(answer: boolean) {
  const confirm = vi.fn(async (_question: string) => answer);
  return { confirm } satisfies DecisionSource;
}

async function createClips(names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(join(targetDir, name), 'placeholder');
  }
}

function configFor(overrides: Partial<RunConfig> = {}): RunConfig {
  return { ...createRunConfig({ directory: targetDir }, { CLIPBATCH_FONT: fontPath }, NOW), ...overrides };
}

const STANDARD = '60000/1001';

const MIXED: Record<string, FakeClip> = {
  'Sunset-Beach_1.mp4': { duration: 12, rate: STANDARD },
  'short_1.mp4': { duration: 3, rate: STANDARD },
  'broken.mp4': { duration: null, rate: STANDARD },
  'Cliff-Walk_2NoStable.mp4': { duration: 8, rate: STANDARD },
  'Hills_3.mp4': { duration: 20, rate: '30000/1001' },
  'Lake_4.mp4': { duration: 15, rate: STANDARD },
};

// Inventory order (positions 1-6, code-unit sort): Cliff-Walk, Hills, Lake, Sunset-Beach, broken, short

beforeEach(async () => {
  targetDir = await mkdtemp(join(tmpdir(), 'clipbatch-e2e-'));
  fontDir = await mkdtemp(join(tmpdir(), 'clipbatch-font-'));
  fontPath = join(fontDir, 'Caption.ttf');
  await writeFile(fontPath, 'font');
});

afterEach(async () => {
  await rm(targetDir, { recursive: true, force: true });
  await rm(fontDir, { recursive: true, force: true });
});

// ============================================================================
// Early aborts
// ============================================================================

describe('BatchPipeline aborts', () => {
  it('aborts with no-input on a directory without clips', async () => {
    await writeFile(join(targetDir, 'notes.txt'), 'not a clip');
    await writeFile(join(targetDir, '.hidden.mp4'), 'hidden');
    const { runner } = fakeEngine({});

    const summary = await new BatchPipeline(configFor(), { runner, decide: decision(true) }).run();

    expect(summary.status).toBe('aborted');
    expect(summary.abortReason).toBe('no-input');
    expect(exitCodeFor(summary)).toBe(EXIT_USER_ERROR);
    expect(existsSync(join(targetDir, `exports-${STAMP}`))).toBe(false);
    expect(existsSync(join(targetDir, `.clipbatch-tmp-${STAMP}`))).toBe(false);
    expect(await readFile(join(targetDir, `clipbatch-${STAMP}.log`), 'utf-8')).toContain('\tRunAborted\tno-input\t');
  });

  it('aborts with engine-missing when ffmpeg cannot be started', async () => {
    await createClips(['Lake_4.mp4']);
    const { runner } = fakeEngine({}, { missing: true });

    const summary = await new BatchPipeline(configFor(), { runner, decide: decision(true) }).run();

    expect(summary.abortReason).toBe('engine-missing');
    expect(exitCodeFor(summary)).toBe(EXIT_SYSTEM_ERROR);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('aborts with font-missing before touching any clip', async () => {
    await createClips(['short_1.mp4']);
    const { runner } = fakeEngine({ 'short_1.mp4': { duration: 3, rate: STANDARD } });
    const config = configFor({ fontCandidates: [join(fontDir, 'missing.ttf')] });

    const summary = await new BatchPipeline(config, { runner, decide: decision(true) }).run();

    expect(summary.abortReason).toBe('font-missing');
    expect(existsSync(join(targetDir, 'short_1.mp4'))).toBe(true);
    expect(runner.mock.calls.map(([command]) => command)).toEqual(['ffmpeg', 'ffprobe']);
  });

  it('aborts with nothing-to-process when every clip is too short', async () => {
    await createClips(['a_1.mp4', 'b_2.mp4']);
    const { runner } = fakeEngine({
      'a_1.mp4': { duration: 4.99, rate: STANDARD },
      'b_2.mp4': { duration: 1, rate: STANDARD },
    });

    const summary = await new BatchPipeline(configFor(), { runner, decide: decision(true) }).run();

    expect(summary.abortReason).toBe('nothing-to-process');
    expect(summary.counters.deleted).toBe(2);
    expect(await readdir(targetDir)).toEqual([`clipbatch-${STAMP}.log`]);
  });
});

// ============================================================================
// Full runs
// ============================================================================

describe('BatchPipeline runs', () => {
  it('declining the frame-rate gate skips those clips but keeps the files', async () => {
    await createClips(Object.keys(MIXED));
    const { runner, manifests } = fakeEngine(MIXED);
    const decide = decision(false);
    const config = configFor();

    const summary = await new BatchPipeline(config, { runner, decide }).run();

    expect(decide.confirm).toHaveBeenCalledTimes(1);
    expect(decide.confirm).toHaveBeenCalledWith(
      '1 clip(s) are not 59.94 fps (found: 29.97). Convert them to 59.94 fps and include them?'
    );
    expect(summary.counters).toEqual({
      found: 6,
      unreadable: 1,
      deleted: 1,
      excluded: 1,
      processed: 3,
      transformFailed: 0,
      exports: 1,
    });
    // broken.mp4 is logged, so the run is degraded rather than completed
    expect(summary.status).toBe('degraded');
    expect(exitCodeFor(summary)).toBe(EXIT_PARTIAL);
    expect(summary.failures.map((f) => [f.kind, f.subject])).toEqual([['ProbeUnreadable', 'broken.mp4']]);

    expect(existsSync(join(targetDir, 'short_1.mp4'))).toBe(false);
    expect(existsSync(join(targetDir, 'Hills_3.mp4'))).toBe(true);

    expect(manifests).toEqual([
      [
        `file '${join(config.tempDir, 'clip_001.mp4')}'`,
        `file '${join(config.tempDir, 'clip_003.mp4')}'`,
        `file '${join(config.tempDir, 'clip_004.mp4')}'`,
        '',
      ].join('\n'),
    ]);
    expect(summary.exportPaths).toEqual([join(config.exportDir, 'export_001.mp4')]);
    expect(await readdir(config.exportDir)).toEqual(['export_001.mp4']);
    expect(existsSync(config.tempDir)).toBe(false);
  });

  it('accepting the gate converts the clips and keeps inventory order', async () => {
    await createClips(Object.keys(MIXED));
    const { runner, manifests } = fakeEngine(MIXED);
    const config = configFor();

    const summary = await new BatchPipeline(config, { runner, decide: decision(true) }).run();

    expect(summary.counters.processed).toBe(4);
    expect(summary.counters.exports).toBe(2);
    expect(manifests.map((manifest) => manifest.trim().split('\n').map((line) => basename(line.slice(6, -1))))).toEqual([
      ['clip_001.mp4', 'clip_002.mp4', 'clip_003.mp4'],
      ['clip_004.mp4'],
    ]);
    expect((await readdir(config.exportDir)).sort()).toEqual(['export_001.mp4', 'export_002.mp4']);
  });

  it('skips stabilization for NoStable clips', async () => {
    await createClips(Object.keys(MIXED));
    const { runner } = fakeEngine(MIXED);

    await new BatchPipeline(configFor(), { runner, decide: decision(true) }).run();

    const detectInputs = runner.mock.calls
      .filter(([, args]) => args[args.length - 1] === '-')
      .map(([, args]) => basename(args[args.indexOf('-i') + 1]));
    expect(detectInputs).toEqual(['Hills_3.mp4', 'Lake_4.mp4', 'Sunset-Beach_1.mp4']);
  });

  it('leaves a failed clip out of the exports and logs it', async () => {
    await createClips(Object.keys(MIXED));
    const { runner, manifests } = fakeEngine(MIXED, { failEncodeFor: ['Lake_4.mp4'] });
    const config = configFor();

    const summary = await new BatchPipeline(config, { runner, decide: decision(true) }).run();

    expect(summary.counters.processed).toBe(3);
    expect(summary.counters.transformFailed).toBe(1);
    expect(summary.counters.exports).toBe(1);
    expect(manifests[0]).not.toContain('clip_003.mp4');
    expect(summary.failures.map((f) => [f.kind, f.subject, f.message])).toEqual([
      ['ProbeUnreadable', 'broken.mp4', 'Could not read duration; clip skipped'],
      ['TransformFailure', 'Lake_4.mp4', 'stabilize-transform: ffmpeg exited with code 1'],
    ]);
    expect(existsSync(config.tempDir)).toBe(false);
  });

  it('reports failed and removes the export directory when nothing is exported', async () => {
    await createClips(['Lake_4.mp4']);
    const { runner } = fakeEngine({ 'Lake_4.mp4': MIXED['Lake_4.mp4'] }, { failConcatFor: ['export_001.mp4'] });
    const config = configFor();

    const summary = await new BatchPipeline(config, { runner, decide: decision(true) }).run();

    expect(summary.status).toBe('failed');
    expect(exitCodeFor(summary)).toBe(EXIT_SYSTEM_ERROR);
    expect(summary.failures.map((f) => f.kind)).toEqual(['ConcatenationFailure']);
    expect(existsSync(config.exportDir)).toBe(false);
    expect(existsSync(config.tempDir)).toBe(false);
    expect(existsSync(join(targetDir, 'Lake_4.mp4'))).toBe(true);
  });

  it('keeps building later exports after one group fails to merge', async () => {
    const clips: Record<string, FakeClip> = {
      'A_1.mp4': { duration: 12, rate: STANDARD },
      'B_2.mp4': { duration: 12, rate: STANDARD },
      'C_3.mp4': { duration: 12, rate: STANDARD },
      'D_4.mp4': { duration: 12, rate: STANDARD },
    };
    await createClips(Object.keys(clips));
    const { runner, manifests } = fakeEngine(clips, { failConcatFor: ['export_001.mp4'] });
    const config = configFor();

    const summary = await new BatchPipeline(config, { runner, decide: decision(true) }).run();

    expect(manifests).toHaveLength(2);
    expect(summary.status).toBe('degraded');
    expect(summary.counters.exports).toBe(1);
    expect(summary.exportPaths).toEqual([join(config.exportDir, 'export_002.mp4')]);
    expect(await readdir(config.exportDir)).toEqual(['export_002.mp4']);
    expect(summary.failures.map((f) => [f.kind, f.subject])).toEqual([['ConcatenationFailure', 'export_001.mp4']]);
  });

  it('keeps deleting short clips after one delete fails', async () => {
    const clips: Record<string, FakeClip> = {
      'Lake_4.mp4': MIXED['Lake_4.mp4'],
      'a_1.mp4': { duration: 2, rate: STANDARD },
      'b_2.mp4': { duration: 3, rate: STANDARD },
    };
    await createClips(Object.keys(clips));
    const { runner } = fakeEngine(clips, { vanishOnProbe: ['a_1.mp4'] });

    const summary = await new BatchPipeline(configFor(), { runner, decide: decision(true) }).run();

    expect(summary.counters.deleted).toBe(1);
    expect(existsSync(join(targetDir, 'b_2.mp4'))).toBe(false);
    expect(existsSync(join(targetDir, 'Lake_4.mp4'))).toBe(true);
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].kind).toBe('FilesystemFailure');
    expect(summary.failures[0].subject).toBe('a_1.mp4');
    expect(summary.failures[0].message.startsWith('Delete failed: ENOENT')).toBe(true);
    expect(summary.status).toBe('degraded');
  });

  it('stops before deleting anything when the frame-rate prompt is interrupted', async () => {
    await createClips(Object.keys(MIXED));
    const { runner } = fakeEngine(MIXED);
    const decide = {
      confirm: vi.fn(async (_question: string): Promise<boolean> => {
        throw new DecisionInterruptedError();
      }),
    } satisfies DecisionSource;
    const config = configFor();

    await expect(new BatchPipeline(config, { runner, decide }).run()).rejects.toBeInstanceOf(
      DecisionInterruptedError
    );

    expect(existsSync(join(targetDir, 'short_1.mp4'))).toBe(true);
    expect(existsSync(config.exportDir)).toBe(false);
    expect(existsSync(config.tempDir)).toBe(false);
    expect(runner.mock.calls.filter(([command, args]) => command === 'ffmpeg' && args[0] !== '-version')).toEqual([]);
  });

  it('completes cleanly when every clip is standard', async () => {
    await createClips(['Lake_4.mp4', 'Sunset-Beach_1.mp4']);
    const { runner } = fakeEngine(MIXED);
    const decide = decision(false);

    const summary = await new BatchPipeline(configFor(), { runner, decide }).run();

    expect(summary.status).toBe('completed');
    expect(exitCodeFor(summary)).toBe(0);
    expect(decide.confirm).not.toHaveBeenCalled();
    expect(existsSync(join(targetDir, `clipbatch-${STAMP}.log`))).toBe(false);
  });
});
