#!/usr/bin/env node
/**
 * clipbatch CLI - Normalize a folder of clips into captioned compilations
 *
 * Usage:
 *   clipbatch [run] [directory] [options]
 *   clipbatch doctor
 *
 * A run:
 *   1. Probes every .mp4 in the directory (duration, frame rate)
 *   2. Deletes clips shorter than 5s
 *   3. Asks once whether to convert clips that are not 59.94 fps (--yes skips)
 *   4. Trims, stabilizes, captions and normalizes each clip to 1080p59.94
 *   5. Joins the results three at a time into exports-<stamp>/export_NNN.mp4
 */

import { existsSync, statSync } from 'fs';
import { Command } from 'commander';
import { ZodError } from 'zod';
import {
  BatchPipeline,
  BatchPipelineError,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  EXIT_SYSTEM_ERROR,
  EXIT_SIGINT,
  exitCodeFor,
} from './BatchPipeline';
import { runDoctorChecks } from './doctor';
import { DecisionInterruptedError } from '../main/pipeline';
import { createRunConfig, type RunConfig } from '../shared/config';
import type { RunSummary } from '../shared/types';

const VERSION = process.env.npm_package_version ?? '0.1.0';

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  warn: '⚠',     // warning sign
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  line: '─',     // horizontal line
} as const;

const COLORS = {
  green: '\u001b[32m',
  red: '\u001b[31m',
  yellow: '\u001b[33m',
  reset: '\u001b[0m',
} as const;

const useColor = process.stdout.isTTY === true && !process.env.NO_COLOR;

function paint(color: keyof typeof COLORS, text: string): string {
  return useColor ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function banner(): void {
  console.log();
  console.log(`  clipbatch v${VERSION} ${SYMBOLS.bullet} batch mode`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${paint('green', SYMBOLS.check)} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${paint('red', SYMBOLS.cross)} ${message}`);
}

function warn(message: string): void {
  console.log(`  ${paint('yellow', SYMBOLS.warn)} ${message}`);
}

function printSummary(summary: RunSummary): void {
  const { counters } = summary;
  console.log();
  switch (summary.status) {
    case 'completed':
      success('Batch complete!');
      break;
    case 'degraded':
      warn(`Batch complete with ${summary.failures.length} failure(s)`);
      break;
    case 'failed':
      fail('Batch produced no exports');
      break;
    case 'aborted':
      fail(`Batch aborted (${summary.abortReason ?? 'unknown'})`);
      break;
  }
  console.log();
  console.log(`  Clips found:        ${counters.found}`);
  console.log(`  Unreadable:         ${counters.unreadable}`);
  console.log(`  Deleted (< 5s):     ${counters.deleted}`);
  console.log(`  Skipped (fps):      ${counters.excluded}`);
  console.log(`  Processed:          ${counters.processed}`);
  console.log(`  Failed:             ${counters.transformFailed}`);
  console.log(`  Exports:            ${counters.exports}`);
  console.log(`  Processing time:    ${summary.durationSeconds.toFixed(1)}s`);
  console.log();
  if (counters.exports > 0) {
    console.log(`  Exports: ${summary.exportDir}`);
  }
  if (summary.failures.length > 0 || summary.status === 'aborted') {
    console.log(`  Log:     ${summary.logPath}`);
  }
  console.log();
}

// ============================================================================
// Signal handling
// ============================================================================

let activePipeline: BatchPipeline | null = null;

function setupSignalHandlers(): void {
  const handler = async () => {
    console.log('\n  Interrupted — cleaning up...');
    if (activePipeline) {
      await activePipeline.abort();
    }
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

function buildConfig(options: { directory: string; yes: boolean; verbose: boolean }): RunConfig {
  try {
    return createRunConfig(options);
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        fail(`${issue.path.join('.') || 'options'}: ${issue.message}`);
      }
      process.exit(EXIT_USER_ERROR);
    }
    throw error;
  }
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('clipbatch')
  .description('Trim, stabilize and caption short clips, then join them into compilations')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

program
  .command('run', { isDefault: true })
  .description('Process every .mp4 clip in a directory')
  .argument('[directory]', 'Directory containing the clips', '.')
  .option('-y, --yes', 'Convert clips with a non-standard frame rate without asking', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (directory: string, options: { yes: boolean; verbose: boolean }) => {
    banner();

    const config = buildConfig({ directory, yes: options.yes, verbose: options.verbose });

    if (!existsSync(config.targetDir) || !statSync(config.targetDir).isDirectory()) {
      fail(`Directory not found: ${config.targetDir}`);
      process.exit(EXIT_USER_ERROR);
    }

    step(`Clips:   ${config.targetDir}`);
    step(`Exports: ${config.exportDir}`);
    console.log();

    const pipeline = new BatchPipeline(config, {}, {
      onLog: options.verbose ? step : () => {},
      onStep: step,
      onSuccess: success,
      onFailure: fail,
    });

    activePipeline = pipeline;

    try {
      const summary = await pipeline.run();
      printSummary(summary);
      process.exit(exitCodeFor(summary));
    } catch (error) {
      console.log();
      if (error instanceof DecisionInterruptedError) {
        fail('Interrupted, nothing was deleted or converted');
        process.exit(EXIT_SIGINT);
      }
      const message = error instanceof Error ? error.message : String(error);
      fail(`Batch failed: ${message}`);

      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }

      const exitCode =
        error instanceof BatchPipelineError && error.severity === 'user'
          ? EXIT_USER_ERROR
          : EXIT_SYSTEM_ERROR;
      process.exit(exitCode);
    } finally {
      activePipeline = null;
    }
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check that ffmpeg, its filters and a caption font are available')
  .action(async () => {
    banner();

    const config = buildConfig({ directory: '.', yes: false, verbose: false });
    const result = await runDoctorChecks(config);

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);

      if (check.hint && check.status !== 'pass') {
        for (const hintLine of check.hint.split('\n')) {
          console.log(`      ${hintLine}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_SYSTEM_ERROR : EXIT_SUCCESS);
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  fail(message);
  process.exit(EXIT_SYSTEM_ERROR);
});
