/**
 * doctor.ts - Environment health check for the clipbatch CLI
 *
 * Checks that everything a run needs is present:
 * - Node.js version compatibility
 * - ffmpeg / ffprobe on PATH (or the CLIPBATCH_* overrides)
 * - the vidstab and drawtext filters compiled into ffmpeg
 * - a caption font
 */

import { execFile as execFileCb } from 'child_process';
import { resolveFont } from '../main/pipeline/ClipTransformer';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  ffmpegPath: string;
  ffprobePath: string;
  fontCandidates: readonly string[];
}

/** Filters the transform pipeline cannot run without */
export const REQUIRED_FILTERS = ['vidstabdetect', 'vidstabtransform', 'drawtext'] as const;

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Safe child environment -- only expose PATH and essential vars.
 */
const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
};

/**
 * Execute a command and return stdout, or null on failure.
 */
function execQuiet(command: string, args: string[]): Promise<string | null> {
  return new Promise((resolve) => {
    execFileCb(command, args, { env: SAFE_CHILD_ENV, maxBuffer: 8 * 1024 * 1024 }, (error, stdout) => {
      if (error) {
        resolve(null);
      } else {
        resolve(stdout?.toString().trim() ?? '');
      }
    });
  });
}

export function installHint(): string {
  return process.platform === 'darwin'
    ? 'brew install ffmpeg'
    : process.platform === 'win32'
      ? 'winget install ffmpeg (or download from https://ffmpeg.org)'
      : 'apt install ffmpeg (or your package manager)';
}

/**
 * Names of the filters listed by `ffmpeg -filters`.
 */
export function parseFilterNames(output: string): Set<string> {
  const names = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    // " T.C vidstabdetect     V->V       Extract relative transformations..."
    const match = line.match(/^\s*[A-Z.|]{2,3}\s+(\S+)\s+\S+->\S+/);
    if (match) names.add(match[1]);
  }
  return names;
}

// ============================================================================
// Check functions
// ============================================================================

async function checkNodeVersion(): Promise<DoctorCheck> {
  const version = process.version; // e.g. "v20.11.0"
  const major = Number(version.replace(/^v/, '').split('.')[0]);

  if (!Number.isFinite(major)) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `clipbatch requires Node.js >= ${MIN_NODE_MAJOR}`,
    };
  }

  if (major >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR})` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `clipbatch requires Node.js >= ${MIN_NODE_MAJOR}. Upgrade at https://nodejs.org`,
  };
}

async function checkBinary(name: 'ffmpeg' | 'ffprobe', path: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(path, ['-version']);

  if (stdout === null) {
    return {
      name,
      status: 'fail',
      message: `Not found (${path})`,
      hint:
        name === 'ffmpeg'
          ? `Install via: ${installHint()}`
          : 'ffprobe is usually installed alongside ffmpeg',
    };
  }

  // First line looks like "ffmpeg version 6.1.1 ..."
  const versionMatch = stdout.match(new RegExp(`${name} version (\\S+)`));
  const version = versionMatch ? versionMatch[1] : 'unknown';

  return { name, status: 'pass', message: `Installed (${version})` };
}

async function checkFilters(ffmpegPath: string): Promise<DoctorCheck> {
  const stdout = await execQuiet(ffmpegPath, ['-hide_banner', '-filters']);

  if (stdout === null) {
    return {
      name: 'ffmpeg filters',
      status: 'warn',
      message: 'Could not list filters',
    };
  }

  const available = parseFilterNames(stdout);
  const missing = REQUIRED_FILTERS.filter((filter) => !available.has(filter));

  if (missing.length > 0) {
    return {
      name: 'ffmpeg filters',
      status: 'fail',
      message: `Missing: ${missing.join(', ')}`,
      hint: 'Use an ffmpeg build configured with --enable-libvidstab and --enable-libfreetype',
    };
  }

  return { name: 'ffmpeg filters', status: 'pass', message: REQUIRED_FILTERS.join(', ') };
}

async function checkFont(candidates: readonly string[]): Promise<DoctorCheck> {
  const font = resolveFont(candidates);

  if (!font) {
    return {
      name: 'Caption font',
      status: 'fail',
      message: 'No candidate font file exists',
      hint: 'Set CLIPBATCH_FONT to the path of a .ttf file',
    };
  }

  return { name: 'Caption font', status: 'pass', message: font };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(options: DoctorOptions): Promise<DoctorResult> {
  const checks = await Promise.all([
    checkNodeVersion(),
    checkBinary('ffmpeg', options.ffmpegPath),
    checkBinary('ffprobe', options.ffprobePath),
    checkFilters(options.ffmpegPath),
    checkFont(options.fontCandidates),
  ]);

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
