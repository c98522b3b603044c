#!/usr/bin/env tsx
/**
 * Pre-flight environment validation.
 * Checks configuration variables, the external tools and the local directories.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { existsSync, accessSync, constants } from 'fs';
import { dirname } from 'path';
import { env, TOOLS } from '../src/config.js';
import { runProcess } from '../src/utils/process.js';
import { describeError } from '../src/utils/errors.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== polyglot-dl: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

function showSetting(label: string, value: string | number | boolean | undefined, defaultNote: string): void {
  const isDefault = process.env[label] === undefined;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${value ?? defaultNote}${isDefault ? '  (default)' : ''}`);
}

showSetting('PREFERRED_LANGUAGE',         env.PREFERRED_LANGUAGE,         'es');
showSetting('REQUESTED_QUALITY',          env.REQUESTED_QUALITY,          'best');
showSetting('ALLOW_FALLBACK_TO_ORIGINAL', env.ALLOW_FALLBACK_TO_ORIGINAL, 'false');
showSetting('SUBTITLE_MODE',              env.SUBTITLE_MODE,              'soft');
showSetting('OUTPUT_FORMAT',              env.OUTPUT_FORMAT,              'mp4');
showSetting('RETRY_BUDGET',               env.RETRY_BUDGET,               '3');
showSetting('PARALLEL_FETCH',             env.PARALLEL_FETCH,             'true');
showSetting('HTTP_IDLE_TIMEOUT_MS',       env.HTTP_IDLE_TIMEOUT_MS,       '30000');
showSetting('LOG_LEVEL',                  env.LOG_LEVEL,                  'info');
console.log(`  ${YELLOW}○${RESET} COOKIE_BROWSERS  ${TOOLS.cookieBrowsers.join(', ') || '(none)'}`);

// ── Section: External tools ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] External tools${RESET}`);

async function checkTool(label: string, command: string, args: string[], hint: string): Promise<void> {
  try {
    const result = await runProcess(command, args, `${label} version`);
    if (result.exitCode === 0) {
      pass(label, result.stdout.split('\n')[0]?.trim() ?? '');
    } else {
      fail(`${label} exited with ${result.exitCode ?? 'a signal'}`, hint);
      anyRequiredFailed = true;
    }
  } catch (err) {
    fail(`${label} not found (${command}): ${describeError(err)}`, hint);
    anyRequiredFailed = true;
  }
}

await checkTool('yt-dlp', TOOLS.ytDlp, ['--version'], 'Install yt-dlp (https://github.com/yt-dlp/yt-dlp#installation), or set YTDLP_PATH');
await checkTool('ffmpeg', TOOLS.ffmpeg, ['-version'], 'Install ffmpeg from your package manager, or set FFMPEG_PATH');

// ── Section: Directories ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Directories${RESET}`);

function checkWritableDir(label: string, dirPath: string): void {
  // A missing directory is created on first use if its parent is writable.
  const target = existsSync(dirPath) ? dirPath : dirname(dirPath);
  try {
    accessSync(target, constants.W_OK);
    pass(label, existsSync(dirPath) ? dirPath : `${dirPath} (will be created)`);
  } catch {
    fail(`${label} not writable: ${dirPath}`, `Create it: mkdir -p "${dirPath}"`);
    anyRequiredFailed = true;
  }
}

checkWritableDir('OUTPUT_DIR', env.OUTPUT_DIR);
checkWritableDir('TEMP_DIR',   env.TEMP_DIR);

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight check failed.${RESET} Fix the items above and re-run.\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
}
