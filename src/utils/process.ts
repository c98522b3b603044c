/**
 * Subprocess helper shared by the yt-dlp and ffmpeg adapters.
 * Resolves with the exit code and captured output; only a spawn failure
 * (missing binary) or an abort rejects.
 */
import { spawn } from 'child_process';
import { logger } from './logger.js';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  signal?: AbortSignal;
  /** Stop buffering stdout beyond this many characters. */
  maxStdout?: number;
}

const STDERR_TAIL = 4_000;

export function runProcess(
  command: string,
  args: string[],
  label: string,
  opts: RunProcessOptions = {},
): Promise<ProcessResult> {
  logger.debug(`Process [${label}]`, { command, args });
  const { signal, maxStdout = 64 * 1024 * 1024 } = opts;

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], signal });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      if (stdout.length < maxStdout) stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL);
    });

    child.once('error', reject);
    child.once('close', (exitCode) => {
      resolve({ exitCode, stdout, stderr: stderr.trim() });
    });
  });
}
