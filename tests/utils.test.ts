import { afterEach, describe, expect, test, vi } from 'vitest';

import { loadRunConfig } from '../src/config.js';
import { outputFileName, sanitizeFilename } from '../src/utils/filename.js';
import { withRetry } from '../src/utils/retry.js';
import { logger, setLogLevel } from '../src/utils/logger.js';
import { AssemblyError, TransportError, isCancellation } from '../src/utils/errors.js';

describe('filenames', () => {
  test('strips reserved characters and collapses whitespace', () => {
    expect(sanitizeFilename('What? A "Test": 1/2 <ok>|*')).toBe('What A Test 12 ok');
    expect(sanitizeFilename('  My \t  Clip  ')).toBe('My Clip');
  });

  test('falls back to the media id, then a fixed name', () => {
    expect(outputFileName('Demo: clip', 'abc', 'mp4')).toBe('Demo clip.mp4');
    expect(outputFileName(null, 'abc', 'mkv')).toBe('abc.mkv');
    expect(outputFileName('???', '', 'mp4')).toBe('video.mp4');
  });
});

describe('withRetry', () => {
  test('retries until success', async () => {
    const attempts: number[] = [];
    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return 'done';
    }, { maxAttempts: 3, baseDelayMs: 0 });

    expect(result).toBe('done');
    expect(attempts).toEqual([1, 2, 3]);
  });

  test('stops at errors that are not retryable', async () => {
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error('permanent');
    }, { maxAttempts: 5, baseDelayMs: 0, isRetryable: () => false })).rejects.toThrow('permanent');
    expect(calls).toBe(1);
  });

  test('rethrows the last error once attempts run out', async () => {
    const retried: number[] = [];
    await expect(withRetry(async (attempt) => {
      throw new Error(`fail ${attempt}`);
    }, { maxAttempts: 2, baseDelayMs: 0, onRetry: (attempt) => retried.push(attempt) })).rejects.toThrow('fail 2');
    expect(retried).toEqual([1]);
  });

  test('does not start once aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      return 1;
    }, { maxAttempts: 3, signal: controller.signal })).rejects.toThrow('stop');
    expect(calls).toBe(0);
  });
});

describe('loadRunConfig', () => {
  test('applies overrides on top of the environment', () => {
    const config = loadRunConfig({ preferredLanguage: 'pt-BR', retryBudget: 5, subtitleMode: 'burned-in' });
    expect(config).toMatchObject({ preferredLanguage: 'pt-BR', retryBudget: 5, subtitleMode: 'burned-in' });
  });

  test('rejects invalid values', () => {
    expect(() => loadRunConfig({ retryBudget: 0 })).toThrow(/^Invalid run configuration: retryBudget/);
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('error');
  });

  test('writes errors to stderr and everything else to stdout', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLogLevel('debug');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(stdout.mock.calls.map(([line]) => String(line).replace(/^\[[^\]]+\] /, ''))).toEqual([
      '[DEBUG] d\n',
      '[INFO] i\n',
      '[WARN] w\n',
    ]);
    expect(stderr.mock.calls.map(([line]) => String(line).replace(/^\[[^\]]+\] /, ''))).toEqual(['[ERROR] e\n']);
  });

  test('drops messages below the level', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setLogLevel('warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(stdout).toHaveBeenCalledTimes(1);
  });
});

describe('isCancellation', () => {
  test('recognizes a cancelled assembly', () => {
    const cancelled = new AssemblyError({ step: 'fetch', stepIndex: 0, slot: 'video', cause: new Error('aborted'), cancelled: true });
    const failed = new AssemblyError({ step: 'fetch', stepIndex: 0, slot: 'video', cause: new Error('HTTP 404') });

    expect(isCancellation(cancelled)).toBe(true);
    expect(isCancellation(failed)).toBe(false);
  });

  test('treats any failure after the signal fired as a cancellation', () => {
    const controller = new AbortController();
    const err = new TransportError('Request for v1 failed: socket hang up', { transient: true });

    expect(isCancellation(err, controller.signal)).toBe(false);
    controller.abort();
    expect(isCancellation(err, controller.signal)).toBe(true);
  });
});
