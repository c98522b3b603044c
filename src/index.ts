#!/usr/bin/env node
/**
 * CLI entry point.
 *
 *   polyglot-dl <url> [-q 720p] [-o out.mp4] [-l es] [--allow-original] [--burn-subs] [-v]
 */
import { parseArgs } from 'util';
import { resolve as resolvePath } from 'path';
import { homedir } from 'os';
import { loadRunConfig, type RunConfig } from './config.js';
import { logger, setLogLevel } from './utils/logger.js';
import { PlanError, describeError, isCancellation } from './utils/errors.js';
import { looksLikeVideoUrl } from './extraction/ytdlp.js';
import { runDownload } from './pipeline/index.js';
import type { ProgressEvent } from './pipeline/types.js';

const USAGE = `Usage: polyglot-dl <url> [options]

Options:
  -q, --quality <label>   Desired video quality, e.g. 1080p (default: best available)
  -o, --output <path>     Output file (default: OUTPUT_DIR/<title>.<format>)
  -l, --lang <tag>        Preferred spoken language (default: PREFERRED_LANGUAGE or "es")
      --allow-original    Keep the original audio when neither audio nor subtitles match
      --burn-subs         Burn subtitles into the picture instead of adding a soft track
  -v, --verbose           Debug logging
  -h, --help              Show this help`;

function expandHome(p: string): string {
  return p.startsWith('~/') ? resolvePath(homedir(), p.slice(2)) : resolvePath(p);
}

/** Log fetch progress in 10% steps per slot. */
function progressReporter(): (event: ProgressEvent) => void {
  const lastDecile = new Map<string, number>();
  return (event) => {
    if (event.bytesTotal === null || event.bytesTotal === 0) return;
    const decile = Math.floor((event.bytesDone / event.bytesTotal) * 10);
    if ((lastDecile.get(event.slot) ?? -1) >= decile) return;
    lastDecile.set(event.slot, decile);
    logger.info(`Download ${event.slot}: ${decile * 10}%`, { bytes: event.bytesDone, total: event.bytesTotal });
  };
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      quality:          { type: 'string', short: 'q' },
      output:           { type: 'string', short: 'o' },
      lang:             { type: 'string', short: 'l' },
      'allow-original': { type: 'boolean' },
      'burn-subs':      { type: 'boolean' },
      verbose:          { type: 'boolean', short: 'v' },
      help:             { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    process.stdout.write(USAGE + '\n');
    return 0;
  }

  const [url] = positionals;
  if (!url) {
    process.stderr.write(USAGE + '\n');
    return 1;
  }
  if (!looksLikeVideoUrl(url)) {
    logger.error(`The URL "${url}" does not look like a YouTube video URL`);
    return 1;
  }
  if (values.verbose) setLogLevel('debug');

  const overrides: Partial<RunConfig> = {};
  if (values['allow-original']) overrides.allowFallbackToOriginal = true;
  if (values['burn-subs']) overrides.subtitleMode = 'burned-in';
  const config = loadRunConfig(overrides);

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupted, cancelling and cleaning up');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const path = await runDownload(url, values.lang, values.quality, config, {
      destination: values.output ? expandHome(values.output) : undefined,
      signal: controller.signal,
      observer: { onProgress: progressReporter() },
    });
    logger.info(`Success! Video saved to: ${path}`);
    return 0;
  } catch (err) {
    if (isCancellation(err, controller.signal)) {
      logger.warn('Download cancelled; temporary files removed');
      return 130;
    }
    if (err instanceof PlanError) {
      logger.error(err.message, { code: err.code });
      return 2;
    }
    const cause = err instanceof Error && err.cause !== undefined ? describeError(err.cause) : undefined;
    logger.error(describeError(err), cause ? { cause } : undefined);
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('Fatal', { err });
    process.exitCode = 1;
  });
