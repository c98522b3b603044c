/**
 * Catalog extraction through yt-dlp. Each configured browser's cookies are
 * tried in turn (for age-gated or members-only videos), then no cookies.
 */
import type { RenditionCatalog } from '../catalog/model.js';
import { logger } from '../utils/logger.js';
import { ExtractionError, describeError } from '../utils/errors.js';
import { runProcess, type ProcessResult } from '../utils/process.js';
import { catalogFromYtDlp } from './normalize.js';

export interface CatalogExtractor {
  fetchCatalog(url: string, signal?: AbortSignal): Promise<RenditionCatalog>;
}

const VIDEO_URL = /^(https?:\/\/)?(www\.|m\.)?(youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/shorts\/|youtube\.com\/live\/)[\w-]+/;

/** Cheap sanity check before spawning yt-dlp. */
export function looksLikeVideoUrl(url: string): boolean {
  return VIDEO_URL.test(url.trim());
}

export interface YtDlpExtractorOptions {
  ytDlpPath?: string;
  cookieBrowsers?: string[];
}

export class YtDlpExtractor implements CatalogExtractor {
  private readonly ytDlpPath: string;
  private readonly cookieBrowsers: string[];

  constructor(opts: YtDlpExtractorOptions = {}) {
    this.ytDlpPath = opts.ytDlpPath ?? 'yt-dlp';
    this.cookieBrowsers = opts.cookieBrowsers ?? [];
  }

  async fetchCatalog(url: string, signal?: AbortSignal): Promise<RenditionCatalog> {
    const info = await this.dumpJson(url, signal);
    const catalog = catalogFromYtDlp(info);
    logger.info('yt-dlp: catalog extracted', {
      mediaId: catalog.mediaId,
      video: catalog.videoStreams.length,
      audio: catalog.audioStreams.length,
      subtitles: catalog.subtitleTracks.length,
    });
    return catalog;
  }

  private async dumpJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const baseArgs = ['--dump-json', '--no-playlist', '--no-warnings'];

    for (const browser of this.cookieBrowsers) {
      const result = await this.run([...baseArgs, '--cookies-from-browser', browser, url], signal);
      if (result.exitCode === 0) {
        logger.debug('yt-dlp: metadata fetched with browser cookies', { browser });
        return this.parse(result.stdout);
      }
      logger.debug('yt-dlp: browser cookies unavailable', { browser, stderr: lastLine(result.stderr) });
    }

    if (this.cookieBrowsers.length > 0) {
      logger.info('yt-dlp: no browser cookies worked, trying without cookies');
    }
    const result = await this.run([...baseArgs, url], signal);
    if (result.exitCode !== 0) {
      throw new ExtractionError(`yt-dlp could not read ${url}: ${lastLine(result.stderr)}`, result.stderr);
    }
    return this.parse(result.stdout);
  }

  private async run(args: string[], signal?: AbortSignal): Promise<ProcessResult> {
    try {
      return await runProcess(this.ytDlpPath, args, 'yt-dlp dump-json', { signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ExtractionError(`Could not start yt-dlp (${this.ytDlpPath}): ${describeError(err)}`, '', err);
    }
  }

  private parse(stdout: string): unknown {
    try {
      return JSON.parse(stdout);
    } catch (err) {
      throw new ExtractionError('yt-dlp returned invalid JSON', stdout.slice(0, 500), err);
    }
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}
