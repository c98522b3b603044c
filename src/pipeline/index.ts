/**
 * Pipeline orchestrator: extraction → language resolution → planning →
 * execution for one media item. Called by the CLI.
 */
import { join } from 'path';
import { TOOLS, TRANSPORT, type RunConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { outputFileName } from '../utils/filename.js';
import { YtDlpExtractor, type CatalogExtractor } from '../extraction/ytdlp.js';
import { HttpTransport } from '../transport/http.js';
import type { Transport } from '../transport/types.js';
import { FfmpegMuxer } from '../media/ffmpeg.js';
import type { MediaMuxer } from '../media/types.js';
import { resolve } from './resolver.js';
import { describePlan, plan as planAssembly } from './planner.js';
import { AssemblyExecutor } from './executor.js';
import type { Advisory, RunObserver, SelectionDecision } from './types.js';

export interface PipelineDeps {
  extractor: CatalogExtractor;
  transport: Transport;
  muxer: MediaMuxer;
}

export interface RunDownloadOptions {
  /** Final file path; defaults to OUTPUT_DIR/<title>.<format> */
  destination?: string;
  signal?: AbortSignal;
  observer?: RunObserver;
  deps?: Partial<PipelineDeps>;
}

export function defaultDeps(): PipelineDeps {
  return {
    extractor: new YtDlpExtractor({ ytDlpPath: TOOLS.ytDlp, cookieBrowsers: TOOLS.cookieBrowsers }),
    transport: new HttpTransport(fetch, TRANSPORT.idleTimeoutMs),
    muxer: new FfmpegMuxer(TOOLS.ffmpeg),
  };
}

export function describeDecision(decision: SelectionDecision): string {
  switch (decision.kind) {
    case 'audio-match':
      return decision.basis === 'title'
        ? `Audio: ${decision.audioStream.streamRef} (language "${decision.language}" inferred from the title)`
        : `Audio: ${decision.audioStream.streamRef} (${decision.audioStream.languageTag}, ${decision.basis} match)`;
    case 'subtitle-fallback':
      return `No "${decision.language}" audio; subtitles: ${decision.subtitleTrack.streamRef}` +
        (decision.subtitleTrack.isAutomatic ? ' (automatic captions)' : '');
    case 'no-match':
      return `No "${decision.language}" audio or subtitles found`;
  }
}

export function describeAdvisory(advisory: Advisory): string {
  switch (advisory.kind) {
    case 'quality-downgraded':
      return `Quality ${advisory.requested} is not offered; using ${advisory.selected}`;
    case 'original-audio-fallback':
      return `No "${advisory.language}" content; keeping the original audio (${advisory.audioStreamRef})`;
    case 'language-inferred-from-title':
      return `Audio is untagged; the title suggests "${advisory.language}" (${advisory.audioStreamRef})`;
  }
}

/**
 * Download `url` and return the path of the finished file.
 *
 * Explicit `preferredLanguage` / `requestedQuality` arguments win over the
 * values in `config`. Extraction, catalog and planning errors propagate as
 * they are; anything that fails once execution starts is an AssemblyError.
 */
export async function runDownload(
  url: string,
  preferredLanguage: string | undefined,
  requestedQuality: string | undefined,
  config: RunConfig,
  options: RunDownloadOptions = {},
): Promise<string> {
  const deps: PipelineDeps = { ...defaultDeps(), ...options.deps };
  const { signal, observer = {} } = options;
  const language = preferredLanguage ?? config.preferredLanguage;
  const quality = requestedQuality ?? config.requestedQuality;

  logger.info('Pipeline: starting download', { url, language, quality: quality ?? 'best' });

  const catalog = await deps.extractor.fetchCatalog(url, signal);
  const decision = resolve(catalog, language);
  logger.info(`Pipeline: ${describeDecision(decision)}`);

  const { plan, advisories } = planAssembly(catalog, decision, quality, config);
  for (const advisory of advisories) {
    logger.warn(`Pipeline: ${describeAdvisory(advisory)}`);
    observer.onAdvisory?.(advisory);
  }

  logger.info(`Pipeline: video ${plan.video.qualityLabel} (${plan.video.streamRef})`);
  for (const line of describePlan(plan)) logger.info(`Plan: ${line}`);

  const destination = options.destination
    ?? join(config.outputDir, outputFileName(catalog.title, catalog.mediaId, config.outputFormat));

  const executor = new AssemblyExecutor(
    { transport: deps.transport, muxer: deps.muxer },
    {
      tempDir: config.tempDir,
      retryBudget: config.retryBudget,
      retryBaseDelayMs: config.retryBaseDelayMs,
      parallelFetch: config.parallelFetch,
    },
  );
  return executor.execute(plan, { destination, signal, observer });
}
