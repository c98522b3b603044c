import { readFile, writeFile } from 'fs/promises';
import {
  createCatalog,
  type CatalogInput,
  type RenditionCatalog,
  type SubtitleTrack,
  type VideoStream,
} from '../src/catalog/model.js';
import type { MediaMuxer, MuxInput } from '../src/media/types.js';
import type { DownloadOptions, DownloadRequest, DownloadResult, Transport } from '../src/transport/types.js';
import { MuxError } from '../src/utils/errors.js';

// ── Catalog fixtures ──────────────────────────────────────────────────────────

export type AudioInput = CatalogInput['audioStreams'][number];

export function video(height: number, extra: Partial<VideoStream> = {}): VideoStream {
  return {
    qualityLabel: `${height}p`,
    height,
    bitrate: height * 2,
    codec: 'avc1',
    streamRef: `v${height}`,
    container: 'mp4',
    source: { url: `https://media.test/v${height}`, headers: {} },
    ...extra,
  };
}

export function audio(streamRef: string, languageTag: string | null, extra: Partial<AudioInput> = {}): AudioInput {
  return {
    languageTag,
    isDefault: false,
    bitrate: 128,
    codec: 'mp4a',
    streamRef,
    container: 'm4a',
    source: { url: `https://media.test/${streamRef}`, headers: {} },
    ...extra,
  };
}

export function subtitle(streamRef: string, languageTag: string, extra: Partial<SubtitleTrack> = {}): SubtitleTrack {
  return {
    languageTag,
    format: 'vtt',
    streamRef,
    isAutomatic: false,
    source: { url: `https://media.test/${streamRef}`, headers: {} },
    ...extra,
  };
}

/** 720p + 480p video, English default audio plus Spanish audio, no subtitles. */
export function sampleCatalog(overrides: Partial<CatalogInput> = {}): RenditionCatalog {
  return createCatalog({
    mediaId: 'media-1',
    title: 'Demo: clip',
    videoStreams: [video(720), video(480)],
    audioStreams: [audio('a-en', 'en', { isDefault: true }), audio('a-es', 'es')],
    subtitleTracks: [],
    ...overrides,
  });
}

// ── Fake transport ────────────────────────────────────────────────────────────

type FetchBehaviour = (destPath: string, options: DownloadOptions) => Promise<DownloadResult>;

/** One scripted outcome per call; unscripted calls write `data:<streamRef>`. */
export type TransportOutcome = Error | FetchBehaviour;

export class FakeTransport implements Transport {
  readonly calls: Array<{ streamRef: string; resumeFrom: number }> = [];

  constructor(private readonly script: Record<string, TransportOutcome[]> = {}) {}

  async download(request: DownloadRequest, destPath: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    this.calls.push({ streamRef: request.streamRef, resumeFrom: options.resumeFrom ?? 0 });
    const outcome = this.script[request.streamRef]?.shift();
    if (outcome instanceof Error) throw outcome;
    if (outcome) return outcome(destPath, options);

    const data = `data:${request.streamRef}`;
    await writeFile(destPath, data);
    options.onProgress?.(data.length, data.length);
    return { bytesWritten: data.length, resumable: true };
  }

  callsFor(streamRef: string): number[] {
    return this.calls.filter((c) => c.streamRef === streamRef).map((c) => c.resumeFrom);
  }
}

/** Never settles until the signal aborts, then rejects with its reason. */
export const hangUntilAborted: FetchBehaviour = (_destPath, options) =>
  new Promise<DownloadResult>((_resolve, reject) => {
    const signal = options.signal;
    if (!signal) return;
    if (signal.aborted) reject(signal.reason);
    else signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

// ── Fake muxer ────────────────────────────────────────────────────────────────

type MuxOperation = 'mux' | 'convertSubtitle' | 'burnSubtitle';

/** Writes its inputs' contents joined by "|" so tests can see what was combined. */
export class FakeMuxer implements MediaMuxer {
  readonly calls: MuxOperation[] = [];
  readonly muxInputs: MuxInput[][] = [];

  constructor(private readonly failOn?: MuxOperation) {}

  private check(op: MuxOperation): void {
    this.calls.push(op);
    if (this.failOn === op) throw new MuxError(`FFmpeg ${op}`, 1, 'boom');
  }

  async mux(inputs: MuxInput[], outputPath: string): Promise<void> {
    this.check('mux');
    this.muxInputs.push(inputs);
    const parts = await Promise.all(inputs.map((i) => readFile(i.path, 'utf-8')));
    await writeFile(outputPath, parts.join('|'));
  }

  async convertSubtitle(inputPath: string, outputPath: string): Promise<void> {
    this.check('convertSubtitle');
    await writeFile(outputPath, `srt(${await readFile(inputPath, 'utf-8')})`);
  }

  async burnSubtitle(videoPath: string, subtitlePath: string, outputPath: string): Promise<void> {
    this.check('burnSubtitle');
    const [v, s] = await Promise.all([readFile(videoPath, 'utf-8'), readFile(subtitlePath, 'utf-8')]);
    await writeFile(outputPath, `burned(${v}+${s})`);
  }
}
