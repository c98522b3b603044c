/**
 * Rendition catalog: normalized, immutable view of what a platform offers
 * for one media item. Built once per item by the extraction adapter and
 * read-only afterwards.
 */
import { CatalogError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { normalizeLanguageTag } from './language.js';

// ── Types ─────────────────────────────────────────────────────────────────────

/** Where the transport fetches a stream's bytes from. */
export interface StreamSource {
  url: string;
  headers: Readonly<Record<string, string>>;
}

export interface VideoStream {
  /** e.g. "720p" */
  qualityLabel: string;
  height: number;
  /** kbit/s; 0 when the platform does not report it */
  bitrate: number;
  codec: string;
  streamRef: string;
  /** File extension of the stream as delivered ("mp4", "webm") */
  container: string;
  source?: StreamSource;
}

export interface AudioStream {
  languageTag: string | null;
  isDefault: boolean;
  bitrate: number;
  codec: string;
  streamRef: string;
  container: string;
  source?: StreamSource;
}

export interface SubtitleTrack {
  languageTag: string;
  /** "srt", "vtt", "ass", ... */
  format: string;
  streamRef: string;
  /** Machine-generated captions (platform ASR or auto-translation) */
  isAutomatic: boolean;
  source?: StreamSource;
}

export interface RenditionCatalog {
  readonly mediaId: string;
  readonly title: string | null;
  readonly sourceUrl: string | null;
  readonly videoStreams: readonly VideoStream[];
  readonly audioStreams: readonly AudioStream[];
  readonly subtitleTracks: readonly SubtitleTrack[];
}

/** Loosely-phrased input accepted by createCatalog. */
export interface CatalogInput {
  mediaId: string;
  title?: string | null;
  sourceUrl?: string | null;
  videoStreams: VideoStream[];
  audioStreams: Array<Omit<AudioStream, 'languageTag' | 'isDefault'> & {
    languageTag?: string | null;
    isDefault?: boolean;
  }>;
  subtitleTracks?: SubtitleTrack[];
}

// ── Construction ──────────────────────────────────────────────────────────────

/**
 * Normalize language tags, validate, and freeze. Subtitle tracks whose tag
 * normalizes to nothing are dropped since they can never match a preference.
 */
export function createCatalog(input: CatalogInput): RenditionCatalog {
  const catalog: RenditionCatalog = {
    mediaId: input.mediaId,
    title: input.title ?? null,
    sourceUrl: input.sourceUrl ?? null,
    videoStreams: input.videoStreams.map((v) => ({ ...v })),
    audioStreams: input.audioStreams.map((a) => ({
      ...a,
      languageTag: normalizeLanguageTag(a.languageTag),
      isDefault: a.isDefault ?? false,
    })),
    subtitleTracks: (input.subtitleTracks ?? []).flatMap((s) => {
      const languageTag = normalizeLanguageTag(s.languageTag);
      return languageTag ? [{ ...s, languageTag, format: s.format.toLowerCase() }] : [];
    }),
  };

  validateCatalog(catalog);
  return deepFreeze(catalog);
}

/**
 * Throws CatalogError listing every problem found: an empty video or audio
 * stream list, a repeated streamRef, or a non-positive video height.
 * Subtitle tracks are optional.
 */
export function validateCatalog(catalog: RenditionCatalog): void {
  const issues: string[] = [];

  if (catalog.videoStreams.length === 0) issues.push('no video streams');
  if (catalog.audioStreams.length === 0) issues.push('no audio streams');

  const seen = new Set<string>();
  const refs = [
    ...catalog.videoStreams.map((s) => s.streamRef),
    ...catalog.audioStreams.map((s) => s.streamRef),
    ...catalog.subtitleTracks.map((s) => s.streamRef),
  ];
  for (const ref of refs) {
    if (seen.has(ref)) issues.push(`duplicate streamRef "${ref}"`);
    seen.add(ref);
  }

  for (const video of catalog.videoStreams) {
    if (!Number.isFinite(video.height) || video.height <= 0) {
      issues.push(`video stream "${video.streamRef}" has non-positive height ${video.height}`);
    }
  }

  if (issues.length > 0) throw new CatalogError(issues);
}

/** Default audio: the stream flagged default, else the first one. */
export function defaultAudioStream(catalog: RenditionCatalog): AudioStream | undefined {
  return catalog.audioStreams.find((a) => a.isDefault) ?? catalog.audioStreams[0];
}
