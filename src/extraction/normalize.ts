/**
 * Validating adapter from yt-dlp's `--dump-json` metadata to a RenditionCatalog.
 *
 * yt-dlp fields are loosely typed and often missing; they are parsed with a
 * permissive zod schema here so nothing downstream sees untyped data.
 */
import { z } from 'zod';
import {
  createCatalog,
  type CatalogInput,
  type RenditionCatalog,
  type StreamSource,
  type SubtitleTrack,
  type VideoStream,
} from '../catalog/model.js';
import { normalizeLanguageTag } from '../catalog/language.js';
import { ExtractionError } from '../utils/errors.js';

// ── Raw schema ────────────────────────────────────────────────────────────────

const RawFormatSchema = z.object({
  format_id:           z.string(),
  url:                 z.string().optional(),
  ext:                 z.string().nullish(),
  vcodec:              z.string().nullish(),
  acodec:              z.string().nullish(),
  height:              z.number().nullish(),
  tbr:                 z.number().nullish(),
  abr:                 z.number().nullish(),
  vbr:                 z.number().nullish(),
  format_note:         z.string().nullish(),
  protocol:            z.string().nullish(),
  language:            z.string().nullish(),
  language_preference: z.number().nullish(),
  http_headers:        z.record(z.string()).nullish(),
}).passthrough();

const RawSubtitleSchema = z.object({
  ext:  z.string(),
  url:  z.string().optional(),
  name: z.string().nullish(),
}).passthrough();

const RawInfoSchema = z.object({
  id:                 z.string(),
  title:              z.string().nullish(),
  webpage_url:        z.string().nullish(),
  formats:            z.array(RawFormatSchema).default([]),
  subtitles:          z.record(z.array(RawSubtitleSchema)).nullish(),
  automatic_captions: z.record(z.array(RawSubtitleSchema)).nullish(),
}).passthrough();

export type RawFormat = z.infer<typeof RawFormatSchema>;
export type RawInfo = z.input<typeof RawInfoSchema>;

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Subtitle formats FFmpeg can read, most preferred first. */
const SUBTITLE_FORMAT_PREFERENCE = ['srt', 'vtt', 'ass', 'ssa'] as const;

/** Protocols the HTTP transport fetches as one file; manifest and segmented ones are skipped. */
const DIRECT_PROTOCOLS = new Set(['https', 'http']);

const isDirectDownload = (f: RawFormat) => !f.protocol || DIRECT_PROTOCOLS.has(f.protocol);
const hasVideo = (f: RawFormat) => !!f.vcodec && f.vcodec !== 'none';
const hasAudio = (f: RawFormat) => !!f.acodec && f.acodec !== 'none';

function sourceOf(url: string | undefined, headers?: Record<string, string> | null): StreamSource | undefined {
  return url ? { url, headers: headers ?? {} } : undefined;
}

function isDefaultAudio(f: RawFormat): boolean {
  return /\bdefault\b/i.test(f.format_note ?? '') || (f.language_preference ?? -1) >= 10;
}

function toVideoStream(f: RawFormat): VideoStream | undefined {
  if (!f.height || f.height <= 0) return undefined;
  const source = sourceOf(f.url, f.http_headers);
  return {
    qualityLabel: `${f.height}p`,
    height: f.height,
    bitrate: f.vbr ?? f.tbr ?? 0,
    codec: f.vcodec ?? 'unknown',
    streamRef: `video:${f.format_id}`,
    container: f.ext ?? 'mp4',
    ...(source ? { source } : {}),
  };
}

function toAudioStream(f: RawFormat): CatalogInput['audioStreams'][number] {
  const source = sourceOf(f.url, f.http_headers);
  return {
    languageTag: f.language ?? null,
    isDefault: isDefaultAudio(f),
    bitrate: f.abr ?? f.tbr ?? 0,
    codec: f.acodec ?? 'unknown',
    streamRef: `audio:${f.format_id}`,
    container: f.ext ?? 'm4a',
    ...(source ? { source } : {}),
  };
}

function subtitleTracks(
  byLanguage: Record<string, Array<z.infer<typeof RawSubtitleSchema>>> | null | undefined,
  isAutomatic: boolean,
): SubtitleTrack[] {
  if (!byLanguage) return [];
  const tracks: SubtitleTrack[] = [];
  const seen = new Set<string>();

  for (const [lang, entries] of Object.entries(byLanguage)) {
    const languageTag = normalizeLanguageTag(lang);
    if (!languageTag || languageTag === 'live-chat') continue;

    for (const format of SUBTITLE_FORMAT_PREFERENCE) {
      const entry = entries.find((e) => e.ext.toLowerCase() === format);
      const streamRef = `${isAutomatic ? 'auto' : 'sub'}:${languageTag}:${format}`;
      if (!entry || seen.has(streamRef)) continue;
      seen.add(streamRef);
      const source = sourceOf(entry.url);
      tracks.push({
        languageTag,
        format,
        streamRef,
        isAutomatic,
        ...(source ? { source } : {}),
      });
    }
  }
  return tracks;
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Build a catalog from yt-dlp metadata.
 *
 * yt-dlp lists formats worst-first; the catalog lists them best-first, so the
 * order is reversed (not re-sorted). Formats served over HLS, DASH segments or
 * other non-HTTP protocols are left out. Video-only formats are preferred, falling
 * back to any format carrying video; likewise for audio. Manual subtitles come
 * before automatic captions.
 */
export function catalogFromYtDlp(raw: unknown): RenditionCatalog {
  const parsed = RawInfoSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new ExtractionError(`Unexpected yt-dlp metadata (fields: ${fields})`);
  }
  const info = parsed.data;
  const formats = info.formats.filter(isDirectDownload).reverse();

  const videoOnly = formats.filter((f) => hasVideo(f) && !hasAudio(f));
  const videoFormats = videoOnly.length > 0 ? videoOnly : formats.filter(hasVideo);

  const audioOnly = formats.filter((f) => hasAudio(f) && !hasVideo(f));
  const audioFormats = audioOnly.length > 0 ? audioOnly : formats.filter(hasAudio);

  return createCatalog({
    mediaId: info.id,
    title: info.title ?? null,
    sourceUrl: info.webpage_url ?? null,
    videoStreams: videoFormats.flatMap((f) => toVideoStream(f) ?? []),
    audioStreams: audioFormats.map(toAudioStream),
    subtitleTracks: [
      ...subtitleTracks(info.subtitles, false),
      ...subtitleTracks(info.automatic_captions, true),
    ],
  });
}
