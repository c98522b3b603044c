/**
 * Language resolver: decides whether a media item can be delivered with
 * audio in the preferred language, needs subtitles instead, or neither.
 *
 * Pure: no I/O, no state. Candidates are taken in catalog order; the platform's
 * ordering is its own best guess and is never re-ranked here.
 */
import { baseLanguage, normalizeLanguageTag, titleMentionsLanguage } from '../catalog/language.js';
import { defaultAudioStream, type RenditionCatalog } from '../catalog/model.js';
import type { MatchBasis, SelectionDecision } from './types.js';

/**
 * Two-pass match: an exact tag (region included) wins over a base-language
 * match anywhere in the list; within a pass the earliest entry wins.
 */
function findByLanguage<T extends { languageTag: string | null }>(
  items: readonly T[],
  preferred: string,
): { item: T; basis: MatchBasis } | undefined {
  const exact = items.find((i) => i.languageTag === preferred);
  if (exact) return { item: exact, basis: 'exact' };

  const base = baseLanguage(preferred);
  const partial = items.find((i) => i.languageTag !== null && baseLanguage(i.languageTag) === base);
  return partial ? { item: partial, basis: 'base' } : undefined;
}

export function resolve(catalog: RenditionCatalog, preferredLanguage: string): SelectionDecision {
  const preferred = normalizeLanguageTag(preferredLanguage);
  if (!preferred) {
    throw new Error(`Invalid preferred language: "${preferredLanguage}"`);
  }

  const audio = findByLanguage(catalog.audioStreams, preferred);
  if (audio) return { kind: 'audio-match', language: preferred, audioStream: audio.item, basis: audio.basis };

  // Untagged catalogs: trust a title that names the language ("… en español")
  const untagged = catalog.audioStreams.every((a) => a.languageTag === null);
  if (untagged && catalog.title && titleMentionsLanguage(catalog.title, preferred)) {
    const fallback = defaultAudioStream(catalog);
    if (fallback) return { kind: 'audio-match', language: preferred, audioStream: fallback, basis: 'title' };
  }

  const subtitle = findByLanguage(catalog.subtitleTracks, preferred);
  if (subtitle) {
    return { kind: 'subtitle-fallback', language: preferred, subtitleTrack: subtitle.item, basis: subtitle.basis };
  }

  return { kind: 'no-match', language: preferred };
}
