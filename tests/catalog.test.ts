import { describe, expect, test } from 'vitest';

import { createCatalog, defaultAudioStream, validateCatalog } from '../src/catalog/model.js';
import { baseLanguage, normalizeLanguageTag, titleMentionsLanguage } from '../src/catalog/language.js';
import { CatalogError } from '../src/utils/errors.js';
import { audio, sampleCatalog, subtitle, video } from './helpers.js';

function catalogIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof CatalogError) return err.issues;
    throw err;
  }
  throw new Error('expected a CatalogError');
}

describe('language tags', () => {
  test('normalizes case, underscores and whitespace', () => {
    expect(normalizeLanguageTag('es_MX')).toBe('es-mx');
    expect(normalizeLanguageTag(' EN ')).toBe('en');
  });

  test('treats und, none and empty as untagged', () => {
    expect(normalizeLanguageTag('und')).toBeNull();
    expect(normalizeLanguageTag('none')).toBeNull();
    expect(normalizeLanguageTag('')).toBeNull();
    expect(normalizeLanguageTag(null)).toBeNull();
  });

  test('base language drops the region', () => {
    expect(baseLanguage('pt-br')).toBe('pt');
    expect(baseLanguage('es')).toBe('es');
  });

  test('finds language names in titles on word boundaries', () => {
    expect(titleMentionsLanguage('Película completa en Español', 'es-MX')).toBe(true);
    expect(titleMentionsLanguage('Doblaje Latino HD', 'es')).toBe(true);
    expect(titleMentionsLanguage('Espanolandia tour', 'es')).toBe(false);
    expect(titleMentionsLanguage('Versión en castellano', 'en')).toBe(false);
  });
});

describe('createCatalog', () => {
  test('normalizes audio tags and defaults isDefault to false', () => {
    const catalog = createCatalog({
      mediaId: 'm',
      videoStreams: [video(720)],
      audioStreams: [
        audio('a1', 'es_MX'),
        { bitrate: 96, codec: 'opus', streamRef: 'a2', container: 'webm', languageTag: 'und' },
      ],
    });

    expect(catalog.audioStreams.map((a) => a.languageTag)).toEqual(['es-mx', null]);
    expect(catalog.audioStreams[1]?.isDefault).toBe(false);
    expect(catalog.title).toBeNull();
    expect(catalog.subtitleTracks).toEqual([]);
  });

  test('drops untagged subtitles and lowercases formats', () => {
    const catalog = sampleCatalog({
      subtitleTracks: [subtitle('s1', 'und'), subtitle('s2', 'ES', { format: 'SRT' })],
    });

    expect(catalog.subtitleTracks).toHaveLength(1);
    expect(catalog.subtitleTracks[0]).toMatchObject({ streamRef: 's2', languageTag: 'es', format: 'srt' });
  });

  test('freezes the whole structure', () => {
    const catalog = sampleCatalog();
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.videoStreams)).toBe(true);
    expect(Object.isFrozen(catalog.audioStreams[0])).toBe(true);
  });

  test('accepts a catalog without subtitles', () => {
    expect(() => sampleCatalog({ subtitleTracks: undefined })).not.toThrow();
  });
});

describe('validateCatalog', () => {
  test('rejects empty video and audio lists', () => {
    const issues = catalogIssues(() => createCatalog({ mediaId: 'm', videoStreams: [], audioStreams: [] }));
    expect(issues).toEqual(['no video streams', 'no audio streams']);
  });

  test('rejects a streamRef repeated across lists', () => {
    const issues = catalogIssues(() => sampleCatalog({
      subtitleTracks: [subtitle('a-es', 'es')],
    }));
    expect(issues).toEqual(['duplicate streamRef "a-es"']);
  });

  test('rejects non-positive heights', () => {
    const issues = catalogIssues(() => sampleCatalog({ videoStreams: [video(0)] }));
    expect(issues).toEqual(['video stream "v0" has non-positive height 0']);
  });

  test('reports every problem at once', () => {
    const err = (() => {
      try {
        validateCatalog({
          mediaId: 'm',
          title: null,
          sourceUrl: null,
          videoStreams: [video(-1, { streamRef: 'x' })],
          audioStreams: [],
          subtitleTracks: [subtitle('x', 'es')],
        });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(err).toBeInstanceOf(CatalogError);
    expect(err).toMatchObject({
      kind: 'malformed',
      issues: ['no audio streams', 'duplicate streamRef "x"', 'video stream "x" has non-positive height -1'],
    });
  });
});

describe('defaultAudioStream', () => {
  test('prefers the flagged stream', () => {
    const catalog = sampleCatalog({
      audioStreams: [audio('a-fr', 'fr'), audio('a-en', 'en', { isDefault: true })],
    });
    expect(defaultAudioStream(catalog)?.streamRef).toBe('a-en');
  });

  test('falls back to the first stream', () => {
    const catalog = sampleCatalog({ audioStreams: [audio('a-fr', 'fr'), audio('a-de', 'de')] });
    expect(defaultAudioStream(catalog)?.streamRef).toBe('a-fr');
  });
});
