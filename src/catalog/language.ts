/**
 * Language tag helpers. Tags are compared in a normalized form: lowercase,
 * hyphen-separated ("es_MX" → "es-mx"). "und" and empty strings mean no tag.
 */
import { readFileSync } from 'fs';

export function normalizeLanguageTag(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const tag = raw.trim().toLowerCase().replace(/_/g, '-');
  if (!tag || tag === 'und' || tag === 'none') return null;
  return tag;
}

/** "es-mx" → "es" */
export function baseLanguage(tag: string): string {
  return tag.split('-')[0] ?? tag;
}

// ── Language names ────────────────────────────────────────────────────────────
// Words that mark a title as being in a given language ("Película en español").

type LanguageNames = Record<string, string[]>;

let languageNames: LanguageNames | undefined;

function loadLanguageNames(): LanguageNames {
  if (!languageNames) {
    const url = new URL('../../data/language-names.json', import.meta.url);
    const raw: unknown = JSON.parse(readFileSync(url, 'utf-8'));
    languageNames = isLanguageNames(raw) ? raw : {};
  }
  return languageNames;
}

function isLanguageNames(value: unknown): value is LanguageNames {
  if (typeof value !== 'object' || value === null) return false;
  return Object.values(value).every(
    (names) => Array.isArray(names) && names.every((n) => typeof n === 'string'),
  );
}

/** True when the title names the language, e.g. "castellano" for "es". */
export function titleMentionsLanguage(title: string, tag: string): boolean {
  const names = loadLanguageNames()[baseLanguage(tag)] ?? [];
  const haystack = title.toLocaleLowerCase();
  return names.some((name) => {
    const pattern = new RegExp(`(^|[^\\p{L}])${escapeRegExp(name.toLocaleLowerCase())}($|[^\\p{L}])`, 'u');
    return pattern.test(haystack);
  });
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
