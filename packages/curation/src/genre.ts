// ABOUTME: Genre tag formatting - title case with known acronyms restored.
// ABOUTME: 'uk garage' -> 'UK Garage', 'pov: indie' -> 'POV: Indie'.

import { GENRE_ACRONYMS } from '@festlist/config';

// Upper-cases the first code point only when it stays one code point ('ß' would become 'SS')
function capitalize(word: string): string {
  const [head = ''] = word;
  const upper = head.toUpperCase();
  return ([...upper].length === 1 ? upper : head) + word.slice(head.length).toLowerCase();
}

function titleCase(text: string): string {
  return text
    .split(/(\s+)/)
    .map((word) => (word.trim() ? capitalize(word) : word))
    .join('');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const patternCache = new WeakMap<Readonly<Record<string, string>>, { pattern: RegExp; lookup: Map<string, string> }>();

/**
 * One alternation over every acronym, longest first, that only matches a
 * token not touching another letter. A single replace pass means an inserted
 * replacement is never matched again.
 */
function acronymMatcher(acronyms: Readonly<Record<string, string>>) {
  const cached = patternCache.get(acronyms);
  if (cached) return cached;

  const lookup = new Map(Object.entries(acronyms).map(([key, value]) => [titleCase(key), value]));
  const keys = [...lookup.keys()].sort((a, b) => b.length - a.length).map(escapeRegExp);
  const pattern = new RegExp(`(?<![\\p{L}])(${keys.join('|')})(?![\\p{L}])`, 'gu');

  const matcher = { pattern, lookup };
  patternCache.set(acronyms, matcher);
  return matcher;
}

export function normalizeGenre(genre: string, acronyms: Readonly<Record<string, string>> = GENRE_ACRONYMS): string {
  const titled = titleCase(genre);
  if (Object.keys(acronyms).length === 0) return titled;

  const { pattern, lookup } = acronymMatcher(acronyms);
  return titled.replace(pattern, (token: string) => lookup.get(token) ?? token);
}

export function normalizeGenres(genres: readonly string[], acronyms?: Readonly<Record<string, string>>): string[] {
  return genres.map((genre) => normalizeGenre(genre, acronyms));
}
