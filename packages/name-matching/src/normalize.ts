import type { NameVariation } from './types.js';

const HONORIFICS = new Set(['dr', 'mr', 'mrs', 'ms', 'miss']);
const SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'v', 'md', 'phd', 'rn', 'np', 'pa']);
const TOKEN_SEPARATOR = /[\s.-]+/;
const HYPHEN = /-+/;

/**
 * Strip accents, case, honorifics and suffixes from a single name.
 * Whitespace, hyphens and periods all separate tokens.
 */
export function normalizeName(raw: string | null | undefined): string {
  if (!raw) return '';

  const folded = raw.normalize('NFKD').replace(/\p{M}+/gu, '').toLowerCase();

  return folded
    .split(TOKEN_SEPARATOR)
    .filter((token) => token && !HONORIFICS.has(token) && !SUFFIXES.has(token))
    .join(' ');
}

function hyphenSegments(raw: string): string[] {
  if (!raw.includes('-')) return [];

  const segments = raw
    .split(HYPHEN)
    .map((segment) => normalizeName(segment))
    .filter(Boolean);

  return segments.length > 1 ? segments : [];
}

/**
 * Every (first, last) form a person's name may be recorded under.
 *
 * Hyphenated names contribute each segment on its own, and the cross-product
 * of segments when both names are hyphenated. The hyphen-as-space form is the
 * normalized name itself, so it comes first. Pairs with an empty side are dropped.
 */
export function nameVariations(first: string | null | undefined, last: string | null | undefined): NameVariation[] {
  const rawFirst = first ?? '';
  const rawLast = last ?? '';
  const normFirst = normalizeName(rawFirst);
  const normLast = normalizeName(rawLast);
  const firstSegments = hyphenSegments(rawFirst);
  const lastSegments = hyphenSegments(rawLast);

  const candidates: NameVariation[] = [{ first: normFirst, last: normLast }];

  for (const segment of firstSegments) {
    candidates.push({ first: segment, last: normLast });
  }

  for (const segment of lastSegments) {
    candidates.push({ first: normFirst, last: segment });
  }

  for (const firstSegment of firstSegments) {
    for (const lastSegment of lastSegments) {
      candidates.push({ first: firstSegment, last: lastSegment });
    }
  }

  const seen = new Set<string>();
  const result: NameVariation[] = [];
  for (const variation of candidates) {
    if (!variation.first || !variation.last) continue;

    const key = variationKey(variation);
    if (seen.has(key)) continue;

    seen.add(key);
    result.push(variation);
  }

  return result;
}

export function variationKey(variation: NameVariation): string {
  return `${variation.first}|${variation.last}`;
}
