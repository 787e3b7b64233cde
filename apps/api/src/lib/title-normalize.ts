const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  middot: '·',
};

function fromCodePointSafe(cp: number): string | null {
  if (!Number.isFinite(cp)) return null;
  const n = Math.trunc(cp);
  if (n < 0 || n > 0x10ffff) return null;
  if (n >= 0xd800 && n <= 0xdfff) return null;
  return String.fromCodePoint(n);
}

/**
 * Decode numeric (`&#183;`, `&#xB7;`) and a handful of named entities.
 * Model output occasionally carries HTML-escaped titles.
 */
export function decodeHtmlEntities(input: string): string {
  let s = input ?? '';
  if (!s) return '';

  s = s.replace(/&#x([0-9a-fA-F]{1,8});/g, (m, hex: string) => {
    return fromCodePointSafe(Number.parseInt(hex, 16)) ?? m;
  });
  s = s.replace(/&#([0-9]{1,8});/g, (m, dec: string) => {
    return fromCodePointSafe(Number.parseInt(dec, 10)) ?? m;
  });
  s = s.replace(/&([a-zA-Z]{2,12});/g, (m, name: string) => {
    return NAMED_ENTITIES[name.toLowerCase()] ?? m;
  });

  return s;
}

/**
 * Display-safe cleanup of a title from Trakt, TMDB or a model response:
 * entities decoded, NFKC, whitespace collapsed, curly quotes and dashes
 * folded to ASCII.
 */
export function normalizeTitleForMatching(raw: string): string {
  let s = decodeHtmlEntities(raw ?? '').trim();
  if (!s) return '';

  s = s.normalize('NFKC');

  s = s
    .replace(/\u00a0/g, ' ')
    .replace(/[\u200b-\u200f\u202a-\u202e]/g, '') // zero-width + bidi marks
    .replace(/\s+/g, ' ')
    .trim();

  s = s
    .replace(/[\u2018\u2019\u02bc]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .trim();

  return s;
}

/** Comparison key: lower-case letters and digits separated by single spaces. */
export function titleMatchKey(raw: string): string {
  return normalizeTitleForMatching(raw)
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/['\u2019]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function titleYearKey(title: string, year: number | null | undefined): string {
  return `${titleMatchKey(title)}|${year ?? ''}`;
}

/** Splits a trailing "(1999)" off a title. */
export function splitTitleAndYear(raw: string): { title: string; year: number | null } {
  const title = normalizeTitleForMatching(raw);
  const m = title.match(/^(.*\S)\s*\((\d{4})\)$/);
  if (!m) return { title, year: null };
  return { title: m[1].trim(), year: Number.parseInt(m[2], 10) };
}

export function buildTitleQueryVariants(title: string): string[] {
  const base = normalizeTitleForMatching(title);
  if (!base) return [];

  const variants: string[] = [];
  const push = (v: string) => {
    const t = v.replace(/\s+/g, ' ').trim();
    if (t && !variants.includes(t)) variants.push(t);
  };

  push(base);
  push(base.replace(/[^\p{L}\p{N}\s]/gu, ' '));
  push(base.replace(/\u00b7/g, ''));
  push(base.replace(/[-\u2013\u2014]/g, ' '));

  return variants;
}

function bigrams(key: string): Map<string, number> {
  const out = new Map<string, number>();
  const compact = key.replace(/ /g, '');
  for (let i = 0; i < compact.length - 1; i += 1) {
    const gram = compact.slice(i, i + 2);
    out.set(gram, (out.get(gram) ?? 0) + 1);
  }
  return out;
}

/** Dice coefficient over character bigrams of the match keys, 0..1. */
export function titleSimilarity(a: string, b: string): number {
  const ka = titleMatchKey(a);
  const kb = titleMatchKey(b);
  if (!ka || !kb) return 0;
  if (ka === kb) return 1;

  const ga = bigrams(ka);
  const gb = bigrams(kb);
  let sizeA = 0;
  let sizeB = 0;
  for (const n of ga.values()) sizeA += n;
  for (const n of gb.values()) sizeB += n;
  if (sizeA === 0 || sizeB === 0) return 0;

  let overlap = 0;
  for (const [gram, n] of ga) {
    overlap += Math.min(n, gb.get(gram) ?? 0);
  }
  return (2 * overlap) / (sizeA + sizeB);
}
