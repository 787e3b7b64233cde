import { z } from 'zod';
import { splitTitleAndYear } from '../lib/title-normalize';
import type { RawSuggestion } from './recommendations.types';

const MIN_YEAR = 1870;
const MAX_YEAR = 2100;

const yearSchema = z
  .preprocess(
    (v) => (typeof v === 'string' && /^\s*\d{4}\s*$/.test(v) ? Number(v) : v),
    z.number().int().min(MIN_YEAR).max(MAX_YEAR),
  )
  .nullish()
  .catch(null);

const objectSuggestionSchema = z.object({
  title: z.string().trim().min(1),
  year: yearSchema,
});

// "Title (1999)" strings are accepted as well as objects.
const suggestionSchema = z.union([
  objectSuggestionSchema.transform(({ title, year }): RawSuggestion => {
    const split = splitTitleAndYear(title);
    return { title: split.title, year: year ?? split.year };
  }),
  z
    .string()
    .trim()
    .min(1)
    .transform((s): RawSuggestion => splitTitleAndYear(s)),
]);

const envelopeSchema = z.object({
  similar: z.array(z.unknown()),
  diverse: z.array(z.unknown()).default([]),
});

export type DecodedSuggestions =
  | { ok: true; similar: RawSuggestion[]; diverse: RawSuggestion[]; dropped: number }
  | { ok: false; reason: string };

function stripMarkdownFences(text: string): string {
  let t = text.trim();
  if (!t.startsWith('```')) return t;
  t = t.replace(/^```[a-zA-Z0-9_-]*\s*/, '').trim();
  t = t.replace(/\s*```$/, '').trim();
  return t;
}

function parseJsonLoose(text: string): unknown {
  const t = stripMarkdownFences(text);
  try {
    return JSON.parse(t);
  } catch {
    // Some models wrap the object in prose.
    const start = t.indexOf('{');
    const end = t.lastIndexOf('}');
    if (start < 0 || end <= start) throw new Error('no JSON object found');
    return JSON.parse(t.slice(start, end + 1));
  }
}

/**
 * Decodes model output into suggestion buckets. The envelope must match;
 * individual malformed entries are dropped and counted.
 */
export function decodeSuggestions(text: string): DecodedSuggestions {
  if (!text.trim()) return { ok: false, reason: 'empty response' };

  let json: unknown;
  try {
    json = parseJsonLoose(text);
  } catch (err) {
    return {
      ok: false,
      reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    return {
      ok: false,
      reason: `unexpected shape at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
    };
  }

  let dropped = 0;
  const decodeBucket = (items: unknown[]): RawSuggestion[] => {
    const out: RawSuggestion[] = [];
    for (const item of items) {
      const parsed = suggestionSchema.safeParse(item);
      if (parsed.success && parsed.data.title) out.push(parsed.data);
      else dropped += 1;
    }
    return out;
  };

  const similar = decodeBucket(envelope.data.similar);
  const diverse = decodeBucket(envelope.data.diverse);
  if (!similar.length && !diverse.length) {
    return { ok: false, reason: 'no usable suggestions' };
  }
  return { ok: true, similar, diverse, dropped };
}
