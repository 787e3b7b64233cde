import { FUZZY_TITLE_MATCH_THRESHOLD } from '../app.constants';
import { titleMatchKey, titleSimilarity } from '../lib/title-normalize';
import { releaseYear, type TmdbMovieSearchResult } from '../tmdb/tmdb.service';

type Scored = {
  result: TmdbMovieSearchResult;
  score: number;
  yearMatch: boolean;
};

function compareScored(a: Scored, b: Scored): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.yearMatch !== b.yearMatch) return a.yearMatch ? -1 : 1;
  if (a.result.popularity !== b.result.popularity) {
    return b.result.popularity - a.result.popularity;
  }
  if (a.result.vote_count !== b.result.vote_count) {
    return b.result.vote_count - a.result.vote_count;
  }
  return a.result.id - b.result.id;
}

/**
 * Picks the canonical record for a suggested title.
 *
 * An exact match of the normalized title (or original title) always beats a
 * fuzzy one. Among equals: matching release year, then popularity, then vote
 * count, then the lower TMDB id.
 */
export function selectBestMatch(params: {
  title: string;
  year: number | null;
  results: TmdbMovieSearchResult[];
  minSimilarity?: number;
}): TmdbMovieSearchResult | null {
  const key = titleMatchKey(params.title);
  if (!key || !params.results.length) return null;
  const minSimilarity = params.minSimilarity ?? FUZZY_TITLE_MATCH_THRESHOLD;

  const scored: Scored[] = params.results.map((result) => {
    const exact =
      titleMatchKey(result.title) === key ||
      (result.original_title !== undefined &&
        titleMatchKey(result.original_title) === key);
    const score = exact
      ? 1
      : Math.max(
          titleSimilarity(params.title, result.title),
          result.original_title ? titleSimilarity(params.title, result.original_title) : 0,
        );
    return {
      result,
      score,
      yearMatch: params.year !== null && releaseYear(result) === params.year,
    };
  });

  const best = scored.filter((s) => s.score >= minSimilarity).sort(compareScored)[0];
  return best?.result ?? null;
}
