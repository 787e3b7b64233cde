import { Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { RANKED_LIST_SIZE, SIMILAR_RATIO } from '../app.constants';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { errToMessage, PipelineError } from '../lib/pipeline-errors';
import { buildTitleQueryVariants } from '../lib/title-normalize';
import type { Candidate } from '../recommendations/recommendations.types';
import { genreNamesForIds } from '../tmdb/tmdb-genres';
import { releaseYear, TmdbService, type TmdbMovieSearchResult } from '../tmdb/tmdb.service';
import type { DropReason, EnrichedCandidate, EnrichOptions } from './enrichment.types';
import { selectBestMatch } from './title-match';

type Resolved =
  | { ok: true; match: TmdbMovieSearchResult }
  | { ok: false; reason: 'no_match' }
  | { ok: false; reason: 'error'; error: unknown };

function normalizeGenre(raw: string): string {
  return raw.trim().toLowerCase().replace(/[-_]+/g, ' ').replace(/\s+/g, ' ');
}

/** Searches tried in order: as suggested, then a punctuation-stripped title without the year. */
export function searchAttempts(candidate: Candidate): Array<{ query: string; year: number | null }> {
  const variants = buildTitleQueryVariants(candidate.title);
  if (!variants.length) return [];
  const year = candidate.year ?? null;

  const attempts = [{ query: variants[0], year }];
  const fallback = variants[1] ?? variants[0];
  if (fallback !== variants[0] || year !== null) {
    attempts.push({ query: fallback, year: null });
  }
  return attempts;
}

export function filterByGenre(
  items: EnrichedCandidate[],
  genreFilters: string[],
): EnrichedCandidate[] {
  const wanted = new Set(genreFilters.map(normalizeGenre).filter(Boolean));
  if (!wanted.size) return items;
  return items.filter((item) => item.genres.some((g) => wanted.has(normalizeGenre(g))));
}

/**
 * Similar bucket first, generator order kept within each bucket. Aims for
 * round(size * 0.7) similar items and fills from the other bucket when one
 * runs short.
 */
export function rank(items: EnrichedCandidate[], size = RANKED_LIST_SIZE): EnrichedCandidate[] {
  const similar = items.filter((i) => i.similarityBucket === 'similar');
  const diverse = items.filter((i) => i.similarityBucket === 'diverse');

  let similarTake = Math.min(similar.length, Math.round(size * SIMILAR_RATIO));
  const diverseTake = Math.min(diverse.length, size - similarTake);
  similarTake = Math.min(similar.length, size - diverseTake);

  return [...similar.slice(0, similarTake), ...diverse.slice(0, diverseTake)];
}

@Injectable()
export class MetadataEnricherService {
  private readonly logger = new Logger(MetadataEnricherService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly tmdb: TmdbService,
  ) {}

  async enrich(
    candidates: Candidate[],
    options: EnrichOptions = {},
  ): Promise<EnrichedCandidate[]> {
    const limit = pLimit(this.config.enrichment.concurrency);
    const excluded = new Set(options.excludeTmdbIds ?? []);
    const minRating = options.minRating ?? null;

    const resolved = await Promise.all(
      candidates.map((candidate) => limit(() => this.resolve(candidate))),
    );

    const drops: Record<DropReason, number> = {
      no_match: 0,
      no_genres: 0,
      watched: 0,
      low_rating: 0,
      duplicate: 0,
      error: 0,
    };
    const seen = new Set<number>();
    const out: EnrichedCandidate[] = [];
    let firstError: unknown = null;

    candidates.forEach((candidate, idx) => {
      const r = resolved[idx];
      if (!r.ok) {
        drops[r.reason] += 1;
        if (r.reason === 'error' && firstError === null) firstError = r.error;
        return;
      }
      const match = r.match;
      const genres = genreNamesForIds(match.genre_ids);
      let reason: DropReason | null = null;
      if (!genres.length) reason = 'no_genres';
      else if (excluded.has(match.id)) reason = 'watched';
      else if (minRating !== null && match.vote_average < minRating) reason = 'low_rating';
      else if (seen.has(match.id)) reason = 'duplicate';
      if (reason) {
        drops[reason] += 1;
        return;
      }

      seen.add(match.id);
      out.push({
        titleId: match.id,
        title: match.title,
        genres,
        rating: match.vote_average,
        year: releaseYear(match) ?? candidate.year ?? null,
        similarityBucket: candidate.similarityBucket,
      });
    });

    const dropped = Object.entries(drops)
      .filter(([, n]) => n > 0)
      .map(([k, n]) => `${k}=${n}`)
      .join(' ');
    this.logger.log(
      `Enriched candidates in=${candidates.length} resolved=${out.length}${dropped ? ` ${dropped}` : ''}`,
    );

    // Every lookup failed: TMDB is down, not short of matches.
    if (candidates.length && drops.error === candidates.length) {
      throw new PipelineError(
        'UpstreamError',
        `TMDB lookups failed for all ${candidates.length} candidates`,
        { cause: firstError },
      );
    }
    return out;
  }

  filterByGenre(items: EnrichedCandidate[], genreFilters: string[]): EnrichedCandidate[] {
    return filterByGenre(items, genreFilters);
  }

  rank(items: EnrichedCandidate[], size = RANKED_LIST_SIZE): EnrichedCandidate[] {
    return rank(items, size);
  }

  private async resolve(candidate: Candidate): Promise<Resolved> {
    try {
      for (const attempt of searchAttempts(candidate)) {
        const results = await this.tmdb.searchMovie(attempt);
        const match = selectBestMatch({
          title: candidate.title,
          year: candidate.year ?? null,
          results,
        });
        if (match) return { ok: true, match };
      }
      return { ok: false, reason: 'no_match' };
    } catch (err) {
      this.logger.warn(
        `TMDB lookup failed title=${JSON.stringify(candidate.title)} error=${JSON.stringify(errToMessage(err))}`,
      );
      return { ok: false, reason: 'error', error: err };
    }
  }
}
