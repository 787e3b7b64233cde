import { BadGatewayException } from '@nestjs/common';
import { PipelineError } from '../lib/pipeline-errors';
import type { Candidate } from '../recommendations/recommendations.types';
import { buildTestConfig } from '../testing/test-config';
import type { TmdbMovieSearchResult } from '../tmdb/tmdb.service';
import type { EnrichedCandidate } from './enrichment.types';
import {
  filterByGenre,
  MetadataEnricherService,
  rank,
  searchAttempts,
} from './metadata-enricher.service';

function movie(
  id: number,
  title: string,
  releaseDate: string,
  genreIds: number[],
  rating = 7,
): TmdbMovieSearchResult {
  return {
    id,
    title,
    release_date: releaseDate,
    genre_ids: genreIds,
    vote_count: 1000,
    vote_average: rating,
    popularity: 20,
  };
}

const SEARCH_TABLE: Record<string, TmdbMovieSearchResult[]> = {
  'Heat|1995': [movie(949, 'Heat', '1995-12-15', [28, 80], 7.9)],
  'Heat|': [movie(949, 'Heat', '1995-12-15', [28, 80], 7.9)],
  'Spider Man No Way Home|': [
    movie(634649, 'Spider-Man: No Way Home', '2021-12-15', [28, 12, 878], 8),
  ],
  'Watched One|': [movie(500, 'Watched One', '2010-01-01', [18])],
  'No Genres|': [movie(600, 'No Genres', '2011-01-01', [])],
  'Low|': [movie(700, 'Low', '2012-01-01', [35], 3)],
  'Alien|1979': [movie(348, 'Alien', '1979-05-25', [27, 878], 8.1)],
};

function createService() {
  const searchMovie = jest.fn(async (params: { query: string; year?: number | null }) => {
    if (params.query === 'Broken') {
      throw new BadGatewayException('TMDB request failed: HTTP 500');
    }
    return SEARCH_TABLE[`${params.query}|${params.year ?? ''}`] ?? [];
  });
  const service = new MetadataEnricherService(
    buildTestConfig({ enrichment: { concurrency: 2 } }),
    { searchMovie } as never,
  );
  return { service, searchMovie };
}

describe('MetadataEnricherService.enrich', () => {
  const candidates: Candidate[] = [
    { title: 'Heat', year: 1995, similarityBucket: 'similar' },
    { title: 'Spider-Man: No Way Home', year: 2021, similarityBucket: 'similar' },
    { title: 'Unknown Film', similarityBucket: 'similar' },
    { title: 'Watched One', similarityBucket: 'similar' },
    { title: 'No Genres', similarityBucket: 'diverse' },
    { title: 'Heat', similarityBucket: 'diverse' },
    { title: 'Broken', similarityBucket: 'diverse' },
    { title: 'Low', similarityBucket: 'diverse' },
    { title: 'Alien', year: 1979, similarityBucket: 'diverse' },
  ];

  it('resolves candidates in order and drops what cannot be used', async () => {
    const { service } = createService();

    const out = await service.enrich(candidates, { excludeTmdbIds: [500], minRating: 5 });

    expect(out).toEqual([
      {
        titleId: 949,
        title: 'Heat',
        genres: ['Action', 'Crime'],
        rating: 7.9,
        year: 1995,
        similarityBucket: 'similar',
      },
      {
        titleId: 634649,
        title: 'Spider-Man: No Way Home',
        genres: ['Action', 'Adventure', 'Science Fiction'],
        rating: 8,
        year: 2021,
        similarityBucket: 'similar',
      },
      {
        titleId: 348,
        title: 'Alien',
        genres: ['Horror', 'Science Fiction'],
        rating: 8.1,
        year: 1979,
        similarityBucket: 'diverse',
      },
    ]);
  });

  it('retries without the year using the punctuation-stripped title', async () => {
    const { service, searchMovie } = createService();

    await service.enrich([candidates[1]]);

    expect(searchMovie.mock.calls.map(([p]) => p)).toEqual([
      { query: 'Spider-Man: No Way Home', year: 2021 },
      { query: 'Spider Man No Way Home', year: null },
    ]);
  });

  it('keeps low-rated and watched titles when no gate applies', async () => {
    const { service } = createService();

    const out = await service.enrich([candidates[3], candidates[7]]);

    expect(out.map((c) => c.titleId)).toEqual([500, 700]);
  });

  it('reports an upstream failure when every lookup errors', async () => {
    const { service } = createService();

    const err = await service
      .enrich([
        { title: 'Broken', similarityBucket: 'similar' },
        { title: 'Broken', year: 2001, similarityBucket: 'diverse' },
      ])
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    expect(err).toMatchObject({
      kind: 'UpstreamError',
      message: 'TMDB lookups failed for all 2 candidates',
    });
  });

  it('drops failed lookups when others still resolve', async () => {
    const { service } = createService();

    const out = await service.enrich([
      { title: 'Broken', similarityBucket: 'similar' },
      { title: 'Unknown Film', similarityBucket: 'similar' },
    ]);

    expect(out).toEqual([]);
  });
});

describe('searchAttempts', () => {
  it('searches once when there is neither a year nor a distinct variant', () => {
    expect(searchAttempts({ title: 'Heat', similarityBucket: 'similar' })).toEqual([
      { query: 'Heat', year: null },
    ]);
  });

  it('drops the year on the second attempt', () => {
    expect(searchAttempts({ title: 'Heat', year: 1995, similarityBucket: 'similar' })).toEqual([
      { query: 'Heat', year: 1995 },
      { query: 'Heat', year: null },
    ]);
  });
});

function enriched(
  titleId: number,
  bucket: EnrichedCandidate['similarityBucket'],
  genres: string[] = ['Drama'],
): EnrichedCandidate {
  return {
    titleId,
    title: `Movie ${titleId}`,
    genres,
    rating: 7,
    year: 2000,
    similarityBucket: bucket,
  };
}

describe('filterByGenre', () => {
  const items = [
    enriched(1, 'similar', ['Science Fiction', 'Action']),
    enriched(2, 'similar', ['Drama']),
    enriched(3, 'diverse', ['Comedy', 'Drama']),
  ];

  it('returns the input unchanged for empty filters', () => {
    expect(filterByGenre(items, [])).toBe(items);
  });

  it('keeps items sharing any genre, ignoring case and hyphens', () => {
    const out = filterByGenre(items, ['science-fiction', 'COMEDY']);
    expect(out.map((i) => i.titleId)).toEqual([1, 3]);
    for (const item of out) {
      expect(item.genres.some((g) => ['Science Fiction', 'Comedy'].includes(g))).toBe(true);
    }
  });
});

describe('rank', () => {
  const build = (similar: number, diverse: number) => [
    ...Array.from({ length: diverse }, (_, i) => enriched(1000 + i, 'diverse')),
    ...Array.from({ length: similar }, (_, i) => enriched(i + 1, 'similar')),
  ];

  it('takes 14 similar then 6 diverse from a full pool', () => {
    const out = rank(build(30, 10));
    expect(out).toHaveLength(20);
    expect(out.slice(0, 14).every((i) => i.similarityBucket === 'similar')).toBe(true);
    expect(out.slice(14).every((i) => i.similarityBucket === 'diverse')).toBe(true);
    expect(out[0].titleId).toBe(1);
    expect(out[14].titleId).toBe(1000);
  });

  it('backfills from diverse when similar runs short', () => {
    const out = rank(build(5, 30));
    expect(out.filter((i) => i.similarityBucket === 'similar')).toHaveLength(5);
    expect(out).toHaveLength(20);
  });

  it('backfills from similar when diverse runs short', () => {
    const out = rank(build(30, 2));
    expect(out.filter((i) => i.similarityBucket === 'similar')).toHaveLength(18);
    expect(out).toHaveLength(20);
  });

  it('never exceeds the pool', () => {
    expect(rank(build(3, 2))).toHaveLength(5);
  });
});
