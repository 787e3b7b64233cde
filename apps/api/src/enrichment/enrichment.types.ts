import type { SimilarityBucket } from '../recommendations/recommendations.types';

export type EnrichedCandidate = {
  /** TMDB movie id. */
  titleId: number;
  title: string;
  /** Never empty. */
  genres: string[];
  /** TMDB vote average, 0..10. */
  rating: number;
  year: number | null;
  similarityBucket: SimilarityBucket;
};

export type EnrichOptions = {
  /** TMDB ids the user has already watched. */
  excludeTmdbIds?: Iterable<number>;
  minRating?: number | null;
};

export type DropReason =
  | 'no_match'
  | 'no_genres'
  | 'watched'
  | 'low_rating'
  | 'duplicate'
  | 'error';
