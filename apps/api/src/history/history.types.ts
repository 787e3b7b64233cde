export type WatchEvent = {
  /** Trakt movie id. */
  titleId: number;
  tmdbId: number | null;
  title: string;
  year: number | null;
  watchedAt: Date;
  genres: string[];
};

export type GenreCount = {
  genre: string;
  count: number;
};
