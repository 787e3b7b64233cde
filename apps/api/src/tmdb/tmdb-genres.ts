// TMDB movie genre ids (GET /genre/movie/list); the set has been stable for years.
export const TMDB_MOVIE_GENRES: Readonly<Record<number, string>> = {
  28: 'Action',
  12: 'Adventure',
  16: 'Animation',
  35: 'Comedy',
  80: 'Crime',
  99: 'Documentary',
  18: 'Drama',
  10751: 'Family',
  14: 'Fantasy',
  36: 'History',
  27: 'Horror',
  10402: 'Music',
  9648: 'Mystery',
  10749: 'Romance',
  878: 'Science Fiction',
  10770: 'TV Movie',
  53: 'Thriller',
  10752: 'War',
  37: 'Western',
};

export function genreNamesForIds(ids: number[]): string[] {
  const out: string[] = [];
  for (const id of ids) {
    const name = TMDB_MOVIE_GENRES[id];
    if (name && !out.includes(name)) out.push(name);
  }
  return out;
}
