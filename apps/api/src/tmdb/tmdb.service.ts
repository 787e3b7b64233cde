import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import { TMDB_API_BASE_URL } from '../app.constants';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { asFiniteNumber, asPositiveInt, asTrimmedString, isPlainObject } from '../lib/json-narrow';

export type TmdbMovieSearchResult = {
  id: number;
  title: string;
  original_title?: string;
  release_date?: string;
  genre_ids: number[];
  vote_count: number;
  vote_average: number;
  popularity: number;
};

export function releaseYear(r: Pick<TmdbMovieSearchResult, 'release_date'>): number | null {
  const y = Number.parseInt((r.release_date ?? '').slice(0, 4), 10);
  return Number.isFinite(y) && y > 1800 ? y : null;
}

export function parseMovieSearchResult(raw: unknown): TmdbMovieSearchResult | null {
  if (!isPlainObject(raw)) return null;
  const id = asPositiveInt(raw['id']);
  const title = asTrimmedString(raw['title']);
  if (!id || !title) return null;

  const originalTitle = asTrimmedString(raw['original_title']);
  const releaseDate = asTrimmedString(raw['release_date']);
  return {
    id,
    title,
    ...(originalTitle ? { original_title: originalTitle } : {}),
    ...(releaseDate ? { release_date: releaseDate } : {}),
    genre_ids: Array.isArray(raw['genre_ids'])
      ? raw['genre_ids']
          .map(asPositiveInt)
          .filter((n): n is number => n !== null)
      : [],
    vote_count: asFiniteNumber(raw['vote_count']) ?? 0,
    vote_average: asFiniteNumber(raw['vote_average']) ?? 0,
    popularity: asFiniteNumber(raw['popularity']) ?? 0,
  };
}

@Injectable()
export class TmdbService {
  private readonly logger = new Logger(TmdbService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async searchMovie(params: {
    query: string;
    year?: number | null;
    includeAdult?: boolean;
  }): Promise<TmdbMovieSearchResult[]> {
    const apiKey = this.config.tmdb.apiKey.trim();
    const query = params.query.trim();
    if (!apiKey) throw new BadGatewayException('TMDB apiKey is required');
    if (!query) return [];

    const url = new URL(`${TMDB_API_BASE_URL}/search/movie`);
    url.searchParams.set('api_key', apiKey);
    url.searchParams.set('query', query);
    url.searchParams.set('include_adult', String(Boolean(params.includeAdult)));
    if (params.year && Number.isFinite(params.year)) {
      url.searchParams.set('year', String(Math.trunc(params.year)));
    }

    const data = await this.fetchTmdbJson(url, this.config.http.timeoutMs);
    const results = isPlainObject(data) && Array.isArray(data['results']) ? data['results'] : [];

    const out = results
      .map(parseMovieSearchResult)
      .filter((r): r is TmdbMovieSearchResult => r !== null);
    this.logger.debug(
      `TMDB search query=${JSON.stringify(query)} year=${params.year ?? '-'} results=${out.length}`,
    );
    return out;
  }

  private async fetchTmdbJson(url: URL, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(
          `TMDB request failed: HTTP ${res.status} ${body.slice(0, 300)}`.trim(),
        );
      }

      return (await res.json()) as unknown;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      const cause = err instanceof Error ? err.cause : undefined;
      const causeMsg =
        cause instanceof Error ? cause.message : cause ? String(cause) : '';
      throw new BadGatewayException(
        `TMDB request failed: ${err instanceof Error ? err.message : String(err)}${
          causeMsg ? ` (cause: ${causeMsg})` : ''
        }`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
