import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HISTORY_MAX_PAGES,
  HISTORY_PAGE_SIZE,
  TIME_PERIOD_DAYS,
  type TimePeriod,
} from '../app.constants';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { asPositiveInt, getRecord, isPlainObject } from '../lib/json-narrow';
import { errToMessage, PipelineError } from '../lib/pipeline-errors';
import { withRetry } from '../lib/retry';
import { normalizeTitleForMatching } from '../lib/title-normalize';
import { TraktApiService, TraktRequestError } from '../trakt/trakt-api.service';
import type { GenreCount, WatchEvent } from './history.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function windowStartFor(period: TimePeriod, now: Date = new Date()): Date {
  return new Date(now.getTime() - TIME_PERIOD_DAYS[period] * DAY_MS);
}

/** "science-fiction" -> "Science Fiction" */
export function formatGenreSlug(slug: string): string {
  return slug
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

export function parseHistoryEntry(raw: unknown): WatchEvent | null {
  if (!isPlainObject(raw)) return null;
  const movie = getRecord(raw, 'movie');
  if (!movie) return null;

  const ids = getRecord(movie, 'ids') ?? {};
  const titleId = asPositiveInt(ids['trakt']);
  const title =
    typeof movie['title'] === 'string' ? normalizeTitleForMatching(movie['title']) : '';
  const watchedAt =
    typeof raw['watched_at'] === 'string' ? new Date(raw['watched_at']) : null;
  if (!titleId || !title || !watchedAt || Number.isNaN(watchedAt.getTime())) {
    return null;
  }

  const genres = Array.isArray(movie['genres'])
    ? movie['genres']
        .filter((g): g is string => typeof g === 'string' && g.trim() !== '')
        .map(formatGenreSlug)
    : [];

  return {
    titleId,
    tmdbId: asPositiveInt(ids['tmdb']),
    title,
    year: asPositiveInt(movie['year']),
    watchedAt,
    genres,
  };
}

/** Genre frequency, most frequent first, ties by name. */
export function summarizeGenres(events: WatchEvent[]): GenreCount[] {
  const counts = new Map<string, number>();
  for (const e of events) {
    for (const g of e.genres) counts.set(g, (counts.get(g) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([genre, count]) => ({ genre, count }))
    .sort((a, b) => b.count - a.count || a.genre.localeCompare(b.genre));
}

@Injectable()
export class HistoryFetcherService {
  private readonly logger = new Logger(HistoryFetcherService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly trakt: TraktApiService,
  ) {}

  /**
   * Movie watch events in `[windowStart, now]`, newest first, one per movie.
   * An empty window yields `[]`.
   */
  async fetchHistory(
    userId: string,
    accessToken: string,
    windowStart: Date,
    now: Date = new Date(),
  ): Promise<WatchEvent[]> {
    const startMs = windowStart.getTime();
    const endMs = now.getTime();
    const events: WatchEvent[] = [];
    const seen = new Set<number>();
    let rawCount = 0;
    let pages = 0;

    for (let page = 1; page <= HISTORY_MAX_PAGES; page += 1) {
      const { items, pageCount } = await this.fetchPage({
        userId,
        accessToken,
        page,
        windowStart,
      });
      pages = page;
      rawCount += items.length;

      let reachedWindowStart = false;
      for (const raw of items) {
        const event = parseHistoryEntry(raw);
        if (!event) continue;
        const t = event.watchedAt.getTime();
        if (t < startMs) {
          reachedWindowStart = true;
          continue;
        }
        if (t > endMs) continue;
        if (seen.has(event.titleId)) continue;
        seen.add(event.titleId);
        events.push(event);
      }

      if (items.length < HISTORY_PAGE_SIZE) break;
      if (reachedWindowStart) break;
      if (pageCount !== null && page >= pageCount) break;
      if (page === HISTORY_MAX_PAGES) {
        this.logger.warn(`History page cap reached user=${userId} pages=${page}`);
      }
    }

    this.logger.log(
      `Fetched history user=${userId} pages=${pages} raw=${rawCount} unique=${events.length}`,
    );
    return events;
  }

  private async fetchPage(params: {
    userId: string;
    accessToken: string;
    page: number;
    windowStart: Date;
  }): Promise<{ items: unknown[]; pageCount: number | null }> {
    const { userId, page } = params;
    try {
      const res = await withRetry(
        () =>
          this.trakt.request({
            method: 'GET',
            path: `/users/${encodeURIComponent(userId)}/history/movies`,
            accessToken: params.accessToken,
            query: {
              page,
              limit: HISTORY_PAGE_SIZE,
              start_at: params.windowStart.toISOString(),
              extended: 'full',
            },
          }),
        {
          label: 'Trakt history page',
          logger: this.logger,
          attempts: this.config.http.retryAttempts,
          delayMs: this.config.http.retryDelayMs,
          shouldRetry: (err) => !(err instanceof TraktRequestError) || err.retryable,
          meta: { user: userId, page },
        },
      );
      return {
        items: Array.isArray(res.data) ? res.data : [],
        pageCount: asPositiveInt(res.headers.get('x-pagination-page-count')),
      };
    } catch (err) {
      if (err instanceof TraktRequestError && err.upstreamStatus === 401) {
        throw new PipelineError(
          'NotAuthenticated',
          `Trakt rejected the access token for ${userId}`,
          { cause: err },
        );
      }
      throw new PipelineError(
        'UpstreamError',
        `Trakt history fetch failed for ${userId} (page ${page}): ${errToMessage(err)}`,
        { cause: err },
      );
    }
  }
}
