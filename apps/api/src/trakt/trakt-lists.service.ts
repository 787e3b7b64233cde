import { BadGatewayException, Injectable } from '@nestjs/common';
import {
  asPositiveInt,
  asTrimmedString,
  getRecord,
  isPlainObject,
} from '../lib/json-narrow';
import { TraktApiService } from './trakt-api.service';
import type { TraktAddItemsResult, TraktListSummary } from './trakt.types';

const LIST_DESCRIPTION =
  'AI-generated movie recommendations based on your watch history';

// Trakt list item `type` -> key used by the items/remove payload.
const REMOVE_BUCKETS: Record<string, string> = {
  movie: 'movies',
  show: 'shows',
  season: 'seasons',
  episode: 'episodes',
  person: 'people',
};

function parseListSummary(raw: unknown): TraktListSummary | null {
  if (!isPlainObject(raw)) return null;
  const ids = getRecord(raw, 'ids') ?? {};
  const id = asPositiveInt(ids['trakt']);
  const name = typeof raw['name'] === 'string' ? raw['name'] : '';
  if (!id || !name) return null;
  return {
    id,
    slug: asTrimmedString(ids['slug']) || String(id),
    name,
    itemCount: asPositiveInt(raw['item_count']) ?? 0,
  };
}

function countMovies(counts: Record<string, unknown> | null): number {
  return asPositiveInt(counts?.['movies']) ?? 0;
}

/** Thin client for the authenticated user's custom lists. */
@Injectable()
export class TraktListsService {
  constructor(private readonly api: TraktApiService) {}

  async listLists(accessToken: string): Promise<TraktListSummary[]> {
    const { data } = await this.api.request({
      method: 'GET',
      path: '/users/me/lists',
      accessToken,
    });
    if (!Array.isArray(data)) {
      throw new BadGatewayException('Trakt lists response was not an array');
    }
    return data
      .map(parseListSummary)
      .filter((l): l is TraktListSummary => l !== null);
  }

  async createList(accessToken: string, name: string): Promise<TraktListSummary> {
    const { data } = await this.api.request({
      method: 'POST',
      path: '/users/me/lists',
      accessToken,
      body: {
        name,
        description: LIST_DESCRIPTION,
        privacy: 'private',
        display_numbers: true,
        allow_comments: false,
        sort_by: 'rank',
        sort_how: 'asc',
      },
    });
    const list = parseListSummary(data);
    if (!list) {
      throw new BadGatewayException('Trakt create list response had no list id');
    }
    return list;
  }

  /** Removes every item currently on the list. Returns how many were removed. */
  async clearList(accessToken: string, listId: number): Promise<number> {
    const { data } = await this.api.request({
      method: 'GET',
      path: `/users/me/lists/${listId}/items`,
      accessToken,
    });
    const items = Array.isArray(data) ? data : [];

    const payload: Record<string, Array<{ ids: Record<string, unknown> }>> = {};
    let count = 0;
    for (const item of items) {
      if (!isPlainObject(item)) continue;
      const type = asTrimmedString(item['type']);
      const bucket = REMOVE_BUCKETS[type];
      const ids = getRecord(item[type], 'ids');
      if (!bucket || !ids) continue;
      (payload[bucket] ??= []).push({ ids });
      count += 1;
    }
    if (count === 0) return 0;

    await this.api.request({
      method: 'POST',
      path: `/users/me/lists/${listId}/items/remove`,
      accessToken,
      body: payload,
    });
    return count;
  }

  async addMovies(
    accessToken: string,
    listId: number,
    tmdbIds: number[],
  ): Promise<TraktAddItemsResult> {
    if (!tmdbIds.length) return { added: 0, existing: 0, notFoundTmdbIds: [] };

    const { data } = await this.api.request({
      method: 'POST',
      path: `/users/me/lists/${listId}/items`,
      accessToken,
      body: { movies: tmdbIds.map((tmdb) => ({ ids: { tmdb } })) },
    });
    const missing = getRecord(data, 'not_found')?.['movies'];

    const notFoundTmdbIds: number[] = [];
    for (const m of Array.isArray(missing) ? missing : []) {
      const tmdb = asPositiveInt(getRecord(m, 'ids')?.['tmdb']);
      if (tmdb) notFoundTmdbIds.push(tmdb);
    }

    return {
      added: countMovies(getRecord(data, 'added')),
      existing: countMovies(getRecord(data, 'existing')),
      notFoundTmdbIds,
    };
  }
}
