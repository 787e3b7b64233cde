import { Injectable, Logger } from '@nestjs/common';
import { TRAKT_WEB_BASE_URL } from '../app.constants';
import type { EnrichedCandidate } from '../enrichment/enrichment.types';
import { errToMessage, PipelineError } from '../lib/pipeline-errors';
import { TraktListsService } from '../trakt/trakt-lists.service';
import type { TraktListSummary } from '../trakt/trakt.types';
import type { ListSyncResult } from './lists.types';

export function listUrl(userId: string, slug: string): string {
  return `${TRAKT_WEB_BASE_URL}/users/${encodeURIComponent(userId)}/lists/${encodeURIComponent(slug)}`;
}

@Injectable()
export class ListSynchronizerService {
  private readonly logger = new Logger(ListSynchronizerService.name);

  constructor(private readonly lists: TraktListsService) {}

  /**
   * Makes the named list hold exactly `items`, in order. Creates the list
   * when no list has that exact name; otherwise clears it first.
   */
  async sync(
    userId: string,
    accessToken: string,
    listName: string,
    items: EnrichedCandidate[],
  ): Promise<ListSyncResult> {
    const existing = await this.step('list lists', userId, () =>
      this.lists.listLists(accessToken),
    );
    let list: TraktListSummary | undefined = existing.find((l) => l.name === listName);
    const created = !list;

    if (list) {
      const current = list;
      const removed = await this.step('clear list', userId, () =>
        this.lists.clearList(accessToken, current.id),
      );
      this.logger.debug(`Cleared list userId=${userId} listId=${current.id} removed=${removed}`);
    } else {
      list = await this.step('create list', userId, () =>
        this.lists.createList(accessToken, listName),
      );
    }

    const target = list;
    const result = await this.step('add items', userId, () =>
      this.lists.addMovies(
        accessToken,
        target.id,
        items.map((i) => i.titleId),
      ),
    );
    if (result.notFoundTmdbIds.length) {
      this.logger.warn(
        `List service could not resolve items userId=${userId} listId=${target.id} tmdbIds=${result.notFoundTmdbIds.join(',')}`,
      );
    }

    this.logger.log(
      `Synced list userId=${userId} listId=${target.id} name=${JSON.stringify(listName)} ` +
        `created=${created} added=${result.added} skipped=${result.notFoundTmdbIds.length}`,
    );
    return {
      listId: target.id,
      listSlug: target.slug,
      created,
      added: result.added,
      skipped: result.notFoundTmdbIds.length,
      url: listUrl(userId, target.slug),
    };
  }

  private async step<T>(label: string, userId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PipelineError(
        'ListAPIError',
        `Trakt ${label} failed for ${userId}: ${errToMessage(err)}`,
        { cause: err },
      );
    }
  }
}
