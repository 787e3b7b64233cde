import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { CredentialStoreService } from '../credentials/credential-store.service';
import { MetadataEnricherService } from '../enrichment/metadata-enricher.service';
import { HistoryFetcherService, windowStartFor } from '../history/history-fetcher.service';
import type { WatchEvent } from '../history/history.types';
import {
  classifyError,
  errToMessage,
  isPipelineError,
  PipelineError,
} from '../lib/pipeline-errors';
import { ListSynchronizerService } from '../lists/list-synchronizer.service';
import { RecommendationGeneratorService } from '../recommendations/recommendation-generator.service';
import type { Candidate } from '../recommendations/recommendations.types';
import { UserConfigStore } from '../user-config/user-config.store';
import type { UserConfiguration } from '../user-config/user-config.types';
import type {
  OnDemandRequest,
  OnDemandResult,
  PipelineOutcome,
  RunResult,
} from './pipeline.types';

/**
 * token -> history -> AI candidates -> TMDB enrichment -> genre filter ->
 * rank -> list sync, for one user.
 */
@Injectable()
export class RecommendationPipelineService {
  private readonly logger = new Logger(RecommendationPipelineService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly credentials: CredentialStoreService,
    private readonly history: HistoryFetcherService,
    private readonly generator: RecommendationGeneratorService,
    private readonly enricher: MetadataEnricherService,
    private readonly lists: ListSynchronizerService,
    private readonly userConfigs: UserConfigStore,
  ) {}

  async runForUser(
    userConfig: Pick<UserConfiguration, 'userId' | 'timePeriod' | 'genreFilters' | 'listName'>,
    now = new Date(),
  ): Promise<PipelineOutcome> {
    const { userId, genreFilters } = userConfig;
    const accessToken = await this.credentials.ensureValidToken(userId);

    const windowStart = windowStartFor(userConfig.timePeriod, now);
    const history = await this.history.fetchHistory(userId, accessToken, windowStart, now);
    if (!history.length) {
      throw new PipelineError(
        'NoHistory',
        `No watch history for ${userId} in the last ${userConfig.timePeriod}`,
      );
    }

    const candidates = await this.generateWithFallback(userId, history, genreFilters);

    const watchedTmdbIds = history
      .map((e) => e.tmdbId)
      .filter((id): id is number => id !== null);
    const enriched = await this.enricher.enrich(candidates, {
      excludeTmdbIds: watchedTmdbIds,
      minRating: this.config.enrichment.minRating,
    });
    const filtered = this.enricher.filterByGenre(enriched, genreFilters);
    const ranked = this.enricher.rank(filtered);
    if (!ranked.length) {
      throw new PipelineError(
        'NoRecommendations',
        `No recommendations left for ${userId} after enrichment (candidates=${candidates.length} enriched=${enriched.length} filtered=${filtered.length})`,
      );
    }

    const list = await this.lists.sync(userId, accessToken, userConfig.listName, ranked);
    return { ranked, list, historyCount: history.length };
  }

  /** Runs the pipeline, never throws, and stores the outcome on the user's configuration. */
  async executeAndRecord(userConfig: UserConfiguration): Promise<RunResult> {
    const { userId } = userConfig;
    const startedAt = Date.now();
    let result: RunResult;

    try {
      const outcome = await this.runForUser(userConfig);
      result = {
        userId,
        success: true,
        itemCount: outcome.ranked.length,
        timestamp: new Date().toISOString(),
      };
      this.logger.log(
        `Run succeeded userId=${userId} items=${outcome.ranked.length} list=${outcome.list.url} ms=${Date.now() - startedAt}`,
      );
    } catch (err) {
      const errorKind = classifyError(err);
      result = {
        userId,
        success: false,
        itemCount: 0,
        errorKind,
        errorMessage: errToMessage(err),
        timestamp: new Date().toISOString(),
      };
      this.logger.error(
        `Run failed userId=${userId} kind=${errorKind} ms=${Date.now() - startedAt} error=${JSON.stringify(result.errorMessage)}`,
        errorKind === 'Unknown' && err instanceof Error ? err.stack : undefined,
      );
    }

    await this.record(result);
    return result;
  }

  /** Runs once for the caller; a successful run saves the settings used. */
  async generateOnDemand(request: OnDemandRequest): Promise<OnDemandResult> {
    try {
      const outcome = await this.runForUser(request);
      const config = await this.userConfigs.upsertSettings(request.userId, {
        timePeriod: request.timePeriod,
        genreFilters: request.genreFilters,
        listName: request.listName,
      });
      const finishedAt = new Date();
      await this.userConfigs.recordRun(
        request.userId,
        { outcome: 'success', itemCount: outcome.ranked.length, errorKind: null },
        finishedAt,
      );
      return {
        ok: true,
        outcome,
        config: {
          ...config,
          lastRunAt: finishedAt.toISOString(),
          lastRunStatus: { outcome: 'success', itemCount: outcome.ranked.length, errorKind: null },
          updatedAt: finishedAt.toISOString(),
        },
      };
    } catch (err) {
      const errorKind = classifyError(err);
      const message = errToMessage(err);
      this.logger.warn(
        `On-demand run failed userId=${request.userId} kind=${errorKind} error=${JSON.stringify(message)}`,
      );
      await this.record({
        userId: request.userId,
        success: false,
        itemCount: 0,
        errorKind,
        errorMessage: message,
        timestamp: new Date().toISOString(),
      });
      return { ok: false, errorKind, message };
    }
  }

  private async generateWithFallback(
    userId: string,
    history: WatchEvent[],
    genreFilters: string[],
  ): Promise<Candidate[]> {
    try {
      return await this.generator.generate(history, genreFilters, 'primary');
    } catch (err) {
      if (!isPipelineError(err, 'AIServiceError', 'UnparsableResponse')) throw err;
      this.logger.warn(
        `Primary prompt failed userId=${userId} kind=${err.kind}; retrying with the simplified prompt`,
      );
      return await this.generator.generate(history, genreFilters, 'simplified');
    }
  }

  private async record(result: RunResult): Promise<void> {
    try {
      await this.userConfigs.recordRun(
        result.userId,
        {
          outcome: result.success ? 'success' : 'failed',
          itemCount: result.itemCount,
          errorKind: result.errorKind ?? null,
        },
        new Date(result.timestamp),
      );
    } catch (err) {
      this.logger.warn(
        `Could not record run userId=${result.userId} error=${JSON.stringify(errToMessage(err))}`,
      );
    }
  }
}
