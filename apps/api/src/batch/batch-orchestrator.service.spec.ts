import { ConflictException } from '@nestjs/common';
import type { AiPrompt } from '../ai/ai.types';
import { CredentialStoreService } from '../credentials/credential-store.service';
import { CryptoService } from '../crypto/crypto.service';
import type { EnrichedCandidate } from '../enrichment/enrichment.types';
import { MetadataEnricherService } from '../enrichment/metadata-enricher.service';
import type { WatchEvent } from '../history/history.types';
import type { ListSyncResult } from '../lists/lists.types';
import type { RunResult } from '../pipeline/pipeline.types';
import { RecommendationPipelineService } from '../pipeline/recommendation-pipeline.service';
import { RecommendationGeneratorService } from '../recommendations/recommendation-generator.service';
import { InMemoryKeyValueStore } from '../store/in-memory-kv.store';
import { buildTestConfig } from '../testing/test-config';
import { TraktRequestError } from '../trakt/trakt-api.service';
import type { TokenPair } from '../trakt/trakt.types';
import { UserConfigStore } from '../user-config/user-config.store';
import type { UserConfiguration } from '../user-config/user-config.types';
import { BatchOrchestratorService, summarizeRuns } from './batch-orchestrator.service';

function suggestions(prefix: string, count: number) {
  return Array.from({ length: count }, (_, i) => ({ title: `${prefix} ${i + 1}`, year: 2000 + i }));
}

const AI_REPLY = JSON.stringify({
  similar: suggestions('Similar', 35),
  diverse: suggestions('Diverse', 15),
});

const WATCHED: WatchEvent[] = [
  {
    titleId: 1,
    tmdbId: 1,
    title: 'Heat',
    year: 1995,
    watchedAt: new Date(),
    genres: ['Crime'],
  },
];

function result(userId: string, success = true): RunResult {
  return { userId, success, itemCount: success ? 20 : 0, timestamp: new Date().toISOString() };
}

describe('BatchOrchestratorService', () => {
  describe('with the real pipeline', () => {
    function setup() {
      const config = buildTestConfig();
      const kv = new InMemoryKeyValueStore();
      const userConfigs = new UserConfigStore(kv);
      const oauth = {
        refresh: jest
          .fn<Promise<TokenPair>, [string]>()
          .mockRejectedValue(
            new TraktRequestError('Trakt POST /oauth/token failed: HTTP 401', 401),
          ),
      };
      const credentials = new CredentialStoreService(
        config,
        kv,
        new CryptoService(config),
        oauth as never,
      );
      const ai = {
        provider: 'openai' as const,
        complete: jest.fn<Promise<string>, [AiPrompt]>().mockResolvedValue(AI_REPLY),
      };
      const tmdb = {
        searchMovie: jest.fn(async (params: { query: string; year?: number | null }) => {
          const n = Number(params.query.split(' ')[1]);
          return [
            {
              id: (params.query.startsWith('Similar') ? 1000 : 2000) + n,
              title: params.query,
              genre_ids: [18],
              vote_count: 10,
              vote_average: 7,
              popularity: 1,
            },
          ];
        }),
      };
      const lists = {
        sync: jest.fn(
          async (
            userId: string,
            _token: string,
            _listName: string,
            items: EnrichedCandidate[],
          ): Promise<ListSyncResult> => ({
            listId: 1,
            listSlug: 'ai-recommendations',
            created: true,
            added: items.length,
            skipped: 0,
            url: `https://trakt.tv/users/${userId}/lists/ai-recommendations`,
          }),
        ),
      };
      const history = {
        fetchHistory: jest
          .fn<Promise<WatchEvent[]>, [string, string, Date, Date]>()
          .mockResolvedValue(WATCHED),
      };

      const pipeline = new RecommendationPipelineService(
        config,
        credentials,
        history as never,
        new RecommendationGeneratorService(ai),
        new MetadataEnricherService(config, tmdb as never),
        lists as never,
        userConfigs,
      );
      const orchestrator = new BatchOrchestratorService(config, userConfigs, pipeline);
      return { orchestrator, userConfigs, credentials, oauth, ai, lists };
    }

    it('records a failed refresh and still processes the next user', async () => {
      const { orchestrator, userConfigs, credentials, oauth, ai, lists } = setup();
      await userConfigs.upsertSettings('alice', {});
      await userConfigs.upsertSettings('bob', {});
      // Inside the five-minute refresh margin, so alice needs a refresh.
      await credentials.storeInitialGrant('alice', {
        accessToken: 'alice-access',
        refreshToken: 'alice-refresh',
        expiresInSeconds: 60,
      });
      await credentials.storeInitialGrant('bob', {
        accessToken: 'bob-access',
        refreshToken: 'bob-refresh',
        expiresInSeconds: 3600,
      });

      const results = await orchestrator.runNightly();

      expect(results.map((r) => [r.userId, r.success, r.errorKind, r.itemCount])).toEqual([
        ['alice', false, 'RefreshFailed', 0],
        ['bob', true, undefined, 20],
      ]);
      expect(oauth.refresh).toHaveBeenCalledWith('alice-refresh');
      expect(ai.complete).toHaveBeenCalledTimes(1);
      expect(lists.sync).toHaveBeenCalledTimes(1);
      expect(lists.sync.mock.calls[0][1]).toBe('bob-access');

      expect((await userConfigs.get('alice'))?.lastRunStatus).toEqual({
        outcome: 'failed',
        itemCount: 0,
        errorKind: 'RefreshFailed',
      });
      expect((await userConfigs.get('bob'))?.lastRunStatus).toEqual({
        outcome: 'success',
        itemCount: 20,
        errorKind: null,
      });
      expect((await credentials.read('alice'))?.state).toBe('unauthenticated');
    });

    it('reports users without a credential as NotAuthenticated', async () => {
      const { orchestrator, userConfigs } = setup();
      await userConfigs.upsertSettings('carol', {});

      const [carol] = await orchestrator.runNightly();

      expect(carol).toMatchObject({
        userId: 'carol',
        success: false,
        errorKind: 'NotAuthenticated',
        errorMessage: 'No Trakt credential for carol',
      });
    });
  });

  describe('with a stubbed pipeline', () => {
    async function setup(concurrency: number, userIds: string[]) {
      const config = buildTestConfig({ batch: { concurrency } });
      const userConfigs = new UserConfigStore(new InMemoryKeyValueStore());
      for (const id of userIds) await userConfigs.upsertSettings(id, {});
      const pipeline = {
        executeAndRecord: jest.fn<Promise<RunResult>, [UserConfiguration]>(),
      };
      const orchestrator = new BatchOrchestratorService(config, userConfigs, pipeline as never);
      return { orchestrator, pipeline };
    }

    it('returns results in configuration order under parallelism', async () => {
      const { orchestrator, pipeline } = await setup(3, ['a', 'b', 'c']);
      const delays: Record<string, number> = { a: 30, b: 0, c: 10 };
      pipeline.executeAndRecord.mockImplementation(
        (config) =>
          new Promise((resolve) => {
            setTimeout(() => resolve(result(config.userId)), delays[config.userId]);
          }),
      );

      const results = await orchestrator.runNightly();

      expect(results.map((r) => r.userId)).toEqual(['a', 'b', 'c']);
    });

    it('isolates a user whose run throws unexpectedly', async () => {
      const { orchestrator, pipeline } = await setup(1, ['a', 'b']);
      pipeline.executeAndRecord
        .mockRejectedValueOnce(new Error('store offline'))
        .mockResolvedValueOnce(result('b'));

      const results = await orchestrator.runNightly();

      expect(results[0]).toMatchObject({
        userId: 'a',
        success: false,
        errorKind: 'Unknown',
        errorMessage: 'store offline',
      });
      expect(results[1]).toMatchObject({ userId: 'b', success: true });
    });

    it('rejects a second run while one is in progress', async () => {
      const { orchestrator, pipeline } = await setup(1, ['a']);
      let release: (r: RunResult) => void = () => undefined;
      pipeline.executeAndRecord.mockImplementation(
        () =>
          new Promise((resolve) => {
            release = resolve;
          }),
      );

      const first = orchestrator.runNightly();
      await expect(orchestrator.runNightly()).rejects.toBeInstanceOf(ConflictException);
      expect(orchestrator.isRunning).toBe(true);

      // Let the store read finish so the pipeline call (and its resolver) exists.
      await new Promise((resolve) => setImmediate(resolve));
      release(result('a'));
      await expect(first).resolves.toHaveLength(1);
      expect(orchestrator.isRunning).toBe(false);
    });

    it('returns an empty list when no users are configured', async () => {
      const { orchestrator, pipeline } = await setup(1, []);
      await expect(orchestrator.runNightly()).resolves.toEqual([]);
      expect(pipeline.executeAndRecord).not.toHaveBeenCalled();
    });
  });
});

describe('summarizeRuns', () => {
  it('counts failures by kind', () => {
    expect(
      summarizeRuns([
        result('a'),
        { ...result('b', false), errorKind: 'NoHistory' },
        { ...result('c', false), errorKind: 'NoHistory' },
        result('d', false),
      ]),
    ).toEqual({
      total: 4,
      succeeded: 1,
      failed: 3,
      failuresByKind: { NoHistory: 2, Unknown: 1 },
    });
  });
});
