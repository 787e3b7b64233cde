import type { AppConfig } from '../config/app-config';

export const TEST_MASTER_KEY = 'a'.repeat(64);

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? Partial<T[K]> : T[K];
};

export function buildTestConfig(overrides: DeepPartial<AppConfig> = {}): AppConfig {
  return {
    trakt: {
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost:3000/callback',
      ...overrides.trakt,
    },
    tmdb: { apiKey: 'test-tmdb-key', ...overrides.tmdb },
    ai: {
      provider: 'openai',
      apiKey: 'test-ai-key',
      model: 'test-model',
      ...overrides.ai,
    },
    store: {
      driver: 'memory',
      redisUrl: '',
      namespace: 'test',
      ...overrides.store,
    },
    crypto: { masterKey: TEST_MASTER_KEY, ...overrides.crypto },
    schedule: {
      enabled: false,
      cron: '0 3 * * *',
      timezone: null,
      ...overrides.schedule,
    },
    batch: { concurrency: 1, ...overrides.batch },
    enrichment: { concurrency: 4, minRating: null, ...overrides.enrichment },
    tokens: { refreshMarginMs: 5 * 60 * 1000, ...overrides.tokens },
    http: {
      timeoutMs: 1_000,
      aiTimeoutMs: 1_000,
      retryAttempts: 3,
      retryDelayMs: 0,
      ...overrides.http,
    },
  };
}
