import { readFileSync } from 'node:fs';
import { DEFAULT_NIGHTLY_CRON } from '../app.constants';

export const APP_CONFIG = 'APP_CONFIG';

export type EnvLike = Record<string, string | undefined>;

export type AiProvider = 'openai' | 'gemini';
export type StoreDriver = 'redis' | 'memory';

export type AppConfig = {
  trakt: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
  };
  tmdb: {
    apiKey: string;
  };
  ai: {
    provider: AiProvider;
    apiKey: string;
    model: string;
  };
  store: {
    driver: StoreDriver;
    redisUrl: string;
    namespace: string;
  };
  crypto: {
    masterKey: string;
  };
  schedule: {
    enabled: boolean;
    cron: string;
    timezone: string | null;
  };
  batch: {
    concurrency: number;
  };
  enrichment: {
    concurrency: number;
    minRating: number | null;
  };
  tokens: {
    refreshMarginMs: number;
  };
  http: {
    timeoutMs: number;
    aiTimeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
  };
};

const DEFAULT_MODELS: Record<AiProvider, string> = {
  openai: 'gpt-4o-mini',
  gemini: 'gemini-2.5-flash',
};

export class ConfigValidationError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Resolve a variable, falling back to the file named by `<NAME>_FILE`
 * (Docker/Kubernetes secrets). A direct value always wins over the file.
 */
export function readEnvValue(env: EnvLike, name: string): string | null {
  const direct = env[name]?.trim();
  if (direct) return direct;

  const filePath = env[`${name}_FILE`]?.trim();
  if (!filePath) return null;

  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ${name}_FILE (${filePath}): ${msg}`);
  }
  const value = raw.replace(/\r\n/g, '\n').replace(/\n$/, '').trim();
  return value || null;
}

function parseBoolEnv(raw: string | null, fallback: boolean): boolean {
  if (raw === null) return fallback;
  const v = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return fallback;
}

function parsePositiveIntEnv(
  raw: string | null,
  fallback: number,
  bounds: { min?: number; max?: number } = {},
): number {
  if (raw === null) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return fallback;
  const min = bounds.min ?? 1;
  const max = bounds.max ?? Number.MAX_SAFE_INTEGER;
  return Math.min(max, Math.max(min, n));
}

function parseOptionalNumberEnv(raw: string | null): number | null {
  if (raw === null) return null;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) ? n : null;
}

function parseAiProvider(raw: string | null): AiProvider {
  return raw?.toLowerCase() === 'gemini' ? 'gemini' : 'openai';
}

function parseStoreDriver(raw: string | null): StoreDriver {
  return raw?.toLowerCase() === 'memory' ? 'memory' : 'redis';
}

export function loadAppConfig(env: EnvLike = process.env): AppConfig {
  const missing: string[] = [];
  const required = (name: string): string => {
    const value = readEnvValue(env, name);
    if (!value) {
      missing.push(name);
      return '';
    }
    return value;
  };

  const provider = parseAiProvider(readEnvValue(env, 'AI_PROVIDER'));
  const aiKeyName = provider === 'gemini' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY';
  const aiModelName = provider === 'gemini' ? 'GEMINI_MODEL' : 'OPENAI_MODEL';
  const driver = parseStoreDriver(readEnvValue(env, 'STORE_DRIVER'));

  const config: AppConfig = {
    trakt: {
      clientId: required('TRAKT_CLIENT_ID'),
      clientSecret: required('TRAKT_CLIENT_SECRET'),
      redirectUri: required('TRAKT_REDIRECT_URI'),
    },
    tmdb: {
      apiKey: required('TMDB_API_KEY'),
    },
    ai: {
      provider,
      apiKey: required(aiKeyName),
      model: readEnvValue(env, aiModelName) ?? DEFAULT_MODELS[provider],
    },
    store: {
      driver,
      redisUrl:
        driver === 'redis'
          ? required('REDIS_URL')
          : (readEnvValue(env, 'REDIS_URL') ?? ''),
      namespace: readEnvValue(env, 'STORE_NAMESPACE') ?? 'cinelist',
    },
    crypto: {
      masterKey: required('APP_MASTER_KEY'),
    },
    schedule: {
      enabled: parseBoolEnv(readEnvValue(env, 'SCHEDULER_ENABLED'), true),
      cron: readEnvValue(env, 'NIGHTLY_CRON') ?? DEFAULT_NIGHTLY_CRON,
      timezone: readEnvValue(env, 'NIGHTLY_TIMEZONE'),
    },
    batch: {
      concurrency: parsePositiveIntEnv(
        readEnvValue(env, 'BATCH_CONCURRENCY'),
        1,
        { max: 16 },
      ),
    },
    enrichment: {
      concurrency: parsePositiveIntEnv(
        readEnvValue(env, 'ENRICH_CONCURRENCY'),
        4,
        { max: 16 },
      ),
      minRating: parseOptionalNumberEnv(readEnvValue(env, 'MIN_RATING')),
    },
    tokens: {
      refreshMarginMs:
        parsePositiveIntEnv(readEnvValue(env, 'TOKEN_REFRESH_MARGIN_SECONDS'), 300, {
          min: 0,
        }) * 1000,
    },
    http: {
      timeoutMs: parsePositiveIntEnv(readEnvValue(env, 'HTTP_TIMEOUT_MS'), 20_000),
      aiTimeoutMs: parsePositiveIntEnv(readEnvValue(env, 'AI_TIMEOUT_MS'), 90_000),
      retryAttempts: parsePositiveIntEnv(readEnvValue(env, 'HTTP_RETRY_ATTEMPTS'), 3, {
        max: 10,
      }),
      retryDelayMs: parsePositiveIntEnv(
        readEnvValue(env, 'HTTP_RETRY_DELAY_MS'),
        1_000,
        { min: 0 },
      ),
    },
  };

  if (missing.length) throw new ConfigValidationError(missing);
  return Object.freeze(config);
}
