import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { DEFAULT_LIST_NAME, TIME_PERIODS } from '../app.constants';
import { errToMessage, PIPELINE_ERROR_KINDS } from '../lib/pipeline-errors';
import { KV_STORE, type KeyValueStore } from '../store/kv-store.types';
import type { RunStatus, UserConfiguration, UserSettings } from './user-config.types';

const USER_CONFIG_KEY_PREFIX = 'user_config:';

const runStatusSchema = z.object({
  outcome: z.enum(['success', 'failed']),
  itemCount: z.number().int().nonnegative(),
  errorKind: z.enum(PIPELINE_ERROR_KINDS).nullable(),
});

const userConfigurationSchema = z.object({
  userId: z.string().min(1),
  timePeriod: z.enum(TIME_PERIODS),
  genreFilters: z.array(z.string()),
  listName: z.string().min(1),
  lastRunAt: z.string().nullable(),
  lastRunStatus: runStatusSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export function userConfigKey(userId: string): string {
  return `${USER_CONFIG_KEY_PREFIX}${userId}`;
}

function cleanGenres(genres: string[]): string[] {
  const out: string[] = [];
  for (const g of genres) {
    const t = g.trim();
    if (t && !out.some((o) => o.toLowerCase() === t.toLowerCase())) out.push(t);
  }
  return out;
}

/** Per-user pipeline settings plus the outcome of the last run. Last writer wins. */
@Injectable()
export class UserConfigStore {
  private readonly logger = new Logger(UserConfigStore.name);

  constructor(@Inject(KV_STORE) private readonly store: KeyValueStore) {}

  async get(userId: string): Promise<UserConfiguration | null> {
    const raw = await this.store.get(userConfigKey(userId));
    if (raw === null) return null;
    try {
      return userConfigurationSchema.parse(JSON.parse(raw));
    } catch (err) {
      this.logger.warn(
        `Ignoring unreadable configuration user=${userId} error=${JSON.stringify(errToMessage(err))}`,
      );
      return null;
    }
  }

  async save(config: UserConfiguration): Promise<void> {
    await this.store.set(userConfigKey(config.userId), JSON.stringify(config));
  }

  /** Creates or updates the settings, keeping run history and createdAt. */
  async upsertSettings(
    userId: string,
    settings: Partial<UserSettings>,
    now = new Date(),
  ): Promise<UserConfiguration> {
    const existing = await this.get(userId);
    const ts = now.toISOString();
    const next: UserConfiguration = {
      userId,
      timePeriod: settings.timePeriod ?? existing?.timePeriod ?? '30d',
      genreFilters: cleanGenres(settings.genreFilters ?? existing?.genreFilters ?? []),
      listName: settings.listName?.trim() || existing?.listName || DEFAULT_LIST_NAME,
      lastRunAt: existing?.lastRunAt ?? null,
      lastRunStatus: existing?.lastRunStatus ?? null,
      createdAt: existing?.createdAt ?? ts,
      updatedAt: ts,
    };
    await this.save(next);
    this.logger.log(`${existing ? 'Updated' : 'Created'} configuration user=${userId}`);
    return next;
  }

  /** No-op for users without a stored configuration. */
  async recordRun(userId: string, status: RunStatus, at = new Date()): Promise<boolean> {
    const existing = await this.get(userId);
    if (!existing) return false;
    const ts = at.toISOString();
    await this.save({ ...existing, lastRunAt: ts, lastRunStatus: status, updatedAt: ts });
    return true;
  }

  /** Every readable configuration, ordered by userId. */
  async list(): Promise<UserConfiguration[]> {
    const keys = await this.store.keys(USER_CONFIG_KEY_PREFIX);
    const userIds = keys.map((k) => k.slice(USER_CONFIG_KEY_PREFIX.length)).sort();

    const out: UserConfiguration[] = [];
    for (const userId of userIds) {
      const config = await this.get(userId);
      if (config) out.push(config);
    }
    return out;
  }

  async delete(userId: string): Promise<void> {
    await this.store.delete(userConfigKey(userId));
    this.logger.log(`Deleted configuration user=${userId}`);
  }
}
