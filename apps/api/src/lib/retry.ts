import type { Logger } from '@nestjs/common';
import { errToMessage } from './pipeline-errors';

export type RetryOptions = {
  label: string;
  logger?: Logger;
  attempts?: number;
  /** Delay before the second attempt; doubles for each later one. */
  delayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  meta?: Record<string, string | number>;
};

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function formatMeta(meta: Record<string, string | number>): string {
  const parts = Object.entries(meta).map(([k, v]) => `${k}=${v}`);
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.delayMs ?? 1_000;
  const { label, logger } = options;
  const meta = formatMeta(options.meta ?? {});

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = options.shouldRetry ? options.shouldRetry(err) : true;
      if (!retryable || attempt >= attempts) {
        logger?.warn(
          `${label}: failed after ${attempt} attempt(s)${meta} error=${JSON.stringify(errToMessage(err))}`,
        );
        throw err;
      }

      const delayMs = backoffDelay(baseDelayMs, attempt);
      logger?.warn(
        `${label}: failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms${meta} error=${JSON.stringify(errToMessage(err))}`,
      );
      await sleep(delayMs);
    }
  }
}
