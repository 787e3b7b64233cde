import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import {
  TRAKT_API_BASE_URL,
  TRAKT_API_VERSION,
} from '../app.constants';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import type { TraktHttpMethod } from './trakt.types';

/** Non-2xx or transport failure talking to Trakt. `upstreamStatus` is null for transport errors. */
export class TraktRequestError extends BadGatewayException {
  constructor(
    message: string,
    readonly upstreamStatus: number | null,
  ) {
    super(message);
  }

  get retryable(): boolean {
    return (
      this.upstreamStatus === null || this.upstreamStatus === 429 || this.upstreamStatus >= 500
    );
  }
}

export type TraktResponse = {
  status: number;
  data: unknown;
  headers: Headers;
};

@Injectable()
export class TraktApiService {
  private readonly logger = new Logger(TraktApiService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async request(params: {
    method: TraktHttpMethod;
    path: string;
    accessToken?: string;
    query?: Record<string, string | number>;
    body?: unknown;
  }): Promise<TraktResponse> {
    const url = new URL(`${TRAKT_API_BASE_URL}${params.path}`);
    for (const [k, v] of Object.entries(params.query ?? {})) {
      url.searchParams.set(k, String(v));
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'trakt-api-version': TRAKT_API_VERSION,
      'trakt-api-key': this.config.trakt.clientId,
    };
    if (params.accessToken) headers.Authorization = `Bearer ${params.accessToken}`;
    if (params.body !== undefined) headers['Content-Type'] = 'application/json';

    const label = `Trakt ${params.method} ${params.path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.http.timeoutMs);

    try {
      const res = await fetch(url, {
        method: params.method,
        headers,
        body: params.body === undefined ? undefined : JSON.stringify(params.body),
        signal: controller.signal,
      });

      const text = await res.text().catch(() => '');
      if (!res.ok) {
        throw new TraktRequestError(
          `${label} failed: HTTP ${res.status} ${text.slice(0, 300)}`.trim(),
          res.status,
        );
      }

      let data: unknown = null;
      if (text) {
        try {
          data = JSON.parse(text);
        } catch {
          throw new TraktRequestError(`${label} returned invalid JSON`, res.status);
        }
      }
      return { status: res.status, data, headers: res.headers };
    } catch (err) {
      if (err instanceof TraktRequestError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.debug(`${label} transport error: ${msg}`);
      throw new TraktRequestError(`${label} failed: ${msg}`, null);
    } finally {
      clearTimeout(timeout);
    }
  }
}
