import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { CryptoService } from '../crypto/crypto.service';
import { KeyedMutex } from '../lib/keyed-mutex';
import { errToMessage, PipelineError } from '../lib/pipeline-errors';
import { KV_STORE, type KeyValueStore } from '../store/kv-store.types';
import { TraktRequestError } from '../trakt/trakt-api.service';
import { TraktOAuthService } from '../trakt/trakt-oauth.service';
import type { TokenPair } from '../trakt/trakt.types';
import type { UserCredential } from './credentials.types';

const CREDENTIAL_KEY_PREFIX = 'trakt_tokens:';

const storedCredentialSchema = z.object({
  userId: z.string().min(1),
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresAt: z.number().int(),
  state: z.enum(['valid', 'unauthenticated']),
  updatedAt: z.string(),
});

type StoredCredential = z.infer<typeof storedCredentialSchema>;

/** The token endpoint refused the refresh token (invalid_grant); a retry cannot succeed. */
export function isRefreshRejected(err: unknown): boolean {
  return (
    err instanceof TraktRequestError &&
    (err.upstreamStatus === 400 || err.upstreamStatus === 401)
  );
}

export function credentialKey(userId: string): string {
  return `${CREDENTIAL_KEY_PREFIX}${userId}`;
}

/**
 * Per-user OAuth tokens. The whole credential is one JSON value under one
 * key, so a refresh never leaves a new access token next to a stale expiry.
 */
@Injectable()
export class CredentialStoreService {
  private readonly logger = new Logger(CredentialStoreService.name);
  private readonly refreshLocks = new KeyedMutex();

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(KV_STORE) private readonly store: KeyValueStore,
    private readonly crypto: CryptoService,
    private readonly oauth: TraktOAuthService,
  ) {}

  buildAuthorizeUrl(state?: string): string {
    return this.oauth.buildAuthorizeUrl(state);
  }

  async exchangeAuthorizationCode(code: string): Promise<UserCredential> {
    const pair = await this.oauth.exchangeCode(code);
    const userId = await this.oauth.getUsername(pair.accessToken);
    return await this.storeInitialGrant(userId, pair);
  }

  async storeInitialGrant(userId: string, pair: TokenPair): Promise<UserCredential> {
    const credential = this.fromTokenPair(userId, pair);
    await this.write(credential);
    this.logger.log(`Stored Trakt grant user=${userId}`);
    return credential;
  }

  /** Current access token, without a freshness check. */
  async getToken(userId: string): Promise<string> {
    const credential = await this.requireUsable(userId);
    return credential.accessToken;
  }

  async ensureValidToken(userId: string): Promise<string> {
    const current = await this.requireUsable(userId);
    if (this.isFresh(current)) return current.accessToken;

    return await this.refreshLocks.runExclusive(userId, async () => {
      // Another caller may have refreshed while this one waited.
      const latest = await this.requireUsable(userId);
      if (this.isFresh(latest)) return latest.accessToken;
      const refreshed = await this.refreshLocked(latest);
      return refreshed.accessToken;
    });
  }

  /** Unconditional refresh, serialized with any in-flight refresh for the user. */
  async refresh(userId: string): Promise<UserCredential> {
    return await this.refreshLocks.runExclusive(userId, async () => {
      const latest = await this.requireUsable(userId);
      return await this.refreshLocked(latest);
    });
  }

  async revoke(userId: string): Promise<void> {
    await this.store.delete(credentialKey(userId));
    this.logger.log(`Removed Trakt credential user=${userId}`);
  }

  async read(userId: string): Promise<UserCredential | null> {
    const raw = await this.store.get(credentialKey(userId));
    if (raw === null) return null;

    let stored: StoredCredential;
    try {
      stored = storedCredentialSchema.parse(JSON.parse(raw));
    } catch (err) {
      this.logger.warn(
        `Discarding unreadable credential user=${userId} error=${JSON.stringify(errToMessage(err))}`,
      );
      return null;
    }

    try {
      return {
        userId: stored.userId,
        accessToken: this.crypto.decryptString(stored.accessToken, credentialKey(userId)),
        refreshToken: this.crypto.decryptString(stored.refreshToken, credentialKey(userId)),
        expiresAt: stored.expiresAt,
        state: stored.state,
      };
    } catch (err) {
      this.logger.warn(
        `Credential could not be decrypted user=${userId} error=${JSON.stringify(errToMessage(err))}`,
      );
      return null;
    }
  }

  isFresh(credential: UserCredential, now = Date.now()): boolean {
    return now < credential.expiresAt - this.config.tokens.refreshMarginMs;
  }

  private async requireUsable(userId: string): Promise<UserCredential> {
    const credential = await this.read(userId);
    if (!credential) {
      throw new PipelineError('NotAuthenticated', `No Trakt credential for ${userId}`);
    }
    if (credential.state === 'unauthenticated') {
      throw new PipelineError(
        'NotAuthenticated',
        `Trakt credential for ${userId} needs re-authorization`,
      );
    }
    return credential;
  }

  private async refreshLocked(credential: UserCredential): Promise<UserCredential> {
    const { userId } = credential;
    let pair: TokenPair;
    try {
      pair = await this.oauth.refresh(credential.refreshToken);
    } catch (err) {
      if (isRefreshRejected(err)) {
        await this.write({ ...credential, state: 'unauthenticated' });
        this.logger.warn(
          `Trakt token refresh rejected; user must re-authorize user=${userId} error=${JSON.stringify(errToMessage(err))}`,
        );
      } else {
        // Stored state untouched: the next run tries the refresh again.
        this.logger.warn(
          `Trakt token refresh failed user=${userId} error=${JSON.stringify(errToMessage(err))}`,
        );
      }
      throw new PipelineError(
        'RefreshFailed',
        `Trakt token refresh failed for ${userId}: ${errToMessage(err)}`,
        { cause: err },
      );
    }

    const next = this.fromTokenPair(userId, pair);
    await this.write(next);
    this.logger.log(`Refreshed Trakt token user=${userId}`);
    return next;
  }

  private fromTokenPair(userId: string, pair: TokenPair): UserCredential {
    return {
      userId,
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      expiresAt: Date.now() + pair.expiresInSeconds * 1000,
      state: 'valid',
    };
  }

  private async write(credential: UserCredential): Promise<void> {
    const stored: StoredCredential = {
      userId: credential.userId,
      accessToken: this.crypto.encryptString(credential.accessToken, credentialKey(credential.userId)),
      refreshToken: this.crypto.encryptString(credential.refreshToken, credentialKey(credential.userId)),
      expiresAt: credential.expiresAt,
      state: credential.state,
      updatedAt: new Date().toISOString(),
    };
    await this.store.set(credentialKey(credential.userId), JSON.stringify(stored));
  }
}
