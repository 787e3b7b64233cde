import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common';
import { TRAKT_WEB_BASE_URL } from '../app.constants';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import {
  asPositiveInt,
  asTrimmedString,
  getRecord,
  isPlainObject,
} from '../lib/json-narrow';
import { TraktApiService } from './trakt-api.service';
import type { TokenPair } from './trakt.types';

export function parseTokenResponse(data: unknown): TokenPair {
  if (!isPlainObject(data)) {
    throw new BadGatewayException('Trakt token response was not an object');
  }
  const accessToken = asTrimmedString(data['access_token']);
  const refreshToken = asTrimmedString(data['refresh_token']);
  const expiresInSeconds = asPositiveInt(data['expires_in']);
  if (!accessToken || !refreshToken || !expiresInSeconds) {
    throw new BadGatewayException('Trakt token response is missing fields');
  }
  return { accessToken, refreshToken, expiresInSeconds };
}

@Injectable()
export class TraktOAuthService {
  private readonly logger = new Logger(TraktOAuthService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly api: TraktApiService,
  ) {}

  buildAuthorizeUrl(state?: string): string {
    const url = new URL(`${TRAKT_WEB_BASE_URL}/oauth/authorize`);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.config.trakt.clientId);
    url.searchParams.set('redirect_uri', this.config.trakt.redirectUri);
    if (state) url.searchParams.set('state', state);
    return url.toString();
  }

  async exchangeCode(code: string): Promise<TokenPair> {
    return await this.requestToken({ grant_type: 'authorization_code', code });
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    return await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
  }

  /** Trakt username (slug) of the token's owner. */
  async getUsername(accessToken: string): Promise<string> {
    const { data } = await this.api.request({
      method: 'GET',
      path: '/users/settings',
      accessToken,
    });
    const user = getRecord(data, 'user');
    if (!user) {
      throw new BadGatewayException('Trakt /users/settings returned no user');
    }
    const ids = getRecord(user, 'ids') ?? {};
    const username = asTrimmedString(ids['slug']) || asTrimmedString(user['username']);
    if (!username) {
      throw new BadGatewayException('Trakt /users/settings returned no username');
    }
    return username;
  }

  private async requestToken(grant: Record<string, string>): Promise<TokenPair> {
    const { data } = await this.api.request({
      method: 'POST',
      path: '/oauth/token',
      body: {
        ...grant,
        client_id: this.config.trakt.clientId,
        client_secret: this.config.trakt.clientSecret,
        redirect_uri: this.config.trakt.redirectUri,
      },
    });
    const pair = parseTokenResponse(data);
    this.logger.debug(
      `Trakt token grant ok grant=${grant['grant_type']} expiresIn=${pair.expiresInSeconds}s`,
    );
    return pair;
  }
}
