import { Module } from '@nestjs/common';
import { TraktApiService } from './trakt-api.service';
import { TraktListsService } from './trakt-lists.service';
import { TraktOAuthService } from './trakt-oauth.service';

@Module({
  providers: [TraktApiService, TraktOAuthService, TraktListsService],
  exports: [TraktApiService, TraktOAuthService, TraktListsService],
})
export class TraktModule {}
