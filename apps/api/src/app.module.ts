import { Module } from '@nestjs/common';
import { AiModule } from './ai/ai.module';
import { BatchModule } from './batch/batch.module';
import { ConfigModule } from './config/config.module';
import { CredentialsModule } from './credentials/credentials.module';
import { CryptoModule } from './crypto/crypto.module';
import { EnrichmentModule } from './enrichment/enrichment.module';
import { HistoryModule } from './history/history.module';
import { ListsModule } from './lists/lists.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { RecommendationsModule } from './recommendations/recommendations.module';
import { StoreModule } from './store/store.module';
import { TmdbModule } from './tmdb/tmdb.module';
import { TraktModule } from './trakt/trakt.module';
import { UserConfigModule } from './user-config/user-config.module';

@Module({
  imports: [
    ConfigModule,
    StoreModule,
    CryptoModule,
    TraktModule,
    TmdbModule,
    AiModule,
    CredentialsModule,
    HistoryModule,
    RecommendationsModule,
    EnrichmentModule,
    ListsModule,
    UserConfigModule,
    PipelineModule,
    BatchModule,
  ],
})
export class AppModule {}
