import { Module } from '@nestjs/common';
import { CredentialsModule } from '../credentials/credentials.module';
import { EnrichmentModule } from '../enrichment/enrichment.module';
import { HistoryModule } from '../history/history.module';
import { ListsModule } from '../lists/lists.module';
import { RecommendationsModule } from '../recommendations/recommendations.module';
import { UserConfigModule } from '../user-config/user-config.module';
import { RecommendationPipelineService } from './recommendation-pipeline.service';

@Module({
  imports: [
    CredentialsModule,
    HistoryModule,
    RecommendationsModule,
    EnrichmentModule,
    ListsModule,
    UserConfigModule,
  ],
  providers: [RecommendationPipelineService],
  exports: [RecommendationPipelineService],
})
export class PipelineModule {}
