import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { RecommendationGeneratorService } from './recommendation-generator.service';

@Module({
  imports: [AiModule],
  providers: [RecommendationGeneratorService],
  exports: [RecommendationGeneratorService],
})
export class RecommendationsModule {}
