import { Module } from '@nestjs/common';
import { TmdbModule } from '../tmdb/tmdb.module';
import { MetadataEnricherService } from './metadata-enricher.service';

@Module({
  imports: [TmdbModule],
  providers: [MetadataEnricherService],
  exports: [MetadataEnricherService],
})
export class EnrichmentModule {}
