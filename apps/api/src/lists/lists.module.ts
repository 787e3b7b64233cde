import { Module } from '@nestjs/common';
import { TraktModule } from '../trakt/trakt.module';
import { ListSynchronizerService } from './list-synchronizer.service';

@Module({
  imports: [TraktModule],
  providers: [ListSynchronizerService],
  exports: [ListSynchronizerService],
})
export class ListsModule {}
