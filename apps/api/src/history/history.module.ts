import { Module } from '@nestjs/common';
import { TraktModule } from '../trakt/trakt.module';
import { HistoryFetcherService } from './history-fetcher.service';

@Module({
  imports: [TraktModule],
  providers: [HistoryFetcherService],
  exports: [HistoryFetcherService],
})
export class HistoryModule {}
