import type { TimePeriod } from '../app.constants';
import type { EnrichedCandidate } from '../enrichment/enrichment.types';
import type { PipelineErrorKind } from '../lib/pipeline-errors';
import type { ListSyncResult } from '../lists/lists.types';
import type { UserConfiguration } from '../user-config/user-config.types';

export type RunResult = {
  userId: string;
  success: boolean;
  itemCount: number;
  errorKind?: PipelineErrorKind;
  errorMessage?: string;
  /** ISO timestamp of when the run finished. */
  timestamp: string;
};

export type PipelineOutcome = {
  ranked: EnrichedCandidate[];
  list: ListSyncResult;
  historyCount: number;
};

export type OnDemandRequest = {
  userId: string;
  timePeriod: TimePeriod;
  genreFilters: string[];
  listName: string;
};

export type OnDemandResult =
  | { ok: true; outcome: PipelineOutcome; config: UserConfiguration }
  | { ok: false; errorKind: PipelineErrorKind; message: string };
