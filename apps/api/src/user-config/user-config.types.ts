import type { TimePeriod } from '../app.constants';
import type { PipelineErrorKind } from '../lib/pipeline-errors';

export type RunStatus = {
  outcome: 'success' | 'failed';
  itemCount: number;
  errorKind: PipelineErrorKind | null;
};

export type UserConfiguration = {
  userId: string;
  timePeriod: TimePeriod;
  genreFilters: string[];
  listName: string;
  /** ISO timestamp of the last finished run. */
  lastRunAt: string | null;
  lastRunStatus: RunStatus | null;
  createdAt: string;
  updatedAt: string;
};

export type UserSettings = Pick<UserConfiguration, 'timePeriod' | 'genreFilters' | 'listName'>;
