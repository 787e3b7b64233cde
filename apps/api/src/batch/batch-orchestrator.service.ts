import { ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { classifyError, errToMessage, type PipelineErrorKind } from '../lib/pipeline-errors';
import type { RunResult } from '../pipeline/pipeline.types';
import { RecommendationPipelineService } from '../pipeline/recommendation-pipeline.service';
import { UserConfigStore } from '../user-config/user-config.store';
import type { UserConfiguration } from '../user-config/user-config.types';

export type BatchSummary = {
  total: number;
  succeeded: number;
  failed: number;
  failuresByKind: Partial<Record<PipelineErrorKind, number>>;
};

export function summarizeRuns(results: RunResult[]): BatchSummary {
  const failuresByKind: Partial<Record<PipelineErrorKind, number>> = {};
  let succeeded = 0;
  for (const r of results) {
    if (r.success) {
      succeeded += 1;
      continue;
    }
    const kind = r.errorKind ?? 'Unknown';
    failuresByKind[kind] = (failuresByKind[kind] ?? 0) + 1;
  }
  return { total: results.length, succeeded, failed: results.length - succeeded, failuresByKind };
}

function formatSummary(summary: BatchSummary): string {
  const kinds = Object.entries(summary.failuresByKind)
    .map(([kind, n]) => `${kind}=${n}`)
    .join(',');
  return `total=${summary.total} succeeded=${summary.succeeded} failed=${summary.failed}${
    kinds ? ` kinds=${kinds}` : ''
  }`;
}

@Injectable()
export class BatchOrchestratorService {
  private readonly logger = new Logger(BatchOrchestratorService.name);
  private running = false;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly userConfigs: UserConfigStore,
    private readonly pipeline: RecommendationPipelineService,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * One pipeline run per stored configuration. A failing user never stops
   * the batch; results come back in configuration order.
   */
  async runNightly(): Promise<RunResult[]> {
    if (this.running) {
      throw new ConflictException('Nightly batch is already running');
    }
    this.running = true;
    const startedAt = Date.now();

    try {
      const configs = await this.userConfigs.list();
      const concurrency = this.config.batch.concurrency;
      this.logger.log(`Nightly batch started users=${configs.length} concurrency=${concurrency}`);

      const limit = pLimit(concurrency);
      const results = await Promise.all(
        configs.map((config) => limit(() => this.runOne(config))),
      );

      this.logger.log(
        `Nightly batch finished ${formatSummary(summarizeRuns(results))} ms=${Date.now() - startedAt}`,
      );
      return results;
    } finally {
      this.running = false;
    }
  }

  private async runOne(config: UserConfiguration): Promise<RunResult> {
    try {
      return await this.pipeline.executeAndRecord(config);
    } catch (err) {
      // executeAndRecord reports its own failures; this only catches a broken boundary.
      this.logger.error(
        `Unexpected batch failure userId=${config.userId} error=${JSON.stringify(errToMessage(err))}`,
      );
      return {
        userId: config.userId,
        success: false,
        itemCount: 0,
        errorKind: classifyError(err),
        errorMessage: errToMessage(err),
        timestamp: new Date().toISOString(),
      };
    }
  }
}
