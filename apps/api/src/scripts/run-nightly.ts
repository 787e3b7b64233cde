import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { BatchOrchestratorService, summarizeRuns } from '../batch/batch-orchestrator.service';
import type { RunResult } from '../pipeline/pipeline.types';
import { RecommendationPipelineService } from '../pipeline/recommendation-pipeline.service';
import { UserConfigStore } from '../user-config/user-config.store';

// Usage: run-nightly [userId]
// Runs the nightly batch once (or one user's pipeline) and exits non-zero
// when any run failed.
async function main() {
  // The cron schedule belongs to the worker, not to one-off runs.
  process.env['SCHEDULER_ENABLED'] = 'false';

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  try {
    const userId = process.argv[2]?.trim();
    let results: RunResult[];
    if (userId) {
      const config = await app.get(UserConfigStore).get(userId);
      if (!config) throw new Error(`No configuration stored for ${userId}`);
      results = [await app.get(RecommendationPipelineService).executeAndRecord(config)];
    } else {
      results = await app.get(BatchOrchestratorService).runNightly();
    }

    for (const r of results) {
      Logger.log(
        r.success
          ? `${r.userId}: ok items=${r.itemCount}`
          : `${r.userId}: ${r.errorKind ?? 'Unknown'} ${r.errorMessage ?? ''}`.trim(),
        'RunNightly',
      );
    }
    if (summarizeRuns(results).failed > 0) process.exitCode = 1;
  } finally {
    await app.close();
  }
}

void main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
