import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { CronJob } from 'cron';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { errToMessage } from '../lib/pipeline-errors';
import { BatchOrchestratorService } from './batch-orchestrator.service';

@Injectable()
export class BatchScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BatchScheduler.name);
  private job: CronJob | null = null;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly orchestrator: BatchOrchestratorService,
  ) {}

  get isScheduled(): boolean {
    return this.job !== null;
  }

  onModuleInit() {
    const { enabled, cron, timezone } = this.config.schedule;
    if (!enabled) {
      this.logger.log('Nightly schedule disabled');
      return;
    }

    try {
      this.job = new CronJob(
        cron,
        () => {
          void this.tick();
        },
        null,
        false,
        timezone ?? undefined,
      );
    } catch (err) {
      throw new Error(`Invalid NIGHTLY_CRON ${JSON.stringify(cron)}: ${errToMessage(err)}`);
    }
    this.job.start();
    this.logger.log(`Scheduled nightly batch cron=${cron} tz=${timezone ?? 'local'}`);
  }

  onModuleDestroy() {
    this.job?.stop();
    this.job = null;
  }

  /** One scheduled run. Failures are logged; the schedule keeps going. */
  async tick(): Promise<void> {
    try {
      await this.orchestrator.runNightly();
    } catch (err) {
      this.logger.error(`Scheduled nightly batch failed: ${errToMessage(err)}`);
    }
  }
}
