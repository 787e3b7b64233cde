import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { UserConfigModule } from '../user-config/user-config.module';
import { BatchOrchestratorService } from './batch-orchestrator.service';
import { BatchScheduler } from './batch.scheduler';

@Module({
  imports: [PipelineModule, UserConfigModule],
  providers: [BatchOrchestratorService, BatchScheduler],
  exports: [BatchOrchestratorService],
})
export class BatchModule {}
