import { ConflictException } from '@nestjs/common';
import { buildTestConfig } from '../testing/test-config';
import { BatchScheduler } from './batch.scheduler';

function setup(schedule: { enabled: boolean; cron?: string; timezone?: string | null }) {
  const orchestrator = { runNightly: jest.fn().mockResolvedValue([]) };
  const scheduler = new BatchScheduler(
    buildTestConfig({ schedule }),
    orchestrator as never,
  );
  return { scheduler, orchestrator };
}

describe('BatchScheduler', () => {
  it('does not schedule anything when disabled', () => {
    const { scheduler } = setup({ enabled: false });
    scheduler.onModuleInit();
    expect(scheduler.isScheduled).toBe(false);
  });

  it('schedules the nightly job and stops it on shutdown', () => {
    const { scheduler, orchestrator } = setup({
      enabled: true,
      cron: '0 3 * * *',
      timezone: 'UTC',
    });

    scheduler.onModuleInit();
    expect(scheduler.isScheduled).toBe(true);

    scheduler.onModuleDestroy();
    expect(scheduler.isScheduled).toBe(false);
    expect(orchestrator.runNightly).not.toHaveBeenCalled();
  });

  it('fails startup on an invalid cron expression', () => {
    const { scheduler } = setup({ enabled: true, cron: 'every night' });
    expect(() => scheduler.onModuleInit()).toThrow('Invalid NIGHTLY_CRON "every night"');
  });

  it('runs the batch on tick and keeps going after a failure', async () => {
    const { scheduler, orchestrator } = setup({ enabled: false });
    orchestrator.runNightly.mockRejectedValueOnce(
      new ConflictException('Nightly batch is already running'),
    );

    await expect(scheduler.tick()).resolves.toBeUndefined();
    await expect(scheduler.tick()).resolves.toBeUndefined();
    expect(orchestrator.runNightly).toHaveBeenCalledTimes(2);
  });
});
