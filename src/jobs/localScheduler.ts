// src/jobs/localScheduler.ts
// In-process schedules for polling mode and local runs, standing in for Cloud Scheduler

import cron, { ScheduledTask } from 'node-cron';
import type { ScheduledJob, TriggerRouter } from '../services/triggerRouter';

/**
 * Default cron expressions, evaluated in SCHEDULE_TIMEZONE
 */
export const LOCAL_SCHEDULES: Record<ScheduledJob, string> = {
  morning_motivation: '0 7 * * *',
  check_in: '0 9,18 * * *',
  update_health_data: '0 * * * *',
};

const JOBS: ScheduledJob[] = ['morning_motivation', 'check_in', 'update_health_data'];

export interface LocalSchedulerOptions {
  timezone: string;
  schedules?: Partial<Record<ScheduledJob, string>>;
  schedule?: typeof cron.schedule;
}

async function runJob(router: Pick<TriggerRouter, 'runScheduled'>, job: ScheduledJob): Promise<void> {
  const startTime = Date.now();
  console.log(`[${new Date().toISOString()}] Starting ${job}...`);

  try {
    const report = await router.runScheduled(job);
    const failed = report.users.filter((u) => u.status === 'failed').length;
    const duration = Math.round((Date.now() - startTime) / 1000);
    console.log(
      `[${new Date().toISOString()}] ${job} completed in ${duration}s: ` +
        `${report.users.length - failed} ok, ${failed} failed`
    );
  } catch (error) {
    // the next firing retries; sent users replay from the ledger
    console.error(`[${new Date().toISOString()}] ${job} failed:`, error instanceof Error ? error.message : error);
  }
}

/**
 * Schedule every job; the returned tasks are stopped on shutdown
 */
export function scheduleLocalJobs(
  router: Pick<TriggerRouter, 'runScheduled'>,
  options: LocalSchedulerOptions
): ScheduledTask[] {
  const schedule = options.schedule ?? cron.schedule;
  const expressions = { ...LOCAL_SCHEDULES, ...options.schedules };

  return JOBS.map((job) => {
    const expression = expressions[job] ?? LOCAL_SCHEDULES[job];
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for ${job}: ${expression}`);
    }

    const task = schedule(expression, () => runJob(router, job), { timezone: options.timezone });
    console.log(`${job} scheduled: ${expression} (${options.timezone})`);
    return task;
  });
}
