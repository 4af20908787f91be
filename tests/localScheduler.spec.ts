import cron, { ScheduledTask } from 'node-cron';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LOCAL_SCHEDULES, scheduleLocalJobs } from '../src/jobs/localScheduler';
import type { JobReport, ScheduledJob } from '../src/services/triggerRouter';

describe('scheduleLocalJobs', () => {
  let tasks: ScheduledTask[] = [];
  let runScheduled: ReturnType<typeof fakeRun>;
  let router: { runScheduled: (job: ScheduledJob) => Promise<JobReport> };

  function fakeRun() {
    return vi.fn(async (job: ScheduledJob): Promise<JobReport> => ({ job, triggerId: `${job}@test`, users: [] }));
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    runScheduled = fakeRun();
    router = { runScheduled };
  });

  afterEach(() => {
    tasks.forEach((task) => task.stop());
    tasks = [];
  });

  it('schedules every job with its default expression and timezone', () => {
    const schedule = vi.fn(cron.schedule);

    tasks = scheduleLocalJobs(router, { timezone: 'Europe/Berlin', schedule });

    expect(tasks).toHaveLength(3);
    expect(schedule.mock.calls.map(([expression, , options]) => [expression, options])).toEqual([
      [LOCAL_SCHEDULES.morning_motivation, { timezone: 'Europe/Berlin' }],
      [LOCAL_SCHEDULES.check_in, { timezone: 'Europe/Berlin' }],
      [LOCAL_SCHEDULES.update_health_data, { timezone: 'Europe/Berlin' }],
    ]);
  });

  it('takes overrides per job', () => {
    const schedule = vi.fn(cron.schedule);

    tasks = scheduleLocalJobs(router, {
      timezone: 'UTC',
      schedule,
      schedules: { check_in: '30 12 * * *' },
    });

    expect(schedule.mock.calls[1]?.[0]).toBe('30 12 * * *');
  });

  it('refuses an invalid expression before scheduling anything', () => {
    const schedule = vi.fn(cron.schedule);

    expect(() =>
      scheduleLocalJobs(router, { timezone: 'UTC', schedule, schedules: { morning_motivation: 'every morning' } })
    ).toThrow('Invalid cron expression for morning_motivation: every morning');
    expect(schedule).not.toHaveBeenCalled();
  });

  it('runs the job through the router when a task fires', async () => {
    const schedule = vi.fn(cron.schedule);
    tasks = scheduleLocalJobs(router, { timezone: 'UTC', schedule });

    const fire = schedule.mock.calls[2]?.[1];
    if (typeof fire !== 'function') throw new Error('expected a task callback');
    fire('manual');

    expect(runScheduled).toHaveBeenCalledWith('update_health_data');
    await vi.waitFor(() =>
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('update_health_data completed in'))
    );
  });

  it('logs a failed run instead of throwing', async () => {
    runScheduled.mockRejectedValueOnce(new Error('store offline'));
    const schedule = vi.fn(cron.schedule);
    tasks = scheduleLocalJobs(router, { timezone: 'UTC', schedule });

    const fire = schedule.mock.calls[0]?.[1];
    if (typeof fire !== 'function') throw new Error('expected a task callback');
    fire('manual');

    await vi.waitFor(() =>
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining('morning_motivation failed:'),
        'store offline'
      )
    );
  });
});
