/**
 * Job Runner
 *
 * Plain callable entry points for the scheduled jobs. Scheduling itself
 * (cron, systemd timers) lives outside this package; every run, successful
 * or not, is recorded in the job history.
 */

import { describeError, errorClassOf } from '../../common/errors.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logError, logInfo } from '../../common/services/logger.js';
import type { JobName, JobResult } from '../../common/types.js';
import { addDays, localIsoDate } from '../../common/utils/dates.js';
import { generateDailyBriefing } from './daily-briefing.js';
import { scanAlerts } from './alert-scan.js';
import { formatGoalSnapshots, snapshotGoals } from './goal-tracker.js';
import { generateWeeklyReport } from './weekly-report.js';

export interface JobRunOutput {
  result: JobResult;
  /** Human-readable output of the job (empty on error) */
  text: string;
}

export interface JobRunnerDeps {
  store: HealthStore;
  /** Local calendar date; defaults to the system clock */
  today?: () => string;
  now?: () => Date;
}

/**
 * Date each job works on when none is given. The briefing is for today;
 * the others look at yesterday, the last complete day of data.
 */
export function defaultJobDate(name: JobName, today: string): string {
  return name === 'daily_briefing' ? today : addDays(today, -1);
}

async function execute(name: JobName, store: HealthStore, date: string): Promise<{ text: string; detail: string }> {
  switch (name) {
    case 'daily_briefing': {
      const briefing = await generateDailyBriefing(store, date);
      return {
        text: briefing.briefingText,
        detail: `briefing for ${date} (expected ${briefing.prediction.expectedSystolic} ±${briefing.prediction.margin} mmHg)`,
      };
    }
    case 'weekly_report': {
      const report = await generateWeeklyReport(store, date);
      return { text: report.reportText, detail: `week ${report.weekStart}..${report.weekEnd}, ${report.current.days} days` };
    }
    case 'alert_scan': {
      const alerts = await scanAlerts(store, date);
      const text = alerts.length === 0 ? 'No alerts.' : alerts.map(a => `[${a.priority}] ${a.title}: ${a.message}`).join('\n');
      return { text, detail: `${alerts.length} alerts for ${date}` };
    }
    case 'goal_snapshot': {
      const snapshots = await snapshotGoals(store, date);
      return { text: formatGoalSnapshots(snapshots), detail: `${snapshots.length} goals on ${date}` };
    }
  }
}

export async function runJob(name: JobName, deps: JobRunnerDeps, date?: string): Promise<JobRunOutput> {
  const now = deps.now ?? (() => new Date());
  const today = deps.today ?? (() => localIsoDate());
  const target = date ?? defaultJobDate(name, today());
  const startTime = Date.now();

  let result: JobResult;
  let text = '';
  try {
    const output = await execute(name, deps.store, target);
    text = output.text;
    result = { jobName: name, runAt: now().toISOString(), status: 'success', detail: output.detail };
    logInfo('Job complete', { job: name, date: target, duration_ms: Date.now() - startTime });
  } catch (error) {
    result = {
      jobName: name,
      runAt: now().toISOString(),
      status: 'error',
      detail: `${errorClassOf(error)}: ${describeError(error)}`,
    };
    logError('Job failed', { job: name, date: target, error_class: errorClassOf(error), error: describeError(error) });
  }

  try {
    await deps.store.appendJobResult(result);
  } catch (error) {
    logError('Job result not recorded', { job: name, error_class: errorClassOf(error), error: describeError(error) });
  }
  return { result, text };
}
