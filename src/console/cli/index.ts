#!/usr/bin/env node
/**
 * Health Coach CLI
 *
 * Usage:
 *   coach ask "What was my BP yesterday?"
 *   coach ask "Why was it higher?" --session session_abc
 *   coach briefing --date 2026-01-06
 *   coach scenario --vo2 5 --sleep 1
 *   coach job weekly_report
 *   coach history session_abc
 */

import 'dotenv/config';
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { briefingCommand } from './commands/briefing.js';
import { historyCommand } from './commands/history.js';
import { jobCommand } from './commands/job.js';
import { scenarioCommand } from './commands/scenario.js';

const program = new Command();

program
  .name('coach')
  .description('Personal blood-pressure health coach')
  .version('0.1.0');

// ask <question>
program
  .command('ask <question>')
  .description('Ask a question about your health data')
  .option('--session <id>', 'Continue an existing session')
  .option('--verbose', 'Show cited dates', false)
  .action(askCommand);

// briefing
program
  .command('briefing')
  .description('Show the morning briefing')
  .option('--date <date>', 'Briefing date (YYYY-MM-DD), defaults to today')
  .action(briefingCommand);

// scenario
program
  .command('scenario')
  .description('Predict the BP effect of lifestyle changes')
  .option('--vo2 <delta>', 'Change in VO2 max (ml/kg/min)')
  .option('--sleep <delta>', 'Change in nightly sleep (hours)')
  .option('--steps <delta>', 'Change in daily steps')
  .option('--efficiency <delta>', 'Change in sleep efficiency (%)')
  .option('--weeks <n>', 'Time horizon for feasibility (weeks)')
  .option('--trials <n>', 'Monte Carlo trials')
  .option('--seed <n>', 'Random seed')
  .option('--json', 'Print the full result as JSON', false)
  .action(scenarioCommand);

// job <name>
program
  .command('job <name>')
  .description('Run a job now: daily_briefing, weekly_report, alert_scan, goal_snapshot')
  .option('--date <date>', 'Date the job works on (YYYY-MM-DD)')
  .action(jobCommand);

// history <session>
program
  .command('history <session>')
  .description('Show the turns of a session')
  .option('--limit <n>', 'Most recent turns to show', '50')
  .action(historyCommand);

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
