/**
 * scenario - what-if BP prediction for lifestyle changes
 */

import chalk from 'chalk';
import ora from 'ora';
import { formatScenarioResult } from '../../coach/scenario-engine.js';
import { header, parseNumberOption, withCoach } from './shared.js';

interface ScenarioCommandOptions {
  vo2?: string;
  sleep?: string;
  steps?: string;
  efficiency?: string;
  weeks?: string;
  trials?: string;
  seed?: string;
  json: boolean;
}

export async function scenarioCommand(options: ScenarioCommandOptions): Promise<void> {
  header('SCENARIO');
  const spinner = ora('Initializing coach...').start();

  await withCoach(spinner, async coach => {
    const summary = await coach.runScenario(
      parseNumberOption('vo2', options.vo2) ?? 0,
      parseNumberOption('sleep', options.sleep) ?? 0,
      parseNumberOption('steps', options.steps) ?? 0,
      {
        sleepEfficiencyDelta: parseNumberOption('efficiency', options.efficiency),
        horizonWeeks: parseNumberOption('weeks', options.weeks),
        trials: parseNumberOption('trials', options.trials),
        seed: parseNumberOption('seed', options.seed),
      }
    );

    if (options.json) {
      console.log(JSON.stringify(summary.result, null, 2));
      return;
    }

    console.log();
    console.log(formatScenarioResult(summary.result));
    const tier = summary.feasibility.tier;
    const color = tier === 'INFEASIBLE' ? chalk.red : tier === 'LOW' ? chalk.yellow : chalk.green;
    console.log();
    console.log(chalk.white('Feasibility:'), color(tier));
  });
}
