/**
 * job <name> [--date] - run one scheduled job now
 */

import chalk from 'chalk';
import ora from 'ora';
import { ValidationError } from '../../../common/errors.js';
import { JobNameSchema } from '../../../common/schemas/index.js';
import { header, withCoach } from './shared.js';

interface JobOptions {
  date?: string;
}

export async function jobCommand(name: string, options: JobOptions): Promise<void> {
  header(`JOB: ${name}`);
  const spinner = ora('Initializing coach...').start();

  await withCoach(spinner, async coach => {
    const jobName = JobNameSchema.safeParse(name);
    if (!jobName.success) {
      throw new ValidationError(`Unknown job "${name}"`, [`expected one of: ${JobNameSchema.options.join(', ')}`]);
    }

    spinner.start(`Running ${jobName.data}...`);
    const { result, text } = await coach.runJob(jobName.data, options.date);
    if (result.status === 'success') {
      spinner.succeed(result.detail);
      console.log();
      console.log(text);
    } else {
      spinner.fail(result.detail);
      process.exitCode = 1;
    }
    console.log(chalk.dim(`\nRecorded at ${result.runAt}`));
  });
}
