/**
 * Helpers shared by the CLI commands
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import { CoachError, ValidationError, describeError } from '../../../common/errors.js';
import { createDefaultHealthCoach } from '../../coach/index.js';
import type { HealthCoach } from '../../coach/index.js';

export function header(title: string): void {
  console.log(chalk.bold('\n' + '='.repeat(60)));
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(60)));
}

/**
 * Commander passes option values as strings
 */
export function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`--${name} must be a number`, [`got "${value}"`]);
  }
  return parsed;
}

export function printError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.log(chalk.red(`ERROR: ${error.message}`));
    for (const issue of error.issues) console.log(chalk.yellow(`  - ${issue}`));
    return;
  }
  const label = error instanceof CoachError ? error.errorClass : 'Error';
  console.log(chalk.red(`ERROR (${label}): ${describeError(error)}`));
}

/**
 * Build the coach from the environment, run `fn`, close the store.
 * Exits with status 1 on any error.
 */
export async function withCoach(spinner: Ora, fn: (coach: HealthCoach) => Promise<void>): Promise<void> {
  let opened: ReturnType<typeof createDefaultHealthCoach> | null = null;
  try {
    opened = createDefaultHealthCoach();
    spinner.succeed('Coach ready');
    await fn(opened.coach);
  } catch (error) {
    if (spinner.isSpinning) spinner.fail('Failed');
    printError(error);
    process.exitCode = 1;
  } finally {
    opened?.store.close();
  }
}
