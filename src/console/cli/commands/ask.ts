/**
 * ask <question> - answer a question about the health record
 */

import chalk from 'chalk';
import ora from 'ora';
import { header, withCoach } from './shared.js';

interface AskOptions {
  session?: string;
  verbose: boolean;
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  header('HEALTH COACH');
  const spinner = ora('Initializing coach...').start();

  await withCoach(spinner, async coach => {
    spinner.start('Thinking...');
    const answer = await coach.answerQuery(question, options.session);
    if (answer.status === 'DELIVERED') spinner.succeed(`Answered by ${answer.backend}`);
    else spinner.fail('No answer');

    console.log();
    console.log(answer.status === 'DELIVERED' ? answer.response : chalk.yellow(answer.response));
    console.log();
    console.log(chalk.white('Intent:'), chalk.cyan(answer.intent));
    console.log(chalk.white('Confidence:'), chalk.cyan(answer.confidence.toFixed(2)));
    console.log(chalk.white('Session:'), chalk.dim(answer.sessionId));

    if (answer.degraded) {
      console.log(chalk.yellow('Some context sources were unavailable; the answer may be incomplete.'));
    }
    if (answer.unsupportedClaims.length > 0) {
      console.log(chalk.yellow('Unverified figures:'), answer.unsupportedClaims.join(', '));
    }
    if (options.verbose && answer.citations.length > 0) {
      console.log(chalk.white('Citations:'));
      for (const c of answer.citations) console.log(chalk.dim(`  ${c.date} (${c.source})`));
    }
  });
}
