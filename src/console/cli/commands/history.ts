/**
 * history <session> - print the turns of a session
 */

import chalk from 'chalk';
import ora from 'ora';
import { header, parseNumberOption, withCoach } from './shared.js';

interface HistoryOptions {
  limit: string;
}

export async function historyCommand(sessionId: string, options: HistoryOptions): Promise<void> {
  header(`SESSION ${sessionId}`);
  const spinner = ora('Initializing coach...').start();

  await withCoach(spinner, async coach => {
    const turns = await coach.getHistory(sessionId, parseNumberOption('limit', options.limit) ?? 50);
    if (turns.length === 0) {
      console.log(chalk.yellow('No turns recorded for this session.'));
      return;
    }

    for (const turn of turns) {
      const status = turn.status === 'DELIVERED' ? chalk.green(turn.status) : chalk.red(turn.status);
      console.log();
      console.log(chalk.bold(`#${turn.turnIndex}`), chalk.dim(turn.createdAt), status, chalk.dim(`${turn.intent} via ${turn.backend}`));
      console.log(chalk.white('Q:'), turn.queryText);
      console.log(chalk.white('A:'), turn.responseText);
      if (turn.errorClass) console.log(chalk.dim(`   error: ${turn.errorClass}`));
    }
  });
}
