/**
 * briefing [--date] - print the morning briefing
 */

import ora from 'ora';
import { header, withCoach } from './shared.js';

interface BriefingOptions {
  date?: string;
}

export async function briefingCommand(options: BriefingOptions): Promise<void> {
  header('DAILY BRIEFING');
  const spinner = ora('Initializing coach...').start();

  await withCoach(spinner, async coach => {
    const briefing = await coach.generateBriefing(options.date);
    console.log();
    console.log(briefing.briefingText);
  });
}
