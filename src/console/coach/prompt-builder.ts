/**
 * Prompt Builder
 *
 * Assembles the prompt for one question: a shared coaching system prompt,
 * an intent-specific instruction block, and a context document built from
 * the bundle (profile, date-scoped records, similar days, supplemental
 * windows, scenario result). Earlier turns of the session become
 * alternating chat messages in front of the final question.
 */

import type {
  ContextBundle,
  DailyHealthRecord,
  Intent,
  IntentClassification,
  MetricName,
  UserProfile,
} from '../../common/types.js';
import { metricMean, round } from '../../common/utils/stats.js';
import { IMPACT_COEFFICIENTS, SCENARIO_FACTORS } from './scenario-engine.js';
import type { ScenarioResult } from './scenario-engine.js';
import type { CompletionPrompt, PromptMessage } from './backends/types.js';

// =============================================================================
// SYSTEM PROMPT
// =============================================================================

const BASE_SYSTEM_PROMPT = `You are a personal health coach helping one person understand their blood pressure, sleep, activity and fitness data.

## Rules

1. Use only the data in the context document. If a value is not there, say it is not recorded.
2. Report blood pressure as Systolic/Diastolic mmHg and cite dates as YYYY-MM-DD.
3. Keep numbers exactly as they appear in the context. Do not invent readings.
4. Never diagnose a condition and never advise starting, stopping or changing a medication or dose. Suggest talking to a clinician for medical decisions.
5. Similar days marked "weak match" are loosely related; give them little weight.
6. Be encouraging and concise.`;

/**
 * Instruction block per intent
 */
export const INTENT_INSTRUCTIONS: Record<Intent, string> = {
  DATA_LOOKUP:
    'Report the requested values exactly as recorded, each with its date. If a requested date has no record, say so plainly.',
  EXPLANATION:
    'Explain the reading by ranking the most likely contributing factors, strongest first. Compare the day with the baselines and with the similar days, and cite the dates and values behind each factor.',
  PREDICTION:
    'Give an expected range rather than a single number, name the factors driving it, and say how uncertain the prediction is.',
  SCENARIO:
    'Narrate the scenario result: the predicted change and range, the feasibility rating and the expected timeline. Do not change any of the computed numbers. Close with the listed recommendations.',
  RECOMMENDATION:
    'Give 1 to 3 prioritised, specific actions. Tie each one to a value in the data and to the goal it moves towards.',
  TREND:
    'Describe the direction and size of the change over the window, compare the start with the end, and point out notable days.',
  COMPARISON:
    'Compare the groups side by side with their averages and the difference between them, then say what might explain the gap.',
  GENERAL:
    'Answer briefly. Where the question touches on the health data, relate the answer to the profile.',
};

const STRUCTURED_OUTPUT_INSTRUCTION =
  'Respond with a single JSON object with keys "answer" (string) and "citations" (array of {"date", "metric", "value"}).';

// =============================================================================
// FORMATTING
// =============================================================================

const METRIC_LABELS: Record<MetricName, [label: string, unit: string, digits: number]> = {
  systolic: ['Systolic', 'mmHg', 1],
  diastolic: ['Diastolic', 'mmHg', 1],
  heartRate: ['Heart rate', 'bpm', 0],
  steps: ['Steps', '', 0],
  sleepHours: ['Sleep', 'h', 1],
  sleepEfficiency: ['Sleep efficiency', '%', 0],
  vo2Max: ['VO2 max', '', 1],
  hrv: ['HRV', 'ms', 0],
  respiratoryRate: ['Respiratory rate', '/min', 1],
  activeCalories: ['Active calories', 'kcal', 0],
  exerciseMinutes: ['Exercise', 'min', 0],
};

function formatMetric(metric: MetricName, value: number): string {
  const [label, unit, digits] = METRIC_LABELS[metric];
  const shown = metric === 'steps' ? Math.round(value).toString() : value.toFixed(digits);
  return unit ? `${label} ${shown} ${unit}` : `${label} ${shown}`;
}

/**
 * "2026-01-05: Systolic 138.5 mmHg, Diastolic 88.0 mmHg, Sleep 6.2 h, Steps 7400"
 */
export function formatRecordLine(record: DailyHealthRecord): string {
  const parts: string[] = [];
  for (const metric of Object.keys(METRIC_LABELS).filter(isMetricName)) {
    const value = record[metric];
    if (value !== undefined) parts.push(formatMetric(metric, value));
  }
  return `${record.date}: ${parts.length > 0 ? parts.join(', ') : 'no metrics recorded'}`;
}

function isMetricName(value: string): value is MetricName {
  return value in METRIC_LABELS;
}

function formatProfile(profile: UserProfile | null): string {
  if (!profile) return 'Profile unavailable.';
  const lines: string[] = [`Name: ${profile.name}`];

  const baselineParts = Object.keys(profile.baselines)
    .filter(isMetricName)
    .map(metric => {
      const value = profile.baselines[metric];
      return value === undefined ? null : formatMetric(metric, value);
    })
    .filter((s): s is string => s !== null);
  lines.push(
    baselineParts.length > 0
      ? `Baselines (last ${profile.baselineDays} days of data): ${baselineParts.join(', ')}`
      : 'Baselines: not enough data'
  );

  if (profile.goals.length > 0) {
    const goals = profile.goals.map(g => `${METRIC_LABELS[g.metric][0]} ${g.direction === 'lower' ? 'below' : 'at least'} ${g.goal}`);
    lines.push(`Goals: ${goals.join(', ')}`);
  }
  return lines.join('\n');
}

function formatCoefficients(): string {
  return SCENARIO_FACTORS.map(f => {
    const c = IMPACT_COEFFICIENTS[f];
    return `- +1 ${c.unit} of ${c.label}: ${c.mmHgPerUnit} mmHg systolic`;
  }).join('\n');
}

function groupSummary(label: string, records: DailyHealthRecord[]): string {
  const sys = metricMean(records, 'systolic');
  const dia = metricMean(records, 'diastolic');
  const sleep = metricMean(records, 'sleepHours');
  const steps = metricMean(records, 'steps');
  const parts = [`${records.length} days`];
  if (sys !== null) parts.push(`avg Systolic ${round(sys, 1)} mmHg`);
  if (dia !== null) parts.push(`avg Diastolic ${round(dia, 1)} mmHg`);
  if (sleep !== null) parts.push(`avg Sleep ${round(sleep, 1)} h`);
  if (steps !== null) parts.push(`avg Steps ${Math.round(steps)}`);
  return `${label}: ${parts.join(', ')}`;
}

function formatScenario(result: ScenarioResult): string {
  const lines = [
    `Changes: ${result.contributions.map(c => `${IMPACT_COEFFICIENTS[c.factor].label} ${c.delta > 0 ? '+' : ''}${c.delta} (${c.systolicChange} mmHg)`).join('; ')}`,
    `Baseline systolic: ${result.baseline.systolic} mmHg`,
    `Predicted systolic change: ${result.systolicChange} mmHg (95% range ${result.confidenceInterval.lower} to ${result.confidenceInterval.upper})`,
    `Predicted BP: ${result.predictedSystolic}${result.predictedDiastolic === null ? '' : `/${result.predictedDiastolic}`} mmHg`,
    `Feasibility over ${result.horizonWeeks} weeks: ${result.feasibility.tier}`,
    `Timeline: about ${result.timeline.weeks} weeks (${result.timeline.days} days)`,
  ];
  for (const f of result.feasibility.factors) {
    if (f.reason) lines.push(`Feasibility note: ${f.reason}`);
  }
  if (result.recommendations.length > 0) {
    lines.push('Recommendations:', ...result.recommendations.map(r => `- ${r}`));
  }
  return lines.join('\n');
}

/**
 * Context document handed to the model with the question
 */
export function buildContextDocument(bundle: ContextBundle, scenario?: ScenarioResult): string {
  const sections: string[] = [];

  sections.push(`## Profile\n${formatProfile(bundle.profile)}`);

  if (bundle.dateScope) {
    const { start, end, phrase } = bundle.dateScope;
    const header = start === end ? `## Records for ${start} (${phrase})` : `## Records ${start} to ${end} (${phrase})`;
    const body = bundle.records.length > 0
      ? bundle.records.map(formatRecordLine).join('\n')
      : 'No records for this period.';
    sections.push(`${header}\n${body}`);
  }

  if (bundle.similarDays.length > 0) {
    const lines = bundle.similarDays.map(
      d => `- ${d.summary} (similarity ${d.score.toFixed(2)}${d.weak ? ', weak match' : ''})`
    );
    sections.push(`## Similar past days\n${lines.join('\n')}`);
  }

  const { trendWindow, comparison, recentHistory } = bundle.supplemental;
  if (trendWindow && trendWindow.length > 0) {
    const half = Math.floor(trendWindow.length / 2);
    sections.push(
      `## 30-day trend window\n${groupSummary('First half', trendWindow.slice(0, half))}\n${groupSummary('Second half', trendWindow.slice(half))}`
    );
  }
  if (comparison) {
    sections.push(
      `## Weekday vs weekend (last 30 days)\n${groupSummary('Weekdays', comparison.weekday)}\n${groupSummary('Weekends', comparison.weekend)}`
    );
  }
  if (recentHistory && recentHistory.length > 0) {
    sections.push(`## Last 14 days\n${recentHistory.map(formatRecordLine).join('\n')}`);
  }

  if (scenario) {
    sections.push(`## Scenario result (computed)\n${formatScenario(scenario)}`);
  }

  sections.push(`## Known effects on systolic BP\n${formatCoefficients()}`);

  if (bundle.degraded) {
    sections.push(`## Note\nSome data sources were unavailable (${bundle.degradedSources.join(', ')}). Say so if it limits the answer.`);
  }

  return sections.join('\n\n');
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildSystemPrompt(classification: IntentClassification): string {
  const parts = [BASE_SYSTEM_PROMPT, `## Task\n${INTENT_INSTRUCTIONS[classification.intent]}`];
  if (classification.requiresStructuredOutput) parts.push(STRUCTURED_OUTPUT_INSTRUCTION);
  return parts.join('\n\n');
}

export function buildPrompt(
  question: string,
  classification: IntentClassification,
  bundle: ContextBundle,
  scenario?: ScenarioResult
): CompletionPrompt {
  const messages: PromptMessage[] = [];

  for (const turn of bundle.history) {
    if (turn.status !== 'DELIVERED') continue;
    messages.push({ role: 'user', content: turn.queryText });
    messages.push({ role: 'assistant', content: turn.responseText });
  }

  messages.push({
    role: 'user',
    content: `# Context\n\n${buildContextDocument(bundle, scenario)}\n\n# Question\n\n${question}`,
  });

  return { system: buildSystemPrompt(classification), messages };
}
