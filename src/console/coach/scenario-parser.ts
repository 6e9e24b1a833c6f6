/**
 * Scenario Parser
 *
 * Pulls lifestyle deltas out of a "what if" question:
 * - "what if my VO2 max went to 42"     -> absolute target, delta from baseline
 * - "increase VO2 max by 5", "+5 VO2"   -> relative delta
 * - "VO2 max improved by 5"             -> relative delta
 * - "if I slept 8 hours", "sleep 8 hour"  -> absolute target
 * - "an extra hour of sleep"            -> relative delta
 * - "12k steps", "12,000 steps"         -> absolute target
 * - "2000 more steps"                   -> relative delta
 * - "sleep efficiency of 90%"           -> absolute target
 *
 * Relative phrasings are checked before absolute ones for each factor.
 */

import { BASELINE_DEFAULTS } from '../../common/constants.js';
import { round } from '../../common/utils/stats.js';
import type { ScenarioBaseline, ScenarioDeltas, ScenarioFactor } from './scenario-engine.js';

type DeltaExtractor = (text: string, current: number) => number | null;

const NUMBER = '(\\d+(?:\\.\\d+)?)';
const WORD_NUMBERS: Record<string, number> = { an: 1, one: 1, a: 1, two: 2, three: 3, half: 0.5 };

function num(value: string): number {
  return parseFloat(value.replace(/,/g, ''));
}

function relative(pattern: RegExp, group = 1): DeltaExtractor {
  return (text) => {
    const m = pattern.exec(text);
    if (!m) return null;
    const raw = m[group].toLowerCase();
    const value = raw in WORD_NUMBERS ? WORD_NUMBERS[raw] : num(raw);
    return /\b(?:decreas|reduc|lower|drop|cut|less|fewer|fell|fall)\w*/i.test(m[0]) || raw.startsWith('-')
      ? -Math.abs(value)
      : value;
  };
}

function absolute(pattern: RegExp, scale = 1): DeltaExtractor {
  return (text, current) => {
    const m = pattern.exec(text);
    if (!m) return null;
    return num(m[1]) * scale - current;
  };
}

const EXTRACTORS: Record<ScenarioFactor, DeltaExtractor[]> = {
  vo2Max: [
    relative(new RegExp(`\\b(?:increase|raise|improve|boost|decrease|reduce|lower)\\w*\\s+(?:my\\s+)?vo2(?:\\s*max)?\\s+by\\s+${NUMBER}`, 'i')),
    relative(new RegExp(`([+-]\\d+(?:\\.\\d+)?)\\s*(?:points?\\s+(?:of|in)\\s+)?vo2`, 'i')),
    relative(new RegExp(`vo2(?:\\s*max)?\\s+(?:(?:went|goes|go)\\s+up|improved?|improves|increased?|increases|rose|rises|raised|boosted|dropped|drops|decreased?|decreases|fell|falls)\\s+(?:by\\s+)?${NUMBER}`, 'i')),
    absolute(new RegExp(`vo2(?:\\s*max)?\\s+(?:\\w+\\s+){0,2}(?:to|of|at|was|is|were|reached)\\s+${NUMBER}`, 'i')),
  ],
  sleepHours: [
    relative(/\b(an|one|two|three|half|\d+(?:\.\d+)?)\s+(?:an\s+)?(?:more|extra|additional|less|fewer)\s+hours?(?:\s+of)?\s+sleep/i),
    relative(/\bsleep\s+(?:for\s+)?(an|one|two|\d+(?:\.\d+)?)\s+(?:more|extra|additional)\s+hours?/i),
    absolute(new RegExp(`\\b(?:sleep|slept|sleeping)\\s+(?:for\\s+)?(?:at least\\s+)?${NUMBER}\\s*(?:hours?|hrs?|h)\\b`, 'i')),
    absolute(new RegExp(`${NUMBER}\\s*(?:hours?|hrs?)\\s+(?:of\\s+)?sleep`, 'i')),
  ],
  steps: [
    relative(/\b(\d{1,3}(?:,\d{3})+|\d+)\s+(?:more|extra|additional|fewer|less)\s+(?:daily\s+)?steps/i),
    absolute(/\b(\d+(?:\.\d+)?)\s*k\s+(?:daily\s+)?steps/i, 1000),
    absolute(/\b(\d{1,3}(?:,\d{3})+|\d{3,6})\s+(?:daily\s+)?steps/i),
  ],
  sleepEfficiency: [
    absolute(new RegExp(`sleep efficiency\\s+(?:\\w+\\s+){0,2}(?:to|of|at)\\s+${NUMBER}\\s*%?`, 'i')),
  ],
};

/**
 * Extract deltas from text. Factors not mentioned are left out.
 */
export function parseScenarioDeltas(text: string, baseline: Partial<ScenarioBaseline> = {}): ScenarioDeltas {
  const deltas: ScenarioDeltas = {};
  for (const factor of Object.keys(EXTRACTORS).filter(isScenarioFactor)) {
    const current = baseline[factor] ?? BASELINE_DEFAULTS[factor];
    for (const extract of EXTRACTORS[factor]) {
      const delta = extract(text, current);
      if (delta !== null && Number.isFinite(delta)) {
        deltas[factor] = round(delta, factor === 'steps' ? 0 : 2);
        break;
      }
    }
  }
  return deltas;
}

function isScenarioFactor(value: string): value is ScenarioFactor {
  return value === 'vo2Max' || value === 'sleepHours' || value === 'steps' || value === 'sleepEfficiency';
}

export function hasDeltas(deltas: ScenarioDeltas): boolean {
  return Object.values(deltas).some(d => d !== undefined && d !== 0);
}
