/**
 * Intent Classifier
 *
 * Classifies a health question into an intent and extracts everything the
 * router and retriever need: date scope, complexity, privacy sensitivity,
 * named metrics and whether structured output was asked for.
 *
 * Pattern matching only. The result depends on nothing but the text and
 * the reference date, and classification never throws: anything
 * unrecognised is GENERAL.
 */

import type {
  DateScope,
  Intent,
  IntentClassification,
  MetricName,
  PrivacySensitivity,
  QueryComplexity,
} from '../../common/types.js';
import { localIsoDate } from '../../common/utils/dates.js';
import { defaultLastSevenDays, defaultYesterday, resolveDateScope } from './date-resolver.js';

// =============================================================================
// PATTERN MATCHING RULES
// =============================================================================

interface IntentRule {
  /** Any pattern matching selects this rule */
  patterns: RegExp[];
  intent: Intent;
  confidence: number;
}

/**
 * Checked in order, first match wins. A "what if" question that also says
 * "why" is a scenario; a "trend" question that says "show me" is a trend.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'SCENARIO',
    confidence: 0.85,
    patterns: [
      /\bwhat if\b/i,
      /\bif i (were to |could |started to )?(sleep|slept|exercise|walk|walked|run|ran|train|improve|increase|raise|boost|get|got|add|reduce|cut)\b/i,
      /\bhypothetical(ly)?\b/i,
      /\bscenario\b/i,
      /\bwhat would happen\b/i,
      /\bsuppose\b/i,
    ],
  },
  {
    intent: 'EXPLANATION',
    confidence: 0.85,
    patterns: [
      /\bwhy\b/i,
      /\bwhat caused\b/i,
      /\bexplain\b/i,
      /\breasons? for\b/i,
      /\bwhat made\b/i,
    ],
  },
  {
    intent: 'COMPARISON',
    confidence: 0.85,
    patterns: [
      /\bcompare\b/i,
      /\bcompared (to|with)\b/i,
      /\bvs\.?(?=\s|$)/i,
      /\bversus\b/i,
      /\bdifference between\b/i,
      /\bweekdays? (and|or|vs\.?) weekends?\b/i,
    ],
  },
  {
    intent: 'TREND',
    confidence: 0.85,
    patterns: [
      /\btrend(s|ing)?\b/i,
      /\bover (time|the (past|last))\b/i,
      /\bchang(ed|ing)\b/i,
      /\bprogress\b/i,
      /\b(improv|worsen)(ed|ing)\b/i,
    ],
  },
  {
    intent: 'PREDICTION',
    confidence: 0.85,
    patterns: [
      /\bwhat will\b/i,
      /\bwill my\b/i,
      /\bpredict(ion|ed)?\b/i,
      /\bforecast\b/i,
      /\bexpect(ed)?\b/i,
      /\btomorrow\b/i,
      /\bnext (week|month)\b/i,
    ],
  },
  {
    intent: 'RECOMMENDATION',
    confidence: 0.85,
    patterns: [
      /\bhow (can|do|should|could) i\b/i,
      /\bwhat should i\b/i,
      /\brecommend(ation)?s?\b/i,
      /\bsuggest(ion)?s?\b/i,
      /\btips?\b/i,
      /\badvice\b/i,
    ],
  },
  {
    intent: 'DATA_LOOKUP',
    confidence: 0.85,
    patterns: [
      /\bwhat (was|were|is|are) my\b/i,
      /\bshow me\b/i,
      /\bmy (bp|blood pressure|sleep|steps|heart rate|vo2( max)?|hrv) (on|for|yesterday|today|last)\b/i,
      /\bhow (much|many|long) did i\b/i,
      /\bhow did i sleep\b/i,
      /\b(sleep|steps|bp|blood pressure|heart rate|vo2|hrv) (data|numbers|readings?)\b/i,
      /\bdid i (hit|reach|walk|sleep)\b/i,
    ],
  },
];

const GENERAL_CONFIDENCE = 0.5;

/**
 * Health topics that never leave the local backend
 */
const SENSITIVE_PATTERN =
  /\b(medications?|medicines?|meds|drugs?|prescri\w*|dos(e|es|age|ing)|pills?|mental|anxiety|anxious|depress\w*|therap(y|ist)|psychiatr\w*|panic|suicid\w*|antidepressants?|beta[- ]?blockers?|lisinopril|amlodipine|losartan)\b/i;

const STRUCTURED_OUTPUT_PATTERN = /\b(json|csv|code|script|spreadsheet|table format)\b/i;

const MULTI_FACTOR_PATTERN =
  /\b(correlat\w*|relationship between|affect(s|ed|ing)?|impact(s|ed|ing)?|influenc\w*|related to)\b/i;

const METRIC_PATTERNS: ReadonlyArray<[MetricName, RegExp]> = [
  ['systolic', /\b(bp|blood pressure|systolic)\b/i],
  ['diastolic', /\bdiastolic\b/i],
  ['heartRate', /\b(heart rate|pulse|resting hr)\b/i],
  ['hrv', /\b(hrv|heart rate variability)\b/i],
  ['steps', /\b(steps?|walk(ed|ing)?)\b/i],
  ['sleepHours', /\b(sleep|slept)\b/i],
  ['sleepEfficiency', /\bsleep efficiency\b/i],
  ['vo2Max', /\b(vo2( ?max)?|cardio fitness)\b/i],
  ['exerciseMinutes', /\b(exercise|workouts?)\b/i],
  ['activeCalories', /\bcalories\b/i],
  ['respiratoryRate', /\b(respiratory|breathing) rate\b/i],
];

const BASE_COMPLEXITY: Record<Intent, QueryComplexity> = {
  DATA_LOOKUP: 'LOW',
  GENERAL: 'LOW',
  TREND: 'MEDIUM',
  COMPARISON: 'MEDIUM',
  RECOMMENDATION: 'MEDIUM',
  EXPLANATION: 'HIGH',
  SCENARIO: 'HIGH',
  PREDICTION: 'HIGH',
};

// =============================================================================
// CLASSIFIER
// =============================================================================

function matchIntent(text: string): { intent: Intent; confidence: number } {
  for (const rule of INTENT_RULES) {
    if (rule.patterns.some(p => p.test(text))) {
      return { intent: rule.intent, confidence: rule.confidence };
    }
  }
  return { intent: 'GENERAL', confidence: GENERAL_CONFIDENCE };
}

export function detectMetrics(text: string): MetricName[] {
  return METRIC_PATTERNS.filter(([, pattern]) => pattern.test(text)).map(([metric]) => metric);
}

export function detectPrivacy(text: string): PrivacySensitivity {
  return SENSITIVE_PATTERN.test(text) ? 'SENSITIVE' : 'NORMAL';
}

function assessComplexity(intent: Intent, text: string, metrics: MetricName[]): QueryComplexity {
  if (intent === 'GENERAL') return 'LOW';
  if (MULTI_FACTOR_PATTERN.test(text) || metrics.length >= 3) return 'HIGH';
  return BASE_COMPLEXITY[intent];
}

function applyDefaultScope(intent: Intent, scope: DateScope | null, today: string): DateScope | null {
  if (scope) return scope;
  switch (intent) {
    case 'DATA_LOOKUP':
    case 'EXPLANATION':
      return defaultYesterday(today);
    case 'TREND':
      return defaultLastSevenDays(today);
    default:
      return null;
  }
}

/**
 * Classify a question.
 *
 * @param referenceDate - ISO date that "today" means; defaults to the local date
 */
export function classify(text: string, referenceDate: string = localIsoDate()): IntentClassification {
  const normalized = text.replace(/\s+/g, ' ').trim();
  const { intent, confidence } = matchIntent(normalized);
  const metrics = detectMetrics(normalized);

  return {
    intent,
    confidence,
    dateScope: applyDefaultScope(intent, resolveDateScope(normalized, referenceDate), referenceDate),
    complexity: assessComplexity(intent, normalized, metrics),
    privacy: detectPrivacy(normalized),
    requiresStructuredOutput: STRUCTURED_OUTPUT_PATTERN.test(normalized),
    metrics,
  };
}
