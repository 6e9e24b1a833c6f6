/**
 * Jest Unit Tests for the Claim Checker
 */

import { checkClaims, numbersIn, penalizedConfidence } from '../claim-checker.js';
import type { ContextBundle } from '../../../common/types.js';

function bundle(overrides: Partial<ContextBundle> = {}): ContextBundle {
  return {
    profile: null,
    dateScope: null,
    records: [{ date: '2026-01-05', systolic: 138.5, diastolic: 88 }],
    similarDays: [],
    history: [],
    supplemental: {},
    degraded: false,
    degradedSources: [],
    ...overrides,
  };
}

const CONTEXT = '2026-01-05: systolic 138.5 mmHg, diastolic 88 mmHg';

describe('ClaimChecker', () => {
  // ==========================================================================
  // DATES
  // ==========================================================================

  describe('Dates', () => {
    test('a date from the retrieved records is cited', () => {
      const result = checkClaims('Your BP on 2026-01-05 was 138.5 mmHg', bundle(), CONTEXT, 0.85);
      expect(result.citations).toEqual([{ date: '2026-01-05', source: 'record' }]);
      expect(result.unsupportedClaims).toEqual([]);
      expect(result.confidence).toBe(0.85);
    });

    test('a repeated date is cited once', () => {
      const result = checkClaims('2026-01-05 and again 2026-01-05', bundle(), CONTEXT, 0.85);
      expect(result.citations).toHaveLength(1);
    });

    test('similar days and supplemental windows are sources too', () => {
      const result = checkClaims(
        'Compare 2025-12-20 with 2025-12-28.',
        bundle({
          similarDays: [{ date: '2025-12-20', score: 0.9, summary: 'quiet day', weak: false }],
          supplemental: { trendWindow: [{ date: '2025-12-28', systolic: 140 }] },
        }),
        CONTEXT,
        0.85
      );
      expect(result.citations).toEqual([
        { date: '2025-12-20', source: 'similar_day' },
        { date: '2025-12-28', source: 'supplemental' },
      ]);
    });

    test('a date inside the scope but without a record cites the scope', () => {
      const result = checkClaims(
        'No reading on 2026-01-03.',
        bundle({
          dateScope: { kind: 'range', start: '2026-01-01', end: '2026-01-07', phrase: 'last week', defaulted: false },
        }),
        CONTEXT,
        0.85
      );
      expect(result.citations).toEqual([{ date: '2026-01-03', source: 'scope' }]);
    });

    test('a date with nothing behind it is unsupported and costs confidence', () => {
      const result = checkClaims('On 2025-11-01 it was fine.', bundle(), CONTEXT, 0.85);
      expect(result.unsupportedClaims).toEqual(['date 2025-11-01']);
      expect(result.confidence).toBe(0.7);
    });
  });

  describe('Month and day dates', () => {
    test('a written-out date from the records is cited', () => {
      const result = checkClaims('On January 5 your reading was 138.5 mmHg.', bundle(), CONTEXT, 0.85, '2026-01-08');
      expect(result.citations).toEqual([{ date: '2026-01-05', source: 'record' }]);
      expect(result.unsupportedClaims).toEqual([]);
      expect(result.confidence).toBe(0.85);
    });

    test('without a reference date the newest context date anchors the year', () => {
      const result = checkClaims('On January 5 your reading was 138.5 mmHg.', bundle(), CONTEXT, 0.85);
      expect(result.citations).toEqual([{ date: '2026-01-05', source: 'record' }]);
    });

    test('a written-out date with nothing behind it is flagged', () => {
      const result = checkClaims('On March 3 your blood pressure was high.', bundle(), CONTEXT, 0.85, '2026-01-08');
      expect(result.citations).toEqual([]);
      expect(result.unsupportedClaims).toEqual(['date 2025-03-03']);
      expect(result.confidence).toBe(0.7);
    });

    test('a late-December date asked about in January falls in the previous year', () => {
      const result = checkClaims(
        'December 30 looked a lot like today.',
        bundle({ similarDays: [{ date: '2025-12-30', score: 0.8, summary: 'similar', weak: false }] }),
        CONTEXT,
        0.85,
        '2026-01-08'
      );
      expect(result.citations).toEqual([{ date: '2025-12-30', source: 'similar_day' }]);
      expect(result.unsupportedClaims).toEqual([]);
    });

    test('the same day written both ways is cited once', () => {
      const result = checkClaims('2026-01-05 (Jan 5th, 2026) was steady.', bundle(), CONTEXT, 0.85, '2026-01-08');
      expect(result.citations).toEqual([{ date: '2026-01-05', source: 'record' }]);
    });

    test('an impossible day is ignored', () => {
      const result = checkClaims('February 30 never happened.', bundle(), CONTEXT, 0.85, '2026-01-08');
      expect(result.citations).toEqual([]);
      expect(result.unsupportedClaims).toEqual([]);
    });
  });

  // ==========================================================================
  // READINGS
  // ==========================================================================

  describe('Readings', () => {
    test('a rounded reading is supported', () => {
      expect(checkClaims('Systolic was about 139 mmHg.', bundle(), CONTEXT, 0.8).unsupportedClaims).toEqual([]);
    });

    test('a reading pair is checked as a pair', () => {
      const ok = checkClaims('It read 138.5/88 mmHg.', bundle(), CONTEXT, 0.8);
      expect(ok.unsupportedClaims).toEqual([]);

      const bad = checkClaims('It read 150/95 mmHg.', bundle(), CONTEXT, 0.8);
      expect(bad.unsupportedClaims).toEqual(['reading 150/95 mmHg']);
    });

    test('an invented single reading is flagged', () => {
      const result = checkClaims('It peaked at 162 mmHg.', bundle(), CONTEXT, 0.8);
      expect(result.unsupportedClaims).toEqual(['reading 162 mmHg']);
    });

    test('small figures are changes, not readings', () => {
      expect(checkClaims('It dropped by 5 mmHg.', bundle(), CONTEXT, 0.8).unsupportedClaims).toEqual([]);
    });
  });

  // ==========================================================================
  // CONFIDENCE
  // ==========================================================================

  describe('Confidence', () => {
    test('degraded context lowers confidence', () => {
      expect(checkClaims('Fine.', bundle({ degraded: true }), CONTEXT, 0.85).confidence).toBe(0.75);
    });

    test('confidence never drops below the floor', () => {
      const result = checkClaims('160 mmHg, 170 mmHg, 180 mmHg, 190 mmHg on 2025-01-01', bundle(), CONTEXT, 0.5);
      expect(result.unsupportedClaims).toHaveLength(5);
      expect(result.confidence).toBe(0.1);
    });

    test('the response text is not altered', () => {
      const response = 'It peaked at 162 mmHg.';
      checkClaims(response, bundle(), CONTEXT, 0.8);
      expect(response).toBe('It peaked at 162 mmHg.');
    });
  });

  test('numbersIn lists every figure', () => {
    expect(numbersIn('a 1.5 b 20')).toEqual([1.5, 20]);
  });

  describe('penalizedConfidence', () => {
    test('applies both penalties', () => {
      expect(penalizedConfidence(0.85, true, 1)).toBe(0.6);
    });

    test('a degraded low-confidence answer stops at the floor', () => {
      expect(penalizedConfidence(0.15, true, 0)).toBe(0.1);
    });
  });
});
