/**
 * Jest Unit Tests for the Date Resolver
 *
 * Reference date is Thursday 2026-01-08 throughout.
 */

import { defaultLastSevenDays, defaultYesterday, resolveDateScope } from '../date-resolver.js';

const REF = '2026-01-08';

function span(text: string): [string, string] | null {
  const scope = resolveDateScope(text, REF);
  return scope ? [scope.start, scope.end] : null;
}

describe('DateResolver', () => {
  // ==========================================================================
  // ABSOLUTE DATES
  // ==========================================================================

  describe('ISO dates', () => {
    test('one ISO date is a single day', () => {
      expect(resolveDateScope('BP on 2026-01-05?', REF)).toEqual({
        kind: 'single',
        start: '2026-01-05',
        end: '2026-01-05',
        phrase: '2026-01-05',
        defaulted: false,
      });
    });

    test('two ISO dates in reverse order are swapped', () => {
      const scope = resolveDateScope('between 2026-01-07 and 2026-01-01', REF);
      expect(scope?.kind).toBe('range');
      expect([scope?.start, scope?.end]).toEqual(['2026-01-01', '2026-01-07']);
    });

    test('an impossible ISO date is ignored', () => {
      expect(resolveDateScope('on 2026-02-30', REF)).toBeNull();
    });
  });

  describe('Month names', () => {
    test.each<[string, string]>([
      ['What about January 10?', '2025-01-10'],
      ['How did I sleep on Jan 3rd', '2026-01-03'],
      ['BP on March 4, 2025', '2025-03-04'],
    ])('"%s" -> %s', (text, date) => {
      expect(span(text)).toEqual([date, date]);
    });

    test('month and year covers the whole month', () => {
      const scope = resolveDateScope('my steps in December 2025', REF);
      expect(scope).toEqual({
        kind: 'range',
        start: '2025-12-01',
        end: '2025-12-31',
        phrase: 'December 2025',
        defaulted: false,
      });
    });

    test('a day the month does not have resolves to nothing', () => {
      expect(resolveDateScope('February 30', REF)).toBeNull();
    });
  });

  // ==========================================================================
  // RELATIVE DATES
  // ==========================================================================

  describe('Relative phrases', () => {
    test.each<[string, string, string]>([
      ['yesterday', '2026-01-07', '2026-01-07'],
      ['today', '2026-01-08', '2026-01-08'],
      ['the last 30 days', '2025-12-10', '2026-01-08'],
      ['the past 2 weeks', '2025-12-26', '2026-01-08'],
      ['this week', '2026-01-05', '2026-01-08'],
      ['last week', '2026-01-02', '2026-01-08'],
      ['this month', '2026-01-01', '2026-01-08'],
      ['last month', '2025-12-01', '2025-12-31'],
      ['this year', '2026-01-01', '2026-01-08'],
      ['last Tuesday', '2026-01-06', '2026-01-06'],
      ['on Thursday', '2026-01-01', '2026-01-01'],
    ])('"%s" -> %s..%s', (text, start, end) => {
      expect(span(text)).toEqual([start, end]);
    });

    test('last 1 day is the reference date alone', () => {
      expect(resolveDateScope('the last 1 day', REF)?.kind).toBe('single');
    });

    test('text without a date phrase resolves to null', () => {
      expect(resolveDateScope('How is my blood pressure?', REF)).toBeNull();
    });

    test('an ISO date wins over a relative phrase', () => {
      expect(span('yesterday, i.e. 2026-01-03')).toEqual(['2026-01-03', '2026-01-03']);
    });
  });

  // ==========================================================================
  // DEFAULTS
  // ==========================================================================

  describe('Defaults', () => {
    test('defaultYesterday is marked defaulted', () => {
      expect(defaultYesterday(REF)).toEqual({
        kind: 'single',
        start: '2026-01-07',
        end: '2026-01-07',
        phrase: 'yesterday',
        defaulted: true,
      });
    });

    test('defaultLastSevenDays ends on the reference date', () => {
      expect(defaultLastSevenDays(REF)).toEqual({
        kind: 'range',
        start: '2026-01-02',
        end: '2026-01-08',
        phrase: 'last 7 days',
        defaulted: true,
      });
    });
  });
});
