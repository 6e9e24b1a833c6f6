/**
 * Jest Unit Tests for the Model Router
 */

import { BACKEND_PRIORITY, fallbackChain, selectBackend } from '../model-router.js';
import type { RoutingMetadata } from '../model-router.js';
import type { BackendId, PrivacySensitivity, QueryComplexity } from '../../../common/types.js';

const COMPLEXITIES: QueryComplexity[] = ['LOW', 'MEDIUM', 'HIGH'];
const PRIVACY: PrivacySensitivity[] = ['NORMAL', 'SENSITIVE'];

function allMetadata(): RoutingMetadata[] {
  const out: RoutingMetadata[] = [];
  for (const complexity of COMPLEXITIES) {
    for (const privacy of PRIVACY) {
      for (const requiresStructuredOutput of [false, true]) {
        out.push({ complexity, privacy, requiresStructuredOutput });
      }
    }
  }
  return out;
}

describe('ModelRouter', () => {
  // ==========================================================================
  // SELECTION
  // ==========================================================================

  describe('selectBackend', () => {
    test.each<[QueryComplexity, BackendId]>([
      ['LOW', 'local'],
      ['MEDIUM', 'validation'],
      ['HIGH', 'reasoning'],
    ])('%s complexity -> %s', (complexity, backend) => {
      expect(
        selectBackend({ complexity, privacy: 'NORMAL', requiresStructuredOutput: false }, { costConstrained: false })
      ).toBe(backend);
    });

    test('structured output goes to validation regardless of complexity', () => {
      for (const complexity of COMPLEXITIES) {
        expect(
          selectBackend({ complexity, privacy: 'NORMAL', requiresStructuredOutput: true }, { costConstrained: false })
        ).toBe('validation');
      }
    });

    test('cost constraint moves MEDIUM to local', () => {
      expect(
        selectBackend({ complexity: 'MEDIUM', privacy: 'NORMAL', requiresStructuredOutput: false }, { costConstrained: true })
      ).toBe('local');
    });

    test('cost constraint leaves HIGH on reasoning', () => {
      expect(
        selectBackend({ complexity: 'HIGH', privacy: 'NORMAL', requiresStructuredOutput: false }, { costConstrained: true })
      ).toBe('reasoning');
    });

    test('every SENSITIVE combination routes to local', () => {
      for (const metadata of allMetadata().filter(m => m.privacy === 'SENSITIVE')) {
        for (const costConstrained of [false, true]) {
          expect(selectBackend(metadata, { costConstrained })).toBe('local');
        }
      }
    });

    test('the decision is a pure function of its input', () => {
      for (const metadata of allMetadata()) {
        const first = selectBackend(metadata, { costConstrained: false });
        expect(selectBackend({ ...metadata }, { costConstrained: false })).toBe(first);
      }
    });
  });

  // ==========================================================================
  // FALLBACK
  // ==========================================================================

  describe('fallbackChain', () => {
    test('priority order is reasoning, validation, local', () => {
      expect(BACKEND_PRIORITY).toEqual(['reasoning', 'validation', 'local']);
    });

    test.each<[BackendId, BackendId[]]>([
      ['reasoning', ['reasoning', 'validation']],
      ['validation', ['validation', 'local']],
      ['local', ['local', 'reasoning']],
    ])('%s falls back once', (selected, chain) => {
      expect(fallbackChain(selected, 'NORMAL')).toEqual(chain);
    });

    test('sensitive requests never leave the local backend', () => {
      for (const selected of BACKEND_PRIORITY) {
        expect(fallbackChain(selected, 'SENSITIVE')).toEqual(['local']);
      }
    });
  });
});
