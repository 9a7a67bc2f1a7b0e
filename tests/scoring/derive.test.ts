import { describe, it, expect } from 'vitest';
import { deriveRows } from '../../src/scoring/derive.js';
import { InvariantViolationError } from '../../src/errors.js';
import type { Rating } from '../../src/types/models.js';
import { SMALL_DOMAINS, SMALL_QUESTIONS } from '../mocks/fixtures.js';

function rating(code: string, current: Rating['current'], target: Rating['target']): Rating {
  return { code, current, target, actionItems: '', benefit: 1, effort: 1 };
}

describe('deriveRows', () => {
  it('should join ratings to the catalog in catalog order', () => {
    const ratings = [rating('D 2.1', 2, 4), rating('D 1.2', 2, 2), rating('D 1.1', 1, 4)];

    const rows = deriveRows(ratings, SMALL_QUESTIONS, SMALL_DOMAINS);

    expect(rows.map((r) => r.code)).toEqual(['D 1.1', 'D 1.2', 'D 2.1']);
    expect(rows[0]).toMatchObject({
      prompt: 'First',
      domainId: 'd1',
      domainTitle: 'Domain One',
      section: 'D 1',
      gap: 3,
      priority: 'Critical',
    });
    expect(rows[2]).toMatchObject({ gap: 2, priority: 'High' });
  });

  it('should report a negative gap when current exceeds target', () => {
    const rows = deriveRows(
      [rating('D 1.1', 4, 2), rating('D 1.2', 2, 2), rating('D 2.1', 2, 4)],
      SMALL_QUESTIONS,
      SMALL_DOMAINS
    );

    expect(rows[0]).toMatchObject({ gap: -2, priority: 'Low' });
  });

  it('should treat a missing rating as a broken session', () => {
    expect(() =>
      deriveRows([rating('D 1.1', 1, 4), rating('D 1.2', 2, 2)], SMALL_QUESTIONS, SMALL_DOMAINS)
    ).toThrow(InvariantViolationError);
  });

  it('should treat a rating for an unknown code as a broken session', () => {
    expect(() =>
      deriveRows(
        [rating('D 1.1', 1, 4), rating('D 1.2', 2, 2), rating('X 9.9', 2, 4)],
        SMALL_QUESTIONS,
        SMALL_DOMAINS
      )
    ).toThrow(InvariantViolationError);
  });
});
