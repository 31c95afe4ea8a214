import { describe, it, expect } from 'vitest';
import { score } from '../src/scoring/calculator.js';
import { calculateAverages, rankResults } from '../src/scoring/ranking.js';
import { gradeFor } from '../src/scoring/grade.js';
import type { ScoredResult } from '../src/scoring/types.js';
import { counts } from './helpers/test-utils.js';

describe('Ranking', () => {
  function scored(): Map<string, ScoredResult> {
    return new Map([
      ['dave', score(counts(0, 0, 0, 0, 0))], // 0
      ['bob', score(counts(1, 0, 0, 10, 10))], // 11
      ['alice', score(counts(2, 5, 5, 0, 0))], // 17
      ['carol', score(counts(1, 0, 0, 4, 0))], // 11
    ]);
  }

  describe('rankResults', () => {
    it('should sort by total and share ranks on ties', () => {
      const ranked = rankResults(scored());
      expect(ranked.map(e => [e.user, e.total, e.rank])).toEqual([
        ['alice', 17, 1],
        ['bob', 11, 2],
        ['carol', 11, 2],
        ['dave', 0, 4],
      ]);
    });

    it('should compute rates against the summed total', () => {
      const ranked = rankResults(scored());
      expect(ranked.map(e => e.rate)).toEqual([43.6, 28.2, 28.2, 0]);
    });

    it('should keep rates from the unfiltered sum when filtering', () => {
      const ranked = rankResults(scored(), { minContributions: 11 });
      expect(ranked.map(e => e.user)).toEqual(['alice', 'bob', 'carol']);
      expect(ranked.map(e => e.rate)).toEqual([43.6, 28.2, 28.2]);
    });

    it('should keep zero-score users when minContributions is 0', () => {
      const ranked = rankResults(scored(), { minContributions: 0 });
      expect(ranked).toHaveLength(4);
    });

    it('should use display names when given', () => {
      const ranked = rankResults(scored(), { displayNames: { bob: 'Bob B.' } });
      const bob = ranked.find(e => e.user === 'bob');
      const alice = ranked.find(e => e.user === 'alice');
      expect(bob?.displayName).toBe('Bob B.');
      expect(alice?.displayName).toBe('alice');
    });

    it('should not read display names from the object prototype', () => {
      const ranked = rankResults(
        new Map([
          ['constructor', score(counts(1, 0, 0, 0, 0))],
          ['toString', score(counts(0, 1, 0, 0, 0))],
        ]),
        { displayNames: {} }
      );
      expect(ranked.map(e => e.displayName)).toEqual(['constructor', 'toString']);
      expect(JSON.parse(JSON.stringify(ranked[0])).displayName).toBe('constructor');
    });

    it('should attach grades and point breakdowns', () => {
      const ranked = rankResults(scored());
      expect(ranked[0]?.grade).toBe('🍁');
      expect(ranked[3]?.grade).toBe('🌑');
      expect(ranked[0]?.points).toEqual(counts(6, 10, 1, 0, 0));
      expect(ranked[0]?.counts).toEqual(counts(2, 5, 1, 0, 0));
    });

    it('should give every user a zero rate when nobody scored', () => {
      const ranked = rankResults(
        new Map([
          ['a', score(counts(0, 0, 0, 0, 0))],
          ['b', score(counts(0, 0, 0, 3, 0))],
        ])
      );
      expect(ranked.map(e => [e.rank, e.rate])).toEqual([
        [1, 0],
        [1, 0],
      ]);
    });

    it('should return an empty list for no users', () => {
      expect(rankResults(new Map())).toEqual([]);
    });
  });

  describe('calculateAverages', () => {
    it('should average points, totals and rates', () => {
      const averages = calculateAverages(rankResults(scored()));
      expect(averages.total).toBe(9.75);
      expect(averages.points.prFeatureBug).toBe(3);
      expect(averages.points.prDoc).toBe(2.5);
      expect(averages.points.issueFeatureBug).toBe(4);
      expect(averages.rate).toBeCloseTo(25, 5);
    });

    it('should return zeros for no entries', () => {
      expect(calculateAverages([])).toEqual({
        points: counts(0, 0, 0, 0, 0),
        total: 0,
        rate: 0,
      });
    });
  });

  describe('gradeFor', () => {
    it('should map totals onto grade thresholds', () => {
      expect(gradeFor(120)).toBe('🌟');
      expect(gradeFor(90)).toBe('🌟');
      expect(gradeFor(89)).toBe('⭐');
      expect(gradeFor(55)).toBe('🌱');
      expect(gradeFor(10)).toBe('🍁');
      expect(gradeFor(9)).toBe('🌑');
      expect(gradeFor(0)).toBe('🌑');
    });
  });
});
