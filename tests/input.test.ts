import { describe, it, expect } from 'vitest';
import { parseRawCounts } from '../src/scoring/input.js';
import { InvalidInputError, UsageError } from '../src/errors.js';

describe('parseRawCounts', () => {
  it('should read counts keyed by user and fills missing fields with 0', () => {
    const parsed = parseRawCounts({
      alice: { prFeatureBug: 2, issueDoc: 1 },
      bob: {},
    });

    expect([...parsed.keys()]).toEqual(['alice', 'bob']);
    expect(parsed.get('alice')).toEqual({ prFeatureBug: 2, prDoc: 0, prTypo: 0, issueFeatureBug: 0, issueDoc: 1 });
    expect(parsed.get('bob')).toEqual({ prFeatureBug: 0, prDoc: 0, prTypo: 0, issueFeatureBug: 0, issueDoc: 0 });
  });

  it('should leave range checks to the calculator', () => {
    const parsed = parseRawCounts({ alice: { prDoc: -1 } });
    expect(parsed.get('alice')?.prDoc).toBe(-1);
  });

  it('should reject a document that is not an object', () => {
    expect(() => parseRawCounts([1, 2])).toThrow(UsageError);
    expect(() => parseRawCounts(null)).toThrow('Counts file must contain a JSON object keyed by user name');
  });

  it('should reject unknown count names', () => {
    expect(() => parseRawCounts({ alice: { prChore: 1 } })).toThrow(
      'Unknown count "prChore" for alice; expected one of prFeatureBug, prDoc, prTypo, issueFeatureBug, issueDoc'
    );
  });

  it('should reject non-numeric values with the user and field', () => {
    expect(() => parseRawCounts({ alice: { prTypo: '3' } })).toThrow(
      new InvalidInputError('prTypo', '"3"', 'alice')
    );
    expect(() => parseRawCounts({ alice: { prTypo: '3' } })).toThrow(
      'alice.prTypo must be a non-negative integer (got "3")'
    );
  });

  it('should reject entries that are not objects', () => {
    expect(() => parseRawCounts({ alice: 5 })).toThrow('alice.counts must be a non-negative integer (got 5)');
  });
});
