import { InvalidInputError, UsageError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { COUNT_FIELDS, CountField, RawCounts, emptyCounts } from './types.js';

function isCountField(key: string): key is CountField {
  return COUNT_FIELDS.some(field => field === key);
}

/**
 * Read a `{ user: { prFeatureBug, prDoc, prTypo, issueFeatureBug, issueDoc } }`
 * document. Missing fields are 0. Range checks are left to the calculator.
 */
export function parseRawCounts(document: unknown): Map<string, RawCounts> {
  if (!isRecord(document)) {
    throw new UsageError('Counts file must contain a JSON object keyed by user name');
  }

  const rawByUser = new Map<string, RawCounts>();
  for (const [user, entry] of Object.entries(document)) {
    if (!isRecord(entry)) {
      throw new InvalidInputError('counts', JSON.stringify(entry), user);
    }

    const counts = emptyCounts();
    for (const [key, value] of Object.entries(entry)) {
      if (!isCountField(key)) {
        throw new UsageError(`Unknown count "${key}" for ${user}; expected one of ${COUNT_FIELDS.join(', ')}`);
      }
      if (typeof value !== 'number') {
        throw new InvalidInputError(key, JSON.stringify(value), user);
      }
      counts[key] = value;
    }
    rawByUser.set(user, Object.freeze(counts));
  }

  return rawByUser;
}
