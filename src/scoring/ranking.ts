import { gradeFor } from './grade.js';
import { Averages, COUNT_FIELDS, RankedEntry, ScoredResult, emptyCounts } from './types.js';

export interface RankOptions {
  /** Drop users whose total is below this value. 0 keeps everyone. */
  minContributions?: number;
  displayNames?: Readonly<Record<string, string>>;
}

/**
 * Rank scored users by total, highest first.
 *
 * Rates are computed against the sum over every scored user, before the
 * minimum-contribution filter. Equal totals share a rank and the following
 * rank skips ahead (1, 1, 3).
 */
export function rankResults(
  results: ReadonlyMap<string, ScoredResult>,
  options: RankOptions = {}
): RankedEntry[] {
  const minContributions = options.minContributions ?? 0;
  const displayNames = options.displayNames ?? {};

  let totalSum = 0;
  for (const result of results.values()) {
    totalSum += result.total;
  }

  const entries: RankedEntry[] = [];
  for (const [user, result] of results) {
    if (minContributions > 0 && result.total < minContributions) continue;

    entries.push({
      user,
      displayName: (Object.hasOwn(displayNames, user) ? displayNames[user] : undefined) ?? user,
      rank: 0,
      grade: gradeFor(result.total),
      rate: totalSum > 0 ? roundTo((result.total / totalSum) * 100, 1) : 0,
      counts: result.counts,
      points: result.points,
      total: result.total,
    });
  }

  // Array.prototype.sort is stable, so ties keep insertion order
  entries.sort((a, b) => b.total - a.total);

  let lastTotal: number | undefined;
  let currentRank = 0;
  entries.forEach((entry, index) => {
    if (entry.total !== lastTotal) {
      currentRank = index + 1;
      lastTotal = entry.total;
    }
    entry.rank = currentRank;
  });

  return entries;
}

export function calculateAverages(entries: readonly RankedEntry[]): Averages {
  const points = emptyCounts();
  if (entries.length === 0) {
    return { points, total: 0, rate: 0 };
  }

  let total = 0;
  let rate = 0;
  for (const entry of entries) {
    for (const field of COUNT_FIELDS) {
      points[field] += entry.points[field];
    }
    total += entry.total;
    rate += entry.rate;
  }

  for (const field of COUNT_FIELDS) {
    points[field] /= entries.length;
  }

  return { points, total: total / entries.length, rate: rate / entries.length };
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
