import { InvalidInputError } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { COUNT_FIELDS, CategoryCounts, CountField, RawCounts, ScoredResult } from './types.js';

export const SCORE_WEIGHTS: Readonly<Record<CountField, number>> = Object.freeze({
  prFeatureBug: 3,
  prDoc: 2,
  prTypo: 1,
  issueFeatureBug: 2,
  issueDoc: 1,
});

// Doc and typo PRs count up to this many per feature/bug PR (or this many in total without one).
const DOC_TYPO_PER_FEATURE_PR = 3;
// Issues count up to this many per valid PR.
const ISSUES_PER_VALID_PR = 4;

function assertCount(field: CountField, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(field, value);
  }
}

/**
 * Score one participant.
 *
 * Feature/bug PRs always count. Doc and typo PRs are capped relative to them,
 * and issues are capped relative to the resulting PR budget. Within each
 * budget the higher-weighted category is filled first.
 */
export function score(raw: RawCounts): ScoredResult {
  for (const field of COUNT_FIELDS) {
    assertCount(field, raw[field]);
  }

  const prFb = raw.prFeatureBug;
  const prValid =
    prFb + Math.min(raw.prDoc + raw.prTypo, DOC_TYPO_PER_FEATURE_PR * Math.max(prFb, 1));
  const issueValid = Math.min(raw.issueFeatureBug + raw.issueDoc, ISSUES_PER_VALID_PR * prValid);

  const creditedPrFb = Math.min(prFb, prValid);
  const creditedPrDoc = Math.min(raw.prDoc, prValid - creditedPrFb);
  const creditedIssueFb = Math.min(raw.issueFeatureBug, issueValid);

  const counts: CategoryCounts = Object.freeze({
    prFeatureBug: creditedPrFb,
    prDoc: creditedPrDoc,
    prTypo: prValid - creditedPrFb - creditedPrDoc,
    issueFeatureBug: creditedIssueFb,
    issueDoc: issueValid - creditedIssueFb,
  });

  const points: CategoryCounts = Object.freeze({
    prFeatureBug: counts.prFeatureBug * SCORE_WEIGHTS.prFeatureBug,
    prDoc: counts.prDoc * SCORE_WEIGHTS.prDoc,
    prTypo: counts.prTypo * SCORE_WEIGHTS.prTypo,
    issueFeatureBug: counts.issueFeatureBug * SCORE_WEIGHTS.issueFeatureBug,
    issueDoc: counts.issueDoc * SCORE_WEIGHTS.issueDoc,
  });

  const total = COUNT_FIELDS.reduce((sum, field) => sum + points[field], 0);
  // Every credited count and point value is at most the total
  if (!Number.isSafeInteger(total)) {
    throw new InvalidInputError('total', total);
  }

  return Object.freeze({ counts, points, prValid, issueValid, total });
}

export interface ScoreAllOptions {
  /** Leave out users with invalid counts instead of failing the whole run. */
  skipInvalid?: boolean;
}

export interface ScoreAllResult {
  results: Map<string, ScoredResult>;
  skipped: string[];
}

export function scoreAll(
  rawByUser: ReadonlyMap<string, RawCounts>,
  options: ScoreAllOptions = {}
): ScoreAllResult {
  const logger = getLogger();
  const results = new Map<string, ScoredResult>();
  const skipped: string[] = [];

  for (const [user, raw] of rawByUser) {
    try {
      results.set(user, score(raw));
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;
      const scoped = error.forUser(user);
      if (!options.skipInvalid) throw scoped;
      logger.warn('Skipping user with invalid counts', { user, field: scoped.field, value: scoped.value });
      skipped.push(user);
    }
  }

  return { results, skipped };
}
