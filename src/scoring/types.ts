export type CountField = 'prFeatureBug' | 'prDoc' | 'prTypo' | 'issueFeatureBug' | 'issueDoc';

export const COUNT_FIELDS: readonly CountField[] = [
  'prFeatureBug',
  'prDoc',
  'prTypo',
  'issueFeatureBug',
  'issueDoc',
];

// Merged PRs by category, then open/resolved issues by category.
export type RawCounts = Readonly<Record<CountField, number>>;

export type CategoryCounts = Readonly<Record<CountField, number>>;

export interface ScoredResult {
  /** Counts actually credited after the PR and issue budgets are applied. */
  readonly counts: CategoryCounts;
  /** `counts` multiplied by the per-category weight. */
  readonly points: CategoryCounts;
  readonly prValid: number;
  readonly issueValid: number;
  readonly total: number;
}

export interface RankedEntry {
  user: string;
  displayName: string;
  rank: number;
  grade: string;
  /** Share of the summed total over all scored users, in percent, one decimal. */
  rate: number;
  counts: CategoryCounts;
  points: CategoryCounts;
  total: number;
}

export interface Averages {
  points: Record<CountField, number>;
  total: number;
  rate: number;
}

export function emptyCounts(): Record<CountField, number> {
  return { prFeatureBug: 0, prDoc: 0, prTypo: 0, issueFeatureBug: 0, issueDoc: 0 };
}
