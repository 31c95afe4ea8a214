import { CollectionError } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { CountField, RawCounts, emptyCounts } from '../scoring/types.js';
import type { Classifier, IssueCategory, PullRequestCategory } from './classifier.js';
import type { IssueItem, StateReason } from './types.js';

export interface WeeklyActivity {
  pr: number;
  issue: number;
}

export interface CollectOptions {
  classifier: Classifier;
  excludedUsers?: readonly string[];
  /** Calendar date (YYYY-MM-DD) of week 1; enables weekly activity. */
  semesterStart?: string | undefined;
  timeZone?: string;
}

export interface Collection {
  participants: Map<string, RawCounts>;
  weeklyActivity: Map<number, WeeklyActivity> | null;
  latestCreatedAt: string | null;
}

const COUNTED_STATE_REASONS: readonly StateReason[] = ['completed', 'reopened', null];

const PR_FIELDS: Record<PullRequestCategory, CountField> = {
  featureBug: 'prFeatureBug',
  doc: 'prDoc',
  typo: 'prTypo',
};

const ISSUE_FIELDS: Record<IssueCategory, CountField> = {
  featureBug: 'issueFeatureBug',
  doc: 'issueDoc',
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Turn a repository's issue list into raw counts per author.
 * Only merged PRs and open, reopened or completed issues are credited.
 */
export function collectActivity(items: readonly IssueItem[], options: CollectOptions): Collection {
  const logger = getLogger();
  const timeZone = options.timeZone ?? 'UTC';
  const startDay = options.semesterStart ? dayNumber(options.semesterStart) : null;

  const counts = new Map<string, Record<CountField, number>>();
  const weekly = startDay === null ? null : new Map<number, WeeklyActivity>();
  let latest: { iso: string; ms: number } | null = null;

  for (const item of items) {
    if (!item.createdAt) {
      throw new CollectionError(`Item #${item.number} has no creation time`);
    }
    const createdMs = Date.parse(item.createdAt);
    if (Number.isNaN(createdMs)) {
      throw new CollectionError(`Item #${item.number} has an invalid creation time: ${item.createdAt}`);
    }
    if (latest === null || createdMs > latest.ms) {
      latest = { iso: item.createdAt, ms: createdMs };
    }

    const merged = item.isPullRequest && item.mergedAt !== null;
    const countedIssue = !item.isPullRequest && COUNTED_STATE_REASONS.includes(item.stateReason);

    if (weekly && startDay !== null && (merged || countedIssue)) {
      const week = Math.floor((dayNumber(calendarDate(item.createdAt, timeZone)) - startDay) / 7) + 1;
      const activity = weekly.get(week) ?? { pr: 0, issue: 0 };
      if (merged) activity.pr++;
      else activity.issue++;
      weekly.set(week, activity);
    }

    let userCounts = counts.get(item.author);
    if (!userCounts) {
      userCounts = emptyCounts();
      counts.set(item.author, userCounts);
    }

    if (merged) {
      const category = options.classifier.classifyPullRequest(item.labels);
      if (category) userCounts[PR_FIELDS[category]]++;
    } else if (countedIssue) {
      const category = options.classifier.classifyIssue(item.labels);
      if (category) userCounts[ISSUE_FIELDS[category]]++;
    }
  }

  const excluded = new Set(options.excludedUsers ?? []);
  const participants = new Map<string, RawCounts>();
  for (const [user, userCounts] of counts) {
    if (excluded.has(user)) continue;
    participants.set(user, Object.freeze({ ...userCounts }));
  }

  if (participants.size === 0) {
    logger.warn('No participants found');
  } else {
    logger.debug('Collected participants', { participants: participants.size, items: items.length });
  }

  return {
    participants,
    weeklyActivity: weekly,
    latestCreatedAt: latest?.iso ?? null,
  };
}

/** Calendar date (YYYY-MM-DD) of an instant as seen in `timeZone`. */
export function calendarDate(iso: string, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(new Date(iso));

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

function dayNumber(date: string): number {
  const [year, month, day] = date.split('-').map(p => parseInt(p, 10));
  if (year === undefined || month === undefined || day === undefined) {
    throw new CollectionError(`Invalid calendar date: ${date}`);
  }
  return Math.floor(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}
