import type { ReposcoreConfig } from './config/schema.js';
import { FirstLabelClassifier, type Classifier } from './github/classifier.js';
import type { GitHubClient } from './github/client.js';
import { collectActivity, type WeeklyActivity } from './github/collector.js';
import { formatSlug, type RepoSlug } from './github/types.js';
import { getLogger } from './observability/logger.js';
import { scoreAll } from './scoring/calculator.js';
import { calculateAverages, rankResults } from './scoring/ranking.js';
import type { Averages, RankedEntry, RawCounts } from './scoring/types.js';

export interface ScoreReport {
  participants: RankedEntry[];
  averages: Averages;
  skipped: string[];
}

export interface RepositoryReport extends ScoreReport {
  repository: string;
  latestCreatedAt: string | null;
  weeklyActivity?: Record<string, WeeklyActivity>;
}

type ScoringConfig = Pick<ReposcoreConfig, 'minContributions' | 'displayNames' | 'skipInvalid'>;

/** Score, rank and average a set of raw counts. */
export function buildScoreReport(
  rawByUser: ReadonlyMap<string, RawCounts>,
  config: ScoringConfig
): ScoreReport {
  const { results, skipped } = scoreAll(rawByUser, { skipInvalid: config.skipInvalid });
  const participants = rankResults(results, {
    minContributions: config.minContributions,
    displayNames: config.displayNames,
  });
  return { participants, averages: calculateAverages(participants), skipped };
}

export interface ScoreRepositoryOptions {
  classifier?: Classifier;
  dryRun?: boolean;
}

export async function scoreRepository(
  client: GitHubClient,
  slug: RepoSlug,
  config: ReposcoreConfig,
  options: ScoreRepositoryOptions = {}
): Promise<RepositoryReport> {
  const repository = formatSlug(slug);
  const logger = getLogger().child({ repository });

  if (options.dryRun) {
    logger.info('Dry run: skipping GitHub requests');
    return {
      repository,
      latestCreatedAt: null,
      ...buildScoreReport(new Map(), config),
    };
  }

  await client.assertRepositoryExists(slug);
  const items = await client.fetchIssueItems(slug);
  logger.info('Fetched issues and pull requests', { items: items.length });

  const collection = collectActivity(items, {
    classifier: options.classifier ?? new FirstLabelClassifier(config.labels),
    excludedUsers: config.excludedUsers,
    semesterStart: config.semesterStart,
    timeZone: config.timeZone,
  });

  const report: RepositoryReport = {
    repository,
    latestCreatedAt: collection.latestCreatedAt,
    ...buildScoreReport(collection.participants, config),
  };

  if (collection.weeklyActivity) {
    report.weeklyActivity = Object.fromEntries(
      [...collection.weeklyActivity.entries()]
        .sort(([a], [b]) => a - b)
        .map(([week, activity]) => [String(week), activity])
    );
  }

  logger.info('Scored participants', {
    participants: report.participants.length,
    skipped: report.skipped.length,
  });

  return report;
}
