export const VERSION = '0.1.0';

export { score, scoreAll, SCORE_WEIGHTS } from './scoring/calculator.js';
export type { ScoreAllOptions, ScoreAllResult } from './scoring/calculator.js';
export { rankResults, calculateAverages } from './scoring/ranking.js';
export type { RankOptions } from './scoring/ranking.js';
export { gradeFor } from './scoring/grade.js';
export { parseRawCounts } from './scoring/input.js';
export { COUNT_FIELDS } from './scoring/types.js';
export type {
  Averages,
  CategoryCounts,
  CountField,
  RankedEntry,
  RawCounts,
  ScoredResult,
} from './scoring/types.js';

export { FirstLabelClassifier, DEFAULT_LABELS } from './github/classifier.js';
export type { Classifier, IssueCategory, LabelMap, PullRequestCategory } from './github/classifier.js';
export { collectActivity } from './github/collector.js';
export type { Collection, CollectOptions, WeeklyActivity } from './github/collector.js';
export { GitHubClient, OctokitTransport, parseRepoSlug } from './github/client.js';
export type { ApiIssue, GitHubTransport } from './github/client.js';
export type { IssueItem, RepoSlug } from './github/types.js';

export { buildScoreReport, scoreRepository } from './pipeline.js';
export type { RepositoryReport, ScoreReport } from './pipeline.js';

export { loadConfig } from './config/loader.js';
export { validateConfig } from './config/schema.js';
export type { ReposcoreConfig, PartialConfig } from './config/schema.js';

export {
  ReposcoreError,
  InvalidInputError,
  ConfigError,
  UsageError,
  GitHubApiError,
  CollectionError,
} from './errors.js';
