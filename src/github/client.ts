import { Octokit } from '@octokit/rest';
import { GitHubApiError, UsageError } from '../errors.js';
import { getLogger, type Log } from '../observability/logger.js';
import { formatSlug, type IssueItem, type RepoSlug } from './types.js';

/** The subset of a GitHub issue-list entry that scoring reads. */
export interface ApiIssue {
  number: number;
  created_at: string;
  user?: { login: string } | null;
  labels?: Array<string | { name?: string | null }>;
  pull_request?: { merged_at?: string | null } | null;
  state_reason?: string | null;
}

export interface GitHubTransport {
  getRepository(owner: string, repo: string): Promise<void>;
  listIssues(owner: string, repo: string): Promise<ApiIssue[]>;
}

export interface OctokitTransportOptions {
  token?: string | undefined;
  logger?: Log;
  /** Replaces the global fetch used for every request. */
  fetch?: typeof fetch;
}

export class OctokitTransport implements GitHubTransport {
  private readonly octokit: Octokit;

  constructor(options: OctokitTransportOptions = {}) {
    const log = options.logger ?? getLogger().child({ component: 'octokit' });
    this.octokit = new Octokit({
      auth: options.token,
      userAgent: 'reposcore',
      request: { fetch: options.fetch },
      log: {
        debug: (message: string) => log.debug(message),
        info: (message: string) => log.debug(message),
        warn: (message: string) => log.warn(message),
        error: (message: string) => log.error(message),
      },
    });
  }

  async getRepository(owner: string, repo: string): Promise<void> {
    await this.octokit.rest.repos.get({ owner, repo });
  }

  async listIssues(owner: string, repo: string): Promise<ApiIssue[]> {
    return this.octokit.paginate(this.octokit.rest.issues.listForRepo, {
      owner,
      repo,
      state: 'all',
      per_page: 100,
    });
  }
}

const STATUS_MESSAGES: Record<number, string> = {
  401: 'Authentication failed: the GitHub token is invalid',
  403: 'Request forbidden (403): the GitHub API rate limit may have been reached; unauthenticated requests are limited to 60 per hour, pass a token with --token or GITHUB_TOKEN',
  404: 'Repository not found (404)',
  422: 'Unprocessable request (422): validation failed or the endpoint has been spammed',
  500: 'GitHub internal server error (500)',
  503: 'GitHub service unavailable (503)',
};

export function messageForStatus(status: number): string {
  return STATUS_MESSAGES[status] ?? `GitHub API request failed with status ${status}`;
}

interface HttpStatusError {
  status: number;
}

function hasHttpStatus(err: unknown): err is HttpStatusError {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

const SLUG_PATTERN = /^([A-Za-z0-9-]+)\/([A-Za-z0-9._-]+)$/;
const URL_PATTERN = /^https?:\/\/(?:www\.)?github\.com\/([A-Za-z0-9-]+)\/([A-Za-z0-9._-]+?)(?:\.git)?\/?$/;

/** Accepts `owner/repo` or a github.com repository URL. */
export function parseRepoSlug(input: string): RepoSlug {
  const trimmed = input.trim();
  const match = SLUG_PATTERN.exec(trimmed) ?? URL_PATTERN.exec(trimmed);
  const owner = match?.[1];
  const repo = match?.[2];
  if (!owner || !repo) {
    throw new UsageError(`Invalid repository "${input}": expected owner/repo or a github.com URL`);
  }
  return { owner, repo };
}

export class GitHubClient {
  constructor(private readonly transport: GitHubTransport) {}

  async assertRepositoryExists(slug: RepoSlug): Promise<void> {
    await this.call(slug, () => this.transport.getRepository(slug.owner, slug.repo));
  }

  async fetchIssueItems(slug: RepoSlug): Promise<IssueItem[]> {
    const logger = getLogger();
    const done = logger.time(`Listing issues of ${formatSlug(slug)}`);
    const raw = await this.call(slug, () => this.transport.listIssues(slug.owner, slug.repo));
    done();
    logger.debug('Fetched issue list', { repository: formatSlug(slug), items: raw.length });
    return raw.map(toIssueItem);
  }

  private async call<T>(slug: RepoSlug, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (hasHttpStatus(error)) {
        throw new GitHubApiError(error.status, formatSlug(slug), messageForStatus(error.status));
      }
      throw error;
    }
  }
}

export function toIssueItem(issue: ApiIssue): IssueItem {
  const labels: string[] = [];
  for (const label of issue.labels ?? []) {
    const name = typeof label === 'string' ? label : label.name;
    if (name) labels.push(name);
  }

  const pullRequest = issue.pull_request ?? null;
  return {
    number: issue.number,
    author: issue.user?.login ?? 'Unknown',
    labels,
    createdAt: issue.created_at,
    isPullRequest: pullRequest !== null,
    mergedAt: pullRequest?.merged_at ?? null,
    stateReason: issue.state_reason ?? null,
  };
}
