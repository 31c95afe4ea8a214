// As reported by the API: 'completed', 'reopened', 'not_planned', 'duplicate', or null while open.
export type StateReason = string | null;

/** One entry of a repository's issue list; pull requests appear here too. */
export interface IssueItem {
  number: number;
  author: string;
  labels: string[];
  createdAt: string;
  isPullRequest: boolean;
  mergedAt: string | null;
  stateReason: StateReason;
}

export interface RepoSlug {
  owner: string;
  repo: string;
}

export function formatSlug(slug: RepoSlug): string {
  return `${slug.owner}/${slug.repo}`;
}
