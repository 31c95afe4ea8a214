export type PullRequestCategory = 'featureBug' | 'doc' | 'typo';
export type IssueCategory = 'featureBug' | 'doc';

export interface Classifier {
  classifyPullRequest(labels: readonly string[]): PullRequestCategory | null;
  classifyIssue(labels: readonly string[]): IssueCategory | null;
}

export interface LabelMap {
  featureBug: string[];
  doc: string[];
  typo: string[];
}

export const DEFAULT_LABELS: Readonly<LabelMap> = Object.freeze({
  featureBug: ['enhancement', 'bug'],
  doc: ['documentation'],
  typo: ['typo'],
});

/**
 * Classifies an item by its first label only. Items whose first label is not
 * mapped are not credited, even if a later label is.
 */
export class FirstLabelClassifier implements Classifier {
  private readonly labels: LabelMap;

  constructor(labels: Partial<LabelMap> = {}) {
    this.labels = { ...DEFAULT_LABELS, ...labels };
  }

  classifyPullRequest(labels: readonly string[]): PullRequestCategory | null {
    const first = labels[0];
    if (first === undefined) return null;
    if (this.labels.featureBug.includes(first)) return 'featureBug';
    if (this.labels.doc.includes(first)) return 'doc';
    if (this.labels.typo.includes(first)) return 'typo';
    return null;
  }

  // Typo is PR-only; a typo issue is not credited.
  classifyIssue(labels: readonly string[]): IssueCategory | null {
    const first = labels[0];
    if (first === undefined) return null;
    if (this.labels.featureBug.includes(first)) return 'featureBug';
    if (this.labels.doc.includes(first)) return 'doc';
    return null;
  }
}
