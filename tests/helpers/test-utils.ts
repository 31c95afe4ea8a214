import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Output } from '../../src/cli/output.js';
import type { ApiIssue, GitHubTransport } from '../../src/github/client.js';
import type { IssueItem } from '../../src/github/types.js';
import type { RawCounts } from '../../src/scoring/types.js';

export class TempDir {
  public readonly dir: string;

  private constructor(dir: string) {
    this.dir = dir;
  }

  static create(prefix = 'reposcore-test-'): TempDir {
    return new TempDir(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  }

  writeFile(filename: string, content: string): string {
    const filepath = path.join(this.dir, filename);
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    fs.writeFileSync(filepath, content, 'utf-8');
    return filepath;
  }

  writeJson(filename: string, data: unknown): string {
    return this.writeFile(filename, JSON.stringify(data, null, 2));
  }

  destroy(): void {
    if (fs.existsSync(this.dir)) {
      fs.rmSync(this.dir, { recursive: true, force: true });
    }
  }
}

export interface CapturedOutput {
  output: Output;
  stdout: string[];
  stderr: string[];
  json<T = unknown>(): T;
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const output = new Output({
    color: false,
    stdout: text => stdout.push(text),
    stderr: text => stderr.push(text),
  });
  return {
    output,
    stdout,
    stderr,
    json: <T>(): T => JSON.parse(stdout.join('')),
  };
}

export function counts(
  prFeatureBug: number,
  prDoc: number,
  prTypo: number,
  issueFeatureBug: number,
  issueDoc: number
): RawCounts {
  return { prFeatureBug, prDoc, prTypo, issueFeatureBug, issueDoc };
}

let nextNumber = 1;

export function pullRequest(author: string, labels: string[], overrides: Partial<IssueItem> = {}): IssueItem {
  return {
    number: nextNumber++,
    author,
    labels,
    createdAt: '2024-03-04T01:00:00Z',
    isPullRequest: true,
    mergedAt: '2024-03-05T01:00:00Z',
    stateReason: null,
    ...overrides,
  };
}

export function issue(author: string, labels: string[], overrides: Partial<IssueItem> = {}): IssueItem {
  return {
    number: nextNumber++,
    author,
    labels,
    createdAt: '2024-03-04T01:00:00Z',
    isPullRequest: false,
    mergedAt: null,
    stateReason: null,
    ...overrides,
  };
}

export class FakeTransport implements GitHubTransport {
  public readonly calls: string[] = [];

  constructor(
    private readonly issues: Record<string, ApiIssue[]>,
    private readonly failures: Record<string, number> = {}
  ) {}

  async getRepository(owner: string, repo: string): Promise<void> {
    const slug = `${owner}/${repo}`;
    this.calls.push(`get ${slug}`);
    const status = this.failures[slug] ?? (this.issues[slug] ? undefined : 404);
    if (status !== undefined) {
      throw Object.assign(new Error(`HTTP ${status}`), { status });
    }
  }

  async listIssues(owner: string, repo: string): Promise<ApiIssue[]> {
    const slug = `${owner}/${repo}`;
    this.calls.push(`list ${slug}`);
    return this.issues[slug] ?? [];
  }
}
