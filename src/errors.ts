export type ReposcoreErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_CONFIG'
  | 'USAGE'
  | 'GITHUB_API'
  | 'MALFORMED_ITEM';

export class ReposcoreError extends Error {
  readonly code: ReposcoreErrorCode;

  constructor(code: ReposcoreErrorCode, message: string) {
    super(message);
    this.name = 'ReposcoreError';
    this.code = code;
  }
}

/**
 * A raw count that is negative, fractional or beyond the safe integer range.
 * `user` is filled in when the failure happens inside a batch run.
 */
export class InvalidInputError extends ReposcoreError {
  readonly field: string;
  readonly value: unknown;
  readonly user: string | undefined;

  constructor(field: string, value: unknown, user?: string) {
    const subject = user === undefined ? field : `${user}.${field}`;
    super('INVALID_INPUT', `${subject} must be a non-negative integer (got ${String(value)})`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.value = value;
    this.user = user;
  }

  forUser(user: string): InvalidInputError {
    return new InvalidInputError(this.field, this.value, user);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends ReposcoreError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[], source?: string) {
    const where = source ? ` in ${source}` : '';
    super(
      'INVALID_CONFIG',
      `Invalid configuration${where}: ${issues.map(i => `${i.path}: ${i.message}`).join(', ')}`
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class UsageError extends ReposcoreError {
  constructor(message: string) {
    super('USAGE', message);
    this.name = 'UsageError';
  }
}

export class GitHubApiError extends ReposcoreError {
  readonly status: number;
  readonly repository: string;

  constructor(status: number, repository: string, message: string) {
    super('GITHUB_API', message);
    this.name = 'GitHubApiError';
    this.status = status;
    this.repository = repository;
  }
}

export class CollectionError extends ReposcoreError {
  constructor(message: string) {
    super('MALFORMED_ITEM', message);
    this.name = 'CollectionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
