import type { PartialConfig } from '../config/schema.js';
import { UsageError } from '../errors.js';
import { isLogLevel } from '../observability/logger.js';
import type { FlagValue } from './parser.js';

type Flags = Record<string, FlagValue>;

export const BOOLEAN_FLAGS = ['help', 'h', 'version', 'v', 'json-logs', 'skip-invalid', 'dry-run'];

export function stringFlag(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (value === true || value === false) {
    throw new UsageError(`--${name} requires a value`);
  }
  if (Array.isArray(value)) {
    // Last one wins for single-valued flags
    return value[value.length - 1];
  }
  return value;
}

// Accepts repeated flags and comma-separated values alike
export function listFlag(flags: Flags, name: string): string[] | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') {
    throw new UsageError(`--${name} requires a value`);
  }
  const values = Array.isArray(value) ? value : [value];
  return values
    .flatMap(v => v.split(','))
    .map(v => v.trim())
    .filter(Boolean);
}

export function booleanFlag(flags: Flags, name: string): boolean | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (value === true || value === 'true') return true;
  if (value === false || value === 'false') return false;
  throw new UsageError(`--${name} does not take a value`);
}

export function integerFlag(flags: Flags, name: string): number | undefined {
  const raw = stringFlag(flags, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`--${name} must be a non-negative integer (got ${raw})`);
  }
  return parseInt(raw, 10);
}

/** Configuration overrides given on the command line. */
export function configFromFlags(flags: Flags): PartialConfig {
  const config: PartialConfig = {};

  const logLevel = stringFlag(flags, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new UsageError(`--log-level must be one of debug, info, warn, error, silent (got ${logLevel})`);
    }
    config.logLevel = logLevel;
  }

  const jsonLogs = booleanFlag(flags, 'json-logs');
  if (jsonLogs !== undefined) config.jsonLogs = jsonLogs;

  const token = stringFlag(flags, 'token');
  if (token !== undefined) config.token = token;

  const excluded = listFlag(flags, 'exclude');
  if (excluded !== undefined) config.excludedUsers = excluded;

  const minContributions = integerFlag(flags, 'min-contributions');
  if (minContributions !== undefined) config.minContributions = minContributions;

  const semesterStart = stringFlag(flags, 'semester-start');
  if (semesterStart !== undefined) config.semesterStart = semesterStart;

  const timeZone = stringFlag(flags, 'time-zone');
  if (timeZone !== undefined) config.timeZone = timeZone;

  const skipInvalid = booleanFlag(flags, 'skip-invalid');
  if (skipInvalid !== undefined) config.skipInvalid = skipInvalid;

  return config;
}
