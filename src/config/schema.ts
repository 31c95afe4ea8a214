import type { ConfigIssue } from '../errors.js';
import type { LabelMap } from '../github/classifier.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../observability/logger.js';
import { isRecord } from '../utils/guards.js';

export interface ReposcoreConfig {
  logLevel: LogLevel;
  jsonLogs: boolean;
  token: string | undefined;
  excludedUsers: string[];
  minContributions: number;
  semesterStart: string | undefined; // YYYY-MM-DD
  timeZone: string; // IANA zone used to bucket activity into weeks
  skipInvalid: boolean;
  labels: LabelMap;
  displayNames: Record<string, string>;
}

export type PartialConfig = Partial<Omit<ReposcoreConfig, 'labels'>> & {
  labels?: Partial<LabelMap>;
};

export type ValidationError = ConfigIssue;

const LABEL_KEYS: readonly string[] = ['featureBug', 'doc', 'typo'];

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

type KeyValidator = (value: unknown) => string | null;

const validators: Record<keyof ReposcoreConfig, KeyValidator> = {
  logLevel: value => (isLogLevel(value) ? null : `Must be one of: ${LOG_LEVELS.join(', ')}`),

  jsonLogs: value => (typeof value === 'boolean' ? null : 'Must be a boolean'),

  token: value =>
    value === undefined || (typeof value === 'string' && value.trim() !== '')
      ? null
      : 'Must be a non-empty string',

  excludedUsers: value => (isStringArray(value) ? null : 'Must be an array of strings'),

  minContributions: value =>
    typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
      ? null
      : 'Must be a non-negative integer',

  semesterStart: value =>
    value === undefined || (typeof value === 'string' && isCalendarDate(value))
      ? null
      : 'Must be a calendar date in YYYY-MM-DD format',

  timeZone: value =>
    typeof value === 'string' && isTimeZone(value) ? null : 'Must be a valid IANA time zone',

  skipInvalid: value => (typeof value === 'boolean' ? null : 'Must be a boolean'),

  labels: value => {
    if (!isRecord(value)) return 'Must be an object';
    for (const [key, names] of Object.entries(value)) {
      if (!LABEL_KEYS.includes(key)) return `Unknown label category "${key}"`;
      if (!isStringArray(names)) return `${key} must be an array of strings`;
    }
    return null;
  },

  displayNames: value =>
    isRecord(value) && Object.values(value).every(v => typeof v === 'string')
      ? null
      : 'Must be an object mapping user names to display names',
};

function isConfigKey(key: string): key is keyof ReposcoreConfig {
  return Object.prototype.hasOwnProperty.call(validators, key);
}

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  if (!isRecord(config)) {
    return [{ path: 'root', message: 'Config must be an object' }];
  }

  const errors: ValidationError[] = [];
  for (const [key, value] of Object.entries(config)) {
    if (!isConfigKey(key)) {
      errors.push({ path: key, message: 'Unknown configuration key' });
      continue;
    }
    const message = validators[key](value);
    if (message !== null) {
      errors.push({ path: key, message });
    }
  }

  return errors;
}

export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}
