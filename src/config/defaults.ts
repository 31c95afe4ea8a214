import { DEFAULT_LABELS } from '../github/classifier.js';
import { ReposcoreConfig } from './schema.js';

export function getDefaultConfig(): ReposcoreConfig {
  return {
    logLevel: 'info',
    jsonLogs: false,
    token: undefined,
    excludedUsers: [],
    minContributions: 0,
    semesterStart: undefined,
    timeZone: 'Asia/Seoul',
    skipInvalid: false,
    labels: {
      featureBug: [...DEFAULT_LABELS.featureBug],
      doc: [...DEFAULT_LABELS.doc],
      typo: [...DEFAULT_LABELS.typo],
    },
    displayNames: {},
  };
}
