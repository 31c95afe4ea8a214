import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError, errorMessage } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { getConfigRoot } from '../utils/paths.js';
import { getDefaultConfig } from './defaults.js';
import { isRecord } from '../utils/guards.js';
import { PartialConfig, ReposcoreConfig, isValidConfig, validateConfig } from './schema.js';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig;
  configPath?: string | undefined;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const CONFIG_CANDIDATES = [
  'reposcore.config.js',
  'reposcore.config.mjs',
  '.reposcorerc',
  '.reposcorerc.json',
];

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ReposcoreConfig> {
  const env = options.env ?? process.env;
  const fileConfig = await loadFileConfig(options.configPath, options.cwd ?? process.cwd(), env);
  const envConfig = loadEnvConfig(env);
  const cliConfig = checked(options.cliFlags ?? {}, 'command-line flags');

  const merged = [fileConfig, envConfig, cliConfig].reduce<ReposcoreConfig>(mergeConfig, getDefaultConfig());

  const errors = validateConfig(merged);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return merged;
}

export function mergeConfig(base: ReposcoreConfig, override: PartialConfig): ReposcoreConfig {
  const { labels, ...rest } = override;
  return {
    ...base,
    ...rest,
    labels: { ...base.labels, ...labels },
  };
}

function checked(value: unknown, source: string): PartialConfig {
  if (!isValidConfig(value)) {
    throw new ConfigError(validateConfig(value), source);
  }
  return value;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const config: Record<string, unknown> = {};

  if (env['REPOSCORE_LOG_LEVEL']) {
    config['logLevel'] = env['REPOSCORE_LOG_LEVEL'];
  }
  if (env['REPOSCORE_JSON_LOGS']) {
    config['jsonLogs'] = env['REPOSCORE_JSON_LOGS'] === 'true';
  }
  const token = env['REPOSCORE_TOKEN'] || env['GITHUB_TOKEN'];
  if (token) {
    config['token'] = token;
  }
  if (env['REPOSCORE_EXCLUDED_USERS']) {
    config['excludedUsers'] = env['REPOSCORE_EXCLUDED_USERS']
      .split(',')
      .map(user => user.trim())
      .filter(Boolean);
  }
  if (env['REPOSCORE_MIN_CONTRIBUTIONS']) {
    config['minContributions'] = Number(env['REPOSCORE_MIN_CONTRIBUTIONS']);
  }
  if (env['REPOSCORE_SEMESTER_START']) {
    config['semesterStart'] = env['REPOSCORE_SEMESTER_START'];
  }
  if (env['REPOSCORE_TIME_ZONE']) {
    config['timeZone'] = env['REPOSCORE_TIME_ZONE'];
  }

  return checked(config, 'environment');
}

// Search: reposcore.config.{js,mjs}, .reposcorerc, .reposcorerc.json, package.json#reposcore,
// then config.json in the user config directory
async function loadFileConfig(
  configPath: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv
): Promise<PartialConfig> {
  const logger = getLogger();

  if (configPath) {
    const resolved = path.resolve(cwd, configPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError([{ path: 'config', message: `File not found: ${resolved}` }]);
    }
    return loadConfigFile(resolved);
  }

  for (const candidate of CONFIG_CANDIDATES) {
    const fullPath = path.join(cwd, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  const pkgPath = path.join(cwd, 'package.json');
  if (fs.existsSync(pkgPath)) {
    let pkg: unknown;
    try {
      pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    } catch (error) {
      logger.debug('Ignoring unreadable package.json', { path: pkgPath, error: errorMessage(error) });
    }
    if (isRecord(pkg) && pkg['reposcore'] !== undefined) {
      logger.debug('Using config from package.json', { path: pkgPath });
      return checked(pkg['reposcore'], `${pkgPath}#reposcore`);
    }
  }

  const globalPath = path.join(getConfigRoot(env), 'config.json');
  if (fs.existsSync(globalPath)) {
    return loadConfigFile(globalPath);
  }

  return {};
}

async function loadConfigFile(filePath: string): Promise<PartialConfig> {
  const ext = path.extname(filePath);
  getLogger().debug('Loading config file', { path: filePath });

  if (ext === '.js' || ext === '.mjs') {
    // ESM import needs a file URL on every platform
    const fileUrl = pathToFileURL(path.resolve(filePath)).href;
    const module: unknown = await import(fileUrl);
    const exported = isRecord(module) && 'default' in module ? module['default'] : module;
    return checked(exported, filePath);
  }

  // JSON or .reposcorerc (treated as JSON)
  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError([{ path: 'root', message: `Unreadable JSON: ${errorMessage(error)}` }], filePath);
  }
  return checked(content, filePath);
}
