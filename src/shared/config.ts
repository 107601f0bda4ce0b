import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { isLogLevel, type LogLevel } from './logger.js';

export interface Config {
  logLevel: LogLevel;
  dedupeSubscribers: boolean;
}

const DEFAULT_CONFIG: Config = {
  logLevel: 'warn',
  dedupeSubscribers: true,
};

const CONFIG_DIR = '.paneldeck';
const CONFIG_FILE = 'config.json';

export interface ConfigPaths {
  global: string;
  project: string;
}

/** `~/.paneldeck/config.json` and `<cwd>/.paneldeck/config.json`. */
export function configPaths(cwd: string, home: string = homedir()): ConfigPaths {
  return {
    global: join(home, CONFIG_DIR, CONFIG_FILE),
    project: join(cwd, CONFIG_DIR, CONFIG_FILE),
  };
}

export function parseConfig(raw: unknown): Partial<Config> {
  if (typeof raw !== 'object' || raw === null) return {};
  const result: Partial<Config> = {};
  if ('logLevel' in raw && isLogLevel(raw.logLevel)) {
    result.logLevel = raw.logLevel;
  }
  if ('dedupeSubscribers' in raw && typeof raw.dedupeSubscribers === 'boolean') {
    result.dedupeSubscribers = raw.dedupeSubscribers;
  }
  return result;
}

function readJsonFile(filePath: string): Partial<Config> {
  try {
    const content = readFileSync(filePath, 'utf-8');
    return parseConfig(JSON.parse(content));
  } catch {
    return {};
  }
}

export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
  globalPath?: string,
): Config {
  const paths = configPaths(cwd);
  const global = readJsonFile(globalPath ?? paths.global);
  const project = readJsonFile(paths.project);
  const fromEnv = parseConfig({ logLevel: env.PANELDECK_LOG_LEVEL });
  return { ...DEFAULT_CONFIG, ...global, ...project, ...fromEnv };
}
