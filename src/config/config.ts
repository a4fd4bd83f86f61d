/**
 * unlock-watch: Configuration Management
 *
 * Defaults, an optional JSON config file and environment overrides are merged
 * (in that order) and validated against ConfigSchema.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG: Config = {
  telegram: {
    allowedUserIds: [],
  },
  paths: {
    base_dir: '~/.unlock-watch',
    data_file: 'data.json',
    config_file: 'config.json',
  },
  scheduler: {
    tick_seconds: 60,
    probe_concurrency: 4,
    default_interval_minutes: 5,
  },
  probe: {
    timeout_ms: 20_000,
  },
  notifications: {
    time_zone: 'Asia/Ho_Chi_Minh',
    fallback_utc_offset_minutes: 420,
  },
  logging: {
    level: 'info',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Pick<Config, 'paths'>): string {
  return expandPath(config?.paths.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

/** Absolute names are kept; relative ones resolve against the base dir. */
export function getPath(relativePath: string, config?: Pick<Config, 'paths'>): string {
  const expanded = expandPath(relativePath);
  if (path.isAbsolute(expanded)) return expanded;
  return path.join(getBaseDir(config), expanded);
}

export function getDataPath(config?: Pick<Config, 'paths'>): string {
  return getPath(config?.paths.data_file ?? DEFAULT_CONFIG.paths.data_file, config);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.UNLOCK_WATCH_CONFIG
    ? expandPath(env.UNLOCK_WATCH_CONFIG)
    : getPath(DEFAULT_CONFIG.paths.config_file);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config?: Pick<Config, 'paths'>): Result<void, Error> {
  try {
    const dataDir = path.dirname(getDataPath(config));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function parseUserIds(raw: string): number[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number)
    .filter((id) => Number.isInteger(id));
}

/**
 * Environment variables win over the config file.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};
  const telegram: PlainObject = {};
  const paths: PlainObject = {};

  if (env.TELEGRAM_BOT_TOKEN) telegram.botToken = env.TELEGRAM_BOT_TOKEN.trim();
  if (env.TELEGRAM_ALLOWED_USER_IDS) telegram.allowedUserIds = parseUserIds(env.TELEGRAM_ALLOWED_USER_IDS);
  if (env.UNLOCK_WATCH_HOME) paths.base_dir = env.UNLOCK_WATCH_HOME;
  if (env.UNLOCK_WATCH_DATA_FILE) paths.data_file = env.UNLOCK_WATCH_DATA_FILE;

  if (Object.keys(telegram).length > 0) overrides.telegram = telegram;
  if (Object.keys(paths).length > 0) overrides.paths = paths;
  if (env.LOG_LEVEL) overrides.logging = { level: env.LOG_LEVEL };
  if (env.UNLOCK_WATCH_TIMEZONE) overrides.notifications = { time_zone: env.UNLOCK_WATCH_TIMEZONE };

  return overrides;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from file and environment, merged over the defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, Error> {
  const env = options.env ?? process.env;
  try {
    const configPath = expandPath(options.configPath ?? getConfigPath(env));

    let fileConfig: PlainObject = {};
    if (fs.existsSync(configPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      if (!isPlainObject(parsed)) {
        return err(new Error(`Invalid configuration: ${configPath} must contain a JSON object`));
      }
      fileConfig = parsed;
    }

    const merged = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fileConfig), configFromEnv(env));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * The bot token is the only setting without a usable default.
 */
export function requireBotToken(config: Config): Result<string, Error> {
  const token = config.telegram.botToken;
  if (!token) {
    return err(new Error('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.'));
  }
  return ok(token);
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
