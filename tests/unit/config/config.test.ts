import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  expandPath,
  getDataPath,
  loadConfig,
  requireBotToken,
} from '../../../src/config/config.js';

describe('config', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unlock-watch-config-'));
    configPath = join(dir, 'config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('expandPath', () => {
    it('expands the home directory', () => {
      expect(expandPath('~/data.json')).toBe(join(homedir(), 'data.json'));
      expect(expandPath('~')).toBe(homedir());
      expect(expandPath('/var/lib/data.json')).toBe('/var/lib/data.json');
    });
  });

  describe('getDataPath', () => {
    it('resolves relative names against the base dir', () => {
      const config = { paths: { ...DEFAULT_CONFIG.paths, base_dir: '/srv/watch' } };
      expect(getDataPath(config)).toBe('/srv/watch/data.json');
    });

    it('keeps absolute data paths', () => {
      const config = { paths: { ...DEFAULT_CONFIG.paths, data_file: '/tmp/elsewhere.json' } };
      expect(getDataPath(config)).toBe('/tmp/elsewhere.json');
    });
  });

  describe('configFromEnv', () => {
    it('maps environment variables to config sections', () => {
      expect(
        configFromEnv({
          TELEGRAM_BOT_TOKEN: ' test-token ',
          TELEGRAM_ALLOWED_USER_IDS: '123, 456,abc',
          UNLOCK_WATCH_HOME: '/srv/watch',
          LOG_LEVEL: 'debug',
          UNLOCK_WATCH_TIMEZONE: 'UTC',
        }),
      ).toEqual({
        telegram: { botToken: 'test-token', allowedUserIds: [123, 456] },
        paths: { base_dir: '/srv/watch' },
        logging: { level: 'debug' },
        notifications: { time_zone: 'UTC' },
      });
    });

    it('returns nothing for an empty environment', () => {
      expect(configFromEnv({})).toEqual({});
    });
  });

  describe('loadConfig', () => {
    it('returns defaults when no file exists', () => {
      const result = loadConfig({ configPath, env: {} });
      expect(result).toEqual({ success: true, data: DEFAULT_CONFIG });
    });

    it('merges the file over defaults and the environment over the file', () => {
      writeFileSync(
        configPath,
        JSON.stringify({ scheduler: { tick_seconds: 30 }, logging: { level: 'warn' } }),
      );

      const result = loadConfig({ configPath, env: { LOG_LEVEL: 'error' } });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.scheduler).toEqual({ tick_seconds: 30, probe_concurrency: 4, default_interval_minutes: 5 });
      expect(result.data.logging.level).toBe('error');
    });

    it('fails on invalid values', () => {
      writeFileSync(configPath, JSON.stringify({ scheduler: { probe_concurrency: 0 } }));
      const result = loadConfig({ configPath, env: {} });
      expect(result.success).toBe(false);
    });

    it('fails when the file is not an object', () => {
      writeFileSync(configPath, '[]');
      const result = loadConfig({ configPath, env: {} });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe(`Invalid configuration: ${configPath} must contain a JSON object`);
    });
  });

  describe('requireBotToken', () => {
    it('fails without a token', () => {
      const result = requireBotToken(DEFAULT_CONFIG);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.');
    });

    it('returns the configured token', () => {
      const config = { ...DEFAULT_CONFIG, telegram: { allowedUserIds: [], botToken: 'test-token' } };
      expect(requireBotToken(config)).toEqual({ success: true, data: 'test-token' });
    });
  });
});
