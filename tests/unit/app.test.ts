import { describe, it, expect, afterEach } from 'vitest';
import { createWatcherApp } from '../../src/app.js';
import { DEFAULT_CONFIG } from '../../src/config/config.js';
import type { Config } from '../../src/types/index.js';

function configWith(overrides: Partial<Config['telegram']>): Config {
  return {
    ...DEFAULT_CONFIG,
    paths: { ...DEFAULT_CONFIG.paths, base_dir: '/tmp/unlock-watch-app-test' },
    telegram: { ...DEFAULT_CONFIG.telegram, ...overrides },
  };
}

describe('createWatcherApp', () => {
  const stops: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const stop of stops.splice(0)) await stop();
  });

  it('fails without a bot token', () => {
    const result = createWatcherApp(configWith({}));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.');
  });

  it('wires the store to the configured data path', () => {
    const result = createWatcherApp(configWith({ botToken: 'test-token' }));

    expect(result.success).toBe(true);
    if (!result.success) return;
    stops.push(() => result.data.stop());

    expect(result.data.store.filePath).toBe('/tmp/unlock-watch-app-test/data.json');
    expect(result.data.scheduler.isStarted()).toBe(false);
  });
});
