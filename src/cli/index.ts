#!/usr/bin/env node

/**
 * Unlock Watch: Command Line Interface
 *
 * `start` runs the bot and the scheduler until SIGINT/SIGTERM, `sweep` runs a
 * single forced sweep, `status` prints the persisted subscriptions.
 *
 * @module cli
 */

import { Command } from 'commander';
import { createWatcherApp } from '../app.js';
import { ensureDirectories, getDataPath, loadConfig } from '../config/config.js';
import type { Config } from '../types/index.js';
import { setLogLevel } from '../utils/logger.js';
import { SubscriptionStore } from '../watcher/subscription-store.js';
import { formatStatus } from './status.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('unlock-watch')
  .description('Watch accounts for lock → unlock transitions and notify Telegram chats')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to config.json');

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

function resolveConfig(): Config {
  const { config } = program.opts<{ config?: string }>();
  const result = loadConfig(config ? { configPath: config } : {});
  if (!result.success) fail(result.error.message);

  const dirs = ensureDirectories(result.data);
  if (!dirs.success) fail(dirs.error.message);

  setLogLevel(result.data.logging.level);
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('start')
  .description('Run the Telegram bot and the periodic sweep')
  .action(async () => {
    const created = createWatcherApp(resolveConfig());
    if (!created.success) fail(created.error.message);
    const app = created.data;

    try {
      await app.start();
      process.stdout.write('Unlock watch running. Press Ctrl+C to stop\n');
    } catch (error) {
      fail(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    }

    const shutdown = async (signal: string) => {
      process.stdout.write(`\nShutting down (${signal})...\n`);
      await app.stop(signal);
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  });

program
  .command('sweep')
  .description('Probe every subscriber now and send due notifications')
  .action(async () => {
    const created = createWatcherApp(resolveConfig());
    if (!created.success) fail(created.error.message);

    const report = await created.data.scheduler.runSweep({ force: true });
    if (report.skipped === 'not-configured') {
      process.stdout.write('Endpoint not configured; nothing probed\n');
      return;
    }

    process.stdout.write(
      `Probed ${report.probed} account(s), sent ${report.notified} notification(s), ${report.failures} failure(s)\n`,
    );
    if (report.failures > 0) process.exitCode = 1;
  });

program
  .command('status')
  .description('Show subscriptions and endpoint configuration')
  .action(async () => {
    const config = resolveConfig();
    const dataPath = getDataPath(config);
    const state = await new SubscriptionStore({ filePath: dataPath }).load();
    process.stdout.write(formatStatus(state, dataPath));
  });

await program.parseAsync(process.argv);
