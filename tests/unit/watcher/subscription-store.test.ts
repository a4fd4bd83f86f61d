import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { SubscriptionStore, emptyStoreState } from '../../../src/watcher/subscription-store.js';

describe('SubscriptionStore', () => {
  let dir: string;
  let filePath: string;
  let eventBus: EventBus;
  let store: SubscriptionStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unlock-watch-store-'));
    filePath = join(dir, 'data.json');
    eventBus = new EventBus();
    store = new SubscriptionStore({ filePath, eventBus });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns an empty store when the file does not exist', async () => {
      const resets: unknown[] = [];
      eventBus.on('store:reset', (e) => resets.push(e));

      expect(await store.load()).toEqual(emptyStoreState());
      expect(resets).toHaveLength(0);
    });

    it('treats a corrupt file as empty and reports it', async () => {
      writeFileSync(filePath, '{not json');
      const resets: Array<{ path: string; reason: string }> = [];
      eventBus.on('store:reset', (e) => resets.push(e));

      expect(await store.load()).toEqual(emptyStoreState());
      expect(resets).toHaveLength(1);
      expect(resets[0]?.path).toBe(filePath);
      expect(resets[0]?.reason.startsWith('invalid JSON')).toBe(true);
    });

    it('treats a file with the wrong shape as empty', async () => {
      writeFileSync(filePath, JSON.stringify({ subscribers: { '1001': { accounts: 'gamer123' } } }));
      expect(await store.load()).toEqual(emptyStoreState());
    });

    it('fills in defaults for missing fields', async () => {
      writeFileSync(filePath, JSON.stringify({ subscribers: { '1001': {} } }));

      const state = await store.load();

      expect(state.subscribers['1001']).toEqual({ accounts: [], intervalMinutes: 5 });
      expect(state.endpoint).toEqual({ url: '', token: '' });
      expect(state.includeRaw).toBe(false);
    });

    it('migrates the legacy file layout', async () => {
      writeFileSync(
        filePath,
        JSON.stringify({
          chats: { '1001': { accounts: ['gamer123'], interval_min: 10 } },
          api: { url: 'https://status.example.test/check', token: 'test-secret' },
          last_seen_unlocked: { gamer123: true },
          include_raw: true,
        }),
      );
      const migrated: Array<{ subscriberCount: number }> = [];
      eventBus.on('store:migrated', (e) => migrated.push(e));

      const state = await store.load();

      expect(state).toEqual({
        subscribers: { '1001': { accounts: ['gamer123'], intervalMinutes: 10 } },
        endpoint: { url: 'https://status.example.test/check', token: 'test-secret' },
        accountState: { gamer123: true },
        pendingDeliveries: {},
        includeRaw: true,
      });
      expect(migrated).toEqual([{ path: filePath, subscriberCount: 1 }]);
    });
  });

  describe('save', () => {
    it('writes pretty JSON that loads back unchanged', async () => {
      const state = {
        subscribers: { '1001': { accounts: ['gamer123'], intervalMinutes: 5 } },
        endpoint: { url: 'https://status.example.test/check', token: 'test-secret' },
        accountState: { gamer123: true },
        pendingDeliveries: {},
        includeRaw: false,
      };

      await store.save(state);

      expect(readFileSync(filePath, 'utf-8')).toBe(`${JSON.stringify(state, null, 2)}\n`);
      expect(await store.load()).toEqual(state);
    });

    it('leaves no temp files behind', async () => {
      await store.save(emptyStoreState());
      expect(readdirSync(dir)).toEqual(['data.json']);
    });

    it('creates missing parent directories', async () => {
      const nested = new SubscriptionStore({ filePath: join(dir, 'a', 'b', 'data.json') });
      await nested.save(emptyStoreState());
      expect(existsSync(join(dir, 'a', 'b', 'data.json'))).toBe(true);
    });
  });

  describe('subscriptions', () => {
    it('adds accounts in order, creating the subscriber with the default interval', async () => {
      await store.addAccount('1001', 'gamer123');
      const result = await store.addAccount('1001', 'player.two');

      expect(result).toEqual({ success: true, data: { accounts: ['gamer123', 'player.two'], intervalMinutes: 5 } });
      expect((await store.list('1001')).accounts).toEqual(['gamer123', 'player.two']);
    });

    it('uses the configured default interval for new subscribers', async () => {
      const custom = new SubscriptionStore({ filePath, defaultIntervalMinutes: 15 });
      await custom.addAccount('1001', 'gamer123');
      expect((await custom.list('1001')).intervalMinutes).toBe(15);
    });

    it('rejects account names that collide with object internals', async () => {
      for (const name of ['__proto__', 'constructor', 'prototype']) {
        const result = await store.addAccount('1001', name);
        expect(result.success).toBe(false);
        if (result.success) continue;
        expect(result.error.message).toBe('Account name is reserved');
      }
      expect(existsSync(filePath)).toBe(false);
    });

    it('rejects malformed account ids without writing', async () => {
      const result = await store.addAccount('1001', 'bad`name');

      expect(result.success).toBe(false);
      expect(existsSync(filePath)).toBe(false);
    });

    it('removes every occurrence of an account', async () => {
      await store.addAccount('1001', 'gamer123');
      await store.addAccount('1001', 'other');
      await store.addAccount('1001', 'gamer123');

      expect(await store.removeAccount('1001', 'gamer123')).toBe(true);
      expect((await store.list('1001')).accounts).toEqual(['other']);
    });

    it('reports removing an account that is not tracked', async () => {
      await store.addAccount('1001', 'gamer123');
      expect(await store.removeAccount('1001', 'unknown')).toBe(false);
      expect(await store.removeAccount('2002', 'gamer123')).toBe(false);
      expect((await store.load()).subscribers['2002']).toBeUndefined();
    });

    it('lists defaults for an unknown subscriber', async () => {
      expect(await store.list('1001')).toEqual({ accounts: [], intervalMinutes: 5, endpointUrl: '' });
    });

    it('sets the interval from a numeric string', async () => {
      const result = await store.setCheckInterval('1001', '10');

      expect(result).toEqual({ success: true, data: { accounts: [], intervalMinutes: 10 } });
      expect((await store.list('1001')).intervalMinutes).toBe(10);
    });

    it('rejects intervals below one minute', async () => {
      const result = await store.setCheckInterval('1001', '0');
      expect(result.success).toBe(false);
      expect((await store.load()).subscribers).toEqual({});
    });

    it('keeps concurrent adds from different subscribers', async () => {
      await Promise.all([
        store.addAccount('1001', 'a1'),
        store.addAccount('2002', 'b1'),
        store.addAccount('1001', 'a2'),
        store.addAccount('3003', 'c1'),
      ]);

      const state = await store.load();
      expect(state.subscribers['1001']?.accounts).toEqual(['a1', 'a2']);
      expect(state.subscribers['2002']?.accounts).toEqual(['b1']);
      expect(state.subscribers['3003']?.accounts).toEqual(['c1']);
    });
  });

  describe('endpoint', () => {
    it('stores url and token', async () => {
      expect(await store.setEndpointUrl('https://status.example.test/check')).toEqual({
        success: true,
        data: 'https://status.example.test/check',
      });
      expect((await store.setEndpointToken('test-secret')).success).toBe(true);

      expect((await store.load()).endpoint).toEqual({
        url: 'https://status.example.test/check',
        token: 'test-secret',
      });
      expect((await store.list('1001')).endpointUrl).toBe('https://status.example.test/check');
    });

    it('rejects non-http urls', async () => {
      expect((await store.setEndpointUrl('ftp://status.example.test')).success).toBe(false);
      expect((await store.setEndpointUrl('not a url')).success).toBe(false);
    });

    it('toggles raw responses', async () => {
      await store.setIncludeRaw(true);
      expect((await store.load()).includeRaw).toBe(true);
    });
  });

  describe('account state', () => {
    it('records partial deliveries without duplicates and clears them when marked', async () => {
      await store.recordDelivered('gamer123', ['1001']);
      await store.recordDelivered('gamer123', ['1001', '2002']);
      await store.recordDelivered('gamer123', []);
      expect((await store.load()).pendingDeliveries).toEqual({ gamer123: ['1001', '2002'] });

      await store.markUnlocked('gamer123');
      const state = await store.load();
      expect(state.pendingDeliveries).toEqual({});
      expect(state.accountState).toEqual({ gamer123: true });
    });

    it('clears partial deliveries on reset', async () => {
      await store.recordDelivered('gamer123', ['1001']);
      expect(await store.resetAccount('gamer123')).toBe(false);
      expect((await store.load()).pendingDeliveries).toEqual({});
    });

    it('marks and resets an account', async () => {
      await store.markUnlocked('gamer123');
      expect((await store.load()).accountState).toEqual({ gamer123: true });

      expect(await store.resetAccount('gamer123')).toBe(true);
      expect((await store.load()).accountState).toEqual({});
      expect(await store.resetAccount('gamer123')).toBe(false);
    });
  });
});
