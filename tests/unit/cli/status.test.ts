import { describe, it, expect } from 'vitest';
import { formatStatus } from '../../../src/cli/status.js';
import { emptyStoreState } from '../../../src/watcher/subscription-store.js';

describe('formatStatus', () => {
  it('summarizes the store and masks the token', () => {
    const text = formatStatus(
      {
        subscribers: {
          '1001': { accounts: ['gamer123', 'player.two'], intervalMinutes: 5 },
          '2002': { accounts: [], intervalMinutes: 30 },
        },
        endpoint: { url: 'https://status.example.test/check', token: 'test-secret' },
        accountState: { gamer123: true, 'player.two': false },
        pendingDeliveries: {},
        includeRaw: true,
      },
      '/srv/watch/data.json',
    );

    expect(text).toBe(
      [
        'Unlock Watch Status',
        '  Data file: /srv/watch/data.json',
        '  Endpoint: https://status.example.test/check',
        '  Token: [REDACTED]',
        '  Raw responses: on',
        '  Subscribers: 2',
        '    1001: every 5 min: gamer123, player.two',
        '    2002: every 30 min: (none)',
        '  Announced unlocked: gamer123',
        '',
      ].join('\n'),
    );
  });

  it('shows placeholders for an empty store', () => {
    const text = formatStatus(emptyStoreState(), '/srv/watch/data.json');

    expect(text).toContain('  Endpoint: (not set)\n  Token: (not set)\n');
    expect(text.endsWith('  Subscribers: 0\n  Announced unlocked: (none)\n')).toBe(true);
  });
});
