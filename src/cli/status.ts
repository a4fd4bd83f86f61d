import type { StoreState } from '../types/index.js';
import { redact } from '../utils/logger.js';

/**
 * Human-readable store summary. The bearer token never leaves this function
 * unmasked.
 */
export function formatStatus(state: StoreState, dataPath: string): string {
  const endpoint = redact(state.endpoint);
  const subscriberIds = Object.keys(state.subscribers);
  const unlocked = Object.keys(state.accountState).filter((account) => state.accountState[account] === true);

  const lines = [
    'Unlock Watch Status',
    `  Data file: ${dataPath}`,
    `  Endpoint: ${state.endpoint.url || '(not set)'}`,
    `  Token: ${String(endpoint.token) || '(not set)'}`,
    `  Raw responses: ${state.includeRaw ? 'on' : 'off'}`,
    `  Subscribers: ${subscriberIds.length}`,
  ];

  for (const id of subscriberIds) {
    const subscriber = state.subscribers[id];
    if (!subscriber) continue;
    const accounts = subscriber.accounts.length > 0 ? subscriber.accounts.join(', ') : '(none)';
    lines.push(`    ${id}: every ${subscriber.intervalMinutes} min: ${accounts}`);
  }

  lines.push(`  Announced unlocked: ${unlocked.length > 0 ? unlocked.join(', ') : '(none)'}`);
  return `${lines.join('\n')}\n`;
}
