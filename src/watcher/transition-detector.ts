import type { NotificationDecision, ProbeResult } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSITION DETECTOR
// ═══════════════════════════════════════════════════════════════════════════════

export type AccountStateCache = Readonly<Record<string, boolean>>;

/**
 * Fires when the probe reports unlocked and the account has not been
 * announced yet. Detection is monotonic: a locked probe never clears the
 * cache, so an account fires at most once until it is reset explicitly.
 *
 * The cache is only read here. The caller marks the account after the
 * notification went out.
 */
export function detectAndConsume(
  cache: AccountStateCache,
  account: string,
  probe: Pick<ProbeResult, 'unlocked'>,
): NotificationDecision {
  const announced = Object.hasOwn(cache, account) && cache[account] === true;
  return { fire: probe.unlocked === true && !announced };
}
