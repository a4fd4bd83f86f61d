import { createLogger } from '../utils/logger.js';
import type { ProbeStatus } from '../types/index.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Observers (logging, CLI status output, tests) attach here instead of
 * reaching into the scheduler or the bot.
 */
export interface EventMap {
  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };

  // ── Store events ───────────────────────────────────────────────────────
  'store:reset': { path: string; reason: string };
  'store:migrated': { path: string; subscriberCount: number };

  // ── Watcher events ─────────────────────────────────────────────────────
  'watcher:started': { tickMs: number };
  'watcher:stopped': { reason: string };
  'watcher:tick_skipped': { reason: 'busy' | 'not-configured'; timestamp: Date };
  'watcher:sweep_started': { sweepId: number; subscriberCount: number; accountCount: number; startedAt: Date };
  'watcher:sweep_complete': {
    sweepId: number;
    probed: number;
    notified: number;
    failures: number;
    duration: number;
  };
  'watcher:probe_failed': { account: string; status: ProbeStatus; reason: string };
  'watcher:notification_sent': { subscriberId: string; account: string; timestamp: Date };
  'watcher:notification_failed': { subscriberId: string; account: string; error: string };

  // ── Telegram events ────────────────────────────────────────────────────
  'telegram:bot_started': { botUsername: string; timestamp: string };
  'telegram:bot_stopped': { reason: string; timestamp: string };
  'telegram:command_received': { command: string; userId: number; chatId: number; timestamp: string };
  'telegram:auth_rejected': { userId: number; chatId: number; command: string; timestamp: string };
}

export class EventBus {
  private listeners: Map<keyof EventMap, Set<(payload: never) => void>> = new Map();
  private handlerErrors = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers. A throwing handler never stops the others.
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   */
  once<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
