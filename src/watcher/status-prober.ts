/**
 * StatusProber: one status query for one account.
 *
 * POSTs `{"account": <id>}` with the bearer token to the configured endpoint
 * and normalizes whatever comes back into a ProbeResult. Every failure mode
 * (missing config, transport error, timeout, unparsable body) is represented
 * in the result; `probe` never rejects.
 *
 * Unlock signal, first match wins:
 *   1. top-level `unlocked` key
 *   2. `status` of "ok" / "success" with `data.unlocked`
 *   3. false
 */

import type { EndpointConfig, ProbeResult } from '../types/index.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 20_000;

const SUCCESS_STATUSES = new Set(['ok', 'success']);

export interface StatusProberOptions {
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loose truthiness for flags coming from arbitrary JSON: empty strings,
 * zero, null and empty collections count as false.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export function extractUnlocked(parsed: unknown): boolean {
  if (!isRecord(parsed)) return false;

  if ('unlocked' in parsed) {
    return isTruthy(parsed.unlocked);
  }

  if (typeof parsed.status === 'string' && SUCCESS_STATUSES.has(parsed.status)) {
    const inner = parsed.data;
    if (isRecord(inner) && 'unlocked' in inner) {
      return isTruthy(inner.unlocked);
    }
  }

  return false;
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici reports "fetch failed" and keeps the interesting part in `cause`
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

export class StatusProber {
  private readonly timeoutMs: number;

  constructor(options: StatusProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async probe(endpoint: EndpointConfig, account: string): Promise<ProbeResult> {
    if (!endpoint.url || !endpoint.token) {
      return { ok: false, unlocked: false, raw: null, status: 'not-configured' };
    }

    try {
      const response = await fetch(endpoint.url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${endpoint.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ account }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const text = await response.text();
      const parsed = parseBody(text);

      return {
        ok: response.status < 400,
        unlocked: extractUnlocked(parsed),
        raw: isTruthy(parsed) ? parsed : text,
        status: response.status,
      };
    } catch (error) {
      return { ok: false, unlocked: false, raw: describeError(error), status: 'error' };
    }
  }
}
