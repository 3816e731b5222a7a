/**
 * Rate Limiting
 *
 * Fixed-window request quota per identity, applied by the orchestrator as
 * its first stage. Independent of the transport.
 *
 * @module limits/rate-limiter
 */

import { createHash } from 'node:crypto';
import { parseBearerToken, type Requester } from '../auth/gate.js';

// ============================================================================
// Types
// ============================================================================

export interface RateLimiter {
  /**
   * Count one request for `identity`.
   * Returns false, without counting, once the quota of the current window is used up.
   */
  checkAndConsume(identity: string): boolean;
}

/**
 * Rate limit policy: who is counted, and against which limiter.
 */
export interface RateLimitPolicy {
  /** Key under which a requester's requests are counted */
  identify(requester: Requester): string;
  limiter: RateLimiter;
}

interface WindowState {
  startedAt: number;
  count: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RATE_LIMIT = {
  max: 5,
  windowMs: 60 * 60 * 1000,
} as const;

// ============================================================================
// Implementation
// ============================================================================

/**
 * In-memory fixed-window counter.
 *
 * `checkAndConsume` is synchronous, so each check-and-increment runs without
 * interleaving on the event loop. Windows start at an identity's first
 * request. Expired windows are swept at most once per window length, so
 * only identities seen in the last two windows are held.
 */
export class FixedWindowRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, WindowState>();
  private lastSweep: number;

  constructor(
    private readonly max: number = DEFAULT_RATE_LIMIT.max,
    private readonly windowMs: number = DEFAULT_RATE_LIMIT.windowMs,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(max) || max < 0) {
      throw new Error(`Rate limit must be a non-negative integer, got ${max}`);
    }
    if (windowMs <= 0) {
      throw new Error(`Rate limit window must be positive, got ${windowMs}ms`);
    }
    this.lastSweep = now();
  }

  /** Number of identities currently tracked */
  get size(): number {
    return this.windows.size;
  }

  checkAndConsume(identity: string): boolean {
    const now = this.now();
    if (now - this.lastSweep >= this.windowMs) {
      this.prune();
    }

    let state = this.windows.get(identity);

    if (!state || now - state.startedAt >= this.windowMs) {
      state = { startedAt: now, count: 0 };
      this.windows.set(identity, state);
    }

    if (state.count >= this.max) {
      return false;
    }

    state.count++;
    return true;
  }

  /**
   * Requests left for `identity` in its current window.
   */
  remaining(identity: string): number {
    const state = this.windows.get(identity);
    if (!state || this.now() - state.startedAt >= this.windowMs) {
      return this.max;
    }
    return Math.max(0, this.max - state.count);
  }

  /**
   * Drop windows that have expired.
   */
  prune(): void {
    const now = this.now();
    this.lastSweep = now;
    for (const [identity, state] of this.windows) {
      if (now - state.startedAt >= this.windowMs) {
        this.windows.delete(identity);
      }
    }
  }
}

// ============================================================================
// Identity Keys
// ============================================================================

/**
 * Count callers presenting a bearer token by the token, whatever the spelling
 * of the header, and everyone else by their address. Only a digest of the
 * token is kept.
 */
export function requesterKey(requester: Requester): string {
  const token = parseBearerToken(requester.authorization);
  if (token !== null) {
    const hash = createHash('sha256').update(token, 'utf-8').digest('hex');
    return `auth:${hash.slice(0, 32)}`;
  }
  return `addr:${requester.address}`;
}

/**
 * Build the default policy: `max` requests per `windowMs` per requester key.
 */
export function createRateLimitPolicy(
  options: { max?: number; windowMs?: number; now?: () => number } = {}
): RateLimitPolicy {
  return {
    identify: requesterKey,
    limiter: new FixedWindowRateLimiter(options.max, options.windowMs, options.now),
  };
}
