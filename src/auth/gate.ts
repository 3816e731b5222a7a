/**
 * Authentication Gate
 *
 * Resolves the verified identity of a requester. The HTTP surface uses
 * bearer tokens configured through `AUTH_TOKENS`; the CLI runs as a fixed
 * local user.
 *
 * @module auth/gate
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { TokenEntry } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Who is asking. `authorization` is the raw Authorization header value.
 */
export interface Requester {
  readonly address: string;
  readonly authorization?: string;
}

export interface AuthGate {
  /** Verified identity, or null when the requester is anonymous or unknown */
  identityOf(requester: Requester): string | null;
}

// ============================================================================
// Helper Functions
// ============================================================================

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Extract the token from an `Authorization: Bearer <token>` header value.
 */
export function parseBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

// ============================================================================
// Implementations
// ============================================================================

/**
 * Checks bearer tokens against a fixed token table.
 *
 * Tokens are compared as SHA-256 digests with `timingSafeEqual`, so every
 * comparison takes the same time whatever the token length.
 */
export class TokenAuthGate implements AuthGate {
  private readonly entries: ReadonlyArray<{ user: string; digest: Buffer }>;

  constructor(tokens: readonly TokenEntry[]) {
    this.entries = tokens.map(({ user, token }) => ({ user, digest: digest(token) }));
  }

  identityOf(requester: Requester): string | null {
    const token = parseBearerToken(requester.authorization);
    if (token === null) {
      return null;
    }

    const candidate = digest(token);
    let identity: string | null = null;
    for (const entry of this.entries) {
      // No early exit: every entry is compared
      if (timingSafeEqual(entry.digest, candidate) && identity === null) {
        identity = entry.user;
      }
    }
    return identity;
  }
}

/**
 * Accepts every requester as the same user.
 */
export class StaticAuthGate implements AuthGate {
  constructor(private readonly user: string) {}

  identityOf(): string {
    return this.user;
  }
}
