/**
 * In-memory bearer token authority
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

export interface TokenAuthorityConfig {
  /** Token lifetime in seconds; 0 means tokens never expire. */
  ttlSeconds: number;
  now: () => number;
}

export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date | null;
}

interface TokenRecord {
  issuedAt: number;
  expiresAt: number | null;
}

/**
 * Issues opaque tokens and answers whether a token is currently valid.
 *
 * The store lives for the lifetime of the process. Every method runs to
 * completion on the event loop, so a token returned by `issue` is visible to
 * any `validate` that starts afterwards. With a TTL, `issue` sweeps expired
 * tokens at most once per TTL period.
 */
export class TokenAuthority {
  private readonly tokens = new Map<string, TokenRecord>();
  private readonly config: TokenAuthorityConfig;
  private lastSweepAt: number;

  constructor(config?: Partial<TokenAuthorityConfig>) {
    this.config = {
      ttlSeconds: config?.ttlSeconds ?? 0,
      now: config?.now ?? Date.now
    };

    if (!Number.isInteger(this.config.ttlSeconds) || this.config.ttlSeconds < 0) {
      throw new RangeError(`ttlSeconds must be a non-negative integer, got ${this.config.ttlSeconds}`);
    }
    this.lastSweepAt = this.config.now();
  }

  get ttlSeconds(): number {
    return this.config.ttlSeconds;
  }

  /** Number of tokens currently held, expired ones included until purged. */
  get size(): number {
    return this.tokens.size;
  }

  public issue(): IssuedToken {
    const issuedAt = this.config.now();
    const expiresAt = this.config.ttlSeconds > 0 ? issuedAt + this.config.ttlSeconds * 1000 : null;
    const token = uuidv4();

    if (expiresAt !== null && issuedAt - this.lastSweepAt >= this.config.ttlSeconds * 1000) {
      this.lastSweepAt = issuedAt;
      this.purgeExpired();
    }

    this.tokens.set(token, { issuedAt, expiresAt });
    logger.debug('Token issued', { expiresAt: expiresAt === null ? 'never' : new Date(expiresAt).toISOString() });

    return {
      token,
      issuedAt: new Date(issuedAt),
      expiresAt: expiresAt === null ? null : new Date(expiresAt)
    };
  }

  /** Read-only check; expired tokens are left for the sweep. */
  public validate(token: string | null | undefined): boolean {
    if (typeof token !== 'string' || token.length === 0) {
      return false;
    }

    const record = this.tokens.get(token);
    return record !== undefined && !this.isExpired(record);
  }

  public revoke(token: string): boolean {
    return this.tokens.delete(token);
  }

  /**
   * Drop expired tokens. Returns how many were removed.
   */
  public purgeExpired(): number {
    let removed = 0;
    for (const [token, record] of this.tokens) {
      if (this.isExpired(record)) {
        this.tokens.delete(token);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug('Purged expired tokens', { removed, remaining: this.tokens.size });
    }
    return removed;
  }

  private isExpired(record: TokenRecord): boolean {
    return record.expiresAt !== null && this.config.now() >= record.expiresAt;
  }
}
