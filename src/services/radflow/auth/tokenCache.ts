/**
 * @fileoverview In-memory holder for the partner JWT.
 * @module src/services/radflow/auth/tokenCache
 */

export interface CachedToken {
  readonly token: string;
  /** Absolute expiry in epoch seconds, taken from the token's own `exp` claim. */
  readonly expiresAt: number;
}

/** Tokens expiring within this many seconds are treated as stale. */
export const TOKEN_REFRESH_MARGIN_SECONDS = 60;

/**
 * Process-lifetime token slot. Entries are replaced whole, so a reader never
 * sees a token paired with another token's expiry.
 *
 * Concurrent refreshes may each call `set`; the last write wins.
 */
export class TokenCache {
  private entry: CachedToken | undefined;

  get(): CachedToken | undefined {
    return this.entry;
  }

  set(token: string, expiresAt: number): CachedToken {
    const entry = Object.freeze({ token, expiresAt });
    this.entry = entry;
    return entry;
  }

  /**
   * True when a token is cached and expires more than
   * {@link TOKEN_REFRESH_MARGIN_SECONDS} after `nowSeconds`.
   */
  isFresh(nowSeconds: number): boolean {
    return (
      this.entry !== undefined &&
      this.entry.expiresAt > nowSeconds + TOKEN_REFRESH_MARGIN_SECONDS
    );
  }
}
