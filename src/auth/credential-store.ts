import type { TokenRefresher } from './token-refresher.js';
import type { AccessToken, ClientIdentity, Clock, RefreshCredential } from './types.js';
import { systemClock } from './types.js';

export const DEFAULT_EXPIRY_MARGIN_MS = 60_000;

export interface CredentialStoreOptions {
  identity: ClientIdentity;
  refreshCredential: RefreshCredential;
  refresher: Pick<TokenRefresher, 'refresh'>;
  clock?: Clock;
  /** A token is treated as expired this long before its real expiry */
  expiryMarginMs?: number;
}

/**
 * Single source of truth for the process's access token.
 *
 * Concurrent callers that find no usable token share one in-flight refresh,
 * so the token endpoint sees at most one request at a time.
 */
export class CredentialStore {
  private readonly identity: ClientIdentity;
  private readonly refreshCredential: RefreshCredential;
  private readonly refresher: Pick<TokenRefresher, 'refresh'>;
  private readonly clock: Clock;
  private readonly expiryMarginMs: number;

  private current: AccessToken | null = null;
  private inFlight: Promise<AccessToken> | null = null;

  constructor(options: CredentialStoreOptions) {
    this.identity = options.identity;
    this.refreshCredential = options.refreshCredential;
    this.refresher = options.refresher;
    this.clock = options.clock ?? systemClock;
    this.expiryMarginMs = options.expiryMarginMs ?? DEFAULT_EXPIRY_MARGIN_MS;
  }

  isValid(token: AccessToken): boolean {
    return this.clock() < token.expiresAt - this.expiryMarginMs;
  }

  /**
   * Returns the cached token if it is still valid, otherwise refreshes.
   * Rejects with the refresher's AuthError when the refresh fails.
   */
  async getValidToken(): Promise<AccessToken> {
    if (this.current && this.isValid(this.current)) {
      return this.current;
    }

    if (this.inFlight) {
      console.error('[CredentialStore] Waiting for in-flight token refresh');
      return this.inFlight;
    }

    const refresh = this.refresher
      .refresh(this.identity, this.refreshCredential)
      .then(token => {
        if (!this.isValid(token)) {
          console.error(
            `[CredentialStore] New token expires within the ${this.expiryMarginMs} ms margin; every call will refresh`
          );
        }
        this.current = token;
        return token;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = refresh;
    return refresh;
  }

  /**
   * Forces the next getValidToken() to refresh.
   * When the rejected token is given and a newer one is already cached,
   * the newer token is kept.
   */
  invalidate(rejectedToken?: string): void {
    if (rejectedToken !== undefined && this.current && this.current.token !== rejectedToken) {
      return;
    }
    this.current = null;
  }

  /**
   * Current cached token, valid or not. For diagnostics.
   */
  peek(): AccessToken | null {
    return this.current;
  }
}
