import type { IntuitEnvironment } from '../adapters/intuit-endpoints.js';

export interface ClientIdentity {
  clientId: string;
  clientSecret: string;
  environment: IntuitEnvironment;
}

export interface RefreshCredential {
  refreshToken: string;
}

export interface AccessToken {
  token: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Returns the current time in epoch milliseconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
