/**
 * Fault taxonomy for the bridge.
 *
 * Only AuthError and TransportError are thrown across component boundaries
 * during a call. GraphQL `errors` returned by the provider are data and never
 * become one of these.
 */

export type FaultKind = 'ConfigError' | 'AuthError' | 'TransportError';

export abstract class BridgeError extends Error {
  abstract readonly kind: FaultKind;
}

/**
 * A required configuration value is missing or malformed.
 */
export class ConfigError extends BridgeError {
  readonly kind = 'ConfigError' as const;

  constructor(
    message: string,
    readonly problems: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AuthErrorDetails {
  status?: number;
  /** Parsed JSON (or raw text) returned by the provider, when there was one */
  providerPayload?: unknown;
  cause?: unknown;
}

/**
 * The refresh-token exchange failed, or a request was still rejected as
 * unauthenticated after one forced refresh.
 */
export class AuthError extends BridgeError {
  readonly kind = 'AuthError' as const;
  readonly status?: number;
  readonly providerPayload?: unknown;

  constructor(message: string, details: AuthErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'AuthError';
    this.status = details.status;
    this.providerPayload = details.providerPayload;
  }
}

/**
 * Network or HTTP-level failure unrelated to authentication.
 */
export class TransportError extends BridgeError {
  readonly kind = 'TransportError' as const;
  readonly status?: number;

  constructor(message: string, details: { status?: number; cause?: unknown } = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TransportError';
    this.status = details.status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
