/**
 * Authenticated Request Executor
 * Sends one request to the Intuit API with a valid bearer token and
 * recovers from a stale-token rejection by refreshing and retrying once.
 */

import type { CredentialStore } from '../auth/credential-store.js';
import { AuthError, TransportError, describeError } from '../core/errors.js';

export const USER_AGENT = 'intuit-graphql-mcp/0.1.0';

/**
 * GraphQL `extensions.code` values that mean the bearer token was rejected.
 */
export const AUTH_ERROR_CODES: ReadonlySet<string> = new Set([
  'UNAUTHENTICATED',
  'AUTHENTICATION_FAILED',
  'AuthenticationFailed',
  '401',
]);

export interface RequestSpec {
  method: 'GET' | 'POST';
  url: string;
  /** Serialised as JSON for POST requests */
  body?: unknown;
  headers?: Record<string, string>;
}

export interface ProviderResponse {
  status: number;
  /** Parsed JSON body */
  body: unknown;
  /** Body text exactly as the provider sent it */
  rawBody: string;
}

export interface ExecutorOptions {
  store: Pick<CredentialStore, 'getValidToken' | 'invalidate'>;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

type Attempt =
  | { outcome: 'ok'; response: ProviderResponse }
  | { outcome: 'unauthenticated'; status: number; payload: unknown };

export class AuthenticatedRequestExecutor {
  private readonly store: ExecutorOptions['store'];
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: ExecutorOptions) {
    this.store = options.store;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async execute(request: RequestSpec): Promise<ProviderResponse> {
    const first = await this.attempt(request);
    if (first.outcome === 'ok') {
      return first.response;
    }

    console.error(
      `[AuthenticatedExecutor] ${request.method} ${request.url} rejected as unauthenticated (${first.status}); refreshing token and retrying once`
    );

    const second = await this.attempt(request);
    if (second.outcome === 'ok') {
      return second.response;
    }

    throw new AuthError(
      `Request rejected as unauthenticated after token refresh (HTTP ${second.status})`,
      { status: second.status, providerPayload: second.payload }
    );
  }

  private async attempt(request: RequestSpec): Promise<Attempt> {
    const { token } = await this.store.getValidToken();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...request.headers,
      Authorization: `Bearer ${token}`,
    };

    let body: string | undefined;
    if (request.method === 'POST') {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body ?? {});
    }

    let response: Response;
    let rawBody: string;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      rawBody = await response.text();
    } catch (error) {
      throw new TransportError(`HTTP request error connecting to Intuit: ${describeError(error)}`, {
        cause: error,
      });
    }

    const parsed = parseJson(rawBody);

    if (response.status === 401 || (response.ok && hasAuthErrorCode(parsed.value))) {
      this.store.invalidate(token);
      return { outcome: 'unauthenticated', status: response.status, payload: parsed.value ?? rawBody };
    }

    if (!response.ok) {
      throw new TransportError(
        `HTTP status error: ${response.status} - ${extractErrorDetail(parsed.value, rawBody)}`,
        { status: response.status }
      );
    }

    if (!parsed.ok) {
      throw new TransportError(
        `Malformed response from Intuit (HTTP ${response.status}): body is not valid JSON`,
        { status: response.status }
      );
    }

    return { outcome: 'ok', response: { status: response.status, body: parsed.value, rawBody } };
  }
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; value: undefined } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false, value: undefined };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when a GraphQL envelope carries an error whose extensions code says
 * the token was not accepted.
 */
export function hasAuthErrorCode(body: unknown): boolean {
  if (!isRecord(body) || !Array.isArray(body.errors)) {
    return false;
  }
  return body.errors.some((error: unknown) => {
    if (!isRecord(error) || !isRecord(error.extensions)) {
      return false;
    }
    const code = error.extensions.code;
    return (typeof code === 'string' || typeof code === 'number') && AUTH_ERROR_CODES.has(String(code));
  });
}

/**
 * Pulls the provider's message out of an error body.
 * Handles GraphQL envelopes, `{ error: { message } }` and QuickBooks REST faults.
 */
export function extractErrorDetail(body: unknown, rawBody: string): string {
  if (isRecord(body)) {
    if (Array.isArray(body.errors)) {
      const [first] = body.errors;
      if (isRecord(first) && typeof first.message === 'string') {
        return first.message;
      }
    }
    if (isRecord(body.error) && typeof body.error.message === 'string') {
      return body.error.message;
    }
    if (isRecord(body.Fault) && Array.isArray(body.Fault.Error)) {
      const [first] = body.Fault.Error;
      if (isRecord(first) && typeof first.Message === 'string') {
        return first.Message;
      }
    }
  }
  return `Response: ${rawBody.slice(0, 200)}`;
}
