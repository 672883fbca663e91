import { z } from 'zod';
import { AuthError, describeError } from '../core/errors.js';
import type { AccessToken, ClientIdentity, Clock, RefreshCredential } from './types.js';
import { systemClock } from './types.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive(),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
});

export interface TokenRefresherOptions {
  tokenUrl: string;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  timeoutMs?: number;
}

/**
 * Performs the OAuth 2.0 refresh-token grant against the provider's token
 * endpoint. Does not retry; the caller owns retry policy.
 */
export class TokenRefresher {
  private readonly tokenUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;
  private readonly timeoutMs: number;

  constructor(options: TokenRefresherOptions) {
    this.tokenUrl = options.tokenUrl;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async refresh(identity: ClientIdentity, credential: RefreshCredential): Promise<AccessToken> {
    const issuedAt = this.clock();
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: credential.refreshToken,
      client_id: identity.clientId,
      client_secret: identity.clientSecret,
    });

    console.error(`[TokenRefresher] Requesting new access token from ${this.tokenUrl}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      console.error(`[TokenRefresher] Token request failed: ${describeError(error)}`);
      throw new AuthError(`Token refresh request failed: ${describeError(error)}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      console.error(`[TokenRefresher] Reading token response failed: ${describeError(error)}`);
      throw new AuthError(`Token refresh request failed: ${describeError(error)}`, {
        status: response.status,
        cause: error,
      });
    }
    const payload = parseJson(text);

    if (!response.ok) {
      console.error(`[TokenRefresher] Token endpoint returned ${response.status}: ${text.slice(0, 200)}`);
      throw new AuthError(`Token refresh failed (${response.status}): ${describePayload(payload, text)}`, {
        status: response.status,
        providerPayload: payload ?? text,
      });
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(body)').join(', ');
      throw new AuthError(`Token refresh response is missing or has invalid fields: ${fields}`, {
        status: response.status,
        providerPayload: payload ?? text,
      });
    }

    const data = parsed.data;
    if (data.refresh_token && data.refresh_token !== credential.refreshToken) {
      console.error('[TokenRefresher] Provider issued a rotated refresh token; it is not persisted');
    }

    console.error(`[TokenRefresher] Received new access token, expires in ${data.expires_in} seconds`);

    return {
      token: data.access_token,
      expiresAt: issuedAt + data.expires_in * 1000,
    };
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

// OAuth error bodies look like {"error":"invalid_grant","error_description":"..."}.
function describePayload(payload: unknown, text: string): string {
  if (typeof payload === 'object' && payload !== null && 'error' in payload) {
    const { error } = payload;
    const description = 'error_description' in payload ? payload.error_description : undefined;
    if (typeof error === 'string') {
      return typeof description === 'string' ? `${error} - ${description}` : error;
    }
  }
  return text.slice(0, 200) || 'empty response';
}
