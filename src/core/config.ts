import { z } from 'zod';
import type { IntuitEnvironment } from '../adapters/intuit-endpoints.js';
import type { ClientIdentity, RefreshCredential } from '../auth/types.js';
import { ConfigError } from './errors.js';

export interface TenantContext {
  defaultRealmId?: string;
}

export interface BridgeConfig {
  identity: ClientIdentity;
  refresh: RefreshCredential;
  tenant: TenantContext;
  httpTimeoutMs: number;
  expiryMarginMs: number;
}

export const REQUIRED_ENV_VARS = [
  'INTUIT_CLIENT_ID',
  'INTUIT_CLIENT_SECRET',
  'INTUIT_REFRESH_TOKEN',
] as const;

// Empty strings in the environment count as unset.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredString = z.preprocess(
  blankToUndefined,
  z.string({ required_error: 'is required' })
);

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be a whole number')
      .positive('must be greater than zero')
      .default(fallback)
  );

const EnvSchema = z.object({
  INTUIT_CLIENT_ID: requiredString,
  INTUIT_CLIENT_SECRET: requiredString,
  INTUIT_REFRESH_TOKEN: requiredString,
  INTUIT_ENVIRONMENT: z.preprocess(
    blankToUndefined,
    z
      .enum(['sandbox', 'production'], {
        errorMap: () => ({ message: "must be 'sandbox' or 'production'" }),
      })
      .default('sandbox')
  ),
  INTUIT_COMPANY_ID: optionalString,
  INTUIT_HTTP_TIMEOUT_MS: positiveInt(30_000),
  INTUIT_TOKEN_EXPIRY_MARGIN_SECONDS: positiveInt(60),
});

/**
 * Loads bridge configuration from environment variables.
 * Throws a ConfigError naming every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const missing: string[] = [];
    const invalid: string[] = [];

    for (const issue of result.error.issues) {
      const name = String(issue.path[0]);
      if (issue.message === 'is required') {
        missing.push(name);
      } else {
        invalid.push(`${name} ${issue.message}`);
      }
    }

    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`Missing required environment variables: ${missing.join(', ')}`);
    }
    if (invalid.length > 0) {
      parts.push(`Invalid environment variables: ${invalid.join('; ')}`);
    }

    throw new ConfigError(parts.join('. '), [...missing, ...invalid]);
  }

  const values = result.data;
  const environment: IntuitEnvironment = values.INTUIT_ENVIRONMENT;

  return {
    identity: {
      clientId: values.INTUIT_CLIENT_ID,
      clientSecret: values.INTUIT_CLIENT_SECRET,
      environment,
    },
    refresh: { refreshToken: values.INTUIT_REFRESH_TOKEN },
    tenant: { defaultRealmId: values.INTUIT_COMPANY_ID },
    httpTimeoutMs: values.INTUIT_HTTP_TIMEOUT_MS,
    expiryMarginMs: values.INTUIT_TOKEN_EXPIRY_MARGIN_SECONDS * 1000,
  };
}

/**
 * First five characters and the length. Never the whole value.
 */
export function maskSecret(value: string): string {
  return `${value.slice(0, 5)}... (length: ${value.length})`;
}

/**
 * One-line-per-setting summary safe to write to the log.
 */
export function describeConfig(config: BridgeConfig): string[] {
  return [
    `Client ID: ${maskSecret(config.identity.clientId)}`,
    `Client Secret: ${maskSecret(config.identity.clientSecret)}`,
    `Refresh Token: ${maskSecret(config.refresh.refreshToken)}`,
    `Environment: ${config.identity.environment}`,
    `Company ID: ${config.tenant.defaultRealmId ?? 'not set'}`,
  ];
}
