import { AuthenticatedRequestExecutor } from '../adapters/authenticated-executor.js';
import { resolveEndpoints } from '../adapters/intuit-endpoints.js';
import { CredentialStore } from '../auth/credential-store.js';
import { TokenRefresher } from '../auth/token-refresher.js';
import type { Clock } from '../auth/types.js';
import type { ToolContext } from '../tools/graphql/execute-graphql.js';
import { describeConfig, loadConfig, type BridgeConfig } from './config.js';
import { ConfigError } from './errors.js';

export interface RuntimeOptions {
  fetchImpl?: typeof fetch;
  clock?: Clock;
  /** Prefix for log lines */
  logPrefix?: string;
}

export interface Runtime {
  context: ToolContext;
  /** Present only when configuration loaded */
  store?: CredentialStore;
}

/**
 * Builds the credential store, executor and tool context from an
 * environment map. Configuration faults do not throw: they become a
 * misconfigured context that reports the fault on every call.
 */
export function createRuntime(
  env: NodeJS.ProcessEnv = process.env,
  options: RuntimeOptions = {}
): Runtime {
  const prefix = options.logPrefix ?? '[runtime]';

  const config = tryLoadConfig(env);
  if (config instanceof ConfigError) {
    console.error(`${prefix} Configuration error: ${config.message}`);
    return { context: { kind: 'misconfigured', error: config } };
  }

  for (const line of describeConfig(config)) {
    console.error(`${prefix} ${line}`);
  }

  const endpoints = resolveEndpoints(config.identity.environment);

  const refresher = new TokenRefresher({
    tokenUrl: endpoints.tokenUrl,
    fetchImpl: options.fetchImpl,
    clock: options.clock,
    timeoutMs: config.httpTimeoutMs,
  });

  const store = new CredentialStore({
    identity: config.identity,
    refreshCredential: config.refresh,
    refresher,
    clock: options.clock,
    expiryMarginMs: config.expiryMarginMs,
  });

  const executor = new AuthenticatedRequestExecutor({
    store,
    fetchImpl: options.fetchImpl,
    timeoutMs: config.httpTimeoutMs,
  });

  return {
    context: { kind: 'ready', executor, endpoints, tenant: config.tenant },
    store,
  };
}

function tryLoadConfig(env: NodeJS.ProcessEnv): BridgeConfig | ConfigError {
  try {
    return loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
}
