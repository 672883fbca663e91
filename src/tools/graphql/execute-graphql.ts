import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  AuthenticatedRequestExecutor,
  ProviderResponse,
} from '../../adapters/authenticated-executor.js';
import type { IntuitEndpoints } from '../../adapters/intuit-endpoints.js';
import { getActionType, logAudit, type ExecutionPath } from '../../core/audit-logger.js';
import type { TenantContext } from '../../core/config.js';
import {
  AuthError,
  TransportError,
  type ConfigError,
  describeError,
  type FaultKind,
} from '../../core/errors.js';
import { failureResponse, type RecoveryAction } from '../../core/mcp-response.js';
import { fetchCompanyName, isCompanyNameQuery } from './company-fallback.js';

export const TOOL_NAME = 'intuit_execute_graphql';

export const ExecuteGraphqlSchema = z.object({
  query: z.string().min(1).describe('The complete GraphQL query or mutation to execute'),
  variables: z
    .record(z.unknown())
    .optional()
    .describe('Optional variables, keyed by the variable names declared in the document'),
});

export type ExecuteGraphqlArgs = z.infer<typeof ExecuteGraphqlSchema>;

export const EXECUTE_GRAPHQL_TOOL = {
  name: TOOL_NAME,
  description: `Executes an arbitrary GraphQL query or mutation against the Intuit API.

Pass the full document with your own selection sets. Authentication is handled
for you, and the configured company (realm) id is added as the \`realmId\`
variable when you do not supply one.

**DISCOVER THE SCHEMA** with introspection:
\`\`\`graphql
query TypeQuery($typeName: String!) {
  __type(name: $typeName) { name fields { name type { name kind ofType { name kind } } } }
}
\`\`\`

**COMPANY INFORMATION:**
\`\`\`graphql
query GetCompanyInfo {
  company { companyName companyAddr { line1 city country postalCode } legalCountry }
}
\`\`\`

**PAGINATION:** request \`pageInfo { hasNextPage endCursor }\` and pass
\`endCursor\` back as the \`after\` variable.

**RETURNS** the provider's response as JSON. Check the \`errors\` array: invalid
syntax, unknown fields and missing permissions are reported there. Use
introspection to fix field names.`,
};

/**
 * Everything the handler needs. A misconfigured server still answers every
 * call, with the configuration fault.
 */
export type ToolContext =
  | {
      kind: 'ready';
      executor: Pick<AuthenticatedRequestExecutor, 'execute'>;
      endpoints: IntuitEndpoints;
      tenant: TenantContext;
    }
  | { kind: 'misconfigured'; error: ConfigError };

export interface ExecuteGraphqlResult {
  success: boolean;
  /** Provider envelope on success, failure envelope otherwise */
  output: string;
  path: ExecutionPath;
}

type PreparedRequest = {
  query: string;
  variables?: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts a JSON-wrapped request (`{"query": "...", "variables": {...}}`) in
 * the query argument. Anything else is treated as a raw GraphQL document.
 */
export function unwrapQueryEnvelope(
  query: string,
  variables?: Record<string, unknown>
): PreparedRequest {
  if (!query.trimStart().startsWith('{')) {
    return { query, variables };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(query);
  } catch {
    return { query, variables };
  }

  if (!isRecord(parsed) || typeof parsed.query !== 'string') {
    return { query, variables };
  }

  const embedded = isRecord(parsed.variables) ? parsed.variables : undefined;
  return { query: parsed.query, variables: variables ?? embedded };
}

/**
 * Adds the default realm id when the caller did not pass `realmId`.
 * Returns a copy; the caller's object is left alone.
 */
export function injectRealmId(
  variables: Record<string, unknown> | undefined,
  defaultRealmId: string | undefined
): Record<string, unknown> | undefined {
  if (!defaultRealmId || (variables && 'realmId' in variables)) {
    return variables;
  }
  return { ...variables, realmId: defaultRealmId };
}

function resolveRealmId(
  variables: Record<string, unknown> | undefined,
  tenant: TenantContext
): string | undefined {
  const fromVariables = variables?.realmId;
  if (typeof fromVariables === 'string' && fromVariables.length > 0) {
    return fromVariables;
  }
  return tenant.defaultRealmId;
}

const RECOVERY: Record<FaultKind, RecoveryAction> = {
  ConfigError: {
    suggested_action_id: 'check_configuration',
    description:
      'Set INTUIT_CLIENT_ID, INTUIT_CLIENT_SECRET and INTUIT_REFRESH_TOKEN (and INTUIT_ENVIRONMENT if not sandbox), then restart the server.',
  },
  AuthError: {
    suggested_action_id: 'reauthorize',
    description:
      'The refresh token may be expired or revoked. Generate a new refresh token in the Intuit developer portal and restart the server.',
  },
  TransportError: {
    suggested_action_id: 'retry_later',
    description: 'The Intuit API could not be reached or returned an error. Retry the call later.',
  },
};

interface Fault {
  error_type: FaultKind;
  message: string;
}

function classify(error: AuthError | TransportError | ConfigError): Fault {
  return { error_type: error.kind, message: error.message };
}

function isRecoverable(error: unknown): error is AuthError | TransportError {
  return error instanceof AuthError || error instanceof TransportError;
}

function renderFailure(
  primary: Fault,
  fallback: Fault | undefined,
  requestId: string,
  executionTimeMs: number
): string {
  const narrative = fallback
    ? `The GraphQL request failed (${primary.error_type}) and the REST fallback also failed (${fallback.error_type}).`
    : `The GraphQL request failed with ${primary.error_type}.`;

  const response = failureResponse(
    {
      ...primary,
      ...(fallback ? { fallback: { attempted: true, ...fallback } } : {}),
    },
    {
      requestId,
      executionTimeMs,
      narrative,
      rootCause: primary.message,
      warnings: fallback ? [`REST fallback: ${fallback.message}`] : [],
      recovery: RECOVERY[primary.error_type],
    }
  );

  return JSON.stringify(response, null, 2);
}

async function attemptGraphql(
  executor: Pick<AuthenticatedRequestExecutor, 'execute'>,
  endpoints: IntuitEndpoints,
  query: string,
  variables: Record<string, unknown> | undefined
): Promise<{ ok: true; response: ProviderResponse } | { ok: false; fault: Fault }> {
  try {
    const response = await executor.execute({
      method: 'POST',
      url: endpoints.graphqlUrl,
      body: variables ? { query, variables } : { query },
    });

    if (isRecord(response.body) && Array.isArray(response.body.errors)) {
      console.error(`[${TOOL_NAME}] GraphQL errors returned: ${response.body.errors.length}`);
    }

    return { ok: true, response };
  } catch (error) {
    if (!isRecoverable(error)) {
      throw error;
    }
    console.error(`[${TOOL_NAME}] GraphQL request failed (${error.kind}): ${error.message}`);
    return { ok: false, fault: classify(error) };
  }
}

/**
 * Runs a GraphQL document against the Intuit API, falling back to REST for
 * the company name when the GraphQL endpoint is unusable.
 */
export async function handleExecuteGraphql(
  args: ExecuteGraphqlArgs,
  context: ToolContext
): Promise<ExecuteGraphqlResult> {
  const startTime = Date.now();
  const requestId = randomUUID();
  const prepared = unwrapQueryEnvelope(args.query, args.variables);
  const actionType = getActionType(prepared.query);

  console.error(`[${TOOL_NAME}] Executing query: ${prepared.query.slice(0, 100)}`);

  const finish = (
    result: ExecuteGraphqlResult,
    realmId: string | undefined,
    fault?: Fault
  ): ExecuteGraphqlResult => {
    logAudit({
      realm_id: realmId ?? null,
      tool_name: TOOL_NAME,
      action_type: actionType,
      success: result.success,
      request_id: requestId,
      error_message: fault?.message,
      execution_time_ms: Date.now() - startTime,
      metadata: { path: result.path, error_type: fault?.error_type },
    });
    return result;
  };

  if (context.kind === 'misconfigured') {
    const fault = classify(context.error);
    return finish(
      {
        success: false,
        output: renderFailure(fault, undefined, requestId, Date.now() - startTime),
        path: 'none',
      },
      undefined,
      fault
    );
  }

  const variables = injectRealmId(prepared.variables, context.tenant.defaultRealmId);
  const realmId = resolveRealmId(variables, context.tenant);

  const primary = await attemptGraphql(context.executor, context.endpoints, prepared.query, variables);
  if (primary.ok) {
    return finish({ success: true, output: primary.response.rawBody, path: 'graphql' }, realmId);
  }
  const primaryFault = primary.fault;

  if (!isCompanyNameQuery(prepared.query) || !realmId) {
    return finish(
      {
        success: false,
        output: renderFailure(primaryFault, undefined, requestId, Date.now() - startTime),
        path: 'none',
      },
      realmId,
      primaryFault
    );
  }

  console.error(`[${TOOL_NAME}] Attempting REST fallback for company name (realm ${realmId})`);

  try {
    const envelope = await fetchCompanyName(context.executor, context.endpoints, realmId);
    console.error(`[${TOOL_NAME}] REST fallback succeeded`);
    return finish(
      { success: true, output: JSON.stringify(envelope), path: 'rest_fallback' },
      realmId
    );
  } catch (error) {
    if (!isRecoverable(error)) {
      throw error;
    }
    const fallbackFault = classify(error);
    console.error(`[${TOOL_NAME}] REST fallback also failed: ${describeError(error)}`);
    return finish(
      {
        success: false,
        output: renderFailure(primaryFault, fallbackFault, requestId, Date.now() - startTime),
        path: 'rest_fallback',
      },
      realmId,
      primaryFault
    );
  }
}
