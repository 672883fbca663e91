import { randomUUID } from 'node:crypto';

/**
 * Suggested recovery action when an operation fails.
 */
export interface RecoveryAction {
  /** Unique identifier for this recovery suggestion */
  suggested_action_id: string;
  /** Human-readable description */
  description?: string;
}

/**
 * Standardised envelope for tool failures. Successful calls return the
 * provider's GraphQL envelope instead.
 */
export interface MCPResponse<T = unknown> {
  success: boolean;
  data: T;

  meta: {
    timestamp: string;
    request_id: string;
    execution_time_ms?: number;
    /** 1.0 on success, 0.0 on failure */
    score: number;
  };

  diagnostics: {
    /** Natural language explanation of what happened */
    narrative: string;
    warnings: string[];
    root_cause?: string;
  };

  recovery?: RecoveryAction;
}

export interface CreateResponseOptions<T> {
  success: boolean;
  data: T;
  requestId?: string;
  executionTimeMs?: number;
  narrative?: string;
  warnings?: string[];
  rootCause?: string;
  recovery?: RecoveryAction;
}

export function createResponse<T>(options: CreateResponseOptions<T>): MCPResponse<T> {
  const {
    success,
    data,
    requestId,
    executionTimeMs,
    narrative,
    warnings,
    rootCause,
    recovery,
  } = options;

  const response: MCPResponse<T> = {
    success,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      request_id: requestId ?? randomUUID(),
      execution_time_ms: executionTimeMs,
      score: success ? 1.0 : 0.0,
    },
    diagnostics: {
      narrative: narrative ?? (success
        ? 'Operation completed successfully.'
        : 'Operation failed. Check diagnostics for details.'),
      warnings: warnings ?? [],
      root_cause: rootCause,
    },
  };

  if (recovery) {
    response.recovery = recovery;
  }

  return response;
}

/**
 * Shorthand for creating a failure response with a narrative.
 */
export function failureResponse<T>(
  data: T,
  options: Omit<CreateResponseOptions<T>, 'success' | 'data'> & {
    narrative: string;
  }
): MCPResponse<T> {
  return createResponse({
    success: false,
    data,
    ...options,
  });
}
