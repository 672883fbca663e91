import { describe, it, expect } from 'vitest';
import { createResponse, failureResponse } from '../../../src/core/mcp-response.js';

describe('createResponse', () => {
  it('should fill defaults for a successful response', () => {
    const response = createResponse({ success: true, data: { ok: true } });

    expect(response.success).toBe(true);
    expect(response.data).toEqual({ ok: true });
    expect(response.meta.score).toBe(1.0);
    expect(response.meta.request_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(response.diagnostics).toEqual({
      narrative: 'Operation completed successfully.',
      warnings: [],
      root_cause: undefined,
    });
    expect(response).not.toHaveProperty('recovery');
  });

  it('should keep caller-supplied metadata', () => {
    const response = createResponse({
      success: true,
      data: null,
      requestId: 'req-42',
      executionTimeMs: 17,
      warnings: ['slow'],
    });

    expect(response.meta.request_id).toBe('req-42');
    expect(response.meta.execution_time_ms).toBe(17);
    expect(response.meta.score).toBe(1.0);
    expect(response.diagnostics.warnings).toEqual(['slow']);
  });
});

describe('failureResponse', () => {
  it('should build a failure with narrative and recovery', () => {
    const response = failureResponse(
      { error_type: 'AuthError' },
      {
        narrative: 'The GraphQL request failed with AuthError.',
        rootCause: 'Token refresh failed (400): invalid_grant',
        recovery: { suggested_action_id: 'reauthorize' },
      }
    );

    expect(response.success).toBe(false);
    expect(response.meta.score).toBe(0.0);
    expect(response.diagnostics.narrative).toBe('The GraphQL request failed with AuthError.');
    expect(response.diagnostics.root_cause).toBe('Token refresh failed (400): invalid_grant');
    expect(response.recovery).toEqual({ suggested_action_id: 'reauthorize' });
  });
});
