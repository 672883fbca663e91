import { describe, it, expect, beforeEach } from 'vitest';
import {
  logAudit,
  getAuditEntries,
  getAuditStats,
  clearAuditLog,
  getAuditLogSize,
  getActionType,
  type AuditEntry,
} from '../../../src/core/audit-logger.js';

type EntryInput = Omit<AuditEntry, 'id' | 'timestamp'>;

function entry(overrides: Partial<EntryInput> = {}): EntryInput {
  return {
    realm_id: '123',
    tool_name: 'intuit_execute_graphql',
    action_type: 'read',
    success: true,
    request_id: 'req-1',
    execution_time_ms: 10,
    metadata: { path: 'graphql' },
    ...overrides,
  };
}

describe('audit-logger', () => {
  beforeEach(() => {
    clearAuditLog();
  });

  describe('logAudit', () => {
    it('should create an audit entry with all fields', () => {
      const logged = logAudit(entry({ execution_time_ms: 42 }));

      expect(logged.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(Number.isNaN(Date.parse(logged.timestamp))).toBe(false);
      expect(logged.realm_id).toBe('123');
      expect(logged.tool_name).toBe('intuit_execute_graphql');
      expect(logged.action_type).toBe('read');
      expect(logged.execution_time_ms).toBe(42);
      expect(logged.metadata).toEqual({ path: 'graphql' });
    });

    it('should include optional error details', () => {
      const logged = logAudit(
        entry({
          success: false,
          error_message: 'Token refresh failed (400): invalid_grant',
          metadata: { path: 'none', error_type: 'AuthError' },
        })
      );

      expect(logged.error_message).toBe('Token refresh failed (400): invalid_grant');
      expect(logged.metadata?.error_type).toBe('AuthError');
    });

    it('should cap the log at 1000 entries', () => {
      for (let i = 0; i < 1005; i++) {
        logAudit(entry({ request_id: `req-${i}` }));
      }

      expect(getAuditLogSize()).toBe(1000);
      expect(getAuditEntries({ limit: 1 })[0].request_id).toBe('req-1004');
      expect(getAuditEntries({ offset: 999, limit: 1 })[0].request_id).toBe('req-5');
    });
  });

  describe('getAuditEntries', () => {
    beforeEach(() => {
      logAudit(entry({ request_id: 'a', realm_id: '123' }));
      logAudit(entry({ request_id: 'b', realm_id: '456', success: false }));
      logAudit(entry({ request_id: 'c', realm_id: null, tool_name: 'other_tool' }));
    });

    it('should return newest entries first', () => {
      expect(getAuditEntries().map(e => e.request_id)).toEqual(['c', 'b', 'a']);
    });

    it('should filter by realm', () => {
      expect(getAuditEntries({ realm_id: '456' }).map(e => e.request_id)).toEqual(['b']);
    });

    it('should filter by tool name', () => {
      expect(getAuditEntries({ tool_name: 'other_tool' }).map(e => e.request_id)).toEqual(['c']);
    });

    it('should filter by success', () => {
      expect(getAuditEntries({ success: false }).map(e => e.request_id)).toEqual(['b']);
      expect(getAuditEntries({ success: true }).map(e => e.request_id)).toEqual(['c', 'a']);
    });

    it('should paginate', () => {
      expect(getAuditEntries({ limit: 1, offset: 1 }).map(e => e.request_id)).toEqual(['b']);
    });
  });

  describe('getAuditStats', () => {
    it('should report an empty log', () => {
      expect(getAuditStats()).toEqual({
        total_entries: 0,
        successful: 0,
        failed: 0,
        success_rate: 1,
        by_action: {},
        by_path: {},
        avg_execution_time_ms: 0,
      });
    });

    it('should aggregate by action and path', () => {
      logAudit(entry({ execution_time_ms: 10 }));
      logAudit(entry({ action_type: 'write', execution_time_ms: 20 }));
      logAudit(entry({ metadata: { path: 'rest_fallback' }, execution_time_ms: 30 }));
      logAudit(entry({ success: false, metadata: { path: 'none' }, execution_time_ms: 41 }));

      expect(getAuditStats()).toEqual({
        total_entries: 4,
        successful: 3,
        failed: 1,
        success_rate: 0.75,
        by_action: { read: 3, write: 1 },
        by_path: { graphql: 2, rest_fallback: 1, none: 1 },
        avg_execution_time_ms: 25,
      });
    });
  });

  describe('getActionType', () => {
    it('should classify mutations as writes', () => {
      expect(getActionType('mutation CreateCustomer { customerCreate { id } }')).toBe('write');
      expect(getActionType('# create one\n  mutation { x }')).toBe('write');
    });

    it('should classify everything else as reads', () => {
      expect(getActionType('{ company { companyName } }')).toBe('read');
      expect(getActionType('query Mutations { mutationLog { id } }')).toBe('read');
      expect(getActionType('mutationish { id }')).toBe('read');
    });
  });
});
