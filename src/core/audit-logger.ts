import { randomUUID } from 'node:crypto';

/**
 * Audit Logger
 *
 * Records every tool invocation in memory for debugging. Nothing is persisted.
 */

export type ActionType = 'read' | 'write';

export type ExecutionPath = 'graphql' | 'rest_fallback' | 'none';

export interface AuditEntry {
  id: string;
  realm_id: string | null;
  tool_name: string;
  action_type: ActionType;
  success: boolean;
  request_id: string;
  error_message?: string;
  execution_time_ms: number;
  timestamp: string;
  metadata?: {
    path: ExecutionPath;
    error_type?: string;
    [key: string]: unknown;
  };
}

const auditLog: AuditEntry[] = [];

// Maximum entries to keep in memory
const MAX_ENTRIES = 1000;

/**
 * Log an audit entry for a tool invocation.
 */
export function logAudit(entry: Omit<AuditEntry, 'id' | 'timestamp'>): AuditEntry {
  const fullEntry: AuditEntry = {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    ...entry,
  };

  auditLog.push(fullEntry);

  if (auditLog.length > MAX_ENTRIES) {
    auditLog.splice(0, auditLog.length - MAX_ENTRIES);
  }

  return fullEntry;
}

/**
 * Get audit entries, newest first, optionally filtered.
 */
export function getAuditEntries(options?: {
  realm_id?: string;
  tool_name?: string;
  success?: boolean;
  limit?: number;
  offset?: number;
}): AuditEntry[] {
  // Reverse insertion order is newest first, stable for equal timestamps.
  let entries = [...auditLog].reverse();

  if (options?.realm_id) {
    entries = entries.filter(e => e.realm_id === options.realm_id);
  }

  if (options?.tool_name) {
    entries = entries.filter(e => e.tool_name === options.tool_name);
  }

  if (options?.success !== undefined) {
    entries = entries.filter(e => e.success === options.success);
  }

  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;

  return entries.slice(offset, offset + limit);
}

export interface AuditStats {
  total_entries: number;
  successful: number;
  failed: number;
  success_rate: number;
  by_action: Record<string, number>;
  by_path: Record<string, number>;
  avg_execution_time_ms: number;
}

export function getAuditStats(): AuditStats {
  const total = auditLog.length;
  const successful = auditLog.filter(e => e.success).length;

  const byAction: Record<string, number> = {};
  const byPath: Record<string, number> = {};

  for (const entry of auditLog) {
    byAction[entry.action_type] = (byAction[entry.action_type] ?? 0) + 1;
    const path = entry.metadata?.path ?? 'none';
    byPath[path] = (byPath[path] ?? 0) + 1;
  }

  const avgExecutionTime = total > 0
    ? auditLog.reduce((sum, e) => sum + e.execution_time_ms, 0) / total
    : 0;

  return {
    total_entries: total,
    successful,
    failed: total - successful,
    success_rate: total > 0 ? successful / total : 1,
    by_action: byAction,
    by_path: byPath,
    avg_execution_time_ms: Math.round(avgExecutionTime),
  };
}

/**
 * Clear all audit entries (for testing).
 */
export function clearAuditLog(): void {
  auditLog.length = 0;
}

export function getAuditLogSize(): number {
  return auditLog.length;
}

/**
 * Mutations are writes; every other operation is a read.
 */
export function getActionType(document: string): ActionType {
  const withoutComments = document.replace(/#[^\n\r]*/g, '');
  return /^\s*mutation\b/.test(withoutComments) ? 'write' : 'read';
}
