import type { BackupLogger } from '../backup-types.js';

export type AuditOperationType =
    | 'data_access'
    | 'data_modification'
    | 'schema_change'
    | 'system_configuration';

export type AuditResult =
    | { status: 'success' }
    | { status: 'partial_success'; message: string }
    | { status: 'failure'; message: string };

export interface AuditEntryInput {
    operationType: AuditOperationType;
    resourceType: string;
    resourceId: string;
    action: string;
    result: AuditResult;
    details: Record<string, string>;
    userId?: string;
}

/**
 * Handle for one tracked operation.
 */
export interface OperationHandle {
    readonly operationId: string;
    updateProgress(recordsProcessed: number, metadata?: Record<string, string>): void | Promise<void>;
    completeSuccess(): void | Promise<void>;
    completeFailure(error: Error): void | Promise<void>;
}

/**
 * Progress and audit collaborator injected into the parser.
 */
export interface ParseMonitor {
    startOperation(name: string, metadata?: Record<string, string>): OperationHandle;
    logAudit(entry: AuditEntryInput): void | Promise<void>;
}

export const NOOP_OPERATION: OperationHandle = {
    operationId: 'noop',
    updateProgress() { /* nothing tracked */ },
    completeSuccess() { /* nothing tracked */ },
    completeFailure() { /* nothing tracked */ },
};

export const NoopMonitor: ParseMonitor = {
    startOperation: () => NOOP_OPERATION,
    logAudit() { /* nothing tracked */ },
};

/**
 * Runs a monitor call without letting it affect the caller: a throw, or a
 * rejection of a returned promise, is reported to the logger and dropped.
 */
export function notifyMonitor(logger: BackupLogger | null, label: string, call: () => void | Promise<void>): void {
    const report = (error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        logger?.warn?.(`[MONITOR] ${label} failed: ${detail}`);
    };
    try {
        const pending = call();
        if (pending instanceof Promise) pending.catch(report);
    } catch (error) {
        report(error);
    }
}

/**
 * Classifies a finished parse for the audit log.
 */
export function classifyParseResult(documentCount: number, errorCount: number): AuditResult {
    if (errorCount === 0) return { status: 'success' };
    if (documentCount > 0) {
        return { status: 'partial_success', message: `${errorCount} record(s) could not be decoded` };
    }
    return { status: 'failure', message: `No documents decoded; ${errorCount} error(s)` };
}
