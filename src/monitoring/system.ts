/**
 * In-process monitoring: operation lifecycle tracking with bounded history and an audit log.
 */

import { randomUUID } from 'node:crypto';
import type { BackupLogger } from '../backup-types.js';
import type { AuditEntryInput, AuditResult, OperationHandle, ParseMonitor } from './monitor.js';

export type OperationStatus = 'started' | 'in_progress' | 'completed' | 'failed' | 'cancelled';

export interface OperationMetrics {
    operationId: string;
    operationName: string;
    startTime: Date;
    endTime?: Date;
    durationMs?: number;
    recordsProcessed?: number;
    /** Records per second, when both duration and record count are known. */
    throughput?: number;
    status: OperationStatus;
    metadata: Record<string, string>;
    error?: string;
}

export interface AuditLogEntry extends AuditEntryInput {
    entryId: string;
    timestamp: Date;
}

export interface MonitoringConfig {
    maxCompletedOperations?: number;
    maxAuditEntries?: number;
    enablePerformanceTracking?: boolean;
    enableAuditLogging?: boolean;
    logger?: BackupLogger | null;
}

export interface SystemStats {
    activeOperations: number;
    completedOperations: number;
    failedOperations: number;
    totalRecordsProcessed: number;
    averageDurationMs: number;
    auditEntries: number;
}

export class MonitoringSystem implements ParseMonitor {
    public static readonly DEFAULT_MAX_COMPLETED_OPERATIONS = 1000;
    public static readonly DEFAULT_MAX_AUDIT_ENTRIES = 10000;

    private readonly active = new Map<string, OperationMetrics>();
    private readonly completed: OperationMetrics[] = [];
    private readonly auditLog: AuditLogEntry[] = [];
    private readonly config: Required<MonitoringConfig>;

    constructor(config: MonitoringConfig = {}) {
        const defaults: Required<MonitoringConfig> = {
            maxCompletedOperations: MonitoringSystem.DEFAULT_MAX_COMPLETED_OPERATIONS,
            maxAuditEntries: MonitoringSystem.DEFAULT_MAX_AUDIT_ENTRIES,
            enablePerformanceTracking: true,
            enableAuditLogging: true,
            logger: null,
        };
        this.config = { ...defaults, ...config };
    }

    startOperation(name: string, metadata: Record<string, string> = {}): OperationHandle {
        const operationId = randomUUID();
        this.active.set(operationId, {
            operationId,
            operationName: name,
            startTime: new Date(),
            status: 'started',
            metadata: { ...metadata },
        });
        this.config.logger?.info?.(`[MONITOR] Started ${name} (${operationId})`);

        return {
            operationId,
            updateProgress: (recordsProcessed, extra) => this.updateOperation(operationId, recordsProcessed, extra),
            completeSuccess: () => this.completeOperation(operationId, 'completed'),
            completeFailure: (error) => this.completeOperation(operationId, 'failed', error),
        };
    }

    updateOperation(operationId: string, recordsProcessed?: number, metadata?: Record<string, string>): void {
        const op = this.active.get(operationId);
        if (!op) {
            this.config.logger?.warn?.(`[MONITOR] Progress for unknown operation ${operationId}`);
            return;
        }
        op.status = 'in_progress';
        if (recordsProcessed !== undefined) op.recordsProcessed = recordsProcessed;
        if (metadata) Object.assign(op.metadata, metadata);
    }

    completeOperation(operationId: string, status: OperationStatus, error?: Error): void {
        const op = this.active.get(operationId);
        if (!op) {
            this.config.logger?.warn?.(`[MONITOR] Completion for unknown operation ${operationId}`);
            return;
        }
        this.active.delete(operationId);

        op.status = status;
        op.endTime = new Date();
        if (error) op.error = error.message;
        if (this.config.enablePerformanceTracking) {
            op.durationMs = op.endTime.getTime() - op.startTime.getTime();
            if (op.recordsProcessed !== undefined && op.durationMs > 0) {
                op.throughput = op.recordsProcessed / (op.durationMs / 1000);
            }
        }

        this.completed.push(op);
        if (this.completed.length > this.config.maxCompletedOperations) {
            this.completed.splice(0, this.completed.length - this.config.maxCompletedOperations);
        }

        if (status === 'failed') {
            this.config.logger?.error?.(`[MONITOR] ${op.operationName} (${operationId}) failed: ${op.error ?? 'unknown error'}`);
        } else {
            this.config.logger?.info?.(`[MONITOR] ${op.operationName} (${operationId}) ${status} in ${op.durationMs ?? '?'}ms`);
        }
    }

    logAudit(entry: AuditEntryInput): void {
        if (!this.config.enableAuditLogging) return;

        const logged: AuditLogEntry = {
            ...entry,
            details: { ...entry.details },
            entryId: randomUUID(),
            timestamp: new Date(),
        };
        this.auditLog.push(logged);
        if (this.auditLog.length > this.config.maxAuditEntries) {
            this.auditLog.splice(0, this.auditLog.length - this.config.maxAuditEntries);
        }

        const line = `[MONITOR] audit ${entry.action} ${entry.resourceType}:${entry.resourceId} -> ${describeResult(entry.result)}`;
        if (entry.result.status === 'failure') this.config.logger?.warn?.(line);
        else this.config.logger?.info?.(line);
    }

    getActiveOperations(): OperationMetrics[] {
        return [...this.active.values()];
    }

    getSystemStats(): SystemStats {
        const finished = this.completed;
        const durations = finished
            .map((op) => op.durationMs)
            .filter((ms): ms is number => ms !== undefined);

        return {
            activeOperations: this.active.size,
            completedOperations: finished.filter((op) => op.status === 'completed').length,
            failedOperations: finished.filter((op) => op.status === 'failed').length,
            totalRecordsProcessed: finished.reduce((sum, op) => sum + (op.recordsProcessed ?? 0), 0),
            averageDurationMs: durations.length > 0
                ? durations.reduce((a, b) => a + b, 0) / durations.length
                : 0,
            auditEntries: this.auditLog.length,
        };
    }

    /** Newest first. */
    getRecentAuditEntries(limit: number): AuditLogEntry[] {
        if (limit <= 0) return [];
        return this.auditLog.slice(-limit).reverse();
    }

    getPerformanceMetrics(nameFilter?: string): OperationMetrics[] {
        if (!nameFilter) return [...this.completed];
        return this.completed.filter((op) => op.operationName.includes(nameFilter));
    }
}

function describeResult(result: AuditResult): string {
    switch (result.status) {
        case 'success':
            return 'SUCCESS';
        case 'partial_success':
            return `PARTIAL: ${result.message}`;
        case 'failure':
            return `FAILED: ${result.message}`;
    }
}
