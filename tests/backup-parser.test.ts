import * as path from 'path';
import { BackupParser } from '../src/parser/backup-parser.js';
import { BackupIoError, FragmentSequenceError, RecordCorruptionError, UnparseableRecordError } from '../src/errors.js';
import { InputFormat, LOG_BLOCK_SIZE, LOG_HEADER_SIZE, RecordType } from '../src/log/format.js';
import { MonitoringSystem } from '../src/monitoring/system.js';
import type { OperationHandle, ParseMonitor } from '../src/monitoring/monitor.js';
import { FirestoreBackup } from '../src/index.js';
import { consoleLogger } from '../src/backup-types.js';
import { buildLog, concat, documentJson, frameRecord, padToBlock, withTempDir, writeFixture } from './helpers/log-builder.js';

const u1 = documentJson('projects/p/databases/(default)/documents/users/u1', { age: { integerValue: '30' } });
const u2 = documentJson('projects/p/databases/(default)/documents/users/u2', { age: { integerValue: '41' } });
const o1 = documentJson('projects/p/databases/(default)/documents/orders/o1', { paid: { booleanValue: true } });

function fakeMonitor() {
    const handle = {
        operationId: 'op-1',
        updateProgress: vi.fn(),
        completeSuccess: vi.fn(),
        completeFailure: vi.fn(),
    } satisfies OperationHandle;
    const monitor = {
        startOperation: vi.fn(() => handle),
        logAudit: vi.fn(),
    } satisfies ParseMonitor;
    return { handle, monitor };
}

describe('BackupParser (log format)', () => {
    it('returns an empty result for an empty file', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', new Uint8Array(0));
            const result = await new BackupParser().parse(file);

            expect(result.documents).toEqual([]);
            expect(result.collections.size).toBe(0);
            expect(result.errors).toEqual([]);
            expect(result.metadata).toEqual({
                fileSize: 0,
                documentCount: 0,
                collectionCount: 0,
                blocksProcessed: 0,
                recordsProcessed: 0,
                format: InputFormat.LEVELDB_LOG,
            });
        });
    });

    it('decodes every record of a clean log in order', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog([u1, u2, o1]));
            const result = await new BackupParser().parse(file);

            expect(result.documents.map((d) => `${d.collection}/${d.id}`)).toEqual(['users/u1', 'users/u2', 'orders/o1']);
            expect(result.documents[0].data).toEqual({ age: 30 });
            expect(result.documents[2].data).toEqual({ paid: true });
            expect([...result.collections]).toEqual(['users', 'orders']);
            expect(result.errors).toEqual([]);
            expect(result.metadata).toEqual({
                fileSize: LOG_BLOCK_SIZE,
                documentCount: 3,
                collectionCount: 2,
                blocksProcessed: 1,
                recordsProcessed: 3,
                format: InputFormat.LEVELDB_LOG,
            });
        });
    });

    it('drops a record with a corrupted payload and records one error', async () => {
        await withTempDir(async (dir) => {
            const log = buildLog([u1, u2, o1]);
            const secondPayloadStart = LOG_HEADER_SIZE + u1.length + LOG_HEADER_SIZE;
            log[secondPayloadStart + 2] ^= 0x01;
            const file = await writeFixture(dir, 'output-0', log);

            const result = await new BackupParser().parse(file);

            expect(result.documents.map((d) => d.id)).toEqual(['u1', 'o1']);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toBeInstanceOf(RecordCorruptionError);
            if (result.errors[0] instanceof RecordCorruptionError) {
                expect(result.errors[0].reason).toBe('checksum_mismatch');
                expect(result.errors[0].offset).toBe(LOG_HEADER_SIZE + u1.length);
            }
            expect(result.metadata.recordsProcessed).toBe(2);
        });
    });

    it('reassembles a record split across blocks', async () => {
        await withTempDir(async (dir) => {
            const blob = 'x'.repeat(70000);
            const big = documentJson('users/big', { blob: { stringValue: blob } });
            const file = await writeFixture(dir, 'output-0', buildLog([u1, big, u2]));

            const result = await new BackupParser().parse(file);

            expect(result.errors).toEqual([]);
            expect(result.documents.map((d) => d.id)).toEqual(['u1', 'big', 'u2']);
            expect(result.documents[1].data).toEqual({ blob });
            expect(result.metadata.recordsProcessed).toBe(3);
            expect(result.metadata.blocksProcessed).toBe(3);
        });
    });

    it('rejects when a Middle record has no First, even after documents were read', async () => {
        await withTempDir(async (dir) => {
            const log = padToBlock(concat(
                frameRecord(RecordType.FULL, u1),
                frameRecord(RecordType.FULL, u2),
                frameRecord(RecordType.MIDDLE, o1)
            ));
            const file = await writeFixture(dir, 'output-0', log);

            await expect(new BackupParser().parse(file)).rejects.toBeInstanceOf(FragmentSequenceError);
        });
    });

    it('writes through the console logger', async () => {
        await withTempDir(async (dir) => {
            const log = buildLog([u1, u2]);
            log[LOG_HEADER_SIZE + u1.length + LOG_HEADER_SIZE + 2] ^= 0x01;
            const file = await writeFixture(dir, 'output-0', log);
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
            const info = vi.spyOn(console, 'info').mockImplementation(() => {});
            const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

            try {
                await new BackupParser({ logger: consoleLogger }).parse(file);

                expect(info).toHaveBeenCalledWith(`[PARSER] Parsing backup ${file}`);
                expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[LOG\] Checksum mismatch/));
            } finally {
                warn.mockRestore();
                info.mockRestore();
                debug.mockRestore();
            }
        });
    });

    it('filters short payloads without counting them as documents or errors', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog(['{"a":1}', u1, '__index__']));
            const result = await new BackupParser().parse(file);

            expect(result.documents.map((d) => d.id)).toEqual(['u1']);
            expect(result.errors).toEqual([]);
            expect(result.metadata.documentCount).toBe(1);
            expect(result.metadata.recordsProcessed).toBe(3);
        });
    });

    it('keeps going past a payload that is not JSON', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog(['this is not json', u1]));
            const result = await new BackupParser().parse(file);

            expect(result.documents.map((d) => d.id)).toEqual(['u1']);
            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toBeInstanceOf(UnparseableRecordError);
            if (result.errors[0] instanceof UnparseableRecordError) {
                expect(result.errors[0].recordIndex).toBe(0);
            }
        });
    });

    it('rejects a missing file with BackupIoError', async () => {
        await withTempDir(async (dir) => {
            const missing = path.join(dir, 'gone');
            await expect(new BackupParser().parse(missing)).rejects.toThrow(BackupIoError);
            await expect(new BackupParser().parse(missing)).rejects.toThrow(`File does not exist: ${missing}`);
        });
    });
});

describe('BackupParser (JSON lines)', () => {
    it('parses one document per line', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'export.jsonl', '{"a":1}\n{"b":2}\n');
            const result = await new BackupParser().parse(file);

            expect(result.metadata.format).toBe(InputFormat.JSON_LINES);
            expect(result.documents.map((d) => d.data)).toEqual([{ a: 1 }, { b: 2 }]);
            expect([...result.collections]).toEqual(['unknown']);
            expect(result.errors).toEqual([]);
            expect(result.metadata.blocksProcessed).toBe(0);
            expect(result.metadata.recordsProcessed).toBe(2);
            expect(result.metadata.fileSize).toBe(16);
        });
    });

    it('skips a bad line without affecting the others', async () => {
        await withTempDir(async (dir) => {
            const text = `${u1}\n{broken\n\n${o1}\n`;
            const file = await writeFixture(dir, 'export.jsonl', text);
            const result = await new BackupParser().parse(file);

            expect(result.documents.map((d) => d.id)).toEqual(['u1', 'o1']);
            expect(result.errors).toEqual([]);
            expect(result.metadata.recordsProcessed).toBe(3);
        });
    });
});

describe('BackupParser monitoring', () => {
    it('reports progress, completion and a success audit entry', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog([u1, u2]));
            const { handle, monitor } = fakeMonitor();

            await new BackupParser({ monitor }).parse(file);

            expect(monitor.startOperation).toHaveBeenCalledWith('parse_backup', { file_path: file });
            expect(handle.updateProgress).toHaveBeenCalledWith(2);
            expect(handle.completeSuccess).toHaveBeenCalledTimes(1);
            expect(handle.completeFailure).not.toHaveBeenCalled();
            expect(monitor.logAudit).toHaveBeenCalledWith({
                operationType: 'data_access',
                resourceType: 'backup_file',
                resourceId: file,
                action: 'parse_backup',
                result: { status: 'success' },
                details: {
                    file_path: file,
                    documents_parsed: '2',
                    collections_found: '1',
                    blocks_processed: '1',
                    file_size: String(LOG_BLOCK_SIZE),
                },
            });
        });
    });

    it('classifies a parse with errors as partial success', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog(['this is not json', u1]));
            const { monitor } = fakeMonitor();

            await new BackupParser({ monitor }).parse(file);

            expect(monitor.logAudit).toHaveBeenCalledWith(expect.objectContaining({
                result: { status: 'partial_success', message: '1 record(s) could not be decoded' },
            }));
        });
    });

    it('completes the operation as failed on a fatal error', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', padToBlock(frameRecord(RecordType.LAST, u1)));
            const { handle, monitor } = fakeMonitor();

            await expect(new BackupParser({ monitor }).parse(file)).rejects.toThrow(FragmentSequenceError);

            expect(handle.completeFailure).toHaveBeenCalledTimes(1);
            expect(handle.completeFailure.mock.calls[0][0]).toBeInstanceOf(FragmentSequenceError);
            expect(handle.completeSuccess).not.toHaveBeenCalled();
            expect(monitor.logAudit).not.toHaveBeenCalled();
        });
    });

    it('is not affected by a failing monitor', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog([u1]));
            const warn = vi.fn();
            const { monitor } = fakeMonitor();
            monitor.logAudit.mockImplementation(() => { throw new Error('boom'); });

            const result = await new BackupParser({ monitor, logger: { warn } }).parse(file);

            expect(result.metadata.documentCount).toBe(1);
            expect(warn).toHaveBeenCalledWith('[MONITOR] logAudit failed: boom');
        });
    });

    it('reports a rejected monitor promise to the logger', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog([u1]));
            const warn = vi.fn();
            const { monitor } = fakeMonitor();
            monitor.logAudit.mockImplementation(() => Promise.reject(new Error('later')));

            await new BackupParser({ monitor, logger: { warn } }).parse(file);
            await new Promise((resolve) => setImmediate(resolve));

            expect(warn).toHaveBeenCalledWith('[MONITOR] logAudit failed: later');
        });
    });

    it('feeds the in-memory monitoring system', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'output-0', buildLog([u1, o1]));
            const monitoring = new MonitoringSystem();

            await new BackupParser({ monitor: monitoring }).parse(file);

            const stats = monitoring.getSystemStats();
            expect(stats.activeOperations).toBe(0);
            expect(stats.completedOperations).toBe(1);
            expect(stats.totalRecordsProcessed).toBe(2);
            expect(stats.auditEntries).toBe(1);
            expect(monitoring.getRecentAuditEntries(1)[0].result).toEqual({ status: 'success' });
        });
    });
});

describe('FirestoreBackup.parse', () => {
    it('finds the data file inside an export directory', async () => {
        await withTempDir(async (dir) => {
            await writeFixture(dir, 'all_namespaces/kind_users/output-0', buildLog([u1]));
            await writeFixture(dir, 'all_namespaces/kind_users/a.export_metadata', 'meta');

            const result = await FirestoreBackup.parse(dir);

            expect(result.documents.map((d) => d.id)).toEqual(['u1']);
        });
    });
});
