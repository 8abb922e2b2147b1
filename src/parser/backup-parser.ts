import * as fs from 'fs/promises';
import type {
    BackupLogger,
    BackupMetadata,
    BackupParserOptions,
    FirestoreDocument,
    ParseResult,
} from '../backup-types.js';
import type { DecodeError } from '../errors.js';
import { decodeRecord, type DecodeOutcome } from '../firestore/document-decoder.js';
import { toIoError } from '../log/block-reader.js';
import { FORMAT_SAMPLE_SIZE, InputFormat, LOG_BLOCK_SIZE } from '../log/format.js';
import { sniffFormat } from '../log/format-detector.js';
import { scanLogFile } from '../log/scanner.js';
import {
    NOOP_OPERATION,
    NoopMonitor,
    classifyParseResult,
    notifyMonitor,
    type OperationHandle,
    type ParseMonitor,
} from '../monitoring/monitor.js';

/**
 * Accumulates decoder output for one parse call.
 */
class ParseAccumulator {
    readonly documents: FirestoreDocument[] = [];
    readonly collections = new Set<string>();
    readonly errors: DecodeError[] = [];
    recordsProcessed = 0;
    skipped = 0;

    constructor(private readonly logger: BackupLogger | null) { }

    add(outcome: DecodeOutcome): void {
        this.recordsProcessed++;
        switch (outcome.kind) {
            case 'document':
                this.documents.push(outcome.document);
                this.collections.add(outcome.document.collection);
                break;
            case 'skipped':
                this.skipped++;
                break;
            case 'error':
                this.logger?.warn?.(`[DECODER] ${outcome.error.message}`);
                this.errors.push(outcome.error);
                break;
        }
    }
}

/**
 * Parses one Firestore export backup into documents.
 *
 * Only I/O failures and a broken fragment sequence reject; every other problem
 * ends up in `ParseResult.errors`.
 */
export class BackupParser {
    private readonly options: Required<BackupParserOptions>;

    constructor(options: BackupParserOptions = {}) {
        const defaults: Required<BackupParserOptions> = {
            blockSize: LOG_BLOCK_SIZE,
            sampleSize: FORMAT_SAMPLE_SIZE,
            logger: null,
            monitor: NoopMonitor,
        };
        this.options = { ...defaults, ...options };
    }

    private get logger(): BackupLogger | null {
        return this.options.logger ?? null;
    }

    private get monitor(): ParseMonitor {
        return this.options.monitor ?? NoopMonitor;
    }

    async parse(filePath: string): Promise<ParseResult> {
        const operation = this.startOperation(filePath);
        this.logger?.info?.(`[PARSER] Parsing backup ${filePath}`);

        let result: ParseResult;
        try {
            const format = await sniffFormat(filePath, this.options.sampleSize);
            this.logger?.debug?.(`[PARSER] Detected format: ${format}`);
            result = format === InputFormat.JSON_LINES
                ? await this.parseJsonLines(filePath)
                : await this.parseLog(filePath);
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.logger?.error?.(`[PARSER] Parse of ${filePath} failed: ${failure.message}`);
            notifyMonitor(this.logger, 'completeFailure', () => operation.completeFailure(failure));
            throw error;
        }

        const { metadata } = result;
        this.logger?.info?.(
            `[PARSER] ${filePath}: ${metadata.documentCount} document(s) in ${metadata.collectionCount} collection(s), ` +
            `${metadata.recordsProcessed} record(s), ${metadata.blocksProcessed} block(s), ${result.errors.length} error(s)`
        );

        notifyMonitor(this.logger, 'updateProgress', () => operation.updateProgress(metadata.documentCount));
        notifyMonitor(this.logger, 'completeSuccess', () => operation.completeSuccess());
        notifyMonitor(this.logger, 'logAudit', () => this.monitor.logAudit({
            operationType: 'data_access',
            resourceType: 'backup_file',
            resourceId: filePath,
            action: 'parse_backup',
            result: classifyParseResult(metadata.documentCount, result.errors.length),
            details: {
                file_path: filePath,
                documents_parsed: String(metadata.documentCount),
                collections_found: String(metadata.collectionCount),
                blocks_processed: String(metadata.blocksProcessed),
                file_size: String(metadata.fileSize),
            },
        }));

        return result;
    }

    private async parseLog(filePath: string): Promise<ParseResult> {
        const acc = new ParseAccumulator(this.logger);
        const stats = await scanLogFile(
            filePath,
            (record) => acc.add(decodeRecord(record.payload, record.index, 'log')),
            {
                blockSize: this.options.blockSize,
                logger: this.logger,
                onRecordError: (error) => acc.errors.push(error),
            }
        );

        return this.finish(acc, {
            fileSize: stats.fileSize,
            blocksProcessed: stats.blocksProcessed,
            format: InputFormat.LEVELDB_LOG,
        });
    }

    private async parseJsonLines(filePath: string): Promise<ParseResult> {
        let raw: Buffer;
        try {
            raw = await fs.readFile(filePath);
        } catch (error) {
            throw toIoError(error, filePath, 'read');
        }

        const acc = new ParseAccumulator(this.logger);
        let index = 0;
        for (const line of raw.toString('utf8').split('\n')) {
            if (line.trim().length === 0) continue;
            acc.add(decodeRecord(line, index++, 'jsonl'));
        }

        return this.finish(acc, {
            fileSize: raw.length,
            blocksProcessed: 0,
            format: InputFormat.JSON_LINES,
        });
    }

    private finish(
        acc: ParseAccumulator,
        file: Pick<BackupMetadata, 'fileSize' | 'blocksProcessed' | 'format'>
    ): ParseResult {
        if (acc.skipped > 0) {
            this.logger?.debug?.(`[PARSER] Skipped ${acc.skipped} non-document record(s)`);
        }
        return {
            documents: acc.documents,
            collections: acc.collections,
            errors: acc.errors,
            metadata: {
                ...file,
                documentCount: acc.documents.length,
                collectionCount: acc.collections.size,
                recordsProcessed: acc.recordsProcessed,
            },
        };
    }

    private startOperation(filePath: string): OperationHandle {
        try {
            return this.monitor.startOperation('parse_backup', { file_path: filePath });
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.logger?.warn?.(`[MONITOR] startOperation failed: ${detail}`);
            return NOOP_OPERATION;
        }
    }
}
