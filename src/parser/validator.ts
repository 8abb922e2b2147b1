import * as fs from 'fs/promises';
import type { BackupLogger } from '../backup-types.js';
import { FragmentSequenceError } from '../errors.js';
import { decodeRecord, type DecodeOutcome } from '../firestore/document-decoder.js';
import { FORMAT_SAMPLE_SIZE, InputFormat, LOG_BLOCK_SIZE } from '../log/format.js';
import { sniffFormat } from '../log/format-detector.js';
import { scanLogFile } from '../log/scanner.js';

/** Smallest log file worth scanning. */
export const MIN_LOG_FILE_SIZE = 1024;

export const CORRUPTION_WARNING_RATIO = 0.1;
export const INTEGRITY_WARNING_SCORE = 0.9;

export interface FileInfo {
    filePath: string;
    fileSize: number;
    isReadable: boolean;
    lastModified: Date | null;
}

export interface StructureInfo {
    totalBlocks: number;
    /** Valid records plus corrupted spans. */
    totalRecords: number;
    /** Physical records that passed header and checksum checks; a split record counts each piece. */
    validRecords: number;
    corruptedRecords: number;
    metadataRecords: number;
    documentRecords: number;
}

export interface IntegrityInfo {
    checksumFailures: number;
    /** Fragments abandoned mid-file or left open at end of input. */
    incompleteRecords: number;
    parsingErrors: number;
    /** 0.0 to 1.0; 0 when there are no records. */
    overallIntegrityScore: number;
}

export interface ValidationReport {
    isValid: boolean;
    format: InputFormat | null;
    errors: string[];
    warnings: string[];
    fileInfo: FileInfo;
    structureInfo: StructureInfo;
    integrityInfo: IntegrityInfo;
}

export interface ProgressInfo {
    step: string;
    current: number;
    total: number;
    percentage: number;
}

export type BackupValidatorOptions = {
    blockSize?: number;
    sampleSize?: number;
    logger?: BackupLogger | null;
    onProgress?: ((progress: ProgressInfo) => void) | null;
};

interface RecordTally {
    blocks: number;
    validRecords: number;
    corruptedRecords: number;
    checksumFailures: number;
    incompleteRecords: number;
    metadataRecords: number;
    documentRecords: number;
    parsingErrors: number;
}

function emptyTally(): RecordTally {
    return {
        blocks: 0,
        validRecords: 0,
        corruptedRecords: 0,
        checksumFailures: 0,
        incompleteRecords: 0,
        metadataRecords: 0,
        documentRecords: 0,
        parsingErrors: 0,
    };
}

/**
 * Checks a backup file without producing documents. Problems are reported in the
 * returned ValidationReport; `validate` does not reject.
 */
export class BackupValidator {
    private readonly options: Required<BackupValidatorOptions>;

    constructor(options: BackupValidatorOptions = {}) {
        const defaults: Required<BackupValidatorOptions> = {
            blockSize: LOG_BLOCK_SIZE,
            sampleSize: FORMAT_SAMPLE_SIZE,
            logger: null,
            onProgress: null,
        };
        this.options = { ...defaults, ...options };
    }

    private get logger(): BackupLogger | null {
        return this.options.logger ?? null;
    }

    async validate(filePath: string): Promise<ValidationReport> {
        this.logger?.info?.(`[VALIDATOR] Validating ${filePath}`);
        const errors: string[] = [];
        const warnings: string[] = [];

        this.reportProgress('Validating file access', 0, 100);
        const access = await this.checkFileAccess(filePath);
        if ('error' in access) {
            errors.push(access.error);
            return this.finish(filePath, null, errors, warnings, access.fileInfo, emptyTally());
        }
        const { fileInfo } = access;

        const format = await sniffFormat(filePath, this.options.sampleSize);
        if (format === InputFormat.LEVELDB_LOG && fileInfo.fileSize < MIN_LOG_FILE_SIZE) {
            errors.push(`File too small to be a valid LevelDB backup: ${fileInfo.fileSize} bytes`);
            return this.finish(filePath, format, errors, warnings, fileInfo, emptyTally());
        }

        const tally = format === InputFormat.JSON_LINES
            ? await this.scanJsonLines(filePath, errors)
            : await this.scanLog(filePath, errors);

        const total = tally.validRecords + tally.corruptedRecords;
        if (format === InputFormat.LEVELDB_LOG && tally.blocks === 0) {
            errors.push('No blocks found in LevelDB file');
        }
        if (total === 0) {
            errors.push(format === InputFormat.JSON_LINES
                ? 'No records found in JSON-lines file'
                : 'No records found in LevelDB file');
        }
        if (total > 0 && tally.corruptedRecords > total * CORRUPTION_WARNING_RATIO) {
            const pct = (tally.corruptedRecords / total) * 100;
            warnings.push(`High number of corrupted records: ${tally.corruptedRecords} out of ${total} (${pct.toFixed(1)}%)`);
        }

        this.reportProgress('Validating data integrity', 60, 100);
        const score = integrityScore(tally);
        if (total > 0 && score < INTEGRITY_WARNING_SCORE) {
            warnings.push(`Low integrity score: ${(score * 100).toFixed(1)}%`);
        }

        this.reportProgress('Validating Firestore format', 80, 100);
        if (tally.documentRecords === 0) {
            warnings.push('No Firestore documents found in backup');
        }
        if (tally.parsingErrors > 0) {
            warnings.push(`Encountered ${tally.parsingErrors} parsing error(s) while validating format`);
        }

        return this.finish(filePath, format, errors, warnings, fileInfo, tally);
    }

    private async checkFileAccess(
        filePath: string
    ): Promise<{ fileInfo: FileInfo } | { fileInfo: FileInfo; error: string }> {
        const unreadable: FileInfo = { filePath, fileSize: 0, isReadable: false, lastModified: null };

        let stat;
        try {
            stat = await fs.stat(filePath);
        } catch (error) {
            const code = error instanceof Error ? (error as NodeJS.ErrnoException).code : undefined;
            if (code === 'ENOENT') return { fileInfo: unreadable, error: `File does not exist: ${filePath}` };
            const detail = error instanceof Error ? error.message : String(error);
            return { fileInfo: unreadable, error: `Failed to read file metadata: ${detail}` };
        }
        if (!stat.isFile()) {
            return { fileInfo: unreadable, error: `Path is not a file: ${filePath}` };
        }

        let isReadable = true;
        try {
            await fs.access(filePath, fs.constants.R_OK);
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.logger?.warn?.(`[VALIDATOR] ${filePath} is not readable: ${detail}`);
            isReadable = false;
        }

        const fileInfo: FileInfo = { filePath, fileSize: stat.size, isReadable, lastModified: stat.mtime };
        if (!isReadable) return { fileInfo, error: `File is not readable: ${filePath}` };
        return { fileInfo };
    }

    private async scanLog(filePath: string, errors: string[]): Promise<RecordTally> {
        this.reportProgress('Validating LevelDB structure', 20, 100);
        const tally = emptyTally();

        try {
            const stats = await scanLogFile(
                filePath,
                (record) => countOutcome(tally, decodeRecord(record.payload, record.index, 'log')),
                {
                    blockSize: this.options.blockSize,
                    logger: this.logger,
                    onBlock: (blockIndex, totalBlocks) => {
                        tally.blocks = blockIndex + 1;
                        this.reportProgress('Validating block structure', blockIndex, totalBlocks);
                    },
                    onRawRecord: () => {
                        tally.validRecords++;
                    },
                    onRecordError: (error) => {
                        tally.corruptedRecords++;
                        if (error.reason === 'checksum_mismatch') tally.checksumFailures++;
                    },
                }
            );
            tally.blocks = stats.blocksProcessed;
            tally.incompleteRecords = stats.abandonedFragments + stats.droppedFragments;
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.logger?.warn?.(`[VALIDATOR] Scan of ${filePath} stopped: ${detail}`);
            // Counts reflect what was read before the scan stopped.
            if (error instanceof FragmentSequenceError) {
                tally.incompleteRecords++;
                errors.push(`Broken fragment sequence: ${detail}`);
            } else {
                errors.push(`Failed to read LevelDB blocks: ${detail}`);
            }
        }
        return tally;
    }

    private async scanJsonLines(filePath: string, errors: string[]): Promise<RecordTally> {
        this.reportProgress('Validating JSON lines', 20, 100);
        const tally = emptyTally();

        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            errors.push(`Failed to read JSON-lines file: ${detail}`);
            return tally;
        }

        let index = 0;
        for (const line of text.split('\n')) {
            if (line.trim().length === 0) continue;
            const outcome = decodeRecord(line, index++, 'jsonl');
            if (outcome.kind === 'skipped' && outcome.reason === 'invalid_json') {
                tally.corruptedRecords++;
                tally.parsingErrors++;
                continue;
            }
            tally.validRecords++;
            countOutcome(tally, outcome);
        }
        return tally;
    }

    private finish(
        filePath: string,
        format: InputFormat | null,
        errors: string[],
        warnings: string[],
        fileInfo: FileInfo,
        tally: RecordTally
    ): ValidationReport {
        this.reportProgress('Validation complete', 100, 100);
        const isValid = errors.length === 0;
        this.logger?.info?.(
            `[VALIDATOR] ${filePath}: ${isValid ? 'VALID' : 'INVALID'} (errors: ${errors.length}, warnings: ${warnings.length})`
        );

        return {
            isValid,
            format,
            errors,
            warnings,
            fileInfo,
            structureInfo: {
                totalBlocks: tally.blocks,
                totalRecords: tally.validRecords + tally.corruptedRecords,
                validRecords: tally.validRecords,
                corruptedRecords: tally.corruptedRecords,
                metadataRecords: tally.metadataRecords,
                documentRecords: tally.documentRecords,
            },
            integrityInfo: {
                checksumFailures: tally.checksumFailures,
                incompleteRecords: tally.incompleteRecords,
                parsingErrors: tally.parsingErrors,
                overallIntegrityScore: integrityScore(tally),
            },
        };
    }

    private reportProgress(step: string, current: number, total: number): void {
        const onProgress = this.options.onProgress;
        if (!onProgress) return;
        const percentage = total > 0 ? (current / total) * 100 : 0;
        try {
            onProgress({ step, current, total, percentage });
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.logger?.warn?.(`[VALIDATOR] Progress callback failed: ${detail}`);
        }
    }
}

function countOutcome(tally: RecordTally, outcome: DecodeOutcome): void {
    if (outcome.kind === 'document') tally.documentRecords++;
    else if (outcome.kind === 'error') tally.parsingErrors++;
    else if (outcome.reason === 'metadata') tally.metadataRecords++;
}

function integrityScore(tally: RecordTally): number {
    const total = tally.validRecords + tally.corruptedRecords;
    if (total === 0) return 0;
    const failed = tally.checksumFailures + tally.incompleteRecords + tally.parsingErrors;
    return Math.max(0, 1 - failed / total);
}

/**
 * Renders a report as plain text.
 */
export function formatValidationReport(report: ValidationReport): string {
    const { fileInfo, structureInfo, integrityInfo } = report;
    const lines: string[] = [
        '=== Firestore Backup Validation Report ===',
        '',
        `Overall Status: ${report.isValid ? 'VALID' : 'INVALID'}`,
        '',
        '--- File Information ---',
        `Path: ${fileInfo.filePath}`,
        `Size: ${fileInfo.fileSize} bytes (${(fileInfo.fileSize / 1024 / 1024).toFixed(2)} MB)`,
        `Readable: ${fileInfo.isReadable}`,
    ];
    if (fileInfo.lastModified) lines.push(`Last Modified: ${fileInfo.lastModified.toISOString()}`);
    if (report.format) lines.push(`Format: ${report.format}`);

    lines.push(
        '',
        '--- Structure Information ---',
        `Total Blocks: ${structureInfo.totalBlocks}`,
        `Total Records: ${structureInfo.totalRecords}`,
        `Valid Records: ${structureInfo.validRecords}`,
        `Corrupted Records: ${structureInfo.corruptedRecords}`,
        `Metadata Records: ${structureInfo.metadataRecords}`,
        `Document Records: ${structureInfo.documentRecords}`,
        '',
        '--- Integrity Information ---',
        `Integrity Score: ${(integrityInfo.overallIntegrityScore * 100).toFixed(1)}%`,
        `Checksum Failures: ${integrityInfo.checksumFailures}`,
        `Incomplete Records: ${integrityInfo.incompleteRecords}`,
        `Parsing Errors: ${integrityInfo.parsingErrors}`,
    );

    if (report.errors.length > 0) {
        lines.push('', '--- Errors ---');
        report.errors.forEach((error, i) => lines.push(`${i + 1}. ${error}`));
    }
    if (report.warnings.length > 0) {
        lines.push('', '--- Warnings ---');
        report.warnings.forEach((warning, i) => lines.push(`${i + 1}. ${warning}`));
    }

    lines.push('', '=== End of Report ===', '');
    return lines.join('\n');
}
