import { RecordType } from './log/format.js';

export class BackupError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'BackupError';
    }
}

/**
 * Fatal: the backup file could not be opened, stat'ed or read.
 */
export class BackupIoError extends BackupError {
    constructor(message: string, public readonly filePath: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'BackupIoError';
    }
}

/**
 * Fatal: a continuation record (Middle/Last) arrived while no fragment was open.
 */
export class FragmentSequenceError extends BackupError {
    constructor(
        public readonly recordType: RecordType,
        public readonly blockIndex: number,
        public readonly offset: number
    ) {
        super(`Unexpected ${RecordType[recordType]} record without a preceding First record (block ${blockIndex}, offset ${offset})`);
        this.name = 'FragmentSequenceError';
    }
}

export type RecordCorruptionReason =
    | 'truncated_header'
    | 'invalid_type'
    | 'truncated_record'
    | 'checksum_mismatch';

/**
 * Local: a corrupted span inside a block. Scanning resumes after it.
 */
export class RecordCorruptionError extends BackupError {
    /** Bytes passed over while resynchronising, counted from `offset`. */
    public skippedBytes: number = 1;

    constructor(
        public readonly reason: RecordCorruptionReason,
        public readonly blockIndex: number,
        public readonly offset: number,
        detail: string
    ) {
        super(`${detail} (block ${blockIndex}, offset ${offset})`);
        this.name = 'RecordCorruptionError';
    }
}

/**
 * Local: a complete record whose payload is not valid JSON.
 */
export class UnparseableRecordError extends BackupError {
    constructor(
        public readonly recordIndex: number,
        public readonly byteLength: number,
        originalError?: unknown
    ) {
        super(`Unparseable record #${recordIndex} (${byteLength} bytes): ${describeCause(originalError)}`, originalError);
        this.name = 'UnparseableRecordError';
    }
}

export type DecodeError = RecordCorruptionError | UnparseableRecordError;

function describeCause(error: unknown): string {
    if (error instanceof Error) return error.message;
    return error === undefined ? 'invalid JSON' : String(error);
}
