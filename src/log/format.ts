/** Size of one aligned block of the log file. */
export const LOG_BLOCK_SIZE = 32768;

/** checksum(4) + length(2) + type(1) */
export const LOG_HEADER_SIZE = 7;

/** Bytes sampled from the start of a file by the format detector. */
export const FORMAT_SAMPLE_SIZE = 8192;

/** Minimum share of printable characters for a sample to count as JSON lines. */
export const JSONL_PRINTABLE_RATIO = 0.95;

/** Log payloads shorter than this are treated as metadata, not documents. */
export const MIN_DOCUMENT_PAYLOAD_BYTES = 10;

export enum RecordType {
    FULL = 1,
    FIRST = 2,
    MIDDLE = 3,
    LAST = 4,
}

export enum InputFormat {
    LEVELDB_LOG = 'leveldb_log',
    JSON_LINES = 'json_lines',
}

export interface RecordHeader {
    checksum: number; // u32
    length: number;   // u16
    type: RecordType;
}

export interface RawBlock {
    index: number;
    /** Absolute file offset of the first byte (index * blockSize). */
    offset: number;
    data: Uint8Array;
}

export interface RawRecord {
    header: RecordHeader;
    payload: Uint8Array;
    blockIndex: number;
    /** Offset of the header inside its block. */
    offset: number;
}

export interface CompleteRecord {
    /** Ordinal among the complete records of one file. */
    index: number;
    payload: Uint8Array;
    /** 1 for a Full record, otherwise the number of First/Middle/Last pieces. */
    fragmentCount: number;
}

export function isRecordType(value: number): value is RecordType {
    return value >= RecordType.FULL && value <= RecordType.LAST;
}
