import { RecordCorruptionError, type RecordCorruptionReason } from '../errors.js';
import { recordChecksum } from './integrity.js';
import { LOG_HEADER_SIZE, isRecordType, type RawBlock, type RawRecord, type RecordHeader } from './format.js';

export interface BlockScanResult {
    records: RawRecord[];
    errors: RecordCorruptionError[];
}

type HeaderAttempt =
    | { ok: true; record: RawRecord; next: number }
    | { ok: false; reason: RecordCorruptionReason; detail: string; frameEnd?: number };

/**
 * Splits one block into its records.
 *
 * A failure at some offset resumes the scan at offset + 1. One error is reported
 * per contiguous corrupted span; failures while resynchronising extend that
 * error's `skippedBytes` instead of adding new entries. A span that began with a
 * well-framed record (checksum failure) ends where that frame ends, so adjacent
 * corrupted records are reported separately.
 */
export function parseBlockRecords(block: RawBlock): BlockScanResult {
    const data = block.data;
    const records: RawRecord[] = [];
    const errors: RecordCorruptionError[] = [];
    const lastNonZero = findLastNonZero(data);

    let offset = 0;
    let pending: RecordCorruptionError | null = null;
    let pendingFrameEnd: number | null = null;

    while (offset < data.length) {
        // Remaining bytes all zero: block trailer / padding
        if (offset > lastNonZero) break;

        const attempt = readRecordAt(block, offset);
        if (attempt.ok) {
            if (pending) {
                pending.skippedBytes = offset - pending.offset;
                pending = null;
            }
            records.push(attempt.record);
            offset = attempt.next;
            continue;
        }

        if (pending && offset === pendingFrameEnd) {
            pending.skippedBytes = offset - pending.offset;
            pending = null;
        }
        if (!pending) {
            pending = new RecordCorruptionError(attempt.reason, block.index, offset, attempt.detail);
            pendingFrameEnd = attempt.frameEnd ?? null;
            errors.push(pending);
        }
        offset++;
    }

    if (pending) {
        pending.skippedBytes = Math.min(offset, lastNonZero + 1) - pending.offset;
    }

    return { records, errors };
}

export function parseRecordHeader(data: Uint8Array, offset: number): RecordHeader | null {
    if (offset + LOG_HEADER_SIZE > data.length) return null;
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const type = data[offset + 6];
    if (!isRecordType(type)) return null;
    return {
        checksum: view.getUint32(offset, true),
        length: view.getUint16(offset + 4, true),
        type,
    };
}

function readRecordAt(block: RawBlock, offset: number): HeaderAttempt {
    const data = block.data;
    if (offset + LOG_HEADER_SIZE > data.length) {
        return { ok: false, reason: 'truncated_header', detail: `Record header needs ${LOG_HEADER_SIZE} bytes, ${data.length - offset} left` };
    }

    const typeByte = data[offset + 6];
    const header = parseRecordHeader(data, offset);
    if (!header) {
        return { ok: false, reason: 'invalid_type', detail: `Invalid record type: ${typeByte}` };
    }

    const start = offset + LOG_HEADER_SIZE;
    const end = start + header.length;
    if (end > data.length) {
        return { ok: false, reason: 'truncated_record', detail: `Record length ${header.length} exceeds block bounds` };
    }

    const payload = data.subarray(start, end);
    const expected = recordChecksum(header.type, payload);
    if (expected !== header.checksum) {
        return {
            ok: false,
            reason: 'checksum_mismatch',
            detail: `Checksum mismatch: expected ${hex(expected)}, found ${hex(header.checksum)}`,
            frameEnd: end,
        };
    }

    return {
        ok: true,
        record: { header, payload, blockIndex: block.index, offset },
        next: end,
    };
}

function findLastNonZero(data: Uint8Array): number {
    for (let i = data.length - 1; i >= 0; i--) {
        if (data[i] !== 0) return i;
    }
    return -1;
}

function hex(value: number): string {
    return '0x' + value.toString(16).padStart(8, '0');
}
