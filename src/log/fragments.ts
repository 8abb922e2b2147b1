import type { BackupLogger } from '../backup-types.js';
import { FragmentSequenceError } from '../errors.js';
import { RecordType, type CompleteRecord, type RawRecord } from './format.js';

type FragmentState =
    | { kind: 'idle' }
    | { kind: 'accumulating'; parts: Uint8Array[]; blockIndex: number; offset: number };

/**
 * Reassembles logical records from the First/Middle/Last framing.
 *
 * Feed records in file order (block order, then in-block order). A continuation
 * record without an open fragment is fatal; a fragment still open when the input
 * ends is only logged and dropped.
 */
export class FragmentReconstructor {
    private state: FragmentState = { kind: 'idle' };
    private emitted: number = 0;
    private _abandoned: number = 0;
    private _droppedAtEnd: number = 0;

    constructor(private readonly logger: BackupLogger | null = null) { }

    /** Fragments discarded because a Full or First record interrupted them. */
    get abandonedFragments(): number {
        return this._abandoned;
    }

    /** Fragments still open when the input ended (0 or 1 per input). */
    get droppedFragments(): number {
        return this._droppedAtEnd;
    }

    get completeRecords(): number {
        return this.emitted;
    }

    get hasOpenFragment(): boolean {
        return this.state.kind === 'accumulating';
    }

    /**
     * @returns the completed record, or null while a fragment is still accumulating.
     * @throws FragmentSequenceError on Middle/Last without First.
     */
    push(record: RawRecord): CompleteRecord | null {
        switch (record.header.type) {
            case RecordType.FULL:
                this.abandonOpen(record, 'Full');
                return this.emit([record.payload]);

            case RecordType.FIRST:
                this.abandonOpen(record, 'First');
                this.state = {
                    kind: 'accumulating',
                    parts: [record.payload],
                    blockIndex: record.blockIndex,
                    offset: record.offset,
                };
                return null;

            case RecordType.MIDDLE:
                if (this.state.kind !== 'accumulating') {
                    throw new FragmentSequenceError(RecordType.MIDDLE, record.blockIndex, record.offset);
                }
                this.state.parts.push(record.payload);
                return null;

            case RecordType.LAST: {
                if (this.state.kind !== 'accumulating') {
                    throw new FragmentSequenceError(RecordType.LAST, record.blockIndex, record.offset);
                }
                const parts = this.state.parts;
                parts.push(record.payload);
                this.state = { kind: 'idle' };
                return this.emit(parts);
            }
        }
    }

    /**
     * Ends the input. An open fragment is dropped.
     */
    finish(): void {
        if (this.state.kind !== 'accumulating') return;
        this._droppedAtEnd++;
        this.logger?.warn?.(
            `[FRAGMENTS] Input ended inside a fragmented record started at block ${this.state.blockIndex}, offset ${this.state.offset} (${this.state.parts.length} piece(s)); dropping it.`
        );
        this.state = { kind: 'idle' };
    }

    private abandonOpen(record: RawRecord, by: string): void {
        if (this.state.kind !== 'accumulating') return;
        this._abandoned++;
        this.logger?.warn?.(
            `[FRAGMENTS] ${by} record at block ${record.blockIndex}, offset ${record.offset} interrupts the fragment started at block ${this.state.blockIndex}, offset ${this.state.offset}; discarding ${this.state.parts.length} piece(s).`
        );
        this.state = { kind: 'idle' };
    }

    private emit(parts: Uint8Array[]): CompleteRecord {
        return {
            index: this.emitted++,
            payload: concatBytes(parts),
            fragmentCount: parts.length,
        };
    }
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
    if (parts.length === 1) return parts[0];
    let total = 0;
    for (const part of parts) total += part.length;
    const out = new Uint8Array(total);
    let pos = 0;
    for (const part of parts) {
        out.set(part, pos);
        pos += part.length;
    }
    return out;
}
