import type { BackupLogger } from '../backup-types.js';
import type { RecordCorruptionError } from '../errors.js';
import { LogBlockReader } from './block-reader.js';
import { FragmentReconstructor } from './fragments.js';
import { LOG_BLOCK_SIZE, type CompleteRecord, type RawRecord } from './format.js';
import { parseBlockRecords } from './record-parser.js';

export interface LogScanOptions {
    blockSize?: number;
    logger?: BackupLogger | null;
    /** Called for each corrupted span, in file order. */
    onRecordError?: (error: RecordCorruptionError) => void;
    /** Called for each record that passed header and checksum checks, before reassembly. */
    onRawRecord?: (record: RawRecord) => void;
    /** Called once per block, before its records are handled. */
    onBlock?: (blockIndex: number, totalBlocks: number) => void;
}

export interface LogScanStats {
    fileSize: number;
    blocksProcessed: number;
    /** Records that passed header and checksum validation. */
    rawRecords: number;
    completeRecords: number;
    recordErrors: RecordCorruptionError[];
    abandonedFragments: number;
    droppedFragments: number;
}

/**
 * Runs block reading, record parsing and fragment reassembly over one log file,
 * handing every complete record to `onRecord` as soon as it is available.
 *
 * Rejects with BackupIoError or FragmentSequenceError; everything else is counted.
 */
export async function scanLogFile(
    filePath: string,
    onRecord: (record: CompleteRecord) => void,
    options: LogScanOptions = {}
): Promise<LogScanStats> {
    const blockSize = options.blockSize ?? LOG_BLOCK_SIZE;
    const logger = options.logger ?? null;
    const reader = new LogBlockReader(filePath, blockSize);
    const fragments = new FragmentReconstructor(logger);
    const recordErrors: RecordCorruptionError[] = [];
    let rawRecords = 0;

    try {
        await reader.open();
        const totalBlocks = Math.ceil(reader.size / blockSize);
        logger?.debug?.(`[LOG] ${filePath}: ${reader.size} bytes, ${totalBlocks} block(s)`);

        for await (const block of reader.blocks()) {
            options.onBlock?.(block.index, totalBlocks);
            const { records, errors } = parseBlockRecords(block);
            for (const error of errors) {
                logger?.warn?.(`[LOG] ${error.message}`);
                recordErrors.push(error);
                options.onRecordError?.(error);
            }
            rawRecords += records.length;
            for (const record of records) {
                options.onRawRecord?.(record);
                const complete = fragments.push(record);
                if (complete) onRecord(complete);
            }
        }
        fragments.finish();
    } finally {
        await reader.close();
    }

    return {
        fileSize: reader.size,
        blocksProcessed: reader.blocksRead,
        rawRecords,
        completeRecords: fragments.completeRecords,
        recordErrors,
        abandonedFragments: fragments.abandonedFragments,
        droppedFragments: fragments.droppedFragments,
    };
}
