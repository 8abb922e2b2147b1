import * as fs from 'fs/promises';
import { BackupIoError } from '../errors.js';
import { LOG_BLOCK_SIZE, type RawBlock } from './format.js';

/**
 * Reads a log file in fixed-size aligned blocks. Only the current block is held in memory.
 */
export class LogBlockReader {
    private handle: fs.FileHandle | null = null;
    private _size: number = 0;
    private _blocksRead: number = 0;

    constructor(
        public readonly filePath: string,
        public readonly blockSize: number = LOG_BLOCK_SIZE
    ) {
        if (!Number.isInteger(blockSize) || blockSize <= 0) {
            throw new RangeError(`Invalid block size: ${blockSize}`);
        }
    }

    get size(): number {
        return this._size;
    }

    get blocksRead(): number {
        return this._blocksRead;
    }

    async open(): Promise<void> {
        if (this.handle) return;
        try {
            this.handle = await fs.open(this.filePath, 'r');
        } catch (error) {
            throw toIoError(error, this.filePath, 'open');
        }
        try {
            const stat = await this.handle.stat();
            this._size = stat.size;
        } catch (error) {
            await this.close();
            throw toIoError(error, this.filePath, 'stat');
        }
    }

    /**
     * Yields blocks in file order; the final block may be shorter than `blockSize`.
     */
    async *blocks(): AsyncGenerator<RawBlock> {
        await this.open();
        const handle = this.handle;
        if (!handle) return;

        while (this._blocksRead * this.blockSize < this._size) {
            const position = this._blocksRead * this.blockSize;
            const buffer = Buffer.alloc(Math.min(this.blockSize, this._size - position));
            let bytesRead: number;
            try {
                ({ bytesRead } = await handle.read(buffer, 0, buffer.length, position));
            } catch (error) {
                throw toIoError(error, this.filePath, `read at offset ${position}`);
            }
            if (bytesRead === 0) break; // file shrank under us

            const index = this._blocksRead++;
            yield {
                index,
                offset: position,
                data: new Uint8Array(buffer.buffer, buffer.byteOffset, bytesRead),
            };
        }
    }

    async close(): Promise<void> {
        if (!this.handle) return;
        const handle = this.handle;
        this.handle = null;
        await handle.close();
    }
}

/**
 * Reads every block of a file. Convenience for tests and small inputs.
 */
export async function readAllBlocks(filePath: string, blockSize: number = LOG_BLOCK_SIZE): Promise<RawBlock[]> {
    const reader = new LogBlockReader(filePath, blockSize);
    const blocks: RawBlock[] = [];
    try {
        for await (const block of reader.blocks()) blocks.push(block);
    } finally {
        await reader.close();
    }
    return blocks;
}

export function toIoError(error: unknown, filePath: string, action: string): BackupIoError {
    const errno = error instanceof Error ? (error as NodeJS.ErrnoException).code : undefined;
    if (errno === 'ENOENT') {
        return new BackupIoError(`File does not exist: ${filePath}`, filePath, error);
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new BackupIoError(`Failed to ${action} ${filePath}: ${detail}`, filePath, error);
}
