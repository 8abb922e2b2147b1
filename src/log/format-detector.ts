import * as fs from 'fs/promises';
import { FORMAT_SAMPLE_SIZE, InputFormat, JSONL_PRINTABLE_RATIO } from './format.js';

export interface DetectOptions {
    /**
     * The sample stops before the end of the file, so a multi-byte character may be
     * cut at its end. Such a trailing partial sequence does not count as invalid UTF-8.
     */
    truncated?: boolean;
}

const CONTROL_CHAR = /\p{Cc}/u;

/**
 * Classifies a file prefix. Pure; never throws.
 */
export function detectFormat(sample: Uint8Array, options: DetectOptions = {}): InputFormat {
    let text: string;
    try {
        text = new TextDecoder('utf-8', { fatal: true }).decode(sample, { stream: options.truncated === true });
    } catch {
        return InputFormat.LEVELDB_LOG;
    }

    if (!text.includes('{') && !text.includes('[')) return InputFormat.LEVELDB_LOG;
    if (!text.includes('\n')) return InputFormat.LEVELDB_LOG;

    let total = 0;
    let printable = 0;
    for (const ch of text) {
        total++;
        if (ch === '\n' || ch === '\r' || ch === '\t' || !CONTROL_CHAR.test(ch)) printable++;
    }

    return printable / total >= JSONL_PRINTABLE_RATIO ? InputFormat.JSON_LINES : InputFormat.LEVELDB_LOG;
}

/**
 * Reads up to `sampleSize` bytes from the start of a file and classifies them.
 * Any I/O failure falls back to the log format.
 */
export async function sniffFormat(filePath: string, sampleSize: number = FORMAT_SAMPLE_SIZE): Promise<InputFormat> {
    let handle: fs.FileHandle | null = null;
    try {
        handle = await fs.open(filePath, 'r');
        const { size } = await handle.stat();
        const buffer = Buffer.alloc(Math.min(sampleSize, size));
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        return detectFormat(buffer.subarray(0, bytesRead), { truncated: size > bytesRead });
    } catch {
        return InputFormat.LEVELDB_LOG;
    } finally {
        await handle?.close().catch(() => undefined);
    }
}
