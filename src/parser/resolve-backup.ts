import * as fs from 'fs/promises';
import * as path from 'path';
import { BackupIoError } from '../errors.js';
import { toIoError } from '../log/block-reader.js';

/** Data file name used by Firestore managed exports. */
export const EXPORT_DATA_FILE = 'output-0';

/**
 * Turns a user-supplied path into the backup file to parse.
 *
 * A file is returned as is. For a directory, the first `output-0` found by a
 * depth-first walk wins; failing that, the first regular file of the same walk.
 * Entries are visited in name order.
 */
export async function resolveBackupFile(inputPath: string): Promise<string> {
    let stat;
    try {
        stat = await fs.stat(inputPath);
    } catch (error) {
        throw toIoError(error, inputPath, 'stat');
    }

    if (stat.isFile()) return inputPath;
    if (!stat.isDirectory()) {
        throw new BackupIoError(`Path is neither a file nor a directory: ${inputPath}`, inputPath);
    }

    const named = await findFile(inputPath, (name) => name === EXPORT_DATA_FILE);
    if (named) return named;

    const first = await findFile(inputPath, () => true);
    if (first) return first;

    throw new BackupIoError(`No backup file found in directory: ${inputPath}`, inputPath);
}

async function findFile(dir: string, accept: (name: string) => boolean): Promise<string | null> {
    let entries;
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
        throw toIoError(error, dir, 'list');
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isFile() && accept(entry.name)) return full;
        if (entry.isDirectory()) {
            const nested = await findFile(full, accept);
            if (nested) return nested;
        }
    }
    return null;
}
