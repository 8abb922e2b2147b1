import * as fs from 'fs/promises';
import * as path from 'path';
import { BackupIoError } from '../src/errors.js';
import { resolveBackupFile } from '../src/parser/resolve-backup.js';
import { withTempDir, writeFixture } from './helpers/log-builder.js';

describe('resolveBackupFile', () => {
    it('returns a file path unchanged', async () => {
        await withTempDir(async (dir) => {
            const file = await writeFixture(dir, 'backup.log', 'x');
            expect(await resolveBackupFile(file)).toBe(file);
        });
    });

    it('prefers output-0 anywhere in the tree', async () => {
        await withTempDir(async (dir) => {
            await writeFixture(dir, 'a.export_metadata', 'meta');
            const data = await writeFixture(dir, 'all_namespaces/kind_users/output-0', 'data');

            expect(await resolveBackupFile(dir)).toBe(data);
        });
    });

    it('falls back to the first regular file in name order', async () => {
        await withTempDir(async (dir) => {
            await writeFixture(dir, 'b.dat', 'b');
            const nested = await writeFixture(dir, 'a/c.dat', 'c');

            expect(await resolveBackupFile(dir)).toBe(nested);
        });
    });

    it('rejects an empty directory', async () => {
        await withTempDir(async (dir) => {
            await fs.mkdir(path.join(dir, 'empty'));
            const target = path.join(dir, 'empty');

            await expect(resolveBackupFile(target)).rejects.toBeInstanceOf(BackupIoError);
            await expect(resolveBackupFile(target)).rejects.toThrow(`No backup file found in directory: ${target}`);
        });
    });

    it('rejects a missing path', async () => {
        await withTempDir(async (dir) => {
            const missing = path.join(dir, 'nowhere');
            await expect(resolveBackupFile(missing)).rejects.toThrow(`File does not exist: ${missing}`);
        });
    });
});
