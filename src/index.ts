/**
 * Firestore backup reader public API
 *
 * @module firestore-backup-reader
 */

import type { BackupParserOptions, ParseResult } from './backup-types.js';
import type { InputFormat } from './log/format.js';
import { sniffFormat } from './log/format-detector.js';
import { BackupParser } from './parser/backup-parser.js';
import { resolveBackupFile } from './parser/resolve-backup.js';
import { BackupValidator, type BackupValidatorOptions, type ValidationReport } from './parser/validator.js';

export type {
    JsonPrimitive,
    JsonValue,
    JsonObject,
    DocumentMetadata,
    FirestoreDocument,
    BackupMetadata,
    ParseResult,
    BackupLogger as Logger,
    BackupParserOptions as ParserOptions,
} from './backup-types.js';
export { consoleLogger } from './backup-types.js';
export {
    BackupError,
    BackupIoError,
    FragmentSequenceError,
    RecordCorruptionError,
    UnparseableRecordError,
} from './errors.js';
export type { DecodeError, RecordCorruptionReason } from './errors.js';
export { InputFormat, RecordType, LOG_BLOCK_SIZE, LOG_HEADER_SIZE, FORMAT_SAMPLE_SIZE } from './log/format.js';
export { detectFormat, sniffFormat } from './log/format-detector.js';
export { unwrapValue, unwrapFields } from './firestore/values.js';
export { BackupParser } from './parser/backup-parser.js';
export { resolveBackupFile } from './parser/resolve-backup.js';
export { BackupValidator, formatValidationReport } from './parser/validator.js';
export type {
    BackupValidatorOptions as ValidatorOptions,
    ValidationReport,
    ProgressInfo,
    FileInfo,
    StructureInfo,
    IntegrityInfo,
} from './parser/validator.js';
export * from './monitoring/index.js';

export const FirestoreBackup = {
    /**
     * Parses a backup file, or the data file found inside an export directory.
     */
    parse: async (inputPath: string, options?: BackupParserOptions): Promise<ParseResult> => {
        const filePath = await resolveBackupFile(inputPath);
        return await new BackupParser(options).parse(filePath);
    },

    /**
     * Classifies a file as log or JSON lines from its first bytes.
     */
    detect: async (filePath: string): Promise<InputFormat> => sniffFormat(filePath),

    /**
     * Checks a backup without collecting documents.
     */
    validate: async (filePath: string, options?: BackupValidatorOptions): Promise<ValidationReport> => {
        return await new BackupValidator(options).validate(filePath);
    },

    resolve: resolveBackupFile,

    Parser: BackupParser,

    Validator: BackupValidator,
};

export default FirestoreBackup;
