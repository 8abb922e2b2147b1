import type { DecodeError } from './errors.js';
import type { InputFormat } from './log/format.js';
import type { ParseMonitor } from './monitoring/monitor.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

export interface DocumentMetadata {
    createdAt?: Date;
    updatedAt?: Date;
    /** Resource path from `name`/`path`, or 'unknown'. */
    path: string;
    sizeBytes?: number;
}

export interface FirestoreDocument {
    id: string;
    collection: string;
    data: Record<string, JsonValue>;
    /** Always empty: nested collections are not walked. */
    subcollections: FirestoreDocument[];
    metadata: DocumentMetadata;
}

export interface BackupMetadata {
    fileSize: number;
    documentCount: number;
    collectionCount: number;
    blocksProcessed: number;
    /** Payloads handed to the document decoder (complete records, or non-blank lines). */
    recordsProcessed: number;
    format: InputFormat;
}

export interface ParseResult {
    documents: FirestoreDocument[];
    collections: Set<string>;
    metadata: BackupMetadata;
    errors: DecodeError[];
}

export type BackupLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export const consoleLogger: BackupLogger = {
    debug: (msg) => console.debug(msg),
    info: (msg) => console.info(msg),
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
};

export type BackupParserOptions = {
    /** Log block size in bytes. Default 32768. */
    blockSize?: number;
    /** Prefix length sniffed by the format detector. Default 8192. */
    sampleSize?: number;
    /** Optional logger hook; nothing is written to the console without one. */
    logger?: BackupLogger | null;
    /** Progress/audit collaborator. Defaults to a no-op monitor. */
    monitor?: ParseMonitor | null;
};
