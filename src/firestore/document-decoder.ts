import type { DocumentMetadata, FirestoreDocument, JsonObject, JsonValue } from '../backup-types.js';
import { UnparseableRecordError } from '../errors.js';
import { MIN_DOCUMENT_PAYLOAD_BYTES } from '../log/format.js';
import { isJsonObject, unwrapFields } from './values.js';

export const UNKNOWN_IDENTITY = 'unknown';

/** Top-level keys that describe the document rather than hold its data. */
export const RESERVED_DOCUMENT_KEYS: ReadonlySet<string> = new Set([
    'name',
    'path',
    'id',
    'collection',
    'fields',
    'createTime',
    'updateTime',
    'readTime',
]);

const METADATA_MARKERS = ['_metadata', '_system', '__internal'];

const RFC3339 = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/** Where a payload came from: a complete log record, or one line of a JSON export. */
export type RecordSource = 'log' | 'jsonl';

export type SkipReason = 'metadata' | 'not_object' | 'invalid_json';

export type DecodeOutcome =
    | { kind: 'document'; document: FirestoreDocument }
    | { kind: 'skipped'; reason: SkipReason }
    | { kind: 'error'; error: UnparseableRecordError };

const lossyDecoder = new TextDecoder('utf-8');
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decodes one payload into a document.
 *
 * Metadata-shaped payloads are skipped without an error. Invalid JSON is an
 * error for log records and silently skipped for JSON-lines input.
 */
export function decodeRecord(payload: Uint8Array | string, index: number, source: RecordSource): DecodeOutcome {
    const byteLength = typeof payload === 'string' ? Buffer.byteLength(payload, 'utf8') : payload.length;
    const rawText = typeof payload === 'string' ? payload : lossyDecoder.decode(payload);

    if (isMetadataRecord(rawText, byteLength, source)) {
        return { kind: 'skipped', reason: 'metadata' };
    }

    let parsed: JsonValue;
    try {
        const text = typeof payload === 'string' ? payload : strictDecoder.decode(payload);
        parsed = JSON.parse(text) as JsonValue;
    } catch (error) {
        if (source === 'jsonl') return { kind: 'skipped', reason: 'invalid_json' };
        return { kind: 'error', error: new UnparseableRecordError(index, byteLength, error) };
    }

    if (!isJsonObject(parsed)) {
        return { kind: 'skipped', reason: 'not_object' };
    }

    return { kind: 'document', document: buildDocument(parsed) };
}

/**
 * Heuristic for export bookkeeping records. The length rule only applies to log
 * records; a JSON export line such as `{"a":1}` is a document.
 */
export function isMetadataRecord(text: string, byteLength: number, source: RecordSource): boolean {
    if (source === 'log' && byteLength < MIN_DOCUMENT_PAYLOAD_BYTES) return true;
    if (text.startsWith('__')) return true;
    return METADATA_MARKERS.some((marker) => text.includes(marker));
}

export function buildDocument(object: JsonObject): FirestoreDocument {
    const { collection, id } = resolveIdentity(object);
    const fields = object.fields;

    return {
        id,
        collection,
        data: isJsonObject(fields) ? unwrapFields(fields) : plainFields(object),
        subcollections: [],
        metadata: extractMetadata(object),
    };
}

/**
 * `name`, then `path`, as a resource path (last two segments); then explicit
 * `id`/`collection`; whatever is still missing is 'unknown'.
 */
export function resolveIdentity(object: JsonObject): { collection: string; id: string } {
    for (const key of ['name', 'path']) {
        const candidate = object[key];
        if (typeof candidate !== 'string') continue;
        const parsed = parseResourcePath(candidate);
        if (parsed) return parsed;
    }

    const id = object.id;
    const collection = object.collection;
    return {
        collection: typeof collection === 'string' ? collection : UNKNOWN_IDENTITY,
        id: typeof id === 'string' ? id : UNKNOWN_IDENTITY,
    };
}

/**
 * `projects/p/databases/(default)/documents/users/u1` -> users / u1.
 * Needs at least two non-empty segments.
 */
export function parseResourcePath(path: string): { collection: string; id: string } | null {
    if (!path.includes('/')) return null;
    const segments = path.split('/').filter((segment) => segment.length > 0);
    if (segments.length < 2) return null;
    return {
        collection: segments[segments.length - 2],
        id: segments[segments.length - 1],
    };
}

export function extractMetadata(object: JsonObject): DocumentMetadata {
    const name = object.name;
    const path = object.path;
    const metadata: DocumentMetadata = {
        path: typeof name === 'string' ? name : typeof path === 'string' ? path : UNKNOWN_IDENTITY,
    };

    const created = parseTimestamp(object.createTime);
    if (created) metadata.createdAt = created;
    const updated = parseTimestamp(object.updateTime);
    if (updated) metadata.updatedAt = updated;

    return metadata;
}

/**
 * RFC 3339 timestamp, or undefined. Fractional seconds beyond milliseconds are truncated.
 */
export function parseTimestamp(value: JsonValue | undefined): Date | undefined {
    if (typeof value !== 'string') return undefined;
    const match = RFC3339.exec(value);
    if (!match) return undefined;

    const [, year, month, day, hour, minute, second, fraction, zone] = match;
    const millis = fraction ? fraction.slice(1, 4).padEnd(3, '0') : '000';
    const offset = zone === 'z' || zone === 'Z' ? 'Z' : zone;
    if (!isCalendarDate(Number(year), Number(month), Number(day))) return undefined;
    const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`);
    return Number.isNaN(date.getTime()) ? undefined : date;
}

/** Rejects dates such as Feb 30 that Date would roll over. */
function isCalendarDate(year: number, month: number, day: number): boolean {
    const calendar = new Date(0);
    calendar.setUTCFullYear(year, month - 1, day);
    return calendar.getUTCFullYear() === year && calendar.getUTCMonth() === month - 1 && calendar.getUTCDate() === day;
}

function plainFields(object: JsonObject): Record<string, JsonValue> {
    return Object.fromEntries(
        Object.entries(object).filter(([key]) => !RESERVED_DOCUMENT_KEYS.has(key))
    );
}
