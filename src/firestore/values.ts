import type { JsonObject, JsonValue } from '../backup-types.js';

/**
 * Keys of the single-key wrapper objects of Firestore's typed value encoding
 * (`{"integerValue": "30"}`, `{"mapValue": {"fields": {...}}}`, ...).
 */
export const TYPED_VALUE_KEYS = [
    'stringValue',
    'integerValue',
    'doubleValue',
    'booleanValue',
    'timestampValue',
    'arrayValue',
    'mapValue',
] as const;

export type TypedValueKey = typeof TYPED_VALUE_KEYS[number];

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTypedValueKey(key: string): key is TypedValueKey {
    return (TYPED_VALUE_KEYS as readonly string[]).includes(key);
}

/**
 * Turns a typed-value wrapper into a plain JSON value, recursively.
 * Values that are not a single-key wrapper come back unchanged, so applying it
 * to an already plain value is a no-op.
 */
export function unwrapValue(value: JsonValue): JsonValue {
    if (!isJsonObject(value)) return value;

    const keys = Object.keys(value);
    if (keys.length !== 1 || !isTypedValueKey(keys[0])) return value;

    const key = keys[0];
    const inner = value[key];

    switch (key) {
        case 'stringValue':
        case 'booleanValue':
        case 'timestampValue':
            return inner;
        case 'integerValue':
            return parseInteger(inner);
        case 'doubleValue':
            return parseDouble(inner);
        case 'arrayValue':
            return unwrapArray(value, inner);
        case 'mapValue':
            return unwrapMap(value, inner);
    }
}

/**
 * Unwraps every entry of a Firestore `fields` object.
 */
export function unwrapFields(fields: JsonObject): Record<string, JsonValue> {
    // Own properties only: a `__proto__` key stays a field.
    return Object.fromEntries(
        Object.entries(fields).map(([name, value]) => [name, unwrapValue(value)])
    );
}

/**
 * 64-bit integer payload. Safe integers become numbers; valid int64 values
 * outside the safe range keep their decimal string so no precision is lost.
 */
function parseInteger(inner: JsonValue): JsonValue {
    if (typeof inner === 'number') return inner;
    if (typeof inner !== 'string' || !INTEGER_PATTERN.test(inner)) return inner;

    const parsed = BigInt(inner.startsWith('+') ? inner.slice(1) : inner);
    if (parsed < INT64_MIN || parsed > INT64_MAX) return inner;

    const asNumber = Number(parsed);
    return Number.isSafeInteger(asNumber) ? asNumber : parsed.toString();
}

function parseDouble(inner: JsonValue): JsonValue {
    if (typeof inner === 'number') return inner;
    if (typeof inner !== 'string' || !FLOAT_PATTERN.test(inner)) return inner;
    const parsed = Number(inner);
    return Number.isFinite(parsed) ? parsed : inner;
}

function unwrapArray(wrapper: JsonObject, inner: JsonValue): JsonValue {
    if (!isJsonObject(inner)) return wrapper;
    const values = inner.values;
    if (values === undefined) return [];
    if (!Array.isArray(values)) return wrapper;
    return values.map(unwrapValue);
}

function unwrapMap(wrapper: JsonObject, inner: JsonValue): JsonValue {
    if (!isJsonObject(inner)) return wrapper;
    const fields = inner.fields;
    if (fields === undefined) return {};
    if (!isJsonObject(fields)) return wrapper;
    return unwrapFields(fields);
}
