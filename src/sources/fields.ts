/**
 * Total field extraction for loosely-typed upstream payloads.
 *
 * Every reader returns a default for a missing or wrong-typed field, so
 * adapters never rely on exceptions to cope with partial records.
 */

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested object, or an empty object.
 */
export function readObject(source: unknown, key: string): JsonObject {
    if (!isObject(source)) return {};
    const value = source[key];
    return isObject(value) ? value : {};
}

/**
 * Array field, or an empty array.
 */
export function readArray(source: unknown, key: string): unknown[] {
    if (!isObject(source)) return [];
    const value = source[key];
    return Array.isArray(value) ? value : [];
}

/**
 * Trimmed string field. Numbers are stringified; anything else yields the fallback.
 */
export function readString(source: unknown, key: string, fallback = ''): string {
    if (!isObject(source)) return fallback;
    const value = source[key];
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return fallback;
}

/**
 * Nullable string field: empty strings become null.
 */
export function readOptionalString(source: unknown, key: string): string | null {
    const value = readString(source, key);
    return value === '' ? null : value;
}

/**
 * Finite numeric field. Numeric strings ("1,234", " 12 ") are accepted.
 */
export function readNumber(source: unknown, key: string, fallback = 0): number {
    if (!isObject(source)) return fallback;
    const value = source[key];
    if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
    if (typeof value === 'string') {
        const parsed = parseCount(value, Number.NaN);
        return Number.isNaN(parsed) ? fallback : parsed;
    }
    return fallback;
}

/**
 * Non-negative integer metric (citation counts, indices).
 */
export function readCount(source: unknown, key: string): number {
    return toCount(readNumber(source, key, 0));
}

/**
 * Clamp a number to a non-negative integer.
 */
export function toCount(value: number): number {
    if (!Number.isFinite(value) || value < 0) return 0;
    return Math.floor(value);
}

/**
 * Parse a displayed count such as "1,234" or "12". Returns the fallback for
 * text with no digits.
 */
export function parseCount(text: string, fallback = 0): number {
    const cleaned = text.replace(/[,\s\u00a0]/g, '');
    if (!/^\d+(\.\d+)?$/.test(cleaned)) return fallback;
    return Number(cleaned);
}

/**
 * List of strings taken either directly from a string array or from a
 * property of each object element (`[{ display_name: "…" }]`).
 */
export function readStringList(source: unknown, key: string, itemKey?: string): string[] {
    const items = readArray(source, key);
    const out: string[] = [];
    for (const item of items) {
        const value = itemKey ? readString(item, itemKey) : typeof item === 'string' ? item.trim() : '';
        if (value) out.push(value);
    }
    return out;
}
