/**
 * Helpers.ts
 * Utility functions for value coercion on router payloads.
 * ASUS firmware reports almost everything as strings, so these helpers never
 * throw: they return `null` when a value cannot be interpreted.
 */

/**
 * Narrows an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the nested record at `key`, or an empty record when absent or not an object.
 */
export function recordAt(source: Record<string, unknown> | undefined, key: string): Record<string, unknown> {
    const value = source?.[key];
    return isRecord(value) ? value : {};
}

/**
 * Checks if a string represents a valid finite number.
 */
export function isNumeric(str: string): boolean {
    if (typeof str !== 'string') return false;
    return !isNaN(parseFloat(str)) && isFinite(Number(str));
}

/**
 * Converts a numeric string (or number) to a finite number.
 * @example toNumber(' 42 ') // 42
 * @example toNumber('n/a') // null
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return isNumeric(trimmed) ? Number(trimmed) : null;
}

/**
 * Like `toNumber`, but only accepts integers.
 */
export function toInteger(value: unknown): number | null {
    const parsed = toNumber(value);
    return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Parses a hexadecimal counter as reported by `netdev` (e.g. `0x1a2b`).
 * Values above 2^53 lose precision, which is acceptable for byte counters.
 */
export function parseHex(value: unknown): number | null {
    if (typeof value !== 'string') return null;
    const match = /^\s*(?:0x)?([0-9a-f]+)\s*$/i.exec(value);
    if (!match) return null;
    return parseInt(match[1], 16);
}

/**
 * Standardizes nvram flags ("1"/"0", "yes"/"no", "true"/"false") to booleans.
 */
export function parseBoolean(value: unknown): boolean | null {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value !== 'string') return null;

    const normalized = value.trim().toLowerCase();
    if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
    if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === '') return false;
    return null;
}

/**
 * Collects the sorted numeric ids of keys shaped like `<prefix><id>_<suffix>`.
 * @example idsFor('cpu', ['cpu1_total', 'cpu1_usage', 'cpu2_total']) // [1, 2]
 */
export function idsFor(prefix: string, keys: Iterable<string>): number[] {
    const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)_`);
    const ids = new Set<number>();

    for (const key of keys) {
        const match = pattern.exec(key);
        if (match) ids.add(Number(match[1]));
    }

    return [...ids].sort((a, b) => a - b);
}

/**
 * Clamps a number into the inclusive range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
