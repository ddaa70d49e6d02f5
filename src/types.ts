/**
 * Core type definitions, type guards and assertion helpers.
 *
 * @packageDocumentation
 */

// ============================================================================
// Version specifiers
// ============================================================================

/**
 * Any of the accepted ways to name a version prefix:
 * - a registry tag, e.g. `'wif'`
 * - a non-negative integer, e.g. `0x80` or `0x0488b21en`
 * - a list of byte values, e.g. `[4, 136, 178, 30]`
 * - the prefix bytes themselves
 */
export type VersionSpec = string | number | bigint | readonly number[] | Uint8Array;

/**
 * A {@link VersionSpec} after its shape has been checked and tagged.
 */
export type VersionSpecifier =
    | { readonly kind: 'tag'; readonly tag: string }
    | { readonly kind: 'integer'; readonly value: bigint }
    | { readonly kind: 'byteList'; readonly values: readonly number[] }
    | { readonly kind: 'bytes'; readonly bytes: Uint8Array };

/** A version specifier resolved against a registry. */
export interface ResolvedVersion<T extends string> {
    /** Registry tag, or null when the prefix is not registered */
    readonly version: T | null;
    /** Canonical prefix bytes */
    readonly prefix: Uint8Array;
}

// ============================================================================
// Codec results
// ============================================================================

/**
 * Outcome of a successful encode or decode. Each call returns a new object
 * whose byte arrays are not shared with the caller's input.
 */
export interface Base58CheckResult<T extends string> extends ResolvedVersion<T> {
    /** Base58check text */
    readonly encoded: string;
    /** Payload without prefix and checksum */
    readonly payload: Uint8Array;
}

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

// ============================================================================
// Type Guards
// ============================================================================

export function isUInt8(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isUInt53(value: unknown): value is number {
    return (
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= 0 &&
        value <= Number.MAX_SAFE_INTEGER
    );
}

export function isByteList(value: unknown): value is readonly number[] {
    return Array.isArray(value) && value.every(isUInt8);
}

// ============================================================================
// Assertion Helpers
// ============================================================================

export function assertUint8Array(value: unknown, name: string): asserts value is Uint8Array {
    if (!(value instanceof Uint8Array)) {
        throw new TypeError(`${name} must be a Uint8Array`);
    }
}
