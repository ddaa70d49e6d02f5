/**
 * Uint8Array helpers shared by the codec, the registry and the tests.
 *
 * @packageDocumentation
 */

/**
 * Joins byte arrays end to end, as prefix ++ payload ++ checksum.
 *
 * @example
 * ```typescript
 * import { concat, fromHex, toHex } from 'versioned-base58check';
 *
 * toHex(concat([fromHex('6f'), fromHex('0102'), fromHex('5df6e0e2')])); // '6f01025df6e0e2'
 * ```
 */
export function concat(parts: readonly Uint8Array[]): Uint8Array {
    const joined = new Uint8Array(parts.reduce((length, part) => length + part.length, 0));
    let offset = 0;
    for (const part of parts) {
        joined.set(part, offset);
        offset += part.length;
    }
    return joined;
}

/**
 * Byte-wise comparison; used to check a recomputed checksum against the
 * one carried in the text.
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
    return a.length === b.length && startsWith(a, b);
}

/**
 * Checks whether `bytes` begins with every byte of `prefix`.
 * An empty prefix matches anything.
 *
 * @example
 * ```typescript
 * import { startsWith, fromHex } from 'versioned-base58check';
 *
 * startsWith(fromHex('0488b21e00'), fromHex('0488b21e')); // true
 * startsWith(fromHex('04'), fromHex('0488b21e')); // false
 * ```
 */
export function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
    if (prefix.length > bytes.length) return false;
    for (let i = 0; i < prefix.length; i++) {
        if (bytes[i] !== prefix[i]) return false;
    }
    return true;
}

/**
 * Converts a hex string to Uint8Array.
 *
 * @param hex - Hex string (with or without 0x prefix), either case
 * @returns Uint8Array representation
 * @throws Error if hex string is invalid
 *
 * @example
 * ```typescript
 * import { fromHex } from 'versioned-base58check';
 *
 * const bytes = fromHex('0488B21E');
 * // bytes is Uint8Array [4, 136, 178, 30]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    if (hex.length % 2 !== 0) {
        throw new Error('Invalid hex string: odd length');
    }
    const length = hex.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        const pair = hex.slice(i * 2, i * 2 + 2);
        if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
            throw new Error(`Invalid hex character at position ${i * 2}`);
        }
        result[i] = parseInt(pair, 16);
    }
    return result;
}

/**
 * Lowercase hex form of `bytes`, two characters per byte.
 *
 * @example
 * ```typescript
 * import { toHex } from 'versioned-base58check';
 *
 * toHex(new Uint8Array([4, 53, 135, 207])); // '043587cf'
 * ```
 */
export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('');
}
