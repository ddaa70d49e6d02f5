/**
 * Hash functions and the base58check checksum.
 *
 * @packageDocumentation
 */
import { ripemd160 as _ripemd160 } from '@noble/hashes/legacy.js';
import { sha256 as _sha256 } from '@noble/hashes/sha2.js';

/** A digest function over bytes. */
export type HashFunction = (data: Uint8Array) => Uint8Array;

/** Length in bytes of a base58check checksum. */
export const CHECKSUM_LENGTH = 4;

export function sha256(data: Uint8Array): Uint8Array {
    return _sha256(data);
}

export function ripemd160(data: Uint8Array): Uint8Array {
    return _ripemd160(data);
}

/**
 * RIPEMD160(SHA256(data)), 20 bytes. The hash behind P2PKH and P2SH payloads.
 */
export function hash160(data: Uint8Array): Uint8Array {
    return ripemd160(sha256(data));
}

/**
 * SHA256(SHA256(data)), 32 bytes.
 */
export function hash256(data: Uint8Array): Uint8Array {
    return sha256(sha256(data));
}

/**
 * Computes the 4-byte checksum of `data`: the first four bytes of
 * `hash(data)`, double SHA-256 unless another digest is given.
 *
 * @param data - Version prefix followed by the payload
 * @param hash - Digest to truncate
 * @throws TypeError if `hash` returns fewer than 4 bytes
 *
 * @example
 * ```typescript
 * import { checksum, toHex } from 'versioned-base58check';
 *
 * toHex(checksum(new Uint8Array([]))); // '5df6e0e2'
 * ```
 */
export function checksum(data: Uint8Array, hash: HashFunction = hash256): Uint8Array {
    const digest = hash(data);
    if (digest.length < CHECKSUM_LENGTH) {
        throw new TypeError(
            `Checksum digest must be at least ${CHECKSUM_LENGTH} bytes, got ${digest.length}`,
        );
    }
    return digest.slice(0, CHECKSUM_LENGTH);
}
