/**
 * Versioned Base58Check encoding and decoding.
 *
 * Base58Check is a binary-to-text encoding that puts a version prefix in
 * front of the payload and a 4-byte checksum, derived from double SHA-256,
 * after it. It is used for Bitcoin addresses, WIF keys and extended keys.
 *
 * @packageDocumentation
 */

import { CHECKSUM_LENGTH, checksum, hash256, type HashFunction } from './crypto.js';
import {
    ChecksumIncorrectError,
    IncorrectBase58Error,
    type DecodeError,
} from './errors.js';
import { concat, equals, findInvalidCharacter, fromBase58, toBase58, toHex } from './io/index.js';
import type { Base58CheckResult, Result, VersionSpec } from './types.js';
import { assertUint8Array } from './types.js';
import { bitcoinVersions, type VersionRegistry, type VersionTag } from './versions.js';

export type DecodeResult<T extends string> = Result<Base58CheckResult<T>, DecodeError>;

/**
 * Options for {@link createBase58Check}.
 */
export interface Base58CheckOptions {
    /**
     * Digest whose first four bytes form the checksum. Defaults to double
     * SHA-256.
     */
    hash?: HashFunction;
    /**
     * Optional callback for prefixes missing from the registry.
     * If provided, called with a message when encode is given raw prefix bytes
     * that have no tag, or when decode finds no registered prefix in front of
     * a payload whose checksum is valid. Neither case is an error.
     */
    onUnknownVersion?: (warning: string) => void;
}

/**
 * A base58check codec bound to one version registry.
 */
export interface Base58CheckCodec<T extends string> {
    readonly registry: VersionRegistry<T>;
    /**
     * Encodes a payload under a version prefix.
     *
     * @throws UnrecognizedVersionError if `version` is a tag the registry lacks
     * @throws TypeError if `payload` is not a Uint8Array or `version` is malformed
     */
    encode(payload: Uint8Array, version: VersionSpec): Base58CheckResult<T>;
    /**
     * Decodes base58check text. Never throws for any string input: invalid
     * characters and checksum mismatches are returned as errors.
     */
    decode(text: string): DecodeResult<T>;
    /**
     * Like {@link Base58CheckCodec.decode}, but throws the decode error.
     */
    decodeOrThrow(text: string): Base58CheckResult<T>;
}

/**
 * Creates a base58check codec over a version registry.
 *
 * @example
 * ```typescript
 * import { createBase58Check, VersionRegistry } from 'versioned-base58check';
 *
 * const dogecoin = createBase58Check(
 *     new VersionRegistry([
 *         { tag: 'p2pkh', prefix: [0x1e] },
 *         { tag: 'p2sh', prefix: [0x16] },
 *     ]),
 *     { onUnknownVersion: (warning) => console.warn(warning) },
 * );
 *
 * const { encoded } = dogecoin.encode(hash, 'p2pkh'); // 'D...'
 * ```
 */
export function createBase58Check<T extends string>(
    registry: VersionRegistry<T>,
    options: Base58CheckOptions = {},
): Base58CheckCodec<T> {
    const hash = options.hash ?? hash256;
    const warn = options.onUnknownVersion;

    function encode(payload: Uint8Array, version: VersionSpec): Base58CheckResult<T> {
        assertUint8Array(payload, 'payload');
        const resolved = registry.resolve(version);
        if (resolved.version === null && warn) {
            warn(`Encoding with prefix 0x${toHex(resolved.prefix)}, which has no registered version`);
        }

        const versioned = concat([resolved.prefix, payload]);
        const encoded = toBase58(concat([versioned, checksum(versioned, hash)]));

        return {
            encoded,
            payload: Uint8Array.from(payload),
            version: resolved.version,
            prefix: resolved.prefix,
        };
    }

    function decode(text: string): DecodeResult<T> {
        const position = findInvalidCharacter(text);
        if (position !== -1) {
            return { ok: false, error: new IncorrectBase58Error(position, text[position]) };
        }

        const bytes = fromBase58(text);
        if (bytes.length < CHECKSUM_LENGTH) {
            return { ok: false, error: new ChecksumIncorrectError(bytes.length) };
        }

        const versioned = bytes.subarray(0, bytes.length - CHECKSUM_LENGTH);
        const expected = bytes.subarray(bytes.length - CHECKSUM_LENGTH);
        if (!equals(checksum(versioned, hash), expected)) {
            return { ok: false, error: new ChecksumIncorrectError(bytes.length) };
        }

        const match = registry.match(versioned);
        if (match.version === null && warn) {
            warn(`Decoded payload 0x${toHex(versioned)} does not start with a registered prefix`);
        }

        return {
            ok: true,
            value: {
                encoded: text,
                payload: match.payload,
                version: match.version,
                prefix: match.prefix,
            },
        };
    }

    function decodeOrThrow(text: string): Base58CheckResult<T> {
        const result = decode(text);
        if (!result.ok) throw result.error;
        return result.value;
    }

    return { registry, encode, decode, decodeOrThrow };
}

/**
 * Codec over the Bitcoin mainnet and testnet prefixes.
 */
export const base58check: Base58CheckCodec<VersionTag> = createBase58Check(bitcoinVersions);

/**
 * Encode a payload to Base58Check text under a version prefix.
 *
 * @param payload - The bytes to encode, possibly empty
 * @param version - A tag such as `'wif'`, an integer such as `0x80`, a byte
 * list such as `[128]`, or the prefix bytes
 * @returns The encoded text with the payload, version tag and prefix bytes
 * @throws UnrecognizedVersionError if `version` is an unknown tag
 *
 * @example
 * ```typescript
 * import { encode, fromHex } from 'versioned-base58check';
 *
 * const key = fromHex('0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef');
 * encode(key, 'wif').encoded;
 * // '5HpneLQNKrcznVCQpzodYwAmZ4AoHeyjuRf9iAHAa498rP5kuWb'
 * ```
 */
export function encode(payload: Uint8Array, version: VersionSpec): Base58CheckResult<VersionTag> {
    return base58check.encode(payload, version);
}

/**
 * Decode Base58Check text, verifying its alphabet and checksum.
 *
 * @param text - The Base58Check encoded string
 * @returns `{ ok: true, value }` with the payload, version tag and prefix, or
 * `{ ok: false, error }` with an IncorrectBase58Error or ChecksumIncorrectError
 *
 * @example
 * ```typescript
 * import { decode } from 'versioned-base58check';
 *
 * const result = decode('1CLrrRUwXswyF2EVAtuXyqdk4qb8DSUHCX');
 * if (result.ok) {
 *     result.value.version; // 'p2pkh'
 * } else {
 *     result.error.code; // 'INCORRECT_BASE58' or 'CHECKSUM_INCORRECT'
 * }
 * ```
 */
export function decode(text: string): DecodeResult<VersionTag> {
    return base58check.decode(text);
}

/**
 * Decode Base58Check text.
 *
 * @throws IncorrectBase58Error or ChecksumIncorrectError
 */
export function decodeOrThrow(text: string): Base58CheckResult<VersionTag> {
    return base58check.decodeOrThrow(text);
}
