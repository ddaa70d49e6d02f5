/**
 * Plain base58 text encoding, without version or checksum.
 *
 * @packageDocumentation
 */

import { base58 } from '@scure/base';
import { InvalidCharacterError } from '../errors.js';
import { ALPHABET, findInvalidCharacter } from './alphabet.js';

/**
 * Renders bytes as base58 text. Every leading zero byte becomes a leading `1`;
 * an all-zero input renders as `1`s only and an empty input as `''`.
 *
 * @example
 * ```typescript
 * import { toBase58 } from 'versioned-base58check';
 *
 * toBase58(new Uint8Array([0, 1])); // '12'
 * ```
 */
export function toBase58(bytes: Uint8Array): string {
    return base58.encode(bytes);
}

/**
 * Parses base58 text back to bytes. `''` parses to an empty array.
 *
 * @throws InvalidCharacterError on the first character outside the alphabet
 */
export function fromBase58(text: string): Uint8Array {
    const position = findInvalidCharacter(text);
    if (position !== -1) {
        throw new InvalidCharacterError(text[position], ALPHABET);
    }
    return base58.decode(text);
}
