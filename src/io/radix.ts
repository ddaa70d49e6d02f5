/**
 * Base-256 ↔ base-58 digit conversion.
 *
 * Digits are the alphabet positions of the base58 text, so a leading zero
 * byte maps to a leading 0 digit one to one.
 *
 * @packageDocumentation
 */

import { digitsToString, stringToDigits } from './alphabet.js';
import { fromBase58, toBase58 } from './base58.js';

/**
 * Converts bytes, read as a big-endian unsigned integer, to base-58 digits,
 * most significant first. Each leading zero byte becomes a leading 0 digit.
 *
 * @example
 * ```typescript
 * bytesToDigits(new Uint8Array([0, 0, 58])); // [0, 0, 1, 0]
 * bytesToDigits(new Uint8Array([])); // []
 * ```
 */
export function bytesToDigits(bytes: Uint8Array): number[] {
    return stringToDigits(toBase58(bytes));
}

/**
 * Inverse of {@link bytesToDigits}: each leading 0 digit becomes a zero
 * byte, the rest is converted to its minimal big-endian byte form.
 *
 * @throws InvalidDigitError for a digit outside 0..57
 */
export function digitsToBytes(digits: readonly number[]): Uint8Array {
    return fromBase58(digitsToString(digits));
}
