/**
 * The base58 alphabet: 58 symbols in digit order, leaving out the
 * look-alike characters `0`, `O`, `I` and `l`.
 *
 * @packageDocumentation
 */

import { InvalidCharacterError, InvalidDigitError } from '../errors.js';

export const ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

export const BASE = 58;

const DIGITS: ReadonlyMap<string, number> = new Map(
    Array.from(ALPHABET, (char, digit) => [char, digit] as const),
);

/**
 * Maps a digit to its alphabet character.
 *
 * @throws InvalidDigitError if `digit` is not an integer in 0..57
 *
 * @example
 * ```typescript
 * digitToChar(0); // '1'
 * digitToChar(57); // 'z'
 * ```
 */
export function digitToChar(digit: number): string {
    if (!Number.isInteger(digit) || digit < 0 || digit >= BASE) {
        throw new InvalidDigitError(digit);
    }
    return ALPHABET[digit];
}

/**
 * Maps an alphabet character to its digit.
 *
 * @throws InvalidCharacterError if `char` is not a single alphabet character
 *
 * @example
 * ```typescript
 * charToDigit('1'); // 0
 * charToDigit('z'); // 57
 * charToDigit('O'); // throws InvalidCharacterError
 * ```
 */
export function charToDigit(char: string): number {
    const digit = DIGITS.get(char);
    if (digit === undefined) {
        throw new InvalidCharacterError(char, ALPHABET);
    }
    return digit;
}

/**
 * Index of the first character of `text` outside the alphabet, or -1.
 */
export function findInvalidCharacter(text: string): number {
    for (let i = 0; i < text.length; i++) {
        if (!DIGITS.has(text[i])) return i;
    }
    return -1;
}

/**
 * Whether every character of `text` belongs to the alphabet.
 * The empty string is valid.
 */
export function isBase58(text: string): boolean {
    return findInvalidCharacter(text) === -1;
}

export function digitsToString(digits: readonly number[]): string {
    return digits.map(digitToChar).join('');
}

export function stringToDigits(text: string): number[] {
    return Array.from(text, charToDigit);
}
