/**
 * Binary and text I/O primitives underneath the base58check codec.
 *
 * @packageDocumentation
 */

// Alphabet
export {
    ALPHABET,
    BASE,
    charToDigit,
    digitToChar,
    digitsToString,
    findInvalidCharacter,
    isBase58,
    stringToDigits,
} from './alphabet.js';

// Digit conversion
export { bytesToDigits, digitsToBytes } from './radix.js';

// Base58 text
export { fromBase58, toBase58 } from './base58.js';

// Utility functions
export { concat, equals, fromHex, startsWith, toHex } from './utils.js';
