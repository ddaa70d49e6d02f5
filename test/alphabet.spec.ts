import assert from 'assert';
import { describe, it } from 'vitest';

import {
    ALPHABET,
    InvalidCharacterError,
    InvalidDigitError,
    charToDigit,
    digitToChar,
    digitsToString,
    findInvalidCharacter,
    isBase58,
    stringToDigits,
} from '../src/index.js';

describe('alphabet', () => {
    it('has 58 distinct characters without 0, O, I and l', () => {
        assert.strictEqual(ALPHABET.length, 58);
        assert.strictEqual(new Set(ALPHABET).size, 58);
        for (const char of ['0', 'O', 'I', 'l']) {
            assert.strictEqual(ALPHABET.includes(char), false);
        }
    });

    describe('digitToChar', () => {
        it('maps digits to characters', () => {
            assert.strictEqual(digitToChar(0), '1');
            assert.strictEqual(digitToChar(9), 'A');
            assert.strictEqual(digitToChar(57), 'z');
        });

        it('throws InvalidDigitError outside 0..57', () => {
            for (const digit of [58, 59, -1, 1.5, Number.NaN]) {
                assert.throws(() => digitToChar(digit), InvalidDigitError);
            }
            assert.throws(() => digitToChar(58), {
                code: 'INVALID_DIGIT',
                digit: 58,
                message: 'Cannot convert 58 to base58: expected an integer from 0 to 57',
            });
        });
    });

    describe('charToDigit', () => {
        it('maps characters to digits', () => {
            assert.strictEqual(charToDigit('1'), 0);
            assert.strictEqual(charToDigit('A'), 9);
            assert.strictEqual(charToDigit('z'), 57);
        });

        it('is the inverse of digitToChar', () => {
            for (let digit = 0; digit < 58; digit++) {
                assert.strictEqual(charToDigit(digitToChar(digit)), digit);
            }
        });

        it('throws InvalidCharacterError for characters outside the alphabet', () => {
            for (const char of ['0', 'O', 'I', 'l', '', '12', ' ', '+']) {
                assert.throws(() => charToDigit(char), InvalidCharacterError);
            }
            assert.throws(() => charToDigit('O'), {
                code: 'INVALID_CHARACTER',
                character: 'O',
                message: `Cannot convert "O" from base58: valid characters are ${ALPHABET}`,
            });
        });
    });

    describe('isBase58', () => {
        it('accepts alphabet-only text', () => {
            assert.strictEqual(isBase58('abc1z'), true);
            assert.strictEqual(isBase58(ALPHABET), true);
        });

        it('accepts the empty string', () => {
            assert.strictEqual(isBase58(''), true);
        });

        it('rejects text with any other character', () => {
            assert.strictEqual(isBase58('abc1z0'), false);
            assert.strictEqual(isBase58('abc 1z'), false);
            assert.strictEqual(isBase58('Ol'), false);
        });
    });

    describe('findInvalidCharacter', () => {
        it('returns the index of the first invalid character', () => {
            assert.strictEqual(findInvalidCharacter('123Ol'), 3);
            assert.strictEqual(findInvalidCharacter('0'), 0);
            assert.strictEqual(findInvalidCharacter('1234z'), -1);
            assert.strictEqual(findInvalidCharacter(''), -1);
        });
    });

    describe('sequences', () => {
        it('converts digit lists to text and back', () => {
            assert.strictEqual(digitsToString([0, 1, 2, 3, 57]), '1234z');
            assert.deepStrictEqual(stringToDigits('1234z'), [0, 1, 2, 3, 57]);
            assert.strictEqual(digitsToString([]), '');
            assert.deepStrictEqual(stringToDigits(''), []);
        });

        it('fails on the first bad element', () => {
            assert.throws(() => digitsToString([0, 1, 2, 3, 58]), InvalidDigitError);
            assert.throws(() => stringToDigits('123Ol'), {
                name: 'InvalidCharacterError',
                character: 'O',
            });
        });
    });
});
