/**
 * Error types raised or returned by the base58check codec.
 *
 * Decode failures are returned as values (see {@link DecodeError}), the
 * remaining errors are thrown.
 *
 * @packageDocumentation
 */

export type Base58CheckErrorCode =
    | 'INVALID_DIGIT'
    | 'INVALID_CHARACTER'
    | 'UNRECOGNIZED_VERSION'
    | 'INCORRECT_BASE58'
    | 'CHECKSUM_INCORRECT';

/**
 * Base class of every codec error. `code` is stable and safe to switch on;
 * `message` is meant for humans.
 */
export abstract class Base58CheckError extends Error {
    abstract readonly code: Base58CheckErrorCode;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A digit outside 0..57 was given to the alphabet. */
export class InvalidDigitError extends Base58CheckError {
    readonly code = 'INVALID_DIGIT';

    constructor(readonly digit: number) {
        super(`Cannot convert ${digit} to base58: expected an integer from 0 to 57`);
    }
}

/** A character that is not part of the base58 alphabet. */
export class InvalidCharacterError extends Base58CheckError {
    readonly code = 'INVALID_CHARACTER';

    constructor(
        readonly character: string,
        readonly alphabet: string,
    ) {
        super(
            `Cannot convert ${JSON.stringify(character)} from base58: ` +
                `valid characters are ${alphabet}`,
        );
    }
}

/**
 * A symbolic version tag that the registry does not know. The message lists
 * the accepted alternatives so it can be shown as is.
 */
export class UnrecognizedVersionError extends Base58CheckError {
    readonly code = 'UNRECOGNIZED_VERSION';

    constructor(
        readonly version: string,
        readonly knownVersions: readonly string[],
    ) {
        super(
            `Version prefix ${JSON.stringify(version)} is not a recognized version. ` +
                'You can either pass a byte list (ex: [4, 136, 178, 30]), ' +
                'a number (ex: 0x0488b21e), a Uint8Array prefix, ' +
                `or a recognized tag like any of: ${knownVersions.join(', ')}`,
        );
    }
}

/** The encoded text contains a character outside the alphabet. */
export class IncorrectBase58Error extends Base58CheckError {
    readonly code = 'INCORRECT_BASE58';

    constructor(
        readonly position: number,
        readonly character: string,
    ) {
        super(`Incorrect base58: ${JSON.stringify(character)} at position ${position}`);
    }
}

/**
 * The embedded checksum does not match its data. Also used when the decoded
 * bytes are too short to hold a checksum at all.
 */
export class ChecksumIncorrectError extends Base58CheckError {
    readonly code = 'CHECKSUM_INCORRECT';

    constructor(readonly length: number) {
        super(
            length < 4
                ? `Checksum incorrect: decoded ${length} bytes, a checksum needs 4`
                : 'Checksum incorrect',
        );
    }
}

/** Errors that {@link decode} can return. */
export type DecodeError = IncorrectBase58Error | ChecksumIncorrectError;
