import * as base58checkCodec from './base58check.js';
import * as crypto from './crypto.js';
import * as io from './io/index.js';
import * as versions from './versions.js';

export * as crypto from './crypto.js';
export * as io from './io/index.js';
export * as versions from './versions.js';

export {
    base58check,
    createBase58Check,
    decode,
    decodeOrThrow,
    encode,
} from './base58check.js';
export type {
    Base58CheckCodec,
    Base58CheckOptions,
    DecodeResult,
} from './base58check.js';

export {
    BITCOIN_VERSIONS,
    VersionRegistry,
    bitcoinVersions,
    integerToBytes,
    toVersionSpecifier,
} from './versions.js';
export type { PrefixMatch, VersionDefinition, VersionEntry, VersionTag } from './versions.js';

export { CHECKSUM_LENGTH, checksum, hash160, hash256, ripemd160, sha256 } from './crypto.js';
export type { HashFunction } from './crypto.js';

export * from './errors.js';
export * from './io/index.js';

export type {
    Base58CheckResult,
    ResolvedVersion,
    Result,
    VersionSpec,
    VersionSpecifier,
} from './types.js';

const versionedBase58check = {
    encode: base58checkCodec.encode,
    decode: base58checkCodec.decode,
    decodeOrThrow: base58checkCodec.decodeOrThrow,
    crypto,
    io,
    versions,
};

export default versionedBase58check;
