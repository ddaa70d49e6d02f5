/**
 * Version prefixes: the registry that maps symbolic tags to the prefix bytes
 * placed in front of a base58check payload, and back.
 *
 * Prefix list after https://en.bitcoin.it/wiki/List_of_address_prefixes
 *
 * @packageDocumentation
 */
import { UnrecognizedVersionError } from './errors.js';
import { fromHex, startsWith, toHex } from './io/index.js';
import type { ResolvedVersion, VersionSpec, VersionSpecifier } from './types.js';
import { isByteList, isUInt53, isUInt8 } from './types.js';

export interface VersionDefinition<T extends string = string> {
    readonly tag: T;
    /** Prefix byte values, at least one */
    readonly prefix: readonly number[];
    readonly description?: string;
}

export interface VersionEntry<T extends string> {
    readonly tag: T;
    readonly prefix: Uint8Array;
    readonly description: string;
}

/** A versioned payload split into its prefix and the remaining payload. */
export interface PrefixMatch<T extends string> extends ResolvedVersion<T> {
    readonly payload: Uint8Array;
}

/**
 * Bitcoin mainnet and testnet prefixes, in lookup order.
 */
export const BITCOIN_VERSIONS = [
    { tag: 'p2pkh', prefix: [0x00], description: 'Pubkey hash (P2PKH address), starts with 1' },
    { tag: 'p2sh', prefix: [0x05], description: 'Script hash (P2SH address), starts with 3' },
    {
        tag: 'wif',
        prefix: [0x80],
        description: 'Private key (WIF, un/compressed pubkey), starts with 5, K or L',
    },
    {
        tag: 'bip32_pubkey',
        prefix: [0x04, 0x88, 0xb2, 0x1e],
        description: 'HD wallet BIP32 public key, starts with xpub',
    },
    {
        tag: 'bip32_privkey',
        prefix: [0x04, 0x88, 0xad, 0xe4],
        description: 'HD wallet BIP32 private key, starts with xprv',
    },
    {
        tag: 'testnet_p2pkh',
        prefix: [0x6f],
        description: 'Testnet pubkey hash, starts with m or n',
    },
    { tag: 'testnet_p2sh', prefix: [0xc4], description: 'Testnet script hash, starts with 2' },
    {
        tag: 'testnet_wif',
        prefix: [0xef],
        description: 'Testnet private key (WIF, un/compressed pubkey), starts with 9 or c',
    },
    {
        tag: 'testnet_bip32_pubkey',
        prefix: [0x04, 0x35, 0x87, 0xcf],
        description: 'Testnet HD wallet BIP32 public key, starts with tpub',
    },
    {
        tag: 'testnet_bip32_privkey',
        prefix: [0x04, 0x35, 0x83, 0x94],
        description: 'Testnet HD wallet BIP32 private key, starts with tprv',
    },
] as const satisfies readonly VersionDefinition[];

export type VersionTag = (typeof BITCOIN_VERSIONS)[number]['tag'];

/**
 * Checks the shape of a version specifier and tags it with its kind.
 *
 * @throws TypeError for a negative, fractional or unsafe number, a negative
 * bigint, or a list holding anything other than byte values
 *
 * @example
 * ```typescript
 * toVersionSpecifier('wif'); // { kind: 'tag', tag: 'wif' }
 * toVersionSpecifier(0x80); // { kind: 'integer', value: 128n }
 * toVersionSpecifier([128]); // { kind: 'byteList', values: [128] }
 * ```
 */
export function toVersionSpecifier(spec: VersionSpec): VersionSpecifier {
    if (typeof spec === 'string') {
        return { kind: 'tag', tag: spec };
    }
    if (typeof spec === 'number') {
        if (!isUInt53(spec)) {
            throw new TypeError(`Expected a non-negative safe integer version, got ${spec}`);
        }
        return { kind: 'integer', value: BigInt(spec) };
    }
    if (typeof spec === 'bigint') {
        if (spec < 0n) {
            throw new TypeError(`Expected a non-negative integer version, got ${spec}`);
        }
        return { kind: 'integer', value: spec };
    }
    if (spec instanceof Uint8Array) {
        return { kind: 'bytes', bytes: spec };
    }
    if (!isByteList(spec)) {
        throw new TypeError(
            'Expected a version tag, a non-negative integer, a list of byte values (0-255) ' +
                'or a Uint8Array',
        );
    }
    return { kind: 'byteList', values: spec };
}

/**
 * Minimal big-endian byte form of a non-negative integer. Zero is a single
 * zero byte.
 *
 * @example
 * ```typescript
 * integerToBytes(0x0488b21en); // Uint8Array [4, 136, 178, 30]
 * integerToBytes(0n); // Uint8Array [0]
 * ```
 */
export function integerToBytes(value: bigint): Uint8Array {
    if (value < 0n) {
        throw new RangeError(`Expected a non-negative integer, got ${value}`);
    }
    const hex = value.toString(16);
    return fromHex(hex.length % 2 === 0 ? hex : `0${hex}`);
}

function toEntry<T extends string>(definition: VersionDefinition<T>): VersionEntry<T> {
    const { tag, prefix } = definition;
    if (prefix.length === 0) {
        throw new TypeError(`Version ${JSON.stringify(tag)} has an empty prefix`);
    }
    if (!prefix.every(isUInt8)) {
        throw new TypeError(`Version ${JSON.stringify(tag)} has a prefix value outside 0..255`);
    }
    return {
        tag,
        prefix: Uint8Array.from(prefix),
        description: definition.description ?? '',
    };
}

function copyEntry<T extends string>(entry: VersionEntry<T>): VersionEntry<T> {
    return { ...entry, prefix: entry.prefix.slice() };
}

/**
 * Immutable two-way table between version tags and prefix bytes.
 *
 * Built once from an ordered list of definitions; tags and prefixes must be
 * unique. A prefix may extend another one (`[0x04]` and `[0x04, 0x88]`): when
 * a payload is matched, the longest prefix it starts with wins.
 *
 * @example
 * ```typescript
 * import { VersionRegistry } from 'versioned-base58check';
 *
 * const litecoin = new VersionRegistry([
 *     { tag: 'p2pkh', prefix: [0x30] },
 *     { tag: 'p2sh', prefix: [0x32] },
 *     { tag: 'wif', prefix: [0xb0] },
 * ]);
 *
 * litecoin.resolve('p2sh'); // { version: 'p2sh', prefix: Uint8Array [0x32] }
 * litecoin.resolve(0x32); // same
 * ```
 */
export class VersionRegistry<T extends string> {
    readonly #entries: readonly VersionEntry<T>[];
    readonly #byTag: ReadonlyMap<string, VersionEntry<T>>;
    readonly #byPrefix: ReadonlyMap<string, VersionEntry<T>>;
    /** Longest prefix first, declaration order among equal lengths */
    readonly #matchOrder: readonly VersionEntry<T>[];

    /**
     * @throws TypeError for an empty or malformed prefix, a repeated tag or a
     * repeated prefix
     */
    constructor(definitions: Iterable<VersionDefinition<T>>) {
        const entries: VersionEntry<T>[] = [];
        const byTag = new Map<string, VersionEntry<T>>();
        const byPrefix = new Map<string, VersionEntry<T>>();

        for (const definition of definitions) {
            const entry = toEntry(definition);
            if (byTag.has(entry.tag)) {
                throw new TypeError(`Duplicate version tag ${JSON.stringify(entry.tag)}`);
            }
            const key = toHex(entry.prefix);
            const existing = byPrefix.get(key);
            if (existing) {
                throw new TypeError(
                    `Versions ${JSON.stringify(existing.tag)} and ${JSON.stringify(entry.tag)} ` +
                        `share the prefix 0x${key}`,
                );
            }
            entries.push(entry);
            byTag.set(entry.tag, entry);
            byPrefix.set(key, entry);
        }

        this.#entries = entries;
        this.#byTag = byTag;
        this.#byPrefix = byPrefix;
        this.#matchOrder = [...entries].sort((a, b) => b.prefix.length - a.prefix.length);
    }

    /** Known tags, in declaration order. */
    get tags(): T[] {
        return this.#entries.map((entry) => entry.tag);
    }

    /** Copies of the entries, in declaration order. */
    get entries(): VersionEntry<T>[] {
        return this.#entries.map(copyEntry);
    }

    has(tag: string): tag is T {
        return this.#byTag.has(tag);
    }

    /**
     * @throws UnrecognizedVersionError if `tag` is not registered
     */
    prefixFor(tag: T): Uint8Array {
        const entry = this.#byTag.get(tag);
        if (!entry) throw new UnrecognizedVersionError(tag, this.tags);
        return entry.prefix.slice();
    }

    /** Exact reverse lookup of a prefix. */
    tagForPrefix(prefix: Uint8Array): T | null {
        return this.#byPrefix.get(toHex(prefix))?.tag ?? null;
    }

    /**
     * Normalizes any accepted version specifier to its tag and prefix bytes.
     * Integers and byte lists are turned into bytes first; bytes that are not
     * registered resolve with a null version. Only an unknown tag is an error.
     *
     * @throws UnrecognizedVersionError for a tag that is not registered
     * @throws TypeError for a malformed specifier
     */
    resolve(spec: VersionSpec): ResolvedVersion<T> {
        return this.resolveSpecifier(toVersionSpecifier(spec));
    }

    resolveSpecifier(specifier: VersionSpecifier): ResolvedVersion<T> {
        switch (specifier.kind) {
            case 'tag': {
                const entry = this.#byTag.get(specifier.tag);
                if (!entry) throw new UnrecognizedVersionError(specifier.tag, this.tags);
                return { version: entry.tag, prefix: entry.prefix.slice() };
            }
            case 'integer':
                return this.#lookup(integerToBytes(specifier.value));
            case 'byteList':
                return this.#lookup(Uint8Array.from(specifier.values));
            case 'bytes':
                return this.#lookup(Uint8Array.from(specifier.bytes));
            default: {
                const unknown: never = specifier;
                throw new TypeError(`Unsupported version specifier ${String(unknown)}`);
            }
        }
    }

    /**
     * Splits a versioned payload (checksum already removed) into prefix and
     * payload, using the longest registered prefix it starts with. Without a
     * match the prefix is empty and everything is payload.
     *
     * @example
     * ```typescript
     * bitcoinVersions.match(new Uint8Array([0x04, 0x35, 0x87, 0xcf, 3, 4]));
     * // { version: 'testnet_bip32_pubkey', prefix: [4, 53, 135, 207], payload: [3, 4] }
     * ```
     */
    match(versioned: Uint8Array): PrefixMatch<T> {
        for (const entry of this.#matchOrder) {
            if (startsWith(versioned, entry.prefix)) {
                return {
                    version: entry.tag,
                    prefix: entry.prefix.slice(),
                    payload: versioned.slice(entry.prefix.length),
                };
            }
        }
        return { version: null, prefix: new Uint8Array(0), payload: versioned.slice() };
    }

    #lookup(prefix: Uint8Array): ResolvedVersion<T> {
        return { version: this.tagForPrefix(prefix), prefix };
    }
}

/** Registry over {@link BITCOIN_VERSIONS}. */
export const bitcoinVersions: VersionRegistry<VersionTag> = new VersionRegistry(BITCOIN_VERSIONS);
