import assert from 'assert';
import { describe, it } from 'vitest';

import {
    BITCOIN_VERSIONS,
    UnrecognizedVersionError,
    VersionRegistry,
    bitcoinVersions,
    fromHex,
    integerToBytes,
    toHex,
    toVersionSpecifier,
} from '../src/index.js';

describe('versions', () => {
    describe('toVersionSpecifier', () => {
        it('tags each accepted shape', () => {
            assert.deepStrictEqual(toVersionSpecifier('wif'), { kind: 'tag', tag: 'wif' });
            assert.deepStrictEqual(toVersionSpecifier(0x80), { kind: 'integer', value: 128n });
            assert.deepStrictEqual(toVersionSpecifier(0x80n), { kind: 'integer', value: 128n });
            assert.deepStrictEqual(toVersionSpecifier([128]), { kind: 'byteList', values: [128] });
            assert.deepStrictEqual(toVersionSpecifier(fromHex('80')), {
                kind: 'bytes',
                bytes: new Uint8Array([0x80]),
            });
        });

        it('rejects malformed numbers and lists', () => {
            for (const spec of [-1, 0.5, Number.MAX_SAFE_INTEGER + 1, Number.NaN, -5n]) {
                assert.throws(() => toVersionSpecifier(spec), TypeError);
            }
            assert.throws(() => toVersionSpecifier([1, -1]), TypeError);
            assert.throws(() => toVersionSpecifier([1, 2.5]), TypeError);
        });
    });

    describe('integerToBytes', () => {
        it('returns the minimal big-endian form', () => {
            assert.strictEqual(toHex(integerToBytes(0n)), '00');
            assert.strictEqual(toHex(integerToBytes(0x80n)), '80');
            assert.strictEqual(toHex(integerToBytes(0x100n)), '0100');
            assert.strictEqual(toHex(integerToBytes(0x043587cfn)), '043587cf');
            assert.strictEqual(toHex(integerToBytes(70617039n)), '043587cf');
        });

        it('rejects negative values', () => {
            assert.throws(() => integerToBytes(-1n), RangeError);
        });
    });

    describe('bitcoinVersions', () => {
        it('lists tags in declaration order', () => {
            assert.deepStrictEqual(bitcoinVersions.tags, [
                'p2pkh',
                'p2sh',
                'wif',
                'bip32_pubkey',
                'bip32_privkey',
                'testnet_p2pkh',
                'testnet_p2sh',
                'testnet_wif',
                'testnet_bip32_pubkey',
                'testnet_bip32_privkey',
            ]);
            assert.strictEqual(bitcoinVersions.entries.length, BITCOIN_VERSIONS.length);
        });

        it('maps tags and prefixes both ways', () => {
            for (const { tag, prefix } of BITCOIN_VERSIONS) {
                const bytes = Uint8Array.from(prefix);
                assert.deepStrictEqual(bitcoinVersions.prefixFor(tag), bytes);
                assert.strictEqual(bitcoinVersions.tagForPrefix(bytes), tag);
            }
            assert.strictEqual(bitcoinVersions.tagForPrefix(fromHex('01020304')), null);
            assert.strictEqual(bitcoinVersions.tagForPrefix(fromHex('0488')), null);
        });

        it('has() narrows strings to tags', () => {
            assert.strictEqual(bitcoinVersions.has('bip32_privkey'), true);
            assert.strictEqual(bitcoinVersions.has('tesnet_wif'), false);
        });
    });

    describe('resolve', () => {
        it('resolves every shape of the same version identically', () => {
            const expected = { version: 'bip32_pubkey', prefix: fromHex('0488b21e') };

            assert.deepStrictEqual(bitcoinVersions.resolve('bip32_pubkey'), expected);
            assert.deepStrictEqual(bitcoinVersions.resolve(0x0488b21e), expected);
            assert.deepStrictEqual(bitcoinVersions.resolve(76067358n), expected);
            assert.deepStrictEqual(bitcoinVersions.resolve([4, 136, 178, 30]), expected);
            assert.deepStrictEqual(bitcoinVersions.resolve(fromHex('0488b21e')), expected);
        });

        it('resolves zero to the single zero byte', () => {
            assert.deepStrictEqual(bitcoinVersions.resolve(0), {
                version: 'p2pkh',
                prefix: new Uint8Array([0]),
            });
        });

        it('accepts unregistered bytes without a version', () => {
            assert.deepStrictEqual(bitcoinVersions.resolve(fromHex('01020304')), {
                version: null,
                prefix: fromHex('01020304'),
            });
            assert.deepStrictEqual(bitcoinVersions.resolve(0x0102), {
                version: null,
                prefix: fromHex('0102'),
            });
        });

        it('throws UnrecognizedVersionError for unknown tags only', () => {
            assert.throws(() => bitcoinVersions.resolve('unknown_tag'), UnrecognizedVersionError);
            assert.throws(() => bitcoinVersions.resolve(''), {
                code: 'UNRECOGNIZED_VERSION',
                knownVersions: bitcoinVersions.tags,
            });
        });

        it('copies the prefix bytes', () => {
            const bytes = fromHex('80');
            const resolved = bitcoinVersions.resolve(bytes);
            bytes[0] = 0;

            assert.deepStrictEqual(resolved.prefix, new Uint8Array([0x80]));
        });
    });

    describe('match', () => {
        it('splits a registered prefix from the payload', () => {
            assert.deepStrictEqual(bitcoinVersions.match(fromHex('00010203040506')), {
                version: 'p2pkh',
                prefix: fromHex('00'),
                payload: fromHex('010203040506'),
            });
            assert.deepStrictEqual(bitcoinVersions.match(fromHex('043587cf03040506')), {
                version: 'testnet_bip32_pubkey',
                prefix: fromHex('043587cf'),
                payload: fromHex('03040506'),
            });
        });

        it('leaves everything as payload when no prefix matches', () => {
            assert.deepStrictEqual(bitcoinVersions.match(fromHex('09010203040506')), {
                version: null,
                prefix: new Uint8Array(0),
                payload: fromHex('09010203040506'),
            });
            assert.deepStrictEqual(bitcoinVersions.match(fromHex('0488b2')), {
                version: null,
                prefix: new Uint8Array(0),
                payload: fromHex('0488b2'),
            });
        });

        it('matches nothing in an empty payload', () => {
            assert.deepStrictEqual(bitcoinVersions.match(new Uint8Array(0)), {
                version: null,
                prefix: new Uint8Array(0),
                payload: new Uint8Array(0),
            });
        });

        it('prefers the longest prefix regardless of declaration order', () => {
            const registry = new VersionRegistry([
                { tag: 'a', prefix: [0x04] },
                { tag: 'ab', prefix: [0x04, 0x88] },
                { tag: 'abc', prefix: [0x04, 0x88, 0xb2] },
            ]);

            assert.strictEqual(registry.match(fromHex('0488b21e')).version, 'abc');
            assert.strictEqual(registry.match(fromHex('0488ff')).version, 'ab');
            assert.strictEqual(registry.match(fromHex('04ff')).version, 'a');
            assert.strictEqual(toHex(registry.match(fromHex('0488b21e')).payload), '1e');
        });
    });

    describe('VersionRegistry', () => {
        it('rejects an empty prefix', () => {
            assert.throws(() => new VersionRegistry([{ tag: 'none', prefix: [] }]), {
                name: 'TypeError',
                message: 'Version "none" has an empty prefix',
            });
        });

        it('rejects prefix values outside a byte', () => {
            assert.throws(() => new VersionRegistry([{ tag: 'big', prefix: [256] }]), TypeError);
        });

        it('rejects duplicate tags', () => {
            assert.throws(
                () =>
                    new VersionRegistry([
                        { tag: 'p2pkh', prefix: [0x00] },
                        { tag: 'p2pkh', prefix: [0x01] },
                    ]),
                { name: 'TypeError', message: 'Duplicate version tag "p2pkh"' },
            );
        });

        it('rejects duplicate prefixes', () => {
            assert.throws(
                () =>
                    new VersionRegistry([
                        { tag: 'first', prefix: [0x30] },
                        { tag: 'second', prefix: [0x30] },
                    ]),
                {
                    name: 'TypeError',
                    message: 'Versions "first" and "second" share the prefix 0x30',
                },
            );
        });

        it('keeps its own copy of the table', () => {
            const definitions = [{ tag: 'ltc', prefix: [0x30], description: 'Litecoin P2PKH' }];
            const registry = new VersionRegistry(definitions);
            definitions[0].prefix[0] = 0x31;
            registry.entries[0].prefix[0] = 0x32;
            registry.prefixFor('ltc')[0] = 0x33;

            assert.deepStrictEqual(registry.entries, [
                { tag: 'ltc', prefix: new Uint8Array([0x30]), description: 'Litecoin P2PKH' },
            ]);
        });

        it('defaults the description to an empty string', () => {
            const registry = new VersionRegistry([{ tag: 'ltc', prefix: [0x30] }]);

            assert.strictEqual(registry.entries[0].description, '');
        });
    });
});
