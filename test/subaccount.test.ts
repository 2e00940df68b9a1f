import { Principal } from '@dfinity/principal';
import { concat, numberToBytes, sha256, toBytes } from 'viem';
import { describe, expect, it } from 'vitest';

import {
  accountIdentifier,
  crc32,
  neuronStakeSubaccount,
  principalFromSubaccount,
  principalSubaccount,
} from '../src/subaccount';
import { testCanister, testIdentity } from './fake';

describe('principalSubaccount', () => {
  it('stores the length, the principal bytes, then zeros', () => {
    const principal = testIdentity('buyer').getPrincipal();
    const bytes = principal.toUint8Array();

    const subaccount = principalSubaccount(principal);

    expect(subaccount).toHaveLength(32);
    expect(subaccount[0]).toBe(bytes.length);
    expect(subaccount.slice(1, 1 + bytes.length)).toEqual(bytes);
    expect(subaccount.slice(1 + bytes.length).every((byte) => byte === 0)).toBe(true);
  });

  it('recovers the principal', () => {
    const principal = testCanister(4);
    expect(principalFromSubaccount(principalSubaccount(principal)).toText()).toBe(principal.toText());
  });

  it('handles the anonymous principal', () => {
    const anonymous = Principal.anonymous();
    const subaccount = principalSubaccount(anonymous);

    expect(subaccount[0]).toBe(1);
    expect(subaccount[1]).toBe(4);
    expect(principalFromSubaccount(subaccount).isAnonymous()).toBe(true);
  });

  it('rejects malformed sub-accounts', () => {
    expect(() => principalFromSubaccount(new Uint8Array(31))).toThrow('Sub-account must be 32 bytes, got 31');
    const subaccount = new Uint8Array(32);
    subaccount[0] = 32;
    expect(() => principalFromSubaccount(subaccount)).toThrow('Sub-account length prefix 32 exceeds 31');
  });
});

describe('neuronStakeSubaccount', () => {
  it('hashes the domain, controller and big-endian memo', () => {
    const controller = testIdentity('operator').getPrincipal();
    const preimage = concat([
      Uint8Array.of(12),
      toBytes('neuron-stake'),
      controller.toUint8Array(),
      numberToBytes(5n, { size: 8 }),
    ]);

    expect(neuronStakeSubaccount(controller, 5n)).toEqual(sha256(preimage, 'bytes'));
  });

  it('differs per memo', () => {
    const controller = testIdentity('operator').getPrincipal();
    expect(neuronStakeSubaccount(controller, 1n)).not.toEqual(neuronStakeSubaccount(controller, 2n));
  });
});

describe('accountIdentifier', () => {
  it('computes the standard crc32 check value', () => {
    expect(crc32(toBytes('123456789'))).toBe(0xcbf43926);
  });

  it('prefixes the hash with its big-endian crc32', () => {
    const id = accountIdentifier(testCanister(9));
    const hash = id.slice(4);

    expect(id).toHaveLength(32);
    expect(id.slice(0, 4)).toEqual(numberToBytes(crc32(hash), { size: 4 }));
  });

  it('treats a missing sub-account as all zeros', () => {
    const owner = testCanister(9);
    expect(accountIdentifier(owner)).toEqual(accountIdentifier(owner, new Uint8Array(32)));
    expect(accountIdentifier(owner)).not.toEqual(accountIdentifier(owner, new Uint8Array(32).fill(1)));
  });
});
