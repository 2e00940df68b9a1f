import { Principal } from '@dfinity/principal';
import { sha224 } from '@noble/hashes/sha256';
import { concat, numberToBytes, sha256, toBytes } from 'viem';

import { NEURON_STAKE_DOMAIN } from './constant';

export const SUBACCOUNT_SIZE = 32;

const domainSeparated = (domain: string): Uint8Array => {
  return concat([new Uint8Array([domain.length]), toBytes(domain)]);
};

/**
 * Sub-account of the governance canister that a neuron stake for `controller` is
 * sent to before claiming by `memo`: sha256(len ‖ "neuron-stake" ‖ controller ‖ memo as u64 BE).
 */
export const neuronStakeSubaccount = (controller: Principal, memo: bigint): Uint8Array => {
  const preimage = concat([
    domainSeparated(NEURON_STAKE_DOMAIN),
    controller.toUint8Array(),
    numberToBytes(memo, { size: 8 }),
  ]);
  return sha256(preimage, 'bytes');
};

/**
 * Sub-account the sale canister reads a buyer's funds from: principal length byte,
 * principal bytes, zero padding up to 32 bytes.
 */
export const principalSubaccount = (principal: Principal): Uint8Array => {
  const bytes = principal.toUint8Array();
  if (bytes.length > SUBACCOUNT_SIZE - 1) {
    throw new Error(`Principal ${principal.toText()} is too long for a sub-account (${bytes.length} bytes)`);
  }

  const subaccount = new Uint8Array(SUBACCOUNT_SIZE);
  subaccount[0] = bytes.length;
  subaccount.set(bytes, 1);
  return subaccount;
};

export const principalFromSubaccount = (subaccount: Uint8Array): Principal => {
  if (subaccount.length !== SUBACCOUNT_SIZE) {
    throw new Error(`Sub-account must be ${SUBACCOUNT_SIZE} bytes, got ${subaccount.length}`);
  }

  const length = subaccount[0];
  if (length > SUBACCOUNT_SIZE - 1) {
    throw new Error(`Sub-account length prefix ${length} exceeds ${SUBACCOUNT_SIZE - 1}`);
  }
  return Principal.fromUint8Array(subaccount.slice(1, 1 + length));
};

const CRC32_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  return c >>> 0;
});

export const crc32 = (bytes: Uint8Array): number => {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC32_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
};

/**
 * Legacy 32-byte ledger account identifier: crc32 ‖ sha224("\x0Aaccount-id" ‖ owner ‖ subaccount).
 */
export const accountIdentifier = (owner: Principal, subaccount?: Uint8Array): Uint8Array => {
  const sub = subaccount ?? new Uint8Array(SUBACCOUNT_SIZE);
  const hash = sha224(concat([domainSeparated('account-id'), owner.toUint8Array(), sub]));
  return concat([numberToBytes(crc32(hash), { size: 4 }), hash]);
};
