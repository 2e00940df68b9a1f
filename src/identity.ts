import type { Identity } from '@dfinity/agent';
import { Ed25519KeyIdentity } from '@dfinity/identity';
import { Secp256k1KeyIdentity } from '@dfinity/identity-secp256k1';
import { createPrivateKey } from 'crypto';
import type { KeyObject } from 'crypto';
import os from 'os';
import { bytesToHex, hexToBytes, sha256, toBytes } from 'viem';

import { PARTICIPANT_SEED_PREFIX, PARTICIPANTS_DIR } from './constant';
import { describeError } from './error';
import { checkFileExists, joinPath, loadText, saveText } from './file';

export const SEED_SIZE = 32;

export type Env = Readonly<Record<string, string | undefined>>;

export const resolveDfxConfigDir = (env: Env = process.env): string => {
  return env.DFX_CONFIG_ROOT || joinPath(env.HOME || os.homedir(), '.config', 'dfx');
};

const PEM_BLOCK = /-----BEGIN ([A-Z ]+)-----[^-]+-----END \1-----/g;

// dfx writes an EC PARAMETERS block ahead of secp256k1 keys
const privateKeyBlock = (pem: string): string => {
  const blocks = pem.match(PEM_BLOCK) ?? [];
  const block = blocks.find((item) => !item.startsWith('-----BEGIN EC PARAMETERS-----'));
  if (block == null) {
    throw new Error('no private key block');
  }
  return block;
};

/**
 * Parses an Ed25519 or secp256k1 PEM private key, the two kinds dfx identities use.
 */
export const parsePemIdentity = (pem: string, source: string): Identity => {
  let key: KeyObject;
  try {
    key = createPrivateKey(privateKeyBlock(pem));
  } catch (e) {
    throw new Error(`Failed to load identity "${source}": ${describeError(e)}`);
  }

  if (key.asymmetricKeyType === 'ed25519') {
    const jwk = key.export({ format: 'jwk' });
    if (jwk.d == null) {
      throw new Error(`Failed to load identity "${source}": private key component missing`);
    }
    return Ed25519KeyIdentity.generate(new Uint8Array(Buffer.from(jwk.d, 'base64url')));
  }
  if (key.asymmetricKeyType === 'ec' && key.asymmetricKeyDetails?.namedCurve === 'secp256k1') {
    return Secp256k1KeyIdentity.fromPem(pem);
  }

  const curve = key.asymmetricKeyDetails?.namedCurve;
  const type = curve == null ? key.asymmetricKeyType : `${key.asymmetricKeyType} ${curve}`;
  throw new Error(`Failed to load identity "${source}": unsupported key type "${type}"`);
};

export const loadPemIdentity = async (path: string): Promise<Identity> => {
  const exists = await checkFileExists(path);
  if (!exists) {
    throw new Error(`Identity PEM not found at "${path}"`);
  }
  const pem = await loadText(path);
  return parsePemIdentity(pem, path);
};

export const loadDfxIdentity = async (name: string, env: Env = process.env): Promise<Identity> => {
  const path = joinPath(resolveDfxConfigDir(env), 'identity', name, 'identity.pem');
  return await loadPemIdentity(path);
};

//

export const participantSeed = (ordinal: number): Uint8Array => {
  return sha256(toBytes(`${PARTICIPANT_SEED_PREFIX}${ordinal}`), 'bytes');
};

export const identityFromSeed = (seed: Uint8Array): Identity => {
  if (seed.length !== SEED_SIZE) {
    throw new Error(`Seed must be ${SEED_SIZE} bytes, got ${seed.length}`);
  }
  return Ed25519KeyIdentity.generate(seed);
};

export const participantSeedPath = (outputDir: string, ordinal: number): string => {
  return joinPath(outputDir, PARTICIPANTS_DIR, `participant_${ordinal}.seed`);
};

const SEED_FILE_MODE = 0o600;

// Seed files hold the bare hex of the 32 seed bytes
export const saveSeed = async (path: string, seed: Uint8Array): Promise<void> => {
  await saveText(path, bytesToHex(seed).slice(2), SEED_FILE_MODE);
};

export const loadSeed = async (path: string): Promise<Uint8Array> => {
  const text = (await loadText(path)).trim();
  if (!/^[0-9a-fA-F]{64}$/.test(text)) {
    throw new Error(`Seed file "${path}" must contain exactly ${SEED_SIZE} bytes as hex`);
  }
  return hexToBytes(`0x${text}`);
};
