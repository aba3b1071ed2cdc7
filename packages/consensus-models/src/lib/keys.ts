/**
 * Ed25519 key material
 *
 * Private keys are the 32-byte seed, public keys the 32-byte verifying key, both
 * carried around as lowercase hex.
 */

import { Schema, pipe } from 'effect';
import nacl from 'tweetnacl';
import { type Hash, hexToBytes } from './hash';

export const PrivateKey = pipe(
  Schema.String,
  Schema.pattern(/^[0-9a-f]{64}$/),
  Schema.brand('PrivateKey')
);
export type PrivateKey = typeof PrivateKey.Type;

export const PublicKey = pipe(
  Schema.String,
  Schema.pattern(/^[0-9a-f]{64}$/),
  Schema.brand('PublicKey')
);
export type PublicKey = typeof PublicKey.Type;

export const Signature = pipe(
  Schema.String,
  Schema.pattern(/^[0-9a-f]{128}$/),
  Schema.brand('Signature')
);
export type Signature = typeof Signature.Type;

const toHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

const keyPairOf = (privateKey: PrivateKey): nacl.SignKeyPair =>
  nacl.sign.keyPair.fromSeed(hexToBytes(privateKey));

export const generateRandomPrivateKey = (): PrivateKey =>
  PrivateKey.make(toHex(nacl.randomBytes(nacl.sign.seedLength)));

export const derivePublicKey = (privateKey: PrivateKey): PublicKey =>
  PublicKey.make(toHex(keyPairOf(privateKey).publicKey));

export const publicKeyToBytes = (publicKey: PublicKey): Uint8Array => hexToBytes(publicKey);

export const signHash = (hash: Hash, privateKey: PrivateKey): Signature =>
  Signature.make(toHex(nacl.sign.detached(hexToBytes(hash), keyPairOf(privateKey).secretKey)));

export const verifyHashSignature = (
  hash: Hash,
  signature: Signature,
  publicKey: PublicKey
): boolean =>
  nacl.sign.detached.verify(hexToBytes(hash), hexToBytes(signature), hexToBytes(publicKey));
