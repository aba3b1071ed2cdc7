/**
 * Signed, content-addressed wrappers
 *
 * A wrapped value carries its content, the creator's public key and address, a
 * signature, and an id. The id is the SHA-256 of the canonical content bytes followed
 * by the creator public key bytes; the signature covers that hash.
 */

import { Effect, Match, pipe } from 'effect';
import { type Address, addressFromPublicKey } from './address';
import { SignatureError } from './errors';
import { type Hash, concatBytes, hashBytes } from './hash';
import {
  type PrivateKey,
  type PublicKey,
  type Signature,
  derivePublicKey,
  publicKeyToBytes,
  signHash,
  verifyHashSignature,
} from './keys';
import { serialize } from './serialization';

export interface Wrapped<T, Id extends string> {
  readonly content: T;
  readonly signature: Signature;
  readonly creatorPublicKey: PublicKey;
  readonly creatorAddress: Address;
  readonly id: Id;
}

export const computeContentHash = (content: unknown, publicKey: PublicKey): Hash =>
  hashBytes(concatBytes([serialize(content), publicKeyToBytes(publicKey)]));

export const newWrapped =
  <Id extends string>(makeId: (hash: Hash) => Id) =>
  <T>(content: T, privateKey: PrivateKey): Wrapped<T, Id> => {
    const creatorPublicKey = derivePublicKey(privateKey);
    const hash = computeContentHash(content, creatorPublicKey);
    return {
      content,
      signature: signHash(hash, privateKey),
      creatorPublicKey,
      creatorAddress: addressFromPublicKey(creatorPublicKey),
      id: makeId(hash),
    };
  };

const failVerification = (id: string, details: string) =>
  Effect.fail(new SignatureError({ id, details }));

/**
 * Checks that the id matches the content, that the signature verifies against the
 * creator public key, and that the creator address derives from that key.
 */
export const verifyWrapped = <T, Id extends string>(
  wrapped: Wrapped<T, Id>
): Effect.Effect<Wrapped<T, Id>, SignatureError> => {
  const hash = computeContentHash(wrapped.content, wrapped.creatorPublicKey);
  const expectedId: string = hash;
  return pipe(
    Match.value(wrapped),
    Match.when(
      (w) => w.id !== expectedId,
      (w) => failVerification(w.id, 'id does not match content hash')
    ),
    Match.when(
      (w) => !verifyHashSignature(hash, w.signature, w.creatorPublicKey),
      (w) => failVerification(w.id, 'invalid signature')
    ),
    Match.when(
      (w) => w.creatorAddress !== addressFromPublicKey(w.creatorPublicKey),
      (w) => failVerification(w.id, 'creator address does not match public key')
    ),
    Match.orElse((w) => Effect.succeed(w))
  );
};
