import { Schema, pipe } from 'effect';
import { hashBytes } from './hash';
import { type PublicKey, publicKeyToBytes } from './keys';

export const Address = pipe(
  Schema.String,
  Schema.pattern(/^A[0-9a-f]{64}$/),
  Schema.brand('Address')
);
export type Address = typeof Address.Type;

export const addressFromPublicKey = (publicKey: PublicKey): Address =>
  Address.make(`A${hashBytes(publicKeyToBytes(publicKey))}`);

/**
 * Thread an address belongs to: the top log2(threadCount) bits of the first byte of
 * the address hash. `threadCount` must be a power of two no greater than 256.
 */
export const getAddressThread = (address: Address, threadCount: number): number => {
  const firstByte = parseInt(address.slice(1, 3), 16);
  const bits = Math.log2(threadCount);
  return firstByte >> (8 - bits);
};
