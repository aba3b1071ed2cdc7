/**
 * Content hashing
 *
 * SHA-256 over raw bytes, rendered as lowercase hex. Every identifier in the models
 * package (block, operation, endorsement, address) is derived from one of these.
 */

import { Schema, pipe } from 'effect';
import { sha256 } from 'js-sha256';

export const Hash = pipe(Schema.String, Schema.pattern(/^[0-9a-f]{64}$/), Schema.brand('Hash'));
export type Hash = typeof Hash.Type;

export const hashBytes = (bytes: Uint8Array): Hash => Hash.make(sha256.hex(bytes));

export const hashString = (value: string): Hash => hashBytes(new TextEncoder().encode(value));

export const hexToBytes = (hex: string): Uint8Array => Uint8Array.from(Buffer.from(hex, 'hex'));

/**
 * Concatenates byte arrays in order. Used to feed several serialized parts into a
 * single digest.
 */
export const concatBytes = (parts: ReadonlyArray<Uint8Array>): Uint8Array => {
  const total = parts.reduce((size, part) => size + part.length, 0);
  const result = new Uint8Array(total);
  parts.reduce((offset, part) => {
    result.set(part, offset);
    return offset + part.length;
  }, 0);
  return result;
};
