/**
 * Canonical serialization
 *
 * RFC 8785 JSON canonicalization so that structurally equal contents always produce
 * the same bytes, and therefore the same identifiers.
 */

import canonicalizeLib from 'canonicalize';
import { SerializationError } from './errors';

export const canonicalize = (data: unknown): string => {
  const result = canonicalizeLib(data);
  if (result === undefined) {
    throw new SerializationError({ details: 'content cannot be serialized to JSON' });
  }
  return result;
};

export const serialize = (data: unknown): Uint8Array =>
  new TextEncoder().encode(canonicalize(data));
