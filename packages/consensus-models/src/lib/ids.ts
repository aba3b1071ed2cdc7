import { Schema, pipe } from 'effect';
import { type Hash, hashString } from './hash';

const HexId = pipe(Schema.String, Schema.pattern(/^[0-9a-f]{64}$/));

export const BlockId = pipe(HexId, Schema.brand('BlockId'));
export type BlockId = typeof BlockId.Type;

export const OperationId = pipe(HexId, Schema.brand('OperationId'));
export type OperationId = typeof OperationId.Type;

export const EndorsementId = pipe(HexId, Schema.brand('EndorsementId'));
export type EndorsementId = typeof EndorsementId.Type;

export const blockIdFromHash = (hash: Hash): BlockId => BlockId.make(hash);

/**
 * A block id that no real block will ever carry, derived from a label.
 */
export const getDummyBlockId = (label: string): BlockId => blockIdFromHash(hashString(label));
