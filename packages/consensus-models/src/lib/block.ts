/**
 * Blocks and headers
 *
 * A block's id is its header's id: the header is the signed, content-addressed part,
 * and it commits to the operation list through `operationMerkleRoot`.
 */

import { Effect, pipe } from 'effect';
import type { Address } from './address';
import type { WrappedEndorsement } from './endorsement';
import { SignatureError } from './errors';
import { type Hash, concatBytes, hashBytes, hexToBytes } from './hash';
import { BlockId, type OperationId } from './ids';
import type { PrivateKey, PublicKey } from './keys';
import type { WrappedOperation } from './operation';
import type { Slot } from './slot';
import { newWrapped, verifyWrapped, type Wrapped } from './wrapped';

export interface BlockHeader {
  readonly slot: Slot;
  readonly parents: ReadonlyArray<BlockId>;
  readonly operationMerkleRoot: Hash;
  readonly endorsements: ReadonlyArray<WrappedEndorsement>;
}

export type WrappedHeader = Wrapped<BlockHeader, BlockId>;

export interface Block {
  readonly header: WrappedHeader;
  readonly operations: ReadonlyArray<WrappedOperation>;
}

export interface WrappedBlock {
  readonly id: BlockId;
  readonly content: Block;
  readonly creatorPublicKey: PublicKey;
  readonly creatorAddress: Address;
}

export const wrapHeader = newWrapped((hash) => BlockId.make(hash));

export const computeOperationMerkleRoot = (operationIds: ReadonlyArray<OperationId>): Hash =>
  pipe(operationIds.map(hexToBytes), concatBytes, hashBytes);

export const wrapBlock = (
  header: WrappedHeader,
  operations: ReadonlyArray<WrappedOperation>
): WrappedBlock => ({
  id: header.id,
  content: { header, operations },
  creatorPublicKey: header.creatorPublicKey,
  creatorAddress: header.creatorAddress,
});

export const newWrappedBlock = (
  header: BlockHeader,
  operations: ReadonlyArray<WrappedOperation>,
  creator: PrivateKey
): WrappedBlock => wrapBlock(wrapHeader(header, creator), operations);

export const blockSlot = (block: WrappedBlock): Slot => block.content.header.content.slot;

export const blockParents = (block: WrappedBlock): ReadonlyArray<BlockId> =>
  block.content.header.content.parents;

export const blockOperationIds = (block: WrappedBlock): ReadonlyArray<OperationId> =>
  block.content.operations.map((operation) => operation.id);

const checkMerkleRoot = (block: WrappedBlock): Effect.Effect<WrappedBlock, SignatureError> =>
  computeOperationMerkleRoot(blockOperationIds(block)) ===
  block.content.header.content.operationMerkleRoot
    ? Effect.succeed(block)
    : Effect.fail(new SignatureError({ id: block.id, details: 'operation merkle root mismatch' }));

/**
 * Verifies the header, every endorsement and operation it carries, and the operation
 * merkle root.
 */
export const verifyBlock = (block: WrappedBlock): Effect.Effect<WrappedBlock, SignatureError> =>
  pipe(
    verifyWrapped(block.content.header),
    Effect.zipRight(
      Effect.forEach(block.content.header.content.endorsements, verifyWrapped, { discard: true })
    ),
    Effect.zipRight(Effect.forEach(block.content.operations, verifyWrapped, { discard: true })),
    Effect.zipRight(checkMerkleRoot(block))
  );
