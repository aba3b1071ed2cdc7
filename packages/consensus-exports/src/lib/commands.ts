/**
 * Messages exchanged between the consensus worker and its collaborators
 *
 * Commands flow out of the worker (to protocol, pool and execution); events flow into
 * it from protocol. Consensus commands are requests from the node to the worker, each
 * answered through the `Deferred` it carries.
 */

import { Data, type Deferred, type Option } from 'effect';
import type {
  Address,
  BlockId,
  EndorsementId,
  OperationId,
  Slot,
  WrappedBlock,
  WrappedEndorsement,
  WrappedHeader,
  WrappedOperation,
} from '@consensus-harness/models';
import type { ConsensusError } from './errors';
import type { BlockGraphExport, BlockGraphStatus, ConsensusStats } from './graph';

// =============================================================================
// Outbound Commands
// =============================================================================

export type ProtocolCommand = Data.TaggedEnum<{
  IntegratedBlock: { readonly blockId: BlockId };
  WishlistDelta: {
    readonly new: ReadonlyArray<BlockId>;
    readonly remove: ReadonlyArray<BlockId>;
  };
  AttackBlockDetected: { readonly blockId: BlockId };
  GetBlocksResults: {
    readonly results: ReadonlyArray<
      readonly [BlockId, Option.Option<ReadonlyArray<OperationId>>]
    >;
  };
  IntegratedEndorsements: { readonly endorsementIds: ReadonlyArray<EndorsementId> };
  IntegratedOperations: { readonly operationIds: ReadonlyArray<OperationId> };
}>;
export const ProtocolCommand = Data.taggedEnum<ProtocolCommand>();

export type PoolCommand = Data.TaggedEnum<{
  UpdateCurrentSlot: { readonly slot: Slot };
  UpdateLatestFinalPeriods: { readonly periods: ReadonlyArray<number> };
  AddOperations: { readonly operationIds: ReadonlyArray<OperationId> };
}>;
export const PoolCommand = Data.taggedEnum<PoolCommand>();

export type ExecutionCommand = Data.TaggedEnum<{
  UpdateBlockcliqueStatus: {
    readonly finalizedBlocks: ReadonlyArray<BlockId>;
    readonly blockclique: ReadonlyArray<BlockId>;
  };
}>;
export const ExecutionCommand = Data.taggedEnum<ExecutionCommand>();

// =============================================================================
// Inbound Events
// =============================================================================

export type ProtocolEvent = Data.TaggedEnum<{
  ReceivedBlock: { readonly block: WrappedBlock };
  ReceivedBlockHeader: { readonly header: WrappedHeader };
  GetBlocks: { readonly blockIds: ReadonlyArray<BlockId> };
  ReceivedEndorsements: { readonly endorsements: ReadonlyArray<WrappedEndorsement> };
  ReceivedOperations: { readonly operations: ReadonlyArray<WrappedOperation> };
}>;
export const ProtocolEvent = Data.taggedEnum<ProtocolEvent>();

export type ConsensusEvent = Data.TaggedEnum<{
  NeedSync: {};
}>;
export const ConsensusEvent = Data.taggedEnum<ConsensusEvent>();

// =============================================================================
// Requests to the Worker
// =============================================================================

export type ConsensusCommand = Data.TaggedEnum<{
  GetBlockGraphStatus: {
    readonly slotStart: Option.Option<Slot>;
    readonly slotEnd: Option.Option<Slot>;
    readonly response: Deferred.Deferred<BlockGraphExport, ConsensusError>;
  };
  GetBlockStatuses: {
    readonly blockIds: ReadonlyArray<BlockId>;
    readonly response: Deferred.Deferred<ReadonlyArray<BlockGraphStatus>, ConsensusError>;
  };
  GetStakingAddresses: {
    readonly response: Deferred.Deferred<ReadonlyArray<Address>, ConsensusError>;
  };
  GetStats: { readonly response: Deferred.Deferred<ConsensusStats, ConsensusError> };
  // Staking keys encrypted with the password the worker was started with.
  ExportStakingKeys: { readonly response: Deferred.Deferred<Uint8Array, ConsensusError> };
}>;
export const ConsensusCommand = Data.taggedEnum<ConsensusCommand>();
