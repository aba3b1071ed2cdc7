/**
 * Handles onto a running consensus worker
 *
 * `ConsensusChannels` is what the worker is started with; `ConsensusHandles` is what
 * starting it gives back.
 */

import { Deferred, Effect, pipe, type Option } from 'effect';
import type { ChannelClosedError, Receiver, Sender } from '@consensus-harness/channels';
import type { Address, BlockId, Slot } from '@consensus-harness/models';
import {
  ConsensusCommand,
  type ConsensusEvent,
  type PoolCommand,
  type ProtocolCommand,
  type ProtocolEvent,
} from './commands';
import { ConsensusError } from './errors';
import type { BlockGraphExport, BlockGraphStatus, ConsensusStats } from './graph';

// =============================================================================
// Collaborators
// =============================================================================

/**
 * The execution collaborator. The worker calls it whenever the blockclique or the set
 * of final blocks changes.
 */
export interface ExecutionController {
  readonly updateBlockcliqueStatus: (
    finalizedBlocks: ReadonlyArray<BlockId>,
    blockclique: ReadonlyArray<BlockId>
  ) => Effect.Effect<void, ChannelClosedError>;
}

export interface ConsensusChannels {
  readonly protocolCommandSender: Sender<ProtocolCommand>;
  readonly protocolEventReceiver: Receiver<ProtocolEvent>;
  readonly poolCommandSender: Sender<PoolCommand>;
  readonly executionController: ExecutionController;
}

// =============================================================================
// Worker Handles
// =============================================================================

export interface ConsensusCommandSender {
  readonly getBlockGraphStatus: (
    slotStart: Option.Option<Slot>,
    slotEnd: Option.Option<Slot>
  ) => Effect.Effect<BlockGraphExport, ConsensusError>;
  readonly getBlockStatuses: (
    blockIds: ReadonlyArray<BlockId>
  ) => Effect.Effect<ReadonlyArray<BlockGraphStatus>, ConsensusError>;
  readonly getStakingAddresses: () => Effect.Effect<ReadonlyArray<Address>, ConsensusError>;
  readonly getStats: () => Effect.Effect<ConsensusStats, ConsensusError>;
  /**
   * Staking keys in the key-file format, encrypted with the worker's password.
   */
  readonly exportStakingKeys: () => Effect.Effect<Uint8Array, ConsensusError>;
}

export interface ConsensusEventReceiver {
  readonly waitEvent: Effect.Effect<ConsensusEvent, ChannelClosedError>;
  readonly drain: Effect.Effect<ReadonlyArray<ConsensusEvent>>;
}

export interface ConsensusManager {
  /**
   * Stops the worker and waits for it to exit, draining `eventReceiver` meanwhile so
   * the worker never blocks on a full event channel. Stopping again is a no-op.
   */
  readonly stop: (eventReceiver: ConsensusEventReceiver) => Effect.Effect<void, ConsensusError>;
}

export interface ConsensusHandles {
  readonly commandSender: ConsensusCommandSender;
  readonly eventReceiver: ConsensusEventReceiver;
  readonly manager: ConsensusManager;
}

// =============================================================================
// Request/Response over a Channel
// =============================================================================

const workerUnreachable = (cause: ChannelClosedError) =>
  new ConsensusError({ details: 'consensus worker is not running', cause });

const request =
  (sender: Sender<ConsensusCommand>) =>
  <A>(
    build: (response: Deferred.Deferred<A, ConsensusError>) => ConsensusCommand
  ): Effect.Effect<A, ConsensusError> =>
    pipe(
      Deferred.make<A, ConsensusError>(),
      Effect.tap((response) =>
        pipe(sender.send(build(response)), Effect.mapError(workerUnreachable))
      ),
      Effect.flatMap(Deferred.await)
    );

export const makeConsensusCommandSender = (
  sender: Sender<ConsensusCommand>
): ConsensusCommandSender => {
  const ask = request(sender);
  return {
    getBlockGraphStatus: (slotStart, slotEnd) =>
      ask<BlockGraphExport>((response) =>
        ConsensusCommand.GetBlockGraphStatus({ slotStart, slotEnd, response })
      ),
    getBlockStatuses: (blockIds) =>
      ask<ReadonlyArray<BlockGraphStatus>>((response) =>
        ConsensusCommand.GetBlockStatuses({ blockIds, response })
      ),
    getStakingAddresses: () =>
      ask<ReadonlyArray<Address>>((response) => ConsensusCommand.GetStakingAddresses({ response })),
    getStats: () => ask<ConsensusStats>((response) => ConsensusCommand.GetStats({ response })),
    exportStakingKeys: () =>
      ask<Uint8Array>((response) => ConsensusCommand.ExportStakingKeys({ response })),
  };
};

export const makeConsensusEventReceiver = (
  receiver: Receiver<ConsensusEvent>
): ConsensusEventReceiver => ({
  waitEvent: receiver.receive,
  drain: receiver.drain,
});
