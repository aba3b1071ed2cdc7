import { Deferred, Effect, Fiber, HashSet, Option, Ref, pipe, type HashMap } from 'effect';
import { type ChannelClosedError, makeChannel } from '@consensus-harness/channels';
import {
  type Address,
  type BlockId,
  type PrivateKey,
  type WrappedBlock,
  computeOperationMerkleRoot,
  makeSlot,
  newWrappedBlock,
} from '@consensus-harness/models';
import {
  ConsensusError,
  ConsensusStartError,
  makeConsensusCommandSender,
  makeConsensusEventReceiver,
  type BootstrapableGraph,
  type ConsensusChannels,
  type ConsensusCommand,
  type ConsensusConfigService,
  type ConsensusEvent,
  type ConsensusEventReceiver,
  type ConsensusHandles,
  type ExportProofOfStake,
} from '@consensus-harness/exports';
import type { Storage } from '@consensus-harness/storage';
import * as Graph from './graph-state';
import { runWorker } from './worker';

export interface StartConsensusParameters {
  readonly config: ConsensusConfigService;
  readonly channels: ConsensusChannels;
  readonly bootstrapPos: Option.Option<ExportProofOfStake>;
  readonly bootstrapGraph: Option.Option<BootstrapableGraph>;
  readonly storage: Storage;
  // Milliseconds added to the local clock when computing the current slot.
  readonly clockCompensation: number;
  readonly password: string;
  readonly stakingKeys: HashMap.HashMap<Address, PrivateKey>;
}

// =============================================================================
// Preconditions
// =============================================================================

const isPowerOfTwo = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;

const checkThreadCount = (threadCount: number): Effect.Effect<void, ConsensusStartError> =>
  isPowerOfTwo(threadCount) && threadCount <= 256
    ? Effect.void
    : Effect.fail(
        new ConsensusStartError({
          details: `thread count must be a power of two between 1 and 256, got ${threadCount}`,
        })
      );

const findUnknownParent = (
  graph: BootstrapableGraph
): Option.Option<readonly [BlockId, BlockId]> => {
  const known = HashSet.fromIterable(graph.activeBlocks.map((exported) => exported.blockId));
  const unknown = graph.activeBlocks.flatMap((exported) =>
    exported.parents
      .filter(([parent]) => !HashSet.has(known, parent))
      .map(([parent]) => [exported.blockId, parent] as const)
  );
  return Option.fromNullable(unknown[0]);
};

const hasBestParents = (threadCount: number, graph: BootstrapableGraph): boolean => {
  const known = HashSet.fromIterable(graph.activeBlocks.map((exported) => exported.blockId));
  return (
    graph.bestParents.length === threadCount &&
    graph.bestParents.every(([parent]) => HashSet.has(known, parent))
  );
};

const checkBootstrapGraph =
  (threadCount: number) =>
  (graph: BootstrapableGraph): Effect.Effect<void, ConsensusStartError> =>
    pipe(
      findUnknownParent(graph),
      Option.match({
        onSome: ([blockId, parent]) =>
          Effect.fail(
            new ConsensusStartError({
              details: `bootstrap block ${blockId} references unknown parent ${parent}`,
            })
          ),
        onNone: () =>
          hasBestParents(threadCount, graph)
            ? Effect.void
            : Effect.fail(
                new ConsensusStartError({ details: 'bootstrap graph is missing best parents' })
              ),
      })
    );

// =============================================================================
// Initial Graph
// =============================================================================

/**
 * One empty block per thread at period 0, signed with the genesis key. Deterministic
 * for a given key and thread count.
 */
export const createGenesisBlocks = (
  config: Pick<ConsensusConfigService, 'threadCount' | 'genesisKey'>
): ReadonlyArray<WrappedBlock> =>
  Array.from({ length: config.threadCount }, (_, thread) =>
    newWrappedBlock(
      {
        slot: makeSlot(0, thread),
        parents: [],
        operationMerkleRoot: computeOperationMerkleRoot([]),
        endorsements: [],
      },
      [],
      config.genesisKey
    )
  );

const initialState = (
  parameters: StartConsensusParameters
): Effect.Effect<Graph.GraphState, ConsensusStartError> =>
  pipe(
    parameters.bootstrapGraph,
    Option.match({
      onNone: () => {
        const genesis = createGenesisBlocks(parameters.config);
        return pipe(
          parameters.storage.storeBlocks(genesis),
          Effect.as(Graph.fromGenesis(genesis))
        );
      },
      onSome: (graph) =>
        pipe(
          checkBootstrapGraph(parameters.config.threadCount)(graph),
          Effect.zipRight(
            parameters.storage.storeBlocks(graph.activeBlocks.map((exported) => exported.block))
          ),
          Effect.as(Graph.fromBootstrap(parameters.config.threadCount, graph))
        ),
    })
  );

// =============================================================================
// Stop
// =============================================================================

const discardEvents = (eventReceiver: ConsensusEventReceiver): Effect.Effect<never> =>
  pipe(
    eventReceiver.waitEvent,
    Effect.forever,
    Effect.catchTag('ChannelClosedError', () => Effect.never)
  );

const stopWorker =
  (stopSignal: Deferred.Deferred<void>, worker: Fiber.Fiber<void, ChannelClosedError>) =>
  (eventReceiver: ConsensusEventReceiver): Effect.Effect<void, ConsensusError> =>
    pipe(
      Deferred.succeed(stopSignal, undefined),
      Effect.zipRight(
        Effect.raceFirst(Fiber.join(worker), Effect.interruptible(discardEvents(eventReceiver)))
      ),
      Effect.mapError((cause) => new ConsensusError({ details: 'consensus worker failed', cause })),
      Effect.zipRight(Effect.logDebug('Consensus worker stopped'))
    );

// =============================================================================
// Start
// =============================================================================

const launch =
  (parameters: StartConsensusParameters) =>
  (initial: Graph.GraphState): Effect.Effect<ConsensusHandles> =>
    Effect.gen(function* () {
      const { config } = parameters;
      const commands = yield* makeChannel<ConsensusCommand>(
        'consensus-commands',
        config.channelSize
      );
      const events = yield* makeChannel<ConsensusEvent>('consensus-events', config.channelSize);
      const state = yield* Ref.make(initial);
      const stopSignal = yield* Deferred.make<void>();

      const worker = yield* Effect.forkDaemon(
        Effect.interruptible(
          runWorker(
            {
              config,
              channels: parameters.channels,
              storage: parameters.storage,
              events: events.sender,
              state,
              stakingKeys: parameters.stakingKeys,
              password: parameters.password,
              proofOfStake: parameters.bootstrapPos,
              clockCompensation: parameters.clockCompensation,
            },
            commands.receiver,
            stopSignal
          )
        )
      );

      yield* Effect.annotateLogs(Effect.logInfo('Consensus worker started'), {
        threadCount: config.threadCount,
        genesisBlocks: initial.genesisBlocks,
      });

      return {
        commandSender: makeConsensusCommandSender(commands.sender),
        eventReceiver: makeConsensusEventReceiver(events.receiver),
        manager: { stop: stopWorker(stopSignal, worker) },
      };
    });

/**
 * Starts the reference consensus worker on its own fiber. Fails without starting
 * anything when the thread count is not a power of two, or when the bootstrap graph
 * references unknown parents or lacks a best parent per thread.
 */
export const startConsensusController = (
  parameters: StartConsensusParameters
): Effect.Effect<ConsensusHandles, ConsensusStartError> =>
  pipe(
    checkThreadCount(parameters.config.threadCount),
    Effect.zipRight(initialState(parameters)),
    Effect.flatMap(launch(parameters))
  );
