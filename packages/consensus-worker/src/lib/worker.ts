/**
 * Reference consensus worker loop
 *
 * Merges three inputs into one sequential stream: protocol events, requests from the
 * node, and slot ticks. Each input is handled to completion before the next one, so a
 * handler blocked on a full outbound channel holds the whole worker until someone
 * drains that channel.
 */

import {
  Clock,
  Data,
  Deferred,
  Duration,
  Effect,
  HashMap,
  HashSet,
  Option,
  Ref,
  Stream,
  pipe,
} from 'effect';
import type { ChannelClosedError, Receiver, Sender } from '@consensus-harness/channels';
import {
  type Address,
  type BlockId,
  type OperationId,
  type PrivateKey,
  type SignatureError,
  type Slot,
  type WrappedBlock,
  type WrappedEndorsement,
  type WrappedHeader,
  type WrappedOperation,
  blockOperationIds,
  blockSlot,
  encodeStakingKeys,
  encrypt,
  latestSlotAt,
  makeSlot,
  nextSlot,
  slotTimestamp,
  slotToString,
  verifyBlock,
  verifyWrapped,
} from '@consensus-harness/models';
import {
  ConsensusCommand,
  ConsensusError,
  ConsensusEvent,
  PoolCommand,
  ProtocolCommand,
  ProtocolEvent,
  type ConsensusChannels,
  type ConsensusConfigService,
  type ExportProofOfStake,
} from '@consensus-harness/exports';
import type { Storage } from '@consensus-harness/storage';
import * as Graph from './graph-state';

export interface WorkerContext {
  readonly config: ConsensusConfigService;
  readonly channels: ConsensusChannels;
  readonly storage: Storage;
  readonly events: Sender<ConsensusEvent>;
  readonly state: Ref.Ref<Graph.GraphState>;
  readonly stakingKeys: HashMap.HashMap<Address, PrivateKey>;
  readonly password: string;
  readonly proofOfStake: Option.Option<ExportProofOfStake>;
  readonly clockCompensation: number;
}

type WorkerInput = Data.TaggedEnum<{
  ProtocolInput: { readonly event: ProtocolEvent };
  CommandInput: { readonly command: ConsensusCommand };
  SlotTick: { readonly slot: Slot };
}>;
const WorkerInput = Data.taggedEnum<WorkerInput>();

const sendProtocol =
  (ctx: WorkerContext) =>
  (command: ProtocolCommand): Effect.Effect<void, ChannelClosedError> =>
    ctx.channels.protocolCommandSender.send(command);

// =============================================================================
// Blocks
// =============================================================================

const notifyExecution = (ctx: WorkerContext): Effect.Effect<void, ChannelClosedError> =>
  pipe(
    Ref.get(ctx.state),
    Effect.flatMap((state) =>
      ctx.channels.executionController.updateBlockcliqueStatus([], Graph.blockclique(state))
    )
  );

const logIntegrated = (block: WrappedBlock) =>
  Effect.annotateLogs(Effect.logDebug('Integrated block'), {
    blockId: block.id,
    slot: slotToString(blockSlot(block)),
  });

const integrateReady = (ctx: WorkerContext): Effect.Effect<void, ChannelClosedError> =>
  pipe(
    Ref.get(ctx.state),
    Effect.map(Graph.readyToActivate),
    Effect.flatMap((ready) => (ready.length === 0 ? Effect.void : integrate(ctx)(ready[0])))
  );

const integrate =
  (ctx: WorkerContext) =>
  (block: WrappedBlock): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.modify(ctx.state, (state): readonly [boolean, Graph.GraphState] => [
        HashSet.has(state.wishlist, block.id),
        Graph.activate(state, block),
      ]),
      Effect.tap(() => sendProtocol(ctx)(ProtocolCommand.IntegratedBlock({ blockId: block.id }))),
      Effect.tap((wasWished) =>
        wasWished
          ? sendProtocol(ctx)(ProtocolCommand.WishlistDelta({ new: [], remove: [block.id] }))
          : Effect.void
      ),
      Effect.zipRight(notifyExecution(ctx)),
      Effect.zipRight(logIntegrated(block)),
      Effect.zipRight(Effect.suspend(() => integrateReady(ctx)))
    );

const checkNeedSync = (ctx: WorkerContext): Effect.Effect<void, ChannelClosedError> =>
  pipe(
    Ref.modify(ctx.state, (state): readonly [boolean, Graph.GraphState] => {
      const overloaded = HashMap.size(state.waiting) > ctx.config.maxFutureProcessingBlocks;
      return [overloaded && !state.needSyncSent, { ...state, needSyncSent: overloaded }];
    }),
    Effect.flatMap((signal) => (signal ? ctx.events.send(ConsensusEvent.NeedSync()) : Effect.void))
  );

const awaitParents =
  (ctx: WorkerContext) =>
  (block: WrappedBlock, missing: ReadonlyArray<BlockId>): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.modify(ctx.state, (state) => Graph.awaitParents(state, block, missing)),
      Effect.tap((newWishes) =>
        newWishes.length === 0
          ? Effect.void
          : sendProtocol(ctx)(ProtocolCommand.WishlistDelta({ new: newWishes, remove: [] }))
      ),
      Effect.zipRight(checkNeedSync(ctx))
    );

const placeBlock =
  (ctx: WorkerContext) =>
  (block: WrappedBlock): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.get(ctx.state),
      Effect.map((state) => Graph.missingParents(state, block)),
      Effect.flatMap((missing) =>
        missing.length === 0 ? integrate(ctx)(block) : awaitParents(ctx)(block, missing)
      )
    );

const reportAttack =
  (ctx: WorkerContext, blockId: BlockId) =>
  (error: SignatureError): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.update(ctx.state, (state) => Graph.discard(state, blockId)),
      Effect.zipRight(
        Effect.annotateLogs(Effect.logWarning('Attack attempt detected'), {
          blockId,
          details: error.details,
        })
      ),
      Effect.zipRight(sendProtocol(ctx)(ProtocolCommand.AttackBlockDetected({ blockId })))
    );

const handleBlock =
  (ctx: WorkerContext) =>
  (block: WrappedBlock): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.get(ctx.state),
      Effect.flatMap((state) =>
        Graph.isKnown(state, block.id)
          ? Effect.void
          : pipe(
              verifyBlock(block),
              Effect.matchEffect({
                onFailure: reportAttack(ctx, block.id),
                onSuccess: (verified) =>
                  pipe(
                    ctx.storage.storeBlock(verified),
                    Effect.zipRight(placeBlock(ctx)(verified))
                  ),
              })
            )
      )
    );

const wishFor =
  (ctx: WorkerContext) =>
  (blockId: BlockId): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.update(ctx.state, (state) => Graph.wish(state, blockId)),
      Effect.zipRight(
        sendProtocol(ctx)(ProtocolCommand.WishlistDelta({ new: [blockId], remove: [] }))
      )
    );

const handleHeader =
  (ctx: WorkerContext) =>
  (header: WrappedHeader): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.get(ctx.state),
      Effect.flatMap((state) =>
        Graph.isKnown(state, header.id) || HashSet.has(state.wishlist, header.id)
          ? Effect.void
          : pipe(
              verifyWrapped(header),
              Effect.matchEffect({
                onFailure: reportAttack(ctx, header.id),
                onSuccess: () => wishFor(ctx)(header.id),
              })
            )
      )
    );

const handleGetBlocks =
  (ctx: WorkerContext) =>
  (blockIds: ReadonlyArray<BlockId>): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.get(ctx.state),
      Effect.map((state) =>
        blockIds.map((id): readonly [BlockId, Option.Option<ReadonlyArray<OperationId>>] => [
          id,
          pipe(
            HashMap.get(state.active, id),
            Option.map((active) => blockOperationIds(active.block))
          ),
        ])
      ),
      Effect.flatMap((results) => sendProtocol(ctx)(ProtocolCommand.GetBlocksResults({ results })))
    );

// =============================================================================
// Operations and Endorsements
// =============================================================================

const validOperations = (ctx: WorkerContext, operations: ReadonlyArray<WrappedOperation>) =>
  pipe(
    Effect.partition(operations, (operation) => verifyWrapped(operation)),
    Effect.zip(Ref.get(ctx.state)),
    Effect.map(([[, verified], state]) => {
      const period = Graph.currentPeriod(state);
      return verified.filter(
        (operation) =>
          operation.content.expirePeriod >= period &&
          operation.content.expirePeriod <= period + ctx.config.operationValidityPeriods
      );
    })
  );

const handleOperations =
  (ctx: WorkerContext) =>
  (operations: ReadonlyArray<WrappedOperation>): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      validOperations(ctx, operations),
      Effect.tap((valid) => ctx.storage.storeOperations(valid)),
      Effect.map((valid) => valid.map((operation) => operation.id)),
      Effect.flatMap((operationIds) =>
        operationIds.length === 0
          ? Effect.void
          : pipe(
              sendProtocol(ctx)(ProtocolCommand.IntegratedOperations({ operationIds })),
              Effect.zipRight(
                ctx.channels.poolCommandSender.send(PoolCommand.AddOperations({ operationIds }))
              )
            )
      )
    );

const handleEndorsements =
  (ctx: WorkerContext) =>
  (endorsements: ReadonlyArray<WrappedEndorsement>): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Effect.partition(endorsements, (endorsement) => verifyWrapped(endorsement)),
      Effect.map(([, verified]) =>
        verified.filter((endorsement) => endorsement.content.index < ctx.config.endorsementCount)
      ),
      Effect.tap((valid) => ctx.storage.storeEndorsements(valid)),
      Effect.flatMap((valid) =>
        valid.length === 0
          ? Effect.void
          : sendProtocol(ctx)(
              ProtocolCommand.IntegratedEndorsements({
                endorsementIds: valid.map((endorsement) => endorsement.id),
              })
            )
      )
    );

const handleProtocolEvent = (ctx: WorkerContext) =>
  ProtocolEvent.$match({
    ReceivedBlock: ({ block }) => handleBlock(ctx)(block),
    ReceivedBlockHeader: ({ header }) => handleHeader(ctx)(header),
    GetBlocks: ({ blockIds }) => handleGetBlocks(ctx)(blockIds),
    ReceivedEndorsements: ({ endorsements }) => handleEndorsements(ctx)(endorsements),
    ReceivedOperations: ({ operations }) => handleOperations(ctx)(operations),
  });

// =============================================================================
// Requests
// =============================================================================

const stakerCount = (ctx: WorkerContext): number =>
  pipe(
    ctx.proofOfStake,
    Option.map(
      (pos) =>
        HashSet.size(
          HashSet.fromIterable(
            pos.cycleStates.flatMap((cycle) =>
              cycle.rollCounts.filter(([, rolls]) => rolls > 0).map(([address]) => address)
            )
          )
        )
    ),
    Option.getOrElse(() => 0)
  );

const encryptedStakingKeys = (ctx: WorkerContext) =>
  pipe(
    encrypt(ctx.password, encodeStakingKeys(Array.from(HashMap.values(ctx.stakingKeys)))),
    Effect.mapError(
      (cause) => new ConsensusError({ details: 'failed to encrypt staking keys', cause })
    )
  );

const handleCommand =
  (ctx: WorkerContext) =>
  (command: ConsensusCommand): Effect.Effect<void> =>
    pipe(
      Ref.get(ctx.state),
      Effect.flatMap((state) =>
        ConsensusCommand.$match(command, {
          GetBlockGraphStatus: ({ slotStart, slotEnd, response }) =>
            Deferred.succeed(response, Graph.exportGraph(state, slotStart, slotEnd)),
          GetBlockStatuses: ({ blockIds, response }) =>
            Deferred.succeed(response, blockIds.map(Graph.blockStatus(state))),
          GetStakingAddresses: ({ response }) =>
            Deferred.succeed(response, Array.from(HashMap.keys(ctx.stakingKeys))),
          GetStats: ({ response }) =>
            Deferred.succeed(response, Graph.stats(state, stakerCount(ctx))),
          ExportStakingKeys: ({ response }) =>
            Deferred.complete(response, encryptedStakingKeys(ctx)),
        })
      ),
      Effect.asVoid
    );

const workerStopped = () => new ConsensusError({ details: 'consensus worker stopped' });

const abandonRequest = ConsensusCommand.$match({
  GetBlockGraphStatus: ({ response }) => Deferred.fail(response, workerStopped()),
  GetBlockStatuses: ({ response }) => Deferred.fail(response, workerStopped()),
  GetStakingAddresses: ({ response }) => Deferred.fail(response, workerStopped()),
  GetStats: ({ response }) => Deferred.fail(response, workerStopped()),
  ExportStakingKeys: ({ response }) => Deferred.fail(response, workerStopped()),
});

// =============================================================================
// Slot Ticks
// =============================================================================

const nextSlotAfter =
  (config: ConsensusConfigService) =>
  (now: number): Slot =>
    pipe(
      latestSlotAt(config)(now),
      Option.match({
        onNone: () => makeSlot(0, 0),
        onSome: nextSlot(config.threadCount),
      })
    );

const waitForNextSlot = (ctx: WorkerContext): Effect.Effect<Slot> =>
  pipe(
    Clock.currentTimeMillis,
    Effect.map((now) => now + ctx.clockCompensation),
    Effect.flatMap((now) => {
      const slot = nextSlotAfter(ctx.config)(now);
      return pipe(
        Effect.sleep(Duration.millis(slotTimestamp(ctx.config)(slot) - now)),
        Effect.as(slot)
      );
    })
  );

const handleSlotTick =
  (ctx: WorkerContext) =>
  (slot: Slot): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Ref.update(ctx.state, (state) => Graph.setCurrentSlot(state, slot)),
      Effect.zipRight(ctx.channels.poolCommandSender.send(PoolCommand.UpdateCurrentSlot({ slot })))
    );

// =============================================================================
// Loop
// =============================================================================

const protocolInputs = (ctx: WorkerContext): Stream.Stream<WorkerInput> =>
  pipe(
    Stream.repeatEffect(ctx.channels.protocolEventReceiver.receive),
    Stream.map((event) => WorkerInput.ProtocolInput({ event })),
    Stream.catchTag('ChannelClosedError', () =>
      Stream.execute(Effect.logDebug('Protocol event channel closed'))
    )
  );

const commandInputs = (commands: Receiver<ConsensusCommand>): Stream.Stream<WorkerInput> =>
  pipe(
    Stream.repeatEffect(commands.receive),
    Stream.map((command) => WorkerInput.CommandInput({ command })),
    Stream.catchTag('ChannelClosedError', () => Stream.empty)
  );

const slotTicks = (ctx: WorkerContext): Stream.Stream<WorkerInput> =>
  pipe(
    Stream.repeatEffect(waitForNextSlot(ctx)),
    Stream.map((slot) => WorkerInput.SlotTick({ slot }))
  );

const handleInput = (ctx: WorkerContext) =>
  WorkerInput.$match({
    ProtocolInput: ({ event }) => handleProtocolEvent(ctx)(event),
    CommandInput: ({ command }) => handleCommand(ctx)(command),
    SlotTick: ({ slot }) => handleSlotTick(ctx)(slot),
  });

/**
 * Closes the request channel, fails requests still queued, and closes the event
 * channel so that event receivers see the worker is gone.
 */
const shutdown = (ctx: WorkerContext, commands: Receiver<ConsensusCommand>) =>
  pipe(
    commands.close,
    Effect.zipRight(commands.drain),
    Effect.flatMap((pending) => Effect.forEach(pending, abandonRequest, { discard: true })),
    Effect.zipRight(ctx.events.close),
    Effect.zipRight(Effect.logDebug('Consensus worker loop exited'))
  );

/**
 * Runs until `stopSignal` completes. Fails only when a collaborator channel the worker
 * sends to has been closed.
 */
export const runWorker = (
  ctx: WorkerContext,
  commands: Receiver<ConsensusCommand>,
  stopSignal: Deferred.Deferred<void>
): Effect.Effect<void, ChannelClosedError> =>
  pipe(
    Stream.mergeAll([protocolInputs(ctx), commandInputs(commands), slotTicks(ctx)], {
      concurrency: 'unbounded',
    }),
    Stream.interruptWhen(Deferred.await(stopSignal)),
    Stream.runForEach(handleInput(ctx)),
    Effect.ensuring(shutdown(ctx, commands))
  );
