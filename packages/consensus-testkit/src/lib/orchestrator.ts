/**
 * Consensus test orchestration
 *
 * Wires a consensus worker to mock protocol, pool and execution collaborators, runs a
 * test body against it and tears everything down in a fixed order:
 *
 * 1. stop the worker while the protocol controller ignores every command;
 * 2. stop the pool command sink;
 * 3. signal the execution drain and join it.
 *
 * Teardown is made of scope finalizers, so it also runs when the test body fails.
 */

import type { FileSystem } from '@effect/platform';
import { Data, Deferred, Effect, Fiber, Option, Ref, pipe } from 'effect';
import type {
  BootstrapableGraph,
  ConsensusCommandSender,
  ConsensusConfigService,
  ConsensusEventReceiver,
  ConsensusHandles,
  ExportProofOfStake,
} from '@consensus-harness/exports';
import { makeStorage, type Storage } from '@consensus-harness/storage';
import { startConsensusController } from '@consensus-harness/worker';
import { type PoolCommandSink, makePoolCommandSink } from './command-sink';
import { forkExecutionDrain } from './execution-drain';
import {
  type MockPoolController,
  type MockProtocolController,
  makeMockExecutionController,
  makeMockPoolController,
  makeMockProtocolController,
} from './mock-controller';
import { TEST_PASSWORD, loadInitialStakingKeys } from './tools';

// =============================================================================
// Types
// =============================================================================

export type HarnessState = 'Idle' | 'WiredUp' | 'Running' | 'Stopping' | 'Stopped';

export type HarnessStep =
  | 'seed-storage'
  | 'load-staking-keys'
  | 'start-consensus'
  | 'test-body'
  | 'stop-consensus'
  | 'stop-pool-sink'
  | 'stop-execution-drain';

export class HarnessStepError extends Data.TaggedError('HarnessStepError')<
  Readonly<{
    step: HarnessStep;
    cause: unknown;
  }>
> {}

export interface ConsensusTestContext {
  readonly protocolController: MockProtocolController;
  readonly commandSender: ConsensusCommandSender;
  readonly eventReceiver: ConsensusEventReceiver;
}

export interface ConsensusTestWithStorageContext extends ConsensusTestContext {
  readonly storage: Storage;
}

export interface ConsensusPoolTestContext extends ConsensusTestContext {
  readonly poolController: MockPoolController;
}

export interface ConsensusPoolTestWithStorageContext extends ConsensusPoolTestContext {
  readonly storage: Storage;
}

interface HarnessOptions {
  readonly config: ConsensusConfigService;
  readonly bootstrapPos: Option.Option<ExportProofOfStake>;
  readonly bootstrapGraph: Option.Option<BootstrapableGraph>;
  // Without-pool tests get a pool sink before the worker starts.
  readonly poolSinkAt: 'start' | 'shutdown';
}

// What the test body hands back for teardown.
interface ReturnedHandles {
  readonly protocolController: MockProtocolController;
  readonly eventReceiver: ConsensusEventReceiver;
  readonly poolController: MockPoolController;
}

// =============================================================================
// Steps
// =============================================================================

const step =
  (name: HarnessStep) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, HarnessStepError, R> =>
    pipe(
      effect,
      Effect.tap(() => Effect.logDebug('Harness step done')),
      Effect.mapError((cause) => new HarnessStepError({ step: name, cause })),
      Effect.annotateLogs({ step: name })
    );

const transition = (state: Ref.Ref<HarnessState>, next: HarnessState): Effect.Effect<void> =>
  pipe(
    Ref.getAndSet(state, next),
    Effect.flatMap((previous) =>
      Effect.annotateLogs(Effect.logDebug('Harness state changed'), { from: previous, to: next })
    )
  );

const seedStorage = (bootstrapGraph: Option.Option<BootstrapableGraph>): Effect.Effect<Storage> =>
  Effect.gen(function* () {
    const storage = yield* makeStorage();
    yield* Option.match(bootstrapGraph, {
      onNone: () => Effect.void,
      onSome: (graph) => storage.storeBlocks(graph.activeBlocks.map((exported) => exported.block)),
    });
    return storage;
  });

// Shutdown failures are harness bugs: they become defects.
const stopConsensus = (
  handles: ConsensusHandles,
  returned: ReturnedHandles,
  poolSinkAt: HarnessOptions['poolSinkAt']
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const poolSink: Option.Option<PoolCommandSink> = yield* poolSinkAt === 'shutdown'
      ? Effect.map(makePoolCommandSink(returned.poolController), Option.some)
      : Effect.succeed(Option.none());
    yield* pipe(
      returned.protocolController.ignoreCommandsWhile(
        handles.manager.stop(returned.eventReceiver)
      ),
      step('stop-consensus'),
      Effect.orDie
    );
    yield* Option.match(poolSink, {
      onNone: () => Effect.void,
      onSome: (sink) => pipe(sink.stop, step('stop-pool-sink'), Effect.orDie),
    });
  });

// =============================================================================
// Harness
// =============================================================================

const runHarness = <E, R>(
  options: HarnessOptions,
  body: (context: ConsensusPoolTestWithStorageContext) => Effect.Effect<ReturnedHandles, E, R>
): Effect.Effect<void, HarnessStepError, R | FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const { config } = options;
      const state = yield* Ref.make<HarnessState>('Idle');

      const storage = yield* step('seed-storage')(seedStorage(options.bootstrapGraph));
      const protocol = yield* makeMockProtocolController(config.channelSize);
      const pool = yield* makeMockPoolController(config.channelSize);
      const execution = yield* makeMockExecutionController(config.channelSize);

      const stopDrain = yield* Deferred.make<void>();
      yield* Effect.acquireRelease(
        forkExecutionDrain(execution.commandReceiver, stopDrain),
        (drain) =>
          pipe(
            Deferred.succeed(stopDrain, undefined),
            Effect.zipRight(Fiber.join(drain)),
            step('stop-execution-drain'),
            Effect.orDie,
            Effect.zipRight(transition(state, 'Stopped'))
          )
      );

      if (options.poolSinkAt === 'start') {
        yield* Effect.acquireRelease(makePoolCommandSink(pool.controller), (sink) =>
          pipe(sink.stop, step('stop-pool-sink'), Effect.orDie)
        );
      }

      const stakingKeys = yield* step('load-staking-keys')(
        loadInitialStakingKeys(config.stakingKeysPath, TEST_PASSWORD)
      );
      yield* transition(state, 'WiredUp');

      const returned = yield* Ref.make(Option.none<ReturnedHandles>());
      const handles = yield* Effect.acquireRelease(
        step('start-consensus')(
          startConsensusController({
            config,
            channels: {
              protocolCommandSender: protocol.commandSender,
              protocolEventReceiver: protocol.eventReceiver,
              poolCommandSender: pool.commandSender,
              executionController: execution.controller,
            },
            bootstrapPos: options.bootstrapPos,
            bootstrapGraph: options.bootstrapGraph,
            storage,
            clockCompensation: 0,
            password: TEST_PASSWORD,
            stakingKeys,
          })
        ),
        (started) =>
          pipe(
            transition(state, 'Stopping'),
            Effect.zipRight(Ref.get(returned)),
            // a failed test body hands nothing back
            Effect.map(
              Option.getOrElse(
                (): ReturnedHandles => ({
                  protocolController: protocol.controller,
                  poolController: pool.controller,
                  eventReceiver: started.eventReceiver,
                })
              )
            ),
            Effect.flatMap((handed) => stopConsensus(started, handed, options.poolSinkAt))
          )
      );

      yield* transition(state, 'Running');
      const result = yield* step('test-body')(
        body({
          protocolController: protocol.controller,
          poolController: pool.controller,
          commandSender: handles.commandSender,
          eventReceiver: handles.eventReceiver,
          storage,
        })
      );
      yield* Ref.set(returned, Option.some(result));
    })
  );

// =============================================================================
// Variants
// =============================================================================

/**
 * Runs `test` against a fresh worker, handing it the pool and protocol controllers.
 * The pool channel is only drained from shutdown on.
 */
export const consensusPoolTest = <E, R>(
  config: ConsensusConfigService,
  bootstrapPos: Option.Option<ExportProofOfStake>,
  bootstrapGraph: Option.Option<BootstrapableGraph>,
  test: (context: ConsensusPoolTestContext) => Effect.Effect<ConsensusPoolTestContext, E, R>
): Effect.Effect<void, HarnessStepError, R | FileSystem.FileSystem> =>
  runHarness({ config, bootstrapPos, bootstrapGraph, poolSinkAt: 'shutdown' }, (context) =>
    test({
      poolController: context.poolController,
      protocolController: context.protocolController,
      commandSender: context.commandSender,
      eventReceiver: context.eventReceiver,
    })
  );

export const consensusPoolTestWithStorage = <E, R>(
  config: ConsensusConfigService,
  bootstrapPos: Option.Option<ExportProofOfStake>,
  bootstrapGraph: Option.Option<BootstrapableGraph>,
  test: (
    context: ConsensusPoolTestWithStorageContext
  ) => Effect.Effect<ConsensusPoolTestContext, E, R>
): Effect.Effect<void, HarnessStepError, R | FileSystem.FileSystem> =>
  runHarness({ config, bootstrapPos, bootstrapGraph, poolSinkAt: 'shutdown' }, test);

/**
 * Runs `test` against a fresh worker with no bootstrap state. Pool commands are
 * drained by a sink for the whole run.
 */
export const consensusWithoutPoolTest = <E, R>(
  config: ConsensusConfigService,
  test: (context: ConsensusTestContext) => Effect.Effect<ConsensusTestContext, E, R>
): Effect.Effect<void, HarnessStepError, R | FileSystem.FileSystem> =>
  runHarness(
    { config, bootstrapPos: Option.none(), bootstrapGraph: Option.none(), poolSinkAt: 'start' },
    (context) =>
      pipe(
        test({
          protocolController: context.protocolController,
          commandSender: context.commandSender,
          eventReceiver: context.eventReceiver,
        }),
        Effect.map((returned) => ({ ...returned, poolController: context.poolController }))
      )
  );

export const consensusWithoutPoolTestWithStorage = <E, R>(
  config: ConsensusConfigService,
  test: (context: ConsensusTestWithStorageContext) => Effect.Effect<ConsensusTestContext, E, R>
): Effect.Effect<void, HarnessStepError, R | FileSystem.FileSystem> =>
  runHarness(
    { config, bootstrapPos: Option.none(), bootstrapGraph: Option.none(), poolSinkAt: 'start' },
    (context) =>
      pipe(
        test({
          protocolController: context.protocolController,
          commandSender: context.commandSender,
          eventReceiver: context.eventReceiver,
          storage: context.storage,
        }),
        Effect.map((returned) => ({ ...returned, poolController: context.poolController }))
      )
  );
