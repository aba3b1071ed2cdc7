import { Deferred, Effect, Fiber, Ref, pipe } from 'effect';
import type { DrainableController, MockPoolController } from './mock-controller';

export interface CommandSink<Controller> {
  /**
   * Stops the background consumer, waits for it to exit and drops whatever is still
   * queued. Hands the controller back. Stopping again returns it straight away.
   */
  readonly stop: Effect.Effect<Controller>;
}

export type PoolCommandSink = CommandSink<MockPoolController>;

const consume = (
  controller: DrainableController,
  discarded: Ref.Ref<number>,
  stopSignal: Deferred.Deferred<void>
): Effect.Effect<void> =>
  pipe(
    controller.discardNext,
    Effect.zipRight(Ref.update(discarded, (count) => count + 1)),
    Effect.forever,
    Effect.catchTag('ChannelClosedError', () => Effect.void),
    Effect.raceFirst(Deferred.await(stopSignal))
  );

/**
 * Keeps the channel behind `controller` drained until the sink is stopped, so the
 * worker never blocks sending to a collaborator the test does not watch.
 */
export const makeCommandSink = <Controller extends DrainableController>(
  controller: Controller
): Effect.Effect<CommandSink<Controller>> =>
  Effect.gen(function* () {
    const discarded = yield* Ref.make(0);
    const stopSignal = yield* Deferred.make<void>();
    const consumer = yield* Effect.forkDaemon(
      Effect.interruptible(consume(controller, discarded, stopSignal))
    );

    const shutdown = pipe(
      Fiber.join(consumer),
      Effect.zipRight(controller.discardPending),
      Effect.flatMap((pending) => Ref.updateAndGet(discarded, (count) => count + pending)),
      Effect.flatMap((count) =>
        Effect.annotateLogs(Effect.logDebug('Command sink stopped'), { discarded: count })
      )
    );

    return {
      stop: pipe(
        Deferred.succeed(stopSignal, undefined),
        Effect.flatMap((first) => (first ? shutdown : Effect.void)),
        Effect.as(controller)
      ),
    };
  });

export const makePoolCommandSink = (
  controller: MockPoolController
): Effect.Effect<PoolCommandSink> => makeCommandSink(controller);
