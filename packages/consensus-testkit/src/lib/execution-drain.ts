import { Deferred, Duration, Effect, type Fiber, pipe } from 'effect';
import type { ChannelClosedError, Receiver } from '@consensus-harness/channels';
import type { ExecutionCommand } from '@consensus-harness/exports';

export const EXECUTION_DRAIN_POLL_INTERVAL = Duration.millis(500);

const drainUntil = (
  receiver: Receiver<ExecutionCommand>,
  stopSignal: Deferred.Deferred<void>
): Effect.Effect<void, ChannelClosedError> =>
  pipe(
    Deferred.isDone(stopSignal),
    Effect.flatMap((stopped) =>
      stopped
        ? Effect.void
        : pipe(
            receiver.receiveTimeout(EXECUTION_DRAIN_POLL_INTERVAL),
            Effect.zipRight(drainUntil(receiver, stopSignal))
          )
    )
  );

/**
 * Drops blockclique updates sent to the execution collaborator. The stop signal is
 * checked between timed receives, so the fiber exits at most one poll interval after
 * it is completed.
 */
export const forkExecutionDrain = (
  receiver: Receiver<ExecutionCommand>,
  stopSignal: Deferred.Deferred<void>
): Effect.Effect<Fiber.RuntimeFiber<void, ChannelClosedError>> =>
  Effect.forkDaemon(Effect.interruptible(drainUntil(receiver, stopSignal)));
