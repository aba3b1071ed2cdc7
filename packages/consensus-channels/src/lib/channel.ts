/**
 * Bounded Channels
 *
 * A channel is an ordered, bounded queue with one send side and one receive side.
 * Either side can close it. Once closed, sends fail and any sender suspended on a full
 * queue is released with a `ChannelClosedError`; receivers keep draining what is left
 * and fail only when the queue is empty.
 */

import { Chunk, Data, Deferred, Duration, Effect, Option, Queue, pipe } from 'effect';

// =============================================================================
// Errors
// =============================================================================

export class ChannelClosedError extends Data.TaggedError('ChannelClosedError')<
  Readonly<{
    channel: string;
  }>
> {}

// =============================================================================
// Types
// =============================================================================

export interface Sender<A> {
  readonly channel: string;
  readonly send: (message: A) => Effect.Effect<void, ChannelClosedError>;
  readonly close: Effect.Effect<void>;
}

export interface Receiver<A> {
  readonly channel: string;
  /**
   * Waits for the next message.
   */
  readonly receive: Effect.Effect<A, ChannelClosedError>;
  /**
   * Waits for the next message, giving up with `None` once `timeout` has elapsed.
   */
  readonly receiveTimeout: (
    timeout: Duration.DurationInput
  ) => Effect.Effect<Option.Option<A>, ChannelClosedError>;
  readonly poll: Effect.Effect<Option.Option<A>>;
  /**
   * Removes and returns every message currently queued, without waiting.
   */
  readonly drain: Effect.Effect<ReadonlyArray<A>>;
  readonly isClosed: Effect.Effect<boolean>;
  readonly close: Effect.Effect<void>;
}

export interface Channel<A> {
  readonly sender: Sender<A>;
  readonly receiver: Receiver<A>;
}

interface ChannelState<A> {
  readonly name: string;
  readonly queue: Queue.Queue<A>;
  readonly closed: Deferred.Deferred<void>;
}

// =============================================================================
// Send Side
// =============================================================================

const closedError = (state: { readonly name: string }) =>
  new ChannelClosedError({ channel: state.name });

const failWhenClosed = <A>(state: ChannelState<A>): Effect.Effect<never, ChannelClosedError> =>
  pipe(Deferred.await(state.closed), Effect.zipRight(Effect.fail(closedError(state))));

const offerUntilClosed =
  <A>(state: ChannelState<A>) =>
  (message: A): Effect.Effect<void, ChannelClosedError> =>
    Effect.raceFirst(
      pipe(Queue.offer(state.queue, message), Effect.asVoid),
      failWhenClosed(state)
    );

const send =
  <A>(state: ChannelState<A>) =>
  (message: A): Effect.Effect<void, ChannelClosedError> =>
    pipe(
      Deferred.isDone(state.closed),
      Effect.flatMap((isClosed) =>
        isClosed ? Effect.fail(closedError(state)) : offerUntilClosed(state)(message)
      )
    );

// =============================================================================
// Receive Side
// =============================================================================

const pollOrFail = <A>(state: ChannelState<A>): Effect.Effect<A, ChannelClosedError> =>
  pipe(
    Queue.poll(state.queue),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(closedError(state)),
        onSome: (message: A) => Effect.succeed(message),
      })
    )
  );

const takeUntilClosed = <A>(state: ChannelState<A>): Effect.Effect<A, ChannelClosedError> =>
  Effect.raceFirst(
    Queue.take(state.queue),
    pipe(Deferred.await(state.closed), Effect.zipRight(pollOrFail(state)))
  );

const receive = <A>(state: ChannelState<A>): Effect.Effect<A, ChannelClosedError> =>
  pipe(
    Queue.poll(state.queue),
    Effect.flatMap(
      Option.match({
        onNone: () => takeUntilClosed(state),
        onSome: (message: A) => Effect.succeed(message),
      })
    )
  );

const drain = <A>(state: ChannelState<A>): Effect.Effect<ReadonlyArray<A>> =>
  pipe(Queue.takeAll(state.queue), Effect.map(Chunk.toReadonlyArray));

// =============================================================================
// Construction
// =============================================================================

const close = <A>(state: ChannelState<A>): Effect.Effect<void> =>
  pipe(Deferred.succeed(state.closed, undefined), Effect.asVoid);

const buildChannel = <A>(state: ChannelState<A>): Channel<A> => ({
  sender: {
    channel: state.name,
    send: send(state),
    close: close(state),
  },
  receiver: {
    channel: state.name,
    receive: receive(state),
    receiveTimeout: (timeout) => pipe(receive(state), Effect.timeoutOption(timeout)),
    poll: Queue.poll(state.queue),
    drain: drain(state),
    isClosed: Deferred.isDone(state.closed),
    close: close(state),
  },
});

/**
 * Creates a channel holding at most `capacity` messages. Senders suspend while the
 * channel is full.
 */
export const makeChannel = <A>(name: string, capacity: number): Effect.Effect<Channel<A>> =>
  pipe(
    Effect.all({
      queue: Queue.bounded<A>(capacity),
      closed: Deferred.make<void>(),
    }),
    Effect.map(({ queue, closed }) => buildChannel({ name, queue, closed }))
  );
