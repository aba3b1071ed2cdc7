/**
 * Mock collaborators
 *
 * A mock controller owns the receive end of one outbound channel of the consensus
 * worker. Tests observe commands through `waitCommand`; commands that do not match the
 * predicate are consumed and dropped, never requeued.
 */

import { Duration, Effect, Fiber, Option, pipe } from 'effect';
import {
  type ChannelClosedError,
  type Receiver,
  type Sender,
  makeChannel,
} from '@consensus-harness/channels';
import {
  ExecutionCommand,
  type ExecutionController,
  type PoolCommand,
  type ProtocolCommand,
  ProtocolEvent,
} from '@consensus-harness/exports';
import type {
  BlockId,
  WrappedBlock,
  WrappedEndorsement,
  WrappedHeader,
  WrappedOperation,
} from '@consensus-harness/models';

// =============================================================================
// Predicate Waiter
// =============================================================================

const firstMatch = <C, R>(
  receiver: Receiver<C>,
  predicate: (command: C) => Option.Option<R>
): Effect.Effect<R, ChannelClosedError> =>
  pipe(
    receiver.receive,
    Effect.map(predicate),
    Effect.flatMap((projected) =>
      Option.match(projected, {
        onNone: () => firstMatch(receiver, predicate),
        onSome: (value) => Effect.succeed(value),
      })
    )
  );

/**
 * Receives commands until one matches `predicate` and returns its projection. Gives up
 * with `None` once `timeout` has elapsed since the call, whatever was consumed by then.
 */
export const waitCommand = <C, R>(
  receiver: Receiver<C>,
  timeout: Duration.DurationInput,
  predicate: (command: C) => Option.Option<R>
): Effect.Effect<Option.Option<R>, ChannelClosedError> =>
  pipe(firstMatch(receiver, predicate), Effect.timeoutOption(timeout));

// =============================================================================
// Shared Controller Behaviour
// =============================================================================

export interface MockController<C> {
  readonly waitCommand: <R>(
    timeout: Duration.DurationInput,
    predicate: (command: C) => Option.Option<R>
  ) => Effect.Effect<Option.Option<R>, ChannelClosedError>;
  /**
   * Runs `operation` while a second fiber receives and drops every command. Once the
   * operation is done the drain fiber is interrupted and whatever it left queued is
   * dropped too.
   */
  readonly ignoreCommandsWhile: <A, E, R>(
    operation: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
}

/**
 * What a command sink needs from a controller.
 */
export interface DrainableController {
  readonly discardNext: Effect.Effect<void, ChannelClosedError>;
  readonly discardPending: Effect.Effect<number>;
}

const discardForever = <C>(receiver: Receiver<C>): Effect.Effect<void> =>
  pipe(
    receiver.receive,
    Effect.forever,
    Effect.catchTag('ChannelClosedError', () => Effect.void)
  );

const makeMockController = <C>(
  receiver: Receiver<C>
): MockController<C> & DrainableController => {
  const discardPending = pipe(
    receiver.drain,
    Effect.map((commands) => commands.length)
  );
  return {
    waitCommand: (timeout, predicate) => waitCommand(receiver, timeout, predicate),
    ignoreCommandsWhile: (operation) =>
      pipe(
        Effect.fork(Effect.interruptible(discardForever(receiver))),
        Effect.flatMap((drain) => pipe(operation, Effect.ensuring(Fiber.interrupt(drain)))),
        Effect.ensuring(discardPending)
      ),
    discardNext: Effect.asVoid(receiver.receive),
    discardPending,
  };
};

// =============================================================================
// Protocol
// =============================================================================

export interface MockProtocolController
  extends MockController<ProtocolCommand>,
    DrainableController {
  readonly receiveBlock: (block: WrappedBlock) => Effect.Effect<void, ChannelClosedError>;
  readonly receiveHeader: (header: WrappedHeader) => Effect.Effect<void, ChannelClosedError>;
  readonly receiveGetActiveBlocks: (
    blockIds: ReadonlyArray<BlockId>
  ) => Effect.Effect<void, ChannelClosedError>;
  readonly receiveEndorsements: (
    endorsements: ReadonlyArray<WrappedEndorsement>
  ) => Effect.Effect<void, ChannelClosedError>;
  readonly receiveOperations: (
    operations: ReadonlyArray<WrappedOperation>
  ) => Effect.Effect<void, ChannelClosedError>;
}

export interface MockProtocolWiring {
  readonly controller: MockProtocolController;
  readonly commandSender: Sender<ProtocolCommand>;
  readonly eventReceiver: Receiver<ProtocolEvent>;
}

export const makeMockProtocolController = (
  capacity: number
): Effect.Effect<MockProtocolWiring> =>
  Effect.gen(function* () {
    const commands = yield* makeChannel<ProtocolCommand>('protocol-commands', capacity);
    const events = yield* makeChannel<ProtocolEvent>('protocol-events', capacity);
    const send = events.sender.send;
    const controller: MockProtocolController = {
      ...makeMockController(commands.receiver),
      receiveBlock: (block) => send(ProtocolEvent.ReceivedBlock({ block })),
      receiveHeader: (header) => send(ProtocolEvent.ReceivedBlockHeader({ header })),
      receiveGetActiveBlocks: (blockIds) => send(ProtocolEvent.GetBlocks({ blockIds })),
      receiveEndorsements: (endorsements) =>
        send(ProtocolEvent.ReceivedEndorsements({ endorsements })),
      receiveOperations: (operations) => send(ProtocolEvent.ReceivedOperations({ operations })),
    };
    return { controller, commandSender: commands.sender, eventReceiver: events.receiver };
  });

// =============================================================================
// Pool
// =============================================================================

export interface MockPoolController extends MockController<PoolCommand>, DrainableController {}

export interface MockPoolWiring {
  readonly controller: MockPoolController;
  readonly commandSender: Sender<PoolCommand>;
}

export const makeMockPoolController = (capacity: number): Effect.Effect<MockPoolWiring> =>
  pipe(
    makeChannel<PoolCommand>('pool-commands', capacity),
    Effect.map((commands) => ({
      controller: makeMockController(commands.receiver),
      commandSender: commands.sender,
    }))
  );

// =============================================================================
// Execution
// =============================================================================

/**
 * Handed to the worker as its execution collaborator: every call becomes an
 * `ExecutionCommand` on the controller's channel.
 */
export interface MockExecutionController
  extends ExecutionController,
    MockController<ExecutionCommand>,
    DrainableController {}

export interface MockExecutionWiring {
  readonly controller: MockExecutionController;
  readonly commandReceiver: Receiver<ExecutionCommand>;
}

export const makeMockExecutionController = (
  capacity: number
): Effect.Effect<MockExecutionWiring> =>
  Effect.gen(function* () {
    const commands = yield* makeChannel<ExecutionCommand>('execution-commands', capacity);
    const controller: MockExecutionController = {
      ...makeMockController(commands.receiver),
      updateBlockcliqueStatus: (finalizedBlocks, blockclique) =>
        commands.sender.send(
          ExecutionCommand.UpdateBlockcliqueStatus({ finalizedBlocks, blockclique })
        ),
    };
    return { controller, commandReceiver: commands.receiver };
  });
