/**
 * Assertions over the commands the worker emits
 *
 * Each helper consumes commands from a mock controller through `waitCommand`, so
 * commands that do not match are gone once it returns. Failed expectations fail the
 * effect with a `CommandValidationError`.
 */

import { Data, Duration, Effect, Equal, HashSet, Option, pipe } from 'effect';
import type { ChannelClosedError } from '@consensus-harness/channels';
import {
  type BlockId,
  type PrivateKey,
  type Slot,
  type WrappedBlock,
  SlotOrder,
  makeSlot,
} from '@consensus-harness/models';
import type { PoolCommand, ProtocolCommand } from '@consensus-harness/exports';
import type { MockPoolController, MockProtocolController } from './mock-controller';
import { createBlock } from './tools';

export class CommandValidationError extends Data.TaggedError('CommandValidationError')<
  Readonly<{
    details: string;
  }>
> {}

type Validation<A> = Effect.Effect<A, CommandValidationError | ChannelClosedError>;

const invalid = (details: string) => Effect.fail(new CommandValidationError({ details }));

const orFail =
  (details: string) =>
  <A>(found: Option.Option<A>): Validation<A> =>
    Option.match(found, {
      onNone: () => invalid(details),
      onSome: (value) => Effect.succeed(value),
    });

// =============================================================================
// Projections
// =============================================================================

const integratedBlock = (command: ProtocolCommand): Option.Option<BlockId> =>
  command._tag === 'IntegratedBlock' ? Option.some(command.blockId) : Option.none();

interface WishlistChange {
  readonly new: ReadonlyArray<BlockId>;
  readonly remove: ReadonlyArray<BlockId>;
}

const wishlistDelta = (command: ProtocolCommand): Option.Option<WishlistChange> =>
  command._tag === 'WishlistDelta'
    ? Option.some({ new: command.new, remove: command.remove })
    : Option.none();

type GetBlocksResults = Extract<ProtocolCommand, { readonly _tag: 'GetBlocksResults' }>['results'];

const getBlocksResults = (command: ProtocolCommand): Option.Option<GetBlocksResults> =>
  command._tag === 'GetBlocksResults' ? Option.some(command.results) : Option.none();

const attackedBlock = (command: ProtocolCommand): Option.Option<BlockId> =>
  command._tag === 'AttackBlockDetected' ? Option.some(command.blockId) : Option.none();

const sameSet = (left: ReadonlyArray<BlockId>, right: ReadonlyArray<BlockId>): boolean =>
  Equal.equals(HashSet.fromIterable(left), HashSet.fromIterable(right));

// =============================================================================
// Block Propagation
// =============================================================================

export const validatePropagateBlock = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<void> =>
  pipe(
    protocol.waitCommand(timeout, (command) =>
      pipe(
        integratedBlock(command),
        Option.filter((integrated) => integrated === blockId)
      )
    ),
    Effect.flatMap(orFail(`block ${blockId} not propagated before timeout`)),
    Effect.asVoid
  );

/**
 * True when some other block was integrated before the timeout.
 */
export const validateNotPropagateBlock = (
  protocol: MockProtocolController,
  notPropagated: BlockId,
  timeout: Duration.DurationInput
): Effect.Effect<boolean, ChannelClosedError> =>
  pipe(
    protocol.waitCommand(timeout, integratedBlock),
    Effect.map((integrated) => Option.exists(integrated, (blockId) => blockId !== notPropagated))
  );

/**
 * True when a block outside `notPropagated` was integrated before the timeout.
 */
export const validateNotPropagateBlockInList = (
  protocol: MockProtocolController,
  notPropagated: ReadonlyArray<BlockId>,
  timeout: Duration.DurationInput
): Effect.Effect<boolean, ChannelClosedError> =>
  pipe(
    protocol.waitCommand(timeout, integratedBlock),
    Effect.map((integrated) =>
      Option.exists(integrated, (blockId) => !notPropagated.includes(blockId))
    )
  );

export const validatePropagateBlockInList = (
  protocol: MockProtocolController,
  valid: ReadonlyArray<BlockId>,
  timeout: Duration.DurationInput
): Validation<BlockId> =>
  pipe(
    protocol.waitCommand(timeout, integratedBlock),
    Effect.flatMap(orFail('no block propagated before timeout')),
    Effect.filterOrFail(
      (blockId) => valid.includes(blockId),
      (blockId) =>
        new CommandValidationError({ details: `propagated block ${blockId} is not in the list` })
    )
  );

export const validateNotifyBlockAttackAttempt = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<void> =>
  pipe(
    protocol.waitCommand(timeout, attackedBlock),
    Effect.flatMap(orFail('attack attempt not notified before timeout')),
    Effect.filterOrFail(
      (notified) => notified === blockId,
      (notified) =>
        new CommandValidationError({ details: `attack attempt notified for ${notified}` })
    ),
    Effect.asVoid
  );

// =============================================================================
// Wishlist
// =============================================================================

export const validateAskForBlock = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<BlockId> =>
  pipe(
    protocol.waitCommand(timeout, wishlistDelta),
    Effect.flatMap(orFail(`block ${blockId} not asked for before timeout`)),
    Effect.filterOrFail(
      (delta) => delta.new.length === 1 && delta.new[0] === blockId,
      (delta) =>
        new CommandValidationError({
          details: `expected a wish for ${blockId} alone, got [${delta.new.join(', ')}]`,
        })
    ),
    Effect.as(blockId)
  );

export const validateWishlist = (
  protocol: MockProtocolController,
  expectedNew: ReadonlyArray<BlockId>,
  expectedRemove: ReadonlyArray<BlockId>,
  timeout: Duration.DurationInput
): Validation<void> =>
  pipe(
    protocol.waitCommand(timeout, wishlistDelta),
    Effect.flatMap(orFail('wishlist delta not sent before timeout')),
    Effect.filterOrFail(
      (delta) => sameSet(delta.new, expectedNew) && sameSet(delta.remove, expectedRemove),
      (delta) =>
        new CommandValidationError({
          details:
            `unexpected wishlist delta: new [${delta.new.join(', ')}], ` +
            `remove [${delta.remove.join(', ')}]`,
        })
    ),
    Effect.asVoid
  );

/**
 * Succeeds when the next wishlist delta, if any arrives before the timeout, does not
 * ask for `blockId`.
 */
export const validateDoesNotAskForBlock = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<void> =>
  pipe(
    protocol.waitCommand(timeout, wishlistDelta),
    Effect.flatMap((delta) =>
      Option.exists(delta, (found) => found.new.includes(blockId))
        ? invalid(`unexpected ask for block ${blockId}`)
        : Effect.void
    )
  );

// =============================================================================
// Block Requests
// =============================================================================

const validateBlockLookup = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput,
  expectFound: boolean
): Validation<void> =>
  pipe(
    protocol.waitCommand(timeout, getBlocksResults),
    Effect.flatMap(orFail('get blocks results not sent before timeout')),
    Effect.map((results) => Option.fromNullable(results.find(([id]) => id === blockId))),
    Effect.flatMap(orFail(`block ${blockId} missing from get blocks results`)),
    Effect.filterOrFail(
      ([, operations]) => Option.isSome(operations) === expectFound,
      () =>
        new CommandValidationError({
          details: `block ${blockId} was ${expectFound ? 'not found' : 'found'}`,
        })
    ),
    Effect.asVoid
  );

export const validateBlockFound = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<void> => validateBlockLookup(protocol, blockId, timeout, true);

export const validateBlockNotFound = (
  protocol: MockProtocolController,
  blockId: BlockId,
  timeout: Duration.DurationInput
): Validation<void> => validateBlockLookup(protocol, blockId, timeout, false);

// =============================================================================
// Stimulus and Check
// =============================================================================

/**
 * Sends `block` to the worker, then checks it is integrated within `timeout` when
 * `valid`, or drains integrations for `timeout` otherwise.
 */
export const propagateBlock = (
  protocol: MockProtocolController,
  block: WrappedBlock,
  valid: boolean,
  timeout: Duration.DurationInput
): Validation<BlockId> =>
  pipe(
    protocol.receiveBlock(block),
    Effect.zipRight(
      valid
        ? validatePropagateBlock(protocol, block.id, timeout)
        : Effect.asVoid(validateNotPropagateBlock(protocol, block.id, timeout))
    ),
    Effect.as(block.id)
  );

export const createAndTestBlock = (
  protocol: MockProtocolController,
  slot: Slot,
  parents: ReadonlyArray<BlockId>,
  valid: boolean,
  trace: boolean,
  creator: PrivateKey
): Validation<BlockId> => {
  const block = createBlock(slot, parents, creator);
  return pipe(
    trace
      ? Effect.annotateLogs(Effect.logInfo('Created block'), { blockId: block.id })
      : Effect.void,
    Effect.zipRight(propagateBlock(protocol, block, valid, valid ? 2000 : 500))
  );
};

/**
 * Waits, up to two slot durations, for the pool to be told of a slot at or after
 * `(period, thread)`.
 */
export const waitPoolSlot = (
  pool: MockPoolController,
  t0: number,
  period: number,
  thread: number
): Validation<Slot> =>
  pipe(
    pool.waitCommand(Duration.millis(t0 * 2), (command: PoolCommand): Option.Option<Slot> =>
      command._tag === 'UpdateCurrentSlot' &&
      SlotOrder(command.slot, makeSlot(period, thread)) >= 0
        ? Option.some(command.slot)
        : Option.none()
    ),
    Effect.flatMap(orFail('timeout while waiting for slot'))
  );
