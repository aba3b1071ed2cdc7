import { describe, expect, it } from '@effect/vitest';
import { Effect, Fiber, Option, TestClock } from 'effect';
import { PoolCommand, ProtocolCommand } from '@consensus-harness/exports';
import { getDummyBlockId, makeSlot } from '@consensus-harness/models';
import { makeMockPoolController, makeMockProtocolController } from './mock-controller';
import {
  validateAskForBlock,
  validateBlockFound,
  validateBlockNotFound,
  validateDoesNotAskForBlock,
  validateNotPropagateBlock,
  validateNotifyBlockAttackAttempt,
  validatePropagateBlock,
  validatePropagateBlockInList,
  validateWishlist,
  waitPoolSlot,
} from './validators';

const a = getDummyBlockId('a');
const b = getDummyBlockId('b');
const c = getDummyBlockId('c');

const protocolWith = (...commands: ReadonlyArray<ProtocolCommand>) =>
  Effect.gen(function* () {
    const protocol = yield* makeMockProtocolController(16);
    yield* Effect.forEach(commands, protocol.commandSender.send, { discard: true });
    return protocol.controller;
  });

describe('block propagation', () => {
  it.effect('skips other commands until the block is integrated', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.WishlistDelta({ new: [c], remove: [] }),
        ProtocolCommand.IntegratedBlock({ blockId: b }),
        ProtocolCommand.IntegratedBlock({ blockId: a }),
        ProtocolCommand.IntegratedBlock({ blockId: c })
      );

      yield* validatePropagateBlock(protocol, a, 1000);

      expect(yield* validatePropagateBlockInList(protocol, [c], 1000)).toBe(c);
    })
  );

  it.effect('fails when the block is not integrated before the timeout', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(ProtocolCommand.IntegratedBlock({ blockId: b }));

      const fiber = yield* Effect.fork(Effect.flip(validatePropagateBlock(protocol, a, 500)));
      yield* TestClock.adjust(500);
      const error = yield* Fiber.join(fiber);

      expect(error._tag).toBe('CommandValidationError');
      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `block ${a} not propagated before timeout`
      );
    })
  );

  it.effect('reports whether another block was integrated', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.IntegratedBlock({ blockId: a }),
        ProtocolCommand.IntegratedBlock({ blockId: b })
      );

      expect(yield* validateNotPropagateBlock(protocol, a, 100)).toBe(false);
      expect(yield* validateNotPropagateBlock(protocol, a, 100)).toBe(true);
    })
  );

  it.effect('rejects an integrated block outside the expected list', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(ProtocolCommand.IntegratedBlock({ blockId: c }));

      const error = yield* Effect.flip(validatePropagateBlockInList(protocol, [a, b], 100));

      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `propagated block ${c} is not in the list`
      );
    })
  );

  it.effect('checks which block an attack was reported for', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.AttackBlockDetected({ blockId: a }),
        ProtocolCommand.AttackBlockDetected({ blockId: b })
      );

      yield* validateNotifyBlockAttackAttempt(protocol, a, 100);
      const error = yield* Effect.flip(validateNotifyBlockAttackAttempt(protocol, a, 100));

      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `attack attempt notified for ${b}`
      );
    })
  );
});

describe('wishlist', () => {
  it.effect('accepts a wish for the block alone', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(ProtocolCommand.WishlistDelta({ new: [a], remove: [] }));

      expect(yield* validateAskForBlock(protocol, a, 100)).toBe(a);
    })
  );

  it.effect('rejects a wish that carries other blocks', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.WishlistDelta({ new: [a, b], remove: [] })
      );

      const error = yield* Effect.flip(validateAskForBlock(protocol, a, 100));

      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `expected a wish for ${a} alone, got [${a}, ${b}]`
      );
    })
  );

  it.effect('compares wishlist deltas as sets', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.WishlistDelta({ new: [b, a], remove: [c] })
      );

      yield* validateWishlist(protocol, [a, b], [c], 100);
    })
  );

  it.effect('fails when a block it should not ask for is wished', () =>
    Effect.gen(function* () {
      const protocol = yield* protocolWith(
        ProtocolCommand.WishlistDelta({ new: [b], remove: [] }),
        ProtocolCommand.WishlistDelta({ new: [a], remove: [] })
      );

      yield* validateDoesNotAskForBlock(protocol, a, 100);
      const error = yield* Effect.flip(validateDoesNotAskForBlock(protocol, a, 100));

      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `unexpected ask for block ${a}`
      );
    })
  );
});

describe('block requests', () => {
  it.effect('tells found blocks from missing ones', () =>
    Effect.gen(function* () {
      const results = ProtocolCommand.GetBlocksResults({
        results: [
          [a, Option.some([])],
          [b, Option.none()],
        ],
      });
      const protocol = yield* protocolWith(results, results, results);

      yield* validateBlockFound(protocol, a, 100);
      yield* validateBlockNotFound(protocol, b, 100);
      const error = yield* Effect.flip(validateBlockFound(protocol, b, 100));

      expect(error._tag === 'CommandValidationError' && error.details).toBe(
        `block ${b} was not found`
      );
    })
  );
});

describe('waitPoolSlot', () => {
  it.effect('returns the first slot at or after the requested one', () =>
    Effect.gen(function* () {
      const pool = yield* makeMockPoolController(8);
      yield* Effect.forEach(
        [makeSlot(0, 1), makeSlot(1, 0), makeSlot(1, 1)],
        (slot) => pool.commandSender.send(PoolCommand.UpdateCurrentSlot({ slot })),
        { discard: true }
      );

      expect(yield* waitPoolSlot(pool.controller, 1000, 1, 0)).toEqual(makeSlot(1, 0));
    })
  );
});
