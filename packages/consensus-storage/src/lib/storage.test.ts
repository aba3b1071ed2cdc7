import { describe, expect, it } from '@effect/vitest';
import { Effect, Option } from 'effect';
import {
  amountFromInteger,
  computeOperationMerkleRoot,
  generateRandomPrivateKey,
  getDummyBlockId,
  makeSlot,
  newWrappedBlock,
  type Operation,
  wrapOperation,
} from '@consensus-harness/models';
import { makeStorage } from './storage';

const creator = generateRandomPrivateKey();

const operation = wrapOperation<Operation>(
  { fee: amountFromInteger(0), expirePeriod: 5, op: { _tag: 'RollSell', rollCount: 1 } },
  creator
);

const block = newWrappedBlock(
  {
    slot: makeSlot(1, 0),
    parents: [],
    operationMerkleRoot: computeOperationMerkleRoot([operation.id]),
    endorsements: [],
  },
  [operation],
  creator
);

describe('Storage', () => {
  it.effect('retrieves a stored block by id', () =>
    Effect.gen(function* () {
      const storage = yield* makeStorage();
      yield* storage.storeBlock(block);

      expect(yield* storage.retrieveBlock(block.id)).toEqual(Option.some(block));
      expect(yield* storage.containsBlock(block.id)).toBe(true);
      expect(yield* storage.blockIds).toEqual([block.id]);
    })
  );

  it.effect('indexes the operations carried by a stored block', () =>
    Effect.gen(function* () {
      const storage = yield* makeStorage();
      yield* storage.storeBlock(block);

      expect(yield* storage.retrieveOperation(operation.id)).toEqual(Option.some(operation));
    })
  );

  it.effect('reports unknown blocks as absent', () =>
    Effect.gen(function* () {
      const storage = yield* makeStorage();

      expect(yield* storage.retrieveBlock(getDummyBlockId('missing'))).toEqual(Option.none());
      expect(yield* storage.containsBlock(getDummyBlockId('missing'))).toBe(false);
    })
  );
});
