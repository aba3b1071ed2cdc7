/**
 * Shared object storage
 *
 * One storage instance is shared by the consensus worker and the test driving it. The
 * test seeds blocks (bootstrap graph, blocks it is about to announce) and the worker
 * looks them up by id. Storing a block also indexes the operations and endorsements it
 * carries.
 */

import { Effect, HashMap, Option, Ref, pipe } from 'effect';
import type {
  BlockId,
  EndorsementId,
  OperationId,
  WrappedBlock,
  WrappedEndorsement,
  WrappedOperation,
} from '@consensus-harness/models';

interface Value {
  readonly blocks: HashMap.HashMap<BlockId, WrappedBlock>;
  readonly operations: HashMap.HashMap<OperationId, WrappedOperation>;
  readonly endorsements: HashMap.HashMap<EndorsementId, WrappedEndorsement>;
}

export interface Storage {
  readonly storeBlock: (block: WrappedBlock) => Effect.Effect<void>;
  readonly storeBlocks: (blocks: ReadonlyArray<WrappedBlock>) => Effect.Effect<void>;
  readonly retrieveBlock: (id: BlockId) => Effect.Effect<Option.Option<WrappedBlock>>;
  readonly containsBlock: (id: BlockId) => Effect.Effect<boolean>;
  readonly blockIds: Effect.Effect<ReadonlyArray<BlockId>>;
  readonly storeOperations: (operations: ReadonlyArray<WrappedOperation>) => Effect.Effect<void>;
  readonly retrieveOperation: (id: OperationId) => Effect.Effect<Option.Option<WrappedOperation>>;
  readonly storeEndorsements: (
    endorsements: ReadonlyArray<WrappedEndorsement>
  ) => Effect.Effect<void>;
  readonly retrieveEndorsement: (
    id: EndorsementId
  ) => Effect.Effect<Option.Option<WrappedEndorsement>>;
}

const emptyValue: Value = {
  blocks: HashMap.empty(),
  operations: HashMap.empty(),
  endorsements: HashMap.empty(),
};

// =============================================================================
// Updates
// =============================================================================

const addAll = <K, V extends { readonly id: K }>(
  map: HashMap.HashMap<K, V>,
  items: ReadonlyArray<V>
): HashMap.HashMap<K, V> => items.reduce((acc, item) => HashMap.set(acc, item.id, item), map);

const withOperations =
  (operations: ReadonlyArray<WrappedOperation>) =>
  (value: Value): Value => ({ ...value, operations: addAll(value.operations, operations) });

const withEndorsements =
  (endorsements: ReadonlyArray<WrappedEndorsement>) =>
  (value: Value): Value => ({ ...value, endorsements: addAll(value.endorsements, endorsements) });

const withBlock = (block: WrappedBlock) => (value: Value) =>
  pipe(
    { ...value, blocks: HashMap.set(value.blocks, block.id, block) },
    withOperations(block.content.operations),
    withEndorsements(block.content.header.content.endorsements)
  );

const logStoredBlocks = (blocks: ReadonlyArray<WrappedBlock>) =>
  Effect.annotateLogs(Effect.logDebug('Stored blocks'), {
    blockIds: blocks.map((block) => block.id),
  });

const storeBlocksIn =
  (value: Ref.Ref<Value>) =>
  (blocks: ReadonlyArray<WrappedBlock>): Effect.Effect<void> =>
    pipe(
      value,
      Ref.update((current) => blocks.reduce((acc, block) => withBlock(block)(acc), current)),
      Effect.tap(() => logStoredBlocks(blocks))
    );

// =============================================================================
// Lookups
// =============================================================================

const lookup =
  <K, V>(value: Ref.Ref<Value>, select: (current: Value) => HashMap.HashMap<K, V>) =>
  (id: K): Effect.Effect<Option.Option<V>> =>
    pipe(
      Ref.get(value),
      Effect.map((current) => HashMap.get(select(current), id))
    );

const listBlockIds = (value: Ref.Ref<Value>): Effect.Effect<ReadonlyArray<BlockId>> =>
  pipe(
    Ref.get(value),
    Effect.map((current) => Array.from(HashMap.keys(current.blocks)))
  );

// =============================================================================
// Construction
// =============================================================================

export const makeStorage = (): Effect.Effect<Storage> =>
  pipe(
    Ref.make(emptyValue),
    Effect.map((value): Storage => {
      const retrieveBlock = lookup(value, (current) => current.blocks);
      return {
        storeBlock: (block) => storeBlocksIn(value)([block]),
        storeBlocks: storeBlocksIn(value),
        retrieveBlock,
        containsBlock: (id) => pipe(retrieveBlock(id), Effect.map(Option.isSome)),
        blockIds: listBlockIds(value),
        storeOperations: (operations) => Ref.update(value, withOperations(operations)),
        retrieveOperation: lookup(value, (current) => current.operations),
        storeEndorsements: (endorsements) => Ref.update(value, withEndorsements(endorsements)),
        retrieveEndorsement: lookup(value, (current) => current.endorsements),
      };
    })
  );
