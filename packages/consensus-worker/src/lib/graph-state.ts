/**
 * Block graph state of the reference worker
 *
 * Pure transitions over an immutable snapshot. The worker keeps the current snapshot
 * in a `Ref` and applies one transition per input it handles.
 *
 * There is no fork choice: every active block belongs to the single clique, which is
 * always the blockclique. Blocks only become final through the bootstrap graph or as
 * genesis blocks.
 */

import { HashMap, HashSet, Option, Order, pipe } from 'effect';
import {
  type BlockId,
  type Slot,
  type WrappedBlock,
  SlotOrder,
  blockParents,
  blockSlot,
} from '@consensus-harness/models';
import type {
  BlockGraphExport,
  BlockGraphStatus,
  BlockRef,
  BootstrapableGraph,
  Clique,
  ConsensusStats,
  DiscardedBlock,
  ExportActiveBlock,
} from '@consensus-harness/exports';

export interface ActiveBlock {
  readonly block: WrappedBlock;
  readonly isFinal: boolean;
  readonly children: HashSet.HashSet<BlockId>;
}

export interface GraphState {
  readonly threadCount: number;
  readonly genesisBlocks: ReadonlyArray<BlockId>;
  readonly active: HashMap.HashMap<BlockId, ActiveBlock>;
  readonly waiting: HashMap.HashMap<BlockId, WrappedBlock>;
  readonly discarded: HashMap.HashMap<BlockId, DiscardedBlock['reason']>;
  readonly wishlist: HashSet.HashSet<BlockId>;
  readonly bestParents: ReadonlyArray<BlockRef>;
  readonly latestFinalBlocksPeriods: ReadonlyArray<BlockRef>;
  readonly currentSlot: Option.Option<Slot>;
  readonly needSyncSent: boolean;
}

// =============================================================================
// Initial States
// =============================================================================

const emptyState = (threadCount: number): GraphState => ({
  threadCount,
  genesisBlocks: [],
  active: HashMap.empty(),
  waiting: HashMap.empty(),
  discarded: HashMap.empty(),
  wishlist: HashSet.empty(),
  bestParents: [],
  latestFinalBlocksPeriods: [],
  currentSlot: Option.none(),
  needSyncSent: false,
});

const refOf = (block: WrappedBlock): BlockRef => [block.id, blockSlot(block).period];

/**
 * State right after genesis: one final block per thread, each being the best parent of
 * its thread.
 */
export const fromGenesis = (genesis: ReadonlyArray<WrappedBlock>): GraphState => ({
  ...emptyState(genesis.length),
  genesisBlocks: genesis.map((block) => block.id),
  active: HashMap.fromIterable(
    genesis.map((block): readonly [BlockId, ActiveBlock] => [
      block.id,
      { block, isFinal: true, children: HashSet.empty() },
    ])
  ),
  bestParents: genesis.map(refOf),
  latestFinalBlocksPeriods: genesis.map(refOf),
});

const childrenOf = (exported: ExportActiveBlock): HashSet.HashSet<BlockId> =>
  HashSet.fromIterable(exported.children.flatMap((thread) => thread.map(([id]) => id)));

export const fromBootstrap = (threadCount: number, graph: BootstrapableGraph): GraphState => ({
  ...emptyState(threadCount),
  genesisBlocks: graph.activeBlocks
    .filter((exported) => blockSlot(exported.block).period === 0)
    .map((exported) => exported.blockId),
  active: HashMap.fromIterable(
    graph.activeBlocks.map((exported): readonly [BlockId, ActiveBlock] => [
      exported.blockId,
      { block: exported.block, isFinal: exported.isFinal, children: childrenOf(exported) },
    ])
  ),
  bestParents: graph.bestParents,
  latestFinalBlocksPeriods: graph.latestFinalBlocksPeriods,
});

// =============================================================================
// Queries
// =============================================================================

export const isKnown = (state: GraphState, id: BlockId): boolean =>
  HashMap.has(state.active, id) ||
  HashMap.has(state.waiting, id) ||
  HashMap.has(state.discarded, id);

export const missingParents = (state: GraphState, block: WrappedBlock): ReadonlyArray<BlockId> =>
  blockParents(block).filter((parent) => !HashMap.has(state.active, parent));

const BlockBySlot: Order.Order<WrappedBlock> = Order.mapInput(SlotOrder, blockSlot);

/**
 * Waiting blocks whose parents have all become active, oldest slot first.
 */
export const readyToActivate = (state: GraphState): ReadonlyArray<WrappedBlock> =>
  Array.from(HashMap.values(state.waiting))
    .filter((block) => missingParents(state, block).length === 0)
    .sort(BlockBySlot);

const activeBlocksBySlot = (state: GraphState): ReadonlyArray<ActiveBlock> =>
  Array.from(HashMap.values(state.active)).sort((a, b) => BlockBySlot(a.block, b.block));

export const blockclique = (state: GraphState): ReadonlyArray<BlockId> =>
  activeBlocksBySlot(state).map((active) => active.block.id);

export const cliques = (state: GraphState): ReadonlyArray<Clique> => [
  {
    blockIds: blockclique(state),
    fitness: activeBlocksBySlot(state).reduce(
      (fitness, active) => fitness + 1 + active.block.content.header.content.endorsements.length,
      0
    ),
    isBlockclique: true,
  },
];

export const blockStatus =
  (state: GraphState) =>
  (id: BlockId): BlockGraphStatus => {
    if (HashMap.has(state.active, id)) {
      return 'ActiveInBlockclique';
    }
    if (HashMap.has(state.waiting, id)) {
      return 'WaitingForDependencies';
    }
    return HashMap.has(state.discarded, id) ? 'Discarded' : 'NotFound';
  };

const periodOf = (state: GraphState, id: BlockId): number =>
  pipe(
    HashMap.get(state.active, id),
    Option.match({
      onNone: () => 0,
      onSome: (active) => blockSlot(active.block).period,
    })
  );

const exportActiveBlock =
  (state: GraphState) =>
  (active: ActiveBlock): ExportActiveBlock => {
    const children = Array.from(HashSet.values(active.children)).flatMap((id) =>
      pipe(
        HashMap.get(state.active, id),
        Option.match({
          onNone: (): ReadonlyArray<readonly [number, BlockRef]> => [],
          onSome: (child): ReadonlyArray<readonly [number, BlockRef]> => [
            [blockSlot(child.block).thread, [id, blockSlot(child.block).period]],
          ],
        })
      )
    );
    return {
      blockId: active.block.id,
      block: active.block,
      parents: blockParents(active.block).map((id): BlockRef => [id, periodOf(state, id)]),
      children: Array.from({ length: state.threadCount }, (_, thread) =>
        children.filter(([childThread]) => childThread === thread).map(([, ref]) => ref)
      ),
      dependencies: blockParents(active.block),
      isFinal: active.isFinal,
    };
  };

const withinSlots =
  (slotStart: Option.Option<Slot>, slotEnd: Option.Option<Slot>) =>
  (active: ActiveBlock): boolean => {
    const slot = blockSlot(active.block);
    return (
      !Option.exists(slotStart, (start) => SlotOrder(slot, start) < 0) &&
      !Option.exists(slotEnd, (end) => SlotOrder(slot, end) >= 0)
    );
  };

/**
 * Snapshot of the graph restricted to active blocks in `[slotStart, slotEnd)`.
 */
export const exportGraph = (
  state: GraphState,
  slotStart: Option.Option<Slot>,
  slotEnd: Option.Option<Slot>
): BlockGraphExport => ({
  genesisBlocks: state.genesisBlocks,
  activeBlocks: activeBlocksBySlot(state)
    .filter(withinSlots(slotStart, slotEnd))
    .map(exportActiveBlock(state)),
  discardedBlocks: Array.from(HashMap.entries(state.discarded)).map(([blockId, reason]) => ({
    blockId,
    reason,
  })),
  bestParents: state.bestParents,
  latestFinalBlocksPeriods: state.latestFinalBlocksPeriods,
  maxCliques: cliques(state),
});

export const stats = (state: GraphState, stakerCount: number): ConsensusStats => ({
  activeBlockCount: HashMap.size(state.active),
  waitingBlockCount: HashMap.size(state.waiting),
  discardedBlockCount: HashMap.size(state.discarded),
  finalBlockCount: Array.from(HashMap.values(state.active)).filter((active) => active.isFinal)
    .length,
  stakerCount,
});

// =============================================================================
// Transitions
// =============================================================================

const addChild =
  (child: BlockId) =>
  (active: ActiveBlock): ActiveBlock => ({
    ...active,
    children: HashSet.add(active.children, child),
  });

const updateBestParents = (
  bestParents: ReadonlyArray<BlockRef>,
  block: WrappedBlock
): ReadonlyArray<BlockRef> =>
  bestParents.map((best, thread) =>
    thread === blockSlot(block).thread && blockSlot(block).period > best[1] ? refOf(block) : best
  );

/**
 * Makes `block` active: links it to its parents, moves the best parent of its thread
 * forward and drops it from the waiting set and the wishlist.
 */
export const activate = (state: GraphState, block: WrappedBlock): GraphState => ({
  ...state,
  active: blockParents(block).reduce(
    (active, parent) => HashMap.modify(active, parent, addChild(block.id)),
    HashMap.set(state.active, block.id, { block, isFinal: false, children: HashSet.empty() })
  ),
  waiting: HashMap.remove(state.waiting, block.id),
  wishlist: HashSet.remove(state.wishlist, block.id),
  bestParents: updateBestParents(state.bestParents, block),
});

/**
 * Parks `block` until its missing parents arrive. Returns the parents that were not
 * already wished for or waiting, which are added to the wishlist.
 */
export const awaitParents = (
  state: GraphState,
  block: WrappedBlock,
  missing: ReadonlyArray<BlockId>
): readonly [ReadonlyArray<BlockId>, GraphState] => {
  const newWishes = missing.filter(
    (id) => !HashSet.has(state.wishlist, id) && !HashMap.has(state.waiting, id)
  );
  return [
    newWishes,
    {
      ...state,
      waiting: HashMap.set(state.waiting, block.id, block),
      wishlist: newWishes.reduce((wishlist, id) => HashSet.add(wishlist, id), state.wishlist),
    },
  ];
};

export const wish = (state: GraphState, id: BlockId): GraphState => ({
  ...state,
  wishlist: HashSet.add(state.wishlist, id),
});

export const discard = (state: GraphState, id: BlockId): GraphState => ({
  ...state,
  discarded: HashMap.set(state.discarded, id, 'Invalid'),
  waiting: HashMap.remove(state.waiting, id),
  wishlist: HashSet.remove(state.wishlist, id),
});

export const setCurrentSlot = (state: GraphState, slot: Slot): GraphState => ({
  ...state,
  currentSlot: Option.some(slot),
});

export const currentPeriod = (state: GraphState): number =>
  pipe(
    state.currentSlot,
    Option.map((slot) => slot.period),
    Option.getOrElse(() => 0)
  );
