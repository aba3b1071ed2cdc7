/**
 * Block graph exports
 *
 * Plain snapshots of the engine's block graph: handed to it at start (bootstrap) and
 * returned when the graph status is requested.
 */

import type { Address, BlockId, WrappedBlock } from '@consensus-harness/models';

// A parent or child reference together with the period of the referenced block.
export type BlockRef = readonly [BlockId, number];

export interface ExportActiveBlock {
  readonly blockId: BlockId;
  readonly block: WrappedBlock;
  // One parent per thread, in thread order.
  readonly parents: ReadonlyArray<BlockRef>;
  // Children per thread.
  readonly children: ReadonlyArray<ReadonlyArray<BlockRef>>;
  readonly dependencies: ReadonlyArray<BlockId>;
  readonly isFinal: boolean;
}

export interface Clique {
  readonly blockIds: ReadonlyArray<BlockId>;
  readonly fitness: number;
  readonly isBlockclique: boolean;
}

export interface BootstrapableGraph {
  readonly activeBlocks: ReadonlyArray<ExportActiveBlock>;
  readonly bestParents: ReadonlyArray<BlockRef>;
  readonly latestFinalBlocksPeriods: ReadonlyArray<BlockRef>;
  // Incompatibility graph: blocks each block is incompatible with.
  readonly giHead: ReadonlyArray<readonly [BlockId, ReadonlyArray<BlockId>]>;
  readonly maxCliques: ReadonlyArray<Clique>;
}

export interface DiscardedBlock {
  readonly blockId: BlockId;
  readonly reason: 'Invalid' | 'Stale';
}

export interface BlockGraphExport {
  readonly genesisBlocks: ReadonlyArray<BlockId>;
  readonly activeBlocks: ReadonlyArray<ExportActiveBlock>;
  readonly discardedBlocks: ReadonlyArray<DiscardedBlock>;
  readonly bestParents: ReadonlyArray<BlockRef>;
  readonly latestFinalBlocksPeriods: ReadonlyArray<BlockRef>;
  readonly maxCliques: ReadonlyArray<Clique>;
}

export type BlockGraphStatus =
  | 'ActiveInBlockclique'
  | 'ActiveInAlternativeCliques'
  | 'WaitingForDependencies'
  | 'Discarded'
  | 'NotFound';

export interface ThreadCycleState {
  readonly thread: number;
  readonly cycle: number;
  readonly rollCounts: ReadonlyArray<readonly [Address, number]>;
}

/**
 * Proof-of-stake state carried over from bootstrap. The engine passes it through
 * without interpreting the draws.
 */
export interface ExportProofOfStake {
  readonly cycleStates: ReadonlyArray<ThreadCycleState>;
}

export interface ConsensusStats {
  readonly activeBlockCount: number;
  readonly waitingBlockCount: number;
  readonly discardedBlockCount: number;
  readonly finalBlockCount: number;
  readonly stakerCount: number;
}
