/**
 * @consensus-harness/worker
 *
 * A small in-process consensus worker speaking the contract of
 * `@consensus-harness/exports`. It has no fork choice and no finality rules of its own;
 * it exists to give the test harness a real engine to drive.
 */

export {
  startConsensusController,
  createGenesisBlocks,
  type StartConsensusParameters,
} from './lib/start';
