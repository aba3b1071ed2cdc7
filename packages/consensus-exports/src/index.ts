/**
 * @consensus-harness/exports
 *
 * The contract of the consensus worker: its configuration, the commands and events it
 * exchanges with protocol, pool and execution, the handles returned when it starts, and
 * the graph snapshots it imports and exports.
 */

export {
  ConsensusConfig,
  ConsensusConfigLive,
  makeConsensusConfigLive,
  makeTestConfig,
  type ConsensusConfigService,
} from './lib/config';

export {
  ProtocolCommand,
  PoolCommand,
  ExecutionCommand,
  ProtocolEvent,
  ConsensusEvent,
  ConsensusCommand,
} from './lib/commands';

export {
  makeConsensusCommandSender,
  makeConsensusEventReceiver,
  type ExecutionController,
  type ConsensusChannels,
  type ConsensusCommandSender,
  type ConsensusEventReceiver,
  type ConsensusManager,
  type ConsensusHandles,
} from './lib/controller';

export type {
  BlockRef,
  ExportActiveBlock,
  Clique,
  BootstrapableGraph,
  DiscardedBlock,
  BlockGraphExport,
  BlockGraphStatus,
  ThreadCycleState,
  ExportProofOfStake,
  ConsensusStats,
} from './lib/graph';

export { ConsensusStartError, ConsensusError } from './lib/errors';
