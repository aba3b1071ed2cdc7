/**
 * @consensus-harness/testkit
 *
 * Drives a consensus worker from tests: mock protocol, pool and execution
 * collaborators, a predicate waiter over their command channels, command sinks, the
 * start/stop orchestration and helpers to build blocks and check what the worker
 * emits.
 */

export {
  waitCommand,
  makeMockProtocolController,
  makeMockPoolController,
  makeMockExecutionController,
  type MockController,
  type DrainableController,
  type MockProtocolController,
  type MockProtocolWiring,
  type MockPoolController,
  type MockPoolWiring,
  type MockExecutionController,
  type MockExecutionWiring,
} from './lib/mock-controller';

export {
  makeCommandSink,
  makePoolCommandSink,
  type CommandSink,
  type PoolCommandSink,
} from './lib/command-sink';

export { forkExecutionDrain, EXECUTION_DRAIN_POLL_INTERVAL } from './lib/execution-drain';

export {
  consensusPoolTest,
  consensusPoolTestWithStorage,
  consensusWithoutPoolTest,
  consensusWithoutPoolTestWithStorage,
  HarnessStepError,
  type HarnessState,
  type HarnessStep,
  type ConsensusTestContext,
  type ConsensusTestWithStorageContext,
  type ConsensusPoolTestContext,
  type ConsensusPoolTestWithStorageContext,
} from './lib/orchestrator';

export {
  CommandValidationError,
  validatePropagateBlock,
  validateNotPropagateBlock,
  validateNotPropagateBlockInList,
  validatePropagateBlockInList,
  validateNotifyBlockAttackAttempt,
  validateAskForBlock,
  validateWishlist,
  validateDoesNotAskForBlock,
  validateBlockFound,
  validateBlockNotFound,
  propagateBlock,
  createAndTestBlock,
  waitPoolSlot,
} from './lib/validators';

export {
  TEST_PASSWORD,
  randomAddress,
  randomAddressOnThread,
  getCreatorForDraw,
  createTransaction,
  createRollTransaction,
  createRollBuy,
  createRollSell,
  createExecuteSC,
  createEndorsement,
  createBlock,
  createBlockWithMerkleRoot,
  createBlockWithOperations,
  createBlockWithOperationsAndEndorsements,
  getExportActiveTestBlock,
  getCliques,
  loadInitialStakingKeys,
  type AddressTest,
  type ExecuteSCParameters,
} from './lib/tools';
