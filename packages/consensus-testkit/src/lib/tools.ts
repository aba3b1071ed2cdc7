/**
 * Builders for test blocks, operations and endorsements, plus staking key loading
 */

import { FileSystem } from '@effect/platform';
import { Effect, HashMap, HashSet, Option, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import {
  type Address,
  type BlockId,
  type Hash,
  type OperationType,
  type PrivateKey,
  type PublicKey,
  type Slot,
  type WrappedBlock,
  type WrappedEndorsement,
  type WrappedOperation,
  KeyFileError,
  addressFromPublicKey,
  amountFromInteger,
  computeOperationMerkleRoot,
  decodeStakingKeys,
  decrypt,
  derivePublicKey,
  generateRandomPrivateKey,
  getAddressThread,
  newWrappedBlock,
  wrapEndorsement,
  wrapOperation,
} from '@consensus-harness/models';
import type { BlockGraphExport, ExportActiveBlock } from '@consensus-harness/exports';

export const TEST_PASSWORD = 'test-password';

// =============================================================================
// Addresses
// =============================================================================

export interface AddressTest {
  readonly address: Address;
  readonly privateKey: PrivateKey;
  readonly publicKey: PublicKey;
}

export const randomAddress = (): AddressTest => {
  const privateKey = generateRandomPrivateKey();
  const publicKey = derivePublicKey(privateKey);
  return { address: addressFromPublicKey(publicKey), privateKey, publicKey };
};

/**
 * Same as `randomAddress`, retried until the address lands on `thread`.
 */
export const randomAddressOnThread = (thread: number, threadCount: number): AddressTest => {
  const candidate = randomAddress();
  return getAddressThread(candidate.address, threadCount) === thread
    ? candidate
    : randomAddressOnThread(thread, threadCount);
};

export const getCreatorForDraw = (
  draw: Address,
  nodes: ReadonlyArray<PrivateKey>
): Option.Option<PrivateKey> =>
  Option.fromNullable(
    nodes.find((key) => addressFromPublicKey(derivePublicKey(key)) === draw)
  );

// =============================================================================
// Operations
// =============================================================================

const createOperation = (
  privateKey: PrivateKey,
  op: OperationType,
  expirePeriod: number,
  fee: number
): WrappedOperation =>
  wrapOperation({ fee: amountFromInteger(fee), expirePeriod, op }, privateKey);

export const createTransaction = (
  privateKey: PrivateKey,
  recipientAddress: Address,
  amount: number,
  expirePeriod: number,
  fee: number
): WrappedOperation =>
  createOperation(
    privateKey,
    { _tag: 'Transaction', recipientAddress, amount: amountFromInteger(amount) },
    expirePeriod,
    fee
  );

export const createRollTransaction = (
  privateKey: PrivateKey,
  rollCount: number,
  buy: boolean,
  expirePeriod: number,
  fee: number
): WrappedOperation =>
  createOperation(
    privateKey,
    buy ? { _tag: 'RollBuy', rollCount } : { _tag: 'RollSell', rollCount },
    expirePeriod,
    fee
  );

export const createRollBuy = (
  privateKey: PrivateKey,
  rollCount: number,
  expirePeriod: number,
  fee: number
): WrappedOperation => createRollTransaction(privateKey, rollCount, true, expirePeriod, fee);

export const createRollSell = (
  privateKey: PrivateKey,
  rollCount: number,
  expirePeriod: number,
  fee: number
): WrappedOperation => createRollTransaction(privateKey, rollCount, false, expirePeriod, fee);

export interface ExecuteSCParameters {
  readonly expirePeriod: number;
  readonly fee: number;
  // hex-encoded bytecode
  readonly data: string;
  readonly maxGas: number;
  readonly coins: number;
  readonly gasPrice: number;
}

export const createExecuteSC = (
  privateKey: PrivateKey,
  parameters: ExecuteSCParameters
): WrappedOperation =>
  createOperation(
    privateKey,
    {
      _tag: 'ExecuteSC',
      data: parameters.data,
      maxGas: parameters.maxGas,
      coins: amountFromInteger(parameters.coins),
      gasPrice: amountFromInteger(parameters.gasPrice),
    },
    parameters.expirePeriod,
    parameters.fee
  );

export const createEndorsement = (
  privateKey: PrivateKey,
  slot: Slot,
  endorsedBlock: BlockId,
  index: number
): WrappedEndorsement => wrapEndorsement({ slot, index, endorsedBlock }, privateKey);

// =============================================================================
// Blocks
// =============================================================================

/**
 * A block whose header commits to `operationMerkleRoot` but carries no operations.
 * Any root other than the one of the empty list makes the block invalid.
 */
export const createBlockWithMerkleRoot = (
  operationMerkleRoot: Hash,
  slot: Slot,
  parents: ReadonlyArray<BlockId>,
  creator: PrivateKey
): WrappedBlock =>
  newWrappedBlock({ slot, parents, operationMerkleRoot, endorsements: [] }, [], creator);

export const createBlockWithOperationsAndEndorsements = (
  slot: Slot,
  parents: ReadonlyArray<BlockId>,
  creator: PrivateKey,
  operations: ReadonlyArray<WrappedOperation>,
  endorsements: ReadonlyArray<WrappedEndorsement>
): WrappedBlock =>
  newWrappedBlock(
    {
      slot,
      parents,
      operationMerkleRoot: computeOperationMerkleRoot(operations.map((operation) => operation.id)),
      endorsements,
    },
    operations,
    creator
  );

export const createBlockWithOperations = (
  slot: Slot,
  parents: ReadonlyArray<BlockId>,
  creator: PrivateKey,
  operations: ReadonlyArray<WrappedOperation>
): WrappedBlock => createBlockWithOperationsAndEndorsements(slot, parents, creator, operations, []);

export const createBlock = (
  slot: Slot,
  parents: ReadonlyArray<BlockId>,
  creator: PrivateKey
): WrappedBlock => createBlockWithOperations(slot, parents, creator, []);

/**
 * An active block as found in a bootstrap graph, with no children on any of the
 * `threadCount` threads.
 */
export const getExportActiveTestBlock = (
  creator: PrivateKey,
  parents: ReadonlyDeep<Array<[BlockId, number]>>,
  operations: ReadonlyArray<WrappedOperation>,
  slot: Slot,
  isFinal: boolean,
  threadCount = 2
): ExportActiveBlock => {
  const block = createBlockWithOperations(
    slot,
    parents.map(([id]) => id),
    creator,
    operations
  );
  return {
    blockId: block.id,
    block,
    parents,
    children: Array.from({ length: threadCount }, () => []),
    dependencies: [],
    isFinal,
  };
};

/**
 * Indices of the cliques of `graph` containing `blockId`.
 */
export const getCliques = (graph: BlockGraphExport, blockId: BlockId): HashSet.HashSet<number> =>
  HashSet.fromIterable(
    graph.maxCliques.flatMap((clique, index) => (clique.blockIds.includes(blockId) ? [index] : []))
  );

// =============================================================================
// Staking Keys
// =============================================================================

const isFile = (fs: FileSystem.FileSystem, path: string): Effect.Effect<boolean> =>
  pipe(
    fs.stat(path),
    Effect.map((info) => info.type === 'File'),
    Effect.orElseSucceed(() => false)
  );

const readKeyFile = (
  fs: FileSystem.FileSystem,
  path: string,
  password: string
): Effect.Effect<ReadonlyArray<PrivateKey>, KeyFileError> =>
  pipe(
    fs.readFile(path),
    Effect.mapError(
      (cause) => new KeyFileError({ details: `cannot read staking key file ${path}`, cause })
    ),
    Effect.flatMap((payload) =>
      pipe(
        decrypt(password, payload),
        Effect.mapError(
          (cause) => new KeyFileError({ details: `cannot decrypt staking key file ${path}`, cause })
        )
      )
    ),
    Effect.flatMap(decodeStakingKeys)
  );

/**
 * Reads the encrypted staking key file at `path` and indexes its keys by address.
 * A path that is not a regular file yields no keys.
 */
export const loadInitialStakingKeys = (
  path: string,
  password: string
): Effect.Effect<HashMap.HashMap<Address, PrivateKey>, KeyFileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* isFile(fs, path))) {
      return HashMap.empty<Address, PrivateKey>();
    }
    const keys = yield* readKeyFile(fs, path, password);
    return HashMap.fromIterable(
      keys.map((key): readonly [Address, PrivateKey] => [
        addressFromPublicKey(derivePublicKey(key)),
        key,
      ])
    );
  });
