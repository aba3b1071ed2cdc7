/**
 * @consensus-harness/models
 *
 * Identifiers, slots, keys, addresses and the signed, content-addressed wrappers
 * (blocks, headers, operations, endorsements) exchanged with the consensus worker.
 */

export { Hash, hashBytes, hashString, hexToBytes, concatBytes } from './lib/hash';

export {
  BlockId,
  OperationId,
  EndorsementId,
  blockIdFromHash,
  getDummyBlockId,
} from './lib/ids';

export {
  Slot,
  SlotOrder,
  makeSlot,
  nextSlot,
  slotToString,
  slotTimestamp,
  latestSlotAt,
  type SlotTiming,
} from './lib/slot';

export {
  PrivateKey,
  PublicKey,
  Signature,
  generateRandomPrivateKey,
  derivePublicKey,
  signHash,
  verifyHashSignature,
} from './lib/keys';

export { Address, addressFromPublicKey, getAddressThread } from './lib/address';

export { Amount, amountFromString, amountFromInteger, zeroAmount } from './lib/amount';

export { canonicalize, serialize } from './lib/serialization';

export { type Wrapped, newWrapped, verifyWrapped, computeContentHash } from './lib/wrapped';

export {
  type Operation,
  type OperationType,
  type WrappedOperation,
  wrapOperation,
} from './lib/operation';

export { type Endorsement, type WrappedEndorsement, wrapEndorsement } from './lib/endorsement';

export {
  type BlockHeader,
  type WrappedHeader,
  type Block,
  type WrappedBlock,
  wrapHeader,
  wrapBlock,
  newWrappedBlock,
  computeOperationMerkleRoot,
  blockSlot,
  blockParents,
  blockOperationIds,
  verifyBlock,
} from './lib/block';

export { encrypt, decrypt } from './lib/cipher';

export { encodeStakingKeys, decodeStakingKeys } from './lib/staking-keys';

export { SignatureError, SerializationError, CipherError, KeyFileError } from './lib/errors';
