import { describe, expect, it } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import { Address, addressFromPublicKey, getAddressThread } from './address';
import { amountFromInteger } from './amount';
import { computeOperationMerkleRoot, newWrappedBlock, verifyBlock } from './block';
import { hashString } from './hash';
import { generateRandomPrivateKey, derivePublicKey } from './keys';
import { type Operation, wrapOperation } from './operation';
import { makeSlot } from './slot';
import { verifyWrapped } from './wrapped';

const rollBuy = (rollCount: number): Operation => ({
  fee: amountFromInteger(1),
  expirePeriod: 10,
  op: { _tag: 'RollBuy', rollCount },
});

describe('Address', () => {
  it('takes the thread from the top bits of the first hash byte', () => {
    const high = Address.make(`Aff${'0'.repeat(62)}`);
    const low = Address.make(`A08${'0'.repeat(62)}`);
    expect(getAddressThread(high, 32)).toBe(31);
    expect(getAddressThread(low, 32)).toBe(1);
    expect(getAddressThread(high, 1)).toBe(0);
  });
});

describe('Wrapped content', () => {
  it.effect('verifies content it signed', () => {
    const privateKey = generateRandomPrivateKey();
    const operation = wrapOperation(rollBuy(3), privateKey);

    expect(operation.creatorPublicKey).toBe(derivePublicKey(privateKey));
    expect(operation.creatorAddress).toBe(addressFromPublicKey(derivePublicKey(privateKey)));
    return pipe(
      verifyWrapped(operation),
      Effect.map((verified) => expect(verified.id).toBe(operation.id))
    );
  });

  it('derives the same id for the same content and creator', () => {
    const privateKey = generateRandomPrivateKey();
    expect(wrapOperation(rollBuy(1), privateKey).id).toBe(wrapOperation(rollBuy(1), privateKey).id);
    expect(wrapOperation(rollBuy(1), privateKey).id).not.toBe(
      wrapOperation(rollBuy(2), privateKey).id
    );
  });

  it.effect('rejects content altered after signing', () => {
    const operation = wrapOperation(rollBuy(3), generateRandomPrivateKey());
    const tampered = { ...operation, content: rollBuy(4) };

    return pipe(
      verifyWrapped(tampered),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('SignatureError');
        expect(error.details).toBe('id does not match content hash');
      })
    );
  });
});

describe('Block', () => {
  it.effect('verifies a block whose merkle root commits to its operations', () => {
    const creator = generateRandomPrivateKey();
    const operations = [wrapOperation(rollBuy(1), creator), wrapOperation(rollBuy(2), creator)];
    const block = newWrappedBlock(
      {
        slot: makeSlot(1, 0),
        parents: [],
        operationMerkleRoot: computeOperationMerkleRoot(operations.map((op) => op.id)),
        endorsements: [],
      },
      operations,
      creator
    );

    expect(block.id).toBe(block.content.header.id);
    return pipe(
      verifyBlock(block),
      Effect.map((verified) => expect(verified.id).toBe(block.id))
    );
  });

  it.effect('rejects a block whose merkle root does not match its operations', () => {
    const creator = generateRandomPrivateKey();
    const block = newWrappedBlock(
      {
        slot: makeSlot(1, 0),
        parents: [],
        operationMerkleRoot: hashString('default_val'),
        endorsements: [],
      },
      [],
      creator
    );

    return pipe(
      verifyBlock(block),
      Effect.flip,
      Effect.map((error) => expect(error.details).toBe('operation merkle root mismatch'))
    );
  });
});
