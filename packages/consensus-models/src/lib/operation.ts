import type { Address } from './address';
import type { Amount } from './amount';
import { OperationId } from './ids';
import { newWrapped, type Wrapped } from './wrapped';

export type OperationType =
  | {
      readonly _tag: 'Transaction';
      readonly recipientAddress: Address;
      readonly amount: Amount;
    }
  | {
      readonly _tag: 'RollBuy';
      readonly rollCount: number;
    }
  | {
      readonly _tag: 'RollSell';
      readonly rollCount: number;
    }
  | {
      readonly _tag: 'ExecuteSC';
      // hex-encoded bytecode
      readonly data: string;
      readonly maxGas: number;
      readonly coins: Amount;
      readonly gasPrice: Amount;
    };

export interface Operation {
  readonly fee: Amount;
  readonly expirePeriod: number;
  readonly op: OperationType;
}

export type WrappedOperation = Wrapped<Operation, OperationId>;

export const wrapOperation = newWrapped((hash) => OperationId.make(hash));
