import { type BlockId, EndorsementId } from './ids';
import type { Slot } from './slot';
import { newWrapped, type Wrapped } from './wrapped';

export interface Endorsement {
  readonly slot: Slot;
  readonly index: number;
  readonly endorsedBlock: BlockId;
}

export type WrappedEndorsement = Wrapped<Endorsement, EndorsementId>;

export const wrapEndorsement = newWrapped((hash) => EndorsementId.make(hash));
