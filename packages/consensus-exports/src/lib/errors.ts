import { Data } from 'effect';

export class ConsensusStartError extends Data.TaggedError('ConsensusStartError')<
  Readonly<{
    readonly details: string;
  }>
> {}

export class ConsensusError extends Data.TaggedError('ConsensusError')<
  Readonly<{
    readonly details: string;
    readonly cause?: unknown;
  }>
> {}
