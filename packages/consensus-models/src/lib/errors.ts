import { Data } from 'effect';

export class SignatureError extends Data.TaggedError('SignatureError')<
  Readonly<{
    readonly id: string;
    readonly details: string;
  }>
> {}

export class SerializationError extends Data.TaggedError('SerializationError')<
  Readonly<{
    readonly details: string;
    readonly cause?: unknown;
  }>
> {}

export class CipherError extends Data.TaggedError('CipherError')<
  Readonly<{
    readonly operation: 'encrypt' | 'decrypt';
    readonly details: string;
    readonly cause?: unknown;
  }>
> {}

export class KeyFileError extends Data.TaggedError('KeyFileError')<
  Readonly<{
    readonly details: string;
    readonly cause?: unknown;
  }>
> {}
