import { Schema, pipe } from 'effect';

// Decimal with at most nine fractional digits, kept as text so it serializes exactly.
export const Amount = pipe(
  Schema.String,
  Schema.pattern(/^(0|[1-9]\d*)(\.\d{1,9})?$/),
  Schema.brand('Amount')
);
export type Amount = typeof Amount.Type;

export const amountFromString = (value: string) => Schema.decode(Amount)(value);

export const amountFromInteger = (value: number): Amount => Amount.make(value.toFixed(0));

export const zeroAmount: Amount = Amount.make('0');

