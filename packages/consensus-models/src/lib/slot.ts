/**
 * Slots
 *
 * A slot is a (period, thread) pair. Slots are totally ordered by period first, then
 * thread; within a period each thread gets an equal share of `t0`.
 */

import { Option, Order, Schema, pipe } from 'effect';

export const Slot = Schema.Struct({
  period: pipe(Schema.Number, Schema.int(), Schema.nonNegative()),
  thread: pipe(Schema.Number, Schema.int(), Schema.nonNegative()),
});
export type Slot = typeof Slot.Type;

export const makeSlot = (period: number, thread: number): Slot => ({ period, thread });

export const SlotOrder: Order.Order<Slot> = Order.combine(
  Order.mapInput(Order.number, (slot: Slot) => slot.period),
  Order.mapInput(Order.number, (slot: Slot) => slot.thread)
);

export const nextSlot =
  (threadCount: number) =>
  (slot: Slot): Slot =>
    slot.thread + 1 >= threadCount
      ? makeSlot(slot.period + 1, 0)
      : makeSlot(slot.period, slot.thread + 1);

export const slotToString = (slot: Slot): string =>
  `(period: ${slot.period}, thread: ${slot.thread})`;

export interface SlotTiming {
  readonly threadCount: number;
  readonly t0: number;
  readonly genesisTimestamp: number;
}

/**
 * Timestamp (ms) at which a slot starts.
 */
export const slotTimestamp =
  (timing: SlotTiming) =>
  (slot: Slot): number =>
    timing.genesisTimestamp +
    slot.period * timing.t0 +
    Math.floor((slot.thread * timing.t0) / timing.threadCount);

/**
 * Latest slot that has started at `timestamp`, or none before genesis.
 */
export const latestSlotAt =
  (timing: SlotTiming) =>
  (timestamp: number): Option.Option<Slot> => {
    if (timestamp < timing.genesisTimestamp) {
      return Option.none();
    }
    const elapsed = timestamp - timing.genesisTimestamp;
    const period = Math.floor(elapsed / timing.t0);
    const thread = Math.floor(((elapsed % timing.t0) * timing.threadCount) / timing.t0);
    return Option.some(makeSlot(period, Math.min(thread, timing.threadCount - 1)));
  };
