import { describe, expect, it } from '@effect/vitest';
import { Effect, Logger, Option, pipe } from 'effect';
import { PoolCommand } from '@consensus-harness/exports';
import { makeSlot } from '@consensus-harness/models';
import { makeMockPoolController } from './mock-controller';
import { makePoolCommandSink } from './command-sink';

const silentLogger = Logger.replace(Logger.defaultLogger, Logger.none);

const slotUpdate = (period: number) =>
  PoolCommand.UpdateCurrentSlot({ slot: makeSlot(period, 0) });

describe('PoolCommandSink', () => {
  it.live('keeps a full pool channel moving until stopped', () =>
    Effect.gen(function* () {
      const pool = yield* makeMockPoolController(1);
      const sink = yield* makePoolCommandSink(pool.controller);

      yield* Effect.forEach([1, 2, 3, 4], (period) => pool.commandSender.send(slotUpdate(period)), {
        discard: true,
      });
      const controller = yield* sink.stop;

      expect(controller).toBe(pool.controller);
      expect(yield* controller.waitCommand(50, (command) => Option.some(command))).toEqual(
        Option.none()
      );
    }).pipe(Effect.provide(silentLogger))
  );

  it.live('hands the controller back for reuse after stopping', () =>
    Effect.gen(function* () {
      const pool = yield* makeMockPoolController(4);
      const controller = yield* (yield* makePoolCommandSink(pool.controller)).stop;

      yield* pool.commandSender.send(slotUpdate(7));

      expect(yield* controller.waitCommand(100, (command) => Option.some(command))).toEqual(
        Option.some(slotUpdate(7))
      );
    }).pipe(Effect.provide(silentLogger))
  );

  it.live('stops from a scope release while the channel is full', () =>
    Effect.gen(function* () {
      const pool = yield* makeMockPoolController(1);

      const finished = yield* pipe(
        Effect.scoped(
          Effect.gen(function* () {
            yield* Effect.acquireRelease(makePoolCommandSink(pool.controller), (sink) => sink.stop);
            yield* Effect.forEach(
              [1, 2, 3],
              (period) => pool.commandSender.send(slotUpdate(period)),
              { discard: true }
            );
          })
        ),
        Effect.timeoutOption('2 seconds')
      );

      expect(Option.isSome(finished)).toBe(true);
    }).pipe(Effect.provide(silentLogger))
  );

  it.live('treats a second stop as a no-op', () =>
    Effect.gen(function* () {
      const pool = yield* makeMockPoolController(4);
      const sink = yield* makePoolCommandSink(pool.controller);

      const first = yield* sink.stop;
      const second = yield* sink.stop;

      expect(second).toBe(first);
    }).pipe(Effect.provide(silentLogger))
  );
});
