import { describe, expect, it } from '@effect/vitest';
import { Deferred, Effect, Exit, Fiber } from 'effect';
import { makeChannel } from '@consensus-harness/channels';
import { ExecutionCommand } from '@consensus-harness/exports';
import { getDummyBlockId } from '@consensus-harness/models';
import { forkExecutionDrain } from './execution-drain';

describe('forkExecutionDrain', () => {
  it.live('keeps a full execution channel moving and exits once signalled', () =>
    Effect.gen(function* () {
      const { sender, receiver } = yield* makeChannel<ExecutionCommand>('execution', 1);
      const stopSignal = yield* Deferred.make<void>();
      const drain = yield* forkExecutionDrain(receiver, stopSignal);

      yield* Effect.forEach(
        ['a', 'b', 'c'],
        (label) =>
          sender.send(
            ExecutionCommand.UpdateBlockcliqueStatus({
              finalizedBlocks: [],
              blockclique: [getDummyBlockId(label)],
            })
          ),
        { discard: true }
      );
      yield* Deferred.succeed(stopSignal, undefined);

      expect(Exit.isSuccess(yield* Fiber.await(drain))).toBe(true);
    })
  );
});
