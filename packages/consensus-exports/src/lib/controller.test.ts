import { describe, expect, it } from '@effect/vitest';
import { Deferred, Effect, Fiber, pipe } from 'effect';
import { makeChannel } from '@consensus-harness/channels';
import { ConsensusCommand } from './commands';
import { makeConsensusCommandSender } from './controller';
import type { ConsensusStats } from './graph';

const stats: ConsensusStats = {
  activeBlockCount: 2,
  waitingBlockCount: 0,
  discardedBlockCount: 1,
  finalBlockCount: 2,
  stakerCount: 3,
};

const answerStats = (command: ConsensusCommand) =>
  command._tag === 'GetStats' ? Deferred.succeed(command.response, stats) : Effect.void;

describe('ConsensusCommandSender', () => {
  it.effect('resolves a request with the answer the worker puts in its response', () =>
    Effect.gen(function* () {
      const { sender, receiver } = yield* makeChannel<ConsensusCommand>('consensus-commands', 4);
      const worker = yield* Effect.fork(pipe(receiver.receive, Effect.flatMap(answerStats)));

      expect(yield* makeConsensusCommandSender(sender).getStats()).toEqual(stats);
      yield* Fiber.join(worker);
    })
  );

  it.effect('fails when the worker no longer listens', () =>
    Effect.gen(function* () {
      const { sender, receiver } = yield* makeChannel<ConsensusCommand>('consensus-commands', 4);
      yield* receiver.close;

      const error = yield* Effect.flip(makeConsensusCommandSender(sender).getStakingAddresses());
      expect(error._tag).toBe('ConsensusError');
      expect(error.details).toBe('consensus worker is not running');
    })
  );
});
