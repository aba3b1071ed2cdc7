/**
 * Consensus configuration
 *
 * Read from the environment under a prefix (`CONSENSUS_THREAD_COUNT`, `CONSENSUS_T0`,
 * ...) by the live layer, or built in memory for tests.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Config, Effect, Layer, Schema, pipe } from 'effect';
import { PrivateKey, generateRandomPrivateKey } from '@consensus-harness/models';

export type ConsensusConfigService = {
  readonly threadCount: number;
  // Period duration in milliseconds.
  readonly t0: number;
  // Start of period 0, in milliseconds since the epoch.
  readonly genesisTimestamp: number;
  // Signs the genesis blocks.
  readonly genesisKey: PrivateKey;
  readonly channelSize: number;
  readonly maxFutureProcessingBlocks: number;
  readonly operationValidityPeriods: number;
  readonly stakingKeysPath: string;
  readonly endorsementCount: number;
};

export class ConsensusConfig extends Effect.Tag('ConsensusConfig')<
  ConsensusConfig,
  ConsensusConfigService
>() {}

const genesisKeyConfig = pipe(
  Config.string('GENESIS_KEY'),
  Config.validate({
    message: 'Expected a 64-character lowercase hex private key',
    validation: Schema.is(PrivateKey),
  })
);

export const makeConsensusConfigLive = (prefix: string) =>
  Layer.effect(
    ConsensusConfig,
    pipe(
      Config.nested(
        Config.all([
          pipe(Config.integer('THREAD_COUNT'), Config.withDefault(32)),
          pipe(Config.integer('T0'), Config.withDefault(16_000)),
          Config.integer('GENESIS_TIMESTAMP'),
          genesisKeyConfig,
          pipe(Config.integer('CHANNEL_SIZE'), Config.withDefault(256)),
          pipe(Config.integer('MAX_FUTURE_PROCESSING_BLOCKS'), Config.withDefault(10)),
          pipe(Config.integer('OPERATION_VALIDITY_PERIODS'), Config.withDefault(10)),
          Config.string('STAKING_KEYS_PATH'),
          pipe(Config.integer('ENDORSEMENT_COUNT'), Config.withDefault(16)),
        ]),
        prefix
      ),
      Effect.map(
        ([
          threadCount,
          t0,
          genesisTimestamp,
          genesisKey,
          channelSize,
          maxFutureProcessingBlocks,
          operationValidityPeriods,
          stakingKeysPath,
          endorsementCount,
        ]): ConsensusConfigService => ({
          threadCount,
          t0,
          genesisTimestamp,
          genesisKey,
          channelSize,
          maxFutureProcessingBlocks,
          operationValidityPeriods,
          stakingKeysPath,
          endorsementCount,
        })
      )
    )
  );

export const ConsensusConfigLive = makeConsensusConfigLive('CONSENSUS');

/**
 * In-memory configuration for tests: two threads, one-second periods starting now, a
 * fresh genesis key and a staking key path that does not exist yet.
 */
export const makeTestConfig = (
  overrides: Partial<ConsensusConfigService> = {}
): ConsensusConfigService => ({
  threadCount: 2,
  t0: 1_000,
  genesisTimestamp: Date.now(),
  genesisKey: generateRandomPrivateKey(),
  channelSize: 256,
  maxFutureProcessingBlocks: 10,
  operationValidityPeriods: 10,
  stakingKeysPath: join(tmpdir(), `consensus-staking-keys-${generateRandomPrivateKey()}.json`),
  endorsementCount: 8,
  ...overrides,
});
