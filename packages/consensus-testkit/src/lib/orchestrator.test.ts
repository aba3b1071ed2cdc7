import { FileSystem } from '@effect/platform';
import { NodeFileSystem } from '@effect/platform-node';
import { describe, expect, it } from '@effect/vitest';
import { Effect, HashMap, Logger, Option, Ref, pipe } from 'effect';
import {
  type BlockId,
  type Slot,
  type WrappedBlock,
  encodeStakingKeys,
  encrypt,
  generateRandomPrivateKey,
  getDummyBlockId,
  makeSlot,
} from '@consensus-harness/models';
import {
  ConsensusStartError,
  ProtocolCommand,
  makeTestConfig,
  type BootstrapableGraph,
  type ConsensusCommandSender,
  type ExportActiveBlock,
} from '@consensus-harness/exports';
import { createGenesisBlocks } from '@consensus-harness/worker';
import {
  consensusPoolTest,
  consensusPoolTestWithStorage,
  consensusWithoutPoolTest,
} from './orchestrator';
import {
  TEST_PASSWORD,
  createBlock,
  getCliques,
  getExportActiveTestBlock,
  loadInitialStakingKeys,
  randomAddress,
} from './tools';
import {
  createAndTestBlock,
  validateBlockFound,
  validateBlockNotFound,
  validateNotifyBlockAttackAttempt,
  waitPoolSlot,
} from './validators';

const silentLogger = Logger.replace(Logger.defaultLogger, Logger.none);

const integratedId = (command: ProtocolCommand): Option.Option<BlockId> =>
  command._tag === 'IntegratedBlock' ? Option.some(command.blockId) : Option.none();

const wishlistDelta = (command: ProtocolCommand): Option.Option<ProtocolCommand> =>
  command._tag === 'WishlistDelta' ? Option.some(command) : Option.none();

const genesisIds = (config: Parameters<typeof createGenesisBlocks>[0]): ReadonlyArray<BlockId> =>
  createGenesisBlocks(config).map((block) => block.id);

const exportGenesis = (block: WrappedBlock): ExportActiveBlock => ({
  blockId: block.id,
  block,
  parents: [],
  children: [[], []],
  dependencies: [],
  isFinal: true,
});

describe('consensusWithoutPoolTest', () => {
  it.live('propagates a valid block built on the genesis blocks', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const found = yield* Ref.make(Option.none<BlockId>());
      const block = createBlock(makeSlot(1, 0), genesisIds(config), generateRandomPrivateKey());

      yield* consensusWithoutPoolTest(config, (context) =>
        Effect.gen(function* () {
          yield* context.protocolController.receiveBlock(block);
          yield* Ref.set(
            found,
            yield* context.protocolController.waitCommand(2000, integratedId)
          );
          return context;
        })
      );

      expect(yield* Ref.get(found)).toEqual(Option.some(block.id));
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('does not propagate a block whose parent is unknown', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const found = yield* Ref.make(Option.some(getDummyBlockId('unset')));
      const [, secondGenesis] = genesisIds(config);
      const block = createBlock(
        makeSlot(1, 0),
        [getDummyBlockId('missing'), secondGenesis],
        generateRandomPrivateKey()
      );

      yield* consensusWithoutPoolTest(config, (context) =>
        Effect.gen(function* () {
          yield* context.protocolController.receiveBlock(block);
          yield* Ref.set(found, yield* context.protocolController.waitCommand(500, integratedId));
          return context;
        })
      );

      expect(yield* Ref.get(found)).toEqual(Option.none());
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('asks once for the block of an unknown header', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const block = createBlock(makeSlot(1, 1), genesisIds(config), generateRandomPrivateKey());
      const wishes = yield* Ref.make<ReadonlyArray<Option.Option<ProtocolCommand>>>([]);

      yield* consensusWithoutPoolTest(config, (context) =>
        Effect.gen(function* () {
          const protocol = context.protocolController;
          yield* protocol.receiveHeader(block.content.header);
          yield* protocol.receiveHeader(block.content.header);
          const first = yield* protocol.waitCommand(1000, wishlistDelta);
          const second = yield* protocol.waitCommand(300, wishlistDelta);
          yield* Ref.set(wishes, [first, second]);
          return context;
        })
      );

      expect(yield* Ref.get(wishes)).toEqual([
        Option.some(ProtocolCommand.WishlistDelta({ new: [block.id], remove: [] })),
        Option.none(),
      ]);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('sends no protocol command while nothing happens', () =>
    Effect.gen(function* () {
      const idle = yield* Ref.make<Option.Option<ProtocolCommand>>(
        Option.some(ProtocolCommand.IntegratedBlock({ blockId: getDummyBlockId('unset') }))
      );

      yield* consensusWithoutPoolTest(makeTestConfig(), (context) =>
        Effect.gen(function* () {
          const command = yield* context.protocolController.waitCommand(500, (received) =>
            Option.some(received)
          );
          yield* Ref.set(idle, command);
          return context;
        })
      );

      expect(yield* Ref.get(idle)).toEqual(Option.none());
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('stops while protocol commands back up unread', () =>
    Effect.gen(function* () {
      const config = makeTestConfig({ channelSize: 1 });
      const parents = genesisIds(config);
      const blocks = [makeSlot(1, 0), makeSlot(1, 1)].map((slot) =>
        createBlock(slot, parents, generateRandomPrivateKey())
      );

      const injected = yield* Ref.make(0);

      yield* consensusWithoutPoolTest(config, (context) =>
        pipe(
          Effect.forEach(
            blocks,
            (block) =>
              pipe(
                context.protocolController.receiveBlock(block),
                Effect.zipRight(Ref.update(injected, (count) => count + 1))
              ),
            { discard: true }
          ),
          Effect.zipRight(Effect.sleep('1500 millis')),
          Effect.as(context)
        )
      );

      expect(yield* Ref.get(injected)).toBe(2);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('reports a failing test body and still stops the worker', () =>
    Effect.gen(function* () {
      const sender = yield* Ref.make(Option.none<ConsensusCommandSender>());

      const error = yield* pipe(
        consensusWithoutPoolTest(makeTestConfig(), (context) =>
          pipe(
            Ref.set(sender, Option.some(context.commandSender)),
            Effect.zipRight(Effect.fail('body failed')),
            Effect.as(context)
          )
        ),
        Effect.flip
      );

      expect(error.step).toBe('test-body');
      expect(error.cause).toBe('body failed');

      const captured = yield* Ref.get(sender);
      expect(Option.isSome(captured)).toBe(true);
      if (Option.isSome(captured)) {
        const stopped = yield* Effect.flip(captured.value.getStats());
        expect(stopped.details).toBe('consensus worker is not running');
      }
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('names the start step when the worker refuses to start', () =>
    Effect.gen(function* () {
      const ran = yield* Ref.make(false);

      const error = yield* pipe(
        consensusWithoutPoolTest(makeTestConfig({ threadCount: 3 }), (context) =>
          Effect.as(Ref.set(ran, true), context)
        ),
        Effect.flip
      );

      expect(error.step).toBe('start-consensus');
      expect(error.cause).toBeInstanceOf(ConsensusStartError);
      expect(yield* Ref.get(ran)).toBe(false);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('flags a block whose content does not match its id', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const block = createBlock(makeSlot(1, 0), genesisIds(config), generateRandomPrivateKey());
      const header = block.content.header;
      const tampered: WrappedBlock = {
        ...block,
        content: {
          ...block.content,
          header: { ...header, content: { ...header.content, slot: makeSlot(2, 0) } },
        },
      };

      yield* consensusWithoutPoolTest(config, (context) =>
        pipe(
          context.protocolController.receiveBlock(tampered),
          Effect.zipRight(
            validateNotifyBlockAttackAttempt(context.protocolController, block.id, 1000)
          ),
          Effect.as(context)
        )
      );
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('answers block requests for known and unknown blocks', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const [firstGenesis] = genesisIds(config);
      const unknown = getDummyBlockId('unknown');

      yield* consensusWithoutPoolTest(config, (context) =>
        Effect.gen(function* () {
          const protocol = context.protocolController;
          yield* protocol.receiveGetActiveBlocks([firstGenesis, unknown]);
          yield* validateBlockFound(protocol, firstGenesis, 1000);
          yield* protocol.receiveGetActiveBlocks([unknown]);
          yield* validateBlockNotFound(protocol, unknown, 1000);
          return context;
        })
      );
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('creates, sends and checks a block in one step', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const created = yield* Ref.make(Option.none<BlockId>());

      yield* consensusWithoutPoolTest(config, (context) =>
        pipe(
          createAndTestBlock(
            context.protocolController,
            makeSlot(1, 0),
            genesisIds(config),
            true,
            true,
            generateRandomPrivateKey()
          ),
          Effect.flatMap((blockId) => Ref.set(created, Option.some(blockId))),
          Effect.as(context)
        )
      );

      expect(Option.isSome(yield* Ref.get(created))).toBe(true);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.scopedLive('loads staking keys from the configured key file', () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const directory = yield* fs.makeTempDirectoryScoped();
      const staker = randomAddress();
      const config = makeTestConfig({ stakingKeysPath: `${directory}/staking-keys.json` });
      yield* pipe(
        encrypt(TEST_PASSWORD, encodeStakingKeys([staker.privateKey])),
        Effect.flatMap((payload) => fs.writeFile(config.stakingKeysPath, payload))
      );
      const addresses = yield* Ref.make<ReadonlyArray<string>>([]);
      const exportedPath = `${directory}/exported.json`;

      yield* consensusWithoutPoolTest(config, (context) =>
        Effect.gen(function* () {
          yield* Ref.set(addresses, yield* context.commandSender.getStakingAddresses());
          yield* fs.writeFile(exportedPath, yield* context.commandSender.exportStakingKeys());
          return context;
        })
      );

      expect(yield* Ref.get(addresses)).toEqual([staker.address]);
      const exported = yield* loadInitialStakingKeys(exportedPath, TEST_PASSWORD);
      expect(HashMap.get(exported, staker.address)).toEqual(Option.some(staker.privateKey));
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );
});

describe('consensusPoolTest', () => {
  it.live('lets the test watch slot updates sent to the pool', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const reached = yield* Ref.make(Option.none<Slot>());

      yield* consensusPoolTest(config, Option.none(), Option.none(), (context) =>
        pipe(
          waitPoolSlot(context.poolController, config.t0, 0, 1),
          Effect.flatMap((slot) => Ref.set(reached, Option.some(slot))),
          Effect.as(context)
        )
      );

      expect(Option.isSome(yield* Ref.get(reached))).toBe(true);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );

  it.live('stops while slot updates to the pool back up unread', () =>
    Effect.gen(function* () {
      const config = makeTestConfig({ channelSize: 1, t0: 100 });

      const slept = yield* Ref.make(false);

      yield* consensusPoolTest(config, Option.none(), Option.none(), (context) =>
        pipe(Effect.sleep('500 millis'), Effect.zipRight(Ref.set(slept, true)), Effect.as(context))
      );

      expect(yield* Ref.get(slept)).toBe(true);
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );
});

describe('consensusPoolTestWithStorage', () => {
  it.live('seeds storage and the graph from a bootstrap graph', () =>
    Effect.gen(function* () {
      const config = makeTestConfig();
      const genesis = createGenesisBlocks(config);
      const [firstGenesis, secondGenesis] = genesis.map((block) => block.id);
      const child = getExportActiveTestBlock(
        generateRandomPrivateKey(),
        [
          [firstGenesis, 0],
          [secondGenesis, 0],
        ],
        [],
        makeSlot(1, 0),
        false
      );
      const bootstrapGraph: BootstrapableGraph = {
        activeBlocks: [...genesis.map(exportGenesis), child],
        bestParents: [
          [child.blockId, 1],
          [secondGenesis, 0],
        ],
        latestFinalBlocksPeriods: [
          [firstGenesis, 0],
          [secondGenesis, 0],
        ],
        giHead: [],
        maxCliques: [],
      };
      const observed = yield* Ref.make({ stored: false, cliques: [-1] });

      yield* consensusPoolTestWithStorage(
        config,
        Option.none(),
        Option.some(bootstrapGraph),
        (context) =>
          Effect.gen(function* () {
            const stored = yield* context.storage.containsBlock(child.blockId);
            const graph = yield* context.commandSender.getBlockGraphStatus(
              Option.none(),
              Option.none()
            );
            yield* Ref.set(observed, {
              stored,
              cliques: Array.from(getCliques(graph, child.blockId)),
            });
            return context;
          })
      );

      expect(yield* Ref.get(observed)).toEqual({ stored: true, cliques: [0] });
    }).pipe(Effect.provide(NodeFileSystem.layer), Effect.provide(silentLogger))
  );
});
