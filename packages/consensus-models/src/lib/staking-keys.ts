/**
 * Staking key file contents
 *
 * The plaintext of a staking key file is the canonical JSON array of the private keys,
 * as hex strings. On disk it is encrypted with `encrypt` from `./cipher`.
 */

import { Effect, Schema, pipe } from 'effect';
import { KeyFileError } from './errors';
import { PrivateKey } from './keys';
import { serialize } from './serialization';

const StakingKeyFile = Schema.parseJson(Schema.Array(PrivateKey));

export const encodeStakingKeys = (keys: ReadonlyArray<PrivateKey>): Uint8Array => serialize(keys);

export const decodeStakingKeys = (
  bytes: Uint8Array
): Effect.Effect<ReadonlyArray<PrivateKey>, KeyFileError> =>
  pipe(
    new TextDecoder().decode(bytes),
    Schema.decodeUnknown(StakingKeyFile),
    Effect.mapError(
      (cause) => new KeyFileError({ details: 'staking key file content is malformed', cause })
    )
  );
