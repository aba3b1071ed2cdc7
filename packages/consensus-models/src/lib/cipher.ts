/**
 * Password-based encryption for key files.
 *
 * Layout of an encrypted payload: `version (1) | salt (16) | nonce (12) | tag (16) |
 * ciphertext`. The key is derived with PBKDF2-SHA256 and the payload sealed with
 * AES-256-GCM.
 */

import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'node:crypto';
import { Effect } from 'effect';
import { CipherError } from './errors';
import { concatBytes } from './hash';

const VERSION = 0;
const SALT_SIZE = 16;
const NONCE_SIZE = 12;
const TAG_SIZE = 16;
const HEADER_SIZE = 1 + SALT_SIZE + NONCE_SIZE + TAG_SIZE;
const PBKDF2_ROUNDS = 10_000;

const deriveKey = (password: string, salt: Uint8Array): Buffer =>
  pbkdf2Sync(password, salt, PBKDF2_ROUNDS, 32, 'sha256');

export const encrypt = (
  password: string,
  data: Uint8Array
): Effect.Effect<Uint8Array, CipherError> =>
  Effect.try({
    try: () => {
      const salt = randomBytes(SALT_SIZE);
      const nonce = randomBytes(NONCE_SIZE);
      const cipher = createCipheriv('aes-256-gcm', deriveKey(password, salt), nonce);
      const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
      return concatBytes([Uint8Array.of(VERSION), salt, nonce, cipher.getAuthTag(), ciphertext]);
    },
    catch: (cause) =>
      new CipherError({ operation: 'encrypt', details: 'encryption failed', cause }),
  });

export const decrypt = (
  password: string,
  payload: Uint8Array
): Effect.Effect<Uint8Array, CipherError> => {
  if (payload.length < HEADER_SIZE || payload[0] !== VERSION) {
    return Effect.fail(
      new CipherError({ operation: 'decrypt', details: 'unsupported or truncated payload' })
    );
  }
  return Effect.try({
    try: () => {
      const salt = payload.subarray(1, 1 + SALT_SIZE);
      const nonce = payload.subarray(1 + SALT_SIZE, 1 + SALT_SIZE + NONCE_SIZE);
      const tag = payload.subarray(1 + SALT_SIZE + NONCE_SIZE, HEADER_SIZE);
      const decipher = createDecipheriv('aes-256-gcm', deriveKey(password, salt), nonce);
      decipher.setAuthTag(tag);
      return Uint8Array.from(
        Buffer.concat([decipher.update(payload.subarray(HEADER_SIZE)), decipher.final()])
      );
    },
    catch: (cause) =>
      new CipherError({
        operation: 'decrypt',
        details: 'wrong password or corrupted payload',
        cause,
      }),
  });
};
