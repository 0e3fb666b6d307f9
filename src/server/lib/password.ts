/**
 * Argon2id password hashing with a server-side pepper.
 *
 * The pepper is appended to the plaintext before hashing and lives only in
 * configuration, never beside the hash.
 */

import * as argon2 from "argon2";

export interface HashCost {
  timeCost: number;
  /** KiB */
  memoryCost: number;
  parallelism: number;
}

export const DEFAULT_HASH_COST: HashCost = {
  timeCost: 3,
  memoryCost: 64 * 1024,
  parallelism: 2,
};

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(hash: string, plaintext: string): Promise<boolean>;
  /**
   * Burn the same work as a real verify against a throwaway hash. Used when
   * the username does not exist so timing does not reveal that.
   */
  verifyDummy(plaintext: string): Promise<false>;
}

export function createPasswordHasher(
  pepper: string,
  cost: HashCost = DEFAULT_HASH_COST,
): PasswordHasher {
  const options = { ...cost, type: argon2.argon2id, hashLength: 32 };
  let dummyHash: Promise<string> | null = null;

  const hasher: PasswordHasher = {
    hash(plaintext) {
      return argon2.hash(plaintext + pepper, options);
    },

    async verify(hash, plaintext) {
      try {
        return await argon2.verify(hash, plaintext + pepper);
      } catch (err) {
        // argon2 throws on a hash it cannot parse; a corrupt stored hash is
        // a data problem, not a wrong password
        throw new Error("Stored password hash could not be verified", {
          cause: err,
        });
      }
    },

    async verifyDummy(plaintext) {
      dummyHash ??= argon2.hash("dummy-password-for-timing", options);
      await argon2.verify(await dummyHash, plaintext + pepper);
      return false;
    },
  };

  return hasher;
}
