/**
 * Password hashing with bcrypt
 */

import { compare, hash } from "bcrypt-ts";

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, passwordHash: string): Promise<boolean>;
  /**
   * Burn one comparison's worth of work when there is no user to check,
   * so a missing account answers as slowly as a wrong password.
   */
  verifyDummy(password: string): Promise<void>;
}

export function createPasswordHasher(rounds: number): PasswordHasher {
  let dummyHash: Promise<string> | null = null;

  return {
    hash(password) {
      return hash(password, rounds);
    },

    verify(password, passwordHash) {
      return compare(password, passwordHash);
    },

    async verifyDummy(password) {
      dummyHash ??= hash("dummy-password-for-timing", rounds);
      await compare(password, await dummyHash);
    },
  };
}
