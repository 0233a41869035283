import { hash, verify } from 'argon2';

/**
 * How a store turns a plain password into what it persists, and checks it back.
 */
export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, storedHash: string): Promise<boolean>;
}

export const argon2Hasher: PasswordHasher = {
  async hash(plainPassword) {
    return await hash(plainPassword);
  },

  async verify(plainPassword, storedHash) {
    try {
      return await verify(storedHash, plainPassword);
    } catch {
      // argon2 rejects hashes it cannot parse
      return false;
    }
  },
};
