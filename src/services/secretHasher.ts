/**
 * One-way hashing of paste access passwords.
 */

import bcrypt from "bcrypt";
import { env } from "../config/env";

export interface SecretHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

/** bcrypt-backed hasher. Cost defaults to BCRYPT_SALT_ROUNDS (2^12 iterations unless configured). */
export class BcryptSecretHasher implements SecretHasher {
  constructor(private readonly saltRounds: number = env.BCRYPT_SALT_ROUNDS) {}

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.saltRounds);
  }

  async verify(plaintext: string, digest: string): Promise<boolean> {
    return bcrypt.compare(plaintext, digest);
  }
}
