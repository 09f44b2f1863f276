import bcrypt from "bcryptjs";
import env from "../config/env";

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, digest: string): Promise<boolean>;
}

export function bcryptHasher(rounds: number = env.BCRYPT_ROUNDS): PasswordHasher {
  return {
    hash: (plain) => bcrypt.hash(plain, rounds),
    verify: (plain, digest) => bcrypt.compare(plain, digest),
  };
}
