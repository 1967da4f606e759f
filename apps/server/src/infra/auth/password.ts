import { randomBytes, scrypt, type ScryptOptions, timingSafeEqual } from "node:crypto";

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const PREFIX = "scrypt";

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, stored: string): Promise<boolean>;
}

function derive(password: string, salt: Buffer, options: ScryptOptions): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, options, (error, key) => {
      if (error) reject(error);
      else resolve(key);
    });
  });
}

/**
 * Salted scrypt hashes stored as `scrypt$N$salt$key` (base64 parts).
 */
export class ScryptPasswordHasher implements PasswordHasher {
  /** @param cost - scrypt N; lower it only in tests. */
  constructor(private readonly cost = 16384) {}

  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await derive(password, salt, { N: this.cost });
    return [PREFIX, this.cost, salt.toString("base64"), key.toString("base64")].join("$");
  }

  async verify(password: string, stored: string): Promise<boolean> {
    const [prefix, cost, salt, key] = stored.split("$");
    if (prefix !== PREFIX || !cost || !salt || !key) return false;

    const expected = Buffer.from(key, "base64");
    const actual = await derive(password, Buffer.from(salt, "base64"), { N: Number(cost) });
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }
}
