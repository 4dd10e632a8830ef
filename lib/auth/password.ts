/**
 * Salted one-way password hashing (scrypt).
 * Stored format: scrypt$<N>$<r>$<p>$<salt hex>$<hash hex>
 */

import { randomBytes, scrypt, timingSafeEqual, type ScryptOptions } from "node:crypto";

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const BLOCK_SIZE = 8;
const PARALLELIZATION = 1;

function deriveKey(
  password: string,
  salt: Buffer,
  options: ScryptOptions
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, options, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

function scryptOptions(cost: number, blockSize: number, parallelization: number): ScryptOptions {
  return {
    N: cost,
    r: blockSize,
    p: parallelization,
    maxmem: 256 * cost * blockSize,
  };
}

export async function hashPassword(password: string, cost: number): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(password, salt, scryptOptions(cost, BLOCK_SIZE, PARALLELIZATION));
  return ["scrypt", cost, BLOCK_SIZE, PARALLELIZATION, salt.toString("hex"), key.toString("hex")].join("$");
}

/** False for a wrong password or a hash not produced by hashPassword. */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parts = stored.split("$");
  if (parts.length !== 6 || parts[0] !== "scrypt") return false;
  const [, n, r, p, saltHex, hashHex] = parts;
  const cost = Number(n);
  const blockSize = Number(r);
  const parallelization = Number(p);
  if (![cost, blockSize, parallelization].every((v) => Number.isInteger(v) && v > 0)) {
    return false;
  }
  const expected = Buffer.from(hashHex, "hex");
  if (expected.length !== KEY_LENGTH) return false;

  const key = await deriveKey(
    password,
    Buffer.from(saltHex, "hex"),
    scryptOptions(cost, blockSize, parallelization)
  );
  return timingSafeEqual(key, expected);
}
