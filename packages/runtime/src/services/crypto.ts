/**
 * Digest functions and bounded randomness (node:crypto)
 */

import { createHash, randomInt } from "node:crypto";

export const DIGESTS = {
  md5: "md5",
  sha1: "sha1",
  sha2_256: "sha256",
  sha2_512: "sha512",
  sha3_256: "sha3-256",
  sha3_512: "sha3-512",
} as const;

export type DigestName = keyof typeof DIGESTS;

export function digest(name: DigestName, data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash(DIGESTS[name]).update(data).digest());
}

/** widest span randomInt accepts */
export const MAX_RANDOM_RANGE = 2 ** 48 - 1;

/**
 * Uniform integer in [min, max)
 */
export function randomInRange(min: number, max: number): number {
  return randomInt(min, max);
}
