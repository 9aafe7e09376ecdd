import { createHash } from "node:crypto";

const UINT64_BITS = 64;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const MIX_MULTIPLIER_1 = 0xbf58476d1ce4e5b9n;
const MIX_MULTIPLIER_2 = 0x94d049bb133111ebn;
const DOUBLE_UNIT = 2 ** 53;

/** First 16 hex digits of SHA-256 over the `|`-joined parts, as an unsigned 64-bit seed. */
export function seedFromParts(parts: readonly string[]): bigint {
  const digest = createHash("sha256").update(parts.join("|"), "utf8").digest("hex");
  return BigInt(`0x${digest.slice(0, 16)}`);
}

/** splitmix64; yields uniform doubles in [0, 1). */
export function createSeededRandom(seed: bigint): () => number {
  let state = BigInt.asUintN(UINT64_BITS, seed);
  return () => {
    state = BigInt.asUintN(UINT64_BITS, state + GOLDEN_GAMMA);
    let z = state;
    z = BigInt.asUintN(UINT64_BITS, (z ^ (z >> 30n)) * MIX_MULTIPLIER_1);
    z = BigInt.asUintN(UINT64_BITS, (z ^ (z >> 27n)) * MIX_MULTIPLIER_2);
    z = z ^ (z >> 31n);
    return Number(z >> 11n) / DOUBLE_UNIT;
  };
}

export function pickSeededIndex(random: () => number, length: number): number {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError("length must be a positive integer");
  }
  return Math.min(length - 1, Math.floor(random() * length));
}
