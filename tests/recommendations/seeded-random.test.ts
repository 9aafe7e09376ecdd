import { describe, expect, it } from "vitest";

import {
  createSeededRandom,
  pickSeededIndex,
  seedFromParts,
} from "../../packages/core/src/recommendations/seeded-random.ts";

describe("seeded random", () => {
  it("derives the seed from the first 16 hex digits of the SHA-256 digest", () => {
    expect(seedFromParts(["2026-05-02", "40215", "5.0", "medium"])).toBe(0xf94d75dc6bc67961n);
  });

  it("produces the splitmix64 sequence", () => {
    const random = createSeededRandom(0n);
    expect(random()).toBe(0.8833108082136426);
    expect(random()).toBe(0.43152799704850997);
  });

  it("repeats the same sequence for the same seed", () => {
    const first = createSeededRandom(0xf94d75dc6bc67961n);
    const second = createSeededRandom(0xf94d75dc6bc67961n);
    const a = [first(), first(), first()];
    expect(a).toEqual([second(), second(), second()]);
    expect(a).toEqual([0.884503833216437, 0.5639586325625678, 0.06863719617953612]);
  });

  it("maps a draw to an index inside the range", () => {
    expect(pickSeededIndex(() => 0.884503833216437, 3)).toBe(2);
    expect(pickSeededIndex(() => 0, 3)).toBe(0);
    expect(pickSeededIndex(() => 0.9999999999999999, 1)).toBe(0);
    expect(() => pickSeededIndex(() => 0.5, 0)).toThrowError(RangeError);
  });
});
