import { describe, expect, it } from "vitest";
import { MersenneTwister, bitLength } from "./mersenne-twister.js";

describe("MersenneTwister", () => {
  it("matches the reference MT19937 output for the default seed", () => {
    const rng = new MersenneTwister(0);
    rng.initGenrand(5489);

    expect(rng.nextUint32()).toBe(3499211612);
  });

  it("produces the reference floats for array-seeded integers", () => {
    expect(new MersenneTwister(1).random()).toBe(0.13436424411240122);
    expect(new MersenneTwister(42).random()).toBe(0.6394267984578837);
  });

  it("is deterministic per seed", () => {
    const a = new MersenneTwister(7);
    const b = new MersenneTwister(7);
    const drawsA = Array.from({ length: 700 }, () => a.nextUint32());
    const drawsB = Array.from({ length: 700 }, () => b.nextUint32());

    expect(drawsA).toEqual(drawsB);
  });

  it("restarts the stream when reseeded", () => {
    const rng = new MersenneTwister(3);
    const first = rng.nextUint32();
    rng.nextUint32();
    rng.seed(3);

    expect(rng.nextUint32()).toBe(first);
  });

  it("keeps randBelow inside its bound", () => {
    const rng = new MersenneTwister(1);
    for (let i = 0; i < 500; i += 1) {
      const value = rng.randBelow(7);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
    }
    expect(rng.randBelow(1)).toBe(0);
  });

  it("rejects invalid arguments", () => {
    const rng = new MersenneTwister(1);

    expect(() => rng.randBelow(0)).toThrow(RangeError);
    expect(() => rng.getRandBits(33)).toThrow(RangeError);
    expect(() => new MersenneTwister(1.5)).toThrow(RangeError);
  });

  it("computes bit lengths", () => {
    expect(bitLength(1)).toBe(1);
    expect(bitLength(7)).toBe(3);
    expect(bitLength(8)).toBe(4);
    expect(bitLength(0xffffffff)).toBe(32);
  });
});
