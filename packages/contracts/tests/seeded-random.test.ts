import { describe, expect, test } from "vitest";
import { choice, range, SeededRandom, shuffle } from "../src";

describe("SeededRandom (xoshiro128++)", () => {
  test("produces deterministic sequences", () => {
    const rngA = new SeededRandom(123456);
    const seqA = Array.from({ length: 5 }, () => rngA.next());

    const rngB = new SeededRandom(123456);
    const seqB = Array.from({ length: 5 }, () => rngB.next());
    expect(seqB).toEqual(seqA);
  });

  test("different seeds give different sequences", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const seqA = Array.from({ length: 4 }, () => a.next());
    const seqB = Array.from({ length: 4 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  test("stays within [0, 1)", () => {
    const rng = new SeededRandom(0);
    for (let i = 0; i < 10000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  test("approximates a uniform distribution (mean/variance sanity)", () => {
    const rng = new SeededRandom(987654321);
    const samples = 20000;

    let sum = 0;
    let sumSquares = 0;
    for (let i = 0; i < samples; i++) {
      const value = rng.next();
      sum += value;
      sumSquares += value * value;
    }

    const mean = sum / samples;
    const variance = sumSquares / samples - mean * mean;

    expect(mean).toBeGreaterThan(0.49);
    expect(mean).toBeLessThan(0.51);
    expect(variance).toBeGreaterThan(0.075);
    expect(variance).toBeLessThan(0.09);
  });

  test("range helper stays within bounds and covers edges", () => {
    const rng = new SeededRandom(42);
    const hits = new Set<number>();

    for (let i = 0; i < 5000; i++) {
      const value = rng.range(1, 3);
      hits.add(value);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(3);
    }

    expect([...hits].sort()).toEqual([1, 2, 3]);
  });
});

describe("rng helpers", () => {
  test("range maps the stream onto inclusive bounds", () => {
    expect(range(() => 0, 3, 7)).toBe(3);
    expect(range(() => 0.999, 3, 7)).toBe(7);
    expect(range(() => 0.5, 0, 9)).toBe(5);
  });

  test("choice returns undefined for an empty array", () => {
    expect(choice(() => 0.5, [])).toBeUndefined();
    expect(choice(() => 0.5, ["a", "b", "c"])).toBe("b");
  });

  test("shuffle keeps every element and leaves the input untouched", () => {
    const rng = new SeededRandom(7);
    const input = [1, 2, 3, 4, 5, 6];
    const shuffled = shuffle(() => rng.next(), input);
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(input);
  });
});
