import { describe, expect, it, vi } from "vitest";
import { RangeCache, type ParallelFor } from "./rangeCache.js";

function makeCache(options: { parallelThreshold?: number; parallelFor?: ParallelFor } = {}) {
  const collected: number[] = [];
  const cache = new RangeCache<number, number>({
    name: "test",
    collect: (time) => {
      collected.push(time);
      return time;
    },
    compose: (input) => input * 2,
    ...options,
  });
  return { cache, collected };
}

describe("RangeCache", () => {
  it("grows by the missing suffix only", () => {
    const { cache, collected } = makeCache();

    cache.ensureRange(10, 20);
    expect(cache.resolveCount).toBe(11);

    cache.ensureRange(15, 25);
    expect(cache.resolveCount).toBe(16);
    expect(collected.slice(11)).toEqual([21, 22, 23, 24, 25]);
    expect(cache.range()).toEqual({ start: 10, end: 25 });
  });

  it("grows by the missing prefix", () => {
    const { cache, collected } = makeCache();

    cache.ensureRange(10, 12);
    cache.ensureRange(7, 11);

    expect(collected).toEqual([10, 11, 12, 7, 8, 9]);
    expect(cache.range()).toEqual({ start: 7, end: 12 });
  });

  it("does no work for a covered range", () => {
    const { cache } = makeCache();

    cache.ensureRange(0, 30);
    cache.ensureRange(0, 30);
    cache.ensureRange(5, 9);

    expect(cache.resolveCount).toBe(31);
  });

  it("matches direct resolution after growth", () => {
    const { cache } = makeCache();

    cache.ensureRange(3, 6);
    cache.ensureRange(1, 9);

    for (let frame = 1; frame <= 9; frame++) {
      expect(cache.get(frame)).toBe(frame * 2);
    }
  });

  it("rebuilds in full after invalidation", () => {
    const { cache } = makeCache();

    cache.ensureRange(0, 4);
    cache.invalidate();
    expect(cache.range()).toBeNull();
    expect(cache.get(2)).toBeUndefined();

    cache.ensureRange(2, 4);
    expect(cache.resolveCount).toBe(8);
    expect(cache.range()).toEqual({ start: 2, end: 4 });
  });

  it("resolves single frames on demand without widening the range", () => {
    const { cache } = makeCache();

    expect(cache.ensureAt(40)).toBe(80);
    expect(cache.ensureAt(40)).toBe(80);
    expect(cache.resolveCount).toBe(1);
    expect(cache.range()).toBeNull();
  });

  it("does not store times between frames", () => {
    const { cache } = makeCache();

    expect(cache.ensureAt(2.5)).toBe(5);
    expect(cache.ensureAt(2.5)).toBe(5);
    expect(cache.ensureAt(3.01)).toBeCloseTo(6.02);

    expect(cache.resolveCount).toBe(3);
    expect(cache.size).toBe(0);
    expect(cache.has(2.5)).toBe(false);
  });

  it("composes through the parallel loop above the threshold", () => {
    const parallelFor = vi.fn<Parameters<ParallelFor>, void>((count, body) => {
      for (let index = count - 1; index >= 0; index--) body(index);
    });
    const { cache, collected } = makeCache({ parallelThreshold: 3, parallelFor });

    cache.ensureRange(0, 5);

    expect(parallelFor).toHaveBeenCalledTimes(1);
    expect(parallelFor.mock.calls[0][0]).toBe(6);
    expect(collected).toEqual([0, 1, 2, 3, 4, 5]);
    expect(cache.get(5)).toBe(10);
    expect(cache.isRebuilding()).toBe(false);
  });

  it("stays sequential at or below the threshold", () => {
    const parallelFor = vi.fn<Parameters<ParallelFor>, void>();
    const { cache } = makeCache({ parallelThreshold: 6, parallelFor });

    cache.ensureRange(0, 5);

    expect(parallelFor).not.toHaveBeenCalled();
    expect(cache.get(3)).toBe(6);
  });

  it("leaves the cache invalid when a rebuild throws", () => {
    const cache = new RangeCache<number, number>({
      name: "failing",
      collect: (time) => {
        if (time === 2) throw new Error("no data");
        return time;
      },
      compose: (input) => input,
    });

    expect(() => cache.ensureRange(0, 3)).toThrow("no data");
    expect(cache.isRebuilding()).toBe(false);
    expect(cache.isValid()).toBe(false);
  });
});
