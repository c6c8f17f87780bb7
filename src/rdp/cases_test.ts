import { expect, test } from "vitest";
import { createRandom, noisyDiagonal, randomTrack, sineWave } from "./cases.ts";

test("createRandom - same seed gives the same sequence", () => {
  const a = createRandom(42);
  const b = createRandom(42);
  const seqA = Array.from({ length: 5 }, a);
  const seqB = Array.from({ length: 5 }, b);
  expect(seqA).toEqual(seqB);
  for (const v of seqA) {
    expect(v).toBeGreaterThanOrEqual(0);
    expect(v).toBeLessThan(1);
  }
});

test("createRandom - different seeds diverge", () => {
  expect(createRandom(1)()).not.toBe(createRandom(2)());
});

test("noisyDiagonal - stays within the noise band", () => {
  const points = noisyDiagonal(50, 2);
  expect(points).toHaveLength(50);
  points.forEach((p, i) => {
    expect(p.x).toBe(i);
    expect(Math.abs(p.y - i)).toBeLessThanOrEqual(1);
  });
});

test("noisyDiagonal - adds spikes at the middle of each interval", () => {
  const points = noisyDiagonal(40, 0, { spikeInterval: 10, spikeHeight: 7 });
  expect(points[5]).toEqual({ x: 5, y: 12 });
  expect(points[15]).toEqual({ x: 15, y: 22 });
  expect(points[6]).toEqual({ x: 6, y: 6 });
});

test("randomTrack - deterministic for a seed", () => {
  expect(randomTrack(20, 3)).toEqual(randomTrack(20, 3));
  for (const p of randomTrack(100)) {
    expect(p.y).toBeGreaterThanOrEqual(0);
    expect(p.y).toBeLessThan(100);
  }
});

test("sineWave - samples one period", () => {
  const points = sineWave(5, 2, 4);
  expect(points.map((p) => p.x)).toEqual([0, 1, 2, 3, 4]);
  expect(points[0].y).toBe(0);
  expect(points[1].y).toBeCloseTo(2, 12);
  expect(points[3].y).toBeCloseTo(-2, 12);
});
