/**
 * Deterministic sample polylines, shared by tests, the benchmark and the CLI demo.
 */

import type { Point } from "./geometry.ts";

/**
 * Seeded PRNG (mulberry32). Returns values in [0, 1).
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface NoisyDiagonalOptions {
  seed?: number;
  /** Add a spike every this many points */
  spikeInterval?: number;
  spikeHeight?: number;
}

/**
 * Points along y = x with uniform noise of the given amplitude.
 */
export function noisyDiagonal(
  count: number,
  noiseAmplitude: number,
  options: NoisyDiagonalOptions = {},
): Point[] {
  const random = createRandom(options.seed ?? 42);
  const spikeHeight = options.spikeHeight ?? 0;
  const points: Point[] = [];

  for (let i = 0; i < count; i++) {
    let y = i + (random() - 0.5) * noiseAmplitude;
    const interval = options.spikeInterval;
    if (interval !== undefined && i % interval === Math.floor(interval / 2)) {
      y += spikeHeight;
    }
    points.push({ x: i, y });
  }

  return points;
}

/**
 * x = i, y uniformly random in [0, 100). Worst-ish case for simplification.
 */
export function randomTrack(count: number, seed = 42): Point[] {
  const random = createRandom(seed);
  return Array.from({ length: count }, (_, i) => ({ x: i, y: random() * 100 }));
}

export function sineWave(count: number, amplitude: number, period: number): Point[] {
  return Array.from({ length: count }, (_, i) => ({
    x: i,
    y: amplitude * Math.sin((2 * Math.PI * i) / period),
  }));
}
