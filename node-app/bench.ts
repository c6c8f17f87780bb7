#!/usr/bin/env -S npx tsx

/**
 * Polyline RDP - timing harness
 *
 * Mean time per simplifyPoints call over generated random tracks.
 */

import { randomTrack } from "../src/rdp/cases.ts";
import type { Point } from "../src/rdp/geometry.ts";
import { simplifyPoints } from "../src/rdp/douglas_peucker.ts";

const WARMUP = 20;
const ITERATIONS = 200;

interface BenchCase {
    name: string;
    points: Point[];
    epsilon: number;
}

function timeCase(bench: BenchCase): void {
    let kept = 0;
    for (let i = 0; i < WARMUP; i++) {
        kept = simplifyPoints(bench.points, bench.epsilon).length;
    }

    const start = performance.now();
    for (let i = 0; i < ITERATIONS; i++) {
        kept = simplifyPoints(bench.points, bench.epsilon).length;
    }
    const mean = (performance.now() - start) / ITERATIONS;

    console.log(
        `${bench.name.padEnd(28)} ${mean.toFixed(3).padStart(9)}ms  ` +
            `${bench.points.length} -> ${kept} points`,
    );
}

const small = randomTrack(100);
const medium = randomTrack(1_000);
const large = randomTrack(10_000);

const cases: BenchCase[] = [
    { name: "small (100 points)", points: small, epsilon: 1 },
    { name: "medium (1000 points)", points: medium, epsilon: 1 },
    { name: "large (10000 points)", points: large, epsilon: 1 },
    { name: "medium, epsilon 0.1", points: medium, epsilon: 0.1 },
    { name: "medium, epsilon 10", points: medium, epsilon: 10 },
];

console.log(`Warm-up ${WARMUP}, ${ITERATIONS} timed iterations per case\n`);
for (const bench of cases) {
    timeCase(bench);
}
