#!/usr/bin/env -S npx tsx

/**
 * Polyline RDP - Node CLI
 *
 * Simplifies a polyline file (JSON or CSV) and reports how many points survived.
 */

import minimist from "minimist";
import { readFile, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import {
    formatFromFilename,
    parsePolyline,
    type PolylineFormat,
    serializePolyline,
} from "../src/formats/polyline.ts";
import type { Point } from "../src/rdp/geometry.ts";
import { maxDeviation, simplifyIndices } from "../src/rdp/douglas_peucker.ts";
import { noisyDiagonal } from "../src/rdp/cases.ts";
import { saveDebugImage } from "../src/rdp/debug_render.ts";

export const USAGE = `
Polyline RDP - Node CLI

Usage:
  npm run cli -- --input <file> [options]

Options:
  --input <file>       Input polyline, .json or .csv (required unless --demo)
  --epsilon <n>        Maximum perpendicular deviation (default: 1)
  --output <file>      Write the simplified polyline here (default: stdout)
  --format <fmt>       Force json or csv for input and output
  --png <file>         Save a PNG preview of original vs simplified
  --demo <n>           Use a generated noisy diagonal of n points
  --help               Show this help

Examples:
  # Simplify a GPS track with 2m tolerance
  npm run cli -- --input track.json --epsilon 2 --output track_small.json

  # Try it on generated data and look at the result
  npm run cli -- --demo 500 --epsilon 3 --png demo.png
`;

export interface CliConfig {
    help: boolean;
    input?: string;
    output?: string;
    format?: PolylineFormat;
    png?: string;
    demo?: number;
    epsilon: number;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Turn raw argv into a typed config. Throws on malformed values.
 */
export function parseCliArgs(argv: string[]): CliConfig {
    const args = minimist(argv, {
        string: ["input", "output", "format", "png", "demo", "epsilon"],
        boolean: ["help"],
        default: {
            epsilon: "1",
            help: false,
        },
    });

    const epsilonArg = String(args.epsilon);
    const epsilon = epsilonArg.trim() === "" ? NaN : Number(epsilonArg);
    if (!Number.isFinite(epsilon)) {
        throw new Error(`Invalid --epsilon: ${epsilonArg}`);
    }

    const format = optionalString(args.format);
    if (format !== undefined && format !== "json" && format !== "csv") {
        throw new Error(`Invalid --format: ${format} (expected json or csv)`);
    }

    const demoArg = optionalString(args.demo);
    let demo: number | undefined;
    if (demoArg !== undefined) {
        demo = Number(demoArg);
        if (!Number.isInteger(demo) || demo < 0) {
            throw new Error(`Invalid --demo: ${demoArg}`);
        }
    }

    return {
        help: args.help === true,
        input: optionalString(args.input),
        output: optionalString(args.output),
        format,
        png: optionalString(args.png),
        demo,
        epsilon,
    };
}

type Log = (...data: unknown[]) => void;

async function loadPoints(config: CliConfig, log: Log): Promise<Point[]> {
    if (config.demo !== undefined) {
        log(`Generating noisy diagonal: ${config.demo} points`);
        return noisyDiagonal(config.demo, 4, { spikeInterval: 50, spikeHeight: 20 });
    }
    const input = config.input ?? "";
    log(`Reading polyline: ${input}`);
    const text = await readFile(input, "utf8");
    return parsePolyline(text, config.format ?? formatFromFilename(input));
}

export async function run(config: CliConfig): Promise<void> {
    // Keep stdout clean when the polyline itself goes there
    const toStdout = config.output === undefined && config.demo === undefined;
    const log: Log = toStdout ? console.error : console.log;

    let start = performance.now();
    const points = await loadPoints(config, log);
    let stepTime = performance.now() - start;
    log(`Loaded ${points.length} points (${stepTime.toFixed(1)}ms)`);

    start = performance.now();
    const kept = simplifyIndices(points, config.epsilon, (p) => p.x, (p) => p.y);
    stepTime = performance.now() - start;
    const simplified = kept.map((i) => points[i]);

    const percent = points.length > 0 ? (100 * simplified.length) / points.length : 100;
    log(
        `Simplified: ${points.length} -> ${simplified.length} points ` +
            `(${percent.toFixed(1)}% kept, ${stepTime.toFixed(1)}ms)`,
    );
    log(`Max deviation: ${maxDeviation(points, kept).toFixed(3)}`);

    if (config.output) {
        const format = config.format ?? formatFromFilename(config.output);
        await writeFile(config.output, serializePolyline(simplified, format));
        log(`Saved simplified polyline to ${config.output}`);
    } else if (toStdout) {
        process.stdout.write(serializePolyline(simplified, config.format ?? "json"));
    }

    if (config.png) {
        start = performance.now();
        await saveDebugImage({ original: points, simplified }, config.png);
        stepTime = performance.now() - start;
        log(`Saved preview to ${config.png} (${stepTime.toFixed(1)}ms)`);
    }
}

async function main(): Promise<void> {
    try {
        const config = parseCliArgs(process.argv.slice(2));
        if (config.help || (config.input === undefined && config.demo === undefined)) {
            console.log(USAGE);
            process.exitCode = config.help ? 0 : 1;
            return;
        }
        await run(config);
    } catch (error) {
        console.error("Error:", error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    await main();
}
