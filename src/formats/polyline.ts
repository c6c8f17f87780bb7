/**
 * Polyline text formats
 * JSON: array of [x, y] pairs or {x, y} objects
 * CSV: one "x,y" pair per line, optional header, '#' comments
 */
import type { Point } from "../rdp/geometry.ts";

export type PolylineFormat = "json" | "csv";

export class PolylineFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "PolylineFormatError";
    }
}

/**
 * Pick a format from a file name's extension (anything but .csv is JSON)
 */
export function formatFromFilename(filename: string): PolylineFormat {
    return filename.toLowerCase().endsWith(".csv") ? "csv" : "json";
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

function pointFromJson(entry: unknown, index: number): Point {
    if (Array.isArray(entry)) {
        const [x, y]: unknown[] = entry;
        if (isFiniteNumber(x) && isFiniteNumber(y)) return { x, y };
    } else if (typeof entry === "object" && entry !== null && "x" in entry && "y" in entry) {
        const { x, y } = entry;
        if (isFiniteNumber(x) && isFiniteNumber(y)) return { x, y };
    }
    throw new PolylineFormatError(`Invalid point at index ${index}`);
}

function parseJson(text: string): Point[] {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new PolylineFormatError(`Invalid JSON: ${reason}`);
    }
    if (!Array.isArray(data)) {
        throw new PolylineFormatError("Expected a JSON array of points");
    }
    return data.map(pointFromJson);
}

function parseField(field: string | undefined): number {
    return field === undefined || field === "" ? NaN : Number(field);
}

function parseCsv(text: string): Point[] {
    const points: Point[] = [];
    const lines = text.split(/\r?\n/);
    let headerAllowed = true;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === "" || line.startsWith("#")) continue;

        const fields = line.split(",").map((f) => f.trim());
        const x = parseField(fields[0]);
        const y = parseField(fields[1]);

        if (Number.isFinite(x) && Number.isFinite(y)) {
            points.push({ x, y });
        } else if (!(headerAllowed && fields.length >= 2 && Number.isNaN(x) && Number.isNaN(y))) {
            throw new PolylineFormatError(`Invalid point on line ${i + 1}`);
        }
        // Only the first non-comment line may be a header, and only if neither x nor y is numeric
        headerAllowed = false;
    }

    return points;
}

export function parsePolyline(text: string, format: PolylineFormat): Point[] {
    return format === "csv" ? parseCsv(text) : parseJson(text);
}

export function serializePolyline(points: readonly Point[], format: PolylineFormat): string {
    if (format === "csv") {
        return ["x,y", ...points.map((p) => `${p.x},${p.y}`)].join("\n") + "\n";
    }
    if (points.length === 0) return "[]\n";
    return "[\n" + points.map((p) => `  [${p.x},${p.y}]`).join(",\n") + "\n]\n";
}
