/**
 * Debug visualization rendering for simplification results.
 * Renders the original polyline, the simplified polyline and its kept vertices
 * as layers of one PNG image.
 */

import { PNG } from "pngjs";
import { Buffer } from "node:buffer";
import { writeFile } from "node:fs/promises";
import type { Point } from "./geometry.ts";

// RGBA color type
export type RGBA = [number, number, number, number];

export const COLORS: Record<"WHITE" | "GRAY" | "ORANGE" | "RED", RGBA> = {
  WHITE: [255, 255, 255, 255],
  GRAY: [200, 200, 200, 255],
  ORANGE: [255, 165, 0, 255],
  RED: [255, 0, 0, 255],
};

export interface RGBAImage {
  width: number;
  height: number;
  data: Uint8Array; // RGBA, 4 bytes per pixel
}

function createRGBAImage(width: number, height: number, fill: RGBA): RGBAImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set(fill, i * 4);
  }
  return { width, height, data };
}

export function getPixel(img: RGBAImage, x: number, y: number): RGBA {
  const idx = (y * img.width + x) * 4;
  return [img.data[idx], img.data[idx + 1], img.data[idx + 2], img.data[idx + 3]];
}

function blendPixel(img: RGBAImage, x: number, y: number, color: RGBA): void {
  if (x < 0 || y < 0 || x >= img.width || y >= img.height) return;
  const idx = (y * img.width + x) * 4;
  const alpha = color[3] / 255;
  const invAlpha = 1 - alpha;
  img.data[idx] = img.data[idx] * invAlpha + color[0] * alpha;
  img.data[idx + 1] = img.data[idx + 1] * invAlpha + color[1] * alpha;
  img.data[idx + 2] = img.data[idx + 2] * invAlpha + color[2] * alpha;
  img.data[idx + 3] = 255;
}

function drawCircleFilled(img: RGBAImage, cx: number, cy: number, r: number, color: RGBA): void {
  const minX = Math.max(0, Math.floor(cx - r - 1));
  const maxX = Math.min(img.width - 1, Math.ceil(cx + r + 1));
  const minY = Math.max(0, Math.floor(cy - r - 1));
  const maxY = Math.min(img.height - 1, Math.ceil(cy + r + 1));
  const rSq = r * r;

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if ((x - cx) * (x - cx) + (y - cy) * (y - cy) <= rSq) {
        blendPixel(img, x, y, color);
      }
    }
  }
}

/**
 * Draw a thick line segment by walking it and stamping perpendicular spans
 */
function drawThickSegment(img: RGBAImage, p0: Point, p1: Point, width: number, color: RGBA): void {
  const halfWidth = width / 2;
  const dx = p1.x - p0.x;
  const dy = p1.y - p0.y;
  const len = Math.sqrt(dx * dx + dy * dy);
  if (len < 0.001) {
    drawCircleFilled(img, p0.x, p0.y, halfWidth, color);
    return;
  }

  const perpX = -dy / len;
  const perpY = dx / len;

  const steps = Math.max(2, Math.ceil(len));
  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    const x = p0.x + t * dx;
    const y = p0.y + t * dy;
    for (let w = -halfWidth; w <= halfWidth; w += 0.5) {
      blendPixel(img, Math.round(x + w * perpX), Math.round(y + w * perpY), color);
    }
  }
}

function drawPolyline(img: RGBAImage, points: Point[], width: number, color: RGBA): void {
  for (let i = 0; i < points.length - 1; i++) {
    drawThickSegment(img, points[i], points[i + 1], width, color);
  }
}

// ============================================================================
// Main Debug Rendering Functions
// ============================================================================

export interface DebugLayers {
  original: readonly Point[];
  simplified?: readonly Point[];
}

export interface DebugRenderOptions {
  width?: number;
  height?: number;
  /** Blank border around the fitted polyline, in pixels */
  margin?: number;
  lineWidth?: number;
}

/**
 * Build a world-to-image mapping that fits `points` inside the margin,
 * keeping aspect ratio and flipping y so it points up.
 */
export function fitToImage(
  points: readonly Point[],
  width: number,
  height: number,
  margin: number,
): (p: Point) => Point {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }

  const spanX = maxX - minX;
  const spanY = maxY - minY;
  const scaleX = spanX > 0 ? (width - 2 * margin) / spanX : Infinity;
  const scaleY = spanY > 0 ? (height - 2 * margin) / spanY : Infinity;
  const scale = Number.isFinite(Math.min(scaleX, scaleY)) ? Math.min(scaleX, scaleY) : 1;

  return (p) => ({
    x: margin + (p.x - minX) * scale,
    y: height - 1 - margin - (p.y - minY) * scale,
  });
}

/**
 * Render the original polyline (gray), the simplified polyline (orange)
 * and its kept vertices (red).
 */
export function renderPolylineLayers(
  layers: DebugLayers,
  options: DebugRenderOptions = {},
): RGBAImage {
  const width = options.width ?? 512;
  const height = options.height ?? 512;
  const margin = options.margin ?? 16;
  const lineWidth = options.lineWidth ?? 2;

  if (layers.original.length === 0) {
    throw new Error("Must provide an original polyline with at least one point");
  }

  const toImage = fitToImage(layers.original, width, height, margin);
  const img = createRGBAImage(width, height, COLORS.WHITE);

  drawPolyline(img, layers.original.map(toImage), lineWidth, COLORS.GRAY);

  if (layers.simplified) {
    const path = layers.simplified.map(toImage);
    drawPolyline(img, path, lineWidth, COLORS.ORANGE);
    for (const pt of path) {
      drawCircleFilled(img, pt.x, pt.y, lineWidth + 1, COLORS.RED);
    }
  }

  return img;
}

export function encodePNG(img: RGBAImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png);
}

/**
 * Render and save a debug image to disk
 */
export async function saveDebugImage(
  layers: DebugLayers,
  filename: string,
  options: DebugRenderOptions = {},
): Promise<void> {
  await writeFile(filename, encodePNG(renderPolylineLayers(layers, options)));
}
