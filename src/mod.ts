export type { Point } from "./rdp/geometry.ts";
export { distanceSquared, perpendicularDistanceSquared } from "./rdp/geometry.ts";
export type { CoordinateAccessor } from "./rdp/douglas_peucker.ts";
export { maxDeviation, simplify, simplifyIndices, simplifyPoints } from "./rdp/douglas_peucker.ts";
export { createRandom, noisyDiagonal, randomTrack, sineWave } from "./rdp/cases.ts";
export type { NoisyDiagonalOptions } from "./rdp/cases.ts";
export {
  encodePNG,
  renderPolylineLayers,
  saveDebugImage,
} from "./rdp/debug_render.ts";
export type { DebugLayers, DebugRenderOptions, RGBAImage } from "./rdp/debug_render.ts";
export {
  formatFromFilename,
  parsePolyline,
  PolylineFormatError,
  serializePolyline,
} from "./formats/polyline.ts";
export type { PolylineFormat } from "./formats/polyline.ts";
