import { InvalidVisualConfigError } from "../errors.js";
import type { ProjectedPoint } from "../projection/projectStars.js";

export type VisualPoint = ProjectedPoint & {
  /** (d - d_min) / (d_max - d_min); 0 when the sample has no spread */
  normalized: number;
  /** Marker area, px^2 */
  size: number;
  /** Colormap input, already inverted: nearest star = 1 */
  color: number;
};

export type VisualSample = {
  points: VisualPoint[];
  d_min: number;
  d_max: number;
};

export type SizeRange = {
  min_size: number;
  max_size: number;
};

export const DEFAULT_SIZE_RANGE: SizeRange = {
  min_size: 10,
  max_size: 100,
};

function assertSizeRange(range: SizeRange): void {
  const { min_size, max_size } = range;
  if (!Number.isFinite(min_size) || !Number.isFinite(max_size) || min_size <= 0) {
    throw new InvalidVisualConfigError(`marker sizes must be positive, got ${min_size}..${max_size}`);
  }
  if (min_size > max_size) {
    throw new InvalidVisualConfigError(`min_size ${min_size} exceeds max_size ${max_size}`);
  }
}

/**
 * Size and color each star relative to the sample's own distance range.
 *
 * Nearer stars get larger markers and a higher color value. A sample with
 * one star (or all stars at the same distance) normalizes to 0, so every
 * star renders at max_size with color 1.
 */
export function mapVisualAttributes(
  points: readonly ProjectedPoint[],
  range: SizeRange = DEFAULT_SIZE_RANGE
): VisualSample {
  if (points.length === 0) {
    throw new Error("mapVisualAttributes requires at least one point");
  }
  assertSizeRange(range);

  let dMin = Infinity;
  let dMax = -Infinity;
  for (const p of points) {
    if (p.distance_pc < dMin) dMin = p.distance_pc;
    if (p.distance_pc > dMax) dMax = p.distance_pc;
  }

  const spread = dMax - dMin;
  const sizeSpan = range.max_size - range.min_size;

  const mapped = points.map((p): VisualPoint => {
    const normalized = spread > 0 ? (p.distance_pc - dMin) / spread : 0;
    return {
      ...p,
      normalized,
      size: (1 - normalized) * sizeSpan + range.min_size,
      color: 1 - normalized,
    };
  });

  return { points: mapped, d_min: dMin, d_max: dMax };
}
