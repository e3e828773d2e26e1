import * as d3 from "d3";

/**
 * Cool-to-warm diverging scale for star markers.
 *
 * Input is VisualPoint.color, already inverted, so 1 (nearest) is warm red
 * and 0 (farthest) is cool blue. RdBu runs red -> blue, hence the flip.
 */
export function colorFor(color: number): string {
  const t = Math.min(1, Math.max(0, color));
  return d3.interpolateRdBu(1 - t);
}

/**
 * Evenly spaced stops for a vertical colorbar, top (t = 1) to bottom (t = 0).
 */
export function colorbarStops(count = 11): { offset: number; color: string }[] {
  if (count < 2) throw new Error(`colorbar needs at least 2 stops, got ${count}`);
  return d3.range(count).map((i) => {
    const offset = i / (count - 1);
    return { offset, color: colorFor(1 - offset) };
  });
}
