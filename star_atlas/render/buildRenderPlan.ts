import { formatDistance, type DistanceInput } from "../../astro/units/toParsecs.js";
import type { VisualPoint, VisualSample } from "../visual/mapVisualAttributes.js";

/**
 * The Sun, drawn at the origin. Not part of the catalog sample and never
 * included in distance normalization.
 */
export type ObserverMarker = {
  label: string;
  x: 0;
  y: 0;
  size: number;
  fill: string;
  glow: string;
  glow_opacity: number;
};

export const SUN_MARKER: ObserverMarker = {
  label: "Sun",
  x: 0,
  y: 0,
  size: 200,
  fill: "yellow",
  glow: "orange",
  glow_opacity: 0.3,
};

export type AxisBounds = { min: number; max: number };

export type RenderPlan = {
  title: string;
  axis_label: string;
  /** Shared by both axes: the chart is square around the observer. */
  bounds: AxisBounds;
  observer: ObserverMarker;
  stars: VisualPoint[];
  /** Colorbar domain; colors arrive pre-inverted (nearest = 1). */
  legend: { d_min: number; d_max: number; label: string };
  size_px: number;
};

export function axisBoundsFor(maxDistancePc: number): AxisBounds {
  return { min: -maxDistancePc, max: maxDistancePc };
}

/**
 * Everything the renderer needs, computed once from the request and the
 * sample, so the chart cannot disagree with the query about its extent.
 */
export function buildRenderPlan(params: {
  distance: DistanceInput;
  sample: VisualSample;
  sizePx: number;
  observer?: ObserverMarker;
}): RenderPlan {
  const { distance, sample } = params;
  return {
    title: `Nearby Stars within ${formatDistance(distance.value, distance.unit)}`,
    axis_label: "Distance (parsecs)",
    bounds: axisBoundsFor(distance.parsecs),
    observer: params.observer ?? SUN_MARKER,
    stars: sample.points,
    legend: { d_min: sample.d_min, d_max: sample.d_max, label: "Distance (parsecs)" },
    size_px: params.sizePx,
  };
}
