import { describe, expect, it } from "vitest";
import { SUN_MARKER, axisBoundsFor, buildRenderPlan } from "../buildRenderPlan.js";
import { mapVisualAttributes } from "../../visual/mapVisualAttributes.js";
import { parseDistanceInput } from "../../../astro/units/toParsecs.js";

describe("buildRenderPlan", () => {
  it("derives title, bounds and legend from one request", () => {
    const distance = parseDistanceInput("50", "ly");
    const sample = mapVisualAttributes([
      { source_id: "a", distance_pc: 1.3, x: 1, y: 0.5 },
      { source_id: "b", distance_pc: 12, x: -4, y: 2 },
    ]);

    const plan = buildRenderPlan({ distance, sample, sizePx: 800 });

    expect(plan.title).toBe("Nearby Stars within 50.00 ly");
    expect(plan.axis_label).toBe("Distance (parsecs)");
    expect(plan.bounds).toEqual({ min: -distance.parsecs, max: distance.parsecs });
    expect(plan.legend).toEqual({ d_min: 1.3, d_max: 12, label: "Distance (parsecs)" });
    expect(plan.stars).toBe(sample.points);
    expect(plan.observer).toEqual(SUN_MARKER);
    expect(plan.size_px).toBe(800);
  });

  it("keeps the observer out of the star list", () => {
    const distance = parseDistanceInput("3", "pc");
    const sample = mapVisualAttributes([{ source_id: "only", distance_pc: 2, x: 2, y: 0 }]);

    const plan = buildRenderPlan({ distance, sample, sizePx: 600 });

    expect(plan.stars.map((s) => s.source_id)).toEqual(["only"]);
    expect(plan.stars[0].size).toBe(100);
  });
});

describe("axisBoundsFor", () => {
  it("is symmetric about the observer", () => {
    expect(axisBoundsFor(15.33)).toEqual({ min: -15.33, max: 15.33 });
  });
});
