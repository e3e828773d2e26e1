import { describe, expect, it } from "vitest";
import { projectStars } from "../projectStars.js";
import type { CatalogRow } from "../../../astro/schemas/catalogRow.schema.js";

function row(partial: Partial<CatalogRow> & Pick<CatalogRow, "parallax">): CatalogRow {
  return { source_id: "1", ra: 0, dec: 0, ...partial };
}

describe("projectStars", () => {
  it("puts ra=0, dec=0, parallax=1 arcsec at (1, 0)", () => {
    const result = projectStars([row({ parallax: 1 })], { parallaxUnit: "arcsec" });

    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.points).toEqual([{ source_id: "1", distance_pc: 1, x: 1, y: 0 }]);
  });

  it("puts ra=90 on the y axis", () => {
    const result = projectStars([row({ ra: 90, parallax: 1 })], { parallaxUnit: "arcsec" });

    if (result.status !== "ok") throw new Error("expected points");
    const [point] = result.points;
    expect(point.distance_pc).toBe(1);
    expect(point.x).toBeCloseTo(0, 12);
    expect(point.y).toBeCloseTo(1, 12);
  });

  it("reads Gaia milliarcseconds by default", () => {
    const result = projectStars([row({ parallax: 768.0665 })]);

    if (result.status !== "ok") throw new Error("expected points");
    expect(result.points[0].distance_pc).toBeCloseTo(1.30197, 4);
  });

  it("drops null and non-positive parallaxes silently", () => {
    const result = projectStars([
      row({ source_id: "a", parallax: null }),
      row({ source_id: "b", parallax: 0 }),
      row({ source_id: "c", parallax: -2.5 }),
      row({ source_id: "d", parallax: 100 }),
    ]);

    if (result.status !== "ok") throw new Error("expected points");
    expect(result.points.map((p) => p.source_id)).toEqual(["d"]);
    expect(result.dropped).toBe(3);
    expect(result.points[0].distance_pc).toBe(10);
  });

  it("signals an empty sample instead of throwing", () => {
    expect(projectStars([])).toEqual({ status: "empty_sample", dropped: 0 });
    expect(
      projectStars([row({ parallax: null }), row({ parallax: -1 })])
    ).toEqual({ status: "empty_sample", dropped: 2 });
  });

  it("keeps every point inside its own distance circle", () => {
    const rows: CatalogRow[] = [
      row({ source_id: "1", ra: 12.3, dec: 45, parallax: 50 }),
      row({ source_id: "2", ra: 201.7, dec: -62.7, parallax: 768 }),
      row({ source_id: "3", ra: 359.9, dec: 89.9, parallax: 3.1 }),
      row({ source_id: "4", ra: 88, dec: 0, parallax: 12 }),
    ];
    const result = projectStars(rows);

    if (result.status !== "ok") throw new Error("expected points");
    for (const p of result.points) {
      expect(Number.isFinite(p.distance_pc)).toBe(true);
      expect(p.distance_pc).toBeGreaterThan(0);
      expect(Math.hypot(p.x, p.y)).toBeLessThanOrEqual(p.distance_pc * (1 + 1e-12));
    }
    const onEquator = result.points.find((p) => p.source_id === "4");
    expect(onEquator && Math.hypot(onEquator.x, onEquator.y)).toBeCloseTo(1000 / 12, 9);
  });

  it("skips parallaxes so small the distance overflows", () => {
    const result = projectStars([row({ parallax: 5e-324 }), row({ source_id: "2", parallax: 10 })]);

    if (result.status !== "ok") throw new Error("expected points");
    expect(result.points.map((p) => p.source_id)).toEqual(["2"]);
    expect(result.dropped).toBe(1);
  });
});
