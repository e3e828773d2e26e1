import type { CatalogRow, ResultSet } from "../../astro/schemas/catalogRow.schema.js";

/**
 * Distance and projection engine.
 *
 * Parallax -> distance in parsecs, then (ra, dec) on the sphere -> (x, y)
 * on a plane seen from above the celestial pole:
 *   x = d * cos(dec) * cos(ra)
 *   y = d * cos(dec) * sin(ra)
 * The z component (d * sin(dec)) is discarded.
 */

export type ParallaxUnit = "mas" | "arcsec";

export type ProjectedPoint = {
  source_id: string;
  distance_pc: number;
  x: number;
  y: number;
};

export type ProjectionResult =
  | { status: "ok"; points: ProjectedPoint[]; dropped: number }
  | { status: "empty_sample"; dropped: number };

export type ProjectStarsOptions = {
  /** Unit of CatalogRow.parallax. Gaia publishes milliarcseconds. */
  parallaxUnit?: ParallaxUnit;
};

const UNITS_PER_ARCSEC: Record<ParallaxUnit, number> = {
  mas: 1000,
  arcsec: 1,
};

const DEG_TO_RAD = Math.PI / 180;

type PositiveParallaxRow = CatalogRow & { parallax: number };

function hasPositiveParallax(row: CatalogRow): row is PositiveParallaxRow {
  return row.parallax !== null && Number.isFinite(row.parallax) && row.parallax > 0;
}

export function projectStars(
  rows: ResultSet,
  options: ProjectStarsOptions = {}
): ProjectionResult {
  const unitsPerArcsec = UNITS_PER_ARCSEC[options.parallaxUnit ?? "mas"];

  // Null / non-positive parallaxes are catalog noise, dropped without error.
  const kept = rows.filter(hasPositiveParallax);
  const dropped = rows.length - kept.length;

  if (kept.length === 0) {
    return { status: "empty_sample", dropped };
  }

  const points: ProjectedPoint[] = [];
  for (const row of kept) {
    const distancePc = unitsPerArcsec / row.parallax;
    // Subnormal parallaxes overflow to Infinity; they carry no position.
    if (!Number.isFinite(distancePc)) continue;

    const ra = row.ra * DEG_TO_RAD;
    const dec = row.dec * DEG_TO_RAD;
    const planar = distancePc * Math.cos(dec);

    points.push({
      source_id: row.source_id,
      distance_pc: distancePc,
      x: planar * Math.cos(ra),
      y: planar * Math.sin(ra),
    });
  }

  if (points.length === 0) {
    return { status: "empty_sample", dropped: rows.length };
  }

  return { status: "ok", points, dropped: rows.length - points.length };
}
