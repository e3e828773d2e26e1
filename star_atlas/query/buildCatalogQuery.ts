import { InvalidDistanceError } from "../errors.js";

export const DEFAULT_GAIA_TABLE = "gaiadr2.gaia_source";

export type CatalogQuery = {
  max_distance_pc: number;
  /** 1 / max_distance_pc, in arcseconds */
  min_parallax: number;
  /** Same threshold in the catalog's unit (Gaia stores parallax in mas). */
  min_parallax_mas: number;
  table: string;
  row_limit: number | null;
  adql: string;
};

export type BuildCatalogQueryOptions = {
  table?: string;
  rowLimit?: number | null;
};

const TABLE_PATTERN = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)?$/;

/**
 * Print a number without exponent notation so tiny thresholds stay valid,
 * non-zero ADQL literals (1e-7 -> "0.0000001").
 */
export function toPlainDecimal(n: number): string {
  const text = String(n);
  const match = /^(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, lead, frac = "", expText] = match;
  const exp = Number(expText);
  const digits = lead + frac;

  if (exp < 0) return `0.${"0".repeat(-exp - 1)}${digits}`;
  return digits.padEnd(exp + 1, "0");
}

/**
 * Build the archive query for every star closer than maxDistancePc.
 *
 * The predicate is a coarse narrowing on parallax only; rows with
 * non-positive parallax are still removed by the projection step.
 */
export function buildCatalogQuery(
  maxDistancePc: number,
  options: BuildCatalogQueryOptions = {}
): CatalogQuery {
  if (!Number.isFinite(maxDistancePc) || maxDistancePc <= 0) {
    throw new InvalidDistanceError(String(maxDistancePc), "maximum distance must be a positive number of parsecs");
  }

  const table = options.table ?? DEFAULT_GAIA_TABLE;
  if (!TABLE_PATTERN.test(table)) {
    throw new Error(`Invalid catalog table name: ${table}`);
  }

  const rowLimit = options.rowLimit ?? null;
  if (rowLimit !== null && (!Number.isInteger(rowLimit) || rowLimit < 1)) {
    throw new Error(`Row limit must be a positive integer, got ${rowLimit}`);
  }

  const minParallax = 1 / maxDistancePc;
  const minParallaxMas = 1000 / maxDistancePc;
  if (!Number.isFinite(minParallax) || !Number.isFinite(minParallaxMas)) {
    throw new InvalidDistanceError(String(maxDistancePc), "maximum distance is too small for a parallax threshold");
  }

  const select = rowLimit === null ? "SELECT" : `SELECT TOP ${rowLimit}`;
  const adql = [
    `${select} source_id, ra, dec, parallax`,
    `FROM ${table}`,
    `WHERE parallax >= ${toPlainDecimal(minParallaxMas)} AND parallax IS NOT NULL`,
  ].join("\n");

  return {
    max_distance_pc: maxDistancePc,
    min_parallax: minParallax,
    min_parallax_mas: minParallaxMas,
    table,
    row_limit: rowLimit,
    adql,
  };
}
