import { z } from "zod";

/**
 * Zod schema for one star row as returned by the catalog.
 *
 * Units follow the Gaia archive:
 * - ra, dec in degrees (ICRS)
 * - parallax in milliarcseconds, nullable; non-positive values are real
 *   catalog entries (noise) and are kept here, the projection drops them.
 *
 * source_id is a 64-bit integer upstream. It is carried as a decimal string;
 * JSON numbers above 2^53 have already lost precision by the time they arrive.
 */
export const CatalogRowSchema = z.object({
  source_id: z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).transform(String),
  ra: z.number().min(0).lt(360),
  dec: z.number().min(-90).max(90),
  parallax: z.number().nullable().optional().transform((v) => v ?? null),
});

export type CatalogRow = z.output<typeof CatalogRowSchema>;

export const ResultSetSchema = z.array(CatalogRowSchema);

export type ResultSet = readonly CatalogRow[];
