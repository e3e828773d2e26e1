import { describe, expect, it } from "vitest";
import { CatalogRowSchema, ResultSetSchema } from "../catalogRow.schema.js";

describe("CatalogRowSchema", () => {
  it("normalizes numeric ids to strings and missing parallax to null", () => {
    const row = CatalogRowSchema.parse({ source_id: 42, ra: 10, dec: -5 });
    expect(row).toEqual({ source_id: "42", ra: 10, dec: -5, parallax: null });
  });

  it("keeps string ids and negative parallaxes", () => {
    const row = CatalogRowSchema.parse({
      source_id: "4472832130942575872",
      ra: 269.45,
      dec: 4.69,
      parallax: -0.3,
    });
    expect(row.source_id).toBe("4472832130942575872");
    expect(row.parallax).toBe(-0.3);
  });

  it("rejects coordinates outside the sky", () => {
    expect(CatalogRowSchema.safeParse({ source_id: "1", ra: 361, dec: 0, parallax: 1 }).success).toBe(false);
    expect(CatalogRowSchema.safeParse({ source_id: "1", ra: 0, dec: -91, parallax: 1 }).success).toBe(false);
  });

  it("treats right ascension as a half-open range", () => {
    expect(CatalogRowSchema.safeParse({ source_id: "1", ra: 0, dec: 0, parallax: 1 }).success).toBe(true);
    expect(CatalogRowSchema.safeParse({ source_id: "1", ra: 359.999, dec: 0, parallax: 1 }).success).toBe(true);
    expect(CatalogRowSchema.safeParse({ source_id: "1", ra: 360, dec: 0, parallax: 1 }).success).toBe(false);
  });

  it("accepts an empty result set", () => {
    expect(ResultSetSchema.parse([])).toEqual([]);
  });
});
