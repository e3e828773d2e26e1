import { z } from "zod";
import { CatalogRowSchema, type CatalogRow } from "../../astro/schemas/catalogRow.schema.js";

/**
 * TAP "json" output as served by the Gaia archive:
 *   { "metadata": [{ "name": "source_id", ... }, ...], "data": [[...], ...] }
 */
export const TapJsonSchema = z.object({
  metadata: z.array(z.object({ name: z.string() }).passthrough()),
  data: z.array(z.array(z.unknown())),
});

export type TapJson = z.infer<typeof TapJsonSchema>;

const REQUIRED_COLUMNS = ["source_id", "ra", "dec", "parallax"] as const;

export type TapParseResult =
  | { ok: true; rows: CatalogRow[] }
  | { ok: false; reason: string };

export function rowsFromTapJson(payload: unknown): TapParseResult {
  const parsed = TapJsonSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: "response is not TAP json (metadata/data)" };
  }

  const names = parsed.data.metadata.map((m) => m.name.toLowerCase());
  const index: Record<string, number> = {};
  for (const column of REQUIRED_COLUMNS) {
    const i = names.indexOf(column);
    if (i < 0) return { ok: false, reason: `response lacks column "${column}"` };
    index[column] = i;
  }

  const rows: CatalogRow[] = [];
  for (const [n, values] of parsed.data.data.entries()) {
    const row = CatalogRowSchema.safeParse({
      source_id: values[index.source_id],
      ra: values[index.ra],
      dec: values[index.dec],
      parallax: values[index.parallax],
    });
    if (!row.success) {
      const issue = row.error.issues[0];
      return { ok: false, reason: `row ${n}: ${issue.path.join(".")} ${issue.message}` };
    }
    rows.push(row.data);
  }

  return { ok: true, rows };
}
