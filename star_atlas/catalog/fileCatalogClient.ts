import { readFile } from "node:fs/promises";
import { ResultSetSchema, type CatalogRow, type ResultSet } from "../../astro/schemas/catalogRow.schema.js";
import { CatalogUnavailableError } from "../errors.js";
import type { CatalogQuery } from "../query/buildCatalogQuery.js";
import { rowsFromTapJson } from "./parseTapJson.js";
import type { CatalogClient } from "./types.js";

/**
 * Offline catalog backed by a JSON file.
 *
 * Accepts either an array of rows or a saved TAP json response, and applies
 * the same predicate the archive would (parallax >= threshold, not null) plus
 * the row limit.
 */
export class FileCatalogClient implements CatalogClient {
  name = "file";

  constructor(private readonly path: string) {}

  private async loadRows(): Promise<CatalogRow[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new CatalogUnavailableError(this.name, `cannot read ${this.path}: ${detail}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new CatalogUnavailableError(this.name, `${this.path} is not valid JSON`);
    }

    if (Array.isArray(payload)) {
      const rows = ResultSetSchema.safeParse(payload);
      if (!rows.success) {
        const issue = rows.error.issues[0];
        throw new CatalogUnavailableError(
          this.name,
          `${this.path}: ${issue.path.join(".")} ${issue.message}`
        );
      }
      return rows.data;
    }

    const tap = rowsFromTapJson(payload);
    if (!tap.ok) {
      throw new CatalogUnavailableError(this.name, `${this.path}: ${tap.reason}`);
    }
    return tap.rows;
  }

  async fetchRows(query: CatalogQuery): Promise<ResultSet> {
    const rows = await this.loadRows();
    const selected = rows.filter(
      (row) => row.parallax !== null && row.parallax >= query.min_parallax_mas
    );
    return query.row_limit === null ? selected : selected.slice(0, query.row_limit);
  }
}
