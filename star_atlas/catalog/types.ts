import type { ResultSet } from "../../astro/schemas/catalogRow.schema.js";
import type { CatalogQuery } from "../query/buildCatalogQuery.js";

/**
 * Catalog adapter interface.
 *
 * Implementations run one query to completion and return every row, or throw
 * CatalogUnavailableError / QuerySyntaxError. An empty ResultSet is a normal
 * answer.
 */
export interface CatalogClient {
  name: string;

  fetchRows(query: CatalogQuery): Promise<ResultSet>;
}
