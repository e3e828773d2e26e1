/**
 * Error model for the nearby-stars pipeline.
 *
 * InvalidDistance is raised at the input boundary, before any query exists.
 * Catalog errors come from the archive and are surfaced to the caller unchanged.
 * An empty sample is NOT an error; see ProjectionResult.
 */

export class InvalidDistanceError extends Error {
  constructor(
    public input: string,
    reason: string
  ) {
    super(`Invalid distance "${input}": ${reason}`);
    this.name = "InvalidDistanceError";
  }
}

export class CatalogUnavailableError extends Error {
  constructor(
    public catalog: string,
    detail: string,
    public status?: number
  ) {
    super(`Catalog ${catalog} unavailable: ${detail}`);
    this.name = "CatalogUnavailableError";
  }
}

export class QuerySyntaxError extends Error {
  constructor(
    public query: string,
    detail: string
  ) {
    super(`Catalog rejected query: ${detail}`);
    this.name = "QuerySyntaxError";
  }
}

export class InvalidVisualConfigError extends Error {
  constructor(detail: string) {
    super(`Invalid visual config: ${detail}`);
    this.name = "InvalidVisualConfigError";
  }
}

export type ErrorClass =
  | "invalid_distance"
  | "catalog_unavailable"
  | "query_syntax"
  | "invalid_visual_config"
  | "unexpected";

export function classifyError(e: unknown): { errorClass: ErrorClass; message: string } {
  const message = e instanceof Error ? e.message : String(e);

  if (e instanceof InvalidDistanceError) return { errorClass: "invalid_distance", message };
  if (e instanceof CatalogUnavailableError) return { errorClass: "catalog_unavailable", message };
  if (e instanceof QuerySyntaxError) return { errorClass: "query_syntax", message };
  if (e instanceof InvalidVisualConfigError) return { errorClass: "invalid_visual_config", message };

  return { errorClass: "unexpected", message };
}
