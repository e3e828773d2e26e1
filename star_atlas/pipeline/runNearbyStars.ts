import { formatDistance, parseDistanceInput } from "../../astro/units/toParsecs.js";
import { starAtlasLogHelpers } from "../../logging/starAtlasLog.js";
import type { CatalogClient } from "../catalog/types.js";
import { classifyError } from "../errors.js";
import type { ArtifactSink } from "../publishing/types.js";
import { buildCatalogQuery, type CatalogQuery } from "../query/buildCatalogQuery.js";
import { projectStars, type ParallaxUnit } from "../projection/projectStars.js";
import { buildRenderPlan } from "../render/buildRenderPlan.js";
import { renderSvgChart } from "../render/renderSvgChart.js";
import { mapVisualAttributes } from "../visual/mapVisualAttributes.js";

export type NearbyStarsOptions = {
  table?: string;
  rowLimit?: number | null;
  parallaxUnit?: ParallaxUnit;
  min_size: number;
  max_size: number;
  chartSizePx: number;
  fileName?: string;
};

export type NearbyStarsResult =
  | {
      status: "rendered";
      query: CatalogQuery;
      row_count: number;
      dropped: number;
      star_count: number;
      d_min: number;
      d_max: number;
      location: string;
    }
  | {
      status: "empty_sample";
      query: CatalogQuery;
      row_count: number;
      dropped: number;
    };

export const DEFAULT_CHART_FILE = "nearby-stars.svg";

/**
 * One full request: user distance -> query -> rows -> chart.
 *
 * Invalid input throws before the catalog is touched. Catalog errors
 * propagate. An empty sample returns without rendering or storing anything.
 */
export async function runNearbyStars(params: {
  rawDistance: string;
  unit: string;
  catalog: CatalogClient;
  sink: ArtifactSink;
  options: NearbyStarsOptions;
}): Promise<NearbyStarsResult> {
  const { catalog, sink, options } = params;
  const startedAt = Date.now();
  let label: string | undefined;

  try {
    const distance = parseDistanceInput(params.rawDistance, params.unit);
    label = formatDistance(distance.value, distance.unit);

    const query = buildCatalogQuery(distance.parsecs, {
      table: options.table,
      rowLimit: options.rowLimit,
    });

    starAtlasLogHelpers.runStarted({
      catalog: catalog.name,
      max_distance: label,
      max_distance_pc: distance.parsecs,
    });

    const fetchStartedAt = Date.now();
    const rows = await catalog.fetchRows(query);
    starAtlasLogHelpers.catalogFetched({
      catalog: catalog.name,
      row_count: rows.length,
      duration_ms: Date.now() - fetchStartedAt,
    });

    const projection = projectStars(rows, { parallaxUnit: options.parallaxUnit });
    if (projection.status === "empty_sample") {
      starAtlasLogHelpers.emptySample({
        max_distance: label,
        row_count: rows.length,
        dropped: projection.dropped,
      });
      return { status: "empty_sample", query, row_count: rows.length, dropped: projection.dropped };
    }

    const sample = mapVisualAttributes(projection.points, {
      min_size: options.min_size,
      max_size: options.max_size,
    });
    const plan = buildRenderPlan({ distance, sample, sizePx: options.chartSizePx });
    const svg = renderSvgChart(plan);

    const { location } = await sink.store({
      fileName: options.fileName ?? DEFAULT_CHART_FILE,
      contentType: "image/svg+xml",
      body: svg,
    });

    starAtlasLogHelpers.rendered({
      max_distance: label,
      star_count: sample.points.length,
      dropped: projection.dropped,
      location,
      duration_ms: Date.now() - startedAt,
    });

    return {
      status: "rendered",
      query,
      row_count: rows.length,
      dropped: projection.dropped,
      star_count: sample.points.length,
      d_min: sample.d_min,
      d_max: sample.d_max,
      location,
    };
  } catch (err) {
    const { errorClass, message } = classifyError(err);
    starAtlasLogHelpers.runFailed({
      max_distance: label,
      error_class: errorClass,
      error_message: message,
    });
    throw err;
  }
}
