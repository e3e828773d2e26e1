import { FileCatalogClient } from "../catalog/fileCatalogClient.js";
import { GaiaTapCatalogClient } from "../catalog/gaiaTapCatalogClient.js";
import type { CatalogClient } from "../catalog/types.js";
import type { StarAtlasConfig } from "../config/starAtlasConfig.js";
import { LocalFileSink } from "../publishing/localFileSink.js";
import { SupabaseStorageSink } from "../publishing/supabaseStorageSink.js";
import type { ArtifactSink } from "../publishing/types.js";
import type { NearbyStarsOptions } from "./runNearbyStars.js";

export function createCatalogClient(
  config: StarAtlasConfig,
  catalogFile?: string | null
): CatalogClient {
  if (catalogFile) return new FileCatalogClient(catalogFile);
  return new GaiaTapCatalogClient({
    tapUrl: config.catalog.tapUrl,
    timeoutMs: config.catalog.timeoutMs,
  });
}

export function createArtifactSink(
  config: StarAtlasConfig,
  outputDir?: string | null
): ArtifactSink {
  if (config.artifacts.sink === "supabase") {
    return new SupabaseStorageSink(config.artifacts.supabaseBucket);
  }
  return new LocalFileSink(outputDir ?? config.artifacts.outputDir);
}

export function pipelineOptions(config: StarAtlasConfig): NearbyStarsOptions {
  return {
    table: config.catalog.table,
    rowLimit: config.catalog.rowLimit,
    parallaxUnit: "mas",
    min_size: config.visual.min_size,
    max_size: config.visual.max_size,
    chartSizePx: config.visual.chartSizePx,
  };
}
