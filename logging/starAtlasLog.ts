/**
 * Structured logging for nearby-stars pipeline runs.
 *
 * One JSON object per line on stdout.
 */

export type StarAtlasLogEvent =
  | "stars.run.started"
  | "stars.catalog.fetched"
  | "stars.run.empty_sample"
  | "stars.run.rendered"
  | "stars.run.failed";

export type StarAtlasLogData = {
  event: StarAtlasLogEvent;
  catalog?: string;
  max_distance?: string;
  max_distance_pc?: number;
  row_count?: number;
  dropped?: number;
  star_count?: number;
  location?: string;
  duration_ms?: number;
  error_class?: string;
  error_message?: string;
  [key: string]: unknown;
};

export function starAtlasLog(data: StarAtlasLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const starAtlasLogHelpers = {
  runStarted(params: { catalog: string; max_distance: string; max_distance_pc: number }): void {
    starAtlasLog({
      event: "stars.run.started",
      catalog: params.catalog,
      max_distance: params.max_distance,
      max_distance_pc: params.max_distance_pc,
    });
  },

  catalogFetched(params: { catalog: string; row_count: number; duration_ms: number }): void {
    starAtlasLog({
      event: "stars.catalog.fetched",
      catalog: params.catalog,
      row_count: params.row_count,
      duration_ms: params.duration_ms,
    });
  },

  emptySample(params: { max_distance: string; row_count: number; dropped: number }): void {
    starAtlasLog({
      event: "stars.run.empty_sample",
      max_distance: params.max_distance,
      row_count: params.row_count,
      dropped: params.dropped,
    });
  },

  rendered(params: {
    max_distance: string;
    star_count: number;
    dropped: number;
    location: string;
    duration_ms: number;
  }): void {
    starAtlasLog({
      event: "stars.run.rendered",
      max_distance: params.max_distance,
      star_count: params.star_count,
      dropped: params.dropped,
      location: params.location,
      duration_ms: params.duration_ms,
    });
  },

  runFailed(params: { max_distance?: string; error_class: string; error_message: string }): void {
    starAtlasLog({
      event: "stars.run.failed",
      max_distance: params.max_distance,
      error_class: params.error_class,
      error_message: params.error_message,
    });
  },
};
