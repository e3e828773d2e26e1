import type { NearbyStarsResult } from "../pipeline/runNearbyStars.js";

export const EMPTY_SAMPLE_MESSAGE = "No nearby stars found within the specified distance.";

/** One line for the terminal summarizing a finished run. */
export function describeResult(result: NearbyStarsResult): string {
  if (result.status === "empty_sample") return EMPTY_SAMPLE_MESSAGE;

  const noun = result.star_count === 1 ? "star" : "stars";
  return (
    `Plotted ${result.star_count} ${noun} ` +
    `(${result.d_min.toFixed(2)}-${result.d_max.toFixed(2)} pc, ${result.dropped} dropped) -> ${result.location}`
  );
}
