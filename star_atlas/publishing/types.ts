/**
 * Artifact sink interface.
 *
 * Receives a finished chart and stores it somewhere; the pipeline never
 * calls a sink for an empty sample.
 */
export type ChartArtifact = {
  fileName: string;
  contentType: string;
  body: string;
};

export type StoreResult = {
  location: string;
};

export interface ArtifactSink {
  name: string;

  store(artifact: ChartArtifact): Promise<StoreResult>;
}
