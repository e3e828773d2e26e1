import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ArtifactSink, ChartArtifact, StoreResult } from "./types.js";

/**
 * Writes charts under a local directory. A chart with the same file name
 * replaces the previous one.
 */
export class LocalFileSink implements ArtifactSink {
  name = "local-file";

  constructor(private readonly outputDir: string) {}

  async store(artifact: ChartArtifact): Promise<StoreResult> {
    await mkdir(this.outputDir, { recursive: true });
    const filePath = path.resolve(this.outputDir, artifact.fileName);
    await writeFile(filePath, artifact.body, "utf8");
    return { location: filePath };
  }
}
