import { getSupabase } from "../lib/supabaseClient.js";
import type { ArtifactSink, ChartArtifact, StoreResult } from "./types.js";

export class SupabaseStorageSink implements ArtifactSink {
  name = "supabase-storage";

  constructor(
    private readonly bucket: string,
    private readonly prefix = "charts"
  ) {}

  async store(artifact: ChartArtifact): Promise<StoreResult> {
    const storagePath = this.prefix ? `${this.prefix}/${artifact.fileName}` : artifact.fileName;

    const { error } = await getSupabase()
      .storage.from(this.bucket)
      .upload(storagePath, new TextEncoder().encode(artifact.body), {
        contentType: artifact.contentType,
        upsert: true, // same file name = same chart request
      });

    if (error) throw error;

    return { location: `${this.bucket}/${storagePath}` };
  }
}
