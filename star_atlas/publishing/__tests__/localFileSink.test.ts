import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { LocalFileSink } from "../localFileSink.js";

describe("LocalFileSink", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "nearby-stars-sink-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("creates the output directory and writes the chart", async () => {
    const outDir = path.join(tmpDir, "charts");
    const sink = new LocalFileSink(outDir);

    const result = await sink.store({
      fileName: "nearby-stars.svg",
      contentType: "image/svg+xml",
      body: "<svg/>",
    });

    expect(result.location).toBe(path.join(outDir, "nearby-stars.svg"));
    await expect(readFile(result.location, "utf8")).resolves.toBe("<svg/>");
  });

  it("replaces an earlier chart with the same name", async () => {
    const sink = new LocalFileSink(tmpDir);
    const artifact = { fileName: "latest.svg", contentType: "image/svg+xml" };

    await sink.store({ ...artifact, body: "<svg>old</svg>" });
    const { location } = await sink.store({ ...artifact, body: "<svg>new</svg>" });

    await expect(readFile(location, "utf8")).resolves.toBe("<svg>new</svg>");
  });
});
