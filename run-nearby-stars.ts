#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { describeResult } from "./star_atlas/cli/describeResult.js";
import { USAGE, parseCliArgs } from "./star_atlas/cli/parseCliArgs.js";
import { loadStarAtlasConfig } from "./star_atlas/config/starAtlasConfig.js";
import {
  createArtifactSink,
  createCatalogClient,
  pipelineOptions,
} from "./star_atlas/pipeline/createPipelineDeps.js";
import { runNearbyStars } from "./star_atlas/pipeline/runNearbyStars.js";

async function promptDistance(unit: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const unitName = unit === "ly" ? "light-years" : unit;
    return await rl.question(`Enter the maximum distance in ${unitName}: `);
  } finally {
    rl.close();
  }
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadStarAtlasConfig();
  const catalog = createCatalogClient(config, args.catalogFile);
  const sink = createArtifactSink(config, args.outputDir);

  const rawDistance = args.distance ?? (await promptDistance(args.unit));

  console.log(`[nearby-stars] Querying ${catalog.name} for stars within ${rawDistance} ${args.unit}`);
  const result = await runNearbyStars({
    rawDistance,
    unit: args.unit,
    catalog,
    sink,
    options: pipelineOptions(config),
  });

  console.log(`[nearby-stars] ${describeResult(result)}`);
}

main().catch((err) => {
  console.error(`[nearby-stars] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
