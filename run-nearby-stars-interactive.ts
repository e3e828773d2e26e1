#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline";
import { describeResult } from "./star_atlas/cli/describeResult.js";
import { USAGE, parseCliArgs } from "./star_atlas/cli/parseCliArgs.js";
import { loadStarAtlasConfig } from "./star_atlas/config/starAtlasConfig.js";
import {
  createArtifactSink,
  createCatalogClient,
  pipelineOptions,
} from "./star_atlas/pipeline/createPipelineDeps.js";
import { runNearbyStars } from "./star_atlas/pipeline/runNearbyStars.js";

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

/**
 * Line-driven variant: each distance typed runs one full pipeline before the
 * next line is read. Every new chart overwrites the previous one.
 */
async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadStarAtlasConfig();
  const catalog = createCatalogClient(config, args.catalogFile);
  const sink = createArtifactSink(config, args.outputDir);
  const options = pipelineOptions(config);

  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
  const prompt = `Enter the maximum distance in ${args.unit === "ly" ? "light-years" : args.unit} (or "quit"): `;

  rl.setPrompt(prompt);
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (QUIT_WORDS.has(input.toLowerCase())) break;

    if (input) {
      try {
        const result = await runNearbyStars({ rawDistance: input, unit: args.unit, catalog, sink, options });
        console.log(`[nearby-stars] ${describeResult(result)}`);
      } catch (err) {
        console.error(`[nearby-stars] ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    rl.prompt();
  }

  rl.close();
}

main().catch((err) => {
  console.error(`[nearby-stars] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
