import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../parseCliArgs.js";

describe("parseCliArgs", () => {
  it("defaults to light-years and a prompt", () => {
    expect(parseCliArgs([])).toEqual({
      distance: null,
      unit: "ly",
      catalogFile: null,
      outputDir: null,
      help: false,
    });
  });

  it("reads every value flag", () => {
    expect(
      parseCliArgs(["--distance", "20", "--unit", "pc", "--catalog-file", "rows.json", "--out", "charts"])
    ).toEqual({
      distance: "20",
      unit: "pc",
      catalogFile: "rows.json",
      outputDir: "charts",
      help: false,
    });
  });

  it("keeps the distance as raw text for validation downstream", () => {
    expect(parseCliArgs(["--distance", "-5"]).distance).toBe("-5");
  });

  it("recognizes help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliArgs(["--radius", "4"])).toThrow("Unknown argument: --radius");
    expect(() => parseCliArgs(["--distance"])).toThrow("--distance requires a value");
  });
});
