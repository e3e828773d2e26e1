import { z } from "zod";
import { DEFAULT_GAIA_TABLE } from "../query/buildCatalogQuery.js";

const optionalPositiveInt = z.preprocess(
  (v) => (v === "" ? undefined : v),
  z.coerce.number().int().positive().optional()
);

const EnvSchema = z
  .object({
    GAIA_TAP_URL: z.string().url().default("https://gea.esac.esa.int/tap-server/tap"),
    GAIA_TABLE: z
      .string()
      .regex(/^[A-Za-z_]\w*(\.[A-Za-z_]\w*)?$/, "must be a table identifier")
      .default(DEFAULT_GAIA_TABLE),
    GAIA_ROW_LIMIT: optionalPositiveInt,
    GAIA_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    STAR_MIN_SIZE: z.coerce.number().positive().default(10),
    STAR_MAX_SIZE: z.coerce.number().positive().default(100),
    STAR_CHART_SIZE_PX: z.coerce.number().int().min(400).default(800),
    STAR_OUTPUT_DIR: z.string().min(1).default("out"),

    STAR_ARTIFACT_SINK: z.enum(["local", "supabase"]).default("local"),
    STAR_SUPABASE_BUCKET: z.string().min(1).default("star-charts"),
  })
  .refine((env) => env.STAR_MIN_SIZE <= env.STAR_MAX_SIZE, {
    message: "STAR_MIN_SIZE must not exceed STAR_MAX_SIZE",
    path: ["STAR_MIN_SIZE"],
  });

export type StarAtlasConfig = {
  catalog: {
    tapUrl: string;
    table: string;
    rowLimit: number | null;
    timeoutMs: number;
  };
  visual: {
    min_size: number;
    max_size: number;
    chartSizePx: number;
  };
  artifacts: {
    sink: "local" | "supabase";
    outputDir: string;
    supabaseBucket: string;
  };
};

/**
 * Read configuration from the environment (after dotenv has run).
 * Throws with every zod issue listed when a value is unusable.
 */
export function loadStarAtlasConfig(
  env: Record<string, string | undefined> = process.env
): StarAtlasConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid nearby-stars configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    catalog: {
      tapUrl: e.GAIA_TAP_URL.replace(/\/+$/, ""),
      table: e.GAIA_TABLE,
      rowLimit: e.GAIA_ROW_LIMIT ?? null,
      timeoutMs: e.GAIA_TIMEOUT_MS,
    },
    visual: {
      min_size: e.STAR_MIN_SIZE,
      max_size: e.STAR_MAX_SIZE,
      chartSizePx: e.STAR_CHART_SIZE_PX,
    },
    artifacts: {
      sink: e.STAR_ARTIFACT_SINK,
      outputDir: e.STAR_OUTPUT_DIR,
      supabaseBucket: e.STAR_SUPABASE_BUCKET,
    },
  };
}
