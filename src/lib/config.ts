import path from "path";
import { z } from "zod";

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; LogoLens/1.0)";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  LOGOS_DIR: z.string().min(1).default("logos"),
  DUPLICATES_DIR: z.string().min(1).default("duplicates"),
  PALETTES_DIR: z.string().min(1).default("palettes"),
  REPORTS_DIR: z.string().min(1).default("."),
  INPUT_FILE: z.string().min(1).default("logos.snappy.parquet"),
  FETCH_CONCURRENCY: positiveInt(10),
  COMPARE_CONCURRENCY: positiveInt(5),
  PAGE_TIMEOUT_MS: positiveInt(20_000),
  IMAGE_TIMEOUT_MS: positiveInt(5_000),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(100).default(49),
  BRAND_PREFIX_LENGTH: positiveInt(3),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export interface AppConfig {
  logosDir: string;
  duplicatesDir: string;
  palettesDir: string;
  reportsDir: string;
  inputFile: string;
  fetchConcurrency: number;
  compareConcurrency: number;
  pageTimeoutMs: number;
  imageTimeoutMs: number;
  /** Near-duplicate when the histogram score is strictly above this */
  similarityThreshold: number;
  brandPrefixLength: number;
  userAgent: string;
}

/**
 * Read configuration from the environment. Directories are resolved against
 * `cwd`. Throws a ZodError when a value is present but invalid.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  // Empty strings count as unset so `.env` placeholders fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.parse(present);

  return {
    logosDir: path.resolve(cwd, parsed.LOGOS_DIR),
    duplicatesDir: path.resolve(cwd, parsed.DUPLICATES_DIR),
    palettesDir: path.resolve(cwd, parsed.PALETTES_DIR),
    reportsDir: path.resolve(cwd, parsed.REPORTS_DIR),
    inputFile: path.resolve(cwd, parsed.INPUT_FILE),
    fetchConcurrency: parsed.FETCH_CONCURRENCY,
    compareConcurrency: parsed.COMPARE_CONCURRENCY,
    pageTimeoutMs: parsed.PAGE_TIMEOUT_MS,
    imageTimeoutMs: parsed.IMAGE_TIMEOUT_MS,
    similarityThreshold: parsed.SIMILARITY_THRESHOLD,
    brandPrefixLength: parsed.BRAND_PREFIX_LENGTH,
    userAgent: parsed.USER_AGENT,
  };
}
