import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const SUPPORTED_ALGORITHMS = ["sha256", "sha384", "sha512"] as const;

export type HashAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export const DATA_CATEGORIES = ["logs", "metadata", "processed", "raw"] as const;

export const DATA_EXTENSIONS = [
  "csv",
  "parquet",
  "feather",
  "json",
  "txt",
] as const;

/**
 * One pattern per data-lake category. Files sit directly inside an
 * identifier directory (1-8 uppercase alphanumerics), optionally below
 * intermediate folders such as raw/equities.
 */
export const DEFAULT_PATTERNS: string[] = DATA_CATEGORIES.map(
  (category) =>
    `^data-lake/${category}/(?:[^/]+/)*[A-Z0-9]{1,8}/[^/]+\\.(?:${DATA_EXTENSIONS.join("|")})$`,
);

/** 8 MiB */
export const DEFAULT_CHUNK_SIZE = 8 * 1024 * 1024;

const patternSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" },
);

export const MonitorConfigSchema = z.object({
  /** Directory the patterns are matched against (the repository root) */
  root: z.string().min(1),
  patterns: z.array(patternSchema).min(1),
  algorithm: z.enum(SUPPORTED_ALGORITHMS),
  chunkSize: z.number().int().min(1024),
  concurrency: z.number().int().min(1).max(64),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

export type MonitorConfigInput = Partial<MonitorConfig>;

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function envNum(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const val = env[key];
  return val ? Number(val) : undefined;
}

/**
 * Reads overrides from SIDECAR_* environment variables
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): MonitorConfigInput {
  const parsed = MonitorConfigSchema.partial().safeParse({
    root: env.SIDECAR_ROOT || undefined,
    algorithm: env.SIDECAR_ALGORITHM || undefined,
    concurrency: envNum(env, "SIDECAR_CONCURRENCY"),
    chunkSize: envNum(env, "SIDECAR_CHUNK_SIZE"),
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Merges defaults, environment and explicit overrides (highest precedence)
 * and validates the result.
 */
export function resolveConfig(
  overrides: MonitorConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): MonitorConfig {
  const fromEnv = configFromEnv(env);
  const merged = {
    root: overrides.root ?? fromEnv.root ?? process.cwd(),
    patterns: overrides.patterns ?? fromEnv.patterns ?? DEFAULT_PATTERNS,
    algorithm: overrides.algorithm ?? fromEnv.algorithm ?? "sha256",
    chunkSize: overrides.chunkSize ?? fromEnv.chunkSize ?? DEFAULT_CHUNK_SIZE,
    concurrency: overrides.concurrency ?? fromEnv.concurrency ?? 4,
  };

  const parsed = MonitorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return { ...parsed.data, root: path.resolve(parsed.data.root) };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const parsed = z.enum(LOG_LEVELS).safeParse(value ?? "info");
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid log level "${value}", expected one of ${LOG_LEVELS.join(", ")}`,
    );
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return `Invalid configuration: ${error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
    .join("; ")}`;
}
