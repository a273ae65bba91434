// cdk/lambda/config.ts
import { z } from "zod";
import { ConfigError } from "./errors";

export type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function integerVar(defaultValue: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const parsed = Number(value.trim());
      if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected an integer between ${min} and ${max}, got '${value}'`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

const nonEmpty = z.string().trim().min(1, "must be set");

const commonSchema = z.object({
  STATE_TABLE_NAME: nonEmpty,
  ENVIRONMENT: z.string().trim().min(1).default("dev"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

const ingestSchema = commonSchema.extend({
  ARCHIVE_BUCKET_NAME: nonEmpty,
  ARCHIVE_PREFIX: z
    .string()
    .default("telemetry")
    .transform((value) => value.replace(/^\/+|\/+$/g, "")),
  STATE_DECIMAL_PLACES: integerVar(2, 0, 10),
  STORE_TIMEOUT_MS: integerVar(3000, 1, 900_000),
  DEADLINE_MARGIN_MS: integerVar(250, 0, 60_000),
});

const apiSchema = commonSchema.extend({
  CORS_ALLOW_ORIGIN: z.string().trim().min(1).default("*"),
});

export interface IngestConfig {
  environment: string;
  logLevel: (typeof LOG_LEVELS)[number];
  stateTableName: string;
  archiveBucketName: string;
  archivePrefix: string;
  decimalPlaces: number;
  storeTimeoutMs: number;
  deadlineMarginMs: number;
}

export interface ApiConfig {
  environment: string;
  logLevel: (typeof LOG_LEVELS)[number];
  stateTableName: string;
  corsAllowOrigin: string;
}

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: EnvSource, context: string): z.output<S> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`[${context}] Invalid environment configuration\n${details}`);
  }
  return result.data;
}

export function loadIngestConfig(env: EnvSource = process.env): IngestConfig {
  const parsed = parseEnv(ingestSchema, env, "telemetry-ingest");
  return {
    environment: parsed.ENVIRONMENT,
    logLevel: parsed.LOG_LEVEL,
    stateTableName: parsed.STATE_TABLE_NAME,
    archiveBucketName: parsed.ARCHIVE_BUCKET_NAME,
    archivePrefix: parsed.ARCHIVE_PREFIX,
    decimalPlaces: parsed.STATE_DECIMAL_PLACES,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    deadlineMarginMs: parsed.DEADLINE_MARGIN_MS,
  };
}

export function loadApiConfig(env: EnvSource = process.env): ApiConfig {
  const parsed = parseEnv(apiSchema, env, "telemetry-api");
  return {
    environment: parsed.ENVIRONMENT,
    logLevel: parsed.LOG_LEVEL,
    stateTableName: parsed.STATE_TABLE_NAME,
    corsAllowOrigin: parsed.CORS_ALLOW_ORIGIN,
  };
}
