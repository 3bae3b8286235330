/**
 * Environment configuration for scanprep.
 *
 * CI agents expose the build context through environment variables. They
 * are read once at startup, validated with zod and handed to the commands
 * as a plain object; CLI flags override individual fields afterwards.
 */

import { z } from "zod";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

/**
 * Output formats of the coverage-urls command.
 */
export type CoverageOutputFormat = "text" | "json";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveIntString = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a positive integer",
    });
    return z.NEVER;
  }
  return parsed;
});

const optionalNonEmpty = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const envSchema = z.object({
  SYSTEM_TEAMFOUNDATIONCOLLECTIONURI: optionalNonEmpty.pipe(
    z.string().url().optional(),
  ),
  SYSTEM_TEAMPROJECT: optionalNonEmpty,
  BUILD_BUILDURI: optionalNonEmpty,
  SYSTEM_ACCESSTOKEN: optionalNonEmpty,
  AGENT_TEMPDIRECTORY: optionalNonEmpty,
  SCANPREP_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SCANPREP_COVERAGE_TIMEOUT_MS: positiveIntString.optional(),
  SCANPREP_COVERAGE_INTERVAL_MS: positiveIntString.optional(),
});

/**
 * Build context resolved from the environment.
 */
export interface EnvConfig {
  readonly collectionUri?: string | undefined;
  readonly teamProject?: string | undefined;
  readonly buildUri?: string | undefined;
  readonly accessToken?: string | undefined;
  /** Where build summary files are written before upload. */
  readonly summaryDirectory?: string | undefined;
  readonly logLevel: LogLevel;
  readonly coverageTimeoutMs?: number | undefined;
  readonly coverageIntervalMs?: number | undefined;
}

export interface ConfigError {
  readonly message: string;
  /** One entry per offending variable, formatted as `NAME: reason`. */
  readonly issues: readonly string[];
}

export function loadEnvConfig(
  env: Readonly<Record<string, string | undefined>>,
): Result<EnvConfig, ConfigError> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return err({
      message: `Invalid environment configuration:\n  ${issues.join("\n  ")}`,
      issues,
    });
  }

  const value = parsed.data;
  return ok({
    collectionUri: value.SYSTEM_TEAMFOUNDATIONCOLLECTIONURI,
    teamProject: value.SYSTEM_TEAMPROJECT,
    buildUri: value.BUILD_BUILDURI,
    accessToken: value.SYSTEM_ACCESSTOKEN,
    summaryDirectory: value.AGENT_TEMPDIRECTORY,
    logLevel: value.SCANPREP_LOG_LEVEL,
    coverageTimeoutMs: value.SCANPREP_COVERAGE_TIMEOUT_MS,
    coverageIntervalMs: value.SCANPREP_COVERAGE_INTERVAL_MS,
  });
}
