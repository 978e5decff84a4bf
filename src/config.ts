/**
 * Drift Engine Configuration
 *
 * Schema-based configuration using Zod. Values come from defaults, an
 * optional JSON file and environment overrides, in that order.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type DriftLogger, type DriftLogLevel } from "./logging/index.js";
import { DEFAULT_SEVERITY_THRESHOLDS } from "./severity.js";
import type { SeverityThresholds } from "./types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const severityThresholdsSchema = z.object({
  CRITICAL: z.array(z.string()).default(DEFAULT_SEVERITY_THRESHOLDS.CRITICAL),
  HIGH: z.array(z.string()).default(DEFAULT_SEVERITY_THRESHOLDS.HIGH),
  MEDIUM: z.array(z.string()).default(DEFAULT_SEVERITY_THRESHOLDS.MEDIUM),
  LOW: z.array(z.string()).default(DEFAULT_SEVERITY_THRESHOLDS.LOW),
});

export const managedByTagSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

export const driftEngineConfigSchema = z.object({
  /** Tag keys excluded from tag comparison */
  ignoreTags: z.array(z.string()).default(["LastModified", "CreatedBy"]),
  /** Live identifiers or declared addresses never reported */
  ignoreResources: z.array(z.string()).default([]),
  severityThresholds: severityThresholdsSchema.default({}),
  /** Region in which global resources (IAM roles) are evaluated */
  primaryRegion: z.string().min(1).default("us-east-1"),
  /** Restrict analysis to these snapshot regions */
  scanRegions: z.array(z.string().min(1)).optional(),
  environment: z.string().min(1).default("production"),
  /** Live resources carrying this tag are governed elsewhere and never reported as extra */
  managedByTag: managedByTagSchema.default({ key: "ManagedBy", value: "terraform" }),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type DriftEngineConfig = z.output<typeof driftEngineConfigSchema>;
export type DriftEngineConfigInput = z.input<typeof driftEngineConfigSchema>;

/** Read-only view of the configuration shared by every comparison of a scan. */
export interface ResolvedConfig {
  readonly ignoreTags: ReadonlySet<string>;
  readonly ignoreResources: ReadonlySet<string>;
  readonly severityThresholds: Readonly<SeverityThresholds>;
  readonly primaryRegion: string;
  readonly scanRegions: readonly string[] | undefined;
  readonly environment: string;
  readonly managedByTag: Readonly<{ key: string; value: string }>;
  readonly logLevel: DriftLogLevel;
}

// =============================================================================
// Validation
// =============================================================================

export function validateDriftEngineConfig(
  config: unknown,
): ReturnType<typeof driftEngineConfigSchema.safeParse> {
  return driftEngineConfigSchema.safeParse(config);
}

/** Validate and apply defaults; throws ConfigError. */
export function parseConfig(config: unknown = {}): DriftEngineConfig {
  const result = validateDriftEngineConfig(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid drift engine configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function getDefaultConfig(): DriftEngineConfig {
  return driftEngineConfigSchema.parse({});
}

export function resolveConfig(config: DriftEngineConfig): ResolvedConfig {
  return {
    ignoreTags: new Set(config.ignoreTags),
    ignoreResources: new Set(config.ignoreResources),
    severityThresholds: config.severityThresholds,
    primaryRegion: config.primaryRegion,
    scanRegions: config.scanRegions,
    environment: config.environment,
    managedByTag: config.managedByTag,
    logLevel: config.logLevel,
  };
}

// =============================================================================
// Loading
// =============================================================================

export interface LoadConfigOptions {
  /** JSON file; a missing file falls back to defaults */
  path?: string;
  env?: NodeJS.ProcessEnv;
  logger?: DriftLogger;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Environment overrides, applied on top of the file contents. */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const region = env.DRIFT_PRIMARY_REGION ?? env.AWS_DEFAULT_REGION;
  if (region) overrides.primaryRegion = region;
  if (env.DRIFT_SCAN_REGIONS !== undefined) overrides.scanRegions = splitList(env.DRIFT_SCAN_REGIONS);
  if (env.DRIFT_IGNORE_TAGS !== undefined) overrides.ignoreTags = splitList(env.DRIFT_IGNORE_TAGS);
  if (env.DRIFT_IGNORE_RESOURCES !== undefined) overrides.ignoreResources = splitList(env.DRIFT_IGNORE_RESOURCES);
  if (env.DRIFT_ENVIRONMENT) overrides.environment = env.DRIFT_ENVIRONMENT;
  if (env.DRIFT_LOG_LEVEL) overrides.logLevel = env.DRIFT_LOG_LEVEL;

  return overrides;
}

function readConfigFile(path: string, logger?: DriftLogger): Record<string, unknown> {
  if (!fs.existsSync(path)) {
    logger?.info(`Configuration file ${path} not found, using defaults`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Configuration file ${path} must contain a JSON object`);
  }
  logger?.debug(`Configuration loaded from ${path}`);
  return { ...parsed };
}

export function loadConfig(options: LoadConfigOptions = {}): DriftEngineConfig {
  const fromFile = options.path ? readConfigFile(options.path, options.logger) : {};
  const fromEnv = readEnvOverrides(options.env ?? process.env);
  return parseConfig({ ...fromFile, ...fromEnv });
}
