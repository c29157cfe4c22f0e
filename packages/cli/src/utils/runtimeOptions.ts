import {
  type NumbermarkConfig,
  type NumbermarkLogger,
  createLoggerFromConfig,
  resolveConfig,
} from "@numbermark/core";
import type { OutputFormat } from "./output";

type Environment = Record<string, string | undefined>;

const CLI_LOG_LEVEL = "warn";

export function resolveOutput(value: string | undefined): OutputFormat {
  return value === "json" ? "json" : "text";
}

export function resolveRuntimeConfigString(
  primary: string | undefined,
  fallback: unknown,
  envVar?: string,
  env: Environment = process.env
): string | undefined {
  const normalizedPrimary = normalizeValue(primary);
  if (normalizedPrimary) {
    return normalizedPrimary;
  }
  const envValue = envVar ? normalizeValue(env[envVar]) : undefined;
  if (envValue) {
    return envValue;
  }
  if (typeof fallback === "string") {
    return normalizeValue(fallback);
  }
  return undefined;
}

/**
 * Builds the engine configuration from NUMBERMARK_* variables:
 * LOG_LEVEL, HISTORY_DEPTH, DUPLICATES, METADATA_KEY and MATCH_TOLERANCE.
 */
export function resolveCliConfig(env: Environment = process.env): NumbermarkConfig {
  const history: Record<string, unknown> = {};
  const duplicates: Record<string, unknown> = {};
  const pdf: Record<string, unknown> = {};

  const depth = normalizeValue(env.NUMBERMARK_HISTORY_DEPTH);
  if (depth) {
    history.maxDepth = Number(depth);
  }
  const choice = normalizeValue(env.NUMBERMARK_DUPLICATES);
  if (choice) {
    duplicates.defaultChoice = choice;
  }
  const metadataKey = normalizeValue(env.NUMBERMARK_METADATA_KEY);
  if (metadataKey) {
    pdf.metadataKey = metadataKey;
  }
  const tolerance = normalizeValue(env.NUMBERMARK_MATCH_TOLERANCE);
  if (tolerance) {
    pdf.matchTolerance = Number(tolerance);
  }

  return resolveConfig({
    history,
    duplicates,
    pdf,
    logging: {
      level: resolveRuntimeConfigString(undefined, CLI_LOG_LEVEL, "NUMBERMARK_LOG_LEVEL", env),
      console: true,
    },
  });
}

export function createCliLogger(config: NumbermarkConfig): NumbermarkLogger {
  return createLoggerFromConfig(config).child({ opId: `cli-${process.pid}` });
}

function normalizeValue(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed;
}
