/**
 * Runtime configuration
 *
 * One explicit object handed to a session at startup. Nothing in the engine
 * reads settings from anywhere else.
 */

import { z } from "zod";
import { NumbermarkError } from "./errors.js";
import { DEFAULT_MAX_HISTORY } from "./history/undoLog.js";
import { NumbermarkLogger } from "./observability/index.js";

export const DuplicateChoiceSchema = z.enum(["advance", "subNumber", "cancel"]);

export type DuplicateChoice = z.infer<typeof DuplicateChoiceSchema>;

export const NumbermarkConfigSchema = z
  .object({
    history: z
      .object({ maxDepth: z.number().int().positive().default(DEFAULT_MAX_HISTORY) })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).default("info"),
        console: z.boolean().default(true),
      })
      .strict()
      .default({}),
    duplicates: z
      .object({ defaultChoice: DuplicateChoiceSchema.default("cancel") })
      .strict()
      .default({}),
    pdf: z
      .object({
        metadataKey: z
          .string()
          .regex(/^[A-Za-z0-9_-]+$/, "metadata key may only use letters, digits, '-' and '_'")
          .default("numbermark"),
        matchTolerance: z.number().nonnegative().default(2),
      })
      .strict()
      .default({}),
  })
  .strict();

export type NumbermarkConfig = z.output<typeof NumbermarkConfigSchema>;
export type NumbermarkConfigInput = z.input<typeof NumbermarkConfigSchema>;

export function resolveConfig(input: unknown = {}): NumbermarkConfig {
  const result = NumbermarkConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new NumbermarkError(
      "INVALID_CONFIG",
      `Invalid configuration at ${issue?.path.join(".") || "<root>"}: ${issue?.message}`,
      { context: { issues: result.error.issues } }
    );
  }
  return result.data;
}

export const DEFAULT_CONFIG: NumbermarkConfig = resolveConfig();

export function createLoggerFromConfig(config: NumbermarkConfig): NumbermarkLogger {
  return new NumbermarkLogger({ minLevel: config.logging.level, console: config.logging.console });
}
