import { z } from "zod";
import type { CompareConfigResolved } from "../types.js";

const compareConfigSchema = z
  .object({
    descriptions: z.string().min(1).optional(),
    format: z.enum(["table", "json"]).optional()
  })
  .strict();

/**
 * Resolves raw config input into a fully defaulted compare config.
 * Expects: rawConfig is a plain object, or null/undefined for an empty file.
 */
export function compareConfigResolve(rawConfig: unknown): CompareConfigResolved {
  const parsed = compareConfigSchema.parse(rawConfig ?? {});

  return {
    descriptions: parsed.descriptions,
    format: parsed.format ?? "table"
  };
}
