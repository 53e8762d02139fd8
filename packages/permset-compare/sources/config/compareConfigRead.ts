import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import type { CompareConfigResolved } from "../types.js";
import { compareConfigResolve } from "./compareConfigResolve.js";

/**
 * Reads and validates a permset-compare.yaml config file.
 * Expects: configPath points to a YAML document; when `required` is false a missing file yields defaults.
 */
export async function compareConfigRead(configPath: string, required: boolean): Promise<CompareConfigResolved> {
  let rawText: string;
  try {
    rawText = await readFile(configPath, "utf-8");
  } catch (error) {
    if (!required && fileMissingIs(error)) {
      return compareConfigResolve({});
    }
    const details = error instanceof Error && error.message ? error.message : "could not read config";
    throw new Error(`Failed to read config at ${configPath}: ${details}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(rawText);
  } catch (error) {
    const details = error instanceof Error && error.message ? error.message : "invalid yaml";
    throw new Error(`Failed to parse config at ${configPath}: ${details}`);
  }

  try {
    return compareConfigResolve(parsed);
  } catch (error) {
    const details = error instanceof Error && error.message ? error.message : "unknown config error";
    throw new Error(`Invalid config at ${configPath}: ${details}`);
  }
}

function fileMissingIs(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
