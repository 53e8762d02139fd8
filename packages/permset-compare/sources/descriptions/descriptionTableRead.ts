import { readFile } from "node:fs/promises";
import { getLogger } from "../log.js";
import type { DescriptionTable } from "../types.js";
import { descriptionTableParse } from "./descriptionTableParse.js";

const logger = getLogger("descriptions");

/**
 * Reads the permission set reference CSV.
 * A missing or unreadable file yields an empty table; descriptions are optional.
 */
export async function descriptionTableRead(descriptionsPath: string): Promise<DescriptionTable> {
  let rawText: string;
  try {
    rawText = await readFile(descriptionsPath, "utf-8");
  } catch (error) {
    logger.debug({ error, descriptionsPath }, "table:unreadable");
    return new Map();
  }

  const { table, skippedRows } = descriptionTableParse(rawText);
  logger.debug({ descriptionsPath, entries: table.size, skippedRows }, "table:loaded");
  return table;
}
