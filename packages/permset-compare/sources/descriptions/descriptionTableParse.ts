import type { DescriptionTable } from "../types.js";
import { descriptionCsvLineParse } from "./descriptionCsvLineParse.js";

export interface DescriptionTableParseResult {
  table: DescriptionTable;
  skippedRows: number;
}

/**
 * Parses the permission set reference CSV into a lowercase name to description map.
 * Expects: first line is a header; column 2 is the name and column 3 the description.
 */
export function descriptionTableParse(text: string): DescriptionTableParseResult {
  const table = new Map<string, string>();
  let skippedRows = 0;

  const lines = text.split(/\r?\n/).slice(1);
  for (const line of lines) {
    if (line.trim().length === 0) {
      continue;
    }
    const fields = descriptionCsvLineParse(line);
    const name = fields[2]?.trim();
    const description = fields[3]?.trim();
    if (fields.length < 4 || !name || description === undefined) {
      skippedRows += 1;
      continue;
    }
    table.set(name.toLowerCase(), description);
  }

  return { table, skippedRows };
}

export function descriptionLookup(table: DescriptionTable, name: string): string {
  return table.get(name.toLowerCase()) ?? "";
}
