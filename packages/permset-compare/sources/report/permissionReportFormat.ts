import type { PermissionReport, ReportFormat, ReportRow } from "../types.js";

const NAME_HEADER = "Permission Set";
const DESCRIPTION_HEADER = "Description";
const COLUMN_GAP = "  ";

/**
 * Renders a report as a two-column text table or as JSON.
 * JSON output always carries the `missing` array, empty when nothing is missing.
 */
export function permissionReportFormat(report: PermissionReport, format: ReportFormat): string {
  if (format === "json") {
    const missing = report.kind === "missing" ? report.rows : [];
    return JSON.stringify({ missing }, null, 2);
  }

  const rows: ReportRow[] =
    report.kind === "missing" ? report.rows : [{ name: report.message, description: report.detail }];
  const nameWidth = Math.max(NAME_HEADER.length, ...rows.map((row) => row.name.length));
  const descriptionWidth = Math.max(DESCRIPTION_HEADER.length, ...rows.map((row) => row.description.length));

  return [
    `${NAME_HEADER.padEnd(nameWidth)}${COLUMN_GAP}${DESCRIPTION_HEADER}`,
    "─".repeat(nameWidth + COLUMN_GAP.length + descriptionWidth),
    ...rows.map((row) => `${row.name.padEnd(nameWidth)}${COLUMN_GAP}${row.description}`.trimEnd())
  ].join("\n");
}

export function reportFormatParse(value: string): ReportFormat {
  if (value === "table" || value === "json") {
    return value;
  }
  throw new Error(`Unknown report format "${value}". Expected "table" or "json".`);
}
