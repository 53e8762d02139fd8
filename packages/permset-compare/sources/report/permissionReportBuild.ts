import { REPORT_COMPLETE_DETAIL, REPORT_COMPLETE_MESSAGE } from "../constants.js";
import { descriptionLookup } from "../descriptions/descriptionTableParse.js";
import type { DescriptionTable, PermissionName, PermissionReport } from "../types.js";

/**
 * Pairs each missing permission set with its description.
 * An empty list becomes the informational "complete" report.
 */
export function permissionReportBuild(missing: PermissionName[], table: DescriptionTable): PermissionReport {
  if (missing.length === 0) {
    return {
      kind: "complete",
      message: REPORT_COMPLETE_MESSAGE,
      detail: REPORT_COMPLETE_DETAIL
    };
  }

  return {
    kind: "missing",
    rows: missing.map((name) => ({
      name,
      description: descriptionLookup(table, name)
    }))
  };
}
