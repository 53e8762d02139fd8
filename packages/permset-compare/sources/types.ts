export type PermissionName = string;

export type DescriptionTable = ReadonlyMap<string, string>;

export type ReportFormat = "table" | "json";

export interface ReportRow {
  name: PermissionName;
  description: string;
}

export type PermissionReport =
  | { kind: "missing"; rows: ReportRow[] }
  | { kind: "complete"; message: string; detail: string };

export interface CompareCliOptions {
  descriptions?: string;
  config?: string;
  format?: string;
}

export interface NormalizeCliOptions {
  write?: boolean;
}

export interface CompareConfigResolved {
  descriptions?: string;
  format: ReportFormat;
}

export interface ComparePaths {
  userPath: string;
  mirrorPath: string;
  configPath: string;
  configRequired: boolean;
}
