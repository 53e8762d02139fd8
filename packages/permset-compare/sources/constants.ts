export const PERMISSION_ACTION_KEYWORDS: ReadonlySet<string> = new Set(["add", "del", "delete", "remove"]);

export const PERMISSION_DATE_PATTERN = /^\d{1,2}\/\d{1,2}\/\d{2,4}$/;
export const PERMISSION_ACTION_DATE_PATTERN = /^(?:add|del|delete|remove)\s+\d{1,2}\/\d{1,2}\/\d{2,4}$/i;
export const PERMISSION_ACTION_DATE_PREFIX_PATTERN = /^(add|del|delete|remove)\s+(\d{1,2}\/\d{1,2}\/\d{2,4})\s+(\S.*)$/i;

export const PERMISSION_HEADER_MARKER = "permission set name";
export const PERMISSION_HEADER_ACTION_MARKER = "action";
export const PERMISSION_NOISE_MARKERS = ["expires on", "date assigned"] as const;

export const DESCRIPTIONS_FILE_DEFAULT = "Permission Sets.csv";
export const DESCRIPTIONS_PATH_ENV = "PERMSET_COMPARE_DESCRIPTIONS";
export const CONFIG_FILE_DEFAULT = "permset-compare.yaml";

export const REPORT_COMPLETE_MESSAGE = "No missing permissions.";
export const REPORT_COMPLETE_DETAIL = "The user already has all permission sets listed for the mirror user.";
