import { permissionNamesExtract } from "../reconcile/permissionNamesExtract.js";

/**
 * Re-normalizes an input buffer to one permission set name per line.
 * Returns null when the text is already normalized, so callers only rewrite on change.
 */
export function permissionInputSanitize(text: string): string | null {
  const sanitized = permissionNamesExtract(text).join("\n");
  return sanitized === text ? null : sanitized;
}
