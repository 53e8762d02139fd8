import { permissionNameExtract } from "../extract/permissionNameExtract.js";
import type { PermissionName } from "../types.js";

/**
 * Extracts every permission set name from a pasted block.
 * Keeps the first occurrence of each exact name, in the order it appears.
 */
export function permissionNamesExtract(text: string): PermissionName[] {
  const names: PermissionName[] = [];
  const seen = new Set<PermissionName>();

  for (const line of text.split("\n")) {
    const name = permissionNameExtract(line);
    if (name === null || seen.has(name)) {
      continue;
    }
    seen.add(name);
    names.push(name);
  }

  return names;
}

export function permissionNameSetBuild(text: string): Set<PermissionName> {
  return new Set(permissionNamesExtract(text));
}
