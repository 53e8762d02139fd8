import type { PermissionName } from "../types.js";
import { permissionNameSetBuild, permissionNamesExtract } from "./permissionNamesExtract.js";

/**
 * Lists the permission sets the mirror text names that the user text does not.
 * Membership is exact-string; the result is sorted case-insensitively and stays
 * in mirror order for names that differ only by case.
 */
export function permissionSetDiff(userText: string, mirrorText: string): PermissionName[] {
  const userNames = permissionNameSetBuild(userText);
  const missing = permissionNamesExtract(mirrorText).filter((name) => !userNames.has(name));
  return missing.sort(permissionNameCompare);
}

export function permissionNameCompare(left: PermissionName, right: PermissionName): number {
  const leftFolded = left.toLowerCase();
  const rightFolded = right.toLowerCase();
  if (leftFolded < rightFolded) {
    return -1;
  }
  if (leftFolded > rightFolded) {
    return 1;
  }
  return 0;
}
