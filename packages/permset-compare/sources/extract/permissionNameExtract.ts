import {
  PERMISSION_ACTION_DATE_PATTERN,
  PERMISSION_ACTION_DATE_PREFIX_PATTERN,
  PERMISSION_ACTION_KEYWORDS,
  PERMISSION_DATE_PATTERN,
  PERMISSION_HEADER_ACTION_MARKER,
  PERMISSION_HEADER_MARKER,
  PERMISSION_NOISE_MARKERS
} from "../constants.js";
import { permissionLineTokenize } from "../tokenize/permissionLineTokenize.js";
import type { PermissionName } from "../types.js";

/**
 * Extracts the permission set name from one pasted report line.
 * Returns null for blank lines, header rows, action/date rows and lines made only of noise.
 */
export function permissionNameExtract(rawLine: string): PermissionName | null {
  const line = rawLine.trim();
  if (line.length === 0) {
    return null;
  }

  const lowered = line.toLowerCase();
  if (lowered.includes(PERMISSION_HEADER_MARKER) && lowered.includes(PERMISSION_HEADER_ACTION_MARKER)) {
    return null;
  }
  if (PERMISSION_ACTION_DATE_PATTERN.test(line)) {
    return null;
  }

  const tokens = permissionLineTokenize(rawLine);
  const first = tokens[0];
  if (first === undefined) {
    return null;
  }

  for (const token of tokens) {
    const trimmed = tokenActionDatePrefixStrip(token.trim());
    const loweredToken = trimmed.toLowerCase();
    if (trimmed.length === 0 || tokenNoiseIs(trimmed)) {
      continue;
    }
    if (PERMISSION_NOISE_MARKERS.some((marker) => loweredToken.includes(marker))) {
      continue;
    }
    if (loweredToken.includes(PERMISSION_HEADER_MARKER)) {
      return null;
    }
    return trimmed;
  }

  const fallback = tokenActionDatePrefixStrip(first.trim());
  if (fallback.length === 0 || tokenNoiseIs(fallback)) {
    return null;
  }
  return fallback;
}

/**
 * Action keywords, dates and `<action> <date>` pairs never name a permission set.
 */
function tokenNoiseIs(token: string): boolean {
  return (
    PERMISSION_ACTION_KEYWORDS.has(token.toLowerCase()) ||
    PERMISSION_DATE_PATTERN.test(token) ||
    PERMISSION_ACTION_DATE_PATTERN.test(token)
  );
}

/**
 * Drops leading `<action> <date>` pairs, so a name pasted in one cell with its
 * audit prefix extracts the same way as the bare name does.
 */
function tokenActionDatePrefixStrip(token: string): string {
  let current = token;
  let match = PERMISSION_ACTION_DATE_PREFIX_PATTERN.exec(current);
  while (match?.[3]) {
    current = match[3].trim();
    match = PERMISSION_ACTION_DATE_PREFIX_PATTERN.exec(current);
  }
  return current;
}
