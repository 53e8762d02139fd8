import { PERMISSION_ACTION_DATE_PREFIX_PATTERN } from "../constants.js";

/**
 * A tokenization strategy. Returns null when the strategy does not apply to the line.
 */
export type PermissionLineTokenizer = (rawLine: string) => string[] | null;

/**
 * Splits on tabs. Once the line has a tab this strategy owns it, even when nothing is left.
 */
export function permissionLineTabSplit(rawLine: string): string[] | null {
  if (!rawLine.includes("\t")) {
    return null;
  }
  return piecesClean(rawLine.split("\t"));
}

/**
 * Splits on runs of two or more whitespace characters.
 * Applies only when there is more than one column and at least one wide gap
 * is not just padding after a comma.
 */
export function permissionLineSpaceSplit(rawLine: string): string[] | null {
  const trimmed = rawLine.trim();
  const tokens = trimmed.split(/\s{2,}/).filter((piece) => piece.length > 0);
  if (tokens.length <= 1) {
    return null;
  }
  if (!/[^,\s]\s{2,}/.test(trimmed)) {
    return null;
  }
  return tokens;
}

/**
 * Splits `<action> <date> <name>` rows separated by single spaces.
 */
export function permissionLineActionDateSplit(rawLine: string): string[] | null {
  const match = PERMISSION_ACTION_DATE_PREFIX_PATTERN.exec(rawLine.trim());
  if (!match) {
    return null;
  }
  const [, action, date, rest] = match;
  if (!action || !date || !rest) {
    return null;
  }
  return [action, date, rest.trim()];
}

export function permissionLineCommaSplit(rawLine: string): string[] | null {
  if (!rawLine.includes(",")) {
    return null;
  }
  return piecesClean(rawLine.split(","));
}

export function permissionLineWholeSplit(rawLine: string): string[] {
  return [rawLine.trim()];
}

const PERMISSION_LINE_TOKENIZERS: readonly PermissionLineTokenizer[] = [
  permissionLineTabSplit,
  permissionLineSpaceSplit,
  permissionLineActionDateSplit,
  permissionLineCommaSplit
];

/**
 * Splits one pasted line into candidate tokens.
 * Tries tabs, wide spacing, action/date prefixes and commas in order; falls back to the whole line.
 */
export function permissionLineTokenize(rawLine: string): string[] {
  for (const tokenizer of PERMISSION_LINE_TOKENIZERS) {
    const tokens = tokenizer(rawLine);
    if (tokens) {
      return tokens;
    }
  }
  return permissionLineWholeSplit(rawLine);
}

function piecesClean(pieces: string[]): string[] {
  return pieces.map((piece) => piece.trim()).filter((piece) => piece.length > 0);
}
