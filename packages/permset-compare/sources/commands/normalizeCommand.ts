import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { getLogger } from "../log.js";
import { permissionNamesExtract } from "../reconcile/permissionNamesExtract.js";
import { permissionInputSanitize } from "../sanitize/permissionInputSanitize.js";
import type { NormalizeCliOptions } from "../types.js";
import { inputFileRead } from "./compareCommand.js";

const logger = getLogger("normalize");

interface NormalizeCommandDependencies {
  output?: (text: string) => void;
  cwd?: string;
}

/**
 * Prints one permission set name per line for a pasted report file.
 * With --write, rewrites the file in place when its content is not normalized yet.
 */
export async function normalizeCommand(
  file: string,
  options: NormalizeCliOptions,
  dependencies: NormalizeCommandDependencies = {}
): Promise<void> {
  const output = dependencies.output ?? console.log;
  const path = resolve(dependencies.cwd ?? process.cwd(), file);
  const text = await inputFileRead(path, "permissions");

  if (!options.write) {
    const names = permissionNamesExtract(text);
    if (names.length > 0) {
      output(names.join("\n"));
    }
    return;
  }

  const sanitized = permissionInputSanitize(text);
  if (sanitized === null) {
    output(`${path} is already normalized.`);
    return;
  }

  await writeFile(path, sanitized, "utf-8");
  logger.info({ path }, "normalize:written");
  output(`Normalized ${path}.`);
}
