import { readFile } from "node:fs/promises";
import { compareConfigRead } from "../config/compareConfigRead.js";
import { descriptionTableRead } from "../descriptions/descriptionTableRead.js";
import { getLogger } from "../log.js";
import { comparePathsResolve, descriptionsPathResolve } from "../paths/comparePathsResolve.js";
import { permissionSetDiff } from "../reconcile/permissionSetDiff.js";
import { permissionReportBuild } from "../report/permissionReportBuild.js";
import { permissionReportFormat, reportFormatParse } from "../report/permissionReportFormat.js";
import type { CompareCliOptions } from "../types.js";

const logger = getLogger("compare");

interface CompareCommandDependencies {
  output?: (text: string) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Prints the permission sets the mirror user has and the primary user lacks.
 * Expects: both input files are readable text; the description CSV is optional.
 */
export async function compareCommand(
  userFile: string,
  mirrorFile: string,
  options: CompareCliOptions,
  dependencies: CompareCommandDependencies = {}
): Promise<void> {
  const output = dependencies.output ?? console.log;
  const cwd = dependencies.cwd ?? process.cwd();
  const paths = comparePathsResolve(userFile, mirrorFile, options.config, cwd);

  const config = await compareConfigRead(paths.configPath, paths.configRequired);
  const format = options.format ? reportFormatParse(options.format) : config.format;
  const descriptionsPath = descriptionsPathResolve(
    options.descriptions,
    config,
    paths.configPath,
    dependencies.env ?? process.env,
    cwd
  );

  const userText = await inputFileRead(paths.userPath, "user permissions");
  const mirrorText = await inputFileRead(paths.mirrorPath, "mirror permissions");
  const table = await descriptionTableRead(descriptionsPath);

  const missing = permissionSetDiff(userText, mirrorText);
  logger.info({ missing: missing.length, descriptions: table.size }, "compare:done");

  output(permissionReportFormat(permissionReportBuild(missing, table), format));
}

export async function inputFileRead(path: string, label: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    const details = error instanceof Error && error.message ? error.message : "could not read file";
    throw new Error(`Failed to read ${label} at ${path}: ${details}`);
  }
}
