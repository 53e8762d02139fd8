import { dirname, resolve } from "node:path";
import { CONFIG_FILE_DEFAULT, DESCRIPTIONS_FILE_DEFAULT, DESCRIPTIONS_PATH_ENV } from "../constants.js";
import type { CompareConfigResolved, ComparePaths } from "../types.js";

/**
 * Resolves the two input files and the config file against the working directory.
 * An explicitly passed config path must exist; the default one may be absent.
 */
export function comparePathsResolve(
  userFile: string,
  mirrorFile: string,
  configFile: string | undefined,
  cwd: string = process.cwd()
): ComparePaths {
  return {
    userPath: resolve(cwd, userFile),
    mirrorPath: resolve(cwd, mirrorFile),
    configPath: resolve(cwd, configFile ?? CONFIG_FILE_DEFAULT),
    configRequired: configFile !== undefined
  };
}

/**
 * Picks the description CSV path: CLI option, then environment, then config
 * (relative to the config file), then the default file in the working directory.
 */
export function descriptionsPathResolve(
  cliValue: string | undefined,
  config: CompareConfigResolved,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  if (cliValue) {
    return resolve(cwd, cliValue);
  }
  const envPath = env[DESCRIPTIONS_PATH_ENV]?.trim();
  if (envPath) {
    return resolve(cwd, envPath);
  }
  if (config.descriptions) {
    return resolve(dirname(configPath), config.descriptions);
  }
  return resolve(cwd, DESCRIPTIONS_FILE_DEFAULT);
}
