#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { compareCommand } from "./commands/compareCommand.js";
import { normalizeCommand } from "./commands/normalizeCommand.js";
import { CONFIG_FILE_DEFAULT, DESCRIPTIONS_FILE_DEFAULT } from "./constants.js";
import { initLogging } from "./log.js";
import type { CompareCliOptions, NormalizeCliOptions } from "./types.js";

const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")) as { version: string };

initLogging();

const program = new Command();

program
    .name("permset-compare")
    .description("Find permission sets a mirror user has that a primary user lacks")
    .version(pkg.version);

program
    .command("compare")
    .description("Compare two pasted permission set reports")
    .argument("<userFile>", "File with the primary user's permission sets")
    .argument("<mirrorFile>", "File with the mirror user's permission sets")
    .option("-d, --descriptions <path>", `Permission set description CSV (default: ${DESCRIPTIONS_FILE_DEFAULT})`)
    .option("-c, --config <path>", `Config file path (default: ${CONFIG_FILE_DEFAULT})`)
    .option("-f, --format <format>", "Output format: table or json")
    .action(async (userFile: string, mirrorFile: string, options: CompareCliOptions) => {
        await compareCommand(userFile, mirrorFile, options);
    });

program
    .command("normalize")
    .description("Reduce a pasted report to one permission set name per line")
    .argument("<file>", "File with pasted permission sets")
    .option("-w, --write", "Rewrite the file in place when it changes")
    .action(async (file: string, options: NormalizeCliOptions) => {
        await normalizeCommand(file, options);
    });

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const details = error instanceof Error && error.message ? error.message : "unknown error";
    console.error(`permset-compare failed: ${details}`);
    process.exit(1);
}
