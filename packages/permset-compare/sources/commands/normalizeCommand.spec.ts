import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { normalizeCommand } from "./normalizeCommand.js";

const tempDirectories: string[] = [];

afterEach(async () => {
  for (const directory of tempDirectories.splice(0, tempDirectories.length)) {
    await rm(directory, { recursive: true, force: true });
  }
});

const PASTED = "Permission Set Name\tAction\nSales_Admin\tadd\t1/2/24\nRemove 3/4/2024\nView_All\n";

describe("normalizeCommand", () => {
  it("prints normalized names without touching the file", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-normalize-"));
    tempDirectories.push(directory);
    const filePath = join(directory, "pasted.txt");
    await writeFile(filePath, PASTED);
    const output = vi.fn();

    await normalizeCommand("pasted.txt", {}, { output, cwd: directory });

    expect(output).toHaveBeenCalledWith("Sales_Admin\nView_All");
    expect(await readFile(filePath, "utf-8")).toBe(PASTED);
  });

  it("rewrites the file when asked", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-normalize-write-"));
    tempDirectories.push(directory);
    const filePath = join(directory, "pasted.txt");
    await writeFile(filePath, PASTED);
    const output = vi.fn();

    await normalizeCommand("pasted.txt", { write: true }, { output, cwd: directory });

    expect(await readFile(filePath, "utf-8")).toBe("Sales_Admin\nView_All");
    expect(output).toHaveBeenCalledWith(`Normalized ${filePath}.`);
  });

  it("leaves normalized files alone", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-normalize-same-"));
    tempDirectories.push(directory);
    const filePath = join(directory, "names.txt");
    await writeFile(filePath, "Sales_Admin\nView_All");
    const output = vi.fn();

    await normalizeCommand("names.txt", { write: true }, { output, cwd: directory });

    expect(output).toHaveBeenCalledWith(`${filePath} is already normalized.`);
  });
});
