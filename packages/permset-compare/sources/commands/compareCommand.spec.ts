import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { compareCommand } from "./compareCommand.js";

const tempDirectories: string[] = [];

afterEach(async () => {
  for (const directory of tempDirectories.splice(0, tempDirectories.length)) {
    await rm(directory, { recursive: true, force: true });
  }
});

async function compareFilesWrite(directory: string): Promise<void> {
  await writeFile(
    join(directory, "user.txt"),
    ["Permission Set Name\tAction\tDate Assigned", "Sales_Admin\tAdd\t1/2/2024", "Report_Viewer"].join("\n")
  );
  await writeFile(
    join(directory, "mirror.txt"),
    ["View_All,  add, 2/3/24", "Sales_Admin", "Add 3/4/2024 flow_access", "Report_Viewer  Expires on 6/30/2025"].join(
      "\n"
    )
  );
  await writeFile(
    join(directory, "Permission Sets.csv"),
    ["Id,Label,Name,Description", 'X,Y,"Flow_Access","Grants ""flow"" access"'].join("\n")
  );
}

describe("compareCommand", () => {
  it("prints missing permission sets with descriptions", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-"));
    tempDirectories.push(directory);
    await compareFilesWrite(directory);
    const output = vi.fn();

    await compareCommand("user.txt", "mirror.txt", { format: "json" }, { output, cwd: directory, env: {} });

    expect(output).toHaveBeenCalledTimes(1);
    expect(JSON.parse(output.mock.calls[0]?.[0] ?? "{}")).toEqual({
      missing: [
        { name: "flow_access", description: 'Grants "flow" access' },
        { name: "View_All", description: "" }
      ]
    });
  });

  it("uses the format from the config file", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-config-"));
    tempDirectories.push(directory);
    await compareFilesWrite(directory);
    await writeFile(join(directory, "permset-compare.yaml"), "format: json\n");
    const output = vi.fn();

    await compareCommand("user.txt", "mirror.txt", {}, { output, cwd: directory, env: {} });

    expect(JSON.parse(output.mock.calls[0]?.[0] ?? "{}").missing).toHaveLength(2);
  });

  it("prints the completion row when nothing is missing", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-same-"));
    tempDirectories.push(directory);
    await writeFile(join(directory, "user.txt"), "Sales_Admin\nView_All\n");
    await writeFile(join(directory, "mirror.txt"), "View_All\tadd\t1/1/24\nSales_Admin\n");
    const output = vi.fn();

    await compareCommand("user.txt", "mirror.txt", {}, { output, cwd: directory, env: {} });

    const lines = String(output.mock.calls[0]?.[0]).split("\n");
    expect(lines[2]).toBe("No missing permissions.  The user already has all permission sets listed for the mirror user.");
  });

  it("reports nothing missing when a file is compared with itself", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-self-"));
    tempDirectories.push(directory);
    await writeFile(join(directory, "a.txt"), "Sales_Admin\tadd\t1/2/24\nView_All\n");
    const output = vi.fn();

    await compareCommand("a.txt", "a.txt", { format: "json" }, { output, cwd: directory, env: {} });

    expect(JSON.parse(output.mock.calls[0]?.[0] ?? "{}")).toEqual({ missing: [] });
  });

  it("works without a description file", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-nodesc-"));
    tempDirectories.push(directory);
    await writeFile(join(directory, "user.txt"), "");
    await writeFile(join(directory, "mirror.txt"), "Flow_Access\n");
    const output = vi.fn();

    await compareCommand("user.txt", "mirror.txt", { format: "json" }, { output, cwd: directory, env: {} });

    expect(JSON.parse(output.mock.calls[0]?.[0] ?? "{}")).toEqual({
      missing: [{ name: "Flow_Access", description: "" }]
    });
  });

  it("rejects when an input file is missing", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-missing-"));
    tempDirectories.push(directory);
    await writeFile(join(directory, "user.txt"), "Sales_Admin\n");

    await expect(
      compareCommand("user.txt", "mirror.txt", {}, { output: vi.fn(), cwd: directory, env: {} })
    ).rejects.toThrow("Failed to read mirror permissions at");
  });

  it("rejects unknown output formats", async () => {
    const directory = await mkdtemp(join(tmpdir(), "permset-compare-format-"));
    tempDirectories.push(directory);
    await compareFilesWrite(directory);

    await expect(
      compareCommand("user.txt", "mirror.txt", { format: "xml" }, { output: vi.fn(), cwd: directory, env: {} })
    ).rejects.toThrow('Unknown report format "xml"');
  });
});
