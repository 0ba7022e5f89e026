import { mkdir, mkdtemp, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { executePlan } from "../executor.js";
import { createNodeHost } from "../host.js";
import { compilePattern } from "../pattern.js";
import { planRenames } from "../planner.js";

async function makeDir(files: string[], dirs: string[] = []): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "ren-host-"));
  for (const name of files) await writeFile(path.join(dir, name), name);
  for (const name of dirs) await mkdir(path.join(dir, name));
  return dir;
}

describe("createNodeHost", () => {
  it("lists regular files sorted and every entry separately", async () => {
    const dir = await makeDir(["b.txt", "a.txt"], ["sub"]);
    const host = createNodeHost(dir);
    expect(host.listFiles()).toEqual(["a.txt", "b.txt"]);
    expect(host.listEntries().sort()).toEqual(["a.txt", "b.txt", "sub"]);
    expect(host.exists("sub")).toBe(true);
    expect(host.exists("missing")).toBe(false);
  });

  it("applies a plan to a real directory", async () => {
    const dir = await makeDir(["img_001.jpg", "img_999.jpg", "notes.txt"]);
    const host = createNodeHost(dir);
    const plan = planRenames(
      host.listFiles(),
      compilePattern(String.raw`^img_([0-9]+)\.jpg$`, "regex"),
      "image-#1.jpg",
      { existingNames: host.listEntries() },
    );
    const result = executePlan(host, plan, { dryRun: false });
    expect(result.failed).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual(["image-001.jpg", "image-999.jpg", "notes.txt"]);
  });

  it("throws when the source is gone", async () => {
    const dir = await makeDir([]);
    expect(() => createNodeHost(dir).rename("nope", "other")).toThrow(/ENOENT/);
  });
});
