import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NotFoundError, UsageError } from "@mailstash/shared";
import { memoryContext, putPart, type MemoryContext } from "../testing.js";
import { parseArgs } from "./args.js";
import { USAGE, helpData, runCommand } from "./commands.js";

let ctx: MemoryContext;
let tempDir: string;

beforeEach(async () => {
  ctx = memoryContext();
  await ctx.transport.createFolder("mailstash/docs/old");
  await putPart(ctx, "mailstash/docs", "a.txt", 0, 1, "alpha");
  await putPart(ctx, "mailstash/docs", "half.bin", 0, 2, "h");
  await putPart(ctx, "mailstash/docs/old", "b.txt", 0, 1, "beta");
  tempDir = await mkdtemp(join(tmpdir(), "mailstash-cli-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

const run = (...argv: string[]) => runCommand(ctx, parseArgs(argv));

describe("runCommand", () => {
  it("lists a folder as paths, marking folders and invalid files", async () => {
    expect(await run("ls", "docs")).toEqual(["docs/a.txt", "docs/half.bin [invalid]", "docs/old/"]);
  });

  it("lists recursively relative to --folder", async () => {
    expect(await run("list", "-r", "--folder", "docs")).toEqual([
      "docs/a.txt",
      "docs/half.bin [invalid]",
      "docs/old/",
      "docs/old/b.txt",
    ]);
  });

  it("returns full entries with --long", async () => {
    const entries = await run("list", "docs/old", "-l");
    expect(entries).toEqual([
      {
        kind: "file",
        folderPath: ["docs", "old"],
        name: "b.txt",
        totalParts: 1,
        partsPresent: 1,
        size: 4,
        valid: true,
        lastModified: expect.any(String),
      },
    ]);
  });

  it("uploads into --folder and downloads back", async () => {
    const local = join(tempDir, "new.txt");
    await writeFile(local, "fresh");

    expect(await run("upload", local, "-f", "docs/new")).toEqual({
      folders: ["docs/new"],
      files: [{ path: "docs/new/new.txt", size: 5, totalParts: 1, sentParts: 1 }],
    });

    const target = join(tempDir, "copy.txt");
    expect(await run("download", "docs/new/new.txt", target)).toEqual({ path: target, size: 5 });
    expect(await readFile(target, "utf-8")).toBe("fresh");
  });

  it("refuses to upload over an existing name with --reject-existing", async () => {
    const local = join(tempDir, "a.txt");
    await writeFile(local, "again");
    await expect(run("u", local, "--folder", "docs", "--reject-existing")).rejects.toThrow(
      'A file named "a.txt" already exists in "mailstash/docs"'
    );
  });

  it("removes a file relative to --folder", async () => {
    expect(await run("rm", "a.txt", "--folder", "docs")).toEqual({ path: "docs/a.txt", deleted: 1 });
    await expect(run("rm", "a.txt", "--folder", "docs")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists every folder", async () => {
    expect(await run("lsf")).toEqual(["docs", "docs/old"]);
  });

  it("complains about missing arguments and unknown commands", async () => {
    await expect(run("download", "docs/a.txt")).rejects.toThrow(
      "download needs <local>. Run: mailstash help"
    );
    await expect(run("frobnicate")).rejects.toBeInstanceOf(UsageError);
  });
});

describe("helpData", () => {
  it("returns a copy of the usage lines", () => {
    const { commands } = helpData();
    expect(commands).toEqual(USAGE);
    expect(commands).not.toBe(USAGE);
    expect(commands[0].startsWith("list, ls [remote-folder]")).toBe(true);
  });
});
