import { describe, it, expect, beforeEach } from "vitest";
import { FolderNotFoundError, InvalidSegmentError, type ListingEntry } from "@mailstash/shared";
import { Logger } from "../logger.js";
import { collect, memoryContext, putPart, type MemoryContext } from "../testing.js";
import { listAllFolders, listFolder } from "./list.js";

let ctx: MemoryContext;

// mailstash/a/b: x, y      mailstash/a/b/c: z      mailstash/a/b/c/d: w
beforeEach(async () => {
  ctx = memoryContext();
  await ctx.transport.createFolder("mailstash/a/b/c/d");
  await putPart(ctx, "mailstash/a/b", "y", 0, 1, "yyy");
  await putPart(ctx, "mailstash/a/b", "x", 0, 1, "xx");
  await putPart(ctx, "mailstash/a/b/c", "z", 0, 1, "z");
  await putPart(ctx, "mailstash/a/b/c/d", "w", 0, 1, "w");
});

const shape = (entries: ListingEntry[]) =>
  entries.map((e) => [e.kind, e.folderPath.join("/"), e.name]);

describe("listFolder", () => {
  it("lists direct files and subfolders at maxDepth 0, without entering them", async () => {
    const entries = await collect(listFolder(ctx, ["a", "b"], { recurse: true, maxDepth: 0 }));
    expect(shape(entries)).toEqual([
      ["file", "a/b", "x"],
      ["file", "a/b", "y"],
      ["folder", "a/b", "c"],
    ]);
    expect(entries[0]).toEqual({
      kind: "file",
      folderPath: ["a", "b"],
      name: "x",
      totalParts: 1,
      partsPresent: 1,
      size: 2,
      valid: true,
      lastModified: expect.any(String),
    });
  });

  it("lists the same entries without recursion", async () => {
    const entries = await collect(listFolder(ctx, ["a", "b"]));
    expect(shape(entries)).toEqual([
      ["file", "a/b", "x"],
      ["file", "a/b", "y"],
      ["folder", "a/b", "c"],
    ]);
  });

  it("descends up to maxDepth", async () => {
    const entries = await collect(listFolder(ctx, ["a", "b"], { recurse: true, maxDepth: 1 }));
    expect(shape(entries)).toEqual([
      ["file", "a/b", "x"],
      ["file", "a/b", "y"],
      ["folder", "a/b", "c"],
      ["file", "a/b/c", "z"],
      ["folder", "a/b/c", "d"],
    ]);
  });

  it("descends without limit when maxDepth is omitted", async () => {
    const entries = await collect(listFolder(ctx, [], { recurse: true }));
    expect(shape(entries)).toEqual([
      ["folder", "", "a"],
      ["folder", "a", "b"],
      ["file", "a/b", "x"],
      ["file", "a/b", "y"],
      ["folder", "a/b", "c"],
      ["file", "a/b/c", "z"],
      ["folder", "a/b/c", "d"],
      ["file", "a/b/c/d", "w"],
    ]);
  });

  it("queries the transport again on every iteration", async () => {
    const listing = listFolder(ctx, ["a", "b", "c", "d"]);
    expect(shape(await collect(listing))).toEqual([["file", "a/b/c/d", "w"]]);

    await putPart(ctx, "mailstash/a/b/c/d", "v", 0, 1, "v");
    expect(shape(await collect(listing))).toEqual([
      ["file", "a/b/c/d", "v"],
      ["file", "a/b/c/d", "w"],
    ]);
  });

  it("summarizes incomplete, inconsistent and duplicated files", async () => {
    await ctx.transport.createFolder("mailstash/files");
    await putPart(ctx, "mailstash/files", "broken", 0, 3, "aaaa");
    await putPart(ctx, "mailstash/files", "broken", 2, 3, "cc");
    await putPart(ctx, "mailstash/files", "mixed", 0, 2, "a");
    await putPart(ctx, "mailstash/files", "mixed", 1, 3, "b");
    await putPart(ctx, "mailstash/files", "dup", 0, 2, "aaa");
    await putPart(ctx, "mailstash/files", "dup", 0, 2, "aaa");
    await putPart(ctx, "mailstash/files", "dup", 1, 2, "b");

    const entries = await collect(listFolder(ctx, ["files"]));
    expect(
      entries.map((e) =>
        e.kind === "file" ? [e.name, e.totalParts, e.partsPresent, e.size, e.valid] : [e.name]
      )
    ).toEqual([
      ["broken", 3, 2, 6, false],
      ["dup", 2, 2, 4, true],
      ["mixed", 3, 2, 2, false],
    ]);
  });

  it("skips foreign messages and logs them at debug level", async () => {
    const lines: string[] = [];
    ctx.logger = await Logger.create({
      level: "debug",
      sink: {
        write(chunk: string) {
          lines.push(chunk);
        },
      },
    });
    await ctx.transport.createFolder("mailstash/mixed");
    await ctx.transport.sendMessage(
      "mailstash/mixed",
      { subject: "hello" },
      { filename: "hello.txt", content: Buffer.from("hi") }
    );
    await putPart(ctx, "mailstash/mixed", "kept", 0, 1, "k");

    const entries = await collect(listFolder(ctx, ["mixed"]));
    expect(shape(entries)).toEqual([["file", "mixed", "kept"]]);
    expect(lines).toHaveLength(1);
    expect(
      lines[0].endsWith(
        '[DEBUG] Skipping message 1 in "mailstash/mixed": Malformed part "hello": no .part<N>of<TOTAL> marker\n'
      )
    ).toBe(true);
  });

  it("ignores maxDepth without recursion", async () => {
    const entries = await collect(listFolder(ctx, ["a", "b"], { recurse: false, maxDepth: -1 }));
    expect(shape(entries)).toEqual([
      ["file", "a/b", "x"],
      ["file", "a/b", "y"],
      ["folder", "a/b", "c"],
    ]);
  });

  it("gives every entry its own folderPath array", async () => {
    const folder = ["a", "b"];
    const entries = await collect(listFolder(ctx, folder, { recurse: true, maxDepth: 0 }));
    entries[0].folderPath.push("changed");

    expect(entries[1].folderPath).toEqual(["a", "b"]);
    expect(entries[2].folderPath).toEqual(["a", "b"]);
    expect(folder).toEqual(["a", "b"]);
  });

  it("fails with FolderNotFoundError for a missing folder", async () => {
    await expect(collect(listFolder(ctx, ["nope"]))).rejects.toBeInstanceOf(FolderNotFoundError);
  });

  it("validates its arguments before querying", () => {
    expect(() => listFolder(ctx, [".."])).toThrow(InvalidSegmentError);
    expect(() => listFolder(ctx, [], { recurse: true, maxDepth: -1 })).toThrow(RangeError);
  });
});

describe("listAllFolders", () => {
  it("returns every folder under the base folder, parents first", async () => {
    await ctx.transport.createFolder("elsewhere/q");
    expect(await listAllFolders(ctx)).toEqual([
      ["a"],
      ["a", "b"],
      ["a", "b", "c"],
      ["a", "b", "c", "d"],
    ]);
  });

  it("is empty when nothing has been stored yet", async () => {
    expect(await listAllFolders(memoryContext())).toEqual([]);
  });
});
