import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { atomicWriteFile } from "./atomic-write.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "mailstash-test-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("atomicWriteFile", () => {
  it("writes content to file", async () => {
    const filePath = join(tempDir, "test.txt");
    await atomicWriteFile(filePath, "hello world");
    const content = await readFile(filePath, "utf-8");
    expect(content).toBe("hello world");
  });

  it("creates parent directories", async () => {
    const filePath = join(tempDir, "a", "b", "test.txt");
    await atomicWriteFile(filePath, "nested");
    const content = await readFile(filePath, "utf-8");
    expect(content).toBe("nested");
  });

  it("overwrites existing file", async () => {
    const filePath = join(tempDir, "test.txt");
    await atomicWriteFile(filePath, "first");
    await atomicWriteFile(filePath, "second");
    const content = await readFile(filePath, "utf-8");
    expect(content).toBe("second");
  });

  it("writes binary data unchanged", async () => {
    const filePath = join(tempDir, "blob.bin");
    const data = Buffer.from([0, 255, 10, 13, 128]);
    await atomicWriteFile(filePath, data);
    expect((await readFile(filePath)).equals(data)).toBe(true);
  });

  it("leaves no temp file behind", async () => {
    await atomicWriteFile(join(tempDir, "a.txt"), "x");
    expect(await readdir(tempDir)).toEqual(["a.txt"]);
  });

  it("cleans up the temp file when the rename fails", async () => {
    const target = join(tempDir, "occupied");
    await mkdir(join(target, "child"), { recursive: true });
    await expect(atomicWriteFile(target, "x")).rejects.toThrow();
    expect(await readdir(tempDir)).toEqual(["occupied"]);
  });
});
