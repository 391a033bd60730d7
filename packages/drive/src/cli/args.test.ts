import { describe, it, expect } from "vitest";
import { UsageError } from "@mailstash/shared";
import { integerFlag, isCommand, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("defaults to help", () => {
    expect(parseArgs([])).toEqual({ command: "help", args: [], flags: {} });
  });

  it("resolves command aliases", () => {
    expect(parseArgs(["ls"]).command).toBe("list");
    expect(parseArgs(["d", "a", "b"]).command).toBe("download");
    expect(parseArgs(["u", "x"]).command).toBe("upload");
    expect(parseArgs(["rm", "x"]).command).toBe("remove");
    expect(parseArgs(["lsf"]).command).toBe("list-folders");
  });

  it("does not let boolean flags swallow the next argument", () => {
    expect(parseArgs(["list", "--recurse", "photos", "-l"])).toEqual({
      command: "list",
      args: ["photos"],
      flags: { recurse: "true", long: "true" },
    });
  });

  it("reads value flags in both forms, before or after the command", () => {
    expect(parseArgs(["-c", "creds.json", "upload", "file.bin", "--folder=docs/2024", "--start-part", "3"])).toEqual({
      command: "upload",
      args: ["file.bin"],
      flags: { credentials: "creds.json", folder: "docs/2024", "start-part": "3" },
    });
  });

  it("treats everything after -- as positional", () => {
    expect(parseArgs(["remove", "--", "--weird-name"]).args).toEqual(["--weird-name"]);
  });

  it("turns --help into the help command", () => {
    expect(parseArgs(["upload", "--help"]).command).toBe("help");
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["list", "--colour"])).toThrow(UsageError);
    expect(() => parseArgs(["list", "-x"])).toThrow("Unknown flag -x");
    expect(() => parseArgs(["list", "--max-depth"])).toThrow("--max-depth needs a value");
    expect(() => parseArgs(["list", "--recurse=yes"])).toThrow("--recurse takes no value");
  });
});

describe("integerFlag", () => {
  it("parses non-negative integers", () => {
    expect(integerFlag({ "max-depth": "0" }, "max-depth")).toBe(0);
    expect(integerFlag({ "max-depth": "12" }, "max-depth")).toBe(12);
    expect(integerFlag({}, "max-depth")).toBeUndefined();
  });

  it("rejects anything else", () => {
    expect(() => integerFlag({ "max-depth": "-1" }, "max-depth")).toThrow(UsageError);
    expect(() => integerFlag({ "start-part": "two" }, "start-part")).toThrow(
      '--start-part must be a non-negative integer, got "two"'
    );
  });
});

describe("isCommand", () => {
  it("knows the commands", () => {
    expect(isCommand("list-folders")).toBe(true);
    expect(isCommand("ls")).toBe(false);
  });
});
