import { describe, it, expect } from "vitest";
import {
  partSubject,
  parsePartSubject,
  encodePartMetadata,
  decodePartMetadata,
} from "./part-subject.js";
import { InvalidSegmentError, MalformedPartError } from "../errors.js";

describe("partSubject", () => {
  it("renders the index 1-based with the total", () => {
    expect(partSubject({ name: "report.pdf", index: 1, totalParts: 3 })).toBe(
      "report.pdf.part2of3"
    );
  });

  it("percent-encodes %, / and control characters", () => {
    expect(partSubject({ name: "50%/off\n.txt", index: 0, totalParts: 1 })).toBe(
      "50%25%2Foff%0A.txt.part1of1"
    );
  });

  it("percent-encodes = and ? so no subject looks like an encoded word", () => {
    expect(partSubject({ name: "=?UTF-8?Q?a?=.txt", index: 0, totalParts: 1 })).toBe(
      "%3D%3FUTF-8%3FQ%3Fa%3F%3D.txt.part1of1"
    );
  });

  it("percent-encodes whitespace at either end of the name only", () => {
    expect(partSubject({ name: " lead  mid.txt ", index: 0, totalParts: 1 })).toBe(
      "%20lead  mid.txt%20.part1of1"
    );
    expect(partSubject({ name: "\u00a0x", index: 0, totalParts: 1 })).toBe("%C2%A0x.part1of1");
  });

  it("leaves other characters alone", () => {
    expect(partSubject({ name: "été 2024 (copy).tar.gz", index: 0, totalParts: 1 })).toBe(
      "été 2024 (copy).tar.gz.part1of1"
    );
  });

  it("rejects an empty name", () => {
    expect(() => partSubject({ name: "", index: 0, totalParts: 1 })).toThrow(
      InvalidSegmentError
    );
  });

  it("rejects out-of-range counters", () => {
    expect(() => partSubject({ name: "a", index: 1, totalParts: 1 })).toThrow(RangeError);
    expect(() => partSubject({ name: "a", index: -1, totalParts: 1 })).toThrow(RangeError);
    expect(() => partSubject({ name: "a", index: 0, totalParts: 0 })).toThrow(RangeError);
  });
});

describe("parsePartSubject", () => {
  it("parses a valid subject", () => {
    expect(parsePartSubject("report.pdf.part2of3")).toEqual({
      name: "report.pdf",
      index: 1,
      totalParts: 3,
    });
  });

  it("matches the marker at the end of the subject", () => {
    expect(parsePartSubject("old.part1of2.part1of1")).toEqual({
      name: "old.part1of2",
      index: 0,
      totalParts: 1,
    });
  });

  it("returns null for foreign subjects", () => {
    expect(parsePartSubject("Welcome to your new mailbox")).toBeNull();
    expect(parsePartSubject("")).toBeNull();
    expect(parsePartSubject(".part1of1")).toBeNull();
    expect(parsePartSubject("a.part0of1")).toBeNull();
    expect(parsePartSubject("a.part01of2")).toBeNull();
    expect(parsePartSubject("a.part3of2")).toBeNull();
    expect(parsePartSubject("a.partXof2")).toBeNull();
    expect(parsePartSubject("100%.part1of1")).toBeNull();
  });

  it("roundtrips names with reserved characters", () => {
    const names = [
      "plain",
      "with.part7of9.inside",
      "a/b/c",
      "%2F literally",
      "tab\there",
      "日本語.txt",
      "x.part",
      " lead.txt",
      "trail.txt  ",
      "=?UTF-8?B?YQ==?=",
      "why?.txt",
    ];
    for (const name of names) {
      const meta = { name, index: 4, totalParts: 12 };
      expect(parsePartSubject(partSubject(meta))).toEqual(meta);
    }
  });
});

describe("encodePartMetadata / decodePartMetadata", () => {
  it("roundtrips", () => {
    const meta = { name: "video.mkv", index: 2, totalParts: 3 };
    const fields = encodePartMetadata(meta);
    expect(fields).toEqual({ subject: "video.mkv.part3of3" });
    expect(decodePartMetadata(fields)).toEqual(meta);
  });

  it("is deterministic", () => {
    const meta = { name: "a b", index: 0, totalParts: 2 };
    expect(encodePartMetadata(meta)).toEqual(encodePartMetadata({ ...meta }));
  });

  it("throws MalformedPartError with a reason", () => {
    expect(() => decodePartMetadata({})).toThrow("missing subject");
    expect(() => decodePartMetadata({ subject: "hello" })).toThrow("no .part<N>of<TOTAL> marker");
    expect(() => decodePartMetadata({ subject: "a.part5of4" })).toThrow(
      "part 5 is beyond the declared total of 4"
    );
    expect(() => decodePartMetadata({ subject: "bad%ZZ.part1of1" })).toThrow(
      MalformedPartError
    );
  });
});
