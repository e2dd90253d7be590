import { describe, expect, it } from "vitest";
import { ARCHIVE_CODE, START_CODE } from "../src/core/constants.js";
import { compare } from "../src/core/grainorder.js";
import {
  allocateInDirectory,
  allocateNext,
  findExtremal,
} from "../src/core/allocator.js";
import { MemoryFileSystem } from "../src/core/memory-fs.js";
import { AllocationExhaustedError } from "../src/util/errors.js";
import { sampleCodes } from "./helpers.js";

describe("findExtremal", () => {
  it("returns null for an empty set", () => {
    expect(findExtremal([], "smallest")).toBeNull();
    expect(findExtremal(new Set<string>(), "largest")).toBeNull();
  });

  it("finds the smallest and largest codes", () => {
    const used = ["xbdghk", "vzxsnm", "zxvsnl", "xzvbdh"];
    expect(findExtremal(used, "smallest")).toBe("vzxsnm");
    expect(findExtremal(used, "largest")).toBe("zxvsnl");
  });

  it("ignores junk and the archive code", () => {
    expect(findExtremal(["readme", ARCHIVE_CODE, "aaaaaa"], "largest")).toBeNull();
    expect(findExtremal([ARCHIVE_CODE, "xbdghk"], "largest")).toBe("xbdghk");
  });
});

describe("allocateNext", () => {
  it("hands out the start code when nothing is in use", () => {
    expect(allocateNext([])).toBe(START_CODE);
    expect(allocateNext(["not-a-code", ARCHIVE_CODE])).toBe(START_CODE);
  });

  it("steps one below the newest code", () => {
    expect(allocateNext(["xbdghk", "xbdghl"])).toBe("xbdghj");
    expect(allocateNext(["xbdghk", "xbdghj", "zxvsnl"])).toBe("vzxsnm");
  });

  it("does not depend on input order", () => {
    const used = sampleCodes(50);
    const expected = allocateNext(used);
    expect(allocateNext([...used].reverse())).toBe(expected);
    expect(allocateNext(new Set([...used].sort()))).toBe(expected);
  });

  it("never collides and always lands below the minimum", () => {
    for (let seed = 1; seed <= 40; seed++) {
      const used = sampleCodes(25, seed);
      const next = allocateNext(used);
      const min = findExtremal(used, "smallest");
      expect(used).not.toContain(next);
      expect(min).not.toBeNull();
      if (min !== null) expect(compare(next, min)).toBe(-1);
    }
  });

  it("keeps allocating below codes it minted itself", () => {
    const used = new Set<string>();
    for (let i = 0; i < 100; i++) {
      const next = allocateNext(used);
      expect(used.has(next)).toBe(false);
      used.add(next);
    }
    expect(used.size).toBe(100);
  });

  it("reports exhaustion at the bottom of the space", () => {
    expect(() => allocateNext(["bdghjk", "xbdghj"])).toThrow(AllocationExhaustedError);
  });
});

describe("allocateInDirectory", () => {
  it("allocates against the tagged files in a directory", async () => {
    const fs = new MemoryFileSystem({
      "/notes/xbdghk-12025-10-28--1315-pdt--readme.md": "a",
      "/notes/xbdghl-12025-09-01--0800-pdt--older.md": "b",
      "/notes/todo.txt": "c",
    });
    await expect(allocateInDirectory(fs, "/notes")).resolves.toBe("xbdghj");
  });

  it("starts fresh in a directory with no tagged files", async () => {
    const fs = new MemoryFileSystem({ "/empty/todo.txt": "c" });
    await expect(allocateInDirectory(fs, "/empty")).resolves.toBe(START_CODE);
  });
});
