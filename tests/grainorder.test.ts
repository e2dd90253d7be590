import { describe, expect, it } from "vitest";
import {
  ALPHABET,
  ARCHIVE_CODE,
  CODE_SPACE_SIZE,
  EXHAUSTED,
  START_CODE,
} from "../src/core/constants.js";
import {
  compare,
  invalidReason,
  isArchive,
  isValid,
  predecessor,
  rank,
  successor,
  unrank,
} from "../src/core/grainorder.js";
import { InvalidGrainorderError } from "../src/util/errors.js";
import { sampleCodes, sign } from "./helpers.js";

describe("isValid", () => {
  it("accepts six distinct alphabet symbols", () => {
    expect(isValid("xbdghj")).toBe(true);
    expect(isValid("xzvbdh")).toBe(true);
    expect(isValid(ARCHIVE_CODE)).toBe(true);
  });

  it("rejects wrong length, foreign symbols and repeats", () => {
    expect(isValid("xbdgh")).toBe(false);
    expect(isValid("xbdghjk")).toBe(false);
    expect(isValid("")).toBe(false);
    expect(isValid("abdghj")).toBe(false);
    expect(isValid("XBDGHJ")).toBe(false);
    expect(isValid("xbdghx")).toBe(false);
  });

  it("explains the first problem it finds", () => {
    expect(invalidReason("xbdgh")).toBe("expected 6 characters, got 5");
    expect(invalidReason("xbdgha")).toBe(`'a' is not in the alphabet "${ALPHABET}"`);
    expect(invalidReason("xbdghx")).toBe("'x' repeats");
    expect(invalidReason("xbdghj")).toBeNull();
  });

  it(
    "holds for exactly 1,235,520 six-letter strings over the alphabet",
    () => {
      const symbols = [...ALPHABET];
      let count = 0;
      for (const a of symbols)
        for (const b of symbols)
          for (const c of symbols)
            for (const d of symbols)
              for (const e of symbols)
                for (const f of symbols) {
                  if (isValid(a + b + c + d + e + f)) count++;
                }
      expect(count).toBe(CODE_SPACE_SIZE);
    },
    120_000,
  );
});

describe("rank / unrank", () => {
  it("pins the ends of the space and the start code", () => {
    expect(unrank(0)).toBe("bdghjk");
    expect(unrank(CODE_SPACE_SIZE - 1)).toBe(ARCHIVE_CODE);
    expect(rank(ARCHIVE_CODE)).toBe(1_235_519);
    expect(rank(START_CODE)).toBe(1_045_440);
    expect(START_CODE).toBe("xbdghj");
  });

  it("are inverses on a sample", () => {
    for (const code of sampleCodes(500)) {
      expect(unrank(rank(code))).toBe(code);
    }
  });

  it("rejects ranks outside the space", () => {
    expect(() => unrank(-1)).toThrow(InvalidGrainorderError);
    expect(() => unrank(CODE_SPACE_SIZE)).toThrow(InvalidGrainorderError);
    expect(() => unrank(1.5)).toThrow(InvalidGrainorderError);
  });
});

describe("compare", () => {
  it("orders by symbol", () => {
    expect(compare("bdghjk", "xbdghj")).toBe(-1);
    expect(compare("xbdghk", "xbdghj")).toBe(1);
    expect(compare("xzvbdh", "xzvbdh")).toBe(0);
  });

  it("agrees with rank and with plain string order", () => {
    const codes = sampleCodes(200);
    for (let i = 1; i < codes.length; i++) {
      const [a, b] = [codes[i - 1], codes[i]];
      expect(compare(a, b)).toBe(sign(rank(a) - rank(b)));
      expect(compare(a, b)).toBe(a < b ? -1 : a > b ? 1 : 0);
    }
  });

  it("is antisymmetric and transitive on a sample", () => {
    const codes = sampleCodes(60, 7);
    for (const a of codes) {
      for (const b of codes) {
        expect(compare(a, b)).toBe(-compare(b, a) || 0);
      }
    }
    const sorted = [...codes].sort(compare);
    for (let i = 2; i < sorted.length; i++) {
      expect(compare(sorted[i - 2], sorted[i])).toBeLessThanOrEqual(0);
    }
  });

  it("throws on invalid input", () => {
    expect(() => compare("xbdghj", "nope")).toThrow(InvalidGrainorderError);
  });
});

describe("successor / predecessor", () => {
  it("steps the last position when it can", () => {
    expect(successor("xbdghj")).toBe("xbdghk");
    expect(predecessor("xbdghk")).toBe("xbdghj");
  });

  it("carries into the position on the left", () => {
    // z has no larger symbol: bump j to k, refill with the smallest unused
    expect(successor("bdghjz")).toBe("bdghkj");
    expect(predecessor("bdghkj")).toBe("bdghjz");
    // every position right of x is already at its smallest free symbol
    expect(predecessor("xbdghj")).toBe("vzxsnm");
    expect(successor("vzxsnm")).toBe("xbdghj");
  });

  it("reports exhaustion at the edges", () => {
    expect(predecessor("bdghjk")).toBe(EXHAUSTED);
    expect(successor(ARCHIVE_CODE)).toBe(EXHAUSTED);
  });

  it("never steps onto the archive code", () => {
    expect(successor("zxvsnl")).toBe(EXHAUSTED);
    expect(predecessor(ARCHIVE_CODE)).toBe("zxvsnl");
    expect(isArchive("zxvsnl")).toBe(false);
  });

  it("are inverses wherever neither is exhausted", () => {
    for (const code of sampleCodes(500, 3)) {
      const before = predecessor(code);
      if (before !== EXHAUSTED) expect(successor(before)).toBe(code);
      const after = successor(code);
      if (after !== EXHAUSTED) expect(predecessor(after)).toBe(code);
    }
  });

  it("move exactly one rank", () => {
    for (const code of sampleCodes(300, 11)) {
      const after = successor(code);
      if (after !== EXHAUSTED) expect(rank(after)).toBe(rank(code) + 1);
    }
  });

  it(
    "walk every normal code from the minimum without gaps",
    () => {
      let code = unrank(0);
      let steps = 0;
      let gaps = 0;
      for (;;) {
        const next = successor(code);
        if (next === EXHAUSTED) break;
        steps++;
        if (!isValid(next) || rank(next) !== steps) gaps++;
        code = next;
      }
      expect(gaps).toBe(0);
      expect(code).toBe("zxvsnl");
      // every code except the archive one
      expect(steps + 1).toBe(CODE_SPACE_SIZE - 1);
    },
    120_000,
  );

  it("fail explicitly on invalid input", () => {
    expect(() => successor("aaaaaa")).toThrow(InvalidGrainorderError);
    expect(() => predecessor("xbdghx")).toThrow(InvalidGrainorderError);
  });
});
