import { CODE_SPACE_SIZE } from "../src/core/constants.js";
import { unrank } from "../src/core/grainorder.js";

/** Deterministic spread of codes across the space (MINSTD generator). */
export function sampleCodes(count: number, seed = 20261019): string[] {
  const codes: string[] = [];
  let x = seed;
  for (let i = 0; i < count; i++) {
    x = (x * 48271) % 2147483647;
    codes.push(unrank(x % CODE_SPACE_SIZE));
  }
  return codes;
}

export function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}
