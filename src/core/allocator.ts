import { EXHAUSTED, START_CODE } from "./constants.js";
import { compare, isArchive, isValid, predecessor } from "./grainorder.js";
import { AllocationExhaustedError } from "../util/errors.js";
import type { FileSystem } from "./fs.js";
import { scan } from "./rebalance.js";

export type Extremal = "smallest" | "largest";

/**
 * Smallest (newest) or largest (oldest) code in `used`.
 * Strings that are not grainorders and the archive code are ignored, so
 * the result depends only on which valid codes are present.
 */
export function findExtremal(
  used: Iterable<string>,
  direction: Extremal,
): string | null {
  let best: string | null = null;
  for (const code of used) {
    if (!isValid(code) || isArchive(code)) continue;
    if (best === null) {
      best = code;
      continue;
    }
    const c = compare(code, best);
    if ((direction === "smallest" && c < 0) || (direction === "largest" && c > 0)) {
      best = code;
    }
  }
  return best;
}

/**
 * The next free code: one step below the newest code in use, or the start
 * code when nothing is in use yet.
 *
 * The result is strictly smaller than every used code, so it can never
 * collide with one, including codes minted by another process that
 * allocates the same way.
 */
export function allocateNext(used: Iterable<string>): string {
  const smallest = findExtremal(used, "smallest");
  if (smallest === null) return START_CODE;

  const next = predecessor(smallest);
  if (next === EXHAUSTED) {
    throw new AllocationExhaustedError(smallest);
  }
  return next;
}

/** Allocate against the tagged files currently in `dir`. */
export async function allocateInDirectory(
  fs: FileSystem,
  dir: string,
): Promise<string> {
  const { files } = await scan(fs, dir);
  return allocateNext(files.map((f) => f.code));
}
