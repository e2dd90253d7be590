import {
  ALPHABET,
  ARCHIVE_CODE,
  CODE_LENGTH,
  CODE_SPACE_SIZE,
  EXHAUSTED,
  type Exhausted,
} from "./constants.js";
import { InvalidGrainorderError } from "../util/errors.js";

// ─── Symbol table ────────────────────────────────────────────────────

const SYMBOLS: readonly string[] = [...ALPHABET];

const SYMBOL_RANK: ReadonlyMap<string, number> = new Map(
  SYMBOLS.map((s, i) => [s, i]),
);

/**
 * Number of ways to fill the positions after index i.
 * POSITION_WEIGHT[i] = (12 - i)! / (7)!  → 95040, 7920, 720, 72, 8, 1
 */
const POSITION_WEIGHT: readonly number[] = Array.from(
  { length: CODE_LENGTH },
  (_, i) => {
    let w = 1;
    for (let n = SYMBOLS.length - 1 - i; n > SYMBOLS.length - CODE_LENGTH; n--) {
      w *= n;
    }
    return w;
  },
);

// ─── Validation ──────────────────────────────────────────────────────

/** Explain why a string is not a grainorder, or null if it is one. */
export function invalidReason(code: string): string | null {
  if (code.length !== CODE_LENGTH) {
    return `expected ${CODE_LENGTH} characters, got ${code.length}`;
  }
  const seen = new Set<string>();
  for (const ch of code) {
    if (!SYMBOL_RANK.has(ch)) {
      return `'${ch}' is not in the alphabet "${ALPHABET}"`;
    }
    if (seen.has(ch)) {
      return `'${ch}' repeats`;
    }
    seen.add(ch);
  }
  return null;
}

export function isValid(code: string): boolean {
  return invalidReason(code) === null;
}

export function assertValid(code: string): void {
  const reason = invalidReason(code);
  if (reason !== null) {
    throw new InvalidGrainorderError(code, reason);
  }
}

export function isArchive(code: string): boolean {
  return code === ARCHIVE_CODE;
}

// ─── Ordering ────────────────────────────────────────────────────────

function symbolRank(ch: string): number {
  const r = SYMBOL_RANK.get(ch);
  if (r === undefined) {
    throw new InvalidGrainorderError(ch, "not in the alphabet");
  }
  return r;
}

/**
 * Compare two codes by alphabet rank, position by position.
 * Smaller sorts first and, by convention, is newer.
 */
export function compare(a: string, b: string): -1 | 0 | 1 {
  assertValid(a);
  assertValid(b);
  for (let i = 0; i < CODE_LENGTH; i++) {
    const d = symbolRank(a[i]) - symbolRank(b[i]);
    if (d !== 0) return d < 0 ? -1 : 1;
  }
  return 0;
}

/** Zero-based index of a code in the ordered space. */
export function rank(code: string): number {
  assertValid(code);
  const used = new Set<string>();
  let index = 0;
  for (let i = 0; i < CODE_LENGTH; i++) {
    const ch = code[i];
    let smaller = 0;
    for (const s of SYMBOLS) {
      if (s === ch) break;
      if (!used.has(s)) smaller++;
    }
    index += smaller * POSITION_WEIGHT[i];
    used.add(ch);
  }
  return index;
}

/** Inverse of {@link rank}. */
export function unrank(index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= CODE_SPACE_SIZE) {
    throw new InvalidGrainorderError(
      String(index),
      `rank must be an integer in [0, ${CODE_SPACE_SIZE})`,
    );
  }
  const available = [...SYMBOLS];
  let rest = index;
  let code = "";
  for (let i = 0; i < CODE_LENGTH; i++) {
    const q = Math.floor(rest / POSITION_WEIGHT[i]);
    rest %= POSITION_WEIGHT[i];
    code += available[q];
    available.splice(q, 1);
  }
  return code;
}

// ─── Stepping ────────────────────────────────────────────────────────

type Direction = "up" | "down";

/**
 * Move one code up or down with carry.
 *
 * Scanning right to left, the first position that can take a neighbouring
 * symbol (one not already used by the positions to its left) takes it, and
 * everything to its right is refilled with the remaining symbols: smallest
 * first when stepping up, largest first when stepping down. If no position
 * can move, the edge of the space has been reached.
 */
function step(code: string, direction: Direction): string | Exhausted {
  assertValid(code);
  const symbols = [...code];

  for (let i = CODE_LENGTH - 1; i >= 0; i--) {
    const prefix = new Set(symbols.slice(0, i));
    const current = symbolRank(symbols[i]);

    const candidates = SYMBOLS.filter((s, r) =>
      !prefix.has(s) && (direction === "up" ? r > current : r < current),
    );
    if (candidates.length === 0) continue;

    const next =
      direction === "up" ? candidates[0] : candidates[candidates.length - 1];
    prefix.add(next);

    const fill = SYMBOLS.filter((s) => !prefix.has(s));
    if (direction === "down") fill.reverse();

    return [...symbols.slice(0, i), next, ...fill.slice(0, CODE_LENGTH - 1 - i)].join("");
  }

  return EXHAUSTED;
}

/**
 * Next larger code (one step older). Never lands on the archive code:
 * the step that would reach it reports exhaustion instead.
 */
export function successor(code: string): string | Exhausted {
  const next = step(code, "up");
  return next === ARCHIVE_CODE ? EXHAUSTED : next;
}

/** Next smaller code (one step newer). */
export function predecessor(code: string): string | Exhausted {
  return step(code, "down");
}
