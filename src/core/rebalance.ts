import { basename, dirname, join } from "node:path";
import { ARCHIVE_CODE, EXHAUSTED, START_CODE } from "./constants.js";
import {
  assertValid,
  compare,
  isArchive,
  predecessor,
  rank,
  successor,
} from "./grainorder.js";
import type { FileSystem } from "./fs.js";
import { parseTaggedName, renameWithCode, type TaggedFile } from "./tagged-file.js";
import {
  FilesystemError,
  InvalidGrainorderError,
  NotTaggedError,
  PlanExhaustedError,
  RenamePartialFailureError,
  describeError,
  type RenameFailure,
  type RenameRecord,
} from "../util/errors.js";

// ─── Scan ────────────────────────────────────────────────────────────

export interface ScanResult {
  dir: string;
  /** Tagged files with a normal code, sorted by name. */
  files: TaggedFile[];
  /** Tagged files holding the archive code; never re-coded. */
  archived: TaggedFile[];
  /** Entries that are not tagged files. */
  skipped: number;
}

export async function scan(fs: FileSystem, dir: string): Promise<ScanResult> {
  let names: string[];
  try {
    names = await fs.list(dir);
  } catch (err) {
    throw new FilesystemError(`Cannot list directory '${dir}': ${describeError(err)}`);
  }

  const files: TaggedFile[] = [];
  const archived: TaggedFile[] = [];
  let skipped = 0;
  for (const name of [...names].sort()) {
    const file = parseTaggedName(name);
    if (!file) {
      skipped++;
    } else if (isArchive(file.code)) {
      archived.push(file);
    } else {
      files.push(file);
    }
  }
  return { dir, files, archived, skipped };
}

// ─── Plan ────────────────────────────────────────────────────────────

export interface RebalanceStep {
  from: string;
  to: string;
  oldCode: string;
  newCode: string;
  stamp: string;
  unchanged: boolean;
}

export interface RebalancePlan {
  dir: string;
  start: string;
  /** Newest first; newCode ascends step by step. */
  steps: RebalanceStep[];
}

/** Newest first; equal timestamps keep their current code order, then name. */
function byTimestampDesc(a: TaggedFile, b: TaggedFile): number {
  if (a.order !== b.order) return b.order - a.order;
  const c = compare(a.code, b.code);
  if (c !== 0) return c;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Lay the files out densely from `start` upwards: the newest file gets
 * `start`, each older file the successor of the one before.
 */
export function plan(
  dir: string,
  files: readonly TaggedFile[],
  opts: { start?: string } = {},
): RebalancePlan {
  const start = opts.start ?? START_CODE;
  assertValid(start);
  if (isArchive(start)) {
    throw new InvalidGrainorderError(start, "the archive code cannot start a rebalance");
  }

  const available = rank(ARCHIVE_CODE) - rank(start);
  if (files.length > available) {
    throw new PlanExhaustedError(files.length, available);
  }

  const steps: RebalanceStep[] = [];
  let code = start;
  for (const [i, file] of [...files].sort(byTimestampDesc).entries()) {
    if (i > 0) {
      const next = successor(code);
      if (next === EXHAUSTED) {
        throw new PlanExhaustedError(files.length, i);
      }
      code = next;
    }
    const to = renameWithCode(file, code);
    steps.push({
      from: file.name,
      to,
      oldCode: file.code,
      newCode: code,
      stamp: file.stamp,
      unchanged: to === file.name,
    });
  }

  return { dir, start, steps };
}

// ─── Apply ───────────────────────────────────────────────────────────

export interface ApplyResult {
  renamed: RenameRecord[];
  unchanged: number;
}

interface Move {
  step: RebalanceStep;
  /** Where the file is right now (its original name, or a parking name). */
  name: string;
  code: string;
  failed: boolean;
}

/**
 * Carry out a plan.
 *
 * At no point do two files in the directory hold the same grainorder: a
 * file only moves onto a code once no other file holds it. When every
 * remaining move waits on another (a cycle), one file is first parked on
 * a code nobody holds or wants. A rename that fails leaves that file, and
 * anything waiting on it, where it is; the remaining moves still run and
 * the outcome is reported as RenamePartialFailureError.
 */
export async function apply(fs: FileSystem, p: RebalancePlan): Promise<ApplyResult> {
  const holders = new Map<string, number>();
  const hold = (code: string, delta: number) =>
    holders.set(code, (holders.get(code) ?? 0) + delta);
  for (const step of p.steps) hold(step.oldCode, 1);

  const targets = new Set(p.steps.map((s) => s.newCode));
  const moves: Move[] = p.steps
    .filter((s) => !s.unchanged)
    .map((step) => ({ step, name: step.from, code: step.oldCode, failed: false }));

  const renamed: RenameRecord[] = [];
  const failures: RenameFailure[] = [];

  const move = async (m: Move, code: string, name: string): Promise<boolean> => {
    try {
      await fs.rename(join(p.dir, m.name), join(p.dir, name));
    } catch (err) {
      failures.push({ from: m.name, to: name, error: describeError(err) });
      m.failed = true;
      return false;
    }
    renamed.push({ from: m.name, to: name });
    hold(m.code, -1);
    hold(code, 1);
    m.name = name;
    m.code = code;
    return true;
  };

  let open = moves;
  while (open.length > 0) {
    let progressed = false;
    for (const m of open) {
      if ((holders.get(m.step.newCode) ?? 0) === 0) {
        if (await move(m, m.step.newCode, m.step.to)) progressed = true;
      }
    }
    open = moves.filter((m) => !m.failed && m.name !== m.step.to);
    if (open.length === 0 || progressed) continue;

    // Everything left waits on something. Park a file whose code another
    // open move is waiting for; if there is none, the rest is stuck behind
    // a failed rename.
    const wanted = new Set(open.map((m) => m.step.newCode));
    const blocker = open.find((m) => wanted.has(m.code));
    if (!blocker) break;

    const parking = findParkingCode(holders, targets);
    if (parking === null) break;
    await move(blocker, parking, renameWithCode(toTagged(blocker), parking));
    open = moves.filter((m) => !m.failed && m.name !== m.step.to);
  }

  const pending = moves
    .filter((m) => m.name !== m.step.to)
    .map((m) => ({ from: m.name, to: m.step.to }));

  if (failures.length > 0 || pending.length > 0) {
    throw new RenamePartialFailureError(renamed, pending, failures);
  }
  return { renamed, unchanged: p.steps.length - moves.length };
}

function toTagged(m: Move): TaggedFile {
  const file = parseTaggedName(m.name);
  if (!file) {
    throw new NotTaggedError(m.name);
  }
  return file;
}

/** Largest normal code that nobody holds and no step targets. */
function findParkingCode(
  holders: ReadonlyMap<string, number>,
  targets: ReadonlySet<string>,
): string | null {
  let code = predecessor(ARCHIVE_CODE);
  while (code !== EXHAUSTED) {
    if ((holders.get(code) ?? 0) === 0 && !targets.has(code)) return code;
    code = predecessor(code);
  }
  return null;
}

// ─── Archive ─────────────────────────────────────────────────────────

export interface ArchiveResult {
  from: string;
  to: string;
  unchanged: boolean;
}

/** Move one tagged file onto the archive code, keeping stamp and remainder. */
export async function archive(fs: FileSystem, path: string): Promise<ArchiveResult> {
  const dir = dirname(path);
  const name = basename(path);
  const file = parseTaggedName(name);
  if (!file) {
    throw new NotTaggedError(name);
  }

  const to = join(dir, renameWithCode(file, ARCHIVE_CODE));
  if (isArchive(file.code)) {
    return { from: path, to, unchanged: true };
  }

  try {
    await fs.rename(path, to);
  } catch (err) {
    throw new FilesystemError(`Cannot archive '${path}': ${describeError(err)}`);
  }
  return { from: path, to, unchanged: false };
}
