import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildProgram } from "../src/program.js";
import { exitUnless, handleError } from "../src/util/cli-helpers.js";
import {
  AllocationExhaustedError,
  DigestLengthError,
  GrainkeepError,
  HomeNotInitializedError,
  InvalidGrainorderError,
  RegistryLockedError,
  RenamePartialFailureError,
  SourceNotFoundError,
  SourceNotRegisteredError,
} from "../src/util/errors.js";

/** Thrown by the stubbed process.exit so the caller can see the code. */
class ExitCalled extends Error {
  constructor(readonly code: unknown) {
    super(`process.exit(${String(code)})`);
  }
}

let stderr: string[];

beforeEach(() => {
  stderr = [];
  vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new ExitCalled(code);
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
    stderr.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function exitCodeOf(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExitCalled) return err.code;
    throw err;
  }
  return undefined;
}

describe("handleError", () => {
  it.each([
    [new AllocationExhaustedError("bdghjk"), 1],
    [new DigestLengthError("/a/readme.md", "abc", 64), 1],
    [new RenamePartialFailureError([], [], []), 1],
    [new SourceNotFoundError("/a/readme.md"), 2],
    [new RegistryLockedError("/home/registry.lock", 5000), 2],
    [new HomeNotInitializedError("/home"), 2],
    [new InvalidGrainorderError("aaaaaa", "bad symbol"), 3],
    [new SourceNotRegisteredError("/a/readme.md"), 3],
  ])("exits with the code carried by %s", (err: GrainkeepError, code: number) => {
    expect(exitCodeOf(() => handleError(err))).toBe(code);
    expect(stderr).toEqual([`Error: ${err.message}\n`]);
  });

  it("rethrows errors it does not know", () => {
    const boom = new Error("boom");
    expect(() => handleError(boom)).toThrow(boom);
    expect(process.exit).not.toHaveBeenCalled();
  });
});

describe("exitUnless", () => {
  it("exits 1 on failure and stays quiet on success", () => {
    expect(exitCodeOf(() => exitUnless(false))).toBe(1);
    expect(exitCodeOf(() => exitUnless(true))).toBeUndefined();
  });
});

describe("command exit status", () => {
  let root: string;
  let home: string;

  /** Run the CLI and return the exit status it would end with. */
  async function run(...args: string[]): Promise<unknown> {
    try {
      await buildProgram().parseAsync(["--home", home, ...args], { from: "user" });
    } catch (err) {
      if (err instanceof ExitCalled) return err.code;
      throw err;
    }
    return 0;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "grainkeep-cli-"));
    home = join(root, "home");
    await mkdir(join(root, "a"));
    await writeFile(join(root, "a", "readme.md"), "hello");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("fails registry commands before init", async () => {
    expect(await run("list")).toBe(2);
  });

  it("exits 1 when verify finds drift and 0 when it does not", async () => {
    const source = join(root, "a", "readme.md");
    const mirror = join(root, "b", "readme.md");
    expect(await run("init")).toBe(0);
    expect(await run("register", source, mirror)).toBe(0);
    expect(await run("sync")).toBe(0);
    expect(await run("verify")).toBe(0);

    await writeFile(mirror, "tampered");

    expect(await run("verify")).toBe(1);
    expect(await run("verify", "--quiet")).toBe(1);
    expect(await run("verify", source)).toBe(1);
  });

  it("exits 1 when a mirror cannot be written", async () => {
    const source = join(root, "a", "readme.md");
    const blocked = join(root, "c", "readme.md");
    await mkdir(blocked, { recursive: true });
    await run("init");
    await run("register", source, join(root, "b", "readme.md"), blocked);

    expect(await run("sync")).toBe(1);
    expect(await run("sync", source)).toBe(1);
    expect(await readdir(join(root, "c"))).toEqual(["readme.md"]);
  });

  it("exits 2 when a single source cannot be read", async () => {
    const source = join(root, "a", "readme.md");
    await run("init");
    await run("register", source, join(root, "b", "readme.md"));
    await rm(source);

    expect(await run("sync", source)).toBe(2);
  });

  it("exits 3 on a malformed grainorder", async () => {
    expect(await run("code", "aaaaaa")).toBe(3);
    expect(await run("code", "xbdghj")).toBe(0);
  });

  describe("rebalance", () => {
    let dir: string;

    beforeEach(async () => {
      dir = join(root, "notes");
      await mkdir(dir);
      await writeFile(join(dir, "bdghjk-12026-01-05--0900-utc--plan.md"), "plan");
      await writeFile(join(dir, "bdghjl-12025-10-28--1315-pdt--readme.md"), "readme");
    });

    it("exits 0 after applying", async () => {
      expect(await run("rebalance", dir, "--yes")).toBe(0);
      expect(await readdir(dir)).toEqual([
        "xbdghj-12026-01-05--0900-utc--plan.md",
        "xbdghk-12025-10-28--1315-pdt--readme.md",
      ]);
    });

    it("exits 1 when the codes above the start run out", async () => {
      expect(await run("rebalance", dir, "--yes", "--start", "zxvsnl")).toBe(1);
    });

    it("exits 3 when asked to start on the archive code", async () => {
      expect(await run("rebalance", dir, "--yes", "--start", "zxvsnm")).toBe(3);
    });
  });
});
