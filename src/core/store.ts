import { randomUUID } from "node:crypto";
import { readFile, stat, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import YAML from "yaml";
import {
  DEFAULT_LOCK_TIMEOUT_MS,
  DIGEST_LENGTH,
  LOCK_FILE,
  LOCK_RETRY_MS,
  NEVER_SYNCED,
  REGISTRY_FILE,
  REGISTRY_VERSION,
  STALE_LOCK_MS,
} from "./constants.js";
import { writeFileAtomic } from "./fs.js";
import { isRecordedHash } from "./hash.js";
import {
  FilesystemError,
  RegistryCorruptError,
  RegistryLockedError,
  describeError,
} from "../util/errors.js";

// ─── Types ───────────────────────────────────────────────────────────

/** One source's mirror set and sync state. */
export interface MirrorEntry {
  /** Canonical mirror paths, unique and sorted. */
  mirrors: string[];
  /** ISO-8601 time of the last sync, or "never". */
  lastSync: string;
  /** Content digest recorded at the last sync; "" when never synced. */
  hash: string;
}

/** Whole registry, keyed by canonical source path. */
export type RegistryState = Map<string, MirrorEntry>;

/**
 * Persistence for the registry. `transaction` is the only way to write:
 * it runs `fn` against a fresh copy of the state inside the store's
 * exclusive section and persists the result before resolving.
 */
export interface RegistryStore {
  /** Hex length of the content digests this store accepts. */
  readonly digestLength: number;
  read(): Promise<RegistryState>;
  transaction<T>(fn: (state: RegistryState) => T | Promise<T>): Promise<T>;
}

export function newEntry(): MirrorEntry {
  return { mirrors: [], lastSync: NEVER_SYNCED, hash: "" };
}

// ─── Serialization ───────────────────────────────────────────────────

interface RegistryDocument {
  version: number;
  sources: Record<string, MirrorEntry>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Parse registry.yaml text. An empty file is an empty registry; anything
 * that does not have the expected shape is rejected, never repaired.
 */
export function parseRegistry(
  raw: string,
  origin: string,
  digestLength = DIGEST_LENGTH,
): RegistryState {
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new RegistryCorruptError(origin, describeError(err));
  }

  const state: RegistryState = new Map();
  if (doc === null || doc === undefined) return state;

  if (!isRecord(doc)) {
    throw new RegistryCorruptError(origin, "top level is not a mapping");
  }
  if (doc.version !== REGISTRY_VERSION) {
    throw new RegistryCorruptError(
      origin,
      `unsupported version '${String(doc.version)}' (expected ${REGISTRY_VERSION})`,
    );
  }

  const sources = doc.sources ?? {};
  if (!isRecord(sources)) {
    throw new RegistryCorruptError(origin, "'sources' is not a mapping");
  }

  for (const [source, value] of Object.entries(sources)) {
    if (!isRecord(value)) {
      throw new RegistryCorruptError(origin, `entry '${source}' is not a mapping`);
    }
    const { mirrors, lastSync, hash } = value;

    if (!Array.isArray(mirrors) || !mirrors.every((m): m is string => typeof m === "string")) {
      throw new RegistryCorruptError(origin, `entry '${source}': mirrors must be a list of paths`);
    }
    if (new Set(mirrors).size !== mirrors.length) {
      throw new RegistryCorruptError(origin, `entry '${source}': duplicate mirror paths`);
    }
    if (typeof lastSync !== "string") {
      throw new RegistryCorruptError(origin, `entry '${source}': lastSync must be a string`);
    }
    if (typeof hash !== "string" || !isRecordedHash(hash, digestLength)) {
      throw new RegistryCorruptError(
        origin,
        `entry '${source}': hash must be empty or ${digestLength} hex characters`,
      );
    }

    state.set(source, { mirrors: [...mirrors].sort(), lastSync, hash });
  }

  return state;
}

/** Serialize with sources and mirrors sorted so the file diffs cleanly. */
export function serializeRegistry(state: RegistryState): string {
  const doc: RegistryDocument = { version: REGISTRY_VERSION, sources: {} };
  for (const source of [...state.keys()].sort()) {
    const entry = state.get(source);
    if (!entry) continue;
    doc.sources[source] = {
      mirrors: [...entry.mirrors].sort(),
      lastSync: entry.lastSync,
      hash: entry.hash,
    };
  }
  return YAML.stringify(doc, { lineWidth: 0 });
}

function cloneState(state: RegistryState): RegistryState {
  return new Map(
    [...state].map(([k, v]) => [k, { ...v, mirrors: [...v.mirrors] }]),
  );
}

// ─── File store ──────────────────────────────────────────────────────

export interface FileRegistryStoreOptions {
  lockTimeoutMs?: number;
  digestLength?: number;
  onWarning?: (message: string) => void;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * registry.yaml in the home directory, guarded by registry.lock.
 *
 * The lock is a file created with the exclusive 'wx' flag, so only one
 * process can hold it. Contenders poll until the timeout; a lock older
 * than STALE_LOCK_MS is assumed abandoned and removed.
 */
export class FileRegistryStore implements RegistryStore {
  readonly registryPath: string;
  readonly lockPath: string;
  readonly digestLength: number;
  private readonly lockTimeoutMs: number;
  private readonly onWarning: (message: string) => void;
  /** Contents of the lock file while this instance holds it. */
  private lockToken: string | null = null;

  constructor(homePath: string, opts: FileRegistryStoreOptions = {}) {
    this.registryPath = join(homePath, REGISTRY_FILE);
    this.lockPath = join(homePath, LOCK_FILE);
    this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.digestLength = opts.digestLength ?? DIGEST_LENGTH;
    this.onWarning = opts.onWarning ?? (() => undefined);
  }

  async read(): Promise<RegistryState> {
    let raw: string;
    try {
      raw = await readFile(this.registryPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return new Map();
      }
      throw new FilesystemError(
        `Cannot read registry '${this.registryPath}': ${describeError(err)}`,
      );
    }
    return parseRegistry(raw, this.registryPath, this.digestLength);
  }

  async transaction<T>(fn: (state: RegistryState) => T | Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      const state = await this.read();
      const result = await fn(state);
      await this.write(state);
      return result;
    } finally {
      await this.releaseLock();
    }
  }

  private async write(state: RegistryState): Promise<void> {
    try {
      await writeFileAtomic(this.registryPath, serializeRegistry(state));
    } catch (err) {
      throw new FilesystemError(
        `Cannot write registry '${this.registryPath}': ${describeError(err)}`,
      );
    }
  }

  private async acquireLock(): Promise<void> {
    const deadline = Date.now() + this.lockTimeoutMs;
    for (;;) {
      const token =
        JSON.stringify({
          pid: process.pid,
          nonce: randomUUID(),
          acquired: new Date().toISOString(),
        }) + "\n";
      try {
        // 'wx' flag: create exclusively — fails if another process holds it
        await writeFile(this.lockPath, token, { encoding: "utf-8", flag: "wx" });
        this.lockToken = token;
        return;
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
          throw new FilesystemError(
            `Cannot create lock '${this.lockPath}': ${describeError(err)}`,
          );
        }
      }

      if (await this.breakStaleLock()) continue;

      if (Date.now() >= deadline) {
        throw new RegistryLockedError(this.lockPath, this.lockTimeoutMs);
      }
      await sleep(LOCK_RETRY_MS);
    }
  }

  private async breakStaleLock(): Promise<boolean> {
    const seen = await this.readLock();
    if (seen === null) return true;

    let age: number;
    try {
      age = Date.now() - (await stat(this.lockPath)).mtimeMs;
    } catch (err) {
      // Released between our create attempt and the stat: just retry
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return true;
      throw err;
    }
    if (age < STALE_LOCK_MS) return false;

    this.onWarning(
      `breaking stale registry lock '${this.lockPath}' (${Math.round(age / 1000)}s old)`,
    );
    // Only remove the lock judged stale; someone may have replaced it since
    if ((await this.readLock()) === seen) {
      await this.removeLock();
    }
    return true;
  }

  private async releaseLock(): Promise<void> {
    const token = this.lockToken;
    this.lockToken = null;

    const current = await this.readLock();
    if (current === null) {
      this.onWarning(`registry lock '${this.lockPath}' was already gone on release`);
    } else if (current !== token) {
      this.onWarning(
        `registry lock '${this.lockPath}' is held by another process; leaving it in place`,
      );
    } else {
      await this.removeLock();
    }
  }

  /** Lock file contents, or null if there is none. */
  private async readLock(): Promise<string | null> {
    try {
      return await readFile(this.lockPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  }

  private async removeLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
  }
}

// ─── Memory store ────────────────────────────────────────────────────

/**
 * In-memory RegistryStore for tests. Transactions are queued so they run
 * one at a time, like the file lock does across processes.
 */
export class MemoryRegistryStore implements RegistryStore {
  constructor(readonly digestLength: number = DIGEST_LENGTH) {}

  private state: RegistryState = new Map();
  private queue: Promise<unknown> = Promise.resolve();
  /** Number of committed transactions. */
  writes = 0;

  async read(): Promise<RegistryState> {
    return cloneState(this.state);
  }

  transaction<T>(fn: (state: RegistryState) => T | Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const working = cloneState(this.state);
      const result = await fn(working);
      this.state = working;
      this.writes++;
      return result;
    });
    // A failed transaction must not wedge the ones queued after it
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Serialized form, as the file store would write it. */
  dump(): string {
    return serializeRegistry(this.state);
  }
}
