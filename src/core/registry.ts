import { canonicalPath } from "./home.js";
import type { FileSystem } from "./fs.js";
import { isRecordedHash } from "./hash.js";
import { newEntry, type MirrorEntry, type RegistryStore } from "./store.js";
import {
  DigestLengthError,
  InvalidMirrorError,
  MirrorNotRegisteredError,
  SourceHasMirrorsError,
  SourceNotFoundError,
  SourceNotRegisteredError,
} from "../util/errors.js";

// ─── Results ─────────────────────────────────────────────────────────

export type RegisterResult =
  | { status: "registered"; source: string; mirror: string; created: boolean }
  | { status: "already_registered"; source: string; mirror: string };

export interface UnregisterResult {
  source: string;
  mirror: string;
  removed: boolean;
  remaining: number;
}

export interface RemoveSourceResult {
  source: string;
  mirrors: string[];
}

export type RegistryListing = Array<[source: string, entry: MirrorEntry]>;

// ─── Registry ────────────────────────────────────────────────────────

/**
 * Source → mirrors mapping. Holds no state of its own: every call reads
 * the store, and every mutation goes through one store transaction, so
 * the update is on disk before the call resolves.
 */
export class MirrorRegistry {
  constructor(
    private readonly store: RegistryStore,
    private readonly fs: FileSystem,
  ) {}

  /** Hex length of the digests the underlying store accepts. */
  get digestLength(): number {
    return this.store.digestLength;
  }

  /**
   * Add `mirror` to `source`'s entry, creating the entry if needed.
   * Registering a pair twice is reported, not duplicated.
   */
  async register(sourcePath: string, mirrorPath: string): Promise<RegisterResult> {
    const source = canonicalPath(sourcePath);
    const mirror = canonicalPath(mirrorPath);

    if (source === mirror) {
      throw new InvalidMirrorError(source);
    }
    if (!(await this.fs.exists(source))) {
      throw new SourceNotFoundError(source);
    }

    return this.store.transaction((state): RegisterResult => {
      let entry = state.get(source);
      const created = entry === undefined;
      if (!entry) {
        entry = newEntry();
        state.set(source, entry);
      }
      if (entry.mirrors.includes(mirror)) {
        return { status: "already_registered", source, mirror };
      }
      entry.mirrors = [...entry.mirrors, mirror].sort();
      return { status: "registered", source, mirror, created };
    });
  }

  /**
   * Drop `mirror` from `source`'s entry. Dropping a mirror that is not
   * there is a no-op unless `strict` is set.
   */
  async unregister(
    sourcePath: string,
    mirrorPath: string,
    opts: { strict?: boolean } = {},
  ): Promise<UnregisterResult> {
    const source = canonicalPath(sourcePath);
    const mirror = canonicalPath(mirrorPath);

    return this.store.transaction((state) => {
      const entry = state.get(source);
      if (!entry) {
        throw new SourceNotRegisteredError(source);
      }
      const removed = entry.mirrors.includes(mirror);
      if (!removed && opts.strict) {
        throw new MirrorNotRegisteredError(source, mirror);
      }
      entry.mirrors = entry.mirrors.filter((m) => m !== mirror);
      return { source, mirror, removed, remaining: entry.mirrors.length };
    });
  }

  /** Delete a whole entry. Refuses while mirrors remain unless forced. */
  async removeSource(
    sourcePath: string,
    opts: { force?: boolean } = {},
  ): Promise<RemoveSourceResult> {
    const source = canonicalPath(sourcePath);

    return this.store.transaction((state) => {
      const entry = state.get(source);
      if (!entry) {
        throw new SourceNotRegisteredError(source);
      }
      if (entry.mirrors.length > 0 && !opts.force) {
        throw new SourceHasMirrorsError(source, entry.mirrors.length);
      }
      state.delete(source);
      return { source, mirrors: entry.mirrors };
    });
  }

  /** Every entry, sorted by source path. Read-only. */
  async list(): Promise<RegistryListing> {
    const state = await this.store.read();
    return [...state.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async get(sourcePath: string): Promise<MirrorEntry | null> {
    const state = await this.store.read();
    return state.get(canonicalPath(sourcePath)) ?? null;
  }

  /** Like {@link get}, but an unknown source is an error. */
  async require(sourcePath: string): Promise<MirrorEntry> {
    const entry = await this.get(sourcePath);
    if (!entry) {
      throw new SourceNotRegisteredError(canonicalPath(sourcePath));
    }
    return entry;
  }

  /**
   * Record the hash and time of a sync. Fails if the entry was removed
   * by another process while the sync was running.
   */
  async recordSync(sourcePath: string, hash: string, timestamp: string): Promise<void> {
    const source = canonicalPath(sourcePath);
    await this.store.transaction((state) => {
      const entry = state.get(source);
      if (!entry) {
        throw new SourceNotRegisteredError(source);
      }
      if (!isRecordedHash(hash, this.store.digestLength)) {
        throw new DigestLengthError(source, hash, this.store.digestLength);
      }
      entry.hash = hash;
      entry.lastSync = timestamp;
    });
  }
}
