import { canonicalPath } from "./home.js";
import type { FileSystem } from "./fs.js";
import type { ContentHasher } from "./hash.js";
import type { MirrorRegistry } from "./registry.js";
import type { MirrorEntry } from "./store.js";
import { describeError } from "../util/errors.js";

/**
 * in_sync    mirror hash equals the current source hash
 * missing    mirror path does not exist
 * drifted    mirror exists with different content
 * unreadable mirror exists but could not be read
 * unverified source could not be read, so there is nothing to compare to
 */
export type MirrorStatus = "in_sync" | "missing" | "drifted" | "unreadable" | "unverified";

export interface MirrorCheck {
  path: string;
  status: MirrorStatus;
  /** Mirror's own hash when it could be read. */
  hash?: string;
  error?: string;
}

export interface VerificationReport {
  source: string;
  /** Hash of the source right now; null if it could not be read. */
  currentHash: string | null;
  /** Hash stored at the last sync ("" if never synced). */
  recordedHash: string;
  lastSync: string;
  neverSynced: boolean;
  /**
   * The source was edited after the last sync. Informational: it says the
   * registry is stale, not that any mirror is wrong.
   */
  sourceChangedSinceSync: boolean;
  sourceError?: string;
  mirrors: MirrorCheck[];
  /** Every mirror matches the current source. */
  allInSync: boolean;
}

export interface VerifyAllResult {
  reports: VerificationReport[];
  ok: boolean;
}

/**
 * Compares sources and mirrors by content hash. Findings are report
 * fields; for a registered source `verify` does not throw on I/O errors.
 */
export class VerifyEngine {
  constructor(
    private readonly registry: MirrorRegistry,
    private readonly fs: FileSystem,
    private readonly hasher: ContentHasher,
  ) {}

  async verify(sourcePath: string): Promise<VerificationReport> {
    const source = canonicalPath(sourcePath);
    const entry = await this.registry.require(source);
    return this.check(source, entry);
  }

  async verifyAll(): Promise<VerifyAllResult> {
    const reports: VerificationReport[] = [];
    for (const [source, entry] of await this.registry.list()) {
      reports.push(await this.check(source, entry));
    }
    return { reports, ok: reports.every((r) => r.allInSync) };
  }

  private async check(source: string, entry: MirrorEntry): Promise<VerificationReport> {
    let currentHash: string | null = null;
    let sourceError: string | undefined;
    try {
      currentHash = this.hasher.hash(await this.fs.read(source));
    } catch (err) {
      sourceError = describeError(err);
    }

    const mirrors: MirrorCheck[] = [];
    for (const path of entry.mirrors) {
      mirrors.push(await this.checkMirror(path, currentHash));
    }

    const neverSynced = entry.hash === "";
    const report: VerificationReport = {
      source,
      currentHash,
      recordedHash: entry.hash,
      lastSync: entry.lastSync,
      neverSynced,
      sourceChangedSinceSync:
        currentHash !== null && !neverSynced && currentHash !== entry.hash,
      mirrors,
      allInSync: currentHash !== null && mirrors.every((m) => m.status === "in_sync"),
    };
    if (sourceError !== undefined) report.sourceError = sourceError;
    return report;
  }

  private async checkMirror(path: string, sourceHash: string | null): Promise<MirrorCheck> {
    if (!(await this.fs.exists(path))) {
      return { path, status: "missing" };
    }
    if (sourceHash === null) {
      return { path, status: "unverified" };
    }

    let hash: string;
    try {
      hash = this.hasher.hash(await this.fs.read(path));
    } catch (err) {
      return { path, status: "unreadable", error: describeError(err) };
    }

    // Compare against the source as it is now, not the recorded hash
    return { path, status: hash === sourceHash ? "in_sync" : "drifted", hash };
  }
}
