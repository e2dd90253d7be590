import { canonicalPath } from "./home.js";
import type { FileSystem } from "./fs.js";
import { isRecordedHash, type ContentHasher } from "./hash.js";
import type { MirrorRegistry } from "./registry.js";
import {
  DigestLengthError,
  GrainkeepError,
  MirrorWriteFailedError,
  SourceUnreadableError,
  describeError,
} from "../util/errors.js";

export interface MirrorWriteResult {
  path: string;
  ok: boolean;
  /** MirrorWriteFailed message when ok is false. */
  error?: string;
}

export interface SyncResult {
  source: string;
  hash: string;
  syncedAt: string;
  mirrors: MirrorWriteResult[];
  /** Every mirror was written. */
  ok: boolean;
}

export type SyncOutcome =
  | ({ status: "synced" } & SyncResult)
  | { status: "failed"; source: string; ok: false; error: string };

export interface SyncAllResult {
  outcomes: SyncOutcome[];
  /** Every source synced and every mirror written. */
  ok: boolean;
}

export interface SyncEngineOptions {
  now?: () => Date;
}

/**
 * Copies each source verbatim to its mirrors.
 *
 * Per source the order is: read → hash → write mirrors → record. The
 * recorded hash describes the source as it was read, whatever happened
 * to individual mirror writes; a failed mirror shows up in the result and
 * is picked up again by the next sync or verify.
 */
export class SyncEngine {
  private readonly now: () => Date;

  constructor(
    private readonly registry: MirrorRegistry,
    private readonly fs: FileSystem,
    private readonly hasher: ContentHasher,
    opts: SyncEngineOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async sync(sourcePath: string): Promise<SyncResult> {
    const source = canonicalPath(sourcePath);
    const entry = await this.registry.require(source);

    let content: Uint8Array;
    try {
      content = await this.fs.read(source);
    } catch (err) {
      throw new SourceUnreadableError(source, describeError(err));
    }

    const hash = this.hasher.hash(content);
    // Checked before any mirror is touched; recordSync would refuse it anyway
    if (hash === "" || !isRecordedHash(hash, this.registry.digestLength)) {
      throw new DigestLengthError(source, hash, this.registry.digestLength);
    }

    const mirrors: MirrorWriteResult[] = [];
    for (const mirror of entry.mirrors) {
      try {
        await this.fs.write(mirror, content);
        mirrors.push({ path: mirror, ok: true });
      } catch (err) {
        const failure = new MirrorWriteFailedError(mirror, describeError(err));
        mirrors.push({ path: mirror, ok: false, error: failure.message });
      }
    }

    const syncedAt = this.now().toISOString();
    await this.registry.recordSync(source, hash, syncedAt);

    return {
      source,
      hash,
      syncedAt,
      mirrors,
      ok: mirrors.every((m) => m.ok),
    };
  }

  /**
   * Sync every registered source in path order. A source that fails is
   * recorded as a failed outcome and the batch moves on.
   */
  async syncAll(): Promise<SyncAllResult> {
    const outcomes: SyncOutcome[] = [];
    for (const [source] of await this.registry.list()) {
      try {
        const result = await this.sync(source);
        outcomes.push({ status: "synced", ...result });
      } catch (err) {
        if (!(err instanceof GrainkeepError)) throw err;
        outcomes.push({ status: "failed", source, ok: false, error: err.message });
      }
    }
    return { outcomes, ok: outcomes.every((o) => o.ok) };
  }
}
