import { EXIT } from "../core/constants.js";

/**
 * Base error class for grainkeep.
 * Every GrainkeepError carries an exit code so the CLI can exit with the
 * correct status without catching-and-switching on error types.
 */
export class GrainkeepError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT.VALIDATION_ERROR) {
    super(message);
    this.name = "GrainkeepError";
    this.exitCode = exitCode;
  }
}

// ─── Grainorders ─────────────────────────────────────────────────────

/** Malformed code: wrong length, foreign symbol, or repeated symbol. */
export class InvalidGrainorderError extends GrainkeepError {
  constructor(code: string, reason: string) {
    super(`Invalid grainorder '${code}': ${reason}`, EXIT.BAD_INPUT);
    this.name = "InvalidGrainorderError";
  }
}

/** No valid code exists below the current newest code. */
export class AllocationExhaustedError extends GrainkeepError {
  constructor(smallest: string) {
    super(
      `Grainorder space exhausted: no code exists below '${smallest}'. Run 'grainkeep rebalance' on the directory.`,
      EXIT.VALIDATION_ERROR,
    );
    this.name = "AllocationExhaustedError";
  }
}

/** A rebalance needs more codes than remain above its start code. */
export class PlanExhaustedError extends GrainkeepError {
  constructor(
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(
      `Rebalance needs ${needed} grainorders but only ${available} remain from the start code`,
      EXIT.VALIDATION_ERROR,
    );
    this.name = "PlanExhaustedError";
  }
}

/** Filename does not follow the tagged naming pattern. */
export class NotTaggedError extends GrainkeepError {
  constructor(name: string) {
    super(
      `'${name}' is not a grainorder-tagged file (expected code-YYYYY-MM-DD--HHMM-tz--name)`,
      EXIT.BAD_INPUT,
    );
    this.name = "NotTaggedError";
  }
}

// ─── Registry ────────────────────────────────────────────────────────

/** Source path does not exist on disk. */
export class SourceNotFoundError extends GrainkeepError {
  constructor(source: string) {
    super(`Source not found: ${source}`, EXIT.FILESYSTEM_ERROR);
    this.name = "SourceNotFoundError";
  }
}

/** Source exists in the registry but could not be read. */
export class SourceUnreadableError extends GrainkeepError {
  constructor(source: string, cause: string) {
    super(`Cannot read source '${source}': ${cause}`, EXIT.FILESYSTEM_ERROR);
    this.name = "SourceUnreadableError";
  }
}

/** Source has no registry entry. */
export class SourceNotRegisteredError extends GrainkeepError {
  constructor(source: string) {
    super(
      `Source not registered: ${source}. Run 'grainkeep register' first.`,
      EXIT.BAD_INPUT,
    );
    this.name = "SourceNotRegisteredError";
  }
}

/** Mirror is not part of the source's entry (strict unregister only). */
export class MirrorNotRegisteredError extends GrainkeepError {
  constructor(source: string, mirror: string) {
    super(`Mirror '${mirror}' is not registered for ${source}`, EXIT.BAD_INPUT);
    this.name = "MirrorNotRegisteredError";
  }
}

/** Mirror path would overwrite its own source. */
export class InvalidMirrorError extends GrainkeepError {
  constructor(path: string) {
    super(`A file cannot mirror itself: ${path}`, EXIT.BAD_INPUT);
    this.name = "InvalidMirrorError";
  }
}

/** Entry still has mirrors and removal was not forced. */
export class SourceHasMirrorsError extends GrainkeepError {
  constructor(source: string, count: number) {
    super(
      `Cannot remove '${source}': ${count} mirror(s) still registered. Unregister them or pass --force.`,
      EXIT.VALIDATION_ERROR,
    );
    this.name = "SourceHasMirrorsError";
  }
}

/** One mirror write failed during a sync. Collected, never thrown by sync. */
export class MirrorWriteFailedError extends GrainkeepError {
  constructor(
    public readonly mirror: string,
    cause: string,
  ) {
    super(`Cannot write mirror '${mirror}': ${cause}`, EXIT.VALIDATION_ERROR);
    this.name = "MirrorWriteFailedError";
  }
}

/** A content digest does not have the length the registry stores. */
export class DigestLengthError extends GrainkeepError {
  constructor(source: string, hash: string, expected: number) {
    super(
      `Digest for '${source}' is not ${expected} lowercase hex characters (got ${hash.length} characters); the hasher does not match the registry`,
      EXIT.VALIDATION_ERROR,
    );
    this.name = "DigestLengthError";
  }
}

/** registry.yaml does not have the expected shape. */
export class RegistryCorruptError extends GrainkeepError {
  constructor(path: string, reason: string) {
    super(`Registry at '${path}' is malformed: ${reason}`, EXIT.FILESYSTEM_ERROR);
    this.name = "RegistryCorruptError";
  }
}

/** Another process held the registry lock for the whole timeout. */
export class RegistryLockedError extends GrainkeepError {
  constructor(lockPath: string, timeoutMs: number) {
    super(
      `Registry is locked by another process (${lockPath}); gave up after ${timeoutMs}ms`,
      EXIT.FILESYSTEM_ERROR,
    );
    this.name = "RegistryLockedError";
  }
}

// ─── Home & filesystem ───────────────────────────────────────────────

/** Home directory not initialized. */
export class HomeNotInitializedError extends GrainkeepError {
  constructor(homePath: string) {
    super(
      `Home not initialized at '${homePath}'. Run 'grainkeep init' first.`,
      EXIT.FILESYSTEM_ERROR,
    );
    this.name = "HomeNotInitializedError";
  }
}

/** Filesystem-level error wrapper. */
export class FilesystemError extends GrainkeepError {
  constructor(message: string) {
    super(message, EXIT.FILESYSTEM_ERROR);
    this.name = "FilesystemError";
  }
}

// ─── Rebalance ───────────────────────────────────────────────────────

export interface RenameRecord {
  from: string;
  to: string;
}

export interface RenameFailure extends RenameRecord {
  error: string;
}

/**
 * A rebalance apply stopped short. Carries exactly which renames happened
 * and which are still pending so the caller can resume with a fresh scan.
 */
export class RenamePartialFailureError extends GrainkeepError {
  constructor(
    public readonly renamed: RenameRecord[],
    public readonly pending: RenameRecord[],
    public readonly failures: RenameFailure[],
  ) {
    super(
      `Rebalance incomplete: ${renamed.length} renamed, ${pending.length} pending, ${failures.length} failed. Re-run 'grainkeep rebalance' to resume.`,
      EXIT.VALIDATION_ERROR,
    );
    this.name = "RenamePartialFailureError";
  }
}

/** Extract a printable message from anything thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
