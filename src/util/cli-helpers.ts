import { Command } from "commander";
import { GrainkeepError } from "./errors.js";
import { resolveFormat, type OutputFormat } from "./format.js";
import { EXIT } from "../core/constants.js";
import { requireHome, resolveHomePath } from "../core/home.js";
import { NodeFileSystem } from "../core/fs.js";
import { sha256Hasher } from "../core/hash.js";
import { FileRegistryStore } from "../core/store.js";
import { MirrorRegistry } from "../core/registry.js";
import { SyncEngine } from "../core/sync.js";
import { VerifyEngine } from "../core/verify.js";

/** Options declared on the root program. */
export interface GlobalOptions {
  home?: string;
  json?: boolean;
  table?: boolean;
  lockTimeout?: string;
}

/**
 * Walk up the commander chain to the root program and extract global options.
 */
export function resolveParentOpts(cmd: Command): GlobalOptions {
  let current: Command = cmd;
  while (current.parent) {
    current = current.parent;
  }
  return current.opts<GlobalOptions>();
}

/** Print a warning line on stderr. */
export function warn(message: string): void {
  process.stderr.write(`Warning: ${message}\n`);
}

/**
 * Handle errors uniformly: GrainkeepError → stderr + exit with code.
 * Unknown errors → re-throw.
 */
export function handleError(err: unknown): never {
  if (err instanceof GrainkeepError) {
    process.stderr.write(`Error: ${err.message}\n`);
    process.exit(err.exitCode);
  }
  throw err;
}

/** Exit 1 when an operation reported failure without throwing. */
export function exitUnless(ok: boolean): void {
  if (!ok) {
    process.exit(EXIT.VALIDATION_ERROR);
  }
}

export function parseLockTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const ms = Number(raw);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new GrainkeepError(
      `Invalid --lock-timeout '${raw}': expected a non-negative integer of milliseconds`,
      EXIT.BAD_INPUT,
    );
  }
  return ms;
}

/** Everything a registry command needs, wired from the global options. */
export interface CommandContext {
  homePath: string;
  format: OutputFormat;
  fs: NodeFileSystem;
  registry: MirrorRegistry;
  syncEngine: SyncEngine;
  verifyEngine: VerifyEngine;
}

export async function openContext(cmd: Command): Promise<CommandContext> {
  const opts = resolveParentOpts(cmd);
  const homePath = resolveHomePath(opts.home);
  await requireHome(homePath);

  const fs = new NodeFileSystem();
  const hasher = sha256Hasher;
  const store = new FileRegistryStore(homePath, {
    lockTimeoutMs: parseLockTimeout(opts.lockTimeout),
    digestLength: hasher.digestLength,
    onWarning: warn,
  });
  const registry = new MirrorRegistry(store, fs);

  return {
    homePath,
    format: resolveFormat(opts),
    fs,
    registry,
    syncEngine: new SyncEngine(registry, fs, hasher),
    verifyEngine: new VerifyEngine(registry, fs, hasher),
  };
}
