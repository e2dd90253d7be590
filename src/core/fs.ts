import { access, mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * The five filesystem operations the core needs. Everything that touches
 * disk goes through this, so tests can swap in {@link MemoryFileSystem}.
 */
export interface FileSystem {
  exists(path: string): Promise<boolean>;
  read(path: string): Promise<Uint8Array>;
  /** Write the whole file, creating parent directories as needed. */
  write(path: string, data: Uint8Array): Promise<void>;
  /** Entry names (not paths) directly inside `dir`, sorted. */
  list(dir: string): Promise<string[]>;
  /** Rename a file. Fails if `to` already exists. */
  rename(from: string, to: string): Promise<void>;
}

/** Node error with an errno-style code, shared by both implementations. */
export function fsError(code: string, op: string, path: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: ${op} '${path}'`);
  err.code = code;
  return err;
}

/**
 * Write through a sibling temp file renamed into place, so a reader sees
 * either the old content or the new. The temp file is removed if any step
 * fails.
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  const tmp = `${path}.grainkeep-${process.pid}.tmp`;
  try {
    await writeFile(tmp, data);
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async read(path: string): Promise<Uint8Array> {
    return readFile(path);
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFileAtomic(path, data);
  }

  async list(dir: string): Promise<string[]> {
    const entries = await readdir(dir);
    return entries.sort();
  }

  async rename(from: string, to: string): Promise<void> {
    if (await this.exists(to)) {
      throw fsError("EEXIST", "rename", to);
    }
    await rename(from, to);
  }
}
