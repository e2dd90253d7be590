import { posix } from "node:path";
import { fsError, type FileSystem } from "./fs.js";

type FailableOp = "read" | "write" | "rename";

/**
 * In-memory FileSystem.
 *
 * Map-based implementation for tests. Directories are implied by the files
 * under them. Individual operations on individual paths can be made to
 * fail with {@link failOn} to exercise partial-failure handling.
 */
export class MemoryFileSystem implements FileSystem {
  private files = new Map<string, Uint8Array>();
  private failures = new Map<FailableOp, Set<string>>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.files.set(posix.resolve(path), new TextEncoder().encode(content));
    }
  }

  /** Make every future `op` on `path` fail with EACCES. */
  failOn(op: FailableOp, path: string): void {
    const paths = this.failures.get(op) ?? new Set<string>();
    paths.add(posix.resolve(path));
    this.failures.set(op, paths);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  private check(op: FailableOp, path: string): void {
    if (this.failures.get(op)?.has(path)) {
      throw fsError("EACCES", op, path);
    }
  }

  private isDirectory(path: string): boolean {
    const prefix = path.endsWith("/") ? path : path + "/";
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) return true;
    }
    return false;
  }

  async exists(path: string): Promise<boolean> {
    const p = posix.resolve(path);
    return this.files.has(p) || this.isDirectory(p);
  }

  async read(path: string): Promise<Uint8Array> {
    const p = posix.resolve(path);
    this.check("read", p);
    const data = this.files.get(p);
    if (!data) {
      throw fsError(this.isDirectory(p) ? "EISDIR" : "ENOENT", "read", p);
    }
    // Return a copy to prevent external mutation
    return new Uint8Array(data);
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    const p = posix.resolve(path);
    this.check("write", p);
    if (this.isDirectory(p)) {
      throw fsError("EISDIR", "write", p);
    }
    this.files.set(p, new Uint8Array(data));
  }

  async list(dir: string): Promise<string[]> {
    const d = posix.resolve(dir);
    if (!this.isDirectory(d)) {
      throw fsError("ENOENT", "scandir", d);
    }
    const prefix = d === "/" ? "/" : d + "/";
    const names = new Set<string>();
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) {
        names.add(file.slice(prefix.length).split("/")[0]);
      }
    }
    return [...names].sort();
  }

  async rename(from: string, to: string): Promise<void> {
    const src = posix.resolve(from);
    const dst = posix.resolve(to);
    this.check("rename", src);
    const data = this.files.get(src);
    if (!data) {
      throw fsError("ENOENT", "rename", src);
    }
    if (this.files.has(dst) || this.isDirectory(dst)) {
      throw fsError("EEXIST", "rename", dst);
    }
    this.files.delete(src);
    this.files.set(dst, data);
  }

  // ─── Test helpers ──────────────────────────────────────────────────

  /** Read a file as UTF-8, or undefined if it does not exist. */
  text(path: string): string | undefined {
    const data = this.files.get(posix.resolve(path));
    return data ? new TextDecoder().decode(data) : undefined;
  }

  /** Overwrite a file with UTF-8 text, bypassing failure injection. */
  put(path: string, content: string): void {
    this.files.set(posix.resolve(path), new TextEncoder().encode(content));
  }

  remove(path: string): void {
    this.files.delete(posix.resolve(path));
  }
}
