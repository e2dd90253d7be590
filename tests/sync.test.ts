import { createHash } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";
import { MemoryFileSystem } from "../src/core/memory-fs.js";
import { MemoryRegistryStore, parseRegistry } from "../src/core/store.js";
import { MirrorRegistry } from "../src/core/registry.js";
import { SyncEngine } from "../src/core/sync.js";
import { sha256Hasher, type ContentHasher } from "../src/core/hash.js";
import {
  DigestLengthError,
  SourceNotRegisteredError,
  SourceUnreadableError,
} from "../src/util/errors.js";

const HELLO = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";
const NOW = new Date("2026-10-19T08:00:00.000Z");

const sha1Hasher: ContentHasher = {
  digestLength: 40,
  hash: (data) => createHash("sha1").update(data).digest("hex"),
};
const HELLO_SHA1 = "aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d";

describe("SyncEngine", () => {
  let fs: MemoryFileSystem;
  let registry: MirrorRegistry;
  let engine: SyncEngine;

  beforeEach(async () => {
    fs = new MemoryFileSystem({ "/a/readme.md": "hello", "/d/notes.md": "notes" });
    registry = new MirrorRegistry(new MemoryRegistryStore(), fs);
    engine = new SyncEngine(registry, fs, sha256Hasher, { now: () => NOW });
    await registry.register("/a/readme.md", "/b/readme.md");
    await registry.register("/a/readme.md", "/c/deep/dir/readme.md");
  });

  it("copies the source to every mirror and records the hash", async () => {
    const result = await engine.sync("/a/readme.md");

    expect(result).toEqual({
      source: "/a/readme.md",
      hash: HELLO,
      syncedAt: "2026-10-19T08:00:00.000Z",
      mirrors: [
        { path: "/b/readme.md", ok: true },
        { path: "/c/deep/dir/readme.md", ok: true },
      ],
      ok: true,
    });
    expect(fs.text("/b/readme.md")).toBe("hello");
    expect(fs.text("/c/deep/dir/readme.md")).toBe("hello");
    expect(await registry.get("/a/readme.md")).toEqual({
      mirrors: ["/b/readme.md", "/c/deep/dir/readme.md"],
      lastSync: "2026-10-19T08:00:00.000Z",
      hash: HELLO,
    });
  });

  it("leaves every mirror hashing like the source", async () => {
    await engine.sync("/a/readme.md");
    const sourceHash = sha256Hasher.hash(await fs.read("/a/readme.md"));
    for (const mirror of ["/b/readme.md", "/c/deep/dir/readme.md"]) {
      expect(sha256Hasher.hash(await fs.read(mirror))).toBe(sourceHash);
    }
  });

  it("overwrites a drifted mirror", async () => {
    fs.put("/b/readme.md", "tampered");
    await engine.sync("/a/readme.md");
    expect(fs.text("/b/readme.md")).toBe("hello");
  });

  it("keeps writing after one mirror fails and still records the hash", async () => {
    fs.failOn("write", "/b/readme.md");

    const result = await engine.sync("/a/readme.md");

    expect(result.ok).toBe(false);
    expect(result.mirrors).toEqual([
      {
        path: "/b/readme.md",
        ok: false,
        error: "Cannot write mirror '/b/readme.md': EACCES: write '/b/readme.md'",
      },
      { path: "/c/deep/dir/readme.md", ok: true },
    ]);
    expect(fs.text("/b/readme.md")).toBeUndefined();
    expect(fs.text("/c/deep/dir/readme.md")).toBe("hello");
    expect((await registry.get("/a/readme.md"))?.hash).toBe(HELLO);
  });

  it("does not touch the registry when the source is unreadable", async () => {
    fs.failOn("read", "/a/readme.md");

    await expect(engine.sync("/a/readme.md")).rejects.toThrow(SourceUnreadableError);
    expect(await registry.get("/a/readme.md")).toMatchObject({
      lastSync: "never",
      hash: "",
    });
    expect(fs.text("/b/readme.md")).toBeUndefined();
  });

  it("fails for an unregistered source", async () => {
    await expect(engine.sync("/d/notes.md")).rejects.toThrow(SourceNotRegisteredError);
  });

  it("syncs a source without mirrors", async () => {
    await registry.register("/d/notes.md", "/e/notes.md");
    await registry.unregister("/d/notes.md", "/e/notes.md");
    const result = await engine.sync("/d/notes.md");
    expect(result.mirrors).toEqual([]);
    expect(result.ok).toBe(true);
  });

  describe("syncAll", () => {
    it("syncs every source in path order and carries on past failures", async () => {
      await registry.register("/d/notes.md", "/e/notes.md");
      fs.remove("/d/notes.md");

      const result = await engine.syncAll();

      expect(result.ok).toBe(false);
      expect(result.outcomes.map((o) => [o.source, o.status])).toEqual([
        ["/a/readme.md", "synced"],
        ["/d/notes.md", "failed"],
      ]);
      expect(result.outcomes[1]).toEqual({
        status: "failed",
        source: "/d/notes.md",
        ok: false,
        error: "Cannot read source '/d/notes.md': ENOENT: read '/d/notes.md'",
      });
      expect(fs.text("/b/readme.md")).toBe("hello");
    });

    it("reports a partial mirror failure as not ok", async () => {
      fs.failOn("write", "/c/deep/dir/readme.md");
      const result = await engine.syncAll();
      expect(result.outcomes).toHaveLength(1);
      expect(result.outcomes[0]).toMatchObject({ status: "synced", ok: false });
      expect(result.ok).toBe(false);
    });

    it("is ok when everything syncs", async () => {
      const result = await engine.syncAll();
      expect(result.ok).toBe(true);
    });
  });

  describe("with a 40-character hasher", () => {
    it("records digests a store of the same length can read back", async () => {
      const store = new MemoryRegistryStore(sha1Hasher.digestLength);
      const sha1Registry = new MirrorRegistry(store, fs);
      await sha1Registry.register("/a/readme.md", "/b/readme.md");

      const result = await new SyncEngine(sha1Registry, fs, sha1Hasher).sync("/a/readme.md");

      expect(result.hash).toBe(HELLO_SHA1);
      expect(parseRegistry(store.dump(), "test", 40).get("/a/readme.md")?.hash).toBe(HELLO_SHA1);
    });

    it("refuses to sync into a store expecting another length", async () => {
      const mismatched = new SyncEngine(registry, fs, sha1Hasher);

      await expect(mismatched.sync("/a/readme.md")).rejects.toThrow(DigestLengthError);
      expect(fs.text("/b/readme.md")).toBeUndefined();
      expect(await registry.get("/a/readme.md")).toMatchObject({ lastSync: "never", hash: "" });
      // the registry still reads back cleanly
      expect(await registry.list()).toHaveLength(1);
    });
  });
});
