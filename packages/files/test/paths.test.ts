import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  chmodSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { checkExists, exists, isReadable, remove, rename } from "../src/core/paths.js";

const runningAsRoot = process.getuid?.() === 0;

describe("paths", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "fileops-paths-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("exists", () => {
    it("is true for a file and for a directory", () => {
      const filePath = join(testDir, "a.txt");
      writeFileSync(filePath, "a");

      expect(exists(filePath)).toBe(true);
      expect(exists(testDir)).toBe(true);
    });

    it("is false for a missing path", () => {
      expect(exists(join(testDir, "missing"))).toBe(false);
    });
  });

  describe("checkExists", () => {
    it("returns Ok(true) for an existing entry", () => {
      expect(checkExists(testDir)).toEqual({ ok: true, value: true });
    });

    it("returns Ok(false) for a missing entry", () => {
      expect(checkExists(join(testDir, "missing"))).toEqual({ ok: true, value: false });
    });

    it("returns Ok(false) when a parent is a regular file", () => {
      const filePath = join(testDir, "plain");
      writeFileSync(filePath, "");
      expect(checkExists(join(filePath, "child"))).toEqual({ ok: true, value: false });
    });

    it("cannot confirm existence through a symlink loop", () => {
      const first = join(testDir, "l1");
      const second = join(testDir, "l2");
      symlinkSync(second, first);
      symlinkSync(first, second);

      const result = checkExists(first);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("ELOOP");
      expect(result.error.kind).toBe("io_fault");
      expect(result.error.step).toBe("stat");
      expect(exists(first)).toBe(false);
    });

    it.skipIf(runningAsRoot)("cannot confirm existence behind an unreadable directory", () => {
      const locked = join(testDir, "locked");
      mkdirSync(locked);
      writeFileSync(join(locked, "inside.txt"), "x");
      chmodSync(locked, 0o000);

      try {
        const result = checkExists(join(locked, "inside.txt"));
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe("permission_denied");
        expect(exists(join(locked, "inside.txt"))).toBe(false);
      } finally {
        chmodSync(locked, 0o755);
      }
    });
  });

  describe("isReadable", () => {
    it("is true for a readable file", () => {
      const filePath = join(testDir, "r.txt");
      writeFileSync(filePath, "r");
      expect(isReadable(filePath)).toBe(true);
    });

    it("is false for a missing file", () => {
      expect(isReadable(join(testDir, "missing"))).toBe(false);
    });

    it.skipIf(runningAsRoot)("is false without the read bit", () => {
      const filePath = join(testDir, "secret.txt");
      writeFileSync(filePath, "s");
      chmodSync(filePath, 0o200);
      expect(isReadable(filePath)).toBe(false);
    });
  });

  describe("rename", () => {
    it("moves a file", () => {
      const from = join(testDir, "old.txt");
      const to = join(testDir, "new.txt");
      writeFileSync(from, "content");

      expect(rename(from, to)).toEqual({ ok: true, value: undefined });
      expect(existsSync(from)).toBe(false);
      expect(readFileSync(to, "utf-8")).toBe("content");
    });

    it("renames a directory", () => {
      const from = join(testDir, "dir-a");
      mkdirSync(from);
      writeFileSync(join(from, "f"), "f");

      expect(rename(from, join(testDir, "dir-b")).ok).toBe(true);
      expect(readFileSync(join(testDir, "dir-b", "f"), "utf-8")).toBe("f");
    });

    it("fails with not_found for a missing source", () => {
      const result = rename(join(testDir, "ghost"), join(testDir, "other"));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("not_found");
      expect(result.error.step).toBe("rename");
    });
  });

  describe("remove", () => {
    it("removes a file", () => {
      const filePath = join(testDir, "gone.txt");
      writeFileSync(filePath, "x");

      expect(remove(filePath)).toEqual({ ok: true, value: undefined });
      expect(existsSync(filePath)).toBe(false);
    });

    it("removes a directory tree", () => {
      const tree = join(testDir, "tree");
      mkdirSync(join(tree, "a", "b"), { recursive: true });
      writeFileSync(join(tree, "a", "b", "leaf.txt"), "leaf");

      expect(remove(tree).ok).toBe(true);
      expect(existsSync(tree)).toBe(false);
    });

    it("succeeds for a missing path", () => {
      expect(remove(join(testDir, "never-existed"))).toEqual({ ok: true, value: undefined });
    });
  });
});
