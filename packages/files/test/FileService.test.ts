import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileService } from "../src/core/FileService.js";

describe("FileService", () => {
  let service: FileService;
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "fileops-service-"));
    service = new FileService(testDir);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("resolves relative paths against the root", () => {
    expect(service.resolve("docs/readme.md")).toBe(join(testDir, "docs", "readme.md"));
  });

  it("leaves absolute paths alone", () => {
    expect(service.resolve("/etc/hosts")).toBe("/etc/hosts");
  });

  it("defaults the root to the working directory", () => {
    expect(new FileService().root).toBe(process.cwd());
  });

  it("writes, appends and reads relative to the root", () => {
    expect(service.write("notes.txt", "one\n").ok).toBe(true);
    expect(service.append("notes.txt", "two\n").ok).toBe(true);

    expect(readFileSync(join(testDir, "notes.txt"), "utf-8")).toBe("one\ntwo\n");
    expect(service.read("notes.txt")).toEqual({ ok: true, value: "one\ntwo\n" });
    expect(service.countLines("notes.txt")).toEqual({ ok: true, value: 2 });
  });

  it("copies and renames relative to the root", () => {
    writeFileSync(join(testDir, "a.txt"), "alpha");

    expect(service.copy("a.txt", "b.txt")).toEqual({ ok: true, value: 5 });
    expect(service.rename("b.txt", "c.txt").ok).toBe(true);

    expect(service.exists("b.txt")).toBe(false);
    expect(service.checkExists("c.txt")).toEqual({ ok: true, value: true });
    expect(service.isReadable("c.txt")).toBe(true);
  });

  it("manages directories relative to the root", () => {
    expect(service.makeDir("out/reports").ok).toBe(true);
    service.write("out/reports/q1.csv", "x");
    service.write("out/reports/q2.csv", "y");
    service.write("out/reports/notes.md", "z");

    const listed = service.listFiles("out/reports", ".csv");
    expect(listed.ok).toBe(true);
    if (!listed.ok) return;
    expect([...listed.value].sort()).toEqual([
      join(testDir, "out", "reports", "q1.csv"),
      join(testDir, "out", "reports", "q2.csv"),
    ]);

    expect(service.clearDir("out").ok).toBe(true);
    expect(service.listFiles("out")).toEqual({ ok: true, value: [] });

    expect(service.remove("out").ok).toBe(true);
    expect(service.exists("out")).toBe(false);
  });
});
