import { linkSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  findConflicts,
  hasConflicts,
  illegalCharacterPattern,
  isSameFile,
  targetPath,
} from "../conflicts.js";

describe("findConflicts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "brn-conflicts-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports only the repeats of a duplicate name", () => {
    const paths = ["a.jpg", "b.jpg", "c.jpg"].map((n) => join(dir, n));
    const report = findConflicts(paths, { replaceName: true, newName: "same" }, undefined, {
      platform: "linux",
    });
    expect(report.duplicates).toEqual([
      { originalPath: paths[1], newName: "same.jpg" },
      { originalPath: paths[2], newName: "same.jpg" },
    ]);
    expect(report.invalidChars).toEqual([]);
    expect(report.existingFiles).toEqual([]);
  });

  it("uses the platform's illegal characters", () => {
    const paths = [join(dir, "a.jpg")];
    const scheme = { prefix: "12:30 " };
    expect(findConflicts(paths, scheme, undefined, { platform: "win32" }).invalidChars).toEqual([
      { originalPath: paths[0], newName: "12:30 a.jpg" },
    ]);
    expect(findConflicts(paths, scheme, undefined, { platform: "linux" }).invalidChars).toEqual([]);

    const slash = findConflicts(paths, { find: "a", replace: "x/y" }, undefined, { platform: "linux" });
    expect(slash.invalidChars).toEqual([{ originalPath: paths[0], newName: "x/y.jpg" }]);
  });

  it("flags targets that already exist, but not a file renamed to itself", () => {
    const one = join(dir, "one.jpg");
    const two = join(dir, "two.jpg");
    writeFileSync(one, "1");
    writeFileSync(two, "2");

    const report = findConflicts([one, two], { find: "one", replace: "two" }, undefined, {
      platform: "linux",
    });
    expect(report.existingFiles).toEqual([{ originalPath: one, newName: "two.jpg" }]);
    expect(report.duplicates).toEqual([{ originalPath: two, newName: "two.jpg" }]);
  });

  it("checks the destination folder when moving", () => {
    const dest = join(dir, "dest");
    mkdirSync(dest);
    writeFileSync(join(dest, "one.jpg"), "old");
    const source = join(dir, "one.jpg");
    writeFileSync(source, "new");

    const report = findConflicts([source], {}, dest, { platform: "linux" });
    expect(report.existingFiles).toEqual([{ originalPath: source, newName: "one.jpg" }]);
    expect(findConflicts([source], {}, undefined, { platform: "linux" }).existingFiles).toEqual([]);
  });

  it("treats an empty destination as renaming in place", () => {
    const source = join(dir, "a.txt");
    writeFileSync(source, "a");
    writeFileSync(join(dir, "x_a.txt"), "other");

    const report = findConflicts([source], { prefix: "x_" }, "", { platform: "linux" });
    expect(report.existingFiles).toEqual([{ originalPath: source, newName: "x_a.txt" }]);
  });

  it("flags a target that is a hard link to the source under another name", () => {
    const source = join(dir, "a.txt");
    writeFileSync(source, "a");
    linkSync(source, join(dir, "x_a.txt"));

    const report = findConflicts([source], { prefix: "x_" }, undefined, { platform: "linux" });
    expect(report.existingFiles).toEqual([{ originalPath: source, newName: "x_a.txt" }]);
  });

  it("lists one entry under every category it breaks", () => {
    const paths = [join(dir, "a.txt"), join(dir, "b.txt")];
    const report = findConflicts(paths, { replaceName: true, newName: "x|y" }, undefined, {
      platform: "win32",
    });
    expect(report.duplicates).toEqual([{ originalPath: paths[1], newName: "x|y.txt" }]);
    expect(report.invalidChars.map((e) => e.originalPath)).toEqual(paths);
    expect(hasConflicts(report)).toBe(true);
  });

  it("reports nothing for a clean batch", () => {
    const paths = [join(dir, "a.txt"), join(dir, "b.txt")];
    const report = findConflicts(paths, { useNumbering: true }, undefined, { platform: "linux" });
    expect(report).toEqual({ duplicates: [], invalidChars: [], existingFiles: [] });
    expect(hasConflicts(report)).toBe(false);
  });
});

describe("illegalCharacterPattern", () => {
  it("forbids the Windows set on win32 and only the slash elsewhere", () => {
    for (const ch of ["\\", "/", ":", "*", "?", '"', "<", ">", "|"]) {
      expect(illegalCharacterPattern("win32").test(`a${ch}b`)).toBe(true);
    }
    expect(illegalCharacterPattern("linux").test("a:b*c?")).toBe(false);
    expect(illegalCharacterPattern("darwin").test("a/b")).toBe(true);
  });
});

describe("targetPath", () => {
  it("resolves next to the original or inside the destination", () => {
    expect(targetPath("/photos/a.jpg", "b.jpg")).toBe(join("/photos", "b.jpg"));
    expect(targetPath("/photos/a.jpg", "b.jpg", "/archive")).toBe(join("/archive", "b.jpg"));
    expect(targetPath("/photos/a.jpg", "b.jpg", "")).toBe(join("/photos", "b.jpg"));
  });
});

describe("isSameFile", () => {
  it("compares normalized paths", () => {
    expect(isSameFile("/photos/./a.jpg", "/photos/a.jpg")).toBe(true);
    expect(isSameFile("/photos/a.jpg", "/photos/b.jpg")).toBe(false);
  });

  it("does not count a hard link under another name", () => {
    const dir = mkdtempSync(join(tmpdir(), "brn-same-"));
    try {
      writeFileSync(join(dir, "a.txt"), "a");
      linkSync(join(dir, "a.txt"), join(dir, "b.txt"));
      expect(isSameFile(join(dir, "a.txt"), join(dir, "b.txt"))).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
