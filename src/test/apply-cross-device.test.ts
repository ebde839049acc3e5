import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyScheme, moveFile } from "../apply.js";
import { toBatchEntries } from "../renamer.js";

// Any rename into a folder named "other-device" fails the way it does across filesystems.
vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    renameSync: (from: string, to: string) => {
      if (to.includes("other-device")) {
        throw Object.assign(new Error("EXDEV: cross-device link not permitted"), { code: "EXDEV" });
      }
      actual.renameSync(from, to);
    },
  };
});

describe("moveFile across devices", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "brn-exdev-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("copies then deletes when rename fails with EXDEV", () => {
    const source = join(dir, "a.txt");
    writeFileSync(source, "payload");
    const dest = join(dir, "other-device");
    mkdirSync(dest);

    moveFile(source, join(dest, "a.txt"));

    expect(readFileSync(join(dest, "a.txt"), "utf-8")).toBe("payload");
    expect(existsSync(source)).toBe(false);
  });

  it("moves a whole batch through the fallback", () => {
    const paths = ["x.txt", "y.txt"].map((name) => {
      const path = join(dir, name);
      writeFileSync(path, name);
      return path;
    });
    const dest = join(dir, "other-device");

    const report = applyScheme(toBatchEntries(paths), { prefix: "moved_" }, dest);

    expect(report.status).toBe("success");
    expect(report.message).toBe("Moved 2 files successfully");
    expect(readFileSync(join(dest, "moved_y.txt"), "utf-8")).toBe("y.txt");
    expect(paths.some((p) => existsSync(p))).toBe(false);
  });

  it("still renames in place with a plain rename", () => {
    const source = join(dir, "keep.txt");
    writeFileSync(source, "k");
    const report = applyScheme(toBatchEntries([source]), { suffix: "_2" });
    expect(report.status).toBe("success");
    expect(existsSync(join(dir, "keep_2.txt"))).toBe(true);
  });
});
