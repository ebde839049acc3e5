/**
 * Pre-flight checks: duplicate targets, illegal characters, and overwrites. Read-only.
 */

import { existsSync, statSync } from "node:fs";
import { dirname, join, normalize, resolve } from "node:path";
import { composeName } from "./renamer.js";
import type { SchemeInput } from "./scheme.js";

export interface ConflictEntry {
  readonly originalPath: string;
  readonly newName: string;
}

export interface ConflictReport {
  readonly duplicates: ConflictEntry[];
  readonly invalidChars: ConflictEntry[];
  readonly existingFiles: ConflictEntry[];
}

export interface ConflictOptions {
  /** Decides the illegal character set. Defaults to the current platform. */
  platform?: NodeJS.Platform;
}

const WINDOWS_ILLEGAL = /[\\/:*?"<>|]/;
const POSIX_ILLEGAL = /\//;

export function illegalCharacterPattern(platform: NodeJS.Platform = process.platform): RegExp {
  return platform === "win32" ? WINDOWS_ILLEGAL : POSIX_ILLEGAL;
}

/** The path a file would end up at: next to the original, or inside the destination. An empty destination means none. */
export function targetPath(
  originalPath: string,
  newName: string,
  destinationFolder?: string,
): string {
  const folder =
    destinationFolder === undefined || destinationFolder === ""
      ? dirname(originalPath)
      : destinationFolder;
  return join(folder, newName);
}

/**
 * True when `a` and `b` name the same file: equal once normalized, or differing only in
 * case and sharing an inode (a case-only rename on a case-insensitive filesystem).
 * Hard links under another name are different files.
 */
export function isSameFile(a: string, b: string): boolean {
  const pa = normalize(resolve(a));
  const pb = normalize(resolve(b));
  if (pa === pb) return true;
  if (pa.toLowerCase() !== pb.toLowerCase()) return false;
  try {
    const sa = statSync(a);
    const sb = statSync(b);
    return sa.dev === sb.dev && sa.ino === sb.ino;
  } catch {
    return false;
  }
}

export function findConflicts(
  paths: readonly string[],
  scheme: SchemeInput,
  destinationFolder?: string,
  options: ConflictOptions = {},
): ConflictReport {
  const report: ConflictReport = { duplicates: [], invalidChars: [], existingFiles: [] };
  const illegal = illegalCharacterPattern(options.platform);
  const firstProducer = new Map<string, string>();

  paths.forEach((originalPath, index) => {
    const newName = composeName(originalPath, index, scheme);
    const entry: ConflictEntry = { originalPath, newName };

    if (illegal.test(newName)) report.invalidChars.push(entry);

    if (firstProducer.has(newName)) {
      report.duplicates.push(entry);
    } else {
      firstProducer.set(newName, originalPath);
    }

    const target = targetPath(originalPath, newName, destinationFolder);
    if (existsSync(target) && !isSameFile(originalPath, target)) {
      report.existingFiles.push(entry);
    }
  });

  return report;
}

export function hasConflicts(report: ConflictReport): boolean {
  return (
    report.duplicates.length > 0 ||
    report.invalidChars.length > 0 ||
    report.existingFiles.length > 0
  );
}
