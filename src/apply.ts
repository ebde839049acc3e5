/**
 * Batch apply: rename in place or move into a destination, one file at a time.
 * A failing file is recorded and the batch carries on.
 */

import { constants, copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from "node:fs";
import { isSameFile, targetPath } from "./conflicts.js";
import type { BatchEntry } from "./renamer.js";
import { composeName } from "./renamer.js";
import type { SchemeInput } from "./scheme.js";

export type OutcomeLabel =
  | "success"
  | "file-not-found"
  | "permission-denied"
  | "destination-exists"
  | "error";

export type BatchStatus = "success" | "partial" | "error";

export interface EntryResult {
  readonly originalPath: string;
  /** Computed target path; set on failures too. */
  readonly newPath: string;
  readonly outcome: OutcomeLabel;
  readonly message: string;
}

export interface OutcomeReport {
  readonly status: BatchStatus;
  readonly results: EntryResult[];
  readonly message: string;
}

export interface ApplyOptions {
  /** Called after each entry with the number processed so far. */
  onProgress?: (done: number, total: number) => void;
}

export class DestinationExistsError extends Error {
  constructor(readonly target: string) {
    super(`Destination file already exists: ${target}`);
    this.name = "DestinationExistsError";
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function classifyError(err: unknown): { outcome: Exclude<OutcomeLabel, "success">; message: string } {
  if (err instanceof DestinationExistsError) {
    return { outcome: "destination-exists", message: "Destination file already exists" };
  }
  switch (errorCode(err)) {
    case "ENOENT":
      return { outcome: "file-not-found", message: "File not found" };
    case "EACCES":
    case "EPERM":
      return { outcome: "permission-denied", message: "Permission denied" };
    case "EEXIST":
    case "ENOTEMPTY":
      return { outcome: "destination-exists", message: "Destination file already exists" };
    default: {
      const msg = err instanceof Error ? err.message : String(err);
      return { outcome: "error", message: `Error: ${msg}` };
    }
  }
}

function refuseOverwrite(from: string, to: string): void {
  if (existsSync(to) && !isSameFile(from, to)) {
    throw new DestinationExistsError(to);
  }
}

/** Same-directory rename that never replaces another file. */
export function renameFile(from: string, to: string): void {
  refuseOverwrite(from, to);
  renameSync(from, to);
}

/** Move that falls back to copy + delete when source and target are on different devices. */
export function moveFile(from: string, to: string): void {
  refuseOverwrite(from, to);
  try {
    renameSync(from, to);
  } catch (err: unknown) {
    if (errorCode(err) !== "EXDEV") throw err;
    copyFileSync(from, to, constants.COPYFILE_EXCL);
    unlinkSync(from);
  }
}

function summarize(verb: string, successCount: number, errorCount: number): string {
  let message = `${verb} ${successCount} files successfully`;
  if (errorCount > 0) message += `, ${errorCount} failed`;
  return message;
}

export function applyScheme(
  entries: readonly BatchEntry[],
  scheme: SchemeInput,
  destinationFolder?: string,
  options: ApplyOptions = {},
): OutcomeReport {
  const destination = destinationFolder === "" ? undefined : destinationFolder;

  if (destination !== undefined && !existsSync(destination)) {
    try {
      mkdirSync(destination, { recursive: true });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      return {
        status: "error",
        results: [],
        message: `Failed to create destination folder: ${msg}`,
      };
    }
  }

  const results: EntryResult[] = [];
  let successCount = 0;
  let errorCount = 0;

  for (const { path, index } of entries) {
    const newPath = targetPath(path, composeName(path, index, scheme), destination);
    try {
      if (destination !== undefined) {
        moveFile(path, newPath);
      } else {
        renameFile(path, newPath);
      }
      results.push({
        originalPath: path,
        newPath,
        outcome: "success",
        message: destination !== undefined ? "Moved" : "Renamed",
      });
      successCount++;
    } catch (err: unknown) {
      results.push({ originalPath: path, newPath, ...classifyError(err) });
      errorCount++;
    }
    options.onProgress?.(results.length, entries.length);
  }

  const status: BatchStatus =
    errorCount === 0 ? "success" : successCount > 0 ? "partial" : "error";
  return {
    status,
    results,
    message: summarize(destination !== undefined ? "Moved" : "Renamed", successCount, errorCount),
  };
}
