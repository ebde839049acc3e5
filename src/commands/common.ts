/**
 * Shared utilities for script and interactive commands.
 */

import { basename } from "node:path";
import type { OutcomeReport } from "../apply.js";
import type { ConflictEntry, ConflictReport } from "../conflicts.js";
import type { RenameEntry } from "../renamer.js";

export const PREVIEW_MAX_LINES = 20;
export const CONFLICT_MAX_LINES = 5;

export function formatPreview(renames: readonly RenameEntry[], total: number): string {
  const lines = renames.map((r) => `${r.oldName} → ${r.newName}`);
  if (total > renames.length) {
    lines.push(`… and ${total - renames.length} more files`);
  }
  return lines.join("\n");
}

function formatSection(title: string, entries: readonly ConflictEntry[], maxLines: number): string[] {
  const lines = [`${title}:`];
  for (const { originalPath, newName } of entries.slice(0, maxLines)) {
    lines.push(`- ${basename(originalPath)} → ${newName}`);
  }
  if (entries.length > maxLines) {
    lines.push(`… and ${entries.length - maxLines} more`);
  }
  return lines;
}

export function formatConflicts(report: ConflictReport, maxLines = CONFLICT_MAX_LINES): string {
  const sections: string[][] = [];
  if (report.duplicates.length > 0) {
    sections.push(formatSection("Duplicate new names", report.duplicates, maxLines));
  }
  if (report.invalidChars.length > 0) {
    sections.push(formatSection("Names with invalid characters", report.invalidChars, maxLines));
  }
  if (report.existingFiles.length > 0) {
    sections.push(formatSection("Would overwrite existing files", report.existingFiles, maxLines));
  }
  return sections.map((lines) => lines.join("\n")).join("\n\n");
}

/** One line per failed file, in batch order. */
export function formatFailures(report: OutcomeReport): string[] {
  return report.results
    .filter((r) => r.outcome !== "success")
    .map((r) => `${basename(r.originalPath)}: ${r.message}`);
}

export function parseExtensions(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const exts = value
    .split(",")
    .map((e) => e.trim())
    .filter((e) => e !== "");
  return exts.length > 0 ? exts : undefined;
}
