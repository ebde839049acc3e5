/**
 * Pure renamer logic: list files, compose new names from a scheme, build previews.
 */

import { readdirSync, lstatSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { caseTransform } from "./case.js";
import { numberStem } from "./numbering.js";
import type { SchemeInput } from "./scheme.js";
import { resolveScheme, splitExtension } from "./scheme.js";

/** One rename operation: original filename → new filename */
export interface RenameEntry {
  readonly oldName: string;
  readonly newName: string;
}

/** A file and its fixed position in the batch; the position drives numbering. */
export interface BatchEntry {
  readonly path: string;
  readonly index: number;
}

export const DEFAULT_PREVIEW_COUNT = 5;

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Absolute paths of the regular files in `dir`, sorted by name. With `extensions`,
 * only files whose extension matches one of them (case-insensitive) are kept.
 */
export function listFiles(dir: string, extensions?: readonly string[]): string[] {
  const root = resolve(dir);
  const wanted =
    extensions !== undefined && extensions.length > 0
      ? new Set(extensions.map(normalizeExtension))
      : undefined;
  const names = readdirSync(root).sort();
  const files: string[] = [];
  for (const name of names) {
    if (wanted && !wanted.has(splitExtension(name).extension.toLowerCase())) continue;
    try {
      if (lstatSync(join(root, name)).isFile()) files.push(join(root, name));
    } catch {
      // Skip entries we can't stat (e.g. permission denied)
    }
  }
  return files;
}

export function toBatchEntries(paths: readonly string[]): BatchEntry[] {
  return paths.map((path, index) => ({ path, index }));
}

/**
 * New filename (no directory) for one file at `index` of the batch. Stages run in a
 * fixed order: replace-name or prefix/suffix, find/replace, case, numbering. The
 * original extension is carried through unchanged.
 */
export function composeName(originalPath: string, index: number, input: SchemeInput = {}): string {
  const scheme = resolveScheme(input);
  const { stem: originalStem, extension } = splitExtension(basename(originalPath));

  let stem = scheme.replaceName
    ? scheme.newName
    : `${scheme.prefix}${originalStem}${scheme.suffix}`;

  if (scheme.find !== "") {
    stem = stem.split(scheme.find).join(scheme.replace);
  }
  if (scheme.caseOption !== "preserve") {
    stem = caseTransform(stem, scheme.caseOption);
  }
  if (scheme.useNumbering) {
    stem = numberStem(stem, index, scheme.numberOptions);
  }
  return stem + extension;
}

/** The first `count` files with their would-be names. */
export function previewNames(
  paths: readonly string[],
  scheme: SchemeInput,
  count = DEFAULT_PREVIEW_COUNT,
): RenameEntry[] {
  return paths.slice(0, Math.max(0, count)).map((path, index) => ({
    oldName: basename(path),
    newName: composeName(path, index, scheme),
  }));
}
