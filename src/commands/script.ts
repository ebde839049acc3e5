/**
 * Script mode: non-interactive rename via --dir and scheme flags.
 */

import { existsSync, statSync } from "node:fs";
import { basename } from "node:path";
import pc from "picocolors";
import { applyScheme } from "../apply.js";
import { findConflicts, hasConflicts } from "../conflicts.js";
import type { ParsedArgs } from "../flags.js";
import { composeName, listFiles, previewNames, toBatchEntries } from "../renamer.js";
import type { SchemeInput } from "../scheme.js";
import { parseCaseOption, parsePosition } from "../scheme.js";
import { findUserScheme, saveUserScheme } from "../schemes-config.js";
import {
  formatConflicts,
  formatFailures,
  formatPreview,
  parseExtensions,
  PREVIEW_MAX_LINES,
} from "./common.js";

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    console.error(`Error: Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    console.error(`Error: Not a directory: ${dir}`);
    process.exit(1);
  }
}

function parseIntegerFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`--${flag} must be an integer, got "${value}"`);
  }
  return n;
}

export function parseLimit(value: string | undefined): number {
  const limit = parseIntegerFlag("limit", value) ?? PREVIEW_MAX_LINES;
  if (limit < 0) throw new Error("--limit cannot be negative");
  return limit;
}

/**
 * Build a scheme from flags. Fields given on the command line override `base`
 * (a saved scheme); the rest come from `base`. Throws on malformed values.
 */
export function schemeFromArgs(args: ParsedArgs, base: SchemeInput = {}): SchemeInput {
  let caseOption = base.caseOption;
  if (args.case !== undefined) {
    caseOption = parseCaseOption(args.case);
    if (caseOption === undefined) {
      throw new Error(`Unknown --case "${args.case}" (expected preserve, lower, upper or title)`);
    }
  }

  let position = base.numberOptions?.position;
  if (args.position !== undefined) {
    position = parsePosition(args.position);
    if (position === undefined) {
      throw new Error(`Unknown --position "${args.position}" (expected prefix or suffix)`);
    }
  }

  const padding = parseIntegerFlag("padding", args.padding) ?? base.numberOptions?.padding;
  if (padding !== undefined && padding < 1) {
    throw new Error("--padding must be at least 1");
  }

  return {
    replaceName: args.name !== undefined ? true : base.replaceName,
    newName: args.name ?? base.newName,
    prefix: args.prefix ?? base.prefix,
    suffix: args.suffix ?? base.suffix,
    find: args.find ?? base.find,
    replace: args.replace ?? base.replace,
    caseOption,
    useNumbering: args.number ? true : base.useNumbering,
    numberOptions: {
      padding,
      start: parseIntegerFlag("start", args.start) ?? base.numberOptions?.start,
      step: parseIntegerFlag("step", args.step) ?? base.numberOptions?.step,
      position,
      separator: args.separator ?? base.numberOptions?.separator,
    },
  };
}

async function loadSavedScheme(name: string | undefined): Promise<SchemeInput> {
  if (name === undefined) return {};
  const saved = await findUserScheme(name);
  if (!saved) throw new Error(`No saved scheme named "${name}"`);
  return saved.scheme;
}

async function saveIfRequested(name: string | undefined, scheme: SchemeInput): Promise<void> {
  if (name === undefined || name.trim() === "") return;
  try {
    await saveUserScheme(name.trim(), scheme);
    console.log(`Saved scheme as "${name.trim()}".`);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Could not save scheme: ${msg}`);
  }
}

export async function runScriptMode(args: ParsedArgs): Promise<void> {
  const { dir, dryRun, yes } = args;
  const dest = args.dest === "" ? undefined : args.dest;
  if (dir === undefined) {
    console.error("Error: Script mode requires --dir.");
    process.exit(1);
  }
  ensureDir(dir);

  let scheme: SchemeInput;
  let limit: number;
  try {
    scheme = schemeFromArgs(args, await loadSavedScheme(args.scheme));
    limit = parseLimit(args.limit);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    process.exit(1);
  }

  const files = listFiles(dir, parseExtensions(args.ext));
  if (files.length === 0) {
    console.log("No files in that folder.");
    process.exit(0);
  }
  const unchanged =
    dest === undefined && files.every((f, i) => composeName(f, i, scheme) === basename(f));
  if (unchanged) {
    console.log("No renames to perform (names unchanged).");
    process.exit(0);
  }

  console.log(formatPreview(previewNames(files, scheme, limit), files.length));

  const conflicts = findConflicts(files, scheme, dest);
  if (hasConflicts(conflicts)) {
    console.error(pc.red("The following issues were found:"));
    console.error(formatConflicts(conflicts));
    console.error("Please modify your renaming settings and try again.");
    process.exit(1);
  }

  if (dryRun) {
    await saveIfRequested(args.save, scheme);
    process.exit(0);
  }
  if (!yes) {
    console.error("Use --yes to apply renames in script mode.");
    process.exit(1);
  }

  const report = applyScheme(toBatchEntries(files), scheme, dest);
  for (const line of formatFailures(report)) {
    console.error(pc.red(`✗ ${line}`));
  }
  if (report.status !== "success") {
    console.error(pc.red(report.message));
    process.exit(1);
  }
  console.log(pc.green(report.message));
  await saveIfRequested(args.save, scheme);
}
