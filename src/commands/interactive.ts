/**
 * Interactive mode: prompts for folder and scheme, then preview, conflict check and confirm.
 */

import { existsSync, statSync } from "node:fs";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { applyScheme } from "../apply.js";
import { findConflicts, hasConflicts } from "../conflicts.js";
import { VERSION } from "../flags.js";
import { listFiles, previewNames, toBatchEntries } from "../renamer.js";
import type { CaseOption, NumberOptions, NumberPosition, SchemeInput } from "../scheme.js";
import { DEFAULT_NUMBER_OPTIONS } from "../scheme.js";
import { readUserSchemes, saveUserScheme } from "../schemes-config.js";
import {
  formatConflicts,
  formatFailures,
  formatPreview,
  parseExtensions,
  PREVIEW_MAX_LINES,
} from "./common.js";

function exitIfCancel(value: unknown): asserts value is string | boolean {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
}

function exitIfCancelSelect<T extends string>(value: unknown, allowed: readonly T[]): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return match;
}

interface TextQuestion {
  message: string;
  placeholder?: string;
  initialValue?: string;
  validate?: (value: string | undefined) => string | undefined;
}

async function askText(question: TextQuestion): Promise<string> {
  const result = await p.text({ ...question, defaultValue: question.initialValue ?? "" });
  exitIfCancel(result);
  return typeof result === "string" ? result : "";
}

function validateInteger(min?: number): (value: string | undefined) => string | undefined {
  return (value = "") => {
    const n = Number(value);
    if (value.trim() === "" || !Number.isInteger(n)) return "Enter a whole number";
    if (min !== undefined && n < min) return `Must be at least ${min}`;
    return undefined;
  };
}

async function askInteger(message: string, initial: number, min?: number): Promise<number> {
  const value = await askText({ message, initialValue: String(initial), validate: validateInteger(min) });
  return Number(value);
}

const CASE_CHOICES: readonly CaseOption[] = ["preserve", "lower", "upper", "title"];
const POSITION_CHOICES: readonly NumberPosition[] = ["suffix", "prefix"];

async function askNumberOptions(): Promise<NumberOptions> {
  const d = DEFAULT_NUMBER_OPTIONS;
  const padding = await askInteger("Minimum digits", d.padding, 1);
  const start = await askInteger("Start at", d.start);
  const step = await askInteger("Step", d.step);
  const positionResult = await p.select({
    message: "Number position",
    options: [
      { value: "suffix", label: "After the name" },
      { value: "prefix", label: "Before the name" },
    ],
  });
  const position = exitIfCancelSelect(positionResult, POSITION_CHOICES);
  const separator = await askText({ message: "Separator", initialValue: d.separator });
  return { padding, start, step, position, separator };
}

async function askScheme(): Promise<SchemeInput> {
  const newName = await askText({
    message: "New name (leave empty to keep the original name)",
    placeholder: "e.g. Holiday",
  });
  const replaceName = newName !== "";

  let prefix = "";
  let suffix = "";
  if (!replaceName) {
    prefix = await askText({ message: "Prefix", placeholder: "optional" });
    suffix = await askText({ message: "Suffix", placeholder: "optional" });
  }

  const find = await askText({ message: "Find (literal text)", placeholder: "optional" });
  const replace = find !== "" ? await askText({ message: "Replace with", placeholder: "empty removes it" }) : "";

  const caseResult = await p.select({
    message: "Case",
    options: [
      { value: "preserve", label: "Preserve" },
      { value: "lower", label: "lower case" },
      { value: "upper", label: "UPPER CASE" },
      { value: "title", label: "Title Case" },
    ],
  });
  const caseOption = exitIfCancelSelect(caseResult, CASE_CHOICES);

  const numberResult = await p.confirm({ message: "Add sequential numbers?", initialValue: false });
  exitIfCancel(numberResult);
  const useNumbering = numberResult === true;
  const numberOptions = useNumbering ? await askNumberOptions() : DEFAULT_NUMBER_OPTIONS;

  return { replaceName, newName, prefix, suffix, find, replace, caseOption, useNumbering, numberOptions };
}

/** Saved scheme if the user picks one, otherwise undefined to build a new one. */
async function chooseSavedScheme(): Promise<SchemeInput | undefined> {
  const saved = await readUserSchemes();
  if (saved.length === 0) return undefined;
  const options = saved.map((s, i) => ({ value: String(i), label: s.name }));
  options.unshift({ value: "new", label: "New scheme…" });
  const choice = await p.select({ message: "Choose a scheme", options });
  if (p.isCancel(choice)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  if (choice === "new") return undefined;
  return saved[Number(choice)]?.scheme;
}

async function offerToSave(scheme: SchemeInput): Promise<void> {
  const saveResult = await p.confirm({
    message: "Save this scheme to your list?",
    initialValue: false,
  });
  if (p.isCancel(saveResult) || !saveResult) return;
  const nameResult = await p.text({
    message: "Scheme name",
    placeholder: "e.g. Holiday photos",
  });
  if (p.isCancel(nameResult) || typeof nameResult !== "string" || !nameResult.trim()) return;
  try {
    await saveUserScheme(nameResult.trim(), scheme);
    p.log.success(`Saved as "${nameResult.trim()}".`);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    p.log.error(`Could not save scheme: ${msg}`);
  }
}

export async function runInteractive(dryRun: boolean): Promise<void> {
  p.intro(pc.bold(pc.magenta(`brn – batch file renamer v${VERSION}`)));

  const dir = await askText({
    message: "Folder with the files to rename",
    initialValue: process.cwd(),
    validate: (value = "") => (value.trim() === "" ? "Enter a folder" : undefined),
  });

  if (!existsSync(dir)) {
    p.log.error(`Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    p.log.error(`Not a directory: ${dir}`);
    process.exit(1);
  }

  const extInput = await askText({
    message: "Only these extensions (comma-separated, empty for all files)",
    placeholder: "e.g. jpg,png",
  });
  const files = listFiles(dir, parseExtensions(extInput));
  if (files.length === 0) {
    p.log.message("No files in that folder. Exiting.");
    process.exit(0);
  }
  p.log.info(`${files.length} files selected`);

  const savedScheme = await chooseSavedScheme();
  const scheme = savedScheme ?? (await askScheme());

  p.note(formatPreview(previewNames(files, scheme, PREVIEW_MAX_LINES), files.length), "Preview");

  if (dryRun) {
    const inPlace = findConflicts(files, scheme);
    if (hasConflicts(inPlace)) {
      p.note(formatConflicts(inPlace), "Renaming issues");
    }
    p.note("Dry run: no files were renamed.", "Done");
    p.outro(pc.green("Done."));
    process.exit(0);
  }

  const moveResult = await p.confirm({
    message: "Move the renamed files to another folder?",
    initialValue: false,
  });
  exitIfCancel(moveResult);
  let destination: string | undefined;
  if (moveResult) {
    destination = await askText({
      message: "Destination folder (created if missing)",
      validate: (value = "") => (value.trim() === "" ? "Enter a folder" : undefined),
    });
  }

  const conflicts = findConflicts(files, scheme, destination);
  if (hasConflicts(conflicts)) {
    p.note(formatConflicts(conflicts), "Renaming issues");
    p.outro(pc.yellow("Please modify your renaming settings and try again."));
    process.exit(1);
  }

  const action = destination !== undefined ? "Move" : "Rename";
  const target = destination !== undefined ? ` to ${destination}` : "";
  const confirmResult = await p.confirm({
    message: `${action} ${files.length} files${target}? This cannot be undone.`,
    initialValue: false,
  });
  exitIfCancel(confirmResult);
  if (!confirmResult) {
    p.cancel("Rename cancelled.");
    process.exit(0);
  }

  const s = p.spinner();
  s.start("Renaming…");
  const report = applyScheme(toBatchEntries(files), scheme, destination, {
    onProgress: (done, total) => s.message(`Renaming… ${done}/${total}`),
  });
  s.stop(report.message);

  for (const line of formatFailures(report)) {
    p.log.error(line);
  }
  if (report.status !== "success") {
    p.outro(pc.red(report.status === "partial" ? "Some files could not be renamed." : "Nothing was renamed."));
    process.exit(1);
  }

  if (savedScheme === undefined) {
    await offerToSave(scheme);
  }

  p.note("Files updated.", "Done");
  p.outro(pc.green("Done."));
}
