/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  yes: boolean;
  number: boolean;
  dir: string | undefined;
  ext: string | undefined;
  name: string | undefined;
  prefix: string | undefined;
  suffix: string | undefined;
  find: string | undefined;
  replace: string | undefined;
  case: string | undefined;
  padding: string | undefined;
  start: string | undefined;
  step: string | undefined;
  position: string | undefined;
  separator: string | undefined;
  dest: string | undefined;
  scheme: string | undefined;
  save: string | undefined;
  limit: string | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "number"] as const,
  string: [
    "dir",
    "ext",
    "name",
    "prefix",
    "suffix",
    "find",
    "replace",
    "case",
    "padding",
    "start",
    "step",
    "position",
    "separator",
    "dest",
    "scheme",
    "save",
    "limit",
  ] as const,
  alias: { h: "help", v: "version", y: "yes", n: "number" } as const,
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    yes: Boolean(raw.yes),
    number: Boolean(raw.number),
    dir: raw.dir,
    ext: raw.ext,
    name: raw.name,
    prefix: raw.prefix,
    suffix: raw.suffix,
    find: raw.find,
    replace: raw.replace,
    case: raw.case,
    padding: raw.padding,
    start: raw.start,
    step: raw.step,
    position: raw.position,
    separator: raw.separator,
    dest: raw.dest,
    scheme: raw.scheme,
    save: raw.save,
    limit: raw.limit,
  };
}

export function printHelp(): void {
  const usage = `brn – batch rename files with a naming scheme (interactive or script mode)

Usage:
  brn                    Interactive mode (prompts for folder and scheme)
  brn --help             Show this help
  brn --version          Show version
  brn --dry-run          Interactive mode, show preview only (no rename)
  brn --dir <path> [scheme options] [options]   Script mode

Scheme options (applied in this order):
  --name <text>          Replace the whole name (extension is kept)
  --prefix <text>        Text added before the name (ignored with --name)
  --suffix <text>        Text added after the name (ignored with --name)
  --find <text>          Literal text to replace in the name
  --replace <text>       Replacement for --find
  --case <option>        preserve | lower | upper | title
  --number, -n           Add a sequential number
  --padding <n>          Minimum digits of the number (default 2)
  --start <n>            First number (default 1)
  --step <n>             Increment between numbers (default 1)
  --position <where>     prefix | suffix (default suffix)
  --separator <text>     Between number and name (default "_")
  --scheme <name>        Start from a saved scheme; other options override it

Script mode options:
  --dir <path>           Directory with the files to rename
  --ext <list>           Only files with these extensions, e.g. jpg,png
  --dest <path>          Move renamed files into this folder (created if missing)
  --limit <n>            Preview lines to show (default 20)
  --save <name>          Save the scheme under this name
  --yes, -y              Apply renames without confirmation
  --dry-run              Show preview only, do not rename

Examples:
  brn
  brn --dir ./photos --prefix "trip_" --number --dry-run
  brn --dir ./photos --ext jpg --name "Holiday" --case title --number --start 10 --yes
  brn --dir ./scans --find "scan" --replace "page" --dest ./archive --yes`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
