#!/usr/bin/env node
/**
 * brn – batch file renamer CLI
 * Supports --help, --version, --dry-run, and script mode (--dir plus scheme flags, --dest, --yes).
 */

import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { parseArgs, printHelp, printVersion } from "./flags.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.dir !== undefined) {
    await runScriptMode(args);
    return;
  }

  await runInteractive(args.dryRun);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error("Error:", msg);
  process.exit(1);
});
