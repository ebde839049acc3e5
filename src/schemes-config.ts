/**
 * Saved schemes: global user config (~/.brn/schemes.json).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import type { SchemeInput } from "./scheme.js";
import { parseSchemeInput } from "./scheme.js";

export interface SavedScheme {
  name: string;
  scheme: SchemeInput;
}

const BRN_DIR = join(homedir(), ".brn");
export const SCHEMES_PATH = join(BRN_DIR, "schemes.json");

function parseEntry(obj: unknown): SavedScheme | undefined {
  if (obj === null || typeof obj !== "object") return undefined;
  const o = obj as Record<string, unknown>;
  if (typeof o.name !== "string" || o.name.length === 0) return undefined;
  const scheme = parseSchemeInput(o.scheme);
  return scheme === undefined ? undefined : { name: o.name, scheme };
}

/**
 * Load saved schemes. Returns [] if the file is missing or invalid; bad entries are dropped.
 */
export async function readUserSchemes(path: string = SCHEMES_PATH): Promise<SavedScheme[]> {
  try {
    const raw = await readFile(path, "utf-8");
    const data = JSON.parse(raw) as unknown;
    if (!Array.isArray(data)) return [];
    const out: SavedScheme[] = [];
    for (const entry of data) {
      const parsed = parseEntry(entry);
      if (parsed) out.push(parsed);
    }
    return out;
  } catch {
    return [];
  }
}

export async function findUserScheme(
  name: string,
  path: string = SCHEMES_PATH,
): Promise<SavedScheme | undefined> {
  const schemes = await readUserSchemes(path);
  return schemes.find((s) => s.name === name);
}

/**
 * Save a scheme under `name`, replacing an earlier one with the same name.
 * Creates the config directory if needed. Throws on write error.
 */
export async function saveUserScheme(
  name: string,
  scheme: SchemeInput,
  path: string = SCHEMES_PATH,
): Promise<void> {
  const current = (await readUserSchemes(path)).filter((s) => s.name !== name);
  current.push({ name, scheme });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(current, null, 2), "utf-8");
}
