/**
 * Renaming scheme: option types, defaults, and parsing of untrusted scheme values.
 */

export type CaseOption = "preserve" | "lower" | "upper" | "title";
export type NumberPosition = "prefix" | "suffix";

export interface NumberOptions {
  readonly padding: number;
  readonly start: number;
  readonly step: number;
  readonly position: NumberPosition;
  readonly separator: string;
}

export interface SchemeConfig {
  readonly replaceName: boolean;
  readonly newName: string;
  readonly prefix: string;
  readonly suffix: string;
  readonly find: string;
  readonly replace: string;
  readonly caseOption: CaseOption;
  readonly useNumbering: boolean;
  readonly numberOptions: NumberOptions;
}

/** What callers pass in: every field optional, defaults filled by resolveScheme. */
export type SchemeInput = Partial<Omit<SchemeConfig, "numberOptions">> & {
  readonly numberOptions?: Partial<NumberOptions>;
};

export const CASE_OPTIONS: readonly CaseOption[] = ["preserve", "lower", "upper", "title"];

export const DEFAULT_NUMBER_OPTIONS: NumberOptions = {
  padding: 2,
  start: 1,
  step: 1,
  position: "suffix",
  separator: "_",
};

export const DEFAULT_SCHEME: SchemeConfig = {
  replaceName: false,
  newName: "",
  prefix: "",
  suffix: "",
  find: "",
  replace: "",
  caseOption: "preserve",
  useNumbering: false,
  numberOptions: DEFAULT_NUMBER_OPTIONS,
};

export function resolveNumberOptions(input: Partial<NumberOptions> = {}): NumberOptions {
  const d = DEFAULT_NUMBER_OPTIONS;
  return {
    padding: Math.max(1, Math.trunc(input.padding ?? d.padding)),
    start: input.start ?? d.start,
    step: input.step ?? d.step,
    position: input.position ?? d.position,
    separator: input.separator ?? d.separator,
  };
}

export function resolveScheme(input: SchemeInput = {}): SchemeConfig {
  const d = DEFAULT_SCHEME;
  return {
    replaceName: input.replaceName ?? d.replaceName,
    newName: input.newName ?? d.newName,
    prefix: input.prefix ?? d.prefix,
    suffix: input.suffix ?? d.suffix,
    find: input.find ?? d.find,
    replace: input.replace ?? d.replace,
    caseOption: input.caseOption ?? d.caseOption,
    useNumbering: input.useNumbering ?? d.useNumbering,
    numberOptions: resolveNumberOptions(input.numberOptions),
  };
}

/** Accepts the option names case-insensitively, plus "title case". */
export function parseCaseOption(value: string): CaseOption | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "title case") return "title";
  return CASE_OPTIONS.find((option) => option === normalized);
}

export function parsePosition(value: string): NumberPosition | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "prefix" || normalized === "suffix") return normalized;
  return undefined;
}

/**
 * Split a filename into stem and extension. The extension starts at the last dot,
 * and only counts when something other than dots comes before it (".bashrc" has none).
 */
export function splitExtension(filename: string): { stem: string; extension: string } {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0) return { stem: filename, extension: "" };
  for (let i = 0; i < dot; i++) {
    if (filename[i] !== ".") {
      return { stem: filename.slice(0, dot), extension: filename.slice(dot) };
    }
  }
  return { stem: filename, extension: "" };
}

const STRING_FIELDS = ["newName", "prefix", "suffix", "find", "replace"] as const;
const BOOLEAN_FIELDS = ["replaceName", "useNumbering"] as const;
const INTEGER_FIELDS = ["padding", "start", "step"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseNumberOptions(value: unknown): Partial<NumberOptions> | undefined {
  if (!isRecord(value)) return undefined;
  const out: { -readonly [K in keyof NumberOptions]?: NumberOptions[K] } = {};
  for (const key of INTEGER_FIELDS) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== "number" || !Number.isInteger(field)) return undefined;
    out[key] = field;
  }
  if (value.position !== undefined) {
    const position = typeof value.position === "string" ? parsePosition(value.position) : undefined;
    if (position === undefined) return undefined;
    out.position = position;
  }
  if (value.separator !== undefined) {
    if (typeof value.separator !== "string") return undefined;
    out.separator = value.separator;
  }
  return out;
}

/**
 * Validate a scheme read from JSON. Returns undefined when any present field has the
 * wrong type; unknown fields are ignored.
 */
export function parseSchemeInput(value: unknown): SchemeInput | undefined {
  if (!isRecord(value)) return undefined;
  const out: { -readonly [K in keyof SchemeInput]?: SchemeInput[K] } = {};
  for (const key of STRING_FIELDS) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== "string") return undefined;
    out[key] = field;
  }
  for (const key of BOOLEAN_FIELDS) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== "boolean") return undefined;
    out[key] = field;
  }
  if (value.caseOption !== undefined) {
    const caseOption =
      typeof value.caseOption === "string" ? parseCaseOption(value.caseOption) : undefined;
    if (caseOption === undefined) return undefined;
    out.caseOption = caseOption;
  }
  if (value.numberOptions !== undefined) {
    const numberOptions = parseNumberOptions(value.numberOptions);
    if (numberOptions === undefined) return undefined;
    out.numberOptions = numberOptions;
  }
  return out;
}
