/**
 * Sequential numbering: batch index → padded label, spliced into a stem.
 */

import type { NumberOptions } from "./scheme.js";
import { resolveNumberOptions, splitExtension } from "./scheme.js";

/**
 * start + index * step, zero-padded to at least `padding` digits. Wider numbers are not
 * truncated; a minus sign goes in front of the zeros.
 */
export function formatNumber(index: number, padding = 2, start = 1, step = 1): string {
  const value = start + index * step;
  if (value < 0) {
    return `-${String(-value).padStart(padding - 1, "0")}`;
  }
  return String(value).padStart(padding, "0");
}

export function numberStem(stem: string, index: number, options: NumberOptions): string {
  const label = formatNumber(index, options.padding, options.start, options.step);
  return options.position === "prefix"
    ? `${label}${options.separator}${stem}`
    : `${stem}${options.separator}${label}`;
}

/** Number a full filename; the extension stays at the end. */
export function addSequentialNumber(
  filename: string,
  index: number,
  options: Partial<NumberOptions> = {},
): string {
  const { stem, extension } = splitExtension(filename);
  return numberStem(stem, index, resolveNumberOptions(options)) + extension;
}
