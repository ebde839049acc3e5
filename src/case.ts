/**
 * Case transformations for filename stems.
 */

import type { CaseOption } from "./scheme.js";

/** Lower-cased in title case unless first or last. */
const SMALL_WORDS = new Set([
  "a", "an", "the", "and", "but", "or", "for", "nor", "as", "at", "by",
  "from", "in", "into", "near", "of", "on", "onto", "to", "with",
]);

const SEPARATOR_SPLIT = /([\s_-]+)/;

function capitalize(word: string): string {
  if (word === "") return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function capitalizeWord(word: string): string {
  const apostrophe = word.indexOf("'");
  if (apostrophe === -1) return capitalize(word);
  return `${capitalize(word.slice(0, apostrophe))}'${capitalize(word.slice(apostrophe + 1))}`;
}

/**
 * Title-case a stem. Whitespace, hyphen and underscore runs are kept verbatim between words.
 * Small words stay lower case unless they are the first or last token: "o'connor's test" → "O'Connor's Test".
 */
export function titleCase(text: string): string {
  if (text === "") return text;
  // Capturing split: even indices are words, odd indices are separators.
  const tokens = text.split(SEPARATOR_SPLIT);
  const last = tokens.length - 1;
  return tokens
    .map((token, i) => {
      if (i % 2 === 1 || token === "") return token;
      const lower = token.toLowerCase();
      if (i !== 0 && i !== last && SMALL_WORDS.has(lower)) return lower;
      return capitalizeWord(token);
    })
    .join("");
}

export function caseTransform(stem: string, option: CaseOption): string {
  switch (option) {
    case "lower":
      return stem.toLowerCase();
    case "upper":
      return stem.toUpperCase();
    case "title":
      return titleCase(stem);
    case "preserve":
      return stem;
  }
}
