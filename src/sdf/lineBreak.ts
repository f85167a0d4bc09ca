/**
 * Greedy line breaking.
 *
 * Text is split into paragraphs at mandatory breaks, then each paragraph is
 * filled word by word. Break opportunities follow runs of spaces or tabs and
 * hyphens. A word wider than the line is broken between characters.
 */

import { MAX_LAYOUT_WIDTH } from "./types";

const MANDATORY_BREAK = /\r\n|[\n\r\v\f\u0085\u2028\u2029]/;
const SEGMENT = /[^ \t-]*(?:-+|[ \t]+)|[^ \t-]+/g;

/** True when `maxWidth` means "never wrap" */
export function isUnbounded(maxWidth: number): boolean {
  return !(maxWidth > 0 && maxWidth < MAX_LAYOUT_WIDTH);
}

function trimTrailing(line: string): string {
  return line.replace(/[ \t]+$/, "");
}

/**
 * Break `text` into lines no wider than `maxWidth`.
 *
 * @param measure - Pixel width of a string
 * @returns One entry per line, trailing spaces removed; [] for empty text
 */
export function breakLines(
  text: string,
  maxWidth: number,
  measure: (line: string) => number
): string[] {
  if (text.length === 0) return [];

  const paragraphs = text.split(MANDATORY_BREAK);
  if (isUnbounded(maxWidth)) return paragraphs;

  const fits = (line: string) => measure(trimTrailing(line)) <= maxWidth;
  const lines: string[] = [];

  for (const paragraph of paragraphs) {
    let line = "";

    for (const segment of paragraph.match(SEGMENT) ?? []) {
      if (fits(line + segment)) {
        line += segment;
        continue;
      }
      if (line.length > 0) {
        lines.push(trimTrailing(line));
        line = "";
      }
      if (fits(segment)) {
        line = segment;
        continue;
      }

      // At least one character per line
      for (const ch of segment) {
        if (line.length === 0 || fits(line + ch)) {
          line += ch;
        } else {
          lines.push(trimTrailing(line));
          line = ch;
        }
      }
    }

    lines.push(trimTrailing(line));
  }

  return lines;
}
