/** Measured advance width of a string, in points. */
export type Measure = (text: string) => number;

export const ELLIPSIS = "…";

/**
 * Greedy word wrap. Every returned line measures <= maxWidth, except a
 * single character that is wider than maxWidth by itself. Words wider than
 * the line are hard-cut into chunks that fit. Empty input gives [""].
 */
export function wrapText(text: string, measure: Measure, maxWidth: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let line = "";

  for (const word of words) {
    const candidate = line ? `${line} ${word}` : word;
    if (measure(candidate) <= maxWidth) {
      line = candidate;
      continue;
    }
    if (line) lines.push(line);
    line = "";

    if (measure(word) <= maxWidth) {
      line = word;
      continue;
    }

    // Hard cut; the last chunk stays open so the next word can follow it.
    let cut = "";
    for (const ch of Array.from(word)) {
      if (cut && measure(cut + ch) > maxWidth) {
        lines.push(cut);
        cut = "";
      }
      cut += ch;
    }
    line = cut;
  }

  if (line) lines.push(line);
  return lines.length ? lines : [""];
}

/** Shortens `text` until `text + …` fits; always ends in the ellipsis. */
export function withEllipsis(text: string, measure: Measure, maxWidth: number): string {
  const chars = Array.from(text.trimEnd());
  while (chars.length > 0 && measure(chars.join("") + ELLIPSIS) > maxWidth) {
    chars.pop();
  }
  return chars.join("").trimEnd() + ELLIPSIS;
}

/** Returns `text` unchanged when it fits, otherwise shortened with an ellipsis. */
export function ellipsize(text: string, measure: Measure, maxWidth: number): string {
  return measure(text) <= maxWidth ? text : withEllipsis(text, measure, maxWidth);
}

/** Caps a snippet at `maxChars` characters, ellipsis included. */
export function truncate(text: string, maxChars: number): string {
  const clean = text.replace(/\s+/g, " ").trim();
  const chars = Array.from(clean);
  if (chars.length <= maxChars) return clean;
  return chars.slice(0, Math.max(0, maxChars - 1)).join("").trimEnd() + ELLIPSIS;
}
