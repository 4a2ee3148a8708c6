/**
 * Canonical whitespace: three or more newlines become a paragraph break,
 * runs of spaces become one space, and the ends are trimmed.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\n{3,}/g, "\n\n")
    .replace(/ {2,}/g, " ")
    .trim();
}
