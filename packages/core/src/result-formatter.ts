import type { SearchHit } from "@docsage/types";

export const SEARCH_RESULTS_HEADER = "Document Search Results:";

/**
 * Numbered, best-first listing of hits with their source and distance.
 * The distance is shown as-is; weak matches are not filtered out.
 */
export function formatSearchResults(hits: readonly SearchHit[]): string {
  let formatted = `${SEARCH_RESULTS_HEADER}\n\n`;

  for (const hit of hits) {
    formatted += `[${String(hit.rank)}] From: ${hit.sourceName}\n`;
    formatted += `    ${hit.excerpt}\n`;
    formatted += `    (Relevance distance: ${hit.distance.toFixed(4)})\n\n`;
  }

  return formatted;
}

/**
 * First `maxChars` characters of `text`, counted in code points so a
 * surrogate pair is never cut in half.
 */
export function excerpt(text: string, maxChars: number): string {
  const chars = Array.from(text);
  return chars.length <= maxChars ? text : chars.slice(0, maxChars).join("");
}
