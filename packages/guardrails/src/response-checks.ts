export interface SourceVerification {
  hasSources: boolean;
  citedTools: string[];
  /** 0.9 sourced, 0.7 tools used but not cited, 0.5 no tools. */
  confidence: number;
}

export interface UncertaintyCheck {
  isUncertain: boolean;
  shouldAskClarification: boolean;
}

const SOURCE_WORDS = ["documents", "web", "search", "notes"];

const UNCERTAINTY_PHRASES = [
  "not sure",
  "don't know",
  "cannot find",
  "unclear",
  "uncertain",
  "unable to",
  "don't have",
  "couldn't find",
  "no information",
];

export const TOOL_LABELS: Readonly<Record<string, string>> = {
  search_documents: "your documents",
  search_web: "web search",
};

export function verifySources(answer: string, toolsUsed: readonly string[]): SourceVerification {
  const hasLink = answer.includes("http") || answer.includes("Source:");
  const lower = answer.toLowerCase();
  const mentionsTool = SOURCE_WORDS.some((word) => lower.includes(word));
  const hasSources = hasLink || mentionsTool;

  let confidence = 0.5;
  if (toolsUsed.length > 0) {
    confidence = hasSources ? 0.9 : 0.7;
  }

  return { hasSources, citedTools: [...toolsUsed], confidence };
}

export function detectUncertainty(answer: string): UncertaintyCheck {
  const lower = answer.toLowerCase().replace(/[‘’]/g, "'");
  const isUncertain = UNCERTAINTY_PHRASES.some((phrase) => lower.includes(phrase));
  return { isUncertain, shouldAskClarification: isUncertain };
}

/**
 * Appends a sources note when tools were used but the answer does not say
 * where it came from. Otherwise the answer is returned unchanged.
 */
export function enhanceResponse(answer: string, toolsUsed: readonly string[]): string {
  if (toolsUsed.length === 0 || verifySources(answer, toolsUsed).hasSources) {
    return answer;
  }
  const labels = toolsUsed.map((tool) => TOOL_LABELS[tool] ?? tool);
  return `${answer}\n\n*Sources: ${labels.join(", ")}*`;
}
