export type SourceKind = "documents" | "web" | "both" | "none";

/** Where an answer should come from, with the cues that decided it. */
export type SourceRoute =
  | { kind: "documents"; reasons: string[] }
  | { kind: "web"; reasons: string[] }
  | { kind: "both"; reasons: string[] }
  | { kind: "none"; reasons: string[] };

export interface IQuestionRouter {
  route(question: string): SourceRoute;
}

export interface KeywordRouterOptions {
  personalCues?: readonly string[];
  freshnessCues?: readonly string[];
}

export const PERSONAL_CUES: readonly string[] = [
  "my notes",
  "my documents",
  "my files",
  "my docs",
  "i wrote",
  "i learned",
  "i've learned",
  "i saved",
];

export const FRESHNESS_CUES: readonly string[] = [
  "latest",
  "recent",
  "news",
  "current",
  "today",
  "this week",
  "this year",
];

/**
 * Phrase-matching router. Cues match whole words, case-insensitively, so
 * "now" never fires inside "know".
 */
export class KeywordQuestionRouter implements IQuestionRouter {
  private readonly personal: CueMatcher[];
  private readonly freshness: CueMatcher[];

  constructor(options?: KeywordRouterOptions) {
    this.personal = (options?.personalCues ?? PERSONAL_CUES).map(toMatcher);
    this.freshness = (options?.freshnessCues ?? FRESHNESS_CUES).map(toMatcher);
  }

  route(question: string): SourceRoute {
    const text = question.toLowerCase().replace(/[‘’]/g, "'");
    const personal = matching(this.personal, text);
    const fresh = matching(this.freshness, text);

    if (personal.length > 0 && fresh.length > 0) {
      return { kind: "both", reasons: [...personal, ...fresh] };
    }
    if (personal.length > 0) return { kind: "documents", reasons: personal };
    if (fresh.length > 0) return { kind: "web", reasons: fresh };
    return { kind: "none", reasons: [] };
  }
}

const defaultRouter = new KeywordQuestionRouter();

export function routeQuestion(question: string): SourceRoute {
  return defaultRouter.route(question);
}

/** Tool names an orchestrator should offer for a route. */
export function toolsForRoute(route: SourceRoute): string[] {
  switch (route.kind) {
    case "documents":
      return ["search_documents"];
    case "web":
      return ["search_web"];
    case "both":
      return ["search_documents", "search_web"];
    case "none":
      return [];
  }
}

interface CueMatcher {
  cue: string;
  pattern: RegExp;
}

function toMatcher(cue: string): CueMatcher {
  const escaped = cue.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return { cue: cue.toLowerCase(), pattern: new RegExp(`\\b${escaped}\\b`) };
}

function matching(matchers: readonly CueMatcher[], text: string): string[] {
  return matchers.filter((m) => m.pattern.test(text)).map((m) => m.cue);
}
