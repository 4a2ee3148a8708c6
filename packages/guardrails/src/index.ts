/**
 * @docsage/guardrails
 *
 * Answer checks and source routing for whoever orchestrates the tools.
 * Works on answer text and tool names only.
 */

export {
  KeywordQuestionRouter,
  routeQuestion,
  toolsForRoute,
  PERSONAL_CUES,
  FRESHNESS_CUES,
} from "./router.js";
export type { SourceKind, SourceRoute, IQuestionRouter, KeywordRouterOptions } from "./router.js";

export { verifySources, detectUncertainty, enhanceResponse, TOOL_LABELS } from "./response-checks.js";
export type { SourceVerification, UncertaintyCheck } from "./response-checks.js";
