import { routeQuestion, toolsForRoute } from "@docsage/guardrails";

export function runRoute(question: string): string {
  const route = routeQuestion(question);
  const tools = toolsForRoute(route);

  return [
    `Route: ${route.kind}`,
    `Cues: ${route.reasons.length > 0 ? route.reasons.join(", ") : "(none)"}`,
    `Tools: ${tools.length > 0 ? tools.join(", ") : "(none)"}`,
  ].join("\n");
}
