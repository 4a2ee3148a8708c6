import { describe, it, expect } from "vitest";
import { KeywordQuestionRouter, routeQuestion, toolsForRoute } from "./router.js";

describe("routeQuestion", () => {
  it("sends personal questions to the documents", () => {
    expect(routeQuestion("What are my notes on RAG?")).toEqual({
      kind: "documents",
      reasons: ["my notes"],
    });
  });

  it("sends questions about current events to the web", () => {
    expect(routeQuestion("What are the latest advances in RAG systems?")).toEqual({
      kind: "web",
      reasons: ["latest"],
    });
  });

  it("uses both sources when a question mixes the two", () => {
    const route = routeQuestion(
      "How do recent RAG advances compare to what I’ve learned in my notes?",
    );

    expect(route).toEqual({ kind: "both", reasons: ["my notes", "i've learned", "recent"] });
  });

  it("routes nowhere without cues", () => {
    expect(routeQuestion("What is two plus two?")).toEqual({ kind: "none", reasons: [] });
  });

  it("matches whole words only", () => {
    expect(routeQuestion("Is the currently deployed model accurate?").kind).toBe("none");
  });
});

describe("KeywordQuestionRouter", () => {
  it("takes custom cues", () => {
    const router = new KeywordQuestionRouter({ personalCues: ["journal"], freshnessCues: [] });

    expect(router.route("Check my Journal").kind).toBe("documents");
    expect(router.route("latest news").kind).toBe("none");
  });
});

describe("toolsForRoute", () => {
  it("maps each route to tool names", () => {
    expect(toolsForRoute({ kind: "documents", reasons: [] })).toEqual(["search_documents"]);
    expect(toolsForRoute({ kind: "web", reasons: [] })).toEqual(["search_web"]);
    expect(toolsForRoute({ kind: "both", reasons: [] })).toEqual([
      "search_documents",
      "search_web",
    ]);
    expect(toolsForRoute({ kind: "none", reasons: [] })).toEqual([]);
  });
});
