import { describe, it, expect } from "vitest";
import { ValidationError } from "@docsage/errors";
import { parseRouteArgs, parseSearchArgs } from "./args.js";

describe("parseSearchArgs", () => {
  it("reads files, options and the query", () => {
    expect(
      parseSearchArgs(["-k", "5", "--skip-failed", "--file", "a.txt", "-f", "b.pdf", "--", "chunk", "size"]),
    ).toEqual({ files: ["a.txt", "b.pdf"], query: "chunk size", topK: 5, skipFailed: true });
  });

  it("takes bare arguments before -- as files", () => {
    expect(parseSearchArgs(["a.txt", "b.txt", "--", "notes"])).toEqual({
      files: ["a.txt", "b.txt"],
      query: "notes",
      topK: undefined,
      skipFailed: false,
    });
  });

  it("keeps flags after -- as part of the query", () => {
    expect(parseSearchArgs(["a.txt", "--", "what", "is", "-k"]).query).toBe("what is -k");
  });

  it.each([
    [["--", "query"]],
    [["a.txt"]],
    [["a.txt", "--"]],
    [["-k", "0", "a.txt", "--", "q"]],
    [["-k", "two", "a.txt", "--", "q"]],
    [["--file"]],
    [["--verbose", "a.txt", "--", "q"]],
  ])("rejects %j", (args) => {
    expect(() => parseSearchArgs(args)).toThrow(ValidationError);
  });
});

describe("parseRouteArgs", () => {
  it("joins the words of the question", () => {
    expect(parseRouteArgs(["What", "are", "my", "notes?"])).toBe("What are my notes?");
  });

  it("requires a question", () => {
    expect(() => parseRouteArgs([])).toThrow(ValidationError);
  });
});
