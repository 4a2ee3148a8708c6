import { describe, it, expect } from "vitest";
import { normalizeText } from "./normalize.js";

describe("normalizeText", () => {
  it("collapses three or more newlines to two", () => {
    expect(normalizeText("a\n\n\nb\n\n\n\n\nc")).toBe("a\n\nb\n\nc");
  });

  it("keeps single and double newlines", () => {
    expect(normalizeText("a\nb\n\nc")).toBe("a\nb\n\nc");
  });

  it("collapses runs of spaces", () => {
    expect(normalizeText("one   two  three four")).toBe("one two three four");
  });

  it("trims surrounding whitespace", () => {
    expect(normalizeText("  \n\t text \n ")).toBe("text");
  });

  it("returns empty string for empty or blank input", () => {
    expect(normalizeText("")).toBe("");
    expect(normalizeText(" \n\n\n ")).toBe("");
  });

  it("is idempotent", () => {
    const samples = [
      "x \n\n\n\n y",
      "  a  \n  \n\n\n  b  ",
      "\n\n\n\n",
      "tab\t\tstays",
      "mixed \n \n \n end",
      "already clean.",
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
