import { describe, it, expect } from "vitest";
import { EmptyIndexError, ValidationError } from "@docsage/errors";
import { FlatL2Index } from "./flat-l2-index.js";

const VECTORS = [
  [0, 0],
  [3, 4],
  [1, 1],
  [-2, 0],
  [0.5, 0],
];

describe("FlatL2Index", () => {
  it("starts empty", () => {
    const index = new FlatL2Index();
    expect(index.size).toBe(0);
    expect(index.dimensions).toBe(0);
  });

  it("returns the k nearest by squared distance, nearest first", () => {
    const index = new FlatL2Index();
    index.build(VECTORS);

    expect(index.query([0, 0], 3)).toEqual([
      { position: 0, distance: 0 },
      { position: 4, distance: 0.25 },
      { position: 2, distance: 2 },
    ]);
  });

  it("returns every vector when k exceeds the index size", () => {
    const index = new FlatL2Index();
    index.build(VECTORS);

    const matches = index.query([1, 0], 10);

    expect(matches).toHaveLength(VECTORS.length);
    expect(matches.map((m) => m.position).sort()).toEqual([0, 1, 2, 3, 4]);
    for (let i = 1; i < matches.length; i++) {
      expect(matches[i]?.distance).toBeGreaterThanOrEqual(matches[i - 1]?.distance ?? 0);
    }
  });

  it("orders equal distances by position", () => {
    const index = new FlatL2Index();
    index.build([
      [1, 0],
      [0, 1],
      [-1, 0],
    ]);

    expect(index.query([0, 0], 3).map((m) => m.position)).toEqual([0, 1, 2]);
  });

  it("uses raw vectors without normalising them", () => {
    const index = new FlatL2Index();
    index.build([
      [10, 0],
      [1, 0],
    ]);

    expect(index.query([2, 0], 1)).toEqual([{ position: 1, distance: 1 }]);
  });

  it("replaces prior contents on rebuild", () => {
    const index = new FlatL2Index();
    index.build(VECTORS);
    index.build([[7, 7, 7]]);

    expect(index.size).toBe(1);
    expect(index.dimensions).toBe(3);
    expect(index.query([7, 7, 7], 5)).toEqual([{ position: 0, distance: 0 }]);
  });

  it("throws EmptyIndexError when nothing is indexed", () => {
    const index = new FlatL2Index();
    expect(() => index.query([0, 0], 1)).toThrow(EmptyIndexError);

    index.build([]);
    expect(() => index.query([0, 0], 1)).toThrow(EmptyIndexError);
  });

  it("rejects vectors of mixed dimensions", () => {
    const index = new FlatL2Index();
    expect(() => index.build([[1, 2], [1]])).toThrow(ValidationError);
    expect(index.size).toBe(0);
  });

  it("rejects a query of the wrong dimension", () => {
    const index = new FlatL2Index();
    index.build(VECTORS);
    expect(() => index.query([1, 2, 3], 1)).toThrow("Query vector has the wrong dimension");
  });

  it("rejects non-positive k", () => {
    const index = new FlatL2Index();
    index.build(VECTORS);
    expect(() => index.query([0, 0], 0)).toThrow("k must be a positive integer");
    expect(() => index.query([0, 0], 1.5)).toThrow(ValidationError);
  });
});
