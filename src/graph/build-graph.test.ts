import { describe, it, expect } from "vitest";
import { buildGraph } from "./build-graph.js";
import { Quad } from "../quad/quad.js";
import type { Point } from "../types/index.js";

const SQUARE: Point[] = [
  [0, 0],
  [10, 0],
  [10, 10],
  [0, 10],
];

function must<T>(value: T | null): T {
  if (value === null) throw new Error("expected a value, got null");
  return value;
}

describe("buildGraph", () => {
  it("joins two halves with a single edge", () => {
    const root = Quad.create({ corners: SQUARE });
    root.divide([0.5, 0.5]);
    const graph = buildGraph(root, 0.001);

    expect(graph.edges()).toHaveLength(1);
    const wall = must(graph.edgeProperties("l", "r"));
    expect(wall.width).toBeCloseTo(10);
    expect(wall.weight).toBeCloseTo(5);
    expect(wall.label).toBe("");
    expect(wall.coordinates).toEqual([
      [5, 0],
      [5, 10],
    ]);
  });

  it("has no edges for an undivided root", () => {
    const graph = buildGraph(Quad.create({ corners: SQUARE }));
    expect(graph.edgeCount).toBe(0);
  });

  it("drops walls shorter than the threshold", () => {
    const root = Quad.create({ corners: SQUARE });
    root.divide();
    const right = must(root.right);
    right.rotate();
    right.divide([0.3, 0.3]);

    const all = buildGraph(root, 0.001);
    expect(all.hasEdge("l", "rl")).toBe(true);
    expect(all.hasEdge("l", "rr")).toBe(true);
    expect(all.hasEdge("rl", "rr")).toBe(true);

    const wide = buildGraph(root, 4);
    expect(wide.hasEdge("l", "rl")).toBe(false);
    expect(wide.hasEdge("l", "rr")).toBe(true);
    expect(wide.hasEdge("rl", "rr")).toBe(true);
    for (const [u, v] of wide.edges()) {
      expect(must(wide.edgeProperties(u, v)).width).toBeGreaterThanOrEqual(4);
    }
  });

  it("builds the same graph from any quad of the tree", () => {
    const root = Quad.create({ corners: SQUARE });
    root.divide();
    const graph = buildGraph(must(root.left));
    expect(graph.hasEdge("l", "r")).toBe(true);
  });
});
