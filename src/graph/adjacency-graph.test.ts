import { describe, it, expect } from "vitest";
import { AdjacencyGraph } from "./adjacency-graph.js";
import type { Segment, WallEdge } from "../types/index.js";

const WALL: Segment = [
  [0, 0],
  [0, 4],
];

function edge(weight: number, width = 4): WallEdge {
  return { weight, coordinates: WALL, width, label: "" };
}

describe("AdjacencyGraph", () => {
  describe("nodes", () => {
    it("adds a node once and keeps its first attributes", () => {
      const graph = new AdjacencyGraph();
      graph.addNode("l", [["use", "kitchen"]]);
      graph.addNode("l", [["use", "hall"]]);
      expect(graph.nodes()).toEqual(["l"]);
      expect(graph.getNodeAttributes("l")).toEqual([["use", "kitchen"]]);
      expect(graph.getNodeAttributes("r")).toBeNull();
    });
  });

  describe("edges", () => {
    it("adds missing nodes with an edge", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "r"], edge(5));
      expect(graph.hasNode("l")).toBe(true);
      expect(graph.hasNode("r")).toBe(true);
      expect(graph.nodeCount).toBe(2);
      expect(graph.edgeCount).toBe(1);
    });

    it("is undirected", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "r"], edge(5));
      expect(graph.hasEdge("r", "l")).toBe(true);
      expect(graph.edgeProperties("r", "l")).toEqual(edge(5));
      expect(graph.neighbors("l")).toEqual(["r"]);
      expect(graph.neighbors("r")).toEqual(["l"]);
    });

    it("merges properties when the same pair is added again", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "r"], edge(5));
      graph.addEdge(["r", "l"], { ...edge(5), label: "door" });
      expect(graph.edgeCount).toBe(1);
      expect(graph.edgeAttribute("l", "r", "label")).toBe("door");
    });

    it("allows a self edge", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "l"], edge(0));
      expect(graph.nodeCount).toBe(1);
      expect(graph.hasEdge("l", "l")).toBe(true);
      expect(graph.neighbors("l")).toEqual(["l"]);
    });

    it("setEdgeProperties merges into an existing edge only", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "r"], edge(5));
      expect(graph.setEdgeProperties(["r", "l"], { width: 2 })).toBe(true);
      expect(graph.edgeAttribute("l", "r", "width")).toBe(2);
      expect(graph.edgeAttribute("l", "r", "weight")).toBe(5);
      expect(graph.setEdgeProperties(["l", "x"], { width: 2 })).toBe(false);
      expect(graph.hasEdge("l", "x")).toBe(false);
    });

    it("returns null for a missing edge", () => {
      const graph = new AdjacencyGraph();
      expect(graph.edgeProperties("l", "r")).toBeNull();
      expect(graph.edgeAttribute("l", "r", "width")).toBeNull();
    });
  });

  describe("average path length", () => {
    function star(): AdjacencyGraph {
      const graph = new AdjacencyGraph();
      graph.addEdge(["hub", "a"], edge(2));
      graph.addEdge(["hub", "b"], edge(4));
      graph.addEdge(["a", "b"], edge(9));
      graph.addNode("lone");
      return graph;
    }

    it("averages the weights of a node's edges", () => {
      const graph = star();
      expect(graph.averagePathLength("hub")).toBe(3);
      expect(graph.averagePathLength("a")).toBe(5.5);
      expect(graph.averagePathLength("b")).toBe(6.5);
      expect(graph.averagePathLength("lone")).toBeNull();
    });

    it("sorts nodes by average path length, isolated nodes last", () => {
      expect(star().sortedByAveragePathLength()).toEqual([
        "hub",
        "a",
        "b",
        "lone",
      ]);
    });
  });

  describe("clone", () => {
    it("copies nodes, attributes and edges", () => {
      const graph = new AdjacencyGraph();
      graph.addNode("x", [["use", "store"]]);
      graph.addEdge(["l", "r"], edge(5));
      const copy = graph.clone();
      expect(copy.nodes().sort()).toEqual(["l", "r", "x"]);
      expect(copy.getNodeAttributes("x")).toEqual([["use", "store"]]);
      expect(copy.edgeProperties("l", "r")).toEqual(edge(5));
    });

    it("is independent of the source", () => {
      const graph = new AdjacencyGraph();
      graph.addEdge(["l", "r"], edge(5));
      const copy = graph.clone();
      copy.setEdgeProperties(["l", "r"], { label: "arch" });
      copy.addEdge(["r", "s"], edge(1));
      expect(graph.edgeAttribute("l", "r", "label")).toBe("");
      expect(graph.hasNode("s")).toBe(false);
    });
  });
});
