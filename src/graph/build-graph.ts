import type { WallEdge } from "../types/index.js";
import type { Quad } from "../quad/quad.js";
import { calcBoundaries } from "../boundary/calc-boundaries.js";
import { DEFAULT_GRAPH_THRESHOLD } from "../constants.js";
import { distance2d } from "../geometry/vector.js";
import { Logger } from "../utils/logger.js";
import { AdjacencyGraph } from "./adjacency-graph.js";

/**
 * Builds the adjacency graph of the leaves of `root`'s tree: one edge per
 * pair of leaves sharing at least `threshold` of wall. Nodes are leaf ids.
 */
export function buildGraph(
  root: Quad,
  threshold: number = DEFAULT_GRAPH_THRESHOLD,
): AdjacencyGraph<WallEdge> {
  const graph = new AdjacencyGraph<WallEdge>();
  const boundaries = calcBoundaries(root);

  for (const boundary of boundaries.values()) {
    for (const [a, b] of boundary.pairs()) {
      const width = boundary.overlap(a, b);
      if (width < threshold) continue;

      const coordinates = boundary.coordinates(a, b);
      if (coordinates === null) continue;

      graph.addEdge([a.id, b.id], {
        weight: distance2d(a.centroid, b.centroid),
        coordinates,
        width,
        label: "",
      });
    }
  }

  Logger.debug(
    `graph: ${boundaries.size} boundaries, ${graph.nodeCount} nodes, ${graph.edgeCount} edges`,
  );
  return graph;
}
