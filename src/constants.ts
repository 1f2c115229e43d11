import type { DivisionRatios, OuterBoundaryId } from "./types/index.js";

/** Ratios used by `divide()` when none are given. */
export const DEFAULT_DIVISION: DivisionRatios = [0.5, 0.5];

/** Storey height used when a root quad has none. */
export const DEFAULT_STOREY_HEIGHT = 3.0;

/** Minimum shared wall length for an adjacency graph edge. */
export const DEFAULT_GRAPH_THRESHOLD = 0.001;

/** Boundary ids of the outer edges of a root quad, indexed by edge. */
export const OUTER_BOUNDARY_IDS: readonly OuterBoundaryId[] = [
  "a",
  "b",
  "c",
  "d",
];

/** Tolerance of the point-on-segment test. */
export const BETWEEN_TOLERANCE = 0.000001;

/** Substituted for a zero run when building a line through a vertical segment. */
export const VERTICAL_SLOPE_EPSILON = 0.00000000001;

/** Shared wall lengths at or below this are treated as no overlap. */
export const OVERLAP_TOLERANCE = 1e-9;
