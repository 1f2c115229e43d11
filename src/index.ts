// Core types
export type {
  Point,
  Point3,
  Segment,
  Line,
  Rotation,
  Position,
  DivisionRatios,
  OuterBoundaryId,
  BoundaryId,
  BoundingBox,
  QuadInit,
  WallEdge,
  NodeAttribute,
  AreaMatch,
  BuildingConfig,
} from "./types/index.js";

// Constants
export {
  DEFAULT_DIVISION,
  DEFAULT_STOREY_HEIGHT,
  DEFAULT_GRAPH_THRESHOLD,
  OUTER_BOUNDARY_IDS,
} from "./constants.js";

// Error classes
export {
  InvalidGeometryError,
  InvalidBuildingConfigError,
  StoreyNotFoundError,
  TreeIntegrityError,
} from "./errors.js";

// Logging
export { Logger, LogLevel } from "./utils/logger.js";

// Geometry kernel (pure functions)
export * from "./geometry/index.js";
export { Polygon } from "./polygon/polygon.js";

// Quad tree
export { Quad } from "./quad/quad.js";
export { Diagnostics } from "./quad/diagnostics.js";

// Boundaries
export { Boundary } from "./boundary/boundary.js";
export type { Attachment } from "./boundary/boundary.js";
export { calcBoundaries } from "./boundary/calc-boundaries.js";

// Adjacency graph
export { AdjacencyGraph } from "./graph/adjacency-graph.js";
export { buildGraph } from "./graph/build-graph.js";

// Building facade
export { validateBuildingConfig } from "./building/building-config-validator.js";
export { Building } from "./building/building.js";
