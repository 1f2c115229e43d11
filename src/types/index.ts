import type { LogLevel } from "../utils/logger.js";

// Point — an immutable 2D coordinate [x, y]
export type Point = readonly [x: number, y: number];

// Point3 — an immutable 3D coordinate [x, y, z]
export type Point3 = readonly [x: number, y: number, z: number];

// Segment — two points, e.g. the ends of a shared wall
export type Segment = readonly [Point, Point];

// Line — infinite line y = slope * x + intercept
export interface Line {
  slope: number;
  intercept: number;
}

// Rotation — quarter turns applied to corner numbering
export type Rotation = 0 | 1 | 2 | 3;

// Position — where a quad sits under its parent ("" for a root)
export type Position = "" | "l" | "r";

// DivisionRatios — split ratios along edge 0→1 and along edge 3→2
export type DivisionRatios = readonly [number, number];

// OuterBoundaryId — the four edges of the root rectangle
export type OuterBoundaryId = "a" | "b" | "c" | "d";

// BoundaryId — an outer edge tag or the id of the quad whose division forms the line
export type BoundaryId = string;

// BoundingBox — axis-aligned bounds
export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// QuadInit — what a root quad is built from
export interface QuadInit {
  corners: readonly Point[];
  elevation?: number;
  height?: number;
  type?: string;
  style?: string;
}

// WallEdge — properties of an adjacency graph edge between two leaves
export type WallEdge = {
  /** Distance between the two leaf centroids. */
  weight: number;
  /** Ends of the shared wall segment. */
  coordinates: Segment;
  /** Length of the shared wall segment. */
  width: number;
  label: string;
};

// NodeAttribute — (name, value) pairs attached to graph nodes
export type NodeAttribute = readonly [name: string, value: unknown];

// AreaMatch — returned by Quad.byArea
export interface AreaMatch<Q> {
  ratio: number;
  quad: Q;
}

// BuildingConfig — validated on Building construction
export interface BuildingConfig {
  corners: readonly Point[];
  elevation?: number;
  storeyHeight?: number;
  graphThreshold?: number;
  minimumWidth?: number;
  logLevel?: LogLevel;
}
