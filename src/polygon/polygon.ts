import * as turf from "@turf/turf";
import type { Position } from "geojson";
import type { BoundingBox, Point } from "../types/index.js";
import { InvalidGeometryError } from "../errors.js";
import { distance2d } from "../geometry/vector.js";

/**
 * A simple polygon over an ordered list of points, used to cross-check quad
 * footprints.
 *
 * Derived values (`bbox`, `area`, `centroid`, `isClockwise`, `perimeter`) are
 * computed on first access and memoized. Coordinates are planar, so area and
 * perimeter use the shoelace and edge-sum formulas rather than turf's
 * geodesic measures.
 */
export class Polygon {
  private _points: Point[];
  private _clockwise: boolean | null = null;
  private _bbox: BoundingBox | null = null;
  private _area: number | null = null;
  private _centroid: Point | null = null;
  private _perimeter: number | null = null;

  constructor(points: readonly Point[]) {
    if (points.length < 3) {
      throw new InvalidGeometryError(
        `Polygon needs at least 3 points, got ${points.length}`,
      );
    }
    for (const p of points) {
      if (!Number.isFinite(p[0]) || !Number.isFinite(p[1])) {
        throw new InvalidGeometryError(
          `Polygon point [${p[0]}, ${p[1]}] is not finite`,
        );
      }
    }
    this._points = [...points];
  }

  // ---- points ----

  /** Number of vertices. */
  get order(): number {
    return this._points.length;
  }

  get points(): Point[] {
    return [...this._points];
  }

  /** Returns the vertex at `index`, or null when out of range. */
  point(index: number): Point | null {
    return this._points[index] ?? null;
  }

  /** Returns the vertices at the given indices, skipping any out of range. */
  pointsAt(indices: readonly number[]): Point[] {
    return indices
      .map((i) => this._points[i])
      .filter((p): p is Point => p !== undefined);
  }

  // ---- derived values ----

  get bbox(): BoundingBox {
    if (this._bbox === null) {
      const [minX, minY, maxX, maxY] = turf.bbox(this.toFeature());
      this._bbox = { minX, minY, maxX, maxY };
    }
    return this._bbox;
  }

  get area(): number {
    if (this._area === null) {
      this._area = Math.abs(signedArea(this._points));
    }
    return this._area;
  }

  get centroid(): Point {
    if (this._centroid === null) {
      const coords = turf.centerOfMass(this.toFeature()).geometry.coordinates;
      this._centroid = [coords[0]!, coords[1]!];
    }
    return this._centroid;
  }

  get isClockwise(): boolean {
    if (this._clockwise === null) {
      this._clockwise = turf.booleanClockwise(this.closedRing());
    }
    return this._clockwise;
  }

  get perimeter(): number {
    if (this._perimeter === null) {
      let total = 0;
      const n = this._points.length;
      for (let i = 0; i < n; i++) {
        total += distance2d(this._points[i]!, this._points[(i + 1) % n]!);
      }
      this._perimeter = total;
    }
    return this._perimeter;
  }

  /** Points on the boundary count as contained. */
  contains(point: Point): boolean {
    return turf.booleanPointInPolygon([point[0], point[1]], this.toFeature());
  }

  // ---- winding ----

  /** Reorders the vertices clockwise (no-op if already clockwise). */
  clockwise(): void {
    if (!this.isClockwise) {
      this._points.reverse();
      this._clockwise = true;
    }
  }

  /** Reorders the vertices anticlockwise (no-op if already anticlockwise). */
  counterClockwise(): void {
    if (this.isClockwise) {
      this._points.reverse();
      this._clockwise = false;
    }
  }

  // ---- private helpers ----

  private closedRing(): Position[] {
    const ring: Position[] = this._points.map((p) => [p[0], p[1]]);
    ring.push([this._points[0]![0], this._points[0]![1]]);
    return ring;
  }

  private toFeature() {
    return turf.polygon([this.closedRing()]);
  }
}

/**
 * Shoelace signed area.
 * Positive result → anticlockwise (x right, y up).
 */
function signedArea(points: readonly Point[]): number {
  let area = 0;
  const n = points.length;
  for (let i = 0; i < n; i++) {
    const a = points[i]!;
    const b = points[(i + 1) % n]!;
    area += a[0] * b[1];
    area -= b[0] * a[1];
  }
  return area / 2;
}
