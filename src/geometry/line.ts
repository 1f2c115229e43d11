/**
 * Slope/intercept line utilities
 *
 * Vertical lines have no finite slope; a tiny run is substituted so that they
 * can still be expressed and intersected. Results near vertical are therefore
 * approximate.
 */

import type { Line, Point } from "../types/index.js";
import { VERTICAL_SLOPE_EPSILON } from "../constants.js";
import { distance2d, subtract2d } from "./vector.js";

/** Line through two points. */
export function pointsToLine(p0: Point, p1: Point): Line {
  let [run, rise] = subtract2d(p1, p0);
  if (run === 0) run = VERTICAL_SLOPE_EPSILON;
  const slope = rise / run;
  return { slope, intercept: p0[1] - p0[0] * slope };
}

/** Line through a point heading at `radians`. */
export function angleToLine(point: Point, radians: number): Line {
  return pointsToLine(point, [
    point[0] + Math.cos(radians),
    point[1] + Math.sin(radians),
  ]);
}

/** Line perpendicular to `line` passing through `point`. */
export function perpendicularLine(line: Line, point: Point): Line {
  const base = line.slope === 0 ? VERTICAL_SLOPE_EPSILON : line.slope;
  const slope = -1 / base;
  return { slope, intercept: point[1] - point[0] * slope };
}

/**
 * Intersection of two lines.
 * Returns null for lines of equal slope: parallel lines never meet.
 */
export function lineIntersection(line0: Line, line1: Line): Point | null {
  if (line0.slope === line1.slope) return null;
  const x = (line1.intercept - line0.intercept) / (line0.slope - line1.slope);
  return [x, line0.slope * x + line0.intercept];
}

/** Shortest distance from `point` to `line`. */
export function perpendicularDistance(line: Line, point: Point): number {
  const foot = lineIntersection(line, perpendicularLine(line, point));
  if (foot === null) return 0;
  return distance2d(point, foot);
}
