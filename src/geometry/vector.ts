/**
 * 2D vector utilities
 * All functions are pure and return new tuples (no mutation)
 */

import type { Point } from "../types/index.js";
import { BETWEEN_TOLERANCE } from "../constants.js";

/** Returns `a - b`, i.e. the vector from b to a. */
export function subtract2d(a: Point, b: Point): Point {
  return [a[0] - b[0], a[1] - b[1]];
}

/** Sums any number of vectors. */
export function add2d(...vectors: Point[]): Point {
  let x = 0;
  let y = 0;
  for (const v of vectors) {
    x += v[0];
    y += v[1];
  }
  return [x, y];
}

export function scale2d(factor: number, vector: Point): Point {
  return [factor * vector[0], factor * vector[1]];
}

/**
 * Calculates the Euclidean distance between two points
 */
export function distance2d(a: Point, b: Point): number {
  return Math.sqrt((a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2);
}

/**
 * Scales a vector to unit length.
 * The zero vector has no direction; [0, 1] is returned for it.
 */
export function normalise2d(vector: Point): Point {
  const length = distance2d([0, 0], vector);
  if (length === 0) return [0, 1];
  return [vector[0] / length, vector[1] / length];
}

/**
 * Interpolates between two points (t=0 returns a, t=1 returns b)
 */
export function lerp2d(a: Point, b: Point, t: number): Point {
  return [a[0] * (1 - t) + b[0] * t, a[1] * (1 - t) + b[1] * t];
}

/** Angle in radians of the vector from a to b (0 = positive X direction). */
export function angle2d(a: Point, b: Point): number {
  const [x, y] = subtract2d(b, a);
  return Math.atan2(y, x);
}

/**
 * Checks whether `point` lies on the segment p0–p1, within a tolerance on the
 * sum of the distances to both ends.
 */
export function isBetween2d(
  point: Point,
  p0: Point,
  p1: Point,
  tolerance: number = BETWEEN_TOLERANCE,
): boolean {
  const full = distance2d(p0, p1);
  const toA = distance2d(p0, point);
  const toB = distance2d(p1, point);
  return Math.abs(full - toA - toB) < tolerance;
}

/**
 * Triangle area from its three corners (Heron's formula).
 * Rounding can push the product slightly negative for degenerate triangles;
 * those report 0.
 */
export function triangleArea(a: Point, b: Point, c: Point): number {
  const ab = distance2d(a, b);
  const bc = distance2d(b, c);
  const ca = distance2d(c, a);
  const s = (ab + bc + ca) / 2;
  const product = s * (s - ab) * (s - bc) * (s - ca);
  return product > 0 ? Math.sqrt(product) : 0;
}

/**
 * Is `angle` inside the smaller arc between two headings?
 * `angle` is first folded into (-π, π].
 */
export function isAngleBetween(
  angle: number,
  headingA: number,
  headingB: number,
): boolean {
  let folded = angle;
  if (folded > Math.PI) folded -= 2 * Math.PI;

  const toA = arc(headingA, folded);
  const toB = arc(headingB, folded);
  const between = arc(headingA, headingB);
  return toA + toB - 0.000001 <= between;
}

function arc(from: number, to: number): number {
  const delta = Math.abs(from - to);
  return delta > Math.PI ? 2 * Math.PI - delta : delta;
}

/**
 * Gaussian bell curve: `scale` is the peak height, `centre` its position and
 * `sigma` its width.
 */
export function gaussian(
  x: number,
  scale: number,
  centre: number,
  sigma: number,
): number {
  return scale * Math.exp(-((x - centre) ** 2) / (2 * sigma * sigma));
}

/** Folds an angle into [0, 2π). */
export function wrapAngle(radians: number): number {
  const full = 2 * Math.PI;
  return ((radians % full) + full) % full;
}
