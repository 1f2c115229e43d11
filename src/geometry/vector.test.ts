import { describe, it, expect } from "vitest";
import {
  add2d,
  angle2d,
  distance2d,
  gaussian,
  isAngleBetween,
  isBetween2d,
  lerp2d,
  normalise2d,
  scale2d,
  subtract2d,
  triangleArea,
  wrapAngle,
} from "./vector.js";

describe("vector arithmetic", () => {
  it("subtract2d returns a - b", () => {
    expect(subtract2d([5, 3], [2, 1])).toEqual([3, 2]);
  });

  it("add2d sums any number of vectors", () => {
    expect(add2d([1, 2], [3, 4], [-1, 0])).toEqual([3, 6]);
    expect(add2d()).toEqual([0, 0]);
  });

  it("scale2d multiplies both components", () => {
    expect(scale2d(2, [1, -3])).toEqual([2, -6]);
  });

  it("distance2d is Euclidean", () => {
    expect(distance2d([0, 0], [3, 4])).toBe(5);
    expect(distance2d([1, 1], [1, 1])).toBe(0);
  });

  it("normalise2d scales to unit length", () => {
    const [x, y] = normalise2d([3, 4]);
    expect(x).toBeCloseTo(0.6);
    expect(y).toBeCloseTo(0.8);
  });

  it("normalise2d maps the zero vector to [0, 1]", () => {
    expect(normalise2d([0, 0])).toEqual([0, 1]);
  });

  it("lerp2d interpolates between two points", () => {
    expect(lerp2d([0, 0], [10, 20], 0.25)).toEqual([2.5, 5]);
    expect(lerp2d([4, 4], [8, 0], 0)).toEqual([4, 4]);
    expect(lerp2d([4, 4], [8, 0], 1)).toEqual([8, 0]);
  });
});

describe("angles", () => {
  it("angle2d measures from a to b anticlockwise from +X", () => {
    expect(angle2d([0, 0], [0, 1])).toBeCloseTo(Math.PI / 2);
    expect(angle2d([1, 1], [0, 1])).toBeCloseTo(Math.PI);
    expect(angle2d([0, 0], [1, 0])).toBe(0);
  });

  it("wrapAngle folds into [0, 2π)", () => {
    expect(wrapAngle(0)).toBe(0);
    expect(wrapAngle(-Math.PI / 2)).toBeCloseTo(1.5 * Math.PI);
    expect(wrapAngle(5 * Math.PI)).toBeCloseTo(Math.PI);
    expect(wrapAngle(2 * Math.PI)).toBeCloseTo(0);
  });

  it("isAngleBetween accepts an angle inside the smaller arc", () => {
    expect(isAngleBetween(Math.PI / 4, 0, Math.PI / 2)).toBe(true);
  });

  it("isAngleBetween rejects an angle outside the arc", () => {
    expect(isAngleBetween(Math.PI, 0, Math.PI / 2)).toBe(false);
  });

  it("isAngleBetween handles arcs across zero", () => {
    expect(isAngleBetween((15 * Math.PI) / 8, -Math.PI / 4, Math.PI / 4)).toBe(
      true,
    );
  });
});

describe("isBetween2d", () => {
  it("accepts points on the segment, ends included", () => {
    expect(isBetween2d([5, 0], [0, 0], [10, 0])).toBe(true);
    expect(isBetween2d([0, 0], [0, 0], [10, 0])).toBe(true);
    expect(isBetween2d([10, 0], [0, 0], [10, 0])).toBe(true);
  });

  it("rejects points off the segment", () => {
    expect(isBetween2d([5, 1], [0, 0], [10, 0])).toBe(false);
    expect(isBetween2d([11, 0], [0, 0], [10, 0])).toBe(false);
  });

  it("takes a custom tolerance", () => {
    expect(isBetween2d([5, 0.01], [0, 0], [10, 0], 0.1)).toBe(true);
  });
});

describe("triangleArea", () => {
  it("computes a right triangle", () => {
    expect(triangleArea([0, 0], [4, 0], [0, 3])).toBeCloseTo(6);
  });

  it("reports 0 for collinear points", () => {
    expect(triangleArea([0, 0], [1, 0], [2, 0])).toBe(0);
  });
});

describe("gaussian", () => {
  it("peaks at the centre with the given scale", () => {
    expect(gaussian(0, 2, 0, 1)).toBe(2);
  });

  it("falls off with distance from the centre", () => {
    expect(gaussian(1, 1, 0, 1)).toBeCloseTo(Math.exp(-0.5));
    expect(gaussian(3, 1, 3, 0.5)).toBe(1);
  });
});
