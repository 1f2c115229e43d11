import { describe, it, expect } from "vitest";
import {
  angleToLine,
  lineIntersection,
  perpendicularDistance,
  perpendicularLine,
  pointsToLine,
} from "./line.js";

describe("pointsToLine", () => {
  it("builds slope and intercept from two points", () => {
    expect(pointsToLine([0, 1], [2, 5])).toEqual({ slope: 2, intercept: 1 });
  });

  it("approximates a vertical line with a very steep slope", () => {
    const line = pointsToLine([3, 0], [3, 1]);
    expect(line.slope).toBeGreaterThan(1e10);
  });
});

describe("angleToLine", () => {
  it("builds the line through a point at a heading", () => {
    const line = angleToLine([0, 0], Math.PI / 4);
    expect(line.slope).toBeCloseTo(1);
    expect(line.intercept).toBeCloseTo(0);
  });
});

describe("perpendicularLine", () => {
  it("uses the negative reciprocal slope through the point", () => {
    expect(perpendicularLine({ slope: 2, intercept: 0 }, [0, 5])).toEqual({
      slope: -0.5,
      intercept: 5,
    });
  });

  it("is near vertical for a horizontal line", () => {
    const line = perpendicularLine({ slope: 0, intercept: 3 }, [1, 1]);
    expect(line.slope).toBeLessThan(-1e10);
  });
});

describe("lineIntersection", () => {
  it("finds where two lines cross", () => {
    expect(
      lineIntersection({ slope: 1, intercept: 0 }, { slope: -1, intercept: 4 }),
    ).toEqual([2, 2]);
  });

  it("returns null for parallel lines", () => {
    expect(
      lineIntersection({ slope: 1, intercept: 0 }, { slope: 1, intercept: 4 }),
    ).toBeNull();
  });
});

describe("perpendicularDistance", () => {
  it("measures to a diagonal line", () => {
    expect(perpendicularDistance({ slope: 1, intercept: 0 }, [0, 2])).toBeCloseTo(
      Math.SQRT2,
    );
  });

  it("measures to a horizontal line", () => {
    expect(perpendicularDistance({ slope: 0, intercept: 0 }, [3, 4])).toBeCloseTo(4);
  });
});
