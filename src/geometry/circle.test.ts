import { describe, it, expect } from "vitest";
import {
  createCircle,
  createArc,
  arcFromCircle,
  arcStartIndex,
  sidesInArc,
} from "./circle";
import { GeometryError } from "../errors";
import type { Vec2 } from "../math/vec2";

function expectPoint(actual: Vec2 | undefined, x: number, y: number): void {
  expect(actual).toBeDefined();
  expect(actual![0]).toBeCloseTo(x);
  expect(actual![1]).toBeCloseTo(y);
}

describe("createCircle", () => {
  it("returns sides + 1 points with the first repeated at the end", () => {
    const points = createCircle(10, 16);

    expect(points).toHaveLength(17);
    expect(points[16]).toEqual(points[0]);
  });

  it("places every point on the radius", () => {
    const radius = 3.5;
    for (const sides of [1, 3, 7, 32, 100]) {
      for (const [x, y] of createCircle(radius, sides)) {
        expect(Math.sqrt(x * x + y * y)).toBeCloseTo(radius, 10);
      }
    }
  });

  it("starts at (radius, 0) and advances by increasing angle", () => {
    const points = createCircle(2, 4);

    expectPoint(points[0], 2, 0);
    expectPoint(points[1], 0, 2);
    expectPoint(points[2], -2, 0);
    expectPoint(points[3], 0, -2);
    expectPoint(points[4], 2, 0);
  });

  it("produces exactly `sides` distinct points for awkward side counts", () => {
    // 2π / 7 does not divide evenly in floating point
    const points = createCircle(1, 7);
    expect(points).toHaveLength(8);
  });

  it("is deterministic", () => {
    expect(createCircle(5, 12)).toEqual(createCircle(5, 12));
  });

  it("rejects zero, negative and fractional side counts", () => {
    expect(() => createCircle(1, 0)).toThrow(GeometryError);
    expect(() => createCircle(1, -3)).toThrow(GeometryError);
    expect(() => createCircle(1, 2.5)).toThrow(GeometryError);
  });

  it("rejects degenerate radii", () => {
    expect(() => createCircle(0, 8)).toThrow(GeometryError);
    expect(() => createCircle(-1, 8)).toThrow(GeometryError);
    expect(() => createCircle(Number.NaN, 8)).toThrow(GeometryError);
    expect(() => createCircle(Number.POSITIVE_INFINITY, 8)).toThrow(
      GeometryError
    );
  });

  it("names the offending parameter", () => {
    expect(() => createCircle(1, 0)).toThrow(
      "Invalid geometry parameters: sides=0 must be an integer >= 1"
    );
  });
});

describe("arcStartIndex", () => {
  const quarter = Math.PI / 2;

  it("starts at index 0 for angle 0", () => {
    expect(arcStartIndex(0, 4)).toBe(0);
  });

  it("rounds to the nearest side boundary", () => {
    expect(arcStartIndex(quarter * 0.4, 4)).toBe(0);
    expect(arcStartIndex(quarter * 0.6, 4)).toBe(1);
    expect(arcStartIndex(quarter * 1.4, 4)).toBe(1);
    expect(arcStartIndex(quarter * 1.6, 4)).toBe(2);
  });

  it("keeps the earlier point when exactly halfway", () => {
    expect(arcStartIndex(Math.PI / 4, 4)).toBe(0);
  });

  it("wraps angles past a full turn", () => {
    expect(arcStartIndex(Math.PI * 2 + quarter, 4)).toBe(1);
  });

  it("starts negative angles at index 0", () => {
    expect(arcStartIndex(-quarter, 4)).toBe(0);
    expect(arcStartIndex(-Math.PI * 3, 4)).toBe(0);
  });
});

describe("sidesInArc", () => {
  const eighth = Math.PI / 4;

  it("rounds half up to whole sides", () => {
    expect(sidesInArc(eighth * 1.4, 8)).toBe(1);
    expect(sidesInArc(eighth * 1.6, 8)).toBe(2);
  });

  it("counts a full turn as every side", () => {
    expect(sidesInArc(Math.PI * 2, 8)).toBe(8);
  });

  it("counts a tiny sweep as zero sides", () => {
    expect(sidesInArc(eighth * 0.2, 8)).toBe(0);
  });
});

describe("createArc", () => {
  it("approximates a full circle for a 2π sweep", () => {
    const arc = createArc(4, 12, 0, Math.PI * 2);

    expect(arc).toHaveLength(13);
    expect(arc[12]).toEqual(arc[0]);
    expectPoint(arc[0], 4, 0);
  });

  it("yields the two endpoints of one side for a one-side sweep", () => {
    const arc = createArc(1, 8, Math.PI / 2, Math.PI / 4);

    expect(arc).toHaveLength(2);
    expectPoint(arc[0], 0, 1);
    expectPoint(arc[1], -Math.SQRT1_2, Math.SQRT1_2);
  });

  it("rotates to the starting angle before cutting", () => {
    const arc = createArc(1, 4, Math.PI / 2, Math.PI);

    expect(arc).toHaveLength(3);
    expectPoint(arc[0], 0, 1);
    expectPoint(arc[1], -1, 0);
    expectPoint(arc[2], 0, -1);
  });

  it("wraps past the end of the ring", () => {
    const arc = createArc(1, 4, (Math.PI * 3) / 2, Math.PI);

    expectPoint(arc[0], 0, -1);
    expectPoint(arc[1], 1, 0);
    expectPoint(arc[2], 0, 1);
  });

  it("starts an arc with a negative starting angle at angle 0", () => {
    const arc = createArc(1, 4, -Math.PI / 2, Math.PI / 2);

    expect(arc).toHaveLength(2);
    expectPoint(arc[0], 1, 0);
    expectPoint(arc[1], 0, 1);
  });

  it("returns a single point for a sweep shorter than half a side", () => {
    expect(createArc(1, 4, 0, 0.1)).toHaveLength(1);
  });

  it("rejects a sweep that overruns the circle", () => {
    expect(() => createArc(1, 4, 0, Math.PI * 2 + Math.PI / 2)).toThrow(
      GeometryError
    );
  });

  it("accepts a sweep that rounds down to a full circle", () => {
    expect(createArc(1, 4, 0, Math.PI * 2 + Math.PI / 5)).toHaveLength(5);
  });

  it("rejects negative and non-finite sweeps", () => {
    expect(() => createArc(1, 4, 0, -1)).toThrow(GeometryError);
    expect(() => createArc(1, 4, 0, Number.NaN)).toThrow(GeometryError);
  });

  it("rejects a non-finite starting angle", () => {
    expect(() => createArc(1, 4, Number.POSITIVE_INFINITY, 1)).toThrow(
      GeometryError
    );
  });
});

describe("arcFromCircle", () => {
  it("does not modify the source circle", () => {
    const circle = Object.freeze(createCircle(1, 6));

    arcFromCircle(circle, Math.PI, Math.PI);

    expect(circle).toEqual(createCircle(1, 6));
  });

  it("rejects a circle with no sides", () => {
    expect(() => arcFromCircle([[1, 0]], 0, 0)).toThrow(GeometryError);
  });
});
