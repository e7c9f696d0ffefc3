import { describe, expect, it } from "@jest/globals";

import { blackRockCity2025 } from "../config/cities";
import { closeRing, isValidRing, pointInPolygon, polygonCentroid } from "../geo/polygon";

const square = [
  [0, 0],
  [10, 0],
  [10, 10],
  [0, 10],
  [0, 0],
];

describe("pointInPolygon", () => {
  it("contains interior points", () => {
    expect(pointInPolygon(5, 5, square)).toBe(true);
    expect(pointInPolygon(1, 9, square)).toBe(true);
  });

  it("excludes exterior points", () => {
    expect(pointInPolygon(5, 15, square)).toBe(false);
    expect(pointInPolygon(-1, 5, square)).toBe(false);
  });

  it("treats edges and vertices as outside", () => {
    expect(pointInPolygon(0, 5, square)).toBe(false);
    expect(pointInPolygon(5, 10, square)).toBe(false);
    expect(pointInPolygon(0, 0, square)).toBe(false);
    expect(pointInPolygon(10, 10, square)).toBe(false);
  });

  it("ignores whether the ring is closed or where it starts", () => {
    const open = square.slice(0, 4);
    const rotated = [[10, 10], [0, 10], [0, 0], [10, 0], [10, 10]];
    for (const [lat, lng] of [[5, 5], [5, 15], [0, 5]]) {
      expect(pointInPolygon(lat, lng, open)).toBe(pointInPolygon(lat, lng, square));
      expect(pointInPolygon(lat, lng, rotated)).toBe(pointInPolygon(lat, lng, square));
    }
  });

  it("counts a vertex on the ray once", () => {
    const diamond = [[5, 0], [10, 5], [5, 10], [0, 5], [5, 0]];
    expect(pointInPolygon(5, 2, diamond)).toBe(true);
    expect(pointInPolygon(5, -2, diamond)).toBe(false);
  });

  it("contains nothing for degenerate or missing rings", () => {
    expect(pointInPolygon(0, 0, [[0, 0], [1, 1], [0, 0]])).toBe(false);
    expect(pointInPolygon(0, 0, null)).toBe(false);
    expect(pointInPolygon(Number.NaN, 5, square)).toBe(false);
  });

  it("places the city center inside the perimeter fence", () => {
    const { center, perimeter } = blackRockCity2025;
    expect(pointInPolygon(center.lat, center.lng, perimeter.ring)).toBe(true);
    expect(pointInPolygon(40.7, -119.2, perimeter.ring)).toBe(false);
  });
});

describe("ring helpers", () => {
  it("closes open rings", () => {
    expect(closeRing(square.slice(0, 4))).toEqual(square);
    expect(closeRing(square)).toBe(square);
  });

  it("validates closed rings with three distinct points", () => {
    expect(isValidRing(square)).toBe(true);
    expect(isValidRing(square.slice(0, 4))).toBe(false);
    expect(isValidRing([[0, 0], [1, 1], [1, 1], [0, 0]])).toBe(false);
    expect(isValidRing([[0, 0], ["x", 1], [1, 0], [0, 0]])).toBe(false);
  });

  it("averages vertices without the closing duplicate", () => {
    expect(polygonCentroid(square)).toEqual({ lat: 5, lng: 5 });
    expect(polygonCentroid([])).toBeNull();
  });
});
