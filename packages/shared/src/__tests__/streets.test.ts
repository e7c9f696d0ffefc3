import { describe, expect, it } from "@jest/globals";

import { distanceToPolylineMeters, nearestStreet, type StreetLine } from "../geo/streets";

const street = (overrides: Partial<StreetLine>): StreetLine => ({
  id: "s1",
  name: "Atwood",
  type: "arc",
  width: 12,
  coordinates: [
    [0, 0],
    [0, 1],
  ],
  active: true,
  ...overrides,
});

describe("distanceToPolylineMeters", () => {
  it("measures perpendicular distance to a segment", () => {
    expect(distanceToPolylineMeters(0.5, 0.001, street({}).coordinates)).toBeCloseTo(111.19, 1);
  });

  it("measures to the nearest endpoint past the segment", () => {
    expect(distanceToPolylineMeters(-0.001, 0, street({}).coordinates)).toBeCloseTo(111.19, 1);
  });

  it("is infinite for an empty line", () => {
    expect(distanceToPolylineMeters(0, 0, [])).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("nearestStreet", () => {
  it("picks the closest active street", () => {
    const streets = [
      street({ id: "a", name: "Atwood", coordinates: [[0.002, 0], [0.002, 1]] }),
      street({ id: "b", name: "6:00", type: "radial", coordinates: [[0.001, 0], [0.001, 1]] }),
      street({ id: "c", name: "Closed", coordinates: [[0, 0], [0, 1]], active: false }),
    ];

    const nearest = nearestStreet(0.5, 0, streets);
    expect(nearest?.id).toBe("b");
    expect(nearest?.type).toBe("radial");
  });

  it("returns null without streets or for invalid coordinates", () => {
    expect(nearestStreet(0.5, 0, [])).toBeNull();
    expect(nearestStreet(Number.NaN, 0, [street({})])).toBeNull();
  });
});
