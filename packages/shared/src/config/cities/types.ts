import type { CoordinateBounds, Coordinates, Position } from "../../geo/types";

export interface ConcentricStreetBreakpoint {
  name: string;
  /** Distance of the street from the city center, in meters. */
  distanceMeters: number;
}

export interface CityPlan {
  slug: string;
  name: string;
  year: number;
  /** Surveyed city center that every bearing and distance is measured from. */
  center: Coordinates;
  /** True bearing of the 12:00 radial. */
  clockRotationDegrees: number;
  /** Occupied radial arc, inclusive on both ends ("H:MM"). */
  radialArc: { from: string; to: string };
  /** Concentric streets ordered from the center outwards. */
  concentricStreets: ConcentricStreetBreakpoint[];
  /** How far inside the first street a point still counts as on it. */
  streetToleranceMeters: number;
  deepPlayaMeters: number;
  /** Plausible region for live telemetry. */
  bounds: CoordinateBounds;
  perimeter: {
    name: string;
    description: string;
    ring: Position[];
  };
}
