export interface Coordinates {
  lat: number;
  lng: number;
}

export interface CoordinateBounds {
  sw: Coordinates;
  ne: Coordinates;
}

/** GeoJSON position: `[lng, lat]`, optionally followed by altitude. */
export type Position = number[];

/** Closed or open linear ring of GeoJSON positions. */
export type Ring = Position[];

export type BrcSection = 'InTheCity' | 'InnerPlaya' | 'OuterPlaya' | 'DeepPlaya' | 'Unknown';

export interface BrcAddressParts {
  radialStreet: string | null;
  concentricStreet: string | null;
}

export interface BrcLocation extends BrcAddressParts {
  address: string;
  section: BrcSection;
  distanceFromCenterMeters: number;
  distanceFromCenterMiles: number;
  bearingFromCenter: number;
}
