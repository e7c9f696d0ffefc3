import type { CityPlan } from '../config/cities/types';
import { bearingDegrees, haversineMeters, isValidCoordinate, metersToMiles } from './math';
import type { BrcAddressParts, BrcLocation, BrcSection } from './types';

const SLOTS_PER_DIAL = 24;
const DEGREES_PER_SLOT = 360 / SLOTS_PER_DIAL;

export const SECTION_LABELS: Record<BrcSection, string> = {
  InTheCity: 'In The City',
  InnerPlaya: 'Inner Playa',
  OuterPlaya: 'Outer Playa',
  DeepPlaya: 'Deep Playa',
  Unknown: 'Unknown Location',
};

/** `0` → `"12:00"`, `1` → `"12:30"`, … `23` → `"11:30"`. */
export const formatClockSlot = (slot: number): string => {
  const normalized = ((Math.trunc(slot) % SLOTS_PER_DIAL) + SLOTS_PER_DIAL) % SLOTS_PER_DIAL;
  const hour = Math.floor(normalized / 2) || 12;
  return `${hour}:${normalized % 2 ? '30' : '00'}`;
};

/** Inverse of {@link formatClockSlot}; only whole and half hours parse. */
export const parseClockTime = (value: string): number | null => {
  const match = /^(\d{1,2}):(00|30)$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  if (hour < 1 || hour > 12) return null;
  return (hour % 12) * 2 + (match[2] === '30' ? 1 : 0);
};

const slotInArc = (slot: number, from: number, to: number): boolean =>
  from <= to ? slot >= from && slot <= to : slot >= from || slot <= to;

export const radialStreet = (bearing: number, city: CityPlan): string | null => {
  if (!Number.isFinite(bearing)) return null;
  const from = parseClockTime(city.radialArc.from);
  const to = parseClockTime(city.radialArc.to);
  if (from === null || to === null) return null;

  const rotated = (((bearing - city.clockRotationDegrees) % 360) + 360) % 360;
  const slot = Math.round(rotated / DEGREES_PER_SLOT) % SLOTS_PER_DIAL;
  return slotInArc(slot, from, to) ? formatClockSlot(slot) : null;
};

// Ties round outward: a point exactly on a breakpoint belongs to the next street.
export const concentricStreet = (distanceMeters: number, city: CityPlan): string | null => {
  if (!Number.isFinite(distanceMeters) || distanceMeters < 0) return null;
  const street = city.concentricStreets.find((entry) => entry.distanceMeters > distanceMeters);
  return street?.name ?? null;
};

export const classifySection = (
  parts: BrcAddressParts,
  distanceMeters: number,
  city: CityPlan,
): BrcSection => {
  if (!Number.isFinite(distanceMeters) || distanceMeters < 0) return 'Unknown';
  if (distanceMeters > city.deepPlayaMeters) return 'DeepPlaya';

  const streets = city.concentricStreets;
  if (!streets.length) return 'Unknown';
  if (distanceMeters >= streets[streets.length - 1].distanceMeters) return 'OuterPlaya';

  const innerPlayaEdge = streets[0].distanceMeters - city.streetToleranceMeters;
  if (parts.radialStreet && parts.concentricStreet && distanceMeters >= innerPlayaEdge) {
    return 'InTheCity';
  }
  return 'InnerPlaya';
};

export const formatBrcAddress = (parts: BrcAddressParts, section: BrcSection): string =>
  section === 'InTheCity' && parts.radialStreet && parts.concentricStreet
    ? `${parts.radialStreet} & ${parts.concentricStreet}`
    : SECTION_LABELS[section];

/**
 * Full city address for a coordinate. Invalid coordinates produce an `Unknown` section
 * with `NaN` distances rather than throwing.
 */
export const describeBrcLocation = (lat: number, lng: number, city: CityPlan): BrcLocation => {
  if (!isValidCoordinate(lat, lng)) {
    return {
      address: SECTION_LABELS.Unknown,
      section: 'Unknown',
      radialStreet: null,
      concentricStreet: null,
      distanceFromCenterMeters: Number.NaN,
      distanceFromCenterMiles: Number.NaN,
      bearingFromCenter: Number.NaN,
    };
  }

  const distance = haversineMeters(city.center.lat, city.center.lng, lat, lng);
  const bearing = bearingDegrees(city.center.lat, city.center.lng, lat, lng);
  const parts: BrcAddressParts = {
    radialStreet: radialStreet(bearing, city),
    concentricStreet: concentricStreet(distance, city),
  };
  const section = classifySection(parts, distance, city);

  return {
    ...parts,
    address: formatBrcAddress(parts, section),
    section,
    distanceFromCenterMeters: distance,
    distanceFromCenterMiles: metersToMiles(distance),
    bearingFromCenter: bearing,
  };
};
