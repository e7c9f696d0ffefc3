import type { Landmark } from '@playa/shared';

/** Served when the landmark store is empty or unreachable. */
export const DEFAULT_LANDMARKS: readonly Landmark[] = [
  {
    id: 'default-center-camp',
    name: 'Center Camp',
    type: 'center',
    lat: 40.786958,
    lng: -119.202994,
    radiusMeters: 50,
    icon: 'tent',
    description: 'Center Camp plaza and cafe',
    properties: {},
    active: true,
  },
  {
    id: 'default-temple',
    name: 'The Temple',
    type: 'sacred',
    lat: 40.791815,
    lng: -119.196622,
    radiusMeters: 15,
    icon: 'temple',
    description: 'Sacred space for reflection and remembrance',
    properties: {},
    active: true,
  },
  {
    id: 'default-man',
    name: 'The Man',
    type: 'center',
    lat: 40.786963,
    lng: -119.203007,
    radiusMeters: 15,
    icon: 'man',
    description: 'The Man stands at the center of the city',
    properties: {},
    active: true,
  },
];
