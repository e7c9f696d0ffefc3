import type { CityPlan } from "./types";

// Street distances measured from the 2025 city GIS release.
export const blackRockCity2025: CityPlan = {
  slug: "brc-2025",
  name: "Black Rock City",
  year: 2025,
  center: { lat: 40.78696345, lng: -119.2030071 },
  clockRotationDegrees: 45,
  radialArc: { from: "2:00", to: "10:00" },
  concentricStreets: [
    { name: "Esplanade", distanceMeters: 760 },
    { name: "Atwood", distanceMeters: 892 },
    { name: "Bradbury", distanceMeters: 977 },
    { name: "Cherryh", distanceMeters: 1062 },
    { name: "Dick", distanceMeters: 1147 },
    { name: "Ellison", distanceMeters: 1234 },
    { name: "Farmer", distanceMeters: 1386 },
    { name: "Gibson", distanceMeters: 1471 },
    { name: "Herbert", distanceMeters: 1556 },
    { name: "Ishiguro", distanceMeters: 1642 },
    { name: "Jemisin", distanceMeters: 1696 },
    { name: "Kilgore", distanceMeters: 1754 },
  ],
  streetToleranceMeters: 32,
  deepPlayaMeters: 1931,
  bounds: {
    sw: { lat: 40.76, lng: -119.24 },
    ne: { lat: 40.81, lng: -119.17 },
  },
  perimeter: {
    name: "Trash Fence",
    description: "Event perimeter boundary",
    ring: [
      [-119.23273810046265, 40.783393446219854],
      [-119.20773209353101, 40.764368446672798],
      [-119.17619408998932, 40.776562450337401],
      [-119.18168009473258, 40.80310545215228],
      [-119.21663410121434, 40.80735944960616],
      [-119.23273810046265, 40.783393446219854],
    ],
  },
};
