import React from "react";

import { getLocationService } from "@/lib/location/service";
import type { LocationSample } from "@/lib/location/schemas";

export const dynamic = "force-dynamic";

const SOURCE_LABELS: Record<LocationSample["source"], string> = {
  simulated: "Simulated route",
  live: "Live GPS",
  random_location: "Random landmark",
  fallback: "Built-in fallback",
};

const formatMeters = (value: number) => `${Math.round(value)} m`;

export default async function HomePage() {
  const sample = await getLocationService().currentLocation();

  if (!sample) {
    return (
      <section>
        <h1>Location unavailable</h1>
        <p>No position source answered. Check the landmark store and device tracker settings.</p>
      </section>
    );
  }

  return (
    <section data-map-mode={sample.mapMode}>
      <h1>{sample.address}</h1>
      <p>
        {sample.context ?? "Somewhere on the playa"} ({SOURCE_LABELS[sample.source]})
      </p>
      <dl>
        <dt>Coordinates</dt>
        <dd>
          {sample.lat.toFixed(6)}, {sample.lng.toFixed(6)}
        </dd>
        <dt>From the Man</dt>
        <dd>{sample.distanceFromCenterMiles.toFixed(2)} mi</dd>
        {sample.nearestStreet ? (
          <>
            <dt>Nearest street</dt>
            <dd>
              {sample.nearestStreet.name} ({formatMeters(sample.nearestStreet.distanceMeters)})
            </dd>
          </>
        ) : null}
        {sample.destination ? (
          <>
            <dt>Heading to</dt>
            <dd>{sample.destination.name}</dd>
          </>
        ) : null}
        <dt>Inside the fence</dt>
        <dd>{sample.withinFence ? "Yes" : "No"}</dd>
      </dl>
      {sample.nearbyLandmarks.length ? (
        <ul>
          {sample.nearbyLandmarks.map((landmark) => (
            <li key={landmark.id}>
              {landmark.name} ({formatMeters(landmark.distanceMeters)})
            </li>
          ))}
        </ul>
      ) : null}
      {sample.nearbyToilets.length ? (
        <p>
          Nearest toilet: {sample.nearbyToilets[0].name} ({formatMeters(sample.nearbyToilets[0].distanceMeters)})
        </p>
      ) : null}
    </section>
  );
}
