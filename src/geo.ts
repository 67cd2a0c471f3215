import * as turf from "@turf/turf";
import { EmptyFacilityTableError } from "./errors";
import type { FacilityAnchor, GeographicCoordinate } from "./types";

export const EARTH_RADIUS_KM = 6371;

export type NearestFacility = {
  anchor: FacilityAnchor;
  distanceKm: number;
};

/** Great-circle distance on a 6371 km sphere, atan2 form of the haversine. */
export function haversineKm(a: GeographicCoordinate, b: GeographicCoordinate) {
  const phi1 = turf.degreesToRadians(a.lat);
  const phi2 = turf.degreesToRadians(b.lat);
  const dPhi = turf.degreesToRadians(b.lat - a.lat);
  const dLambda = turf.degreesToRadians(b.lon - a.lon);

  const h =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const clamped = Math.min(1, Math.max(0, h));

  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(clamped), Math.sqrt(1 - clamped));
}

// Exhaustive scan, O(anchors) per query. Strict `<` keeps the first anchor on ties.
export function findNearest(
  location: GeographicCoordinate,
  anchors: readonly FacilityAnchor[]
): NearestFacility {
  if (anchors.length === 0) {
    throw new EmptyFacilityTableError();
  }

  let nearest = anchors[0];
  let minDistance = Infinity;

  for (const anchor of anchors) {
    const d = haversineKm(location, anchor.location);
    if (d < minDistance) {
      minDistance = d;
      nearest = anchor;
    }
  }

  return { anchor: nearest, distanceKm: minDistance };
}
