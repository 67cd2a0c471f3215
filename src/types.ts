/** Position in the projected source system, metres. */
export type PlanarCoordinate = {
  x: number;
  y: number;
};

/** Position in degrees, target system. */
export type GeographicCoordinate = {
  lat: number;
  lon: number;
};

export type AnchorSource = "centroid" | "point";

export type FacilityAnchor = {
  id: string;
  location: GeographicCoordinate;
  source: AnchorSource;
};

export type FacilityRecord = {
  id: string;
  pointWkt: string | undefined;
  polygonWkt: string | undefined;
  medium: string | undefined;
};

export type QueryPoint = {
  id: number;
  location: GeographicCoordinate;
  label: string;
};

export type MatchRecord = {
  queryId: number;
  queryLocation: GeographicCoordinate;
  label: string;
  facilityId: string;
  facilityLocation: GeographicCoordinate;
  distanceKm: number;
};

export type Diagnostic = {
  rowId: string;
  reason: string;
};
