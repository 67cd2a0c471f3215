import * as turf from "@turf/turf";
import type { Position } from "geojson";
import type { PlanarCoordinate } from "./types";

export type CentroidResult =
  | { ok: true; centroid: PlanarCoordinate }
  | { ok: false; reason: string };

// Relative to the squared extent of the ring.
const AREA_EPSILON = 1e-12;

// Ulps of the largest coordinate lost per vertex when input decimals are stored as doubles.
const ROUNDING_ULPS = 4;

export function closeRing(vertices: PlanarCoordinate[]): Position[] {
  const ring: Position[] = vertices.map((vertex) => [vertex.x, vertex.y]);
  const first = vertices[0];
  const last = vertices[vertices.length - 1];

  if (first && last && (first.x !== last.x || first.y !== last.y)) {
    ring.push([first.x, first.y]);
  }
  return ring;
}

function countDistinct(vertices: PlanarCoordinate[]) {
  return new Set(vertices.map((vertex) => `${vertex.x} ${vertex.y}`)).size;
}

/** Shoelace sum over a closed ring; positive when counter-clockwise. */
export function signedPlanarArea(ring: Position[]) {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i][0] * ring[i + 1][1] - ring[i + 1][0] * ring[i][1];
  }
  return sum / 2;
}

function translateToFirst(vertices: PlanarCoordinate[]): PlanarCoordinate[] {
  const [origin] = vertices;
  return vertices.map((vertex) => ({ x: vertex.x - origin.x, y: vertex.y - origin.y }));
}

// Largest area rounding alone can produce for this ring.
function areaTolerance(vertices: PlanarCoordinate[]) {
  const xs = vertices.map((vertex) => vertex.x);
  const ys = vertices.map((vertex) => vertex.y);
  const extent = Math.max(Math.max(...xs) - Math.min(...xs), Math.max(...ys) - Math.min(...ys));
  const magnitude = Math.max(...xs.map(Math.abs), ...ys.map(Math.abs));

  return extent * (AREA_EPSILON * extent + vertices.length * ROUNDING_ULPS * magnitude * Number.EPSILON);
}

/**
 * Area-weighted centroid of a simple polygon, in the planar system of its
 * vertices. Must run on un-projected coordinates; project the result afterwards.
 */
export function planarCentroid(vertices: PlanarCoordinate[]): CentroidResult {
  if (countDistinct(vertices) < 3) {
    return { ok: false, reason: "polygon has fewer than 3 distinct vertices" };
  }

  const area = signedPlanarArea(closeRing(translateToFirst(vertices)));
  if (!Number.isFinite(area) || Math.abs(area) <= areaTolerance(vertices)) {
    return { ok: false, reason: "polygon has zero area" };
  }

  const [x, y] = turf.centerOfMass(turf.polygon([closeRing(vertices)])).geometry.coordinates;
  return { ok: true, centroid: { x, y } };
}
