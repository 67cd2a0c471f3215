import * as turf from "@turf/turf";
import type { Feature, FeatureCollection, Point, Polygon, Position } from "geojson";
import type { Projector } from "./projection";
import type { FacilityTable } from "./facilities";
import type { FacilityRecord, GeographicCoordinate, MatchRecord } from "./types";
import { parsePoint, parsePolygon } from "./wkt";

export type LayerKind = "facility-point" | "facility-outline" | "anchor" | "query";

export type LayerProperties = {
  layer: LayerKind;
  color: string;
  fillOpacity: number;
  radius: number | null;
  popup: string;
};

export type MapLayers = FeatureCollection<Point | Polygon, LayerProperties>;

export type MapView = {
  center: GeographicCoordinate;
  zoom: number;
};

export const DEFAULT_VIEW: MapView = { center: { lat: 46.5, lon: 2.5 }, zoom: 6 };

export function colorForMedium(medium: unknown) {
  if (typeof medium !== "string") return "blue";

  const value = medium.trim().toLowerCase();
  if (value === "copper") return "red";
  if (value === "fibre") return "green";
  return "blue";
}

function position(location: GeographicCoordinate): Position {
  return [location.lon, location.lat];
}

function facilityPointFeature(facility: FacilityRecord, projector: Projector): Feature<Point, LayerProperties> | null {
  const parsed = parsePoint(facility.pointWkt);
  if (parsed.kind === "absent") return null;

  return turf.point<LayerProperties>(position(projector.toGeographic(parsed.point)), {
    layer: "facility-point",
    color: "black",
    fillOpacity: 0.8,
    radius: 8,
    popup: `Facility point ${facility.id}`
  });
}

// Outlines are projected vertex by vertex; they are for display only, never for anchors.
function facilityOutlineFeature(
  facility: FacilityRecord,
  projector: Projector
): Feature<Polygon, LayerProperties> | null {
  const parsed = parsePolygon(facility.polygonWkt);
  if (parsed.kind === "absent" || parsed.coordinates.length <= 2) return null;

  const ring = parsed.coordinates.map((vertex) => position(projector.toGeographic(vertex)));
  const [firstLon, firstLat] = ring[0];
  const [lastLon, lastLat] = ring[ring.length - 1];
  if (firstLon !== lastLon || firstLat !== lastLat) {
    ring.push([firstLon, firstLat]);
  }
  if (ring.length < 4) return null;

  const medium = facility.medium?.trim() ?? "";
  return turf.polygon<LayerProperties>([ring], {
    layer: "facility-outline",
    color: colorForMedium(facility.medium),
    fillOpacity: 0.4,
    radius: null,
    popup: `Facility polygon ${facility.id} - ${medium}`
  });
}

export function buildMapLayers(input: {
  facilities: readonly FacilityRecord[];
  projector: Projector;
  table?: FacilityTable;
  matches?: readonly MatchRecord[];
}): MapLayers {
  const features: Array<Feature<Point | Polygon, LayerProperties>> = [];

  for (const facility of input.facilities) {
    const pointFeature = facilityPointFeature(facility, input.projector);
    if (pointFeature) features.push(pointFeature);

    const outlineFeature = facilityOutlineFeature(facility, input.projector);
    if (outlineFeature) features.push(outlineFeature);
  }

  for (const anchor of input.table?.anchors ?? []) {
    if (anchor.source !== "centroid") continue;

    const { lat, lon } = anchor.location;
    features.push(
      turf.point<LayerProperties>(position(anchor.location), {
        layer: "anchor",
        color: "orange",
        fillOpacity: 0.9,
        radius: 10,
        popup: `Facility centroid ${anchor.id}: (${lat.toFixed(5)}, ${lon.toFixed(5)})`
      })
    );
  }

  for (const match of input.matches ?? []) {
    features.push(
      turf.point<LayerProperties>(position(match.queryLocation), {
        layer: "query",
        color: "purple",
        fillOpacity: 0.8,
        radius: 6,
        popup: `Query ${match.queryId}\nFacility: ${match.facilityId} (${match.distanceKm.toFixed(2)} km)`
      })
    );
  }

  return turf.featureCollection(features);
}

export function viewForTable(table: FacilityTable | undefined): MapView {
  const first = table?.anchors[0];
  return first ? { center: first.location, zoom: 13 } : DEFAULT_VIEW;
}

function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Standalone Leaflet page with the layers inlined as GeoJSON. */
export function renderMapHtml(layers: MapLayers, view: MapView, title = "Facility matches") {
  const data = JSON.stringify(layers).replace(/</g, "\\u003c");
  const center = JSON.stringify([view.center.lat, view.center.lon]);

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="https://unpkg.com/leaflet@1.9.4/dist/leaflet.css" />
  <script src="https://unpkg.com/leaflet@1.9.4/dist/leaflet.js"></script>
  <style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
  <div id="map"></div>
  <script>
    const layers = ${data};
    const map = L.map("map").setView(${center}, ${view.zoom});
    L.tileLayer("https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png", {
      attribution: "&copy; OpenStreetMap contributors"
    }).addTo(map);
    L.geoJSON(layers, {
      style: (feature) => ({
        color: feature.properties.color,
        fillColor: feature.properties.color,
        fillOpacity: feature.properties.fillOpacity
      }),
      pointToLayer: (feature, latlng) => L.circleMarker(latlng, {
        radius: feature.properties.radius,
        color: feature.properties.color,
        fillColor: feature.properties.color,
        fillOpacity: feature.properties.fillOpacity
      }),
      onEachFeature: (feature, layer) => {
        const popup = document.createElement("pre");
        popup.textContent = feature.properties.popup;
        layer.bindPopup(popup);
      }
    }).addTo(map);
  </script>
</body>
</html>
`;
}
