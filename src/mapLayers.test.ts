import { describe, expect, it } from "vitest";
import { buildFacilityTable } from "./facilities";
import { buildMapLayers, colorForMedium, DEFAULT_VIEW, renderMapHtml, viewForTable } from "./mapLayers";
import type { Projector } from "./projection";
import type { FacilityRecord, MatchRecord } from "./types";

const identity: Projector = {
  sourceCrs: "test:planar",
  targetCrs: "test:geographic",
  toGeographic: ({ x, y }) => ({ lat: y, lon: x })
};

describe("colorForMedium", () => {
  it.each([
    ["copper", "red"],
    [" Copper ", "red"],
    ["FIBRE", "green"],
    ["radio", "blue"],
    ["", "blue"],
    [undefined, "blue"]
  ])("%j -> %s", (medium, color) => {
    expect(colorForMedium(medium)).toBe(color);
  });
});

describe("buildMapLayers", () => {
  const facilities: FacilityRecord[] = [
    { id: "A", pointWkt: "POINT(1 2)", polygonWkt: "POLYGON((0 0,4 0,4 4,0 4))", medium: "copper" },
    { id: "B", pointWkt: "POINT(8 9)", polygonWkt: "POLYGON((0 0,1 1))", medium: "fibre" }
  ];
  const { table } = buildFacilityTable(facilities, identity);
  const matches: MatchRecord[] = [
    {
      queryId: 3,
      queryLocation: { lat: 2.5, lon: 2.5 },
      label: "site",
      facilityId: "A",
      facilityLocation: { lat: 2, lon: 2 },
      distanceKm: 78.6254
    }
  ];

  const layers = buildMapLayers({ facilities, projector: identity, table, matches });

  it("emits points, outlines, centroid anchors and queries in order", () => {
    expect(layers.features.map((feature) => feature.properties.layer)).toEqual([
      "facility-point",
      "facility-outline",
      "facility-point",
      "anchor",
      "query"
    ]);
  });

  it("closes outline rings and colours them by medium", () => {
    const outline = layers.features[1];
    expect(outline.geometry).toEqual({
      type: "Polygon",
      coordinates: [
        [
          [0, 0],
          [4, 0],
          [4, 4],
          [0, 4],
          [0, 0]
        ]
      ]
    });
    expect(outline.properties).toEqual({
      layer: "facility-outline",
      color: "red",
      fillOpacity: 0.4,
      radius: null,
      popup: "Facility polygon A - copper"
    });
  });

  it("labels the centroid and the query with their match", () => {
    expect(layers.features[3].properties.popup).toBe("Facility centroid A: (2.00000, 2.00000)");
    expect(layers.features[4].geometry).toEqual({ type: "Point", coordinates: [2.5, 2.5] });
    expect(layers.features[4].properties.popup).toBe("Query 3\nFacility: A (78.63 km)");
  });
});

describe("viewForTable", () => {
  it("centres on the first anchor", () => {
    const { table } = buildFacilityTable(
      [{ id: "A", pointWkt: "POINT(3 4)", polygonWkt: undefined, medium: undefined }],
      identity
    );
    expect(viewForTable(table)).toEqual({ center: { lat: 4, lon: 3 }, zoom: 13 });
  });

  it("falls back to the default view", () => {
    expect(viewForTable(undefined)).toBe(DEFAULT_VIEW);
  });
});

describe("renderMapHtml", () => {
  it("inlines the layers and the view", () => {
    const layers = buildMapLayers({
      facilities: [{ id: "</script>", pointWkt: "POINT(1 2)", polygonWkt: undefined, medium: undefined }],
      projector: identity
    });
    const html = renderMapHtml(layers, { center: { lat: 2, lon: 1 }, zoom: 13 }, "A & B");

    expect(html).toContain("<title>A &amp; B</title>");
    expect(html).toContain('L.map("map").setView([2,1], 13);');
    expect(html).toContain('"popup":"Facility point \\u003c/script>"');
    expect(html.match(/<\/script>/g)).toHaveLength(2);
  });
});
