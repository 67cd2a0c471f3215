import * as turf from "@turf/turf";
import { describe, expect, it } from "vitest";
import { closeRing, planarCentroid, signedPlanarArea } from "./centroid";
import { createProjector } from "./projection";

const square = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
];

describe("planarCentroid", () => {
  it("finds the centre of a square", () => {
    expect(planarCentroid(square)).toEqual({ ok: true, centroid: { x: 5, y: 5 } });
  });

  it("accepts an explicitly closed ring", () => {
    expect(planarCentroid([...square, { x: 0, y: 0 }])).toEqual({ ok: true, centroid: { x: 5, y: 5 } });
  });

  it("weights by area rather than averaging vertices", () => {
    // Extra vertices bunched on one edge pull the vertex mean but not the area centroid.
    const crowded = [
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 4, y: 0 },
      { x: 6, y: 0 },
      { x: 8, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 }
    ];
    const result = planarCentroid(crowded);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.centroid.x).toBeCloseTo(5, 10);
      expect(result.centroid.y).toBeCloseTo(5, 10);
    }
  });

  it("fails on fewer than three distinct vertices", () => {
    expect(planarCentroid([{ x: 1, y: 1 }, { x: 2, y: 2 }, { x: 1, y: 1 }])).toEqual({
      ok: false,
      reason: "polygon has fewer than 3 distinct vertices"
    });
  });

  it("fails on collinear vertices", () => {
    expect(planarCentroid([{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 }])).toEqual({
      ok: false,
      reason: "polygon has zero area"
    });
  });

  it("fails on collinear vertices at web mercator magnitudes", () => {
    const sliver = [
      { x: 224444.6, y: 5350125.4 },
      { x: 224450.1, y: 5350366.5 },
      { x: 224455.6, y: 5350607.6 }
    ];

    expect(planarCentroid(sliver)).toEqual({ ok: false, reason: "polygon has zero area" });
  });

  it("keeps a small real polygon far from the origin", () => {
    const plot = [
      { x: 537300, y: 5741300 },
      { x: 537301, y: 5741300 },
      { x: 537301, y: 5741301 },
      { x: 537300, y: 5741301 }
    ];
    const result = planarCentroid(plot);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.centroid.x).toBeCloseTo(537300.5, 6);
      expect(result.centroid.y).toBeCloseTo(5741300.5, 6);
    }
  });

  it("lies inside the projected polygon and differs from the projected vertex mean", () => {
    const projector = createProjector();
    const large = [
      { x: 0, y: 0 },
      { x: 1_000_000, y: 0 },
      { x: 1_000_000, y: 1_000_000 },
      { x: 0, y: 1_000_000 }
    ];
    const result = planarCentroid(large);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const centroid = projector.toGeographic(result.centroid);
    const projected = large.map((vertex) => projector.toGeographic(vertex));
    const ring = [...projected, projected[0]].map(({ lat, lon }) => [lon, lat]);

    expect(turf.booleanPointInPolygon(turf.point([centroid.lon, centroid.lat]), turf.polygon([ring]))).toBe(true);

    const meanLat = projected.reduce((sum, { lat }) => sum + lat, 0) / projected.length;
    expect(Math.abs(centroid.lat - meanLat)).toBeGreaterThan(0.01);
  });
});

describe("signedPlanarArea", () => {
  it("is positive for counter-clockwise rings", () => {
    expect(signedPlanarArea(closeRing(square))).toBe(100);
    expect(signedPlanarArea(closeRing([...square].reverse()))).toBe(-100);
  });
});
