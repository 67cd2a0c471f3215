import { describe, expect, it } from "vitest";
import { EmptyFacilityTableError } from "./errors";
import { EARTH_RADIUS_KM, findNearest, haversineKm } from "./geo";
import type { FacilityAnchor } from "./types";

function anchor(id: string, lat: number, lon: number): FacilityAnchor {
  return { id, location: { lat, lon }, source: "point" };
}

describe("haversineKm", () => {
  const paris = { lat: 48.8566, lon: 2.3522 };
  const lyon = { lat: 45.764, lon: 4.8357 };

  it("is zero for identical points", () => {
    expect(haversineKm(paris, paris)).toBe(0);
  });

  it("is symmetric", () => {
    expect(haversineKm(paris, lyon)).toBe(haversineKm(lyon, paris));
    expect(haversineKm({ lat: -33.9, lon: 151.2 }, paris)).toBe(haversineKm(paris, { lat: -33.9, lon: 151.2 }));
  });

  it("uses a 6371 km sphere", () => {
    expect(haversineKm({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo((EARTH_RADIUS_KM * Math.PI) / 180, 9);
  });

  it("stays finite for antipodal points", () => {
    expect(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 180 })).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
    expect(haversineKm({ lat: 10, lon: 20 }, { lat: -10, lon: -160 })).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 3);
  });
});

describe("findNearest", () => {
  const table = [anchor("F1", 48.8566, 2.3522), anchor("F2", 45.764, 4.8357)];

  it("picks the closest anchor", () => {
    const result = findNearest({ lat: 48.8606, lon: 2.3376 }, table);
    expect(result.anchor.id).toBe("F1");
    expect(result.distanceKm).toBeCloseTo(1.157, 3);
  });

  it("returns zero when the query sits on an anchor", () => {
    const result = findNearest({ lat: 45.764, lon: 4.8357 }, table);
    expect(result.anchor.id).toBe("F2");
    expect(result.distanceKm).toBe(0);
  });

  it("keeps the first anchor in table order on ties", () => {
    const tied = [anchor("east", 0, 1), anchor("west", 0, -1), anchor("north", 1, 0)];
    for (let i = 0; i < 3; i++) {
      expect(findNearest({ lat: 0, lon: 0 }, tied).anchor.id).toBe("east");
    }
    expect(findNearest({ lat: 0, lon: 0 }, [tied[1], tied[0]]).anchor.id).toBe("west");
  });

  it("throws on an empty table", () => {
    expect(() => findNearest({ lat: 0, lon: 0 }, [])).toThrow(EmptyFacilityTableError);
    expect(() => findNearest({ lat: 0, lon: 0 }, [])).toThrow("No facility location to match against.");
  });
});
