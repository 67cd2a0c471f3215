import proj4 from "proj4";
import { InvalidProjectionError, UnsupportedCrsError } from "./errors";
import type { GeographicCoordinate, PlanarCoordinate } from "./types";

export const DEFAULT_SOURCE_CRS = "EPSG:3857";
export const DEFAULT_TARGET_CRS = "EPSG:4326";

export type ProjectorOptions = {
  sourceCrs?: string;
  targetCrs?: string;
};

export type Projector = {
  readonly sourceCrs: string;
  readonly targetCrs: string;
  toGeographic(point: PlanarCoordinate): GeographicCoordinate;
};

function createConverter(sourceCrs: string, targetCrs: string) {
  try {
    return proj4(sourceCrs, targetCrs);
  } catch (error) {
    throw new UnsupportedCrsError(sourceCrs, targetCrs, error);
  }
}

/**
 * Builds the source → target converter once. Axis order is always x/east first
 * on input and [lon, lat] out of proj4; the result is flipped to { lat, lon }.
 */
export function createProjector(options: ProjectorOptions = {}): Projector {
  const sourceCrs = options.sourceCrs ?? DEFAULT_SOURCE_CRS;
  const targetCrs = options.targetCrs ?? DEFAULT_TARGET_CRS;
  const converter = createConverter(sourceCrs, targetCrs);

  return {
    sourceCrs,
    targetCrs,
    toGeographic(point) {
      const [lon, lat] = converter.forward([point.x, point.y]);
      if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
        throw new InvalidProjectionError(point.x, point.y);
      }
      return { lat, lon };
    }
  };
}
