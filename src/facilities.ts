import { planarCentroid } from "./centroid";
import { getErrorMessage } from "./errors";
import type { Projector } from "./projection";
import type { Diagnostic, FacilityAnchor, FacilityRecord, PlanarCoordinate } from "./types";
import { parsePoint, parsePolygon } from "./wkt";

export type FacilityTable = {
  readonly anchors: readonly FacilityAnchor[];
  readonly rowCount: number;
};

export type FacilityTableBuild = {
  table: FacilityTable;
  diagnostics: Diagnostic[];
};

type AnchorAttempt =
  | { ok: true; anchor: FacilityAnchor }
  | { ok: false; reason: string };

const MIN_POLYGON_VERTICES = 3;

function anchorFromPolygon(
  facility: FacilityRecord,
  projector: Projector,
  diagnostics: Diagnostic[]
): AnchorAttempt {
  const parsed = parsePolygon(facility.polygonWkt);
  if (parsed.kind === "absent") return { ok: false, reason: parsed.reason };

  for (const pair of parsed.skippedPairs) {
    diagnostics.push({ rowId: facility.id, reason: `skipped polygon pair '${pair}'` });
  }

  if (parsed.coordinates.length < MIN_POLYGON_VERTICES) {
    return { ok: false, reason: `polygon has ${parsed.coordinates.length} valid pair(s)` };
  }

  const centroid = planarCentroid(parsed.coordinates);
  if (!centroid.ok) return { ok: false, reason: centroid.reason };

  return projectAnchor(facility.id, centroid.centroid, "centroid", projector);
}

function anchorFromPoint(facility: FacilityRecord, projector: Projector): AnchorAttempt {
  const parsed = parsePoint(facility.pointWkt);
  if (parsed.kind === "absent") return { ok: false, reason: parsed.reason };

  return projectAnchor(facility.id, parsed.point, "point", projector);
}

function projectAnchor(
  id: string,
  planar: PlanarCoordinate,
  source: FacilityAnchor["source"],
  projector: Projector
): AnchorAttempt {
  try {
    return { ok: true, anchor: { id, location: projector.toGeographic(planar), source } };
  } catch (error) {
    return { ok: false, reason: getErrorMessage(error) };
  }
}

/**
 * One anchor per facility, in row order. The polygon centroid wins; the raw
 * point is only used when the polygon is missing, malformed or degenerate.
 */
export function buildFacilityTable(
  facilities: readonly FacilityRecord[],
  projector: Projector
): FacilityTableBuild {
  const anchors: FacilityAnchor[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const facility of facilities) {
    const fromPolygon = anchorFromPolygon(facility, projector, diagnostics);
    if (fromPolygon.ok) {
      anchors.push(fromPolygon.anchor);
      continue;
    }

    const fromPoint = anchorFromPoint(facility, projector);
    if (fromPoint.ok) {
      if (facility.polygonWkt?.trim()) {
        diagnostics.push({
          rowId: facility.id,
          reason: `polygon unusable (${fromPolygon.reason}), using point`
        });
      }
      anchors.push(fromPoint.anchor);
      continue;
    }

    diagnostics.push({
      rowId: facility.id,
      reason: `no anchor: ${fromPolygon.reason}; ${fromPoint.reason}`
    });
  }

  return {
    table: { anchors: Object.freeze(anchors), rowCount: facilities.length },
    diagnostics
  };
}
