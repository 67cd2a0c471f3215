import { EmptyFacilityTableError } from "./errors";
import { buildFacilityTable, type FacilityTable } from "./facilities";
import { findNearest } from "./geo";
import { parseDecimal } from "./numbers";
import type { Projector } from "./projection";
import type {
  Diagnostic,
  FacilityRecord,
  GeographicCoordinate,
  MatchRecord,
  QueryPoint
} from "./types";

export type CsvRow = Record<string, string | undefined>;

export type FacilityColumns = {
  id: string;
  point: string;
  polygon: string;
  medium: string;
};

export type QueryColumns = {
  latitude: string;
  longitude: string;
  label: string;
};

/** Built once per run and handed to every consumer; never mutated after creation. */
export type ReconcileContext = {
  readonly projector: Projector;
  readonly table: FacilityTable;
  readonly diagnostics: readonly Diagnostic[];
};

export type QueryPointBuild = {
  queries: QueryPoint[];
  diagnostics: Diagnostic[];
};

export function toFacilityRecords(rows: readonly CsvRow[], columns: FacilityColumns): FacilityRecord[] {
  return rows.map((row, index) => ({
    id: String(row[columns.id] ?? "").trim() || `row ${index}`,
    pointWkt: row[columns.point],
    polygonWkt: row[columns.polygon],
    medium: row[columns.medium]
  }));
}

export function createReconcileContext(
  facilities: readonly FacilityRecord[],
  projector: Projector
): ReconcileContext {
  const { table, diagnostics } = buildFacilityTable(facilities, projector);
  if (table.anchors.length === 0) {
    throw new EmptyFacilityTableError(facilities.length);
  }

  return { projector, table, diagnostics };
}

export function parseGeographic(latitude: unknown, longitude: unknown): GeographicCoordinate | null {
  const lat = parseDecimal(latitude);
  const lon = parseDecimal(longitude);

  if (lat === null || lon === null) return null;
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) return null;

  return { lat, lon };
}

export function toQueryPoints(rows: readonly CsvRow[], columns: QueryColumns): QueryPointBuild {
  const queries: QueryPoint[] = [];
  const diagnostics: Diagnostic[] = [];

  rows.forEach((row, index) => {
    const latitude = row[columns.latitude];
    const longitude = row[columns.longitude];
    const location = parseGeographic(latitude, longitude);

    if (!location) {
      diagnostics.push({
        rowId: String(index),
        reason: `invalid coordinates (latitude '${latitude ?? ""}', longitude '${longitude ?? ""}')`
      });
      return;
    }

    queries.push({ id: index, location, label: (row[columns.label] ?? "").trim() });
  });

  return { queries, diagnostics };
}

export function matchQuery(context: ReconcileContext, query: QueryPoint): MatchRecord {
  const { anchor, distanceKm } = findNearest(query.location, context.table.anchors);

  return {
    queryId: query.id,
    queryLocation: query.location,
    label: query.label,
    facilityId: anchor.id,
    facilityLocation: anchor.location,
    distanceKm
  };
}

// O(queries × anchors); each query is independent and only reads the table.
export function matchQueries(context: ReconcileContext, queries: readonly QueryPoint[]): MatchRecord[] {
  return queries.map((query) => matchQuery(context, query));
}
