import fs from "fs";
import path from "path";
import csv from "csv-parser";
import type { AppConfig } from "./config";
import { MissingColumnError } from "./errors";
import { buildFacilityTable } from "./facilities";
import { buildMapLayers, renderMapHtml, viewForTable, type MapLayers } from "./mapLayers";
import { createProjector } from "./projection";
import {
  createReconcileContext,
  matchQueries,
  toFacilityRecords,
  toQueryPoints,
  type CsvRow
} from "./reconcile";
import type { Diagnostic, MatchRecord } from "./types";

export type CsvTable = {
  headers: string[];
  rows: CsvRow[];
};

export type ReconciliationSummary = {
  facilityRows: number;
  anchors: number;
  queryRows: number;
  matches: number;
  matchesCsvPath: string;
  mapHtmlPath: string;
};

export const MATCH_HEADERS = [
  "query_index",
  "query_lat",
  "query_lon",
  "label",
  "facility_id",
  "facility_lat",
  "facility_lon",
  "distance_km"
];

export function readCsvRows(filePath: string, separator: string): Promise<CsvTable> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvRow[] = [];

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(
        csv({
          separator,
          mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim()
        })
      )
      .on("headers", (parsedHeaders: string[]) => {
        headers = parsedHeaders;
      })
      .on("data", (row: CsvRow) => {
        rows.push(row);
      })
      .on("error", reject)
      .on("end", () => resolve({ headers, rows }));
  });
}

export function requireColumns(headers: readonly string[], columns: readonly string[], dataset: string) {
  for (const column of columns) {
    if (!headers.includes(column)) {
      throw new MissingColumnError(column, dataset);
    }
  }
}

export function formatCsvValue(value: string | number, separator: string) {
  const text = typeof value === "number" ? String(value) : value;
  if (text.includes(separator) || /["\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsvLine(values: ReadonlyArray<string | number>, separator: string) {
  return values.map((value) => formatCsvValue(value, separator)).join(separator);
}

export function formatMatchesCsv(matches: readonly MatchRecord[], separator = ",") {
  const lines = [formatCsvLine(MATCH_HEADERS, separator)];

  for (const match of matches) {
    lines.push(
      formatCsvLine(
        [
          match.queryId,
          match.queryLocation.lat,
          match.queryLocation.lon,
          match.label,
          match.facilityId,
          match.facilityLocation.lat,
          match.facilityLocation.lon,
          match.distanceKm
        ],
        separator
      )
    );
  }

  return `${lines.join("\n")}\n`;
}

export function writeTextFile(filePath: string, content: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

function reportDiagnostics(dataset: string, diagnostics: readonly Diagnostic[]) {
  for (const diagnostic of diagnostics) {
    console.warn(`[${dataset}] ${diagnostic.rowId}: ${diagnostic.reason}`);
  }
}

async function loadFacilities(config: AppConfig) {
  const { headers, rows } = await readCsvRows(config.facilitiesCsvPath, config.facilitySeparator);
  const { id, point, polygon, medium } = config.facilityColumns;
  requireColumns(headers, [id, point, polygon, medium], config.facilitiesCsvPath);

  return toFacilityRecords(rows, config.facilityColumns);
}

/** Reads the facility CSV and builds the table; fails on an empty table. */
export async function loadReconcileContext(config: AppConfig) {
  const facilities = await loadFacilities(config);
  const projector = createProjector({ sourceCrs: config.sourceCrs, targetCrs: config.targetCrs });

  const context = createReconcileContext(facilities, projector);
  reportDiagnostics("facilities", context.diagnostics);

  return { facilities, projector, context };
}

async function loadQueryTable(config: AppConfig) {
  const queryTable = await readCsvRows(config.queriesCsvPath, config.querySeparator);
  requireColumns(
    queryTable.headers,
    [config.queryColumns.latitude, config.queryColumns.longitude],
    config.queriesCsvPath
  );
  return queryTable;
}

type LoadedContext = Awaited<ReturnType<typeof loadReconcileContext>>;

function writeReconciliationOutputs(
  config: AppConfig,
  loaded: LoadedContext,
  matches: readonly MatchRecord[]
) {
  const { facilities, projector, context } = loaded;

  writeTextFile(config.matchesCsvPath, formatMatchesCsv(matches));
  console.log(`CSV exported: ${config.matchesCsvPath}`);

  const layers = buildMapLayers({ facilities, projector, table: context.table, matches });
  writeTextFile(config.mapHtmlPath, renderMapHtml(layers, viewForTable(context.table)));
  console.log(`Map saved: ${config.mapHtmlPath}`);
}

/**
 * Matches every query row and writes the CSV and the map. When the query file
 * cannot be read, the facility map and a header-only CSV are still written
 * before the error propagates.
 */
export async function runReconciliation(config: AppConfig): Promise<ReconciliationSummary> {
  const loaded = await loadReconcileContext(config);

  let queryTable: CsvTable;
  try {
    queryTable = await loadQueryTable(config);
  } catch (error) {
    writeReconciliationOutputs(config, loaded, []);
    throw error;
  }

  const { queries, diagnostics } = toQueryPoints(queryTable.rows, config.queryColumns);
  reportDiagnostics("queries", diagnostics);

  const matches = matchQueries(loaded.context, queries);
  writeReconciliationOutputs(config, loaded, matches);

  return {
    facilityRows: loaded.facilities.length,
    anchors: loaded.context.table.anchors.length,
    queryRows: queryTable.rows.length,
    matches: matches.length,
    matchesCsvPath: config.matchesCsvPath,
    mapHtmlPath: config.mapHtmlPath
  };
}

/** Facilities only: raw points, outlines and centroids, no matching. */
export async function renderFacilitiesMap(config: AppConfig) {
  const facilities = await loadFacilities(config);
  const projector = createProjector({ sourceCrs: config.sourceCrs, targetCrs: config.targetCrs });

  const { table, diagnostics } = buildFacilityTable(facilities, projector);
  reportDiagnostics("facilities", diagnostics);

  const layers = buildMapLayers({ facilities, projector, table });
  writeTextFile(config.mapHtmlPath, renderMapHtml(layers, facilitiesView(layers), "Facilities"));
  console.log(`Map saved: ${config.mapHtmlPath}`);

  return layers.features.length;
}

function facilitiesView(layers: MapLayers) {
  const first = layers.features[0];
  if (!first) return viewForTable(undefined);

  const [lon, lat] =
    first.geometry.type === "Point" ? first.geometry.coordinates : first.geometry.coordinates[0][0];
  return { center: { lat, lon }, zoom: 13 };
}
