import path from "path";
import { DEFAULT_SOURCE_CRS, DEFAULT_TARGET_CRS } from "./projection";
import type { FacilityColumns, QueryColumns } from "./reconcile";

export type AppConfig = {
  port: number;
  facilitiesCsvPath: string;
  queriesCsvPath: string;
  matchesCsvPath: string;
  mapHtmlPath: string;
  publicDir: string;
  facilitySeparator: string;
  querySeparator: string;
  facilityColumns: FacilityColumns;
  queryColumns: QueryColumns;
  sourceCrs: string;
  targetCrs: string;
};

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, key: string, fallback: string) {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const resolve = (key: string, fallback: string) => path.resolve(cwd, fromEnv(env, key, fallback));
  const port = Number(fromEnv(env, "PORT", "3000"));

  return {
    port: Number.isInteger(port) && port >= 0 ? port : 3000,
    facilitiesCsvPath: resolve("FACILITIES_CSV", "input/Localisations NRA NRO.csv"),
    queriesCsvPath: resolve("QUERIES_CSV", "input/fiab.csv"),
    matchesCsvPath: resolve("MATCHES_CSV", "output/nearest_facilities.csv"),
    mapHtmlPath: resolve("MAP_HTML", "output/map_all.html"),
    publicDir: resolve("PUBLIC_DIR", "output"),
    facilitySeparator: fromEnv(env, "FACILITIES_SEPARATOR", ","),
    querySeparator: fromEnv(env, "QUERIES_SEPARATOR", ";"),
    facilityColumns: {
      id: "FID",
      point: "the_geom",
      polygon: "osm_original_geom",
      medium: "telecom-medium"
    },
    queryColumns: {
      latitude: "Latitude",
      longitude: "Longitude",
      label: "Libelle"
    },
    sourceCrs: fromEnv(env, "SOURCE_CRS", DEFAULT_SOURCE_CRS),
    targetCrs: fromEnv(env, "TARGET_CRS", DEFAULT_TARGET_CRS)
  };
}
