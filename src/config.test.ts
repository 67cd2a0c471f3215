import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("resolves defaults against the working directory", () => {
    const config = loadConfig({}, "/work");

    expect(config.port).toBe(3000);
    expect(config.facilitiesCsvPath).toBe(path.resolve("/work", "input/Localisations NRA NRO.csv"));
    expect(config.queriesCsvPath).toBe(path.resolve("/work", "input/fiab.csv"));
    expect(config.matchesCsvPath).toBe(path.resolve("/work", "output/nearest_facilities.csv"));
    expect(config.facilitySeparator).toBe(",");
    expect(config.querySeparator).toBe(";");
    expect(config.sourceCrs).toBe("EPSG:3857");
    expect(config.targetCrs).toBe("EPSG:4326");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ PORT: "8080", QUERIES_CSV: "/data/gps.csv", QUERIES_SEPARATOR: "," }, "/work");

    expect(config.port).toBe(8080);
    expect(config.queriesCsvPath).toBe(path.resolve("/data/gps.csv"));
    expect(config.querySeparator).toBe(",");
  });

  it("ignores blank values and invalid ports", () => {
    const config = loadConfig({ PORT: "abc", MAP_HTML: "   " }, "/work");

    expect(config.port).toBe(3000);
    expect(config.mapHtmlPath).toBe(path.resolve("/work", "output/map_all.html"));
  });
});
