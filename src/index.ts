#!/usr/bin/env node
import path from "path";
import readline from "readline";
import { loadConfig, type AppConfig } from "./config";
import { loadReconcileContext, renderFacilitiesMap, runReconciliation } from "./csvProcess";
import { getErrorMessage } from "./errors";
import { buildMapLayers } from "./mapLayers";
import { matchQuery, parseGeographic, type ReconcileContext } from "./reconcile";
import { geocodeCsv, ReverseGeocoder } from "./reverseGeocode";
import { startWebServer } from "./webServer";

function askQuestion(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => rl.question(question, resolve));
}

type PathKey = "facilitiesCsvPath" | "queriesCsvPath" | "matchesCsvPath" | "mapHtmlPath";

function withPaths(config: AppConfig, args: string[], keys: PathKey[]): AppConfig {
  const overrides: Partial<Record<PathKey, string>> = {};
  keys.forEach((key, index) => {
    const value = args[index];
    if (value) overrides[key] = path.resolve(value);
  });
  return { ...config, ...overrides };
}

async function runInteractiveMode(context: ReconcileContext) {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  console.log(`Interactive mode, ${context.table.anchors.length} facilities loaded. Type 'exit' to quit.`);

  let id = 0;
  while (true) {
    const latitudeInput = (await askQuestion(rl, "Latitude: ")).trim();
    if (latitudeInput.toLowerCase() === "exit") break;

    const longitudeInput = (await askQuestion(rl, "Longitude: ")).trim();
    if (longitudeInput.toLowerCase() === "exit") break;

    const location = parseGeographic(latitudeInput, longitudeInput);
    if (!location) {
      console.log("Invalid input. Please enter a latitude in [-90, 90] and a longitude in [-180, 180].");
      continue;
    }

    const result = matchQuery(context, { id: id++, location, label: "" });
    console.log(JSON.stringify(result, null, 2));
    console.log("");
  }

  rl.close();
}

function printUsage() {
  console.log("Usage:");
  console.log("  facility-reconcile --csv [facilities.csv] [queries.csv] [matches.csv] [map.html]");
  console.log("  facility-reconcile --map [facilities.csv] [map.html]");
  console.log("  facility-reconcile --geocode <input.csv> <output.csv>");
  console.log("  facility-reconcile --interactive [facilities.csv]");
  console.log("  facility-reconcile --serve [facilities.csv]");
}

async function main() {
  const [mode, ...args] = process.argv.slice(2);
  const config = loadConfig();

  if (mode === "--csv") {
    const summary = await runReconciliation(
      withPaths(config, args, ["facilitiesCsvPath", "queriesCsvPath", "matchesCsvPath", "mapHtmlPath"])
    );
    console.log(
      `${summary.matches} match(es) from ${summary.queryRows} query row(s) against ${summary.anchors} facilities.`
    );
    return;
  }

  if (mode === "--map") {
    const count = await renderFacilitiesMap(withPaths(config, args, ["facilitiesCsvPath", "mapHtmlPath"]));
    console.log(`${count} map feature(s) rendered.`);
    return;
  }

  if (mode === "--geocode") {
    const [input, output] = args;
    if (!input || !output) {
      printUsage();
      process.exitCode = 1;
      return;
    }
    await geocodeCsv(path.resolve(input), path.resolve(output), new ReverseGeocoder());
    return;
  }

  if (mode === "--interactive" || mode === "-i") {
    const { context } = await loadReconcileContext(withPaths(config, args, ["facilitiesCsvPath"]));
    await runInteractiveMode(context);
    return;
  }

  if (mode === "--serve") {
    const { facilities, projector, context } = await loadReconcileContext(
      withPaths(config, args, ["facilitiesCsvPath"])
    );
    const layers = buildMapLayers({ facilities, projector, table: context.table });
    startWebServer(
      { context, layers, publicDir: config.publicDir, indexFile: path.basename(config.mapHtmlPath) },
      config.port
    );
    return;
  }

  printUsage();
}

main().catch((error: unknown) => {
  console.error(getErrorMessage(error));
  process.exitCode = 1;
});
