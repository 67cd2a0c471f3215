import { parseDecimal } from "./numbers";
import type { PlanarCoordinate } from "./types";

export type PointParse =
  | { kind: "parsed"; point: PlanarCoordinate }
  | { kind: "absent"; reason: string };

export type PolygonParse =
  | { kind: "parsed"; coordinates: PlanarCoordinate[]; skippedPairs: string[] }
  | { kind: "absent"; reason: string };

const POINT_PREFIX = "POINT(";
const POLYGON_PREFIX = "POLYGON((";

function stripParens(token: string) {
  return token.replace(/^[()]+|[()]+$/g, "");
}

function parsePair(tokens: string[]): PlanarCoordinate | null {
  if (tokens.length !== 2) return null;

  const x = parseDecimal(stripParens(tokens[0]));
  const y = parseDecimal(stripParens(tokens[1]));
  if (x === null || y === null) return null;

  return { x, y };
}

function splitTokens(text: string) {
  return text.trim().split(/\s+/).filter((token) => token.length > 0);
}

export function parsePoint(text: unknown): PointParse {
  if (typeof text !== "string") {
    return { kind: "absent", reason: "no point geometry" };
  }

  const value = text.trim();
  if (!value.startsWith(POINT_PREFIX) || !value.endsWith(")")) {
    return { kind: "absent", reason: "not a POINT(x y) geometry" };
  }

  const point = parsePair(splitTokens(value.slice(POINT_PREFIX.length, -1)));
  if (!point) {
    return { kind: "absent", reason: `invalid point coordinates in '${value}'` };
  }

  return { kind: "parsed", point };
}

/**
 * Parses `POLYGON((x1 y1, x2 y2, ...))`, optionally behind an `SRID=…;` prefix.
 * The prefix is dropped without being read. Pairs that fail to parse are skipped
 * and reported in `skippedPairs`; the polygon keeps the rest.
 */
export function parsePolygon(text: unknown): PolygonParse {
  if (typeof text !== "string") {
    return { kind: "absent", reason: "no polygon geometry" };
  }

  let value = text.trim();
  const separator = value.indexOf(";");
  if (separator !== -1) {
    value = value.slice(separator + 1).trim();
  }

  if (!value.startsWith(POLYGON_PREFIX) || !value.endsWith("))")) {
    return { kind: "absent", reason: "not a POLYGON((...)) geometry" };
  }

  const coordinates: PlanarCoordinate[] = [];
  const skippedPairs: string[] = [];

  for (const rawPair of value.slice(POLYGON_PREFIX.length, -2).split(",")) {
    if (rawPair.trim().length === 0) continue;

    const pair = parsePair(splitTokens(rawPair));
    if (pair) {
      coordinates.push(pair);
    } else {
      skippedPairs.push(rawPair.trim());
    }
  }

  return { kind: "parsed", coordinates, skippedPairs };
}
