import http from "http";
import fs from "fs";
import path from "path";
import { URL } from "url";
import { getErrorMessage } from "./errors";
import type { MapLayers } from "./mapLayers";
import { matchQuery, parseGeographic, type ReconcileContext } from "./reconcile";
import type { Diagnostic, MatchRecord, QueryPoint } from "./types";

type QueryInput = {
  latitude?: unknown;
  longitude?: unknown;
  label?: unknown;
};

type BatchResult = {
  count: number;
  results: MatchRecord[];
  dropped: Diagnostic[];
};

export type WebServerOptions = {
  context: ReconcileContext;
  layers: MapLayers;
  publicDir: string;
  indexFile: string;
};

const MAX_BODY_BYTES = 5_000_000;

class RequestBodyTooLargeError extends Error {
  constructor() {
    super(`Request body is larger than ${MAX_BODY_BYTES} bytes`);
    this.name = "RequestBodyTooLargeError";
  }
}

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "application/javascript; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".geojson": "application/geo+json; charset=utf-8",
  ".csv": "text/csv; charset=utf-8",
  ".svg": "image/svg+xml; charset=utf-8",
  ".png": "image/png"
};

function sendJson(res: http.ServerResponse, statusCode: number, payload: unknown) {
  res.writeHead(statusCode, { "Content-Type": MIME_TYPES[".json"] });
  res.end(JSON.stringify(payload, null, 2));
}

// Decoded once at the end so multi-byte characters split across chunks survive.
function readRequestBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestBodyTooLargeError());
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function isQueryInput(value: unknown): value is QueryInput {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toQueryPoint(input: unknown, id: number): QueryPoint | null {
  if (!isQueryInput(input)) return null;

  const location = parseGeographic(input.latitude, input.longitude);
  if (!location) return null;

  const label = typeof input.label === "string" ? input.label.trim() : "";
  return { id, location, label };
}

export function processNearest(context: ReconcileContext, payload: unknown): MatchRecord {
  const query = toQueryPoint(payload, 0);
  if (!query) {
    throw new Error("Latitude and longitude must be valid numbers.");
  }
  return matchQuery(context, query);
}

export function processNearestBatch(context: ReconcileContext, payload: unknown): BatchResult {
  const points = isQueryInput(payload) && "points" in payload ? payload.points : undefined;
  if (!Array.isArray(points)) {
    throw new Error("Body must be an object with a 'points' array.");
  }

  const results: MatchRecord[] = [];
  const dropped: Diagnostic[] = [];

  points.forEach((point: unknown, index) => {
    const query = toQueryPoint(point, index);
    if (query) {
      results.push(matchQuery(context, query));
    } else {
      dropped.push({ rowId: String(index), reason: "invalid coordinates" });
    }
  });

  return { count: results.length, results, dropped };
}

function decodePath(reqPath: string) {
  try {
    return decodeURIComponent(reqPath);
  } catch {
    return null;
  }
}

function serveStatic(publicDir: string, indexFile: string, reqPath: string, res: http.ServerResponse) {
  const decoded = decodePath(reqPath);
  if (decoded === null) {
    sendJson(res, 400, { error: "Bad request" });
    return;
  }

  const relativePath = decoded === "/" ? indexFile : decoded.slice(1);
  const filePath = path.resolve(publicDir, relativePath);

  if (!filePath.startsWith(publicDir + path.sep)) {
    sendJson(res, 403, { error: "Forbidden" });
    return;
  }

  fs.readFile(filePath, (err, content) => {
    if (err) {
      if (err.code === "ENOENT") {
        sendJson(res, 404, { error: "Not found" });
        return;
      }
      sendJson(res, 500, { error: "Failed to read file" });
      return;
    }

    const ext = path.extname(filePath).toLowerCase();
    const contentType = MIME_TYPES[ext] ?? "application/octet-stream";
    res.writeHead(200, { "Content-Type": contentType });
    res.end(content);
  });
}

function sendRequestError(res: http.ServerResponse, error: unknown) {
  const statusCode = error instanceof RequestBodyTooLargeError ? 413 : 400;
  sendJson(res, statusCode, { error: getErrorMessage(error) });
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const rawBody = await readRequestBody(req);
  return JSON.parse(rawBody);
}

export function createWebServer(options: WebServerOptions) {
  const { context, layers, indexFile } = options;
  const publicDir = path.resolve(options.publicDir);

  return http.createServer(async (req, res) => {
    if (!req.url || !req.method) {
      sendJson(res, 400, { error: "Bad request" });
      return;
    }

    const url = new URL(req.url, `http://${req.headers.host ?? "localhost"}`);

    if (req.method === "POST" && url.pathname === "/api/nearest") {
      try {
        sendJson(res, 200, processNearest(context, await readJsonBody(req)));
      } catch (error) {
        sendRequestError(res, error);
      }
      return;
    }

    if (req.method === "POST" && url.pathname === "/api/nearest-batch") {
      try {
        sendJson(res, 200, processNearestBatch(context, await readJsonBody(req)));
      } catch (error) {
        sendRequestError(res, error);
      }
      return;
    }

    if (req.method === "GET" && url.pathname === "/api/layers") {
      sendJson(res, 200, layers);
      return;
    }

    if (req.method === "GET") {
      serveStatic(publicDir, indexFile, url.pathname, res);
      return;
    }

    sendJson(res, 405, { error: "Method not allowed" });
  });
}

export function startWebServer(options: WebServerOptions, port: number) {
  const server = createWebServer(options);
  server.listen(port, () => {
    console.log(`Nearest-facility API is running at http://localhost:${port}`);
  });
  return server;
}
