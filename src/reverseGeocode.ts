import { formatCsvLine, readCsvRows, requireColumns, writeTextFile } from "./csvProcess";
import { getErrorMessage } from "./errors";
import { parseDecimal } from "./numbers";
import type { CsvRow } from "./reconcile";

export const DATA_GOUV_URL = "https://api-adresse.data.gouv.fr/reverse";
export const NOMINATIM_URL = "https://nominatim.openstreetmap.org/reverse";
export const ADDRESS_NOT_FOUND = "Address not found";
export const INVALID_COORDINATES = "Invalid coordinates";
export const ADDRESS_COLUMN = "Postal Address";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ReverseGeocoderOptions = {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  userAgent?: string;
  requestTimeoutMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  dataGouvDelayMs?: number;
  nominatimDelayMs?: number;
  dataGouvUrl?: string;
  nominatimUrl?: string;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const shouldRetryHttpStatus = (httpStatus: number): boolean =>
  httpStatus === 408 || httpStatus === 429 || httpStatus >= 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

export function formatDataGouvAddress(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.features)) return null;

  const feature: unknown = data.features[0];
  if (!isRecord(feature)) return null;

  const props: unknown = feature.properties;
  if (!isRecord(props)) return null;

  const housenumber = field(props, "housenumber");
  const street = field(props, "street");
  const postcode = field(props, "postcode");
  const city = field(props, "city");
  if (!street || !postcode || !city) return null;

  return housenumber ? `${housenumber} ${street}, ${postcode} ${city}` : `${street}, ${postcode} ${city}`;
}

export function formatNominatimAddress(data: unknown): string | null {
  if (!isRecord(data)) return null;

  const address: unknown = data.address;
  if (!isRecord(address)) return null;

  const housenumber = field(address, "house_number");
  const road = field(address, "road");
  const postcode = field(address, "postcode");
  const city = field(address, "city") || field(address, "town") || field(address, "village");
  if (!road || !postcode || !city) return null;

  return housenumber && housenumber !== postcode
    ? `${housenumber} ${road}, ${postcode} ${city}`
    : `${road}, ${postcode} ${city}`;
}

/**
 * data.gouv first, Nominatim as fallback, cached per coordinate pair. Calls are
 * sequential; each hit is followed by that provider's delay.
 */
export class ReverseGeocoder {
  private readonly fetchImpl: FetchLike;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly userAgent: string;

  private readonly requestTimeoutMs: number;

  private readonly retryAttempts: number;

  private readonly retryBaseDelayMs: number;

  private readonly dataGouvDelayMs: number;

  private readonly nominatimDelayMs: number;

  private readonly dataGouvUrl: string;

  private readonly nominatimUrl: string;

  private readonly cache = new Map<string, string>();

  constructor(options: ReverseGeocoderOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.userAgent = options.userAgent ?? "facility-reconcile-geocoder";
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5_000;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1_000;
    this.dataGouvDelayMs = options.dataGouvDelayMs ?? 200;
    this.nominatimDelayMs = options.nominatimDelayMs ?? 1_000;
    this.dataGouvUrl = options.dataGouvUrl ?? DATA_GOUV_URL;
    this.nominatimUrl = options.nominatimUrl ?? NOMINATIM_URL;
  }

  private async fetchJson(url: URL, headers: Record<string, string>): Promise<unknown> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.retryAttempts; attempt++) {
      if (attempt > 0) {
        await this.sleep(this.retryBaseDelayMs * 2 ** (attempt - 1));
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url.toString(), {
          headers,
          signal: AbortSignal.timeout(this.requestTimeoutMs)
        });
      } catch (error) {
        lastError = error;
        continue;
      }

      if (response.ok) {
        return response.json();
      }

      lastError = new Error(`HTTP ${response.status}`);
      if (!shouldRetryHttpStatus(response.status)) break;
    }

    throw lastError instanceof Error ? lastError : new Error(getErrorMessage(lastError));
  }

  async reverseDataGouv(lat: number, lon: number): Promise<string | null> {
    const url = new URL(this.dataGouvUrl);
    url.searchParams.set("lat", String(lat));
    url.searchParams.set("lon", String(lon));

    try {
      return formatDataGouvAddress(await this.fetchJson(url, {}));
    } catch (error) {
      console.error(`data.gouv error for (${lat}, ${lon}): ${getErrorMessage(error)}`);
      return null;
    }
  }

  async reverseNominatim(lat: number, lon: number): Promise<string | null> {
    const url = new URL(this.nominatimUrl);
    url.searchParams.set("format", "json");
    url.searchParams.set("lat", String(lat));
    url.searchParams.set("lon", String(lon));
    url.searchParams.set("zoom", "18");
    url.searchParams.set("addressdetails", "1");

    try {
      return formatNominatimAddress(await this.fetchJson(url, { "User-Agent": this.userAgent }));
    } catch (error) {
      console.error(`Nominatim error for (${lat}, ${lon}): ${getErrorMessage(error)}`);
      return null;
    }
  }

  async lookup(lat: number, lon: number): Promise<string> {
    const key = `${lat},${lon}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    let address = await this.reverseDataGouv(lat, lon);
    if (address) {
      console.log(`Address found via data.gouv for (${lat}, ${lon}): ${address}`);
      await this.sleep(this.dataGouvDelayMs);
    } else {
      console.log(`data.gouv found nothing for (${lat}, ${lon}), trying Nominatim.`);
      address = await this.reverseNominatim(lat, lon);
      if (address) {
        console.log(`Address found via Nominatim for (${lat}, ${lon}): ${address}`);
        await this.sleep(this.nominatimDelayMs);
      }
    }

    const resolved = address ?? ADDRESS_NOT_FOUND;
    this.cache.set(key, resolved);
    return resolved;
  }
}

export async function geocodeCsv(
  inputPath: string,
  outputPath: string,
  geocoder: ReverseGeocoder,
  separator = ";"
) {
  const { headers, rows } = await readCsvRows(inputPath, separator);
  requireColumns(headers, ["Latitude", "Longitude"], inputPath);

  const outputHeaders = headers.includes(ADDRESS_COLUMN) ? headers : [...headers, ADDRESS_COLUMN];
  const lines = [formatCsvLine(outputHeaders, separator)];
  const progressStep = Math.max(1, Math.ceil(rows.length / 20));

  for (const [index, row] of rows.entries()) {
    const lat = parseDecimal(row.Latitude);
    const lon = parseDecimal(row.Longitude);
    const address = lat !== null && lon !== null ? await geocoder.lookup(lat, lon) : INVALID_COORDINATES;

    const output: CsvRow = { ...row, [ADDRESS_COLUMN]: address };
    lines.push(formatCsvLine(outputHeaders.map((header) => output[header] ?? ""), separator));

    if ((index + 1) % progressStep === 0 || index + 1 === rows.length) {
      console.log(`Processing rows: ${index + 1}/${rows.length}`);
    }
  }

  writeTextFile(outputPath, `${lines.join("\n")}\n`);
  console.log(`File saved: ${outputPath}`);
  return rows.length;
}
