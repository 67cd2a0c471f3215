export type ReconcileErrorCode =
  | "EMPTY_FACILITY_TABLE"
  | "MISSING_COLUMN"
  | "INVALID_PROJECTION"
  | "UNSUPPORTED_CRS";

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;

  constructor(code: ReconcileErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyFacilityTableError extends ReconcileError {
  constructor(rowCount?: number) {
    super(
      "EMPTY_FACILITY_TABLE",
      rowCount === undefined
        ? "No facility location to match against."
        : `No valid facility location found in ${rowCount} row(s).`
    );
  }
}

export class MissingColumnError extends ReconcileError {
  readonly column: string;

  constructor(column: string, dataset: string) {
    super("MISSING_COLUMN", `Column '${column}' not found in ${dataset}.`);
    this.column = column;
  }
}

export class InvalidProjectionError extends ReconcileError {
  constructor(x: number, y: number) {
    super("INVALID_PROJECTION", `Projection of (${x}, ${y}) did not produce a finite coordinate.`);
  }
}

export class UnsupportedCrsError extends ReconcileError {
  constructor(sourceCrs: string, targetCrs: string, cause: unknown) {
    super("UNSUPPORTED_CRS", `Cannot transform ${sourceCrs} to ${targetCrs}: ${getErrorMessage(cause)}`);
  }
}

export function getErrorMessage(error: unknown) {
  if (error instanceof Error) return error.message;
  if (typeof error === "string" && error.trim()) return error.trim();
  return "Unknown error";
}
