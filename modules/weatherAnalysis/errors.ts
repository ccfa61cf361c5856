import type { ColumnKind } from "@/modules/weatherTable/types";

export class WeatherAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WeatherAnalysisError";
  }
}

export class EmptyTableError extends WeatherAnalysisError {
  constructor(message?: string) {
    super(message ?? "Weather table has no rows to aggregate");
    this.name = "EmptyTableError";
  }
}

export class ColumnNotFoundError extends WeatherAnalysisError {
  readonly column: string;
  constructor(column: string, message?: string) {
    super(message ?? `Column not found: ${column}`);
    this.name = "ColumnNotFoundError";
    this.column = column;
  }
}

export class ColumnTypeError extends WeatherAnalysisError {
  readonly column: string;
  readonly kind: ColumnKind;
  constructor(column: string, kind: ColumnKind, message?: string) {
    super(message ?? `Column ${column} is ${kind}, expected numeric`);
    this.name = "ColumnTypeError";
    this.column = column;
    this.kind = kind;
  }
}

export class AllNullColumnError extends WeatherAnalysisError {
  readonly column: string;
  constructor(column: string, message?: string) {
    super(message ?? `Column ${column} has no non-null values`);
    this.name = "AllNullColumnError";
    this.column = column;
  }
}
