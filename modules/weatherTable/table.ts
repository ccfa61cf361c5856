import { DateTime } from "luxon";
import type { CellValue, ColumnKind, ColumnSpec, WeatherRecord, WeatherTable } from "@/modules/weatherTable/types";
import { DATE_COLUMN } from "@/modules/weatherTable/types";

const YYYY_MM_DD = /^\d{4}-\d{2}-\d{2}$/;

export class InvalidWeatherTableError extends Error {
  readonly rowIndex: number | null;
  constructor(message: string, rowIndex: number | null = null) {
    super(message);
    this.name = "InvalidWeatherTableError";
    this.rowIndex = rowIndex;
  }
}

export type WeatherRowInput = {
  date: string;
  values: Record<string, CellValue | undefined>;
};

export type CreateWeatherTableOptions = {
  /** Explicit column tags. When omitted, kinds are inferred once from the rows. */
  columns?: ColumnSpec[];
};

export function isDateKey(value: string): boolean {
  if (!YYYY_MM_DD.test(value)) return false;
  return DateTime.fromISO(value, { zone: "utc" }).isValid;
}

/** Calendar month (1-12) of a `YYYY-MM-DD` key. */
export function monthOfDateKey(dateKey: string): number {
  return Number(dateKey.slice(5, 7));
}

function normalizeCell(v: CellValue | undefined): CellValue {
  if (v === undefined || v === null) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  return v;
}

function inferKind(name: string, rows: WeatherRowInput[]): ColumnKind {
  for (const row of rows) {
    const v = normalizeCell(row.values[name]);
    if (v !== null && typeof v !== "number") return "other";
  }
  return "numeric";
}

function collectColumnNames(rows: WeatherRowInput[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row.values)) {
      if (key === DATE_COLUMN || seen.has(key)) continue;
      seen.add(key);
      out.push(key);
    }
  }
  return out;
}

/**
 * Build an immutable table. Column kinds are fixed here so aggregations never
 * inspect cell types again. Non-finite numbers are stored as null.
 */
export function createWeatherTable(rows: WeatherRowInput[], opts: CreateWeatherTableOptions = {}): WeatherTable {
  const specs: ColumnSpec[] = opts.columns
    ? opts.columns.filter((c) => c.name !== DATE_COLUMN).map((c) => ({ name: c.name, kind: c.kind }))
    : collectColumnNames(rows).map((name) => ({ name, kind: inferKind(name, rows) }));

  const records: WeatherRecord[] = rows.map((row, idx) => {
    const date = String(row.date ?? "").trim();
    if (!isDateKey(date)) {
      throw new InvalidWeatherTableError(`Row ${idx}: invalid date "${date}" (expected YYYY-MM-DD)`, idx);
    }
    const values: Record<string, CellValue> = {};
    for (const spec of specs) {
      const v = normalizeCell(row.values[spec.name]);
      if (spec.kind === "numeric" && v !== null && typeof v !== "number") {
        throw new InvalidWeatherTableError(`Row ${idx}: column "${spec.name}" is numeric but holds "${v}"`, idx);
      }
      values[spec.name] = v;
    }
    return Object.freeze({ date, values: Object.freeze(values) });
  });

  const columns = [{ name: DATE_COLUMN, kind: "date" as const }, ...specs].map((c) => Object.freeze(c));
  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(records),
  });
}

export function findColumn(table: WeatherTable, name: string): Readonly<ColumnSpec> | null {
  return table.columns.find((c) => c.name === name) ?? null;
}

export function numericColumnNames(table: WeatherTable): string[] {
  return table.columns.filter((c) => c.kind === "numeric").map((c) => c.name);
}

/** Cell values of a numeric column in table order; non-numbers read as null. */
export function numericCells(table: WeatherTable, name: string): Array<number | null> {
  return table.rows.map((r) => {
    const v = r.values[name];
    return typeof v === "number" ? v : null;
  });
}
