// lib/weather/csv.ts
// Uploaded CSV <-> WeatherTable. Header row required; `date` is the only mandatory column.

import * as Papa from "papaparse";
import { DateTime } from "luxon";
import { createWeatherTable, type WeatherRowInput } from "@/modules/weatherTable/table";
import type { CellValue, ColumnSpec, WeatherTable } from "@/modules/weatherTable/types";
import { CONTRACT_COLUMNS, DATE_COLUMN } from "@/modules/weatherTable/types";

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvFormatError";
  }
}

export type ParsedWeatherCsv = {
  table: WeatherTable;
  /** Non-fatal problems: skipped rows, duplicate headers, parser notes. */
  warnings: string[];
};

// Tried in order after ISO. Month-first wins when a date reads both ways.
const DATE_FORMATS = ["yyyy/M/d", "M/d/yyyy", "M-d-yyyy", "d-M-yyyy", "yyyy-MM-dd HH:mm:ss", "yyyy-MM-dd HH:mm"];

const NULL_TOKENS = new Set(["", "nan", "null", "na", "n/a", "none"]);

// Always numeric; stray text in these becomes null with a warning.
const NUMERIC_CONTRACT = new Set<string>(CONTRACT_COLUMNS.filter((c) => c !== DATE_COLUMN));

function stripBom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

export function normalizeHeader(h: string): string {
  return h
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Any accepted date spelling reduced to YYYY-MM-DD, or null. */
export function parseDateKey(raw: string): string | null {
  const s = String(raw ?? "").trim();
  if (!s) return null;

  const iso = DateTime.fromISO(s, { setZone: true });
  if (iso.isValid) return iso.toISODate();

  for (const fmt of DATE_FORMATS) {
    const dt = DateTime.fromFormat(s, fmt, { zone: "utc" });
    if (dt.isValid) return dt.toISODate();
  }
  return null;
}

function isNullToken(raw: string): boolean {
  return NULL_TOKENS.has(raw.trim().toLowerCase());
}

function toNumber(raw: string): number | null {
  const n = Number(raw.trim());
  return Number.isFinite(n) ? n : null;
}

export function parseWeatherCsv(text: string): ParsedWeatherCsv {
  const warnings: string[] = [];
  const { data, errors } = Papa.parse<string[]>(stripBom(String(text ?? "")), {
    header: false,
    skipEmptyLines: "greedy",
  });
  for (const e of errors.slice(0, 5)) warnings.push(`CSV: ${e.message}`);

  const [headerRow, ...dataRows] = data;
  if (!headerRow || headerRow.length === 0) throw new CsvFormatError("CSV has no header row");

  // Column position for each distinct normalized header; later duplicates are ignored.
  const headers: Array<{ name: string; position: number }> = [];
  headerRow.forEach((raw, position) => {
    const name = normalizeHeader(raw);
    if (!name) return;
    if (headers.some((h) => h.name === name)) {
      warnings.push(`Duplicate column "${name}" ignored`);
      return;
    }
    headers.push({ name, position });
  });

  const dateHeader = headers.find((h) => h.name === DATE_COLUMN);
  if (!dateHeader) throw new CsvFormatError('CSV is missing the required "date" column');
  const valueHeaders = headers.filter((h) => h.name !== DATE_COLUMN);

  const kept: Array<{ line: number; date: string; cells: string[] }> = [];
  dataRows.forEach((row, idx) => {
    const rawDate = String(row[dateHeader.position] ?? "");
    const date = parseDateKey(rawDate);
    if (!date) {
      warnings.push(`Row ${idx + 1}: unparseable date "${rawDate.trim()}" skipped`);
      return;
    }
    kept.push({ line: idx + 1, date, cells: valueHeaders.map((h) => String(row[h.position] ?? "")) });
  });
  if (kept.length === 0) throw new CsvFormatError("CSV has no rows with a valid date");

  const columns = valueHeaders.map((h, i): ColumnSpec => {
    if (NUMERIC_CONTRACT.has(h.name)) return { name: h.name, kind: "numeric" };
    const filled = kept.filter((r) => !isNullToken(r.cells[i]));
    const numbers = filled.filter((r) => toNumber(r.cells[i]) !== null).length;
    if (numbers === filled.length) return { name: h.name, kind: "numeric" };
    if (numbers > 0) warnings.push(`Column "${h.name}" mixes numbers and text; read as text`);
    return { name: h.name, kind: "other" };
  });

  const rows: WeatherRowInput[] = kept.map((r) => {
    const values: Record<string, CellValue> = {};
    columns.forEach((c, i) => {
      const raw = r.cells[i];
      if (isNullToken(raw)) {
        values[c.name] = null;
      } else if (c.kind === "numeric") {
        const n = toNumber(raw);
        if (n === null) warnings.push(`Row ${r.line}: non-numeric ${c.name} "${raw.trim()}" read as null`);
        values[c.name] = n;
      } else {
        values[c.name] = raw.trim();
      }
    });
    return { date: r.date, values };
  });

  return { table: createWeatherTable(rows, { columns }), warnings };
}

/** Header in table column order; nulls become empty cells. */
export function formatWeatherCsv(table: WeatherTable): string {
  const fields = table.columns.map((c) => c.name);
  const data = table.rows.map((row) =>
    fields.map((f) => {
      if (f === DATE_COLUMN) return row.date;
      const v = row.values[f];
      return v === null || v === undefined ? "" : v;
    }),
  );
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

export function weatherCsvFilename(city: string, startDate: string, endDate: string): string {
  const slug = city.trim().toLowerCase().replace(/\s+/g, "_");
  return `weather_data_${slug}_${startDate}_to_${endDate}.csv`;
}
