import { findColumn, numericCells, numericColumnNames } from "@/modules/weatherTable/table";
import type { WeatherTable } from "@/modules/weatherTable/types";
import { PRECIPITATION, TEMPERATURE, WIND_SPEED } from "@/modules/weatherTable/types";
import {
  describeTrend,
  findExtremeDay,
  listSeasonalAverages,
  type ExtremeDirection,
  type ExtremeRecord,
  type SeasonalAverageEntry,
  type TrendClassification,
} from "@/modules/weatherAnalysis/aggregate";
import { EmptyTableError } from "@/modules/weatherAnalysis/errors";
import { nonNull, pearson } from "@/modules/weatherAnalysis/stats";

export type QuickInfo = {
  totalRecords: number;
  columnCount: number;
  dateRange: { start: string; end: string };
};

export type ExtremeRole = "hottest" | "coldest" | "wettest" | "windiest";

export type RoleExtremeRecord = ExtremeRecord & { role: ExtremeRole };

export type CorrelationMatrix = {
  columns: string[];
  /** values[i][j] = Pearson r of columns[i] and columns[j]; NaN when undefined. */
  values: number[][];
};

export type WeatherInsights = {
  averageTemperature: number | null;
  trend: TrendClassification | null;
  headline: string | null;
  seasons: SeasonalAverageEntry[];
};

const MONTH_LABELS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const EXTREME_ROLES: Array<{ role: ExtremeRole; column: string; direction: ExtremeDirection }> = [
  { role: "hottest", column: TEMPERATURE, direction: "max" },
  { role: "coldest", column: TEMPERATURE, direction: "min" },
  { role: "wettest", column: PRECIPITATION, direction: "max" },
  { role: "windiest", column: WIND_SPEED, direction: "max" },
];

export function monthLabel(month: number): string {
  const label = MONTH_LABELS[month - 1];
  if (!label) throw new RangeError(`Month out of range: ${month}`);
  return label;
}

export function hasNumericColumn(table: WeatherTable, name: string): boolean {
  return findColumn(table, name)?.kind === "numeric";
}

export function buildQuickInfo(table: WeatherTable): QuickInfo {
  if (table.rows.length === 0) throw new EmptyTableError();
  let start = table.rows[0].date;
  let end = start;
  // YYYY-MM-DD keys order lexicographically.
  for (const row of table.rows) {
    if (row.date < start) start = row.date;
    if (row.date > end) end = row.date;
  }
  return {
    totalRecords: table.rows.length,
    columnCount: table.columns.length,
    dateRange: { start, end },
  };
}

/** Role-tagged extremes; a role is skipped when its column is missing or empty. */
export function findExtremeDays(table: WeatherTable): RoleExtremeRecord[] {
  if (table.rows.length === 0) throw new EmptyTableError();
  const out: RoleExtremeRecord[] = [];
  for (const { role, column, direction } of EXTREME_ROLES) {
    if (!hasNumericColumn(table, column)) continue;
    if (nonNull(numericCells(table, column)).length === 0) continue;
    out.push({ role, ...findExtremeDay(table, column, direction) });
  }
  return out;
}

export function computeCorrelationMatrix(table: WeatherTable): CorrelationMatrix {
  if (table.rows.length === 0) throw new EmptyTableError();
  const columns = numericColumnNames(table);
  const cells = columns.map((c) => numericCells(table, c));

  const values = columns.map((_, i) =>
    columns.map((__, j) => {
      const r = pearson(cells[i], cells[j]);
      if (i === j) return Number.isNaN(r) ? NaN : 1;
      return r;
    }),
  );
  return { columns, values };
}

export function formatTrendHeadline(averageTemperature: number, trend: TrendClassification): string {
  return `The average temperature is ${averageTemperature.toFixed(2)}°C and the recent trend shows ${trend}.`;
}

export function buildInsights(table: WeatherTable): WeatherInsights {
  if (table.rows.length === 0) throw new EmptyTableError();
  if (!hasNumericColumn(table, TEMPERATURE) || nonNull(numericCells(table, TEMPERATURE)).length === 0) {
    return { averageTemperature: null, trend: null, headline: null, seasons: [] };
  }

  const detail = describeTrend(table);
  return {
    averageTemperature: detail.overallMean,
    trend: detail.trend,
    headline: formatTrendHeadline(detail.overallMean, detail.trend),
    seasons: listSeasonalAverages(table),
  };
}
