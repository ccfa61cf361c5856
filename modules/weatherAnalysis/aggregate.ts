import { findColumn, monthOfDateKey, numericCells, numericColumnNames } from "@/modules/weatherTable/table";
import type { WeatherRecord, WeatherTable } from "@/modules/weatherTable/types";
import { TEMPERATURE } from "@/modules/weatherTable/types";
import {
  AllNullColumnError,
  ColumnNotFoundError,
  ColumnTypeError,
  EmptyTableError,
} from "@/modules/weatherAnalysis/errors";
import { maxOf, mean, median, minOf, nonNull, sampleStd } from "@/modules/weatherAnalysis/stats";

export type SummaryStat = {
  count: number;
  mean: number;
  median: number;
  /** Sample std (ddof = 1); NaN when fewer than two values. */
  std: number;
  min: number;
  max: number;
};

export type MonthlyAverage = { month: number; mean: number };

export type Season = "Winter" | "Spring" | "Summer" | "Fall";

export type SeasonalAverages = Partial<Record<Season, number>>;

export type SeasonalAverageEntry = { season: Season; mean: number };

export type ExtremeDirection = "max" | "min";

export type ExtremeRecord = {
  column: string;
  direction: ExtremeDirection;
  value: number;
  /** Position of the row in table order. */
  index: number;
  record: Readonly<WeatherRecord>;
};

export type TrendClassification = "warming" | "cooling";

export type TrendDetail = {
  trend: TrendClassification;
  overallMean: number;
  recentMean: number;
  windowSize: number;
};

export const TREND_WINDOW_DAYS = 30;

// Fixed Northern-Hemisphere mapping, not location aware.
const SEASON_BY_MONTH: Record<number, Season> = {
  12: "Winter",
  1: "Winter",
  2: "Winter",
  3: "Spring",
  4: "Spring",
  5: "Spring",
  6: "Summer",
  7: "Summer",
  8: "Summer",
  9: "Fall",
  10: "Fall",
  11: "Fall",
};

export function seasonOfMonth(month: number): Season {
  const season = SEASON_BY_MONTH[month];
  if (!season) throw new RangeError(`Month out of range: ${month}`);
  return season;
}

function requireRows(table: WeatherTable): void {
  if (table.rows.length === 0) throw new EmptyTableError();
}

function requireNumericColumn(table: WeatherTable, column: string): Array<number | null> {
  const spec = findColumn(table, column);
  if (!spec) throw new ColumnNotFoundError(column);
  if (spec.kind !== "numeric") throw new ColumnTypeError(column, spec.kind);
  return numericCells(table, column);
}

export function computeSummaryStatistics(table: WeatherTable): Record<string, SummaryStat> {
  requireRows(table);
  const out: Record<string, SummaryStat> = {};
  for (const name of numericColumnNames(table)) {
    const values = nonNull(numericCells(table, name));
    // Entirely empty optional columns are left out rather than reported as NaN.
    if (values.length === 0) continue;
    out[name] = {
      count: values.length,
      mean: mean(values),
      median: median(values),
      std: sampleStd(values),
      min: minOf(values),
      max: maxOf(values),
    };
  }
  return out;
}

export function computeMonthlyAverage(table: WeatherTable, column: string): MonthlyAverage[] {
  requireRows(table);
  const cells = requireNumericColumn(table, column);

  const buckets = new Map<number, { sum: number; count: number }>();
  table.rows.forEach((row, idx) => {
    const v = cells[idx];
    if (v === null) return;
    const month = monthOfDateKey(row.date);
    const cur = buckets.get(month) ?? { sum: 0, count: 0 };
    cur.sum += v;
    cur.count += 1;
    buckets.set(month, cur);
  });

  const out: MonthlyAverage[] = [];
  for (let month = 1; month <= 12; month++) {
    const b = buckets.get(month);
    if (!b || b.count === 0) continue;
    out.push({ month, mean: b.sum / b.count });
  }
  return out;
}

function seasonalBuckets(table: WeatherTable): Map<Season, { sum: number; count: number }> {
  requireRows(table);
  const temps = requireNumericColumn(table, TEMPERATURE);
  // Map keeps first-appearance order, which is the tie-break for equal means.
  const buckets = new Map<Season, { sum: number; count: number }>();
  table.rows.forEach((row, idx) => {
    const t = temps[idx];
    if (t === null) return;
    const season = seasonOfMonth(monthOfDateKey(row.date));
    const cur = buckets.get(season) ?? { sum: 0, count: 0 };
    cur.sum += t;
    cur.count += 1;
    buckets.set(season, cur);
  });
  return buckets;
}

/** Seasons ranked by descending mean temperature; equal means keep input order. */
export function listSeasonalAverages(table: WeatherTable): SeasonalAverageEntry[] {
  const entries = Array.from(seasonalBuckets(table).entries()).map(([season, b]) => ({
    season,
    mean: b.sum / b.count,
  }));
  return entries.sort((a, b) => b.mean - a.mean);
}

export function computeSeasonalAverage(table: WeatherTable): SeasonalAverages {
  const out: SeasonalAverages = {};
  for (const entry of listSeasonalAverages(table)) out[entry.season] = entry.mean;
  return out;
}

export function findExtremeDay(table: WeatherTable, column: string, direction: ExtremeDirection): ExtremeRecord {
  requireRows(table);
  const cells = requireNumericColumn(table, column);

  let bestIdx = -1;
  let best = NaN;
  cells.forEach((v, idx) => {
    if (v === null) return;
    // Strict comparison: the first occurrence wins ties.
    if (bestIdx < 0 || (direction === "max" ? v > best : v < best)) {
      bestIdx = idx;
      best = v;
    }
  });
  if (bestIdx < 0) throw new AllNullColumnError(column);

  return { column, direction, value: best, index: bestIdx, record: table.rows[bestIdx] };
}

export function describeTrend(table: WeatherTable): TrendDetail {
  requireRows(table);
  const temps = requireNumericColumn(table, TEMPERATURE);
  const all = nonNull(temps);
  if (all.length === 0) throw new AllNullColumnError(TEMPERATURE);

  const windowSize = Math.min(TREND_WINDOW_DAYS, temps.length);
  const overallMean = mean(all);
  const recentMean = mean(nonNull(temps.slice(temps.length - windowSize)));

  // Strictly greater: equal means (any table of up to 30 rows) read as cooling.
  // An all-null recent window yields NaN, which also reads as cooling.
  const trend: TrendClassification = recentMean > overallMean ? "warming" : "cooling";
  return { trend, overallMean, recentMean, windowSize };
}

export function classifyTrend(table: WeatherTable): TrendClassification {
  return describeTrend(table).trend;
}
