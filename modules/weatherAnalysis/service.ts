import type { WeatherTable } from "@/modules/weatherTable/types";
import { TEMPERATURE } from "@/modules/weatherTable/types";
import {
  classifyTrend,
  computeMonthlyAverage,
  computeSeasonalAverage,
  computeSummaryStatistics,
  findExtremeDay,
  listSeasonalAverages,
  type ExtremeDirection,
  type ExtremeRecord,
  type MonthlyAverage,
  type SeasonalAverageEntry,
  type SeasonalAverages,
  type SummaryStat,
  type TrendClassification,
} from "@/modules/weatherAnalysis/aggregate";
import {
  buildInsights,
  buildQuickInfo,
  computeCorrelationMatrix,
  findExtremeDays,
  hasNumericColumn,
  monthLabel,
  type CorrelationMatrix,
  type QuickInfo,
  type RoleExtremeRecord,
  type WeatherInsights,
} from "@/modules/weatherAnalysis/insights";

/**
 * The aggregate operations behind one seam, so the HTTP routes and the CLI
 * consume them the same way. Every call takes the table it works on.
 */
export interface WeatherAggregator {
  computeSummaryStatistics(table: WeatherTable): Record<string, SummaryStat>;
  computeMonthlyAverage(table: WeatherTable, column: string): MonthlyAverage[];
  computeSeasonalAverage(table: WeatherTable): SeasonalAverages;
  listSeasonalAverages(table: WeatherTable): SeasonalAverageEntry[];
  findExtremeDay(table: WeatherTable, column: string, direction: ExtremeDirection): ExtremeRecord;
  classifyTrend(table: WeatherTable): TrendClassification;
}

export const weatherAggregator: WeatherAggregator = {
  computeSummaryStatistics,
  computeMonthlyAverage,
  computeSeasonalAverage,
  listSeasonalAverages,
  findExtremeDay,
  classifyTrend,
};

export type MonthlyAverageRow = MonthlyAverage & { label: string };

export type WeatherReport = {
  quickInfo: QuickInfo;
  summary: Record<string, SummaryStat>;
  monthlyTemperature: MonthlyAverageRow[];
  seasons: SeasonalAverageEntry[];
  extremes: RoleExtremeRecord[];
  correlations: CorrelationMatrix;
  insights: WeatherInsights;
};

export function analyzeWeatherTable(table: WeatherTable, aggregator: WeatherAggregator = weatherAggregator): WeatherReport {
  const hasTemperature = hasNumericColumn(table, TEMPERATURE);
  const monthlyTemperature = hasTemperature
    ? aggregator.computeMonthlyAverage(table, TEMPERATURE).map((m) => ({ ...m, label: monthLabel(m.month) }))
    : [];

  return {
    quickInfo: buildQuickInfo(table),
    summary: aggregator.computeSummaryStatistics(table),
    monthlyTemperature,
    seasons: hasTemperature ? aggregator.listSeasonalAverages(table) : [],
    extremes: findExtremeDays(table),
    correlations: computeCorrelationMatrix(table),
    insights: buildInsights(table),
  };
}

export type JsonSafe<T> = T extends number
  ? number | null
  : T extends string | boolean | null | undefined
    ? T
    : T extends ReadonlyArray<infer U>
      ? JsonSafe<U>[]
      : T extends object
        ? { [K in keyof T]: JsonSafe<T[K]> }
        : T;

/** Deep copy with non-finite numbers replaced by null (JSON has no NaN). */
export function toJsonSafe<T>(value: T): JsonSafe<T>;
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map((v) => toJsonSafe(v));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = toJsonSafe(v);
    return out;
  }
  return value;
}
