import { describe, expect, it } from "vitest";
import {
  buildInsights,
  buildQuickInfo,
  computeCorrelationMatrix,
  findExtremeDays,
  formatTrendHeadline,
  monthLabel,
} from "@/modules/weatherAnalysis/insights";
import { EmptyTableError } from "@/modules/weatherAnalysis/errors";
import { createWeatherTable } from "@/modules/weatherTable/table";

const example = createWeatherTable([
  { date: "2024-01-01", values: { temperature: 10 } },
  { date: "2024-02-01", values: { temperature: 10 } },
  { date: "2024-07-01", values: { temperature: 30 } },
]);

describe("buildQuickInfo", () => {
  it("counts rows and columns and spans the date range regardless of order", () => {
    const table = createWeatherTable([
      { date: "2024-03-01", values: { temperature: 1, precipitation: 0 } },
      { date: "2024-01-15", values: { temperature: 2, precipitation: 1 } },
      { date: "2024-02-01", values: { temperature: 3, precipitation: 2 } },
    ]);
    expect(buildQuickInfo(table)).toEqual({
      totalRecords: 3,
      columnCount: 3,
      dateRange: { start: "2024-01-15", end: "2024-03-01" },
    });
  });

  it("rejects an empty table", () => {
    expect(() => buildQuickInfo(createWeatherTable([]))).toThrow(EmptyTableError);
  });
});

describe("findExtremeDays", () => {
  it("tags each available role and skips missing or empty columns", () => {
    const table = createWeatherTable([
      { date: "2024-06-01", values: { temperature: 35, precipitation: 0, wind_speed: null } },
      { date: "2024-06-02", values: { temperature: 22, precipitation: 14.5, wind_speed: null } },
      { date: "2024-06-03", values: { temperature: 18, precipitation: 2, wind_speed: null } },
    ]);
    const extremes = findExtremeDays(table);
    expect(extremes.map((e) => [e.role, e.record.date, e.value])).toEqual([
      ["hottest", "2024-06-01", 35],
      ["coldest", "2024-06-03", 18],
      ["wettest", "2024-06-02", 14.5],
    ]);
  });
});

describe("computeCorrelationMatrix", () => {
  it("computes pairwise Pearson r over numeric columns", () => {
    const table = createWeatherTable([
      { date: "2024-01-01", values: { a: 1, b: 2, c: 3, d: 5, label: "x" } },
      { date: "2024-01-02", values: { a: 2, b: 4, c: 2, d: 5, label: "y" } },
      { date: "2024-01-03", values: { a: 3, b: 6, c: 1, d: 5, label: "z" } },
    ]);
    const { columns, values } = computeCorrelationMatrix(table);
    expect(columns).toEqual(["a", "b", "c", "d"]);
    expect(values[0][0]).toBe(1);
    expect(values[0][1]).toBe(1);
    expect(values[0][2]).toBe(-1);
    expect(values[2][0]).toBe(-1);
    expect(Number.isNaN(values[0][3])).toBe(true);
    expect(Number.isNaN(values[3][3])).toBe(true);
  });

  it("only pairs rows where both values are present", () => {
    const table = createWeatherTable([
      { date: "2024-01-01", values: { a: 1, b: 10 } },
      { date: "2024-01-02", values: { a: null, b: 99 } },
      { date: "2024-01-03", values: { a: 3, b: 30 } },
    ]);
    expect(computeCorrelationMatrix(table).values[0][1]).toBe(1);
  });
});

describe("buildInsights", () => {
  it("summarises average temperature, trend and ranked seasons", () => {
    const insights = buildInsights(example);
    expect(insights.averageTemperature).toBeCloseTo(50 / 3, 12);
    expect(insights.trend).toBe("cooling");
    expect(insights.headline).toBe("The average temperature is 16.67°C and the recent trend shows cooling.");
    expect(insights.seasons).toEqual([
      { season: "Summer", mean: 30 },
      { season: "Winter", mean: 10 },
    ]);
  });

  it("returns empty insights without temperature data", () => {
    const table = createWeatherTable([{ date: "2024-01-01", values: { pressure: 1012 } }]);
    expect(buildInsights(table)).toEqual({ averageTemperature: null, trend: null, headline: null, seasons: [] });
  });

  it("formats the headline with two decimals", () => {
    expect(formatTrendHeadline(25.456, "warming")).toBe(
      "The average temperature is 25.46°C and the recent trend shows warming.",
    );
  });
});

describe("monthLabel", () => {
  it("maps month numbers to short names", () => {
    expect(monthLabel(1)).toBe("Jan");
    expect(monthLabel(12)).toBe("Dec");
    expect(() => monthLabel(13)).toThrow(RangeError);
  });
});
