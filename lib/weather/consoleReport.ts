import type { SummaryStat } from "@/modules/weatherAnalysis/aggregate";
import type { WeatherReport } from "@/modules/weatherAnalysis/service";

const RULE = "=".repeat(60);

const ROLE_LABELS = {
  hottest: "Hottest Day",
  coldest: "Coldest Day",
  wettest: "Wettest Day",
  windiest: "Windiest Day",
} as const;

const UNITS: Record<string, string> = {
  temperature: "°C",
  precipitation: " mm",
  wind_speed: " km/h",
  pressure: " hPa",
};

export function fmt2(n: number): string {
  return Number.isFinite(n) ? n.toFixed(2) : "n/a";
}

export function formatSummaryLines(summary: Record<string, SummaryStat>): string[] {
  const lines: string[] = [];
  for (const [column, s] of Object.entries(summary)) {
    lines.push(
      `${column.toUpperCase()}:`,
      `  Mean:     ${fmt2(s.mean)}`,
      `  Median:   ${fmt2(s.median)}`,
      `  Std Dev:  ${fmt2(s.std)}`,
      `  Min:      ${fmt2(s.min)}`,
      `  Max:      ${fmt2(s.max)}`,
    );
  }
  return lines;
}

export function formatReportLines(report: WeatherReport): string[] {
  const { quickInfo } = report;
  const lines: string[] = [
    RULE,
    "WEATHER DATA SUMMARY STATISTICS",
    RULE,
    `Total Records: ${quickInfo.totalRecords}`,
    `Columns: ${quickInfo.columnCount}`,
    `Date Range: ${quickInfo.dateRange.start} to ${quickInfo.dateRange.end}`,
    "",
    ...formatSummaryLines(report.summary),
  ];

  if (report.extremes.length) {
    lines.push("", RULE, "EXTREME WEATHER DAYS", RULE);
    for (const e of report.extremes) {
      lines.push(`${ROLE_LABELS[e.role]}: ${e.record.date} - ${fmt2(e.value)}${UNITS[e.column] ?? ""}`);
    }
  }

  if (report.insights.headline) {
    lines.push("", RULE, "INSIGHTS", RULE, report.insights.headline);
    for (const s of report.insights.seasons) lines.push(`  ${s.season}: ${s.mean.toFixed(1)}°C`);
  }
  return lines;
}
