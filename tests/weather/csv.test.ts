import { describe, expect, it } from "vitest";
import {
  CsvFormatError,
  formatWeatherCsv,
  normalizeHeader,
  parseDateKey,
  parseWeatherCsv,
  weatherCsvFilename,
} from "@/lib/weather/csv";

const UPLOAD = [
  "Date,Temperature,Precipitation,Wind Speed,Pressure,Station",
  "2024-01-01,25.5,0,15,1013,north",
  "01/02/2024,26.3,,18,1015,north",
  "not-a-date,1,2,3,4,south",
  "2024/01/03,24.8,1.2,12,NaN,south",
  "",
].join("\n");

describe("parseWeatherCsv", () => {
  it("normalizes headers, dates and cells and tags column kinds", () => {
    const { table, warnings } = parseWeatherCsv(UPLOAD);
    expect(table.columns).toEqual([
      { name: "date", kind: "date" },
      { name: "temperature", kind: "numeric" },
      { name: "precipitation", kind: "numeric" },
      { name: "wind_speed", kind: "numeric" },
      { name: "pressure", kind: "numeric" },
      { name: "station", kind: "other" },
    ]);
    expect(table.rows.map((r) => r.date)).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
    expect(table.rows[0].values).toEqual({
      temperature: 25.5,
      precipitation: 0,
      wind_speed: 15,
      pressure: 1013,
      station: "north",
    });
    expect(table.rows[1].values.precipitation).toBeNull();
    expect(table.rows[2].values.pressure).toBeNull();
    expect(warnings).toEqual(['Row 3: unparseable date "not-a-date" skipped']);
  });

  it("keeps contract columns numeric and nulls stray text with a warning", () => {
    const { table, warnings } = parseWeatherCsv("date,temperature\n2024-01-01,10\n2024-01-02,inf\n2024-07-01,30\n");
    expect(table.columns[1]).toEqual({ name: "temperature", kind: "numeric" });
    expect(table.rows.map((r) => r.values.temperature)).toEqual([10, null, 30]);
    expect(warnings).toEqual(['Row 2: non-numeric temperature "inf" read as null']);
  });

  it("warns when a non-contract column mixes numbers and text", () => {
    const { table, warnings } = parseWeatherCsv("date,humidity\n2024-01-01,40\n2024-01-02,damp\n");
    expect(table.columns[1]).toEqual({ name: "humidity", kind: "other" });
    expect(table.rows[0].values.humidity).toBe("40");
    expect(warnings).toEqual(['Column "humidity" mixes numbers and text; read as text']);
  });

  it("strips a UTF-8 BOM", () => {
    const { table } = parseWeatherCsv("\uFEFFdate,temperature\n2024-05-01,30\n");
    expect(table.columns.map((c) => c.name)).toEqual(["date", "temperature"]);
    expect(table.rows[0].values.temperature).toBe(30);
  });

  it("rejects files without a date column or usable rows", () => {
    expect(() => parseWeatherCsv("")).toThrow(CsvFormatError);
    expect(() => parseWeatherCsv("day,temperature\n2024-01-01,3\n")).toThrow(
      'CSV is missing the required "date" column',
    );
    expect(() => parseWeatherCsv("date,temperature\nsoon,3\n")).toThrow("CSV has no rows with a valid date");
  });
});

describe("parseDateKey", () => {
  it("accepts ISO and common day formats", () => {
    expect(parseDateKey("2024-03-05")).toBe("2024-03-05");
    expect(parseDateKey("2024-03-05T23:30:00+05:30")).toBe("2024-03-05");
    expect(parseDateKey("2024/3/5")).toBe("2024-03-05");
    expect(parseDateKey("3/5/2024")).toBe("2024-03-05");
    expect(parseDateKey("15-03-2024")).toBe("2024-03-15");
    expect(parseDateKey("01-02-2024")).toBe("2024-01-02");
    expect(parseDateKey("2024-03-05 06:15")).toBe("2024-03-05");
  });

  it("returns null for blanks and impossible dates", () => {
    expect(parseDateKey("")).toBeNull();
    expect(parseDateKey("2024-02-30")).toBeNull();
    expect(parseDateKey("yesterday")).toBeNull();
  });
});

describe("normalizeHeader", () => {
  it("lowercases and snake-cases header text", () => {
    expect(normalizeHeader(" Wind Speed (km/h) ")).toBe("wind_speed_km_h");
    expect(normalizeHeader("Date")).toBe("date");
  });
});

describe("formatWeatherCsv", () => {
  it("writes the table back with empty cells for nulls", () => {
    const { table } = parseWeatherCsv(UPLOAD);
    expect(formatWeatherCsv(table)).toBe(
      [
        "date,temperature,precipitation,wind_speed,pressure,station",
        "2024-01-01,25.5,0,15,1013,north",
        "2024-01-02,26.3,,18,1015,north",
        "2024-01-03,24.8,1.2,12,,south",
      ].join("\n"),
    );
  });

  it("names downloads after the city and window", () => {
    expect(weatherCsvFilename("New Delhi", "2024-01-01", "2024-01-31")).toBe(
      "weather_data_new_delhi_2024-01-01_to_2024-01-31.csv",
    );
  });
});
