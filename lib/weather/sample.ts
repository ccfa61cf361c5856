import { DateTime } from "luxon";
import { createWeatherTable, type WeatherRowInput } from "@/modules/weatherTable/table";
import type { WeatherTable } from "@/modules/weatherTable/types";

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function hashStringToUnit(s: string): number {
  let h = 2166136261;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return ((h >>> 0) % 1_000_000) / 1_000_000;
}

// Box-Muller on two hashed uniforms.
function gaussian(key: string): number {
  const u1 = Math.max(1e-6, hashStringToUnit(`${key}:a`));
  const u2 = hashStringToUnit(`${key}:b`);
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

function exponential(key: string, scale: number): number {
  return -Math.log(1 - hashStringToUnit(key)) * scale;
}

export type SampleTableOptions = {
  days?: number;
  /** Last day of the series (YYYY-MM-DD); defaults to today in UTC. */
  endDate?: string;
  seed?: string;
};

/**
 * Synthetic daily series for demos: a sinusoidal year of temperature with noise,
 * exponential rain, gamma-shaped wind and pressure around 1013 hPa.
 * Same options -> same table.
 */
export function createSampleTable(opts: SampleTableOptions = {}): WeatherTable {
  const days = Math.max(1, Math.trunc(opts.days ?? 365));
  const seed = opts.seed ?? "sample";
  const end = opts.endDate ? DateTime.fromISO(opts.endDate, { zone: "utc" }) : DateTime.utc().startOf("day");
  if (!end.isValid) throw new RangeError(`Invalid endDate: ${opts.endDate}`);
  const start = end.minus({ days: days - 1 });

  const rows: WeatherRowInput[] = [];
  for (let i = 0; i < days; i++) {
    const key = `${seed}:${i}`;
    const base = 20 + 10 * Math.sin((i * 2 * Math.PI) / 365);
    rows.push({
      date: start.plus({ days: i }).toFormat("yyyy-LL-dd"),
      values: {
        temperature: round2(base + gaussian(`${key}:t`) * 3),
        precipitation: round2(Math.max(0, exponential(`${key}:p`, 2))),
        wind_speed: round2(Math.max(0, exponential(`${key}:w1`, 2) + exponential(`${key}:w2`, 2))),
        pressure: round2(1013 + gaussian(`${key}:pr`) * 10),
      },
    });
  }
  return createWeatherTable(rows);
}
