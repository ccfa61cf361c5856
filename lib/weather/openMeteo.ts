/**
 * Open-Meteo historical archive client.
 *
 * Free endpoint, no API key. We request daily aggregates and map them onto the
 * upload column contract (date, temperature, precipitation, wind_speed, pressure)
 * plus the extra daily series the archive offers.
 */
import { DateTime } from "luxon";
import cityCatalog from "@/lib/weather/cities.json";
import { getWeatherConfig } from "@/lib/weather/config";
import { createWeatherTable, isDateKey, type WeatherRowInput } from "@/modules/weatherTable/table";
import type { CellValue, WeatherTable } from "@/modules/weatherTable/types";
import { CONTRACT_COLUMNS } from "@/modules/weatherTable/types";

export type CityCoordinates = { name: string; latitude: number; longitude: number };

type CityEntry = CityCoordinates & { aliases: string[] };

export class WeatherFetchError extends Error {
  readonly status: number | null;
  readonly body: unknown;
  constructor(message: string, status: number | null = null, body: unknown = null) {
    super(message);
    this.name = "WeatherFetchError";
    this.status = status;
    this.body = body;
  }
}

export class UnknownCityError extends Error {
  readonly city: string;
  constructor(city: string) {
    super(`City '${city}' not supported! Available: ${listCities().join(", ")}`);
    this.name = "UnknownCityError";
    this.city = city;
  }
}

export const ARCHIVE_DAILY_VARIABLES = [
  "temperature_2m_max",
  "temperature_2m_min",
  "temperature_2m_mean",
  "precipitation_sum",
  "windspeed_10m_max",
  "windspeed_10m_mean",
  "relative_humidity_2m_mean",
  "pressure_msl_mean",
] as const;

// Archive series -> table column, in output column order.
const COLUMN_MAP: Array<[string, string]> = [
  ["temperature_2m_mean", "temperature"],
  ["temperature_2m_max", "temp_max"],
  ["temperature_2m_min", "temp_min"],
  ["precipitation_sum", "precipitation"],
  ["windspeed_10m_mean", "wind_speed"],
  ["windspeed_10m_max", "wind_speed_max"],
  ["relative_humidity_2m_mean", "humidity"],
  ["pressure_msl_mean", "pressure"],
];

export const MAX_HISTORY_DAYS = 365;

const CITIES: CityEntry[] = cityCatalog;

export function listCities(): string[] {
  return CITIES.map((c) => c.name);
}

export function getCityCoordinates(name: string): CityCoordinates | null {
  const key = String(name ?? "").trim().toLowerCase();
  if (!key) return null;
  const hit = CITIES.find((c) => c.name.toLowerCase() === key || c.aliases.includes(key));
  return hit ? { name: hit.name, latitude: hit.latitude, longitude: hit.longitude } : null;
}

export type ArchiveRequest = {
  latitude: number;
  longitude: number;
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  timezone?: string;
};

export function buildArchiveUrl(req: ArchiveRequest, baseUrl: string = getWeatherConfig().archiveUrl): string {
  const url = new URL(baseUrl);
  url.searchParams.set("latitude", String(req.latitude));
  url.searchParams.set("longitude", String(req.longitude));
  url.searchParams.set("start_date", req.startDate);
  url.searchParams.set("end_date", req.endDate);
  url.searchParams.set("daily", ARCHIVE_DAILY_VARIABLES.join(","));
  url.searchParams.set("timezone", req.timezone ?? getWeatherConfig().timezone);
  return url.toString();
}

function backoff(attempt: number): number {
  // 200ms, 400ms, 800ms ... capped at 4s
  return Math.min(200 * Math.pow(2, attempt - 1), 4000);
}

function parseRetryAfter(v: string | null): number | undefined {
  if (!v) return;
  const s = parseInt(v, 10);
  return Number.isFinite(s) ? s * 1000 : undefined;
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

type FetchJsonOpts = { timeoutMs?: number; retries?: number };

async function fetchJsonWithRetries(url: string, opts: FetchJsonOpts = {}): Promise<unknown> {
  const cfg = getWeatherConfig();
  const timeoutMs = opts.timeoutMs ?? cfg.fetchTimeoutMs;
  const retries = opts.retries ?? cfg.fetchRetries;

  let attempt = 0;
  while (true) {
    attempt++;
    let res: Response;
    try {
      res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      if (attempt <= retries) {
        await new Promise((r) => setTimeout(r, backoff(attempt)));
        continue;
      }
      throw new WeatherFetchError(`Archive request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const body = await readBody(res);
    if (res.ok) return body;

    if (attempt <= retries && (res.status >= 500 || res.status === 429)) {
      const waitMs = parseRetryAfter(res.headers.get("retry-after")) ?? backoff(attempt);
      console.warn(`[weather/openMeteo] upstream ${res.status}, retry ${attempt}/${retries} in ${waitMs}ms`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    const excerpt = typeof body === "string" ? body.slice(0, 200) : JSON.stringify(body ?? {}).slice(0, 200);
    console.error(
      JSON.stringify({
        route: "weather/openMeteo",
        status: res.status,
        url,
        body_excerpt: excerpt,
      }),
    );
    throw new WeatherFetchError(`Upstream ${res.status}`, res.status, body);
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function numericSeries(daily: Record<string, unknown>, key: string, length: number): Array<number | null> {
  const raw = daily[key];
  if (raw === undefined) return new Array<number | null>(length).fill(null);
  if (!Array.isArray(raw)) throw new WeatherFetchError(`Archive payload: daily.${key} is not an array`);
  return Array.from({ length }, (_, i) => {
    const v: unknown = raw[i];
    return typeof v === "number" && Number.isFinite(v) ? v : null;
  });
}

export type NormalizeOptions = {
  /** Drop rows missing any of the contract columns. */
  dropIncomplete?: boolean;
};

export function normalizeArchiveResponse(payload: unknown, opts: NormalizeOptions = {}): WeatherTable {
  const daily = isRecord(payload) ? payload.daily : undefined;
  if (!isRecord(daily) || !Array.isArray(daily.time)) {
    throw new WeatherFetchError("Archive payload has no daily.time series", null, payload);
  }
  const time: unknown[] = daily.time;
  const series = COLUMN_MAP.map(([key, column]) => ({ column, values: numericSeries(daily, key, time.length) }));

  const rows: WeatherRowInput[] = [];
  time.forEach((t, i) => {
    const date = String(t ?? "").slice(0, 10);
    if (!isDateKey(date)) throw new WeatherFetchError(`Archive payload: invalid date at index ${i}`, null, payload);
    const values: Record<string, CellValue> = {};
    for (const s of series) values[s.column] = s.values[i];
    if (opts.dropIncomplete) {
      const missing = CONTRACT_COLUMNS.some((c) => c !== "date" && values[c] === null);
      if (missing) return;
    }
    rows.push({ date, values });
  });

  return createWeatherTable(rows, { columns: COLUMN_MAP.map(([, name]) => ({ name, kind: "numeric" as const })) });
}

export async function fetchArchiveHistory(req: ArchiveRequest, opts: NormalizeOptions & FetchJsonOpts = {}): Promise<WeatherTable> {
  const url = buildArchiveUrl(req);
  const payload = await fetchJsonWithRetries(url, opts);
  return normalizeArchiveResponse(payload, opts);
}

export type CityHistoryRequest = {
  city: string;
  days?: number;
  /** Last day of the window (YYYY-MM-DD); defaults to today in UTC. */
  endDate?: string;
  dropIncomplete?: boolean;
};

export type CityHistoryWindow = {
  city: CityCoordinates;
  days: number;
  startDate: string;
  endDate: string;
};

export type DayWindow = Omit<CityHistoryWindow, "city">;

/** `days` clamped to 1..365, ending on `endDate` (default today, UTC). */
export function resolveDayWindow(daysIn?: number, endDate?: string): DayWindow {
  const requested = Number.isFinite(daysIn) ? Math.trunc(Number(daysIn)) : getWeatherConfig().defaultDays;
  const days = Math.min(MAX_HISTORY_DAYS, Math.max(1, requested));

  const end = endDate ? DateTime.fromISO(endDate, { zone: "utc" }) : DateTime.utc().startOf("day");
  if (!end.isValid) throw new RangeError(`Invalid endDate: ${endDate}`);
  const start = end.minus({ days });

  return { days, startDate: start.toFormat("yyyy-LL-dd"), endDate: end.toFormat("yyyy-LL-dd") };
}

export function resolveHistoryWindow(req: CityHistoryRequest): CityHistoryWindow {
  const city = getCityCoordinates(req.city);
  if (!city) throw new UnknownCityError(req.city);
  return { city, ...resolveDayWindow(req.days, req.endDate) };
}

export type FetchTargetRequest = {
  city: string;
  /** Explicit coordinates win over the catalog entry. */
  latitude?: number;
  longitude?: number;
  startDate?: string;
  endDate?: string;
  days?: number;
};

export type FetchTarget = CityCoordinates & { startDate: string; endDate: string };

/**
 * Coordinates plus window for an ad-hoc fetch. An explicit start/end pair is
 * used as given; otherwise `days` counts back from `endDate`.
 */
export function resolveFetchTarget(req: FetchTargetRequest): FetchTarget {
  const name = req.city.trim();
  const known = getCityCoordinates(name);
  const latitude = req.latitude ?? known?.latitude;
  const longitude = req.longitude ?? known?.longitude;
  if (latitude === undefined || longitude === undefined || !Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new UnknownCityError(name);
  }

  const window =
    req.startDate && req.endDate
      ? { startDate: req.startDate, endDate: req.endDate }
      : resolveDayWindow(req.days, req.endDate);
  return { name: known?.name ?? name, latitude, longitude, startDate: window.startDate, endDate: window.endDate };
}

export async function fetchCityHistory(req: CityHistoryRequest): Promise<{ window: CityHistoryWindow; table: WeatherTable }> {
  const window = resolveHistoryWindow(req);
  const table = await fetchArchiveHistory(
    {
      latitude: window.city.latitude,
      longitude: window.city.longitude,
      startDate: window.startDate,
      endDate: window.endDate,
    },
    { dropIncomplete: req.dropIncomplete },
  );
  console.log(`[weather/openMeteo] loaded ${table.rows.length} days for ${window.city.name} (last ${window.days} days)`);
  return { window, table };
}
