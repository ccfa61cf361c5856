export const DEFAULT_ARCHIVE_URL = "https://archive-api.open-meteo.com/v1/archive";

export type WeatherConfig = {
  archiveUrl: string;
  timezone: string;
  fetchTimeoutMs: number;
  fetchRetries: number;
  defaultCity: string;
  defaultDays: number;
};

function envString(v: string | undefined, def: string): string {
  const s = String(v ?? "").trim();
  return s ? s : def;
}

function envInt(v: string | undefined, def: number, min: number): number {
  if (v == null || v.trim() === "") return def;
  const n = Number(v);
  return Number.isInteger(n) && n >= min ? n : def;
}

/** Read on every call so scripts that load dotenv late still see their values. */
export function getWeatherConfig(env: NodeJS.ProcessEnv = process.env): WeatherConfig {
  return {
    archiveUrl: envString(env.WEATHER_ARCHIVE_URL, DEFAULT_ARCHIVE_URL),
    timezone: envString(env.WEATHER_TIMEZONE, "auto"),
    fetchTimeoutMs: envInt(env.WEATHER_FETCH_TIMEOUT_MS, 12_000, 1),
    fetchRetries: envInt(env.WEATHER_FETCH_RETRIES, 2, 0),
    defaultCity: envString(env.WEATHER_DEFAULT_CITY, "Nagpur"),
    defaultDays: envInt(env.WEATHER_DEFAULT_DAYS, 30, 1),
  };
}
