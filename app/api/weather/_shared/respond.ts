import { NextResponse } from "next/server";
import { CsvFormatError } from "@/lib/weather/csv";
import { UnknownCityError, WeatherFetchError } from "@/lib/weather/openMeteo";
import { WeatherAnalysisError } from "@/modules/weatherAnalysis/errors";
import { InvalidWeatherTableError } from "@/modules/weatherTable/table";

export function jsonError(message: string, status = 400) {
  return NextResponse.json({ ok: false, error: message }, { status });
}

export function errorStatus(err: unknown): number {
  if (err instanceof CsvFormatError || err instanceof UnknownCityError || err instanceof RangeError) return 400;
  if (err instanceof WeatherAnalysisError || err instanceof InvalidWeatherTableError) return 422;
  if (err instanceof WeatherFetchError) return 502;
  return 500;
}

export function errorResponse(route: string, err: unknown) {
  const status = errorStatus(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status >= 500) console.error(`[${route}]`, message);
  return jsonError(status === 500 ? "internal_error" : message, status);
}
