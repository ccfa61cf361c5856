import { NextRequest, NextResponse } from "next/server";
import { errorResponse, jsonError } from "@/app/api/weather/_shared/respond";
import { getWeatherConfig } from "@/lib/weather/config";
import { formatWeatherCsv, weatherCsvFilename } from "@/lib/weather/csv";
import { fetchCityHistory } from "@/lib/weather/openMeteo";
import { analyzeWeatherTable, toJsonSafe } from "@/modules/weatherAnalysis/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  const url = new URL(req.url);
  const city = url.searchParams.get("city") || getWeatherConfig().defaultCity;
  const daysParam = url.searchParams.get("days");
  const format = (url.searchParams.get("format") || "json").toLowerCase();

  if (format !== "json" && format !== "csv") return jsonError(`Unsupported format: ${format}`);
  const days = daysParam ? Number(daysParam) : undefined;
  if (days !== undefined && !Number.isFinite(days)) return jsonError("days must be a number");

  try {
    const { window, table } = await fetchCityHistory({ city, days, dropIncomplete: true });

    if (format === "csv") {
      return new NextResponse(formatWeatherCsv(table), {
        status: 200,
        headers: {
          "content-type": "text/csv; charset=utf-8",
          "content-disposition": `attachment; filename="${weatherCsvFilename(window.city.name, window.startDate, window.endDate)}"`,
        },
      });
    }

    if (table.rows.length === 0) return jsonError(`No complete observations for ${window.city.name}`, 404);
    return NextResponse.json({
      ok: true,
      window,
      report: toJsonSafe(analyzeWeatherTable(table)),
    });
  } catch (err) {
    return errorResponse("weather/history", err);
  }
}
