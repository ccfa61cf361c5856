import { NextRequest, NextResponse } from "next/server";
import { errorResponse, jsonError } from "@/app/api/weather/_shared/respond";
import { parseWeatherCsv } from "@/lib/weather/csv";
import { analyzeWeatherTable, toJsonSafe } from "@/modules/weatherAnalysis/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

async function readCsvBody(req: NextRequest): Promise<string | null> {
  const contentType = req.headers.get("content-type") ?? "";
  if (contentType.includes("multipart/form-data")) {
    const form = await req.formData();
    const file = form.get("file");
    if (file === null) return null;
    return typeof file === "string" ? file : await file.text();
  }
  return await req.text();
}

export async function POST(req: NextRequest) {
  const declaredLength = Number(req.headers.get("content-length") ?? "");
  if (Number.isFinite(declaredLength) && declaredLength > MAX_UPLOAD_BYTES) {
    return jsonError("CSV body exceeds 5 MB", 413);
  }

  try {
    const text = await readCsvBody(req);
    if (!text || !text.trim()) return jsonError("CSV body is empty");
    if (Buffer.byteLength(text, "utf8") > MAX_UPLOAD_BYTES) return jsonError("CSV body exceeds 5 MB", 413);

    const { table, warnings } = parseWeatherCsv(text);
    const report = analyzeWeatherTable(table);
    return NextResponse.json({ ok: true, report: toJsonSafe(report), warnings });
  } catch (err) {
    return errorResponse("weather/analyze", err);
  }
}
