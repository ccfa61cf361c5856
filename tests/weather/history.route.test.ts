import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";
import { GET } from "@/app/api/weather/history/route";

const PAYLOAD = {
  daily: {
    time: ["2024-01-01", "2024-01-02"],
    temperature_2m_mean: [20.5, null],
    temperature_2m_max: [25, 24],
    temperature_2m_min: [16, 15.5],
    precipitation_sum: [0, 3.2],
    windspeed_10m_mean: [10, 12],
    windspeed_10m_max: [18, 20],
    pressure_msl_mean: [1012, 1010],
  },
};

function historyRequest(query: string) {
  return new NextRequest(`http://localhost/api/weather/history?${query}`);
}

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

beforeEach(() => {
  vi.stubEnv("WEATHER_ARCHIVE_URL", "https://archive.example.test/v1/archive");
  vi.stubEnv("WEATHER_FETCH_RETRIES", "0");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("GET /api/weather/history", () => {
  it("returns the window and report for a city", async () => {
    const fetchMock = stubFetch(PAYLOAD);
    const res = await GET(historyRequest("city=mumbai&days=7"));
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.ok).toBe(true);
    expect(body.window.city).toEqual({ name: "Mumbai", latitude: 19.076, longitude: 72.8777 });
    expect(body.window.days).toBe(7);
    expect(body.report.quickInfo.totalRecords).toBe(1);
    expect(body.report.summary.temperature.mean).toBe(20.5);

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.searchParams.get("start_date")).toBe(body.window.startDate);
    expect(url.searchParams.get("end_date")).toBe(body.window.endDate);
  });

  it("streams CSV downloads", async () => {
    stubFetch(PAYLOAD);
    const res = await GET(historyRequest("city=Mumbai&format=csv"));
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("content-disposition")).toMatch(
      /^attachment; filename="weather_data_mumbai_\d{4}-\d{2}-\d{2}_to_\d{4}-\d{2}-\d{2}\.csv"$/,
    );
    expect(await res.text()).toBe(
      [
        "date,temperature,temp_max,temp_min,precipitation,wind_speed,wind_speed_max,humidity,pressure",
        "2024-01-01,20.5,25,16,0,10,18,,1012",
      ].join("\n"),
    );
  });

  it("validates query parameters before fetching", async () => {
    const fetchMock = stubFetch(PAYLOAD);
    const badFormat = await GET(historyRequest("format=xml"));
    expect(badFormat.status).toBe(400);
    expect(await badFormat.json()).toEqual({ ok: false, error: "Unsupported format: xml" });

    const badDays = await GET(historyRequest("days=lots"));
    expect(badDays.status).toBe(400);

    const unknown = await GET(historyRequest("city=Atlantis"));
    expect(unknown.status).toBe(400);
    const body = await unknown.json();
    expect(body.error.startsWith("City 'Atlantis' not supported! Available: ")).toBe(true);

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("answers 404 when no day is complete", async () => {
    stubFetch({ daily: { ...PAYLOAD.daily, temperature_2m_mean: [null, null] } });
    const res = await GET(historyRequest("city=Pune"));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: "No complete observations for Pune" });
  });

  it("maps upstream failures to 502", async () => {
    stubFetch({ error: true, reason: "maintenance" }, 500);
    const res = await GET(historyRequest("city=Mumbai"));
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ ok: false, error: "Upstream 500" });
  });
});
