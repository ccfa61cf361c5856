import dotenv from 'dotenv';
dotenv.config({ path: '.env.local', override: false });
dotenv.config({ path: '.env', override: false });

import { writeFileSync } from 'fs';
import { formatSummaryLines } from '@/lib/weather/consoleReport';
import { formatWeatherCsv, weatherCsvFilename } from '@/lib/weather/csv';
import {
  UnknownCityError,
  fetchArchiveHistory,
  listCities,
  resolveFetchTarget,
  type FetchTarget,
} from '@/lib/weather/openMeteo';
import { computeSummaryStatistics } from '@/modules/weatherAnalysis/aggregate';

type Args = {
  city?: string;
  lat?: string;
  lon?: string;
  start?: string;
  end?: string;
  days?: string;
  out?: string;
};

const KEYS: Array<keyof Args> = ['city', 'lat', 'lon', 'start', 'end', 'days', 'out'];

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  for (let i = 2; i < argv.length; i++) {
    const flag = argv[i];
    if (!flag.startsWith('--')) continue;
    const key = KEYS.find((k) => k === flag.slice(2));
    if (key) args[key] = argv[i + 1] ?? '';
    i++;
  }
  return args;
}

function usage() {
  console.log(`
Usage:
  npm run weather:fetch -- --city "Mumbai" --start 2024-01-01 --end 2024-12-31 [--out ./mumbai.csv]
  npm run weather:fetch -- --city "Mumbai" --days 90
  npm run weather:fetch -- --city "Somewhere" --lat 19.07 --lon 72.87 --start 2024-01-01 --end 2024-03-31
  npm run weather:fetch -- --city "Somewhere" --lat 19.07 --lon 72.87 --days 30

Known cities: ${listCities().join(', ')}
Notes:
  - --days counts back from --end or today (max 365); WEATHER_DEFAULT_DAYS applies when no range is given.
  - WEATHER_ARCHIVE_URL overrides the Open-Meteo archive endpoint.
`);
}

function optionalNumber(v: string | undefined): number | undefined {
  return v ? Number(v) : undefined;
}

function resolveTarget(args: Args): FetchTarget | null {
  const name = (args.city ?? '').trim();
  if (!name) return null;

  try {
    return resolveFetchTarget({
      city: name,
      latitude: optionalNumber(args.lat),
      longitude: optionalNumber(args.lon),
      startDate: args.start,
      endDate: args.end,
      days: optionalNumber(args.days),
    });
  } catch (err) {
    if (!(err instanceof UnknownCityError)) throw err;
    console.error(`City '${name}' not found in catalog. Pass --lat and --lon.`);
    return null;
  }
}

async function main() {
  const args = parseArgs(process.argv);
  const target = resolveTarget(args);
  if (!target) {
    usage();
    process.exit(2);
  }

  console.log(`Fetching weather data for ${target.name}...`);
  console.log(`Period: ${target.startDate} to ${target.endDate}`);

  const table = await fetchArchiveHistory({
    latitude: target.latitude,
    longitude: target.longitude,
    startDate: target.startDate,
    endDate: target.endDate,
  });

  const outPath = args.out || `./${weatherCsvFilename(target.name, target.startDate, target.endDate)}`;
  writeFileSync(outPath, formatWeatherCsv(table) + '\n', 'utf8');
  console.log(`Wrote ${table.rows.length} rows -> ${outPath}`);

  if (table.rows.length > 0) {
    for (const line of formatSummaryLines(computeSummaryStatistics(table))) console.log(line);
  }
}

main().catch((err) => {
  console.error('FATAL:', err instanceof Error ? err.message : err);
  process.exit(1);
});
